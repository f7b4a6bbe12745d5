/**
 * @module fixes/confidence
 * Confidence of a generated proposal from prior-fix evidence.
 *
 *   successRate = (successes + 1) / (attempts + 2)      (Laplace smoothing)
 *   evidence    = min(1, priorFixCount / 5)
 *   confidence  = round2(successRate * (0.5 + 0.45 * evidence))
 *
 * With no prior evidence the result is 0.25; it never exceeds 0.95.
 */

export interface FixEvidence {
  /** Distinct prior fixes considered. */
  priorFixCount: number;
  successes: number;
  attempts: number;
}

export const NO_EVIDENCE: FixEvidence = { priorFixCount: 0, successes: 0, attempts: 0 };

const FULL_EVIDENCE_FIXES = 5;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function successRate(evidence: FixEvidence): number {
  return (evidence.successes + 1) / (evidence.attempts + 2);
}

export function generatedConfidence(evidence: FixEvidence): number {
  const weight = Math.min(1, evidence.priorFixCount / FULL_EVIDENCE_FIXES);
  return round2(successRate(evidence) * (0.5 + 0.45 * weight));
}

/** Human summary appended to every rationale. */
export function describeEvidence(evidence: FixEvidence): string {
  if (evidence.attempts === 0) {
    return `Prior fixes: ${evidence.priorFixCount} (no recorded attempts).`;
  }
  const pct = Math.round((evidence.successes / evidence.attempts) * 100);
  return `Prior fixes: ${evidence.priorFixCount} (${evidence.successes}/${evidence.attempts} successful, ${pct}%).`;
}
