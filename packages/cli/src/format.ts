/**
 * @module format
 * Terminal rendering for records, runs and graph nodes.
 */

import type { ApprovalRecordView, RunView } from './schemas.js';

// ── ANSI colours ──────────────────────────────────────────────────────
export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const CYAN = '\x1b[36m';
export const GRAY = '\x1b[90m';
export const BOLD = '\x1b[1m';
export const RESET = '\x1b[0m';

export function riskColor(risk: string): string {
  if (risk === 'HIGH') return `${RED}${risk}${RESET}`;
  if (risk === 'MEDIUM') return `${YELLOW}${risk}${RESET}`;
  return `${GREEN}${risk}${RESET}`;
}

export function resultColor(result: string | null): string {
  if (result === null) return `${CYAN}running${RESET}`;
  if (result === 'completed') return `${GREEN}${result}${RESET}`;
  if (result === 'no_action') return `${GRAY}${result}${RESET}`;
  return `${RED}${result}${RESET}`;
}

/** Quote arguments containing whitespace or quotes. */
export function formatArgv(argv: readonly string[]): string {
  return argv.map((arg) => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}

/** One line per pending record: id, risk, confidence, entity, command. */
export function formatRecordLine(record: ApprovalRecordView): string {
  const p = record.proposal;
  return `${BOLD}${p.id}${RESET}  ${riskColor(p.riskLevel)}  ${p.confidence.toFixed(2)}  ${p.entityId}  ${GRAY}${formatArgv(p.proposedAction.command)}${RESET}`;
}

export function formatRecordDetail(record: ApprovalRecordView): string[] {
  const p = record.proposal;
  const lines = [
    `${BOLD}${p.id}${RESET} (${record.status})`,
    `  workflow:   ${p.workflowId}`,
    `  entity:     ${p.entityId}`,
    `  pattern:    ${p.patternId}`,
    `  risk:       ${riskColor(p.riskLevel)}   confidence ${p.confidence.toFixed(2)}   priority ${record.priority}`,
    `  cause:      ${p.rootCause}`,
    `  action:     ${formatArgv(p.proposedAction.command)}`,
    `  rollback:   ${formatArgv(p.rollbackAction.command)}`,
    `  expires:    ${record.expiresAt}`,
  ];
  if (record.decidedBy) lines.push(`  decided by: ${record.decidedBy}`);
  if (record.feedback) lines.push(`  feedback:   ${record.feedback}`);
  return lines;
}

export function formatRun(run: RunView): string[] {
  const lines = [
    `${BOLD}${run.id}${RESET}  ${resultColor(run.result)}  scope ${run.scope}  state ${run.state}  rounds ${run.rounds}`,
  ];
  if (run.summary) lines.push(`  ${run.summary}`);
  for (const entity of run.entities) {
    lines.push(`  ${entity.entityId}: ${entity.outcome}${entity.patterns.length ? ` [${entity.patterns.join(', ')}]` : ''}`);
  }
  if (run.error) lines.push(`  ${RED}error: ${run.error}${RESET}`);
  return lines;
}
