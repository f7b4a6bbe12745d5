/**
 * @module fixes/fix-generator
 * FixGenerator - turns a detected pattern plus graph context into a
 * concrete FixProposal.
 *
 * Flow:
 * 1. Gather prior `remediates` fixes of the pattern's cause node and
 *    similar past cases (either source failing degrades to empty context)
 * 2. With a text generator: prompt, parse, validate; any failure falls back
 * 3. Fallback: deterministic rule table keyed by pattern id
 */

import { randomUUID } from 'node:crypto';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import { nodeId } from '../graph/types.js';
import type { SimilarityHit, SimilaritySearch, TextGenerator } from '../collaborators.js';
import type { DiagnosticBundle, FixProposal, PatternId, Priority } from '../types.js';
import { BackendUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { fallbackRuleFor, resolveTarget } from './fallback-rules.js';
import { buildFixPrompt } from './prompt.js';
import type { FixContext, PriorFix } from './prompt.js';
import { parseGeneratedFix } from './response-schema.js';
import type { GeneratedFix } from './response-schema.js';
import { describeEvidence, generatedConfidence } from './confidence.js';
import type { FixEvidence } from './confidence.js';
import { validateProposal } from './validation.js';

export interface FixGeneratorOptions {
  graph: KnowledgeGraph;
  textGenerator?: TextGenerator;
  similarity?: SimilaritySearch;
  /** Prior fixes and similar cases considered. Default: 5 */
  contextLimit?: number;
  /** Default: 0.2 */
  temperature?: number;
  /** Default: 30000 */
  timeoutMs?: number;
  logger?: Logger;
}

export interface FixRequest {
  entityId: string;
  bundle: DiagnosticBundle;
  patternId: PatternId;
  workflowId: string;
  /** Default: `medium` */
  priority?: Priority;
  /** Pre-gathered context; looked up when absent. */
  context?: FixContext;
}

export class FixGenerator {
  private readonly graph: KnowledgeGraph;
  private readonly textGenerator?: TextGenerator;
  private readonly similarity?: SimilaritySearch;
  private readonly contextLimit: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: FixGeneratorOptions) {
    this.graph = options.graph;
    this.textGenerator = options.textGenerator;
    this.similarity = options.similarity;
    this.contextLimit = options.contextLimit ?? 5;
    this.temperature = options.temperature ?? 0.2;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger ?? silentLogger;
  }

  async generate(request: FixRequest): Promise<FixProposal> {
    const context = request.context ?? await this.gatherContext(request.patternId, request.bundle);
    const evidence = evidenceOf(context.priorFixes);

    if (this.textGenerator) {
      try {
        const fix = await this.askBackend(this.textGenerator, buildFixPrompt(request.patternId, request.bundle, context));
        const proposal = this.fromGenerated(request, fix, evidence);
        validateProposal(proposal);
        return proposal;
      } catch (err) {
        this.logger.warn(`Generation failed for ${request.patternId} on ${request.entityId}, using fallback: ${errorMessage(err)}`);
      }
    }

    return this.fromFallback(request, evidence);
  }

  /** One proposal per pattern, in iteration order. */
  async generateAll(request: Omit<FixRequest, 'patternId' | 'context'>, patternIds: Iterable<PatternId>): Promise<FixProposal[]> {
    const proposals: FixProposal[] = [];
    for (const patternId of patternIds) {
      proposals.push(await this.generate({ ...request, patternId }));
    }
    return proposals;
  }

  /** Prior fixes (most successful first) and similar cases for a pattern. */
  async gatherContext(patternId: PatternId, bundle: DiagnosticBundle): Promise<FixContext> {
    let priorFixes: PriorFix[] = [];
    try {
      priorFixes = this.priorFixes(patternId);
    } catch (err) {
      this.logger.warn(`Graph context unavailable for ${patternId}: ${errorMessage(err)}`);
    }

    let similarCases: SimilarityHit[] = [];
    if (this.similarity && this.contextLimit > 0) {
      const query = [patternId, ...bundle.rawSignals.slice(-5)].join(' ');
      try {
        similarCases = (await this.similarity.search(query, this.contextLimit)).slice(0, this.contextLimit);
      } catch (err) {
        this.logger.warn(`Similarity search failed for ${patternId}: ${errorMessage(err)}`);
      }
    }

    return { priorFixes, similarCases };
  }

  // ---- Internals ----

  private priorFixes(patternId: PatternId): PriorFix[] {
    return this.graph
      .getRelationships(nodeId('cause', patternId), 'remediates')
      .map((rel): PriorFix => {
        const node = this.graph.getNode(rel.targetId);
        return {
          fixId: rel.targetId,
          command: node?.attributes['command'] ?? node?.label ?? rel.targetId,
          description: node?.attributes['description'] ?? '',
          successCount: counter(rel.metadata['success_count']),
          attemptCount: counter(rel.metadata['attempt_count']),
        };
      })
      .sort((a, b) => b.successCount - a.successCount)
      .slice(0, this.contextLimit);
  }

  private async askBackend(generator: TextGenerator, prompt: string): Promise<GeneratedFix> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new BackendUnavailableError(`Generator timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      const reply = await Promise.race([
        generator.generate(prompt, this.temperature, { signal: controller.signal }),
        timeout,
      ]);
      return parseGeneratedFix(reply);
    } catch (err) {
      if (err instanceof BackendUnavailableError) throw err;
      throw new BackendUnavailableError(`Generator failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private fromGenerated(request: FixRequest, fix: GeneratedFix, evidence: FixEvidence): FixProposal {
    return {
      id: `prop-${randomUUID()}`,
      workflowId: request.workflowId,
      entityId: request.entityId,
      rootCause: fix.rootCause,
      proposedAction: { command: fix.action.command, description: fix.action.description },
      riskLevel: fix.riskLevel,
      confidence: generatedConfidence(evidence),
      rationale: [fix.rationale, describeEvidence(evidence)].filter(Boolean).join(' '),
      rollbackAction: { command: fix.rollback.command, description: fix.rollback.description },
      patternId: request.patternId,
      priority: request.priority ?? 'medium',
      source: 'generated',
      status: 'proposed',
    };
  }

  private fromFallback(request: FixRequest, evidence: FixEvidence): FixProposal {
    const rule = fallbackRuleFor(request.patternId);
    const target = resolveTarget(request.entityId, request.bundle);
    return {
      id: `prop-${randomUUID()}`,
      workflowId: request.workflowId,
      entityId: request.entityId,
      rootCause: rule.rootCause,
      proposedAction: rule.action(target),
      riskLevel: rule.riskLevel,
      confidence: rule.confidence,
      rationale: `${rule.rationale} ${describeEvidence(evidence)}`,
      rollbackAction: rule.rollback(target),
      patternId: request.patternId,
      priority: request.priority ?? 'medium',
      source: 'fallback',
      status: 'proposed',
    };
  }
}

function counter(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function evidenceOf(priorFixes: PriorFix[]): FixEvidence {
  return {
    priorFixCount: priorFixes.length,
    successes: priorFixes.reduce((sum, f) => sum + f.successCount, 0),
    attempts: priorFixes.reduce((sum, f) => sum + f.attemptCount, 0),
  };
}
