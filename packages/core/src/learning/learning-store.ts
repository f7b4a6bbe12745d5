/**
 * @module learning/learning-store
 * LearningStore - feeds execution outcomes back into the knowledge graph
 * and the similarity index so later diagnoses rank proven fixes higher.
 */

import { createHash } from 'node:crypto';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import { nodeId } from '../graph/types.js';
import type { SimilarityIndex } from '../collaborators.js';
import type { FixProposal, PatternId } from '../types.js';
import { formatCommand } from '../types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

export interface LearningOutcome {
  patternId: PatternId;
  proposal: FixProposal;
  success: boolean;
  /** Entity or namespace the fix was applied to. */
  entityScope: string;
}

export interface LearningResult {
  fixId: string;
  recorded: boolean;
}

export interface LearningStoreOptions {
  graph: KnowledgeGraph;
  similarity?: SimilarityIndex;
  logger?: Logger;
  now?: () => number;
}

/** Stable fix identity: same pattern and same argv give the same node. */
export function fixIdentity(patternId: PatternId, command: readonly string[]): string {
  const hash = createHash('sha256').update(patternId).update('\n').update(command.join('\u0000')).digest('hex');
  return nodeId('fix', hash.slice(0, 16));
}

export class LearningStore {
  private readonly graph: KnowledgeGraph;
  private readonly similarity?: SimilarityIndex;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: LearningStoreOptions) {
    this.graph = options.graph;
    this.similarity = options.similarity;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record one outcome: `cause -remediates-> fix` counters are incremented
   * and a summary is indexed. Never throws.
   */
  async record(outcome: LearningOutcome): Promise<LearningResult> {
    const { patternId, proposal, success, entityScope } = outcome;
    const fixId = fixIdentity(patternId, proposal.proposedAction.command);
    const cause = nodeId('cause', patternId);
    const command = formatCommand(proposal.proposedAction);
    const usedAt = new Date(this.now()).toISOString();

    try {
      this.graph.addNode({ id: cause, type: 'cause', label: patternId, attributes: {} });
      this.graph.addNode({
        id: fixId,
        type: 'fix',
        label: proposal.proposedAction.description || command,
        attributes: {
          command,
          description: proposal.proposedAction.description,
          pattern: patternId,
          risk: proposal.riskLevel,
        },
      });
      this.graph.incrementEdge(
        cause,
        fixId,
        'remediates',
        { success_count: success ? 1 : 0, attempt_count: 1 },
        { last_used: usedAt, last_result: success ? 'success' : 'failure' },
      );
    } catch (err) {
      this.logger.error(`Learning graph update failed for ${fixId}: ${errorMessage(err)}`);
      return { fixId, recorded: false };
    }

    if (this.similarity) {
      try {
        await this.similarity.add({
          id: `${fixId}:${proposal.id}`,
          text: `${patternId} on ${entityScope}: ${proposal.rootCause}. Applied ${command} -> ${success ? 'resolved' : 'not resolved'}`,
          metadata: { patternId, fixId, entity: entityScope, outcome: success ? 'success' : 'failure' },
        });
      } catch (err) {
        this.logger.warn(`Similarity index update failed for ${fixId}: ${errorMessage(err)}`);
      }
    }

    this.logger.debug(`Recorded ${success ? 'success' : 'failure'} of ${fixId} for ${patternId}`);
    return { fixId, recorded: true };
  }
}
