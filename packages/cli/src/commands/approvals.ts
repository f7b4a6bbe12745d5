/**
 * @module commands/approvals
 * Reviewer commands: `approvals list|show|stats`, `decide`, `approve-all`
 * and `reject-all`.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import type { CliContext } from '../context.js';
import { BOLD, GRAY, RESET, formatArgv, formatRecordDetail, formatRecordLine } from '../format.js';
import { AuditResponse, BatchResponse, PendingResponse, RecordResponse } from '../schemas.js';

const DECISIONS = ['approved', 'rejected', 'needs_more_info'] as const;

const StatsResponse = z.object({
  stats: z.object({
    total: z.number(),
    pending: z.number(),
    byStatus: z.record(z.number()),
    averageDecisionMs: z.number().nullable(),
  }),
});

function parseDecision(value: string): (typeof DECISIONS)[number] {
  const decision = DECISIONS.find((d) => d === value);
  if (!decision) throw new Error(`Decision must be one of ${DECISIONS.join(', ')}`);
  return decision;
}

export function registerApprovals(program: Command, ctx: CliContext): void {
  const approvals = program.command('approvals').description('Inspect the approval queue');

  approvals
    .command('list')
    .description('Pending proposals in review order')
    .option('-s, --scope <scope>', 'entity, namespace or workflow id')
    .action(async (opts: { scope?: string }) => {
      try {
        const { count, records } = await ctx.client().get(PendingResponse, '/api/approvals/pending', { scope: opts.scope });
        if (count === 0) {
          ctx.out.log('No pending proposals');
          return;
        }
        ctx.out.log(`${BOLD}${count} pending${RESET}`);
        for (const record of records) ctx.out.log(formatRecordLine(record));
      } catch (err) {
        ctx.fail(err);
      }
    });

  approvals
    .command('show <id>')
    .description('One proposal with its audit trail')
    .action(async (id: string) => {
      try {
        const client = ctx.client();
        const { record } = await client.get(RecordResponse, `/api/approvals/${encodeURIComponent(id)}`);
        const { audit } = await client.get(AuditResponse, `/api/approvals/${encodeURIComponent(id)}/audit`);
        for (const line of formatRecordDetail(record)) ctx.out.log(line);
        ctx.out.log('  audit:');
        for (const entry of audit) {
          const note = entry.feedback ? ` ${GRAY}(${entry.feedback})${RESET}` : '';
          ctx.out.log(`    ${entry.timestamp}  ${entry.from} → ${entry.to}  by ${entry.actor}${note}`);
        }
      } catch (err) {
        ctx.fail(err);
      }
    });

  approvals
    .command('stats')
    .description('Queue statistics')
    .action(async () => {
      try {
        const { stats } = await ctx.client().get(StatsResponse, '/api/approvals/stats');
        ctx.out.log(`total ${stats.total}, pending ${stats.pending}`);
        for (const [status, n] of Object.entries(stats.byStatus)) {
          if (n > 0) ctx.out.log(`  ${status}: ${n}`);
        }
        if (stats.averageDecisionMs !== null) {
          ctx.out.log(`  average decision time: ${(stats.averageDecisionMs / 1000).toFixed(1)}s`);
        }
      } catch (err) {
        ctx.fail(err);
      }
    });

  program
    .command('decide <id> <decision>')
    .description(`Decide one proposal (${DECISIONS.join(' | ')})`)
    .requiredOption('-a, --actor <name>', 'reviewer name')
    .option('-f, --feedback <text>', 'note stored with the decision')
    .action(async (id: string, value: string, opts: { actor: string; feedback?: string }) => {
      try {
        const decision = parseDecision(value);
        const { record } = await ctx.client().post(RecordResponse, `/api/approvals/${encodeURIComponent(id)}/decide`, {
          decision,
          actor: opts.actor,
          feedback: opts.feedback,
        });
        ctx.out.log(`${record.proposal.id}: ${record.status}  ${GRAY}${formatArgv(record.proposal.proposedAction.command)}${RESET}`);
      } catch (err) {
        ctx.fail(err);
      }
    });

  for (const [name, decision] of [['approve-all', 'approved'], ['reject-all', 'rejected']] as const) {
    program
      .command(`${name} <workflowId>`)
      .description(`Mark every pending proposal of a workflow ${decision}`)
      .requiredOption('-a, --actor <name>', 'reviewer name')
      .option('-f, --feedback <text>', 'note stored with each decision')
      .action(async (workflowId: string, opts: { actor: string; feedback?: string }) => {
        try {
          const result = await ctx.client().post(BatchResponse, `/api/workflows/${encodeURIComponent(workflowId)}/${name}`, {
            actor: opts.actor,
            feedback: opts.feedback,
          });
          ctx.out.log(`${result.proposalIds.length} proposal(s) ${decision} in ${workflowId}`);
          for (const id of result.proposalIds) ctx.out.log(`  ${id}`);
        } catch (err) {
          ctx.fail(err);
        }
      });
  }
}
