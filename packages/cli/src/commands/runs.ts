/**
 * @module commands/runs
 * `mendgraph runs start|list|show|cancel` - Drive workflow runs.
 */

import type { Command } from 'commander';
import type { CliContext } from '../context.js';
import { BOLD, GREEN, RESET, formatRun } from '../format.js';
import { CancelResponse, RunListResponse, RunResponse } from '../schemas.js';
import type { RunView } from '../schemas.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function registerRuns(program: Command, ctx: CliContext): void {
  const runs = program.command('runs').description('Start and inspect remediation runs');

  runs
    .command('start <scope>')
    .description('Start a run for a namespace (or * for all)')
    .option('-w, --wait', 'poll until the run finishes')
    .option('--poll <ms>', 'poll interval with --wait', (v) => parseInt(v, 10), 2000)
    .action(async (scope: string, opts: { wait?: boolean; poll: number }) => {
      try {
        const client = ctx.client();
        let { run } = await client.post(RunResponse, '/api/runs', { scope });
        ctx.out.log(`${GREEN}Started${RESET} ${BOLD}${run.id}${RESET} for ${scope}`);
        if (!opts.wait) return;

        while (run.status !== 'done') {
          await sleep(opts.poll);
          run = (await client.get(RunResponse, `/api/runs/${encodeURIComponent(run.id)}`)).run;
        }
        printRun(ctx, run);
        if (run.result !== 'completed' && run.result !== 'no_action') process.exitCode = 1;
      } catch (err) {
        ctx.fail(err);
      }
    });

  runs
    .command('list')
    .description('List runs, newest first')
    .action(async () => {
      try {
        const { count, runs: all } = await ctx.client().get(RunListResponse, '/api/runs');
        if (count === 0) {
          ctx.out.log('No runs');
          return;
        }
        for (const run of all) ctx.out.log(formatRun(run)[0] ?? run.id);
      } catch (err) {
        ctx.fail(err);
      }
    });

  runs
    .command('show <id>')
    .description('Show a run and its entity outcomes')
    .action(async (id: string) => {
      try {
        const { run } = await ctx.client().get(RunResponse, `/api/runs/${encodeURIComponent(id)}`);
        printRun(ctx, run);
      } catch (err) {
        ctx.fail(err);
      }
    });

  runs
    .command('cancel <id>')
    .description('Cancel a run that has not started executing')
    .action(async (id: string) => {
      try {
        const { cancelled } = await ctx.client().post(CancelResponse, `/api/runs/${encodeURIComponent(id)}/cancel`);
        ctx.out.log(cancelled ? `Cancelled ${id}` : `${id} is already executing or done`);
        if (!cancelled) process.exitCode = 1;
      } catch (err) {
        ctx.fail(err);
      }
    });
}

function printRun(ctx: CliContext, run: RunView): void {
  for (const line of formatRun(run)) ctx.out.log(line);
}
