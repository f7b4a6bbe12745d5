/**
 * @module commands/graph
 * `mendgraph graph ingest|search|traverse|stats` - Query the knowledge graph.
 */

import fs from 'node:fs/promises';
import type { Command } from 'commander';
import { z } from 'zod';
import type { CliContext } from '../context.js';
import { BOLD, GRAY, RESET } from '../format.js';
import { NodesResponse, TraverseResponse } from '../schemas.js';

const IngestResponse = z.object({ ingested: z.number(), nodesAdded: z.number(), edgesAdded: z.number() });
const StatsResponse = z.object({
  stats: z.object({ nodes: z.number(), edges: z.number(), findings: z.number(), nodesByType: z.record(z.number()) }),
});

export function registerGraph(program: Command, ctx: CliContext): void {
  const graph = program.command('graph').description('Query the knowledge graph');

  graph
    .command('ingest <file>')
    .description('Ingest findings from a JSON file (an array or { findings })')
    .action(async (file: string) => {
      try {
        const parsed: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
        const findings = Array.isArray(parsed) ? parsed : z.object({ findings: z.array(z.unknown()) }).parse(parsed).findings;
        const result = await ctx.client().post(IngestResponse, '/api/findings', { findings });
        ctx.out.log(`Ingested ${result.ingested} finding(s): +${result.nodesAdded} nodes, +${result.edgesAdded} edges`);
      } catch (err) {
        ctx.fail(err);
      }
    });

  graph
    .command('search <query>')
    .description('Nodes whose id, label or attributes contain the query')
    .option('-t, --type <type>', 'cause | fix | tool | entity | category')
    .action(async (query: string, opts: { type?: string }) => {
      try {
        const { count, nodes } = await ctx.client().get(NodesResponse, '/api/graph/nodes', { q: query, type: opts.type });
        if (count === 0) {
          ctx.out.log('No matching nodes');
          return;
        }
        for (const node of nodes) ctx.out.log(`${BOLD}${node.id}${RESET}  ${GRAY}${node.type}${RESET}  ${node.label}`);
      } catch (err) {
        ctx.fail(err);
      }
    });

  graph
    .command('traverse <start>')
    .description('Breadth-first walk from a node')
    .option('-d, --depth <n>', 'maximum depth', '2')
    .option('-r, --relations <list>', 'comma separated relations to follow')
    .option('--direction <dir>', 'out | in | both', 'out')
    .action(async (start: string, opts: { depth: string; relations?: string; direction: string }) => {
      try {
        const result = await ctx.client().get(TraverseResponse, '/api/graph/traverse', {
          start,
          depth: opts.depth,
          relations: opts.relations,
          direction: opts.direction,
        });
        ctx.out.log(result.path.join(' → '));
        for (const node of result.nodes) ctx.out.log(`  ${node.id}  ${GRAY}${node.type}${RESET}`);
      } catch (err) {
        ctx.fail(err);
      }
    });

  graph
    .command('stats')
    .description('Node, edge and finding counts')
    .action(async () => {
      try {
        const { stats } = await ctx.client().get(StatsResponse, '/api/graph/stats');
        ctx.out.log(`${stats.nodes} nodes, ${stats.edges} edges, ${stats.findings} findings`);
        for (const [type, n] of Object.entries(stats.nodesByType)) ctx.out.log(`  ${type}: ${n}`);
      } catch (err) {
        ctx.fail(err);
      }
    });
}
