#!/usr/bin/env tsx
/**
 * mendgraph CLI entry point.
 */

import { createProgram } from './program.js';

createProgram().parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
