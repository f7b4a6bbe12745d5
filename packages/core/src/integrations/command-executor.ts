/**
 * @module integrations/command-executor
 * RemediationExecutor that runs proposal commands as child processes.
 * In dry-run mode commands are only logged and reported as successful.
 */

import type { ExecutionResult, RemediationExecutor } from '../collaborators.js';
import type { FixProposal, StructuredCommand } from '../types.js';
import { formatCommand } from '../types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CommandRunner } from './command-runner.js';
import { spawnCommand } from './command-runner.js';

export interface CommandExecutorOptions {
  /** Default: true */
  dryRun?: boolean;
  /** Default: 120000 */
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export class CommandExecutor implements RemediationExecutor {
  private readonly dryRun: boolean;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: CommandExecutorOptions = {}) {
    this.dryRun = options.dryRun ?? true;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.runner = options.runner ?? spawnCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async execute(command: StructuredCommand, proposal: FixProposal): Promise<ExecutionResult> {
    const line = formatCommand(command);
    if (command.command.length === 0) {
      return { success: false, exitCode: null, stdout: '', stderr: 'empty command', durationMs: 0, dryRun: this.dryRun };
    }

    if (this.dryRun) {
      this.logger.info(`[dry-run] ${proposal.id}: ${line}`);
      return { success: true, exitCode: 0, stdout: '', stderr: '', durationMs: 0, dryRun: true };
    }

    this.logger.info(`Executing ${proposal.id}: ${line}`);
    const output = await this.runner(command.command, { timeoutMs: this.timeoutMs });
    const success = output.exitCode === 0;
    if (!success) {
      this.logger.warn(`${proposal.id} exited with ${output.exitCode ?? 'no code'}${output.timedOut ? ' (timed out)' : ''}`);
    }
    return {
      success,
      exitCode: output.exitCode,
      stdout: output.stdout,
      stderr: output.stderr,
      durationMs: output.durationMs,
      dryRun: false,
    };
  }
}
