import { spawn } from 'node:child_process';
import type { ToolUpdateConfig } from '../config.js';
import type { QueueLogger, ToolUpdateResult } from './types.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (command: string, args: string[], timeoutSec: number) => Promise<CommandResult>;

export interface ToolUpdater {
  /** Runs the update command; calls made while one is in flight share its result. */
  run: () => Promise<ToolUpdateResult>;
}

export const runCommand: CommandRunner = (command, args, timeoutSec) =>
  new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeoutSec * 1_000);

    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error: Error) => {
      clearTimeout(timeoutHandle);
      resolve({ exitCode: 1, stdout: '', stderr: error.message, timedOut: false });
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timeoutHandle);
      resolve({ exitCode: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim(), timedOut });
    });
  });

export function createToolUpdater(
  config: ToolUpdateConfig,
  logger: QueueLogger,
  runner: CommandRunner = runCommand,
): ToolUpdater {
  let inFlight: Promise<ToolUpdateResult> | undefined;

  const execute = async (): Promise<ToolUpdateResult> => {
    logger.info({ command: config.command, args: config.args }, 'tool update started');
    const result = await runner(config.command, config.args, config.timeoutSec);

    if (result.timedOut) {
      logger.warn({ timeoutSec: config.timeoutSec }, 'tool update timed out');
      return { ok: false, error: 'update timed out' };
    }
    if (result.exitCode !== 0) {
      const error = result.stderr || result.stdout || `update command exited with code ${result.exitCode}`;
      logger.warn({ exitCode: result.exitCode, error }, 'tool update failed');
      return { ok: false, error };
    }

    logger.info({}, 'tool update succeeded');
    return { ok: true, output: result.stdout };
  };

  return {
    run: () => {
      inFlight ??= execute().finally(() => {
        inFlight = undefined;
      });
      return inFlight;
    },
  };
}
