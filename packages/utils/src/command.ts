/**
 * Command Execution Wrapper
 *
 * Runs an external binary without a shell and captures its output:
 * - Timeout handling (SIGTERM, then SIGKILL after a grace period)
 * - Separate stdout / stderr capture with a size cap
 */

import { spawn } from 'node:child_process';

const KILL_GRACE_PERIOD_MS = 5000;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  /** Set when either stream went past maxOutputSize and the rest was dropped */
  truncated: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes, per stream
}

/**
 * Anything that can run a command the way {@link executeCommand} does.
 * Probes take one of these so tests can swap the process out.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 *
 * Resolves once the process has exited, whatever its exit code.
 * Rejects only when the process could not be spawned (e.g. ENOENT).
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let truncated = false;

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_PERIOD_MS);
    }, timeout);

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize + data.length <= maxOutputSize) {
        stdoutChunks.push(data);
        stdoutSize += data.length;
      } else {
        truncated = true;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize + data.length <= maxOutputSize) {
        stderrChunks.push(data);
        stderrSize += data.length;
      } else {
        truncated = true;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        duration: Date.now() - startTime,
        timedOut,
        truncated,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
};
