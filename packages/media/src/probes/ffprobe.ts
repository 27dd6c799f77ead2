/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Reads container and stream metadata in JSON format; nothing is decoded.
 */

import { executeCommand, type CommandResult, type CommandRunner } from '@syncprobe/utils';
import { ProbeExecutionError, ProbeOutputError } from '@syncprobe/core';
import { ffprobeResultSchema, type FFProbeResult } from './ffprobeSchema.js';

export interface MediaProbe {
  probe(filePath: string): Promise<FFProbeResult>;
  version(): Promise<string>;
}

export interface FFProbeOptions {
  /** Upper bound for a single probe, in milliseconds */
  timeout?: number;
  /** Upper bound for the `-version` query, in milliseconds */
  versionTimeout?: number;
  /** Largest JSON document accepted on stdout, in bytes */
  maxOutputSize?: number;
  runner?: CommandRunner;
}

export class FFProbe implements MediaProbe {
  private readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly versionTimeout: number;
  private readonly maxOutputSize: number;
  private readonly runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.timeout = options.timeout ?? 60000;
    this.versionTimeout = options.versionTimeout ?? 5000;
    this.maxOutputSize = options.maxOutputSize ?? 10 * 1024 * 1024;
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Probe a media file and return its format and stream metadata
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    // -v error keeps diagnostics such as "Invalid data found" on stderr
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    const result = await this.run(args, this.timeout);

    if (result.truncated) {
      throw new ProbeOutputError(
        `ffprobe output exceeded ${this.maxOutputSize} bytes and was truncated`,
        result.stdout
      );
    }

    return parseProbeOutput(result.stdout);
  }

  /**
   * First line of `ffprobe -version`
   */
  async version(): Promise<string> {
    const result = await this.run(['-version'], this.versionTimeout);
    return result.stdout.split('\n')[0]?.trim() ?? '';
  }

  private async run(args: string[], timeout: number): Promise<CommandResult> {
    let result: CommandResult;

    try {
      result = await this.runner(this.ffprobePath, args, { timeout, maxOutputSize: this.maxOutputSize });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProbeExecutionError(
        `ffprobe could not be started: ${reason}`,
        { stderr: reason },
        { cause: err }
      );
    }

    if (result.timedOut) {
      throw new ProbeExecutionError(`ffprobe timed out after ${timeout}ms`, {
        stderr: result.stderr,
        exitCode: result.exitCode,
        timedOut: true,
      });
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new ProbeExecutionError(
        stderr
          ? `ffprobe exited with code ${result.exitCode}: ${stderr}`
          : `ffprobe exited with code ${result.exitCode}`,
        { stderr, exitCode: result.exitCode }
      );
    }

    return result;
  }
}

/**
 * Parse and validate the JSON document ffprobe printed on stdout
 */
export function parseProbeOutput(stdout: string): FFProbeResult {
  let json: unknown;

  try {
    json = JSON.parse(stdout);
  } catch (err) {
    throw new ProbeOutputError(
      `Failed to parse ffprobe output: ${stdout.substring(0, 200)}`,
      stdout,
      { cause: err }
    );
  }

  const parsed = ffprobeResultSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProbeOutputError(
      `Unexpected ffprobe output${where}: ${issue?.message ?? 'invalid document'}`,
      stdout,
      { cause: parsed.error }
    );
  }

  return parsed.data;
}
