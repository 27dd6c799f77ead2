/**
 * Analyze Command
 *
 * Upload a video to the API and print its sync report.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ApiClient, ApiRequestError } from '../lib/apiClient.js';
import { loadCliConfig } from '../config/index.js';
import { formatBitRate, formatBytes, formatDuration, formatFrameRate } from '../lib/format.js';
import {
  analyzeSuccessSchema,
  probeFailureSchema,
  type DiagnosticReport,
  type ProbeFailure,
} from '../lib/schemas.js';
import {
  colorSyncStatus,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printSection,
} from '../lib/output.js';

interface AnalyzeOptions {
  json?: boolean;
  policy?: string;
}

export async function analyzeCommand(
  path: string,
  options: AnalyzeOptions
): Promise<void> {
  const client = new ApiClient(loadCliConfig());
  const spinner = ora('Uploading and analyzing...').start();

  const query = options.policy ? `?syncPolicy=${encodeURIComponent(options.policy)}` : '';

  try {
    const response = await client.upload(`/analyze${query}`, 'video', path);
    spinner.stop();

    if (options.json) {
      printJson(response.body);
      if (response.statusCode !== 200) process.exitCode = 1;
      return;
    }

    if (response.statusCode === 200) {
      printReport(path, analyzeSuccessSchema.parse(response.body).summary);
      return;
    }

    const failure = probeFailureSchema.safeParse(response.body);
    if (failure.success) {
      printProbeFailure(failure.data);
      process.exitCode = 1;
      return;
    }

    throw new ApiRequestError(response.statusCode, response.body);
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}

function printReport(path: string, report: DiagnosticReport): void {
  printHeader('Sync Report');
  printKeyValue('File', path);
  printKeyValue('Status', colorSyncStatus(report.syncStatus));
  printKeyValue('Detail', report.syncMessage);
  printKeyValue('Policy', report.syncPolicy);
  if (report.secondarySync) {
    printKeyValue('Other check', `${report.secondarySync.status} (${report.secondarySync.message})`);
  }
  console.log();

  printSection('Container', [
    report.formatName,
    `${formatDuration(report.duration)}, ${formatBytes(report.sizeBytes)}, ${formatBitRate(report.bitRate)}`,
  ]);

  if (report.video) {
    const v = report.video;
    const size = v.width !== undefined && v.height !== undefined ? ` ${v.width}x${v.height}` : '';
    printSection('Video', [`${v.codec}${size} @ ${formatFrameRate(v.avgFrameRate)} [${v.codecTag}]`]);
  }

  if (report.audio) {
    const a = report.audio;
    const channels = a.channels !== undefined ? ` ${a.channels}ch` : '';
    const rate = a.sampleRate !== undefined ? ` @ ${a.sampleRate} Hz` : '';
    printSection('Audio', [`${a.codec}${channels}${rate} (${a.channelLayout})`]);
  }

  printKeyValue('Streams', report.codecException);
}

function printProbeFailure(failure: ProbeFailure): void {
  printHeader('Sync Report');
  printKeyValue('Status', colorSyncStatus(failure.summary.syncStatus));
  printError(failure.message);
  if (failure.summary.details) {
    console.log(chalk.gray(failure.summary.details));
  }
}
