/**
 * Media Analyzer
 *
 * Runs one probe and interprets it. A probe the tool itself rejected
 * becomes a failure report; every other error propagates to the caller.
 */

import { ProbeExecutionError } from '@syncprobe/core';
import type { MediaProbe } from './probes/ffprobe.js';
import { buildFailureReport, buildReport, type ReportOptions } from './reportBuilder.js';
import type { DiagnosticReport, FailedAnalysisReport } from './types.js';

export type AnalysisResult =
  | { ok: true; report: DiagnosticReport }
  | { ok: false; error: ProbeExecutionError; report: FailedAnalysisReport };

export class MediaAnalyzer {
  private readonly probe: MediaProbe;
  private readonly options: ReportOptions;

  constructor(probe: MediaProbe, options: ReportOptions = {}) {
    this.probe = probe;
    this.options = options;
  }

  async analyze(filePath: string): Promise<AnalysisResult> {
    try {
      const raw = await this.probe.probe(filePath);
      return { ok: true, report: buildReport(raw, this.options) };
    } catch (err) {
      if (err instanceof ProbeExecutionError) {
        return { ok: false, error: err, report: buildFailureReport(err) };
      }
      throw err;
    }
  }
}
