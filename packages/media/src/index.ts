/**
 * @syncprobe/media
 *
 * Media probing and sync triage.
 *
 * Responsibilities:
 * - Probe files with ffprobe (container and stream metadata only)
 * - Validate the probe output against a typed schema
 * - Classify audio/video sync from start-time or duration skew
 * - Build the diagnostic report returned to API callers
 *
 * IMPORTANT: this reads container timestamps, it never decodes frames.
 * A clean verdict does NOT guarantee the file plays in sync!
 */

// Probing
export {
  FFProbe,
  parseProbeOutput,
  type MediaProbe,
  type FFProbeOptions,
} from './probes/ffprobe.js';
export {
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
  type FFProbeFormat,
} from './probes/ffprobeSchema.js';

// Report building
export {
  buildReport,
  buildFailureReport,
  checkStartTimeSync,
  checkDurationSync,
  START_TIME_TOLERANCE_SECONDS,
  DURATION_TOLERANCE_MS,
  type ReportOptions,
} from './reportBuilder.js';

// Combined analyzer
export { MediaAnalyzer, type AnalysisResult } from './analyzer.js';

// Types
export {
  SYNC_STATUS,
  SYNC_POLICIES,
  CODEC_EXCEPTION,
  UNKNOWN,
  type SyncStatus,
  type SyncPolicy,
  type CodecException,
  type SyncVerdict,
  type SkewMeasurement,
  type VideoSummary,
  type AudioSummary,
  type DiagnosticReport,
  type FailedAnalysisReport,
  type AnalysisReport,
} from './types.js';
