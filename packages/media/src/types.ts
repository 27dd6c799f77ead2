/**
 * Report Types
 *
 * Shapes returned to callers after a probe has been interpreted.
 */

export const SYNC_STATUS = {
  OK: 'OK: sync present',
  START_TIME_MISMATCH: 'warning: start-time mismatch',
  GOOD_SYNC: 'good sync',
  NOTICEABLE_DIFFERENCE: 'noticeable difference',
  MISSING_VIDEO: 'warning: missing video stream',
  MISSING_AUDIO: 'warning: missing audio stream',
  ANALYSIS_FAILED: 'analysis failed',
} as const;

export type SyncStatus = (typeof SYNC_STATUS)[keyof typeof SYNC_STATUS];

/**
 * Which skew metric decides `syncStatus`.
 * - start_time: |video.start_time - audio.start_time|, tolerance 0.1 s
 * - duration:   |video.duration - audio.duration| in ms, tolerance 100 ms
 */
export type SyncPolicy = 'start_time' | 'duration';

export const SYNC_POLICIES = ['start_time', 'duration'] as const satisfies readonly SyncPolicy[];

export const CODEC_EXCEPTION = {
  OK: 'OK',
  MISSING_STREAM: 'warning: missing required stream',
} as const;

export type CodecException = (typeof CODEC_EXCEPTION)[keyof typeof CODEC_EXCEPTION];

export const UNKNOWN = 'unknown';

export interface SyncVerdict {
  readonly status: SyncStatus;
  readonly message: string;
}

export interface SkewMeasurement {
  /** Absolute start-time difference, seconds, 3 decimals */
  readonly startTimeSeconds: number;
  /** Absolute duration difference, milliseconds, 2 decimals */
  readonly durationMs: number;
}

export interface VideoSummary {
  readonly codec: string;
  readonly width?: number;
  readonly height?: number;
  readonly avgFrameRate: string;
  readonly codecTag: string;
}

export interface AudioSummary {
  readonly codec: string;
  readonly sampleRate?: number;
  readonly channels?: number;
  readonly channelLayout: string;
}

export interface DiagnosticReport {
  readonly syncStatus: SyncStatus;
  readonly syncMessage: string;
  readonly syncPolicy: SyncPolicy;
  /** Present only when both a video and an audio stream exist */
  readonly skew?: SkewMeasurement;
  /** Verdict of the policy that did not decide `syncStatus` */
  readonly secondarySync?: SyncVerdict;

  readonly filename: string;
  readonly duration: number;
  readonly sizeBytes: number;
  readonly formatName: string;
  readonly bitRate: number;

  readonly video?: VideoSummary;
  readonly audio?: AudioSummary;

  readonly codecException: CodecException;
}

export interface FailedAnalysisReport {
  readonly syncStatus: typeof SYNC_STATUS.ANALYSIS_FAILED;
  readonly syncMessage: string;
  readonly details: string;
}

export type AnalysisReport = DiagnosticReport | FailedAnalysisReport;
