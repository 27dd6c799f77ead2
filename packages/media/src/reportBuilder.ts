/**
 * Report Builder
 *
 * Turns raw ffprobe metadata into a DiagnosticReport.
 *
 * Pure and single-pass: the first video and the first audio stream are
 * compared on container-reported timestamps only. Absent start times and
 * durations count as 0, so a stream that simply omits the field can be
 * reported as in sync (or out of sync) when it is not. Duration differences
 * in particular do NOT prove a sync problem; treat the verdict as triage.
 */

import { ProbeExecutionError } from '@syncprobe/core';
import type { FFProbeFormat, FFProbeResult, FFProbeStream } from './probes/ffprobeSchema.js';
import {
  CODEC_EXCEPTION,
  SYNC_STATUS,
  UNKNOWN,
  type AudioSummary,
  type DiagnosticReport,
  type FailedAnalysisReport,
  type SkewMeasurement,
  type SyncPolicy,
  type SyncVerdict,
  type VideoSummary,
} from './types.js';

export const START_TIME_TOLERANCE_SECONDS = 0.1;
export const DURATION_TOLERANCE_MS = 100;

export interface ReportOptions {
  syncPolicy?: SyncPolicy;
}

interface SkewCheck extends SyncVerdict {
  readonly skew: number;
}

/**
 * Build the diagnostic report for one probe result
 */
export function buildReport(raw: FFProbeResult, options: ReportOptions = {}): DiagnosticReport {
  const syncPolicy = options.syncPolicy ?? 'start_time';

  const videoStream = raw.streams.find(s => s.codec_type === 'video');
  const audioStream = raw.streams.find(s => s.codec_type === 'audio');

  let verdict: SyncVerdict;
  let skew: SkewMeasurement | undefined;
  let secondarySync: SyncVerdict | undefined;

  if (!videoStream) {
    verdict = {
      status: SYNC_STATUS.MISSING_VIDEO,
      message: 'The container has no video track.',
    };
  } else if (!audioStream) {
    verdict = {
      status: SYNC_STATUS.MISSING_AUDIO,
      message: 'The container has no audio track.',
    };
  } else {
    const startTime = checkStartTimeSync(videoStream, audioStream);
    const duration = checkDurationSync(videoStream, audioStream);

    const [primary, secondary] = syncPolicy === 'duration'
      ? [duration, startTime]
      : [startTime, duration];

    verdict = { status: primary.status, message: primary.message };
    secondarySync = { status: secondary.status, message: secondary.message };
    skew = {
      startTimeSeconds: startTime.skew,
      durationMs: duration.skew,
    };
  }

  return {
    syncStatus: verdict.status,
    syncMessage: verdict.message,
    syncPolicy,
    ...(skew ? { skew } : {}),
    ...(secondarySync ? { secondarySync } : {}),
    ...describeContainer(raw.format),
    ...(videoStream ? { video: describeVideo(videoStream) } : {}),
    ...(audioStream ? { audio: describeAudio(audioStream) } : {}),
    codecException: videoStream && audioStream
      ? CODEC_EXCEPTION.OK
      : CODEC_EXCEPTION.MISSING_STREAM,
  };
}

/**
 * Report for a probe that never produced metadata.
 * Tool stderr is carried in `details`; other errors contribute only their message.
 */
export function buildFailureReport(error: unknown): FailedAnalysisReport {
  return {
    syncStatus: SYNC_STATUS.ANALYSIS_FAILED,
    syncMessage: error instanceof Error ? error.message : String(error),
    details: error instanceof ProbeExecutionError ? error.stderr : '',
  };
}

/**
 * Compare stream start offsets (seconds).
 * The verdict is taken on the skew as reported, rounded to 3 decimals.
 */
export function checkStartTimeSync(video: FFProbeStream, audio: FFProbeStream): SkewCheck {
  const skew = round(Math.abs(toFloat(video.start_time) - toFloat(audio.start_time)), 3);
  const shown = skew.toFixed(3);

  if (skew >= START_TIME_TOLERANCE_SECONDS) {
    return {
      status: SYNC_STATUS.START_TIME_MISMATCH,
      message: `Video and audio start times differ by ${shown}s. Check whether the audio track is delayed.`,
      skew,
    };
  }

  return {
    status: SYNC_STATUS.OK,
    message: `Video and audio start times differ by ${shown}s, within the ${START_TIME_TOLERANCE_SECONDS}s tolerance.`,
    skew,
  };
}

/**
 * Compare stream durations (milliseconds, rounded to 2 decimals)
 */
export function checkDurationSync(video: FFProbeStream, audio: FFProbeStream): SkewCheck {
  const skew = round(Math.abs(toFloat(video.duration) - toFloat(audio.duration)) * 1000, 2);
  const shown = skew.toFixed(2);

  if (skew >= DURATION_TOLERANCE_MS) {
    return {
      status: SYNC_STATUS.NOTICEABLE_DIFFERENCE,
      message: `Video and audio durations differ by ${shown}ms. The tracks may drift apart during playback.`,
      skew,
    };
  }

  return {
    status: SYNC_STATUS.GOOD_SYNC,
    message: `Video and audio durations differ by ${shown}ms, within the ${DURATION_TOLERANCE_MS}ms tolerance.`,
    skew,
  };
}

function describeContainer(format: FFProbeFormat) {
  return {
    filename: format.filename ?? UNKNOWN,
    duration: toFloat(format.duration),
    sizeBytes: toInt(format.size) ?? 0,
    formatName: format.format_name ?? UNKNOWN,
    bitRate: toInt(format.bit_rate) ?? 0,
  };
}

function describeVideo(stream: FFProbeStream): VideoSummary {
  return {
    codec: stream.codec_name ?? UNKNOWN,
    ...(stream.width !== undefined ? { width: stream.width } : {}),
    ...(stream.height !== undefined ? { height: stream.height } : {}),
    avgFrameRate: stream.avg_frame_rate ?? UNKNOWN,
    codecTag: stream.codec_tag_string ?? UNKNOWN,
  };
}

function describeAudio(stream: FFProbeStream): AudioSummary {
  const sampleRate = toInt(stream.sample_rate);

  return {
    codec: stream.codec_name ?? UNKNOWN,
    ...(sampleRate !== undefined ? { sampleRate } : {}),
    ...(stream.channels !== undefined ? { channels: stream.channels } : {}),
    channelLayout: stream.channel_layout ?? UNKNOWN,
  };
}

// ffprobe prints "N/A" for values it cannot determine
function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toFloat(value: string | number | undefined): number {
  return toNumber(value) ?? 0;
}

function toInt(value: string | number | undefined): number | undefined {
  const parsed = toNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

function round(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}
