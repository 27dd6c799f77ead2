/**
 * Response shapes the CLI reads from the API
 */

import { z } from 'zod';

const syncVerdictSchema = z.object({
  status: z.string(),
  message: z.string(),
});

export const diagnosticReportSchema = z.object({
  syncStatus: z.string(),
  syncMessage: z.string(),
  syncPolicy: z.string(),
  skew: z.object({
    startTimeSeconds: z.number(),
    durationMs: z.number(),
  }).optional(),
  secondarySync: syncVerdictSchema.optional(),
  filename: z.string(),
  duration: z.number(),
  sizeBytes: z.number(),
  formatName: z.string(),
  bitRate: z.number(),
  video: z.object({
    codec: z.string(),
    width: z.number().optional(),
    height: z.number().optional(),
    avgFrameRate: z.string(),
    codecTag: z.string(),
  }).optional(),
  audio: z.object({
    codec: z.string(),
    sampleRate: z.number().optional(),
    channels: z.number().optional(),
    channelLayout: z.string(),
  }).optional(),
  codecException: z.string(),
});

export type DiagnosticReport = z.infer<typeof diagnosticReportSchema>;

export const analyzeSuccessSchema = z.object({
  status: z.literal('analysis complete'),
  summary: diagnosticReportSchema,
});

export const probeFailureSchema = z.object({
  status: z.literal('ProbeExecutionError'),
  message: z.string(),
  summary: z.object({
    syncStatus: z.string(),
    syncMessage: z.string(),
    details: z.string(),
  }),
});

export type ProbeFailure = z.infer<typeof probeFailureSchema>;

export const pingSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  message: z.string(),
  ffprobe: z.object({
    available: z.boolean(),
    version: z.string().optional(),
  }),
});
