/**
 * FFProbe Output Schema
 *
 * Typed view of `ffprobe -print_format json -show_format -show_streams`.
 * ffprobe prints most numbers as strings ("10.000000"), so numeric
 * fields accept either form and are converted by the report builder.
 * Every field is optional: an absent field must stay distinguishable
 * from one that is present and zero.
 */

import { z } from 'zod';

const numeric = z.union([z.string(), z.number()]);

export const ffprobeStreamSchema = z.object({
  index: z.number().optional(),
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  start_time: numeric.optional(),
  duration: numeric.optional(),
  // Video specific
  width: z.number().optional(),
  height: z.number().optional(),
  avg_frame_rate: z.string().optional(),
  codec_tag_string: z.string().optional(),
  // Audio specific
  sample_rate: numeric.optional(),
  channels: z.number().optional(),
  channel_layout: z.string().optional(),
}).passthrough();

export const ffprobeFormatSchema = z.object({
  filename: z.string().optional(),
  format_name: z.string().optional(),
  duration: numeric.optional(),
  size: numeric.optional(),
  bit_rate: numeric.optional(),
}).passthrough();

export const ffprobeResultSchema = z.object({
  format: ffprobeFormatSchema.default({}),
  streams: z.array(ffprobeStreamSchema).default([]),
}).passthrough();

export type FFProbeStream = z.infer<typeof ffprobeStreamSchema>;
export type FFProbeFormat = z.infer<typeof ffprobeFormatSchema>;
export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;
