/**
 * CLI Configuration
 */

import { z } from 'zod';

const envSchema = z.object({
  SYNCPROBE_API_URL: z.string().url().default('http://localhost:8080'),
  SYNCPROBE_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('120000'),
});

export interface CliConfig {
  readonly apiUrl: string;
  readonly timeout: number;
}

export function loadCliConfig(source: NodeJS.ProcessEnv = process.env): CliConfig {
  const env = envSchema.parse(source);

  return Object.freeze({
    apiUrl: env.SYNCPROBE_API_URL.replace(/\/+$/, ''),
    timeout: env.SYNCPROBE_TIMEOUT_MS,
  });
}
