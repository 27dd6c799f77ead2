/**
 * API Configuration
 *
 * Loaded from environment variables once at startup, validated with zod,
 * frozen and handed to `createServer`. Nothing reads process.env after that.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SYNC_POLICIES } from '@syncprobe/media';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from monorepo root into process.env
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

const positiveInt = z.string().transform(Number).pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.string().transform(Number).pipe(z.number().int().min(0).max(65535)).default('8080'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().transform(v => v === 'true').default('true'),

  // Security
  CORS_ORIGINS: z.string().default('http://localhost:3000'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: positiveInt.default('60000'),
  RATE_LIMIT_MAX_REQUESTS: positiveInt.default('30'),

  // Paths (relative to monorepo root)
  TEMP_PATH: z.string().default(join(tmpdir(), 'syncprobe')),

  // Probe
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  PROBE_TIMEOUT_MS: positiveInt.default('60000'),
  SYNC_POLICY: z.enum(SYNC_POLICIES).default('start_time'),

  // Uploads
  ALLOWED_EXTENSIONS: z.string()
    .transform(v => splitList(v).map(ext => ext.toLowerCase().replace(/^\./, '')))
    .pipe(z.array(z.string()).min(1, 'at least one extension is required'))
    .default('mp4,mov,avi,mkv'),
  MAX_UPLOAD_BYTES: positiveInt.default(String(100 * 1024 * 1024)),

  // Features
  ENABLE_SWAGGER: z.string().transform(v => v !== 'false').default('true'),
});

export interface ApiConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly host: string;
  readonly port: number;
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  readonly trustProxy: boolean;
  readonly corsOrigins: readonly string[];
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;
  readonly tempPath: string;
  readonly ffprobePath: string;
  readonly probeTimeoutMs: number;
  readonly syncPolicy: z.infer<typeof envSchema>['SYNC_POLICY'];
  readonly allowedExtensions: readonly string[];
  readonly maxUploadBytes: number;
  readonly enableSwagger: boolean;
}

/**
 * Build the configuration from an environment.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const env = envSchema.parse(source);

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,
    trustProxy: env.TRUST_PROXY,

    corsOrigins: Object.freeze(splitList(env.CORS_ORIGINS)),

    rateLimitMax: env.RATE_LIMIT_MAX_REQUESTS,
    rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,

    tempPath: resolvePath(env.TEMP_PATH),

    ffprobePath: env.FFPROBE_PATH,
    probeTimeoutMs: env.PROBE_TIMEOUT_MS,
    syncPolicy: env.SYNC_POLICY,

    allowedExtensions: Object.freeze(env.ALLOWED_EXTENSIONS),
    maxUploadBytes: env.MAX_UPLOAD_BYTES,

    enableSwagger: env.ENABLE_SWAGGER,
  });
}
