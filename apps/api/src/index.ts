/**
 * API Server Entry Point
 *
 * Fastify server with:
 * - Multipart upload of a single video file
 * - ffprobe-based sync triage
 * - Rate limiting
 * - OpenAPI documentation
 */

import { ZodError } from 'zod';
import { ensureDir } from '@syncprobe/utils';
import { createServer } from './server.js';
import { loadConfig, loadEnvFile, type ApiConfig } from './config/index.js';
import { createApiLogger } from './lib/logger.js';

function readConfig(): ApiConfig {
  loadEnvFile();

  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      console.error('Invalid environment configuration:');
      console.error(err.format());
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createApiLogger(config);

  try {
    await ensureDir(config.tempPath);
    const server = await createServer(config);

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      logger.info({ signal }, 'Received shutdown signal');

      try {
        await server.close();
        logger.info('Server closed gracefully');
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    };

    for (const signal of signals) {
      process.once(signal, () => {
        void shutdown(signal);
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      tempPath: config.tempPath,
      syncPolicy: config.syncPolicy,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
