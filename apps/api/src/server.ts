/**
 * Fastify Server Factory
 *
 * Creates and configures the Fastify instance with all plugins.
 * Configuration and the probe are passed in; the factory reads no globals.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { FFProbe, type MediaProbe } from '@syncprobe/media';

import type { ApiConfig } from './config/index.js';
import { apiLoggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { analyzeRoutes, healthRoutes } from './routes/index.js';

export interface ServerDependencies {
  probe?: MediaProbe;
}

const SERVICE_VERSION = '1.0.0';

export async function createServer(
  config: ApiConfig,
  deps: ServerDependencies = {}
): Promise<FastifyInstance> {
  const probe = deps.probe ?? new FFProbe(config.ffprobePath, { timeout: config.probeTimeoutMs });

  const server = Fastify({
    logger: apiLoggerOptions(config),
    trustProxy: config.trustProxy,
    // Uploads can be large and the probe itself may take up to its timeout
    requestTimeout: config.probeTimeoutMs + 60000,
  });

  // ============================================
  // Security plugins
  // ============================================

  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        scriptSrc: ["'self'"],
      },
    },
  });

  await server.register(cors, {
    origin: [...config.corsOrigins],
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // ============================================
  // Rate limiting
  // ============================================

  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });

  // ============================================
  // Uploads
  // ============================================

  await server.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
      fields: 10,
    },
  });

  // ============================================
  // API Documentation
  // ============================================

  if (config.enableSwagger) {
    await server.register(swagger, {
      openapi: {
        info: {
          title: 'syncprobe API',
          description: 'Container-level audio/video sync triage for uploaded media',
          version: SERVICE_VERSION,
        },
        servers: [
          { url: `http://localhost:${config.port}`, description: 'Development' },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // ============================================
  // Error handling
  // ============================================

  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================

  // Root route - API info
  server.get('/', async () => ({
    name: 'syncprobe-api',
    version: SERVICE_VERSION,
    status: 'running',
    endpoints: {
      ping: 'GET /ping',
      analyze: 'POST /analyze',
    },
    ...(config.enableSwagger ? { docs: '/docs' } : {}),
  }));

  await server.register(healthRoutes, { probe });
  await server.register(analyzeRoutes, { config, probe });

  return server;
}
