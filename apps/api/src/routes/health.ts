/**
 * Health Routes
 *
 * Liveness plus a check that the probe tool can actually be run.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { MediaProbe } from '@syncprobe/media';

export interface HealthRouteOptions {
  probe: MediaProbe;
}

interface PingResponse {
  status: 'ok' | 'degraded';
  message: string;
  ffprobe: {
    available: boolean;
    version?: string;
  };
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, opts) => {
  const { probe } = opts;

  fastify.get('/ping', {
    schema: {
      description: 'Liveness check that also runs `ffprobe -version`',
      tags: ['Health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            message: { type: 'string' },
            ffprobe: {
              type: 'object',
              properties: {
                available: { type: 'boolean' },
                version: { type: 'string' },
              },
            },
          },
        },
      },
    },
  }, async (request, reply) => {
    try {
      const version = await probe.version();
      const body: PingResponse = {
        status: 'ok',
        message: 'Server is running (pong)',
        ffprobe: { available: true, version },
      };
      return reply.send(body);
    } catch (err) {
      request.log.warn({ err }, 'ffprobe availability check failed');
      const body: PingResponse = {
        status: 'degraded',
        message: 'ffprobe was not found or failed to run',
        ffprobe: { available: false },
      };
      return reply.status(503).send(body);
    }
  });
};
