/**
 * Analyze Routes
 *
 * Upload a video, probe it and return the sync triage report.
 */

import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import { join } from 'node:path';
import { z } from 'zod';
import { InternalError } from '@syncprobe/core';
import { MediaAnalyzer, SYNC_POLICIES, type MediaProbe } from '@syncprobe/media';
import { removeFile, uniqueFilename, writeExclusive } from '@syncprobe/utils';
import type { ApiConfig } from '../config/index.js';
import { receiveUpload, UPLOAD_FIELD } from '../lib/upload.js';

export interface AnalyzeRouteOptions {
  config: ApiConfig;
  probe: MediaProbe;
}

const analyzeQuerySchema = z.object({
  syncPolicy: z.enum(SYNC_POLICIES).optional(),
});

export const analyzeRoutes: FastifyPluginAsync<AnalyzeRouteOptions> = async (fastify, opts) => {
  const { config, probe } = opts;

  const analyzers = {
    start_time: new MediaAnalyzer(probe, { syncPolicy: 'start_time' }),
    duration: new MediaAnalyzer(probe, { syncPolicy: 'duration' }),
  } as const;

  fastify.post('/analyze', {
    schema: {
      description: `Upload a video in the multipart field '${UPLOAD_FIELD}' and get a sync triage report`,
      tags: ['Analysis'],
      consumes: ['multipart/form-data'],
      querystring: {
        type: 'object',
        properties: {
          syncPolicy: { type: 'string', description: `One of: ${SYNC_POLICIES.join(', ')}` },
        },
      },
    },
  }, async (request, reply) => {
    const query = analyzeQuerySchema.parse(request.query);
    const analyzer = analyzers[query.syncPolicy ?? config.syncPolicy];

    const upload = await receiveUpload(request, config);
    const tempFile = join(config.tempPath, uniqueFilename(upload.filename));

    try {
      try {
        await writeExclusive(tempFile, upload.content);
      } catch (err) {
        throw new InternalError('Could not store the upload', err);
      }
      request.log.info({ tempFile, bytes: upload.content.length }, 'Upload saved');

      const result = await analyzer.analyze(tempFile);

      if (!result.ok) {
        request.log.warn({ err: result.error, tempFile }, 'ffprobe rejected the upload');
        return reply.status(result.error.statusCode).send({
          status: 'ProbeExecutionError',
          message: result.error.message,
          summary: result.report,
        });
      }

      return reply.send({
        status: 'analysis complete',
        summary: result.report,
      });
    } finally {
      await removeTempFile(tempFile, request.log);
    }
  });
};

async function removeTempFile(
  tempFile: string,
  log: FastifyBaseLogger
): Promise<void> {
  try {
    await removeFile(tempFile);
    log.info({ tempFile }, 'Temp file removed');
  } catch (err) {
    log.error({ err, tempFile }, 'Failed to remove temp file');
  }
}
