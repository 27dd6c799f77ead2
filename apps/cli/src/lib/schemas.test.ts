import { describe, expect, it } from 'vitest';
import { analyzeSuccessSchema, pingSchema, probeFailureSchema } from './schemas.js';
import { ApiRequestError } from './apiClient.js';
import { loadCliConfig } from '../config/index.js';

describe('response schemas', () => {
  it('accepts a complete analysis response', () => {
    const parsed = analyzeSuccessSchema.parse({
      status: 'analysis complete',
      summary: {
        syncStatus: 'OK: sync present',
        syncMessage: 'ok',
        syncPolicy: 'start_time',
        filename: '/tmp/a.mp4',
        duration: 10,
        sizeBytes: 2048,
        formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
        bitRate: 1600,
        audio: { codec: 'aac', channelLayout: 'stereo' },
        codecException: 'warning: missing required stream',
      },
    });

    expect(parsed.summary.video).toBeUndefined();
    expect(parsed.summary.audio?.codec).toBe('aac');
  });

  it('tells a probe failure apart from a success', () => {
    const body = {
      status: 'ProbeExecutionError',
      message: 'ffprobe exited with code 1: Invalid data found when processing input',
      summary: { syncStatus: 'analysis failed', syncMessage: 'x', details: 'Invalid data' },
    };

    expect(analyzeSuccessSchema.safeParse(body).success).toBe(false);
    expect(probeFailureSchema.parse(body).summary.details).toBe('Invalid data');
  });

  it('parses a degraded ping', () => {
    const ping = pingSchema.parse({
      status: 'degraded',
      message: 'ffprobe was not found or failed to run',
      ffprobe: { available: false },
    });
    expect(ping.ffprobe.version).toBeUndefined();
  });
});

describe('ApiRequestError', () => {
  it('uses the message from an API error body', () => {
    const err = new ApiRequestError(400, { statusCode: 400, error: 'ValidationError', message: 'bad upload' });
    expect(err.message).toBe('bad upload');
    expect(err.statusCode).toBe(400);
  });

  it('falls back to the status code', () => {
    expect(new ApiRequestError(502, 'gateway').message).toBe('Request failed with status 502');
  });
});

describe('loadCliConfig', () => {
  it('applies defaults', () => {
    expect(loadCliConfig({})).toEqual({ apiUrl: 'http://localhost:8080', timeout: 120000 });
  });

  it('strips trailing slashes from the API URL', () => {
    const config = loadCliConfig({ SYNCPROBE_API_URL: 'http://probe.local:9000/', SYNCPROBE_TIMEOUT_MS: '5000' });
    expect(config).toEqual({ apiUrl: 'http://probe.local:9000', timeout: 5000 });
  });
});
