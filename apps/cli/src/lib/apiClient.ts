/**
 * HTTP Client for API Communication
 *
 * Thin wrapper around undici for talking to the API server.
 */

import { request, FormData } from 'undici';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import type { CliConfig } from '../config/index.js';

export interface ApiResponse {
  statusCode: number;
  body: unknown;
}

export const apiErrorSchema = z.object({
  statusCode: z.number(),
  error: z.string(),
  message: z.string(),
});

export class ApiRequestError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, body: unknown) {
    const parsed = apiErrorSchema.safeParse(body);
    super(parsed.success ? parsed.data.message : `Request failed with status ${statusCode}`);
    this.name = 'ApiRequestError';
    this.statusCode = statusCode;
  }
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(config: CliConfig) {
    this.baseUrl = config.apiUrl;
    this.timeout = config.timeout;
  }

  async get(path: string): Promise<ApiResponse> {
    const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
      method: 'GET',
      headersTimeout: this.timeout,
      bodyTimeout: this.timeout,
    });

    return { statusCode, body: await body.json() };
  }

  /**
   * POST a local file as a single multipart field
   */
  async upload(path: string, field: string, filePath: string): Promise<ApiResponse> {
    const content = await readFile(filePath);
    const form = new FormData();
    form.append(field, new Blob([content]), basename(filePath));

    const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
      method: 'POST',
      body: form,
      headersTimeout: this.timeout,
      bodyTimeout: this.timeout,
    });

    return { statusCode, body: await body.json() };
  }
}
