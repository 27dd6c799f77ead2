/**
 * Upload Intake
 *
 * Pulls the single video file out of a multipart request and validates it.
 * Everything here runs before the payload is written anywhere.
 */

import type { FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { ValidationError } from '@syncprobe/core';
import { hasAllowedExtension, isNonEmptyString, isObject } from '@syncprobe/utils';

export const UPLOAD_FIELD = 'video';

export interface UploadLimits {
  allowedExtensions: readonly string[];
  maxUploadBytes: number;
}

export interface ReceivedUpload {
  filename: string;
  content: Buffer;
}

export async function receiveUpload(
  request: FastifyRequest,
  limits: UploadLimits
): Promise<ReceivedUpload> {
  if (!request.isMultipart()) {
    throw new ValidationError(UPLOAD_FIELD, `request must be multipart/form-data with a '${UPLOAD_FIELD}' file`);
  }

  const file = await request.file();

  if (!file || file.fieldname !== UPLOAD_FIELD) {
    discard(file);
    throw new ValidationError(UPLOAD_FIELD, `request must include a '${UPLOAD_FIELD}' file`);
  }

  if (!isNonEmptyString(file.filename)) {
    discard(file);
    throw new ValidationError(UPLOAD_FIELD, 'filename is empty');
  }

  if (!hasAllowedExtension(file.filename, limits.allowedExtensions)) {
    discard(file);
    throw new ValidationError(
      UPLOAD_FIELD,
      `file type not supported (allowed: ${limits.allowedExtensions.join(', ')})`
    );
  }

  let content: Buffer;
  try {
    content = await file.toBuffer();
  } catch (err) {
    if (isObject(err) && err['code'] === 'FST_REQ_FILE_TOO_LARGE') {
      throw new ValidationError(UPLOAD_FIELD, `file exceeds the ${limits.maxUploadBytes} byte limit`, 413);
    }
    throw err;
  }

  return { filename: file.filename, content };
}

// Drain a part we are not going to read so the request can finish
function discard(file: MultipartFile | undefined): void {
  file?.file.resume();
}
