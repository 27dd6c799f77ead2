/**
 * Path Utilities
 */

import { extname } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Sanitize a client-supplied filename so it is a single safe path segment.
 * Returns an empty string when nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  // Keep only the last segment of any path the client sent
  const lastSegment = filename.split(/[/\\]/).pop() ?? '';

  return lastSegment
    // Remove null bytes and control characters
    .replace(/[\x00-\x1f\x7f-\x9f]/g, '')
    // Replace Windows reserved characters and whitespace
    .replace(/[<>:"|?*]/g, '_')
    .replace(/\s+/g, '_')
    // Trim dots and underscores at both ends
    .replace(/^[._]+|[._]+$/g, '')
    .substring(0, 200);
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Check a filename against an extension allow-list (case-insensitive)
 */
export function hasAllowedExtension(filename: string, allowed: readonly string[]): boolean {
  const ext = getExtension(filename);
  return ext.length > 0 && allowed.some(candidate => candidate.toLowerCase() === ext);
}

/**
 * Unique, collision-free name for a per-request temp file
 */
export function uniqueFilename(filename: string): string {
  const safe = sanitizeFilename(filename);
  return safe ? `${randomUUID()}_${safe}` : randomUUID();
}
