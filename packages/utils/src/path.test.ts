import { describe, expect, it } from 'vitest';
import { getExtension, hasAllowedExtension, sanitizeFilename, uniqueFilename } from './path.js';

describe('sanitizeFilename', () => {
  it('keeps ordinary names untouched', () => {
    expect(sanitizeFilename('clip.mp4')).toBe('clip.mp4');
  });

  it('drops directory components the client sent', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\Users\\me\\clip.mov')).toBe('clip.mov');
  });

  it('replaces whitespace and reserved characters', () => {
    expect(sanitizeFilename('my holiday?.mkv')).toBe('my_holiday_.mkv');
  });

  it('strips leading dots', () => {
    expect(sanitizeFilename('.hidden.mp4')).toBe('hidden.mp4');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(sanitizeFilename('...')).toBe('');
  });
});

describe('getExtension', () => {
  it('lowercases and strips the dot', () => {
    expect(getExtension('CLIP.MP4')).toBe('mp4');
  });

  it('returns an empty string without an extension', () => {
    expect(getExtension('clip')).toBe('');
  });
});

describe('hasAllowedExtension', () => {
  const allowed = ['mp4', 'mov', 'avi', 'mkv'];

  it('accepts listed extensions regardless of case', () => {
    expect(hasAllowedExtension('clip.MOV', allowed)).toBe(true);
  });

  it('rejects unlisted or missing extensions', () => {
    expect(hasAllowedExtension('clip.webm', allowed)).toBe(false);
    expect(hasAllowedExtension('mp4', allowed)).toBe(false);
  });
});

describe('uniqueFilename', () => {
  it('prefixes the sanitized name with a uuid', () => {
    expect(uniqueFilename('my clip.mp4')).toMatch(/^[0-9a-f-]{36}_my_clip\.mp4$/);
  });

  it('falls back to a bare uuid', () => {
    expect(uniqueFilename('..')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('never repeats', () => {
    expect(uniqueFilename('a.mp4')).not.toBe(uniqueFilename('a.mp4'));
  });
});
