/**
 * Human-readable value formatting
 */

export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  }
  return `${m}:${s.toString().padStart(2, '0')}`;
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

export function formatBitRate(bitsPerSecond: number): string {
  return `${Math.round(bitsPerSecond / 1000)} kbps`;
}

/**
 * "30000/1001" -> "29.97 fps"; anything unparsable is shown as-is
 */
export function formatFrameRate(rate: string): string {
  const [num, den] = rate.split('/').map(Number);
  if (num === undefined || den === undefined || !Number.isFinite(num) || !Number.isFinite(den) || den === 0) {
    return rate;
  }
  return `${parseFloat((num / den).toFixed(2))} fps`;
}
