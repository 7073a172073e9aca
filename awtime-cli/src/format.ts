import dayjs from 'dayjs';

/**
 * Format seconds as a short human duration: "2h 5m", "12m", "40s", "0m"
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return '0m';
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m`;
  return `${Math.floor(seconds)}s`;
}

export function formatPercent(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

/**
 * Format time as HH:mm (local)
 */
export function formatClock(date: Date): string {
  return dayjs(date).format('HH:mm');
}

/**
 * Format date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return dayjs(date).format('YYYY-MM-DD');
}

/**
 * Format date as "Monday, March 2, 2026"
 */
export function formatLongDate(date: Date): string {
  return dayjs(date).format('dddd, MMMM D, YYYY');
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Horizontal bar scaled against `max`
 */
export function bar(value: number, max: number, width = 20): string {
  if (max <= 0 || value <= 0) return '';
  return '█'.repeat(Math.max(1, Math.round((value / max) * width)));
}
