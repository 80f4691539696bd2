/**
 * Human-readable rendering of elapsed time for CLI summaries.
 * The largest unit is days, the smallest milliseconds.
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNITS: ReadonlyArray<{ size: number; singular: string; plural: string }> = [
  { size: DAY, singular: 'day', plural: 'days' },
  { size: HOUR, singular: 'hour', plural: 'hours' },
  { size: MINUTE, singular: 'minute', plural: 'minutes' },
  { size: SECOND, singular: 'second', plural: 'seconds' },
];

export function formatDuration(durationMs: number): string {
  for (const unit of UNITS) {
    if (durationMs === unit.size) {
      return `1 ${unit.singular}`;
    }
    if (durationMs > unit.size) {
      return `${(durationMs / unit.size).toFixed(2)} ${unit.plural}`;
    }
  }
  if (durationMs === 1) {
    return '1 millisecond';
  }
  return `${Math.round(durationMs)} milliseconds`;
}
