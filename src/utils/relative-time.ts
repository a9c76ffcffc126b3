const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count > 1 ? 's' : ''} ago`;
}

/**
 * Human-readable age of a timestamp for list rows, e.g. "5 mins ago".
 * Anything a week or older is shown as a UTC date ("Jan 05, 2024").
 */
export function formatRelativeTime(date: Date, now: Date = new Date()): string {
  const delta = now.getTime() - date.getTime();

  if (delta < MINUTE) {
    return 'Just now';
  }
  if (delta < HOUR) {
    return plural(Math.floor(delta / MINUTE), 'min');
  }
  if (delta < DAY) {
    return plural(Math.floor(delta / HOUR), 'hour');
  }
  if (delta < 7 * DAY) {
    return plural(Math.floor(delta / DAY), 'day');
  }

  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()}`;
}
