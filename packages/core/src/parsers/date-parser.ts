/**
 * Due dates as typed on the command line, resolved to yyyy-MM-dd.
 *
 *   2024-01-10      that date, if it exists
 *   today/tomorrow  relative to now
 *   +3d / +2w       days or weeks from today
 *   fri / friday    the next such weekday, never today
 */

import { formatDate } from '../task/task-helpers.js';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const OFFSET_RE = /^\+(\d{1,3})(d|w)$/;
const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

/** True for a yyyy-MM-dd string naming a real calendar date (rejects 2026-02-30) */
export function isIsoDate(input: string): boolean {
  const m = DATE_RE.exec(input);
  if (!m) return false;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(year, month - 1, day);
  return d.getFullYear() === year && d.getMonth() === month - 1 && d.getDate() === day;
}

/** "fri" or "friday" to 5; anything else to -1 */
function weekdayOf(word: string): number {
  if (word.length < 3) return -1;
  return WEEKDAYS.findIndex(name => name === word || name.slice(0, 3) === word);
}

function daysFrom(today: Date, days: number): string {
  return formatDate(new Date(today.getFullYear(), today.getMonth(), today.getDate() + days));
}

/**
 * Resolve a due date, or null when the text is not one of the forms above.
 *
 * @param now - Override "today" for testing
 */
export function parseDate(input: string | null | undefined, now: Date = new Date()): string | null {
  const text = input?.trim().toLowerCase();
  if (!text) return null;

  if (isIsoDate(text)) return text;
  if (text === 'today') return daysFrom(now, 0);
  if (text === 'tomorrow') return daysFrom(now, 1);

  const offset = OFFSET_RE.exec(text);
  if (offset) {
    const n = Number(offset[1]);
    return daysFrom(now, offset[2] === 'w' ? n * 7 : n);
  }

  const target = weekdayOf(text);
  if (target === -1) return null;
  const ahead = (target - now.getDay() + 7) % 7 || 7;
  return daysFrom(now, ahead);
}
