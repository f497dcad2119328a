/**
 * Local-time calendar helpers. Every window boundary in the engine is derived
 * here so that "today", "this hour" and "this billing week" agree.
 */

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_HOURS = 168;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

export interface TimeWindow {
  start: Date;
  end: Date;
}

/** YYYY-MM-DD in local time. */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** YYYY-MM-DD HH:MM in local time. */
export function formatDateTime(d: Date): string {
  const h = String(d.getHours()).padStart(2, '0');
  const min = String(d.getMinutes()).padStart(2, '0');
  return `${formatDate(d)} ${h}:${min}`;
}

/** Parse YYYY-MM-DD as local midnight. Throws on anything else. */
export function parseLocalDate(value: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) throw new RangeError(`Not a YYYY-MM-DD date: ${value}`);

  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  if (formatDate(date) !== value) throw new RangeError(`Not a calendar date: ${value}`);
  return date;
}

export function isLocalDate(value: string): boolean {
  try {
    parseLocalDate(value);
    return true;
  } catch {
    return false;
  }
}

export function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

export function startOfHour(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate(), d.getHours());
}

/** Calendar-day arithmetic (keeps wall-clock time across DST changes). */
export function addDays(d: Date, days: number): Date {
  const next = new Date(d.getTime());
  next.setDate(next.getDate() + days);
  return next;
}

/** `day` at local midnight plus `hours`; hours past 23 roll into following days. */
export function atHour(day: Date, hours: number): Date {
  const d = startOfDay(day);
  d.setHours(hours, 0, 0, 0);
  return d;
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / HOUR_MS;
}

/**
 * Start of the week containing `now`: the latest (anchor weekday + resetHour)
 * at or before `now`. On the anchor weekday before the reset hour, that is
 * the previous week's boundary.
 */
export function weekStartFor(now: Date, anchorDate: string, resetHour: number): Date {
  const anchor = parseLocalDate(anchorDate);
  const today = startOfDay(now);
  const back = (today.getDay() - anchor.getDay() + 7) % 7;
  const anchorDay = addDays(today, -back);

  const candidate = atHour(anchorDay, resetHour);
  if (candidate.getTime() <= now.getTime()) return candidate;
  return atHour(addDays(anchorDay, -7), resetHour);
}

export function weekWindowFor(now: Date, anchorDate: string, resetHour: number): TimeWindow {
  const start = weekStartFor(now, anchorDate, resetHour);
  const end = atHour(addDays(anchorDayOf(start, resetHour), 7), resetHour);
  return { start, end };
}

/** The anchor-weekday midnight a boundary was computed from. */
function anchorDayOf(boundary: Date, resetHour: number): Date {
  return addDays(startOfDay(boundary), -Math.floor(resetHour / 24));
}

export function fractionElapsed(window: TimeWindow, now: Date): number {
  const total = window.end.getTime() - window.start.getTime();
  if (total <= 0) return 1;
  const elapsed = now.getTime() - window.start.getTime();
  return Math.min(Math.max(elapsed / total, 0), 1);
}

/** "1pm", "12am" */
export function formatHour12(hour: number): string {
  const h = hour % 12 === 0 ? 12 : hour % 12;
  return `${h}${hour < 12 ? 'am' : 'pm'}`;
}

/**
 * Short countdown for a reset instant: "resets in 3.5h" inside a day,
 * otherwise weekday and hour ("Sat 12pm").
 */
export function formatResetLabel(at: Date, now: Date): string {
  const hours = hoursBetween(now, at);
  if (hours <= 0) return 'reset';
  if (hours < 24) return `resets in ${hours.toFixed(1)}h`;
  return `${WEEKDAYS[at.getDay()]} ${formatHour12(at.getHours())}`;
}
