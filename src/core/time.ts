export const SCHEDULE_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = SCHEDULE_TIME_PATTERN.exec(value.trim());
  if (!match) throw new RangeError(`Invalid time of day '${value}', expected HH:MM`);
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function formatTimeOfDay({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

// Next local occurrence of the time strictly after `now`.
export function nextOccurrence(time: TimeOfDay, now: Date): Date {
  const candidate = new Date(now.getFullYear(), now.getMonth(), now.getDate(), time.hour, time.minute, 0, 0);
  if (candidate.getTime() <= now.getTime()) candidate.setDate(candidate.getDate() + 1);
  return candidate;
}

function zonedClock(date: Date, timeZone: string): { hour: number; minute: number; second: number } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? 0);
  return { hour: pick('hour'), minute: pick('minute'), second: pick('second') };
}

// Same as nextOccurrence, with the wall clock read in an IANA zone.
// Assumes the zone's offset does not change before the next occurrence.
export function nextOccurrenceInZone(time: TimeOfDay, now: Date, timeZone: string): Date {
  const clock = zonedClock(now, timeZone);
  const elapsed = clock.hour * 3600 + clock.minute * 60 + clock.second;
  let delta = time.hour * 3600 + time.minute * 60 - elapsed;
  if (delta <= 0) delta += 24 * 3600;
  return new Date(now.getTime() - now.getMilliseconds() + delta * 1000);
}

export const DURATION_PATTERN = /^(\d+)\s*([smhd]?)$/;

const DURATION_UNITS: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };

// "90" | "90s" | "30m" | "12h" | "7d" -> seconds
export function parseDurationSeconds(value: string): number {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) throw new RangeError(`Invalid duration '${value}', expected e.g. 30m, 12h or 3600`);
  return Number(match[1]) * DURATION_UNITS[match[2]];
}
