import {
  formatTimeOfDay,
  nextOccurrence,
  nextOccurrenceInZone,
  parseDurationSeconds,
  parseTimeOfDay,
  startOfDay,
} from '../time';

describe('time helpers', () => {
  describe('parseTimeOfDay', () => {
    it('should parse HH:MM', () => {
      expect(parseTimeOfDay('09:05')).toEqual({ hour: 9, minute: 5 });
      expect(parseTimeOfDay('23:59')).toEqual({ hour: 23, minute: 59 });
    });

    it.each(['9:00', '24:00', '12:60', 'noon', ''])('should reject %p', (value) => {
      expect(() => parseTimeOfDay(value)).toThrow(RangeError);
    });
  });

  it('should format a time of day with padding', () => {
    expect(formatTimeOfDay({ hour: 7, minute: 3 })).toBe('07:03');
  });

  it('should return local midnight for startOfDay', () => {
    expect(startOfDay(new Date(2026, 9, 19, 17, 45, 12))).toEqual(new Date(2026, 9, 19));
  });

  describe('nextOccurrence', () => {
    it('should return today when the time is still ahead', () => {
      const now = new Date(2026, 9, 19, 8, 30);
      expect(nextOccurrence({ hour: 9, minute: 0 }, now)).toEqual(new Date(2026, 9, 19, 9, 0));
    });

    it('should roll over to tomorrow when the time has passed or is now', () => {
      expect(nextOccurrence({ hour: 9, minute: 0 }, new Date(2026, 9, 19, 9, 0))).toEqual(new Date(2026, 9, 20, 9, 0));
      expect(nextOccurrence({ hour: 9, minute: 0 }, new Date(2026, 9, 19, 21, 0))).toEqual(new Date(2026, 9, 20, 9, 0));
    });
  });

  describe('nextOccurrenceInZone', () => {
    it('should compute the next run against the zone wall clock', () => {
      const now = new Date('2026-10-19T08:30:15.500Z');
      expect(nextOccurrenceInZone({ hour: 9, minute: 0 }, now, 'UTC')).toEqual(new Date('2026-10-19T09:00:00.000Z'));
    });

    it('should roll over to the next day in the zone', () => {
      const now = new Date('2026-10-19T10:00:00.000Z');
      expect(nextOccurrenceInZone({ hour: 9, minute: 0 }, now, 'UTC')).toEqual(new Date('2026-10-20T09:00:00.000Z'));
    });
  });

  describe('parseDurationSeconds', () => {
    it('should understand s, m, h and d suffixes', () => {
      expect(parseDurationSeconds('90')).toBe(90);
      expect(parseDurationSeconds('45s')).toBe(45);
      expect(parseDurationSeconds('30m')).toBe(1800);
      expect(parseDurationSeconds('12h')).toBe(43200);
      expect(parseDurationSeconds('7d')).toBe(604800);
    });

    it('should reject anything else', () => {
      expect(() => parseDurationSeconds('twelve hours')).toThrow(RangeError);
    });
  });
});
