import { addDays, addMinutesToTime, isIsoDate, isTimeOfDay, normalizeTimeOfDay, toIsoDate } from './time.util';

describe('time utils', () => {
  describe('normalizeTimeOfDay', () => {
    it('should pad hours and add seconds', () => {
      expect(normalizeTimeOfDay('9:05')).toBe('09:05:00');
      expect(normalizeTimeOfDay('18:30')).toBe('18:30:00');
      expect(normalizeTimeOfDay('23:59:59')).toBe('23:59:59');
    });

    it('should reject values that are not a time of day', () => {
      expect(() => normalizeTimeOfDay('24:00')).toThrow('Invalid time of day: 24:00');
      expect(isTimeOfDay('12:60')).toBe(false);
      expect(isTimeOfDay('noon')).toBe(false);
    });
  });

  describe('addMinutesToTime', () => {
    it('should add a movie duration to a start time', () => {
      expect(addMinutesToTime('12:15:00', 158)).toBe('14:53:00');
      expect(addMinutesToTime('18:30', 92)).toBe('20:02:00');
    });

    it('should wrap past midnight', () => {
      expect(addMinutesToTime('23:00:00', 150)).toBe('01:30:00');
      expect(addMinutesToTime('22:00:00', 120)).toBe('00:00:00');
    });

    it('should keep the seconds of the start time', () => {
      expect(addMinutesToTime('10:00:30', 15)).toBe('10:15:30');
    });
  });

  describe('dates', () => {
    it('should accept only real calendar dates', () => {
      expect(isIsoDate('2024-02-29')).toBe(true);
      expect(isIsoDate('2023-02-29')).toBe(false);
      expect(isIsoDate('2024-13-01')).toBe(false);
      expect(isIsoDate('24-01-01')).toBe(false);
    });

    it('should format a local date', () => {
      expect(toIsoDate(new Date(2026, 0, 5, 23, 30))).toBe('2026-01-05');
    });

    it('should add days across month and year ends', () => {
      expect(addDays('2026-01-31', 1)).toBe('2026-02-01');
      expect(addDays('2026-12-30', 6)).toBe('2027-01-05');
      expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    });
  });
});
