import { CommandLineError, formatAvailabilityTable, formatVerification, parseCatalogCommand } from './catalog.cli';

describe('catalog command line', () => {
  describe('parseCatalogCommand', () => {
    it('should parse every command', () => {
      expect(parseCatalogCommand(['setup'])).toEqual({ name: 'setup', baseDate: undefined });
      expect(parseCatalogCommand(['setup', '2026-10-18'])).toEqual({ name: 'setup', baseDate: '2026-10-18' });
      expect(parseCatalogCommand(['verify'])).toEqual({ name: 'verify' });
      expect(parseCatalogCommand(['teardown'])).toEqual({ name: 'teardown' });
      expect(parseCatalogCommand(['availability', 'PVR: Nexus', '2026-10-19'])).toEqual({
        name: 'availability',
        theater: 'PVR: Nexus',
        date: '2026-10-19',
      });
    });

    it('should reject bad input', () => {
      expect(() => parseCatalogCommand([])).toThrow(CommandLineError);
      expect(() => parseCatalogCommand(['migrate'])).toThrow('Unknown command "migrate"');
      expect(() => parseCatalogCommand(['availability'])).toThrow('availability needs a theater id or name');
      expect(() => parseCatalogCommand(['setup', '2026-02-30'])).toThrow(
        'baseDate must be a YYYY-MM-DD date, got "2026-02-30"',
      );
    });
  });

  describe('formatAvailabilityTable', () => {
    it('should align columns and count the shows', () => {
      const lines = formatAvailabilityTable([
        {
          showId: 1,
          movieTitle: 'Dasara',
          language: 'Telugu',
          format: '2D',
          rating: 'UA',
          hallName: 'Audi 11',
          startTime: '12:15:00',
          basePrice: 250,
          availableSeats: 148,
        },
      ]);

      expect(lines).toEqual([
        'movie_title  language  format  rating  hall_name  show_timing  base_price  available_seats',
        '-----------  --------  ------  ------  ---------  -----------  ----------  ---------------',
        'Dasara       Telugu    2D      UA      Audi 11    12:15:00     250.00      148',
        '',
        '1 show(s) found.',
      ]);
    });

    it('should say so when there are no shows', () => {
      expect(formatAvailabilityTable([])).toEqual(['No shows found.']);
    });
  });

  it('should summarize a verification', () => {
    expect(
      formatVerification({
        passed: false,
        tables: [{ table: 'Theater', count: 1, expectedMinimum: 2, status: 'FAIL' }],
        availabilityDefects: [{ showId: 4, seatingCapacity: 1, bookedSeats: 2, availableSeats: -1 }],
      }),
    ).toEqual([
      'Theater: 1 rows (expected >= 2) [FAIL]',
      'Show 4: 2 seats booked for a capacity of 1 [FAIL]',
      'Verification failed.',
    ]);
  });
});
