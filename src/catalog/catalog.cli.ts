import { ShowAvailabilityDto } from '../dto/availability.dto';
import { CatalogCountsDto, CatalogVerificationDto } from '../dto/catalog.dto';
import { isIsoDate } from '../common/utils/time.util';

export type CatalogCommand =
  | { name: 'setup'; baseDate?: string }
  | { name: 'verify' }
  | { name: 'availability'; theater: string; date?: string }
  | { name: 'teardown' };

export const CATALOG_USAGE = [
  'Usage: showtime-catalog <command>',
  '',
  'Commands:',
  '  setup [baseDate]                 Load the sample catalog (shows scheduled from baseDate, default today)',
  '  verify                           Check row counts and scan for over-booked shows',
  '  availability <theater> [date]    List shows at a theater (id or name) on a date, default today',
  '  teardown                         Remove the whole catalog',
].join('\n');

export class CommandLineError extends Error {}

function optionalDate(value: string | undefined, label: string): string | undefined {
  if (value !== undefined && !isIsoDate(value)) {
    throw new CommandLineError(`${label} must be a YYYY-MM-DD date, got "${value}"`);
  }
  return value;
}

export function parseCatalogCommand(args: string[]): CatalogCommand {
  const [name, ...rest] = args;

  switch (name) {
    case 'setup':
      return { name, baseDate: optionalDate(rest[0], 'baseDate') };
    case 'verify':
    case 'teardown':
      return { name };
    case 'availability': {
      const theater = rest[0];
      if (!theater) {
        throw new CommandLineError('availability needs a theater id or name');
      }
      return { name, theater, date: optionalDate(rest[1], 'date') };
    }
    default:
      throw new CommandLineError(name ? `Unknown command "${name}"` : 'No command given');
  }
}

const AVAILABILITY_COLUMNS: { header: string; value: (row: ShowAvailabilityDto) => string }[] = [
  { header: 'movie_title', value: (row) => row.movieTitle },
  { header: 'language', value: (row) => row.language },
  { header: 'format', value: (row) => row.format },
  { header: 'rating', value: (row) => row.rating ?? '' },
  { header: 'hall_name', value: (row) => row.hallName },
  { header: 'show_timing', value: (row) => row.startTime },
  { header: 'base_price', value: (row) => row.basePrice.toFixed(2) },
  { header: 'available_seats', value: (row) => String(row.availableSeats) },
];

/** Renders availability rows as a left-aligned text table. */
export function formatAvailabilityTable(rows: ShowAvailabilityDto[]): string[] {
  if (rows.length === 0) {
    return ['No shows found.'];
  }

  const cells = rows.map((row) => AVAILABILITY_COLUMNS.map((column) => column.value(row)));
  const widths = AVAILABILITY_COLUMNS.map((column, index) =>
    Math.max(column.header.length, ...cells.map((line) => line[index].length)),
  );
  const render = (values: string[]): string => values.map((value, index) => value.padEnd(widths[index])).join('  ').trimEnd();

  return [
    render(AVAILABILITY_COLUMNS.map((column) => column.header)),
    render(widths.map((width) => '-'.repeat(width))),
    ...cells.map(render),
    '',
    `${rows.length} show(s) found.`,
  ];
}

export function formatCounts(counts: CatalogCountsDto): string[] {
  return [
    `Theater: ${counts.theaters}`,
    `Hall: ${counts.halls}`,
    `Movie: ${counts.movies}`,
    `Seat: ${counts.seats}`,
    `Show: ${counts.shows}`,
    `Booking: ${counts.bookings}`,
    `Booking_Seat: ${counts.bookingSeats}`,
  ];
}

export function formatVerification(result: CatalogVerificationDto): string[] {
  return [
    ...result.tables.map(
      (check) => `${check.table}: ${check.count} rows (expected >= ${check.expectedMinimum}) [${check.status}]`,
    ),
    ...result.availabilityDefects.map(
      (defect) =>
        `Show ${defect.showId}: ${defect.bookedSeats} seats booked for a capacity of ${defect.seatingCapacity} [FAIL]`,
    ),
    result.passed ? 'Verification passed.' : 'Verification failed.',
  ];
}
