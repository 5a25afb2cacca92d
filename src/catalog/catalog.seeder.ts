import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { Booking, BookingSeat, Hall, Movie, PaymentStatus, Seat, Show, Theater } from '../entities';
import { BookingsService } from '../bookings/bookings.service';
import { ShowsService } from '../shows/shows.service';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { CatalogCountsDto, CatalogVerificationDto, TableCheckDto } from '../dto/catalog.dto';
import { addDays, addMinutesToTime, normalizeTimeOfDay, toIsoDate } from '../common/utils/time.util';
import catalogFixture from './fixtures/catalog.json';

interface FixtureTheater {
  key: string;
  name: string;
  location: string;
  city: string;
  state: string;
  postalCode: string;
  contactNumber: string | null;
}

interface FixtureHall {
  key: string;
  theater: string;
  name: string;
  seatingCapacity: number;
  screenType: string;
}

interface FixtureMovie {
  key: string;
  title: string;
  language: string;
  format: string;
  rating: string | null;
  durationMinutes: number;
  genre: string | null;
  releaseDate: string | null;
}

interface FixtureSeat {
  hall: string;
  rowLabel: string;
  seatNumber: number;
  seatType: string;
}

interface FixtureShow {
  key: string;
  movie: string;
  hall: string;
  /** Days after the base date. */
  dayOffset: number;
  startTime: string;
  basePrice: number;
}

interface FixtureBooking {
  show: string;
  customerName: string;
  customerEmail: string;
  customerPhone: string;
  paymentStatus: string;
  seats: { rowLabel: string; seatNumber: number; price: number }[];
}

export interface CatalogFixture {
  theaters: FixtureTheater[];
  halls: FixtureHall[];
  movies: FixtureMovie[];
  seats: FixtureSeat[];
  shows: FixtureShow[];
  bookings: FixtureBooking[];
}

interface TableMinimum {
  table: string;
  expectedMinimum: number;
  count: (counts: CatalogCountsDto) => number;
}

/** Minimum row counts a seeded catalog must reach. */
export const EXPECTED_MINIMUMS: readonly TableMinimum[] = [
  { table: 'Theater', expectedMinimum: 2, count: (counts) => counts.theaters },
  { table: 'Movie', expectedMinimum: 6, count: (counts) => counts.movies },
  { table: 'Hall', expectedMinimum: 5, count: (counts) => counts.halls },
  { table: 'Seat', expectedMinimum: 9, count: (counts) => counts.seats },
  { table: 'Booking', expectedMinimum: 3, count: (counts) => counts.bookings },
];

/** Below this many shows the catalog is usable but reported with a warning. */
export const EXPECTED_SHOWS = 20;

const PAYMENT_STATUSES: readonly string[] = Object.values(PaymentStatus);

function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.includes(value);
}

function lookup<T>(index: Map<string, T>, key: string, kind: string): T {
  const value = index.get(key);
  if (value === undefined) {
    throw new Error(`Catalog fixture references unknown ${kind} "${key}"`);
  }
  return value;
}

function seatKey(hallId: number, rowLabel: string, seatNumber: number): string {
  return `${hallId}:${rowLabel}:${seatNumber}`;
}

/**
 * Loads, checks and removes the sample catalog: two theaters, their halls, a week of
 * shows relative to a base date and a few bookings.
 */
@Injectable()
export class CatalogSeeder {
  private readonly logger = new Logger(CatalogSeeder.name);
  private readonly fixture: CatalogFixture = catalogFixture;

  constructor(
    private readonly dataSource: DataSource,
    private readonly bookingsService: BookingsService,
    private readonly showsService: ShowsService,
    private readonly lockService: ReservationLockService,
  ) {}

  /**
   * Inserts the reference data in one transaction, then books through the regular
   * booking path. Refuses to run on a database that already holds theaters.
   */
  async setup(baseDate: string = toIsoDate()): Promise<CatalogCountsDto> {
    const existing = await this.dataSource.getRepository(Theater).count();
    if (existing > 0) {
      throw new ConflictException(`Catalog already holds ${existing} theaters; run teardown first`);
    }

    this.logger.log(`Seeding catalog with base date ${baseDate}`);

    const { showIds, seatIds } = await this.lockService.withDatabaseLock('catalog', () =>
      this.dataSource.transaction((manager) => this.insertReferenceData(manager, baseDate)),
    );

    for (const fixtureBooking of this.fixture.bookings) {
      const showId = lookup(showIds, fixtureBooking.show, 'show');
      const show = await this.showsService.findShowOrFail(showId);

      if (!isPaymentStatus(fixtureBooking.paymentStatus)) {
        throw new Error(`Catalog fixture has unknown payment status "${fixtureBooking.paymentStatus}"`);
      }

      await this.bookingsService.createBooking({
        showId,
        customerName: fixtureBooking.customerName,
        customerEmail: fixtureBooking.customerEmail,
        customerPhone: fixtureBooking.customerPhone,
        paymentStatus: fixtureBooking.paymentStatus,
        seats: fixtureBooking.seats.map((seat) => ({
          seatId: lookup(seatIds, seatKey(show.hallId, seat.rowLabel, seat.seatNumber), 'seat'),
          price: seat.price,
        })),
      });
    }

    const counts = await this.counts();
    this.logger.log(`Catalog seeded: ${JSON.stringify(counts)}`);
    return counts;
  }

  /** Checks row counts against the expected minimums and scans for over-booked shows. */
  async verify(): Promise<CatalogVerificationDto> {
    const counts = await this.counts();

    const tables = EXPECTED_MINIMUMS.map(({ table, expectedMinimum, count: countOf }): TableCheckDto => {
      const count = countOf(counts);
      return { table, count, expectedMinimum, status: count >= expectedMinimum ? 'OK' : 'FAIL' };
    });
    tables.push({
      table: 'Show',
      count: counts.shows,
      expectedMinimum: EXPECTED_SHOWS,
      status: counts.shows >= EXPECTED_SHOWS ? 'OK' : 'WARN',
    });

    const availabilityDefects = await this.showsService.findOverbookedShows();

    for (const check of tables) {
      const line = `${check.table}: ${check.count} rows (expected >= ${check.expectedMinimum}) [${check.status}]`;
      if (check.status === 'OK') {
        this.logger.log(line);
      } else {
        this.logger.warn(line);
      }
    }
    for (const defect of availabilityDefects) {
      this.logger.error(`Show ${defect.showId} is over-booked: ${defect.availableSeats} seats available`);
    }

    const passed = tables.every((check) => check.status !== 'FAIL') && availabilityDefects.length === 0;
    this.logger.log(passed ? 'Verification passed.' : 'Verification failed.');

    return { passed, tables, availabilityDefects };
  }

  /** Removes every row of the catalog. Returns the counts as they were before. */
  async teardown(): Promise<CatalogCountsDto> {
    const before = await this.counts();

    await this.lockService.withDatabaseLock('catalog', () =>
      this.dataSource.transaction(async (manager) => {
        // Theaters cascade to halls, seats, shows and bookings; movies to the remaining shows.
        await manager.createQueryBuilder().delete().from(Theater).execute();
        await manager.createQueryBuilder().delete().from(Movie).execute();
      }),
    );

    this.logger.warn(`Catalog removed: ${JSON.stringify(before)}`);
    return before;
  }

  async counts(): Promise<CatalogCountsDto> {
    const manager = this.dataSource.manager;
    const [theaters, halls, movies, seats, shows, bookings, bookingSeats] = await Promise.all([
      manager.count(Theater),
      manager.count(Hall),
      manager.count(Movie),
      manager.count(Seat),
      manager.count(Show),
      manager.count(Booking),
      manager.count(BookingSeat),
    ]);
    return { theaters, halls, movies, seats, shows, bookings, bookingSeats };
  }

  private async insertReferenceData(
    manager: EntityManager,
    baseDate: string,
  ): Promise<{ showIds: Map<string, number>; seatIds: Map<string, number> }> {
    const theaterIds = new Map<string, number>();
    for (const fixtureTheater of this.fixture.theaters) {
      const theater = await manager.save(
        manager.create(Theater, {
          name: fixtureTheater.name,
          location: fixtureTheater.location,
          city: fixtureTheater.city,
          state: fixtureTheater.state,
          postalCode: fixtureTheater.postalCode,
          contactNumber: fixtureTheater.contactNumber,
        }),
      );
      theaterIds.set(fixtureTheater.key, theater.id);
    }

    const hallIds = new Map<string, number>();
    for (const fixtureHall of this.fixture.halls) {
      const hall = await manager.save(
        manager.create(Hall, {
          theaterId: lookup(theaterIds, fixtureHall.theater, 'theater'),
          name: fixtureHall.name,
          seatingCapacity: fixtureHall.seatingCapacity,
          screenType: fixtureHall.screenType,
        }),
      );
      hallIds.set(fixtureHall.key, hall.id);
    }

    const movies = new Map<string, Movie>();
    for (const fixtureMovie of this.fixture.movies) {
      const movie = await manager.save(
        manager.create(Movie, {
          title: fixtureMovie.title,
          language: fixtureMovie.language,
          format: fixtureMovie.format,
          rating: fixtureMovie.rating,
          durationMinutes: fixtureMovie.durationMinutes,
          genre: fixtureMovie.genre,
          releaseDate: fixtureMovie.releaseDate,
        }),
      );
      movies.set(fixtureMovie.key, movie);
    }

    const seatIds = new Map<string, number>();
    for (const fixtureSeat of this.fixture.seats) {
      const hallId = lookup(hallIds, fixtureSeat.hall, 'hall');
      const seat = await manager.save(
        manager.create(Seat, {
          hallId,
          rowLabel: fixtureSeat.rowLabel,
          seatNumber: fixtureSeat.seatNumber,
          seatType: fixtureSeat.seatType,
        }),
      );
      seatIds.set(seatKey(hallId, seat.rowLabel, seat.seatNumber), seat.id);
    }

    const showIds = new Map<string, number>();
    for (const fixtureShow of this.fixture.shows) {
      const movie = lookup(movies, fixtureShow.movie, 'movie');
      const startTime = normalizeTimeOfDay(fixtureShow.startTime);
      const show = await manager.save(
        manager.create(Show, {
          movieId: movie.id,
          hallId: lookup(hallIds, fixtureShow.hall, 'hall'),
          showDate: addDays(baseDate, fixtureShow.dayOffset),
          startTime,
          endTime: addMinutesToTime(startTime, movie.durationMinutes),
          basePrice: fixtureShow.basePrice,
        }),
      );
      showIds.set(fixtureShow.key, show.id);
    }

    this.logger.log(
      `Reference data inserted: ${theaterIds.size} theaters, ${hallIds.size} halls, ${movies.size} movies, ` +
        `${seatIds.size} seats, ${showIds.size} shows`,
    );
    return { showIds, seatIds };
  }
}
