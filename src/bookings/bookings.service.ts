import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { Booking, BookingSeat, BookingStatus, Hall, Movie, PaymentStatus, Seat, Show } from '../entities';
import {
  BookingHistoryItemDto,
  BookingResponseDto,
  BookingSeatRequestDto,
  BookingSeatResponseDto,
  CreateBookingDto,
  CustomerBookingHistoryDto,
} from '../dto/booking.dto';
import {
  DependentRowsException,
  InsufficientAvailabilityException,
  InvalidStatusTransitionException,
  SeatsAlreadyBookedException,
} from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { countConfirmedBookingSeats, findConfirmedSeatIds } from '../shows/booked-seats.query';
import { isValidBookingTransition, isValidPaymentTransition, sumAmounts } from './booking-status.rules';

interface BookableShow {
  show: Show;
  hall: Hall;
}

function seatLabel(seat: Seat): string {
  return `${seat.rowLabel}${seat.seatNumber}`;
}

function toBookingSeatResponse(bookingSeat: BookingSeat): BookingSeatResponseDto {
  return {
    id: bookingSeat.id,
    seatId: bookingSeat.seatId,
    rowLabel: bookingSeat.seat.rowLabel,
    seatNumber: bookingSeat.seat.seatNumber,
    seatPrice: bookingSeat.seatPrice,
  };
}

/** Expects `bookingSeats` and `bookingSeats.seat` to be loaded. */
export function toBookingResponse(booking: Booking): BookingResponseDto {
  return {
    id: booking.id,
    showId: booking.showId,
    customerName: booking.customerName,
    customerEmail: booking.customerEmail,
    customerPhone: booking.customerPhone,
    bookingTime: booking.bookingTime,
    totalAmount: booking.totalAmount,
    paymentStatus: booking.paymentStatus,
    bookingStatus: booking.bookingStatus,
    seats: [...booking.bookingSeats].sort((a, b) => a.id - b.id).map(toBookingSeatResponse),
  };
}

@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);

  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    @InjectRepository(BookingSeat)
    private readonly bookingSeatRepository: Repository<BookingSeat>,
    private readonly dataSource: DataSource,
    private readonly lockService: ReservationLockService,
  ) {}

  /**
   * Books seats for a show in one transaction. Reservations for the same show are
   * serialized: the in-process show lock is held for the whole transaction and, on
   * PostgreSQL, the show row is locked with SELECT ... FOR UPDATE.
   */
  async createBooking(createBookingDto: CreateBookingDto): Promise<BookingResponseDto> {
    const seatIds = createBookingDto.seats.map((seat) => seat.seatId);
    this.logger.log(
      `Creating booking for ${createBookingDto.customerEmail} - show ${createBookingDto.showId}, seats ${seatIds.join(', ')}`,
    );

    const bookingId = await this.lockService.withShowLock(createBookingDto.showId, async () => {
      const queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      try {
        const manager = queryRunner.manager;
        const { show, hall } = await this.loadBookableShow(manager, createBookingDto.showId);
        const seats = await this.loadHallSeats(manager, hall, seatIds);

        const taken = await findConfirmedSeatIds(manager, show.id);
        const conflicts = seats.filter((seat) => taken.has(seat.id));
        if (conflicts.length > 0) {
          throw new SeatsAlreadyBookedException(show.id, conflicts.map(seatLabel));
        }

        await this.assertCapacity(manager, show, hall, seats.length);

        const prices = createBookingDto.seats.map((seat) => seat.price ?? show.basePrice);
        const booking = await manager.save(
          manager.create(Booking, {
            showId: show.id,
            customerName: createBookingDto.customerName,
            customerEmail: createBookingDto.customerEmail,
            customerPhone: createBookingDto.customerPhone,
            totalAmount: sumAmounts(prices),
            paymentStatus: createBookingDto.paymentStatus ?? PaymentStatus.PENDING,
            bookingStatus: BookingStatus.CONFIRMED,
          }),
        );

        await manager.save(
          createBookingDto.seats.map((seat, index) =>
            manager.create(BookingSeat, {
              bookingId: booking.id,
              seatId: seat.seatId,
              seatPrice: prices[index],
            }),
          ),
        );

        await queryRunner.commitTransaction();

        this.logger.log(
          `Booking ${booking.id} confirmed for show ${show.id}: ${seats.map(seatLabel).join(', ')} (total ${booking.totalAmount})`,
        );
        return booking.id;
      } catch (error) {
        await queryRunner.rollbackTransaction();
        this.logger.warn(
          `Booking for show ${createBookingDto.showId} rejected: ${error instanceof Error ? error.message : String(error)}`,
        );
        throw translateDatabaseError(error);
      } finally {
        await queryRunner.release();
      }
    });

    return this.getBooking(bookingId);
  }

  async getBooking(bookingId: number): Promise<BookingResponseDto> {
    return toBookingResponse(await this.findBookingOrFail(bookingId));
  }

  /**
   * Bookings of one customer, most recent first (ties: higher id first). The total
   * counts Confirmed bookings only. An unknown email yields an empty history.
   */
  async getCustomerHistory(customerEmail: string): Promise<CustomerBookingHistoryDto> {
    const bookings = await this.bookingRepository.find({
      where: { customerEmail },
      relations: ['show', 'show.movie', 'show.hall', 'show.hall.theater', 'bookingSeats', 'bookingSeats.seat'],
      order: { bookingTime: 'DESC', id: 'DESC' },
    });

    const items: BookingHistoryItemDto[] = bookings.map((booking) => ({
      ...toBookingResponse(booking),
      theaterName: booking.show.hall.theater.name,
      hallName: booking.show.hall.name,
      movieTitle: booking.show.movie.title,
      language: booking.show.movie.language,
      format: booking.show.movie.format,
      showDate: booking.show.showDate,
      startTime: booking.show.startTime,
    }));

    return {
      customerEmail,
      bookings: items,
      totalBookings: items.length,
      totalAmount: sumAmounts(
        bookings
          .filter((booking) => booking.bookingStatus === BookingStatus.CONFIRMED)
          .map((booking) => booking.totalAmount),
      ),
    };
  }

  /** Cancelling releases the booking's seats. Cancelling twice is a no-op. */
  async cancelBooking(bookingId: number): Promise<BookingResponseDto> {
    const booking = await this.withLockedBooking(bookingId, async (manager, current) => {
      if (current.bookingStatus === BookingStatus.CANCELLED) {
        this.logger.log(`Booking ${bookingId} is already cancelled`);
        return current;
      }

      if (!isValidBookingTransition(current.bookingStatus, BookingStatus.CANCELLED)) {
        throw new InvalidStatusTransitionException('bookingStatus', current.bookingStatus, BookingStatus.CANCELLED);
      }

      await manager.update(Booking, { id: bookingId }, { bookingStatus: BookingStatus.CANCELLED });
      current.bookingStatus = BookingStatus.CANCELLED;
      this.logger.log(`Booking ${bookingId} cancelled, ${current.bookingSeats.length} seats released`);
      return current;
    });

    return toBookingResponse(booking);
  }

  async updatePaymentStatus(bookingId: number, paymentStatus: PaymentStatus): Promise<BookingResponseDto> {
    const booking = await this.withLockedBooking(bookingId, async (manager, current) => {
      const from = current.paymentStatus;
      if (from === paymentStatus) {
        return current;
      }

      if (!isValidPaymentTransition(from, paymentStatus)) {
        throw new InvalidStatusTransitionException('paymentStatus', from, paymentStatus);
      }

      await manager.update(Booking, { id: bookingId }, { paymentStatus });
      current.paymentStatus = paymentStatus;
      this.logger.log(`Booking ${bookingId} payment: ${from} -> ${paymentStatus}`);
      return current;
    });

    return toBookingResponse(booking);
  }

  /**
   * Adds one seat to a Confirmed booking under the same lock and checks as a new
   * booking. Adding a seat the booking already holds fails on the booking-seat
   * uniqueness constraint.
   */
  async addSeat(bookingId: number, seatRequest: BookingSeatRequestDto): Promise<BookingResponseDto> {
    const added = await this.withLockedBooking(bookingId, async (manager, booking) => {
      if (booking.bookingStatus !== BookingStatus.CONFIRMED) {
        throw new BadRequestException(
          `Booking ${bookingId} is ${booking.bookingStatus}; seats can only be added to Confirmed bookings`,
        );
      }

      const { show, hall } = await this.loadBookableShow(manager, booking.showId);
      const [seat] = await this.loadHallSeats(manager, hall, [seatRequest.seatId]);

      const heldElsewhere = await findConfirmedSeatIds(manager, show.id, bookingId);
      if (heldElsewhere.has(seat.id)) {
        throw new SeatsAlreadyBookedException(show.id, [seatLabel(seat)]);
      }

      const alreadyInBooking = booking.bookingSeats.some((bookingSeat) => bookingSeat.seatId === seat.id);
      if (!alreadyInBooking) {
        await this.assertCapacity(manager, show, hall, 1);
      }

      const seatPrice = seatRequest.price ?? show.basePrice;
      await manager.insert(BookingSeat, { bookingId, seatId: seat.id, seatPrice });
      await manager.update(Booking, { id: bookingId }, { totalAmount: sumAmounts([booking.totalAmount, seatPrice]) });
      return seat;
    });

    this.logger.log(`Seat ${seatLabel(added)} added to booking ${bookingId}`);
    return this.getBooking(bookingId);
  }

  /** Removes one seat from a booking and takes its price off the total. */
  async removeSeat(bookingId: number, seatId: number): Promise<BookingResponseDto> {
    const removed = await this.withLockedBooking(bookingId, async (manager, booking) => {
      const bookingSeat = booking.bookingSeats.find((candidate) => candidate.seatId === seatId);
      if (!bookingSeat) {
        throw new NotFoundException(`Seat ${seatId} is not part of booking ${bookingId}`);
      }

      await manager.delete(BookingSeat, { id: bookingSeat.id });
      await manager.update(
        Booking,
        { id: bookingId },
        { totalAmount: sumAmounts([booking.totalAmount, -bookingSeat.seatPrice]) },
      );
      return bookingSeat;
    });

    this.logger.log(`Seat ${seatLabel(removed.seat)} removed from booking ${bookingId}`);
    return this.getBooking(bookingId);
  }

  /** With `cascade`, the booking's seats are deleted along with it. */
  async deleteBooking(bookingId: number, cascade = false): Promise<void> {
    await this.findBookingOrFail(bookingId);

    if (!cascade) {
      const bookingSeats = await this.bookingSeatRepository.count({ where: { bookingId } });
      if (bookingSeats > 0) {
        throw new DependentRowsException('Booking', bookingId, { bookingSeats });
      }
    }

    await this.bookingRepository.delete({ id: bookingId });
    this.logger.warn(`Booking ${bookingId} deleted${cascade ? ' with cascade' : ''}`);
  }

  private async findBookingOrFail(bookingId: number): Promise<Booking> {
    const booking = await this.bookingRepository.findOne({
      where: { id: bookingId },
      relations: ['bookingSeats', 'bookingSeats.seat'],
    });

    if (!booking) {
      throw new NotFoundException(`Booking ${bookingId} not found`);
    }
    return booking;
  }

  /**
   * Runs `work` on a fresh copy of the booking, inside the show lock and one
   * transaction. A booking never moves to another show, so the show id read before
   * the lock is the one to lock on.
   */
  private async withLockedBooking<T>(
    bookingId: number,
    work: (manager: EntityManager, booking: Booking) => Promise<T>,
  ): Promise<T> {
    const { showId } = await this.findBookingOrFail(bookingId);

    try {
      return await this.lockService.withShowLock(showId, () =>
        this.dataSource.transaction(async (manager) => {
          const booking = await this.loadBookingForUpdate(manager, bookingId);
          return work(manager, booking);
        }),
      );
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  /** Re-reads the booking and its seats, locking the booking row on PostgreSQL. */
  private async loadBookingForUpdate(manager: EntityManager, bookingId: number): Promise<Booking> {
    const query = manager.createQueryBuilder(Booking, 'booking').where('booking.id = :bookingId', { bookingId });
    if (this.isPostgres()) {
      query.setLock('pessimistic_write');
    }

    const booking = await query.getOne();
    if (!booking) {
      throw new NotFoundException(`Booking ${bookingId} not found`);
    }

    booking.bookingSeats = await manager.find(BookingSeat, { where: { bookingId }, relations: ['seat'] });
    return booking;
  }

  /**
   * Loads the show to book, locking its row on PostgreSQL. SQLite has no row locks;
   * there the shared-connection lock already serializes writers.
   */
  private async loadBookableShow(manager: EntityManager, showId: number): Promise<BookableShow> {
    const query = manager.createQueryBuilder(Show, 'show').where('show.id = :showId', { showId });
    if (this.isPostgres()) {
      query.setLock('pessimistic_write');
    }

    const show = await query.getOne();
    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }
    if (!show.isActive) {
      throw new BadRequestException(`Show ${showId} is not active`);
    }

    // FOR SHARE on the hall: a capacity change waits for bookings in flight.
    const hallQuery = manager.createQueryBuilder(Hall, 'hall').where('hall.id = :hallId', { hallId: show.hallId });
    if (this.isPostgres()) {
      hallQuery.setLock('pessimistic_read');
    }

    const [movie, hall] = await Promise.all([
      manager.findOne(Movie, { where: { id: show.movieId } }),
      hallQuery.getOne(),
    ]);

    if (!movie || !movie.isActive) {
      throw new BadRequestException(`Movie of show ${showId} is not active`);
    }
    if (!hall) {
      throw new NotFoundException(`Hall ${show.hallId} not found`);
    }

    return { show, hall };
  }

  /** Resolves the requested seats, in request order, rejecting any not in the hall. */
  private async loadHallSeats(manager: EntityManager, hall: Hall, seatIds: number[]): Promise<[Seat, ...Seat[]]> {
    const seats = await manager.find(Seat, { where: { id: In(seatIds), hallId: hall.id } });
    const byId = new Map(seats.map((seat) => [seat.id, seat]));

    const missing = seatIds.filter((seatId) => !byId.has(seatId));
    if (missing.length > 0) {
      throw new BadRequestException(`Seats ${missing.join(', ')} do not belong to hall ${hall.name}`);
    }

    const ordered: Seat[] = [];
    for (const seatId of seatIds) {
      const seat = byId.get(seatId);
      if (seat) {
        ordered.push(seat);
      }
    }

    const [first, ...rest] = ordered;
    if (!first) {
      throw new BadRequestException('At least one seat is required');
    }
    return [first, ...rest];
  }

  private isPostgres(): boolean {
    return this.dataSource.options.type === 'postgres';
  }

  private async assertCapacity(manager: EntityManager, show: Show, hall: Hall, requested: number): Promise<void> {
    const booked = await countConfirmedBookingSeats(manager, show.id);
    const available = hall.seatingCapacity - booked;
    if (requested > available) {
      throw new InsufficientAvailabilityException(show.id, requested, available);
    }
  }
}
