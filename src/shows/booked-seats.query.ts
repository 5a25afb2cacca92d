import { EntityManager, ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { Booking, BookingSeat, BookingStatus } from '../entities';

/**
 * Booking-seat rows that count against a show's availability: those whose booking is
 * Confirmed. Rows are counted, not distinct seats, so a seat held twice counts twice.
 */
export async function countConfirmedBookingSeats(manager: EntityManager, showId: number): Promise<number> {
  return manager
    .createQueryBuilder(BookingSeat, 'bookingSeat')
    .innerJoin('bookingSeat.booking', 'booking')
    .where('booking.showId = :showId', { showId })
    .andWhere('booking.bookingStatus = :confirmed', { confirmed: BookingStatus.CONFIRMED })
    .getCount();
}

/** Ids of seats held by Confirmed bookings of the show, optionally ignoring one booking. */
export async function findConfirmedSeatIds(
  manager: EntityManager,
  showId: number,
  excludeBookingId?: number,
): Promise<Set<number>> {
  const query = manager
    .createQueryBuilder(BookingSeat, 'bookingSeat')
    .innerJoin('bookingSeat.booking', 'booking')
    .select('bookingSeat.seatId', 'seatId')
    .where('booking.showId = :showId', { showId })
    .andWhere('booking.bookingStatus = :confirmed', { confirmed: BookingStatus.CONFIRMED });

  if (excludeBookingId !== undefined) {
    query.andWhere('booking.id != :excludeBookingId', { excludeBookingId });
  }

  const rows = await query.getRawMany<{ seatId: number | string }>();
  return new Set(rows.map((row) => Number(row.seatId)));
}

/** Per-show count of booking seats under Confirmed bookings, used as a LEFT JOIN source. */
export function confirmedSeatCounts(subQuery: SelectQueryBuilder<ObjectLiteral>): SelectQueryBuilder<ObjectLiteral> {
  return subQuery
    .select('booking.showId', 'show_id')
    .addSelect('COUNT(bookingSeat.id)', 'booked_count')
    .from(Booking, 'booking')
    .innerJoin(BookingSeat, 'bookingSeat', 'bookingSeat.bookingId = booking.id')
    .where('booking.bookingStatus = :confirmed', { confirmed: BookingStatus.CONFIRMED })
    .groupBy('booking.showId');
}
