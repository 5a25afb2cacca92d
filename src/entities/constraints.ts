/**
 * Named constraints of the catalog schema.
 *
 * PostgreSQL reports a violated constraint by name, SQLite by `table.column` list,
 * so each unique constraint records both to let errors be mapped back to one name.
 */
export interface UniqueConstraintDefinition {
  name: string;
  table: string;
  columns: string[];
}

export const UNIQUE_CONSTRAINTS = {
  hallTheaterName: { name: 'UQ_hall_theater_name', table: 'halls', columns: ['theaterId', 'name'] },
  seatHallPosition: { name: 'UQ_seat_hall_position', table: 'seats', columns: ['hallId', 'rowLabel', 'seatNumber'] },
  showHallSlot: { name: 'UQ_show_hall_slot', table: 'shows', columns: ['hallId', 'showDate', 'startTime'] },
  bookingSeat: { name: 'UQ_booking_seat', table: 'booking_seats', columns: ['bookingId', 'seatId'] },
} satisfies Record<string, UniqueConstraintDefinition>;

export const CHECK_CONSTRAINTS = {
  hallCapacityPositive: 'CHK_hall_capacity_positive',
  seatNumberPositive: 'CHK_seat_number_positive',
  showPriceNonNegative: 'CHK_show_price_non_negative',
  bookingAmountNonNegative: 'CHK_booking_amount_non_negative',
  seatPriceNonNegative: 'CHK_booking_seat_price_non_negative',
} as const;

export const FOREIGN_KEYS = {
  hallTheater: 'FK_hall_theater',
  seatHall: 'FK_seat_hall',
  showMovie: 'FK_show_movie',
  showHall: 'FK_show_hall',
  bookingShow: 'FK_booking_show',
  bookingSeatBooking: 'FK_booking_seat_booking',
  bookingSeatSeat: 'FK_booking_seat_seat',
} as const;
