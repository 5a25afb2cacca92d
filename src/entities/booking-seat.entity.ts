import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index, Unique, Check } from 'typeorm';
import { Booking } from './booking.entity';
import { Seat } from './seat.entity';
import { CHECK_CONSTRAINTS, FOREIGN_KEYS, UNIQUE_CONSTRAINTS } from './constraints';
import { decimalTransformer } from './column-transformers';

/** A seat held by a booking, priced at the moment it was booked. */
@Entity('booking_seats')
@Unique(UNIQUE_CONSTRAINTS.bookingSeat.name, UNIQUE_CONSTRAINTS.bookingSeat.columns)
@Check(CHECK_CONSTRAINTS.seatPriceNonNegative, '"seatPrice" >= 0')
@Index('IDX_booking_seat_booking', ['bookingId'])
@Index('IDX_booking_seat_seat', ['seatId'])
export class BookingSeat {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  bookingId!: number;

  @Column({ type: 'integer' })
  seatId!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  seatPrice!: number;

  @ManyToOne(() => Booking, (booking) => booking.bookingSeats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'bookingId', foreignKeyConstraintName: FOREIGN_KEYS.bookingSeatBooking })
  booking!: Booking;

  @ManyToOne(() => Seat, (seat) => seat.bookingSeats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'seatId', foreignKeyConstraintName: FOREIGN_KEYS.bookingSeatSeat })
  seat!: Seat;
}
