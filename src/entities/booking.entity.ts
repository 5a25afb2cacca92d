import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  CreateDateColumn,
  UpdateDateColumn,
  JoinColumn,
  Index,
  Check,
} from 'typeorm';
import { Show } from './show.entity';
import { BookingSeat } from './booking-seat.entity';
import { CHECK_CONSTRAINTS, FOREIGN_KEYS } from './constraints';
import { decimalTransformer } from './column-transformers';

export enum BookingStatus {
  CONFIRMED = 'Confirmed',
  CANCELLED = 'Cancelled',
}

export enum PaymentStatus {
  PENDING = 'Pending',
  COMPLETED = 'Completed',
  FAILED = 'Failed',
  REFUNDED = 'Refunded',
}

@Entity('bookings')
@Check(CHECK_CONSTRAINTS.bookingAmountNonNegative, '"totalAmount" >= 0')
@Index('IDX_booking_show', ['showId'])
@Index('IDX_booking_customer_email', ['customerEmail'])
@Index('IDX_booking_time', ['bookingTime'])
export class Booking {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  showId!: number;

  @Column({ type: 'varchar', length: 150 })
  customerName!: string;

  @Column({ type: 'varchar', length: 255 })
  customerEmail!: string;

  @Column({ type: 'varchar', length: 30 })
  customerPhone!: string;

  @CreateDateColumn()
  bookingTime!: Date;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  totalAmount!: number;

  @Column({ type: 'simple-enum', enum: PaymentStatus, default: PaymentStatus.PENDING })
  paymentStatus!: PaymentStatus;

  @Column({ type: 'simple-enum', enum: BookingStatus, default: BookingStatus.CONFIRMED })
  bookingStatus!: BookingStatus;

  @ManyToOne(() => Show, (show) => show.bookings, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'showId', foreignKeyConstraintName: FOREIGN_KEYS.bookingShow })
  show!: Show;

  @OneToMany(() => BookingSeat, (bookingSeat) => bookingSeat.booking)
  bookingSeats!: BookingSeat[];

  @UpdateDateColumn()
  updatedAt!: Date;
}
