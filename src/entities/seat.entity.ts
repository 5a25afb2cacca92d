import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, OneToMany, JoinColumn, Index, Unique, Check } from 'typeorm';
import { Hall } from './hall.entity';
import { BookingSeat } from './booking-seat.entity';
import { CHECK_CONSTRAINTS, FOREIGN_KEYS, UNIQUE_CONSTRAINTS } from './constraints';

@Entity('seats')
@Unique(UNIQUE_CONSTRAINTS.seatHallPosition.name, UNIQUE_CONSTRAINTS.seatHallPosition.columns)
@Check(CHECK_CONSTRAINTS.seatNumberPositive, '"seatNumber" > 0')
@Index('IDX_seat_hall', ['hallId'])
export class Seat {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  hallId!: number;

  @Column({ type: 'varchar', length: 5 })
  rowLabel!: string;

  @Column({ type: 'integer' })
  seatNumber!: number;

  @Column({ type: 'varchar', length: 30, default: 'Regular' })
  seatType!: string;

  @ManyToOne(() => Hall, (hall) => hall.seats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'hallId', foreignKeyConstraintName: FOREIGN_KEYS.seatHall })
  hall!: Hall;

  @OneToMany(() => BookingSeat, (bookingSeat) => bookingSeat.seat)
  bookingSeats!: BookingSeat[];
}
