import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, OneToMany, JoinColumn, Index, Unique, Check } from 'typeorm';
import { Movie } from './movie.entity';
import { Hall } from './hall.entity';
import { Booking } from './booking.entity';
import { CHECK_CONSTRAINTS, FOREIGN_KEYS, UNIQUE_CONSTRAINTS } from './constraints';
import { decimalTransformer } from './column-transformers';

@Entity('shows')
@Unique(UNIQUE_CONSTRAINTS.showHallSlot.name, UNIQUE_CONSTRAINTS.showHallSlot.columns)
@Check(CHECK_CONSTRAINTS.showPriceNonNegative, '"basePrice" >= 0')
@Index('IDX_show_date', ['showDate'])
@Index('IDX_show_movie', ['movieId'])
@Index('IDX_show_hall', ['hallId'])
@Index('IDX_show_date_hall', ['showDate', 'hallId'])
export class Show {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  movieId!: number;

  @Column({ type: 'integer' })
  hallId!: number;

  /** YYYY-MM-DD */
  @Column({ type: 'date' })
  showDate!: string;

  /** HH:MM:SS */
  @Column({ type: 'time' })
  startTime!: string;

  /** Derived from startTime and the movie's duration whenever the show is written. */
  @Column({ type: 'time' })
  endTime!: string;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  basePrice!: number;

  @Column({ default: true })
  isActive!: boolean;

  @ManyToOne(() => Movie, (movie) => movie.shows, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'movieId', foreignKeyConstraintName: FOREIGN_KEYS.showMovie })
  movie!: Movie;

  @ManyToOne(() => Hall, (hall) => hall.shows, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'hallId', foreignKeyConstraintName: FOREIGN_KEYS.showHall })
  hall!: Hall;

  @OneToMany(() => Booking, (booking) => booking.show)
  bookings!: Booking[];
}
