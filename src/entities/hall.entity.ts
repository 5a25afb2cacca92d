import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, OneToMany, JoinColumn, Index, Unique, Check } from 'typeorm';
import { Theater } from './theater.entity';
import { Seat } from './seat.entity';
import { Show } from './show.entity';
import { CHECK_CONSTRAINTS, FOREIGN_KEYS, UNIQUE_CONSTRAINTS } from './constraints';

@Entity('halls')
@Unique(UNIQUE_CONSTRAINTS.hallTheaterName.name, UNIQUE_CONSTRAINTS.hallTheaterName.columns)
@Check(CHECK_CONSTRAINTS.hallCapacityPositive, '"seatingCapacity" > 0')
@Index('IDX_hall_theater', ['theaterId'])
export class Hall {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  theaterId!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'integer' })
  seatingCapacity!: number;

  @Column({ type: 'varchar', length: 50, default: 'Standard' })
  screenType!: string;

  @Column({ default: true })
  isActive!: boolean;

  @ManyToOne(() => Theater, (theater) => theater.halls, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'theaterId', foreignKeyConstraintName: FOREIGN_KEYS.hallTheater })
  theater!: Theater;

  @OneToMany(() => Seat, (seat) => seat.hall)
  seats!: Seat[];

  @OneToMany(() => Show, (show) => show.hall)
  shows!: Show[];
}
