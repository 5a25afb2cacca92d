import { Entity, PrimaryGeneratedColumn, Column, OneToMany, Index, Check } from 'typeorm';
import { Show } from './show.entity';

/**
 * One row per (title, language, format) release. The same title screened in 2D and
 * IMAX is two movies with their own ids; titles are never deduplicated.
 */
@Entity('movies')
@Index('IDX_movie_title', ['title'])
@Index('IDX_movie_language', ['language'])
@Check('CHK_movie_duration_positive', '"durationMinutes" > 0')
export class Movie {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'varchar', length: 50 })
  language!: string;

  @Column({ type: 'varchar', length: 20 })
  format!: string;

  @Column({ type: 'varchar', length: 10, nullable: true })
  rating!: string | null;

  @Column({ type: 'integer' })
  durationMinutes!: number;

  @Column({ type: 'varchar', length: 100, nullable: true })
  genre!: string | null;

  @Column({ type: 'date', nullable: true })
  releaseDate!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => Show, (show) => show.movie)
  shows!: Show[];
}
