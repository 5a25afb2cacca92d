import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Movie, Show } from '../entities';
import { CreateMovieDto, MovieResponseDto, UpdateMovieDto } from '../dto/movie.dto';
import { DependentRowsException } from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { addMinutesToTime, toIsoDate } from '../common/utils/time.util';

export function toMovieResponse(movie: Movie): MovieResponseDto {
  return {
    id: movie.id,
    title: movie.title,
    language: movie.language,
    format: movie.format,
    rating: movie.rating,
    durationMinutes: movie.durationMinutes,
    genre: movie.genre,
    releaseDate: movie.releaseDate,
    description: movie.description,
    isActive: movie.isActive,
  };
}

export interface MovieFilter {
  title?: string;
  language?: string;
}

@Injectable()
export class MoviesService {
  private readonly logger = new Logger(MoviesService.name);

  constructor(
    @InjectRepository(Movie)
    private readonly movieRepository: Repository<Movie>,
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    private readonly dataSource: DataSource,
    private readonly lockService: ReservationLockService,
  ) {}

  async createMovie(createMovieDto: CreateMovieDto): Promise<MovieResponseDto> {
    this.logger.log(`Creating movie: ${createMovieDto.title} (${createMovieDto.language}, ${createMovieDto.format})`);

    const movie = this.movieRepository.create({
      title: createMovieDto.title,
      language: createMovieDto.language,
      format: createMovieDto.format,
      rating: createMovieDto.rating ?? null,
      durationMinutes: createMovieDto.durationMinutes,
      genre: createMovieDto.genre ?? null,
      releaseDate: createMovieDto.releaseDate ?? null,
      description: createMovieDto.description ?? null,
    });

    try {
      const saved = await this.movieRepository.save(movie);
      return toMovieResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  /** Active movies, optionally narrowed to an exact title and/or language. */
  async getMovies(filter: MovieFilter = {}): Promise<MovieResponseDto[]> {
    const movies = await this.movieRepository.find({
      where: {
        isActive: true,
        ...(filter.title !== undefined && { title: filter.title }),
        ...(filter.language !== undefined && { language: filter.language }),
      },
      order: { title: 'ASC', language: 'ASC', format: 'ASC' },
    });
    return movies.map(toMovieResponse);
  }

  /** Active movies with at least one active show on `today` or later. */
  async getNowShowing(today: string = toIsoDate()): Promise<MovieResponseDto[]> {
    const movies = await this.movieRepository
      .createQueryBuilder('movie')
      .where('movie.isActive = :active', { active: true })
      .andWhere((qb) => {
        const upcoming = qb
          .subQuery()
          .select('1')
          .from(Show, 'show')
          .where('show.movieId = movie.id')
          .andWhere('show.isActive = :active')
          .andWhere('show.showDate >= :today')
          .getQuery();
        return `EXISTS ${upcoming}`;
      })
      .setParameter('today', today)
      .orderBy('movie.title', 'ASC')
      .addOrderBy('movie.language', 'ASC')
      .addOrderBy('movie.format', 'ASC')
      .getMany();

    return movies.map(toMovieResponse);
  }

  async getMovie(movieId: number): Promise<MovieResponseDto> {
    return toMovieResponse(await this.findMovieOrFail(movieId));
  }

  /**
   * Updates a movie. A new duration is pushed down to the cached end time of every
   * show of the movie in the same transaction.
   */
  async updateMovie(movieId: number, updateMovieDto: UpdateMovieDto): Promise<MovieResponseDto> {
    const movie = await this.findMovieOrFail(movieId);
    const durationChanged =
      updateMovieDto.durationMinutes !== undefined && updateMovieDto.durationMinutes !== movie.durationMinutes;

    this.movieRepository.merge(movie, updateMovieDto);

    return this.lockService.withDatabaseLock(`movie:${movieId}`, async () => {
      const queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      try {
        const saved = await queryRunner.manager.save(Movie, movie);

        if (durationChanged) {
          const shows = await queryRunner.manager.find(Show, { where: { movieId } });
          for (const show of shows) {
            show.endTime = addMinutesToTime(show.startTime, saved.durationMinutes);
          }
          await queryRunner.manager.save(Show, shows);
          this.logger.log(`Recomputed end time of ${shows.length} shows for movie ${movieId}`);
        }

        await queryRunner.commitTransaction();
        return toMovieResponse(saved);
      } catch (error) {
        await queryRunner.rollbackTransaction();
        throw translateDatabaseError(error);
      } finally {
        await queryRunner.release();
      }
    });
  }

  async deactivateMovie(movieId: number): Promise<MovieResponseDto> {
    const movie = await this.findMovieOrFail(movieId);
    movie.isActive = false;
    const saved = await this.movieRepository.save(movie);

    this.logger.log(`Movie deactivated: ${movieId}`);
    return toMovieResponse(saved);
  }

  /** With `cascade`, removes every show of the movie and the bookings made for them. */
  async deleteMovie(movieId: number, cascade = false): Promise<void> {
    await this.findMovieOrFail(movieId);

    if (!cascade) {
      const shows = await this.showRepository.count({ where: { movieId } });
      if (shows > 0) {
        throw new DependentRowsException('Movie', movieId, { shows });
      }
    }

    await this.movieRepository.delete({ id: movieId });
    this.logger.warn(`Movie ${movieId} deleted${cascade ? ' with cascade' : ''}`);
  }

  async findMovieOrFail(movieId: number): Promise<Movie> {
    const movie = await this.movieRepository.findOne({ where: { id: movieId } });
    if (!movie) {
      throw new NotFoundException(`Movie ${movieId} not found`);
    }
    return movie;
  }
}
