import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Booking, BookingStatus, Hall, Movie, Show } from '../entities';
import { CreateShowDto, ShowResponseDto, UpdateShowDto } from '../dto/show.dto';
import { SeatAvailabilityDto, ShowAvailabilityDto, ShowSeatAvailabilityDto } from '../dto/availability.dto';
import { AvailabilityDefectDto } from '../dto/catalog.dto';
import { DependentRowsException, ShowHasBookingsException } from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { addMinutesToTime, isIsoDate, normalizeTimeOfDay } from '../common/utils/time.util';
import { confirmedSeatCounts, countConfirmedBookingSeats, findConfirmedSeatIds } from './booked-seats.query';

interface ShowAvailabilityRow {
  showId: number | string;
  movieTitle: string;
  language: string;
  format: string;
  rating: string | null;
  hallName: string;
  startTime: string;
  basePrice: number | string;
  seatingCapacity: number | string;
  bookedCount: number | string | null;
}

export interface ShowFilter {
  date?: string;
  hallId?: number;
  movieId?: number;
}

export function toShowResponse(show: Show): ShowResponseDto {
  return {
    id: show.id,
    movieId: show.movieId,
    hallId: show.hallId,
    showDate: show.showDate,
    startTime: show.startTime,
    endTime: show.endTime,
    basePrice: show.basePrice,
    isActive: show.isActive,
  };
}

@Injectable()
export class ShowsService {
  private readonly logger = new Logger(ShowsService.name);

  constructor(
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    @InjectRepository(Movie)
    private readonly movieRepository: Repository<Movie>,
    @InjectRepository(Hall)
    private readonly hallRepository: Repository<Hall>,
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
    private readonly dataSource: DataSource,
    private readonly lockService: ReservationLockService,
  ) {}

  async createShow(createShowDto: CreateShowDto): Promise<ShowResponseDto> {
    this.assertCalendarDate(createShowDto.showDate);
    const [movie, hall] = await Promise.all([
      this.findMovieOrFail(createShowDto.movieId),
      this.findHallOrFail(createShowDto.hallId),
    ]);

    const startTime = normalizeTimeOfDay(createShowDto.startTime);
    const show = this.showRepository.create({
      movieId: movie.id,
      hallId: hall.id,
      showDate: createShowDto.showDate,
      startTime,
      endTime: addMinutesToTime(startTime, movie.durationMinutes),
      basePrice: createShowDto.basePrice,
    });

    try {
      const saved = await this.showRepository.save(show);
      this.logger.log(
        `Show created: ${saved.id} (${movie.title}, hall ${hall.id}, ${saved.showDate} ${saved.startTime}-${saved.endTime})`,
      );
      return toShowResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  async getShow(showId: number): Promise<ShowResponseDto> {
    return toShowResponse(await this.findShowOrFail(showId));
  }

  async getShows(filter: ShowFilter = {}): Promise<ShowResponseDto[]> {
    const shows = await this.showRepository.find({
      where: {
        ...(filter.date !== undefined && { showDate: filter.date }),
        ...(filter.hallId !== undefined && { hallId: filter.hallId }),
        ...(filter.movieId !== undefined && { movieId: filter.movieId }),
      },
      order: { showDate: 'ASC', startTime: 'ASC', id: 'ASC' },
    });
    return shows.map(toShowResponse);
  }

  /**
   * Any change to the start time or the movie recomputes the stored end time. A show
   * with bookings keeps its hall: its booking seats belong to that hall's seat map.
   * Runs under the show lock, like the booking writes.
   */
  async updateShow(showId: number, updateShowDto: UpdateShowDto): Promise<ShowResponseDto> {
    if (updateShowDto.showDate !== undefined) {
      this.assertCalendarDate(updateShowDto.showDate);
    }

    try {
      const saved = await this.lockService.withShowLock(showId, () =>
        this.dataSource.transaction(async (manager) => {
          const show = await this.loadShowForUpdate(manager, showId);

          if (updateShowDto.hallId !== undefined && updateShowDto.hallId !== show.hallId) {
            const bookings = await manager.count(Booking, { where: { showId } });
            if (bookings > 0) {
              throw new ShowHasBookingsException(showId, bookings);
            }
            const hall = await manager.findOne(Hall, { where: { id: updateShowDto.hallId } });
            if (!hall) {
              throw new NotFoundException(`Hall ${updateShowDto.hallId} not found`);
            }
            show.hallId = hall.id;
          }
          if (updateShowDto.showDate !== undefined) {
            show.showDate = updateShowDto.showDate;
          }
          if (updateShowDto.movieId !== undefined) {
            show.movieId = updateShowDto.movieId;
          }
          if (updateShowDto.startTime !== undefined) {
            show.startTime = normalizeTimeOfDay(updateShowDto.startTime);
          }
          if (updateShowDto.basePrice !== undefined) {
            show.basePrice = updateShowDto.basePrice;
          }
          if (updateShowDto.isActive !== undefined) {
            show.isActive = updateShowDto.isActive;
          }

          const movie = await manager.findOne(Movie, { where: { id: show.movieId } });
          if (!movie) {
            throw new NotFoundException(`Movie ${show.movieId} not found`);
          }
          show.endTime = addMinutesToTime(show.startTime, movie.durationMinutes);

          return manager.save(show);
        }),
      );

      this.logger.log(`Show updated: ${saved.id}`);
      return toShowResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  async deactivateShow(showId: number): Promise<ShowResponseDto> {
    const show = await this.findShowOrFail(showId);
    show.isActive = false;
    const saved = await this.showRepository.save(show);

    this.logger.log(`Show deactivated: ${showId}`);
    return toShowResponse(saved);
  }

  /** With `cascade`, removes the show's bookings and their booking seats as well. */
  async deleteShow(showId: number, cascade = false): Promise<void> {
    await this.findShowOrFail(showId);

    if (!cascade) {
      const bookings = await this.bookingRepository.count({ where: { showId } });
      if (bookings > 0) {
        throw new DependentRowsException('Show', showId, { bookings });
      }
    }

    await this.showRepository.delete({ id: showId });
    this.logger.warn(`Show ${showId} deleted${cascade ? ' with cascade' : ''}`);
  }

  /**
   * Active shows of active movies at one theater on one date, each with the seats still
   * available: hall capacity minus the seats held by Confirmed bookings. Shows without
   * bookings come through the LEFT JOIN with nothing booked.
   *
   * `theater` is matched as an id when it is all digits, as an exact name otherwise.
   */
  async findShowsByTheaterAndDate(theater: string, date: string): Promise<ShowAvailabilityDto[]> {
    this.assertCalendarDate(date);
    this.logger.log(`Listing shows for theater "${theater}" on ${date}`);

    const query = this.showRepository
      .createQueryBuilder('show')
      .innerJoin('show.movie', 'movie')
      .innerJoin('show.hall', 'hall')
      .innerJoin('hall.theater', 'theater')
      .leftJoin(confirmedSeatCounts, 'booked', 'booked.show_id = show.id')
      .select('show.id', 'showId')
      .addSelect('movie.title', 'movieTitle')
      .addSelect('movie.language', 'language')
      .addSelect('movie.format', 'format')
      .addSelect('movie.rating', 'rating')
      .addSelect('hall.name', 'hallName')
      .addSelect('show.startTime', 'startTime')
      .addSelect('show.basePrice', 'basePrice')
      .addSelect('hall.seatingCapacity', 'seatingCapacity')
      .addSelect('COALESCE(booked.booked_count, 0)', 'bookedCount')
      .where('show.showDate = :date', { date })
      .andWhere('show.isActive = :active', { active: true })
      .andWhere('movie.isActive = :active')
      .setParameter('confirmed', BookingStatus.CONFIRMED);

    if (/^\d+$/.test(theater)) {
      query.andWhere('theater.id = :theaterId', { theaterId: Number(theater) });
    } else {
      query.andWhere('theater.name = :theaterName', { theaterName: theater });
    }

    const rows = await query.orderBy('show.startTime', 'ASC').addOrderBy('show.id', 'ASC').getRawMany<ShowAvailabilityRow>();

    return rows.map((row) => {
      const showId = Number(row.showId);
      const seatingCapacity = Number(row.seatingCapacity);
      const bookedCount = Number(row.bookedCount ?? 0);
      const availableSeats = seatingCapacity - bookedCount;

      if (availableSeats < 0) {
        this.reportOverbooking(showId, seatingCapacity, bookedCount);
      }

      return {
        showId,
        movieTitle: row.movieTitle,
        language: row.language,
        format: row.format,
        rating: row.rating,
        hallName: row.hallName,
        startTime: row.startTime,
        basePrice: Number(row.basePrice),
        availableSeats,
      };
    });
  }

  /** Booked and available seats for one show, with the hall's seat map. */
  async getShowAvailability(showId: number): Promise<ShowSeatAvailabilityDto> {
    const show = await this.showRepository.findOne({
      where: { id: showId },
      relations: ['movie', 'hall', 'hall.seats'],
    });

    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }

    const manager = this.showRepository.manager;
    const [bookedSeats, heldSeatIds] = await Promise.all([
      countConfirmedBookingSeats(manager, showId),
      findConfirmedSeatIds(manager, showId),
    ]);
    const availableSeats = show.hall.seatingCapacity - bookedSeats;

    if (availableSeats < 0) {
      this.reportOverbooking(showId, show.hall.seatingCapacity, bookedSeats);
    }

    const seats: SeatAvailabilityDto[] = [...show.hall.seats]
      .sort((a, b) => a.rowLabel.localeCompare(b.rowLabel) || a.seatNumber - b.seatNumber)
      .map((seat) => ({
        seatId: seat.id,
        rowLabel: seat.rowLabel,
        seatNumber: seat.seatNumber,
        seatType: seat.seatType,
        isAvailable: !heldSeatIds.has(seat.id),
      }));

    return {
      showId: show.id,
      movieTitle: show.movie.title,
      hallName: show.hall.name,
      showDate: show.showDate,
      startTime: show.startTime,
      seatingCapacity: show.hall.seatingCapacity,
      bookedSeats,
      availableSeats,
      seats,
    };
  }

  /** Every show whose Confirmed booking seats exceed its hall's capacity. */
  async findOverbookedShows(): Promise<AvailabilityDefectDto[]> {
    const rows = await this.showRepository
      .createQueryBuilder('show')
      .innerJoin('show.hall', 'hall')
      .innerJoin(confirmedSeatCounts, 'booked', 'booked.show_id = show.id')
      .select('show.id', 'showId')
      .addSelect('hall.seatingCapacity', 'seatingCapacity')
      .addSelect('booked.booked_count', 'bookedSeats')
      .where('booked.booked_count > hall.seatingCapacity')
      .orderBy('show.id', 'ASC')
      .getRawMany<{ showId: number | string; seatingCapacity: number | string; bookedSeats: number | string }>();

    return rows.map((row) => {
      const seatingCapacity = Number(row.seatingCapacity);
      const bookedSeats = Number(row.bookedSeats);
      return {
        showId: Number(row.showId),
        seatingCapacity,
        bookedSeats,
        availableSeats: seatingCapacity - bookedSeats,
      };
    });
  }

  async findShowOrFail(showId: number): Promise<Show> {
    const show = await this.showRepository.findOne({ where: { id: showId } });
    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }
    return show;
  }

  /** On PostgreSQL the row is locked, as booking writes do. */
  private async loadShowForUpdate(manager: EntityManager, showId: number): Promise<Show> {
    const query = manager.createQueryBuilder(Show, 'show').where('show.id = :showId', { showId });
    if (this.dataSource.options.type === 'postgres') {
      query.setLock('pessimistic_write');
    }

    const show = await query.getOne();
    if (!show) {
      throw new NotFoundException(`Show ${showId} not found`);
    }
    return show;
  }

  /** Over-booking is a write-path defect; it is reported, and the negative value is kept. */
  private reportOverbooking(showId: number, seatingCapacity: number, bookedSeats: number): void {
    this.logger.error(
      `Consistency defect: show ${showId} has ${bookedSeats} confirmed seats for a capacity of ${seatingCapacity}`,
    );
  }

  private assertCalendarDate(date: string): void {
    if (!isIsoDate(date)) {
      throw new BadRequestException(`${date} is not a valid calendar date`);
    }
  }

  private async findMovieOrFail(movieId: number): Promise<Movie> {
    const movie = await this.movieRepository.findOne({ where: { id: movieId } });
    if (!movie) {
      throw new NotFoundException(`Movie ${movieId} not found`);
    }
    return movie;
  }

  private async findHallOrFail(hallId: number): Promise<Hall> {
    const hall = await this.hallRepository.findOne({ where: { id: hallId } });
    if (!hall) {
      throw new NotFoundException(`Hall ${hallId} not found`);
    }
    return hall;
  }
}
