import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { BookingStatus, Hall, Seat, Show, Theater } from '../entities';
import { CreateHallDto, HallResponseDto, UpdateHallDto } from '../dto/hall.dto';
import { CapacityBelowBookingsException, DependentRowsException } from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { confirmedSeatCounts } from '../shows/booked-seats.query';

export function toHallResponse(hall: Hall): HallResponseDto {
  return {
    id: hall.id,
    theaterId: hall.theaterId,
    name: hall.name,
    seatingCapacity: hall.seatingCapacity,
    screenType: hall.screenType,
    isActive: hall.isActive,
  };
}

@Injectable()
export class HallsService {
  private readonly logger = new Logger(HallsService.name);

  constructor(
    @InjectRepository(Hall)
    private readonly hallRepository: Repository<Hall>,
    @InjectRepository(Theater)
    private readonly theaterRepository: Repository<Theater>,
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
    @InjectRepository(Show)
    private readonly showRepository: Repository<Show>,
    private readonly dataSource: DataSource,
    private readonly lockService: ReservationLockService,
  ) {}

  async createHall(createHallDto: CreateHallDto): Promise<HallResponseDto> {
    const theaterExists = await this.theaterRepository.exists({ where: { id: createHallDto.theaterId } });
    if (!theaterExists) {
      throw new NotFoundException(`Theater ${createHallDto.theaterId} not found`);
    }

    const hall = this.hallRepository.create({
      theaterId: createHallDto.theaterId,
      name: createHallDto.name,
      seatingCapacity: createHallDto.seatingCapacity,
      ...(createHallDto.screenType !== undefined && { screenType: createHallDto.screenType }),
    });

    try {
      const saved = await this.hallRepository.save(hall);
      this.logger.log(`Hall created: ${saved.id} (${saved.name}) in theater ${saved.theaterId}`);
      return toHallResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  async getHall(hallId: number): Promise<HallResponseDto> {
    return toHallResponse(await this.findHallOrFail(hallId));
  }

  async getHallsByTheater(theaterId: number): Promise<HallResponseDto[]> {
    const halls = await this.hallRepository.find({
      where: { theaterId },
      order: { name: 'ASC' },
    });
    return halls.map(toHallResponse);
  }

  /**
   * Lowering the capacity is refused while any show of the hall holds more Confirmed
   * seats than the new value. On PostgreSQL the hall row is locked FOR UPDATE, which
   * waits for bookings in flight (they hold it FOR SHARE).
   */
  async updateHall(hallId: number, updateHallDto: UpdateHallDto): Promise<HallResponseDto> {
    try {
      const saved = await this.lockService.withDatabaseLock(`hall:${hallId}`, () =>
        this.dataSource.transaction(async (manager) => {
          const query = manager.createQueryBuilder(Hall, 'hall').where('hall.id = :hallId', { hallId });
          if (this.dataSource.options.type === 'postgres') {
            query.setLock('pessimistic_write');
          }

          const hall = await query.getOne();
          if (!hall) {
            throw new NotFoundException(`Hall ${hallId} not found`);
          }

          const { seatingCapacity } = updateHallDto;
          if (seatingCapacity !== undefined && seatingCapacity < hall.seatingCapacity) {
            await this.assertCapacityCoversBookings(manager, hallId, seatingCapacity);
          }

          manager.merge(Hall, hall, updateHallDto);
          return manager.save(hall);
        }),
      );

      this.logger.log(`Hall updated: ${saved.id}`);
      return toHallResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  async deactivateHall(hallId: number): Promise<HallResponseDto> {
    const hall = await this.findHallOrFail(hallId);
    hall.isActive = false;
    const saved = await this.hallRepository.save(hall);

    this.logger.log(`Hall deactivated: ${hallId}`);
    return toHallResponse(saved);
  }

  /** With `cascade`, removes the hall's seats and shows along with everything booked against them. */
  async deleteHall(hallId: number, cascade = false): Promise<void> {
    await this.findHallOrFail(hallId);

    if (!cascade) {
      const [seats, shows] = await Promise.all([
        this.seatRepository.count({ where: { hallId } }),
        this.showRepository.count({ where: { hallId } }),
      ]);
      if (seats > 0 || shows > 0) {
        throw new DependentRowsException('Hall', hallId, { seats, shows });
      }
    }

    await this.hallRepository.delete({ id: hallId });
    this.logger.warn(`Hall ${hallId} deleted${cascade ? ' with cascade' : ''}`);
  }

  private async assertCapacityCoversBookings(
    manager: EntityManager,
    hallId: number,
    seatingCapacity: number,
  ): Promise<void> {
    const rows = await manager
      .createQueryBuilder(Show, 'show')
      .innerJoin(confirmedSeatCounts, 'booked', 'booked.show_id = show.id')
      .select('show.id', 'showId')
      .addSelect('booked.booked_count', 'bookedSeats')
      .where('show.hallId = :hallId', { hallId })
      .andWhere('booked.booked_count > :seatingCapacity', { seatingCapacity })
      .setParameter('confirmed', BookingStatus.CONFIRMED)
      .orderBy('show.id', 'ASC')
      .getRawMany<{ showId: number | string; bookedSeats: number | string }>();

    if (rows.length > 0) {
      const shows = rows.map((row) => ({ showId: Number(row.showId), bookedSeats: Number(row.bookedSeats) }));
      this.logger.warn(`Hall ${hallId} capacity change to ${seatingCapacity} refused`);
      throw new CapacityBelowBookingsException(hallId, seatingCapacity, shows);
    }
  }

  async findHallOrFail(hallId: number): Promise<Hall> {
    const hall = await this.hallRepository.findOne({ where: { id: hallId } });
    if (!hall) {
      throw new NotFoundException(`Hall ${hallId} not found`);
    }
    return hall;
  }
}
