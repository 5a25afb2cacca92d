import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Booking, BookingSeat, Hall, Seat } from '../entities';
import { CreateSeatsDto, SeatResponseDto, UpdateSeatDto } from '../dto/seat.dto';
import { DependentRowsException } from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { sumAmounts } from '../bookings/booking-status.rules';

export function toSeatResponse(seat: Seat): SeatResponseDto {
  return {
    id: seat.id,
    hallId: seat.hallId,
    rowLabel: seat.rowLabel,
    seatNumber: seat.seatNumber,
    seatType: seat.seatType,
  };
}

@Injectable()
export class SeatsService {
  private readonly logger = new Logger(SeatsService.name);

  constructor(
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
    @InjectRepository(Hall)
    private readonly hallRepository: Repository<Hall>,
    @InjectRepository(BookingSeat)
    private readonly bookingSeatRepository: Repository<BookingSeat>,
    private readonly dataSource: DataSource,
    private readonly lockService: ReservationLockService,
  ) {}

  /** Adds a batch of seats to a hall; either every seat is created or none is. */
  async addSeats(hallId: number, createSeatsDto: CreateSeatsDto): Promise<SeatResponseDto[]> {
    const hallExists = await this.hallRepository.exists({ where: { id: hallId } });
    if (!hallExists) {
      throw new NotFoundException(`Hall ${hallId} not found`);
    }

    return this.lockService.withDatabaseLock(`hall:${hallId}:seats`, async () => {
      const queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      try {
        const seats = createSeatsDto.seats.map((seat) =>
          queryRunner.manager.create(Seat, {
            hallId,
            rowLabel: seat.rowLabel.toUpperCase(),
            seatNumber: seat.seatNumber,
            ...(seat.seatType !== undefined && { seatType: seat.seatType }),
          }),
        );
        const saved = await queryRunner.manager.save(Seat, seats);

        await queryRunner.commitTransaction();
        this.logger.log(`Added ${saved.length} seats to hall ${hallId}`);

        return saved.map(toSeatResponse);
      } catch (error) {
        await queryRunner.rollbackTransaction();
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Failed to add seats to hall ${hallId}: ${errorMessage}`);
        throw translateDatabaseError(error);
      } finally {
        await queryRunner.release();
      }
    });
  }

  async getSeatsByHall(hallId: number): Promise<SeatResponseDto[]> {
    const hallExists = await this.hallRepository.exists({ where: { id: hallId } });
    if (!hallExists) {
      throw new NotFoundException(`Hall ${hallId} not found`);
    }

    const seats = await this.seatRepository.find({
      where: { hallId },
      order: { rowLabel: 'ASC', seatNumber: 'ASC' },
    });
    return seats.map(toSeatResponse);
  }

  async getSeat(seatId: number): Promise<SeatResponseDto> {
    return toSeatResponse(await this.findSeatOrFail(seatId));
  }

  async updateSeat(seatId: number, updateSeatDto: UpdateSeatDto): Promise<SeatResponseDto> {
    const seat = await this.findSeatOrFail(seatId);
    seat.seatType = updateSeatDto.seatType;
    const saved = await this.seatRepository.save(seat);
    return toSeatResponse(saved);
  }

  /**
   * With `cascade`, also removes the seat from every booking that holds it, taking
   * its price off each booking's total.
   */
  async deleteSeat(seatId: number, cascade = false): Promise<void> {
    await this.findSeatOrFail(seatId);

    if (!cascade) {
      const bookingSeats = await this.bookingSeatRepository.count({ where: { seatId } });
      if (bookingSeats > 0) {
        throw new DependentRowsException('Seat', seatId, { bookingSeats });
      }
      await this.seatRepository.delete({ id: seatId });
      this.logger.warn(`Seat ${seatId} deleted`);
      return;
    }

    const released = await this.lockService.withDatabaseLock(`seat:${seatId}`, () =>
      this.dataSource.transaction(async (manager) => {
        const bookingSeats = await manager.find(BookingSeat, { where: { seatId }, order: { bookingId: 'ASC' } });

        for (const bookingSeat of bookingSeats) {
          const query = manager
            .createQueryBuilder(Booking, 'booking')
            .where('booking.id = :bookingId', { bookingId: bookingSeat.bookingId });
          if (this.dataSource.options.type === 'postgres') {
            query.setLock('pessimistic_write');
          }

          const booking = await query.getOne();
          if (booking) {
            await manager.update(
              Booking,
              { id: booking.id },
              { totalAmount: sumAmounts([booking.totalAmount, -bookingSeat.seatPrice]) },
            );
          }
        }

        await manager.delete(Seat, { id: seatId });
        return bookingSeats.length;
      }),
    );

    this.logger.warn(`Seat ${seatId} deleted with cascade, released from ${released} bookings`);
  }

  private async findSeatOrFail(seatId: number): Promise<Seat> {
    const seat = await this.seatRepository.findOne({ where: { id: seatId } });
    if (!seat) {
      throw new NotFoundException(`Seat ${seatId} not found`);
    }
    return seat;
  }
}
