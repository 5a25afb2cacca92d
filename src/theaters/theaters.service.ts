import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Theater, Hall } from '../entities';
import { CreateTheaterDto, TheaterDetailDto, TheaterResponseDto, UpdateTheaterDto } from '../dto/theater.dto';
import { toHallResponse } from '../halls/halls.service';
import { DependentRowsException } from '../common/errors/catalog.exceptions';
import { translateDatabaseError } from '../common/errors/database-error.translator';

export function toTheaterResponse(theater: Theater): TheaterResponseDto {
  return {
    id: theater.id,
    name: theater.name,
    location: theater.location,
    city: theater.city,
    state: theater.state,
    postalCode: theater.postalCode,
    contactNumber: theater.contactNumber,
    isActive: theater.isActive,
    createdAt: theater.createdAt,
  };
}

@Injectable()
export class TheatersService {
  private readonly logger = new Logger(TheatersService.name);

  constructor(
    @InjectRepository(Theater)
    private readonly theaterRepository: Repository<Theater>,
    @InjectRepository(Hall)
    private readonly hallRepository: Repository<Hall>,
  ) {}

  async createTheater(createTheaterDto: CreateTheaterDto): Promise<TheaterResponseDto> {
    this.logger.log(`Creating theater: ${createTheaterDto.name}`);

    const theater = this.theaterRepository.create({
      name: createTheaterDto.name,
      location: createTheaterDto.location,
      city: createTheaterDto.city,
      state: createTheaterDto.state,
      postalCode: createTheaterDto.postalCode,
      contactNumber: createTheaterDto.contactNumber ?? null,
    });

    try {
      const saved = await this.theaterRepository.save(theater);
      this.logger.log(`Theater created: ${saved.id}`);
      return toTheaterResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  /** Active theaters, the catalog's entry point. */
  async getActiveTheaters(): Promise<TheaterResponseDto[]> {
    const theaters = await this.theaterRepository.find({
      where: { isActive: true },
      order: { name: 'ASC', id: 'ASC' },
    });

    return theaters.map(toTheaterResponse);
  }

  async getTheater(theaterId: number): Promise<TheaterDetailDto> {
    const theater = await this.theaterRepository.findOne({
      where: { id: theaterId },
      relations: ['halls'],
      order: { halls: { name: 'ASC' } },
    });

    if (!theater) {
      throw new NotFoundException(`Theater ${theaterId} not found`);
    }

    return {
      ...toTheaterResponse(theater),
      halls: theater.halls.map(toHallResponse),
    };
  }

  async updateTheater(theaterId: number, updateTheaterDto: UpdateTheaterDto): Promise<TheaterResponseDto> {
    const theater = await this.findTheaterOrFail(theaterId);

    this.theaterRepository.merge(theater, updateTheaterDto);

    try {
      const saved = await this.theaterRepository.save(theater);
      this.logger.log(`Theater updated: ${saved.id}`);
      return toTheaterResponse(saved);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }

  async deactivateTheater(theaterId: number): Promise<TheaterResponseDto> {
    const theater = await this.findTheaterOrFail(theaterId);
    theater.isActive = false;
    const saved = await this.theaterRepository.save(theater);

    this.logger.log(`Theater deactivated: ${theaterId}`);
    return toTheaterResponse(saved);
  }

  /**
   * Deletes a theater. With `cascade` the database removes its halls, their seats and
   * shows, and those shows' bookings and booking seats. Without it the delete is refused
   * while the theater still has halls.
   */
  async deleteTheater(theaterId: number, cascade = false): Promise<void> {
    await this.findTheaterOrFail(theaterId);

    if (!cascade) {
      const halls = await this.hallRepository.count({ where: { theaterId } });
      if (halls > 0) {
        throw new DependentRowsException('Theater', theaterId, { halls });
      }
    }

    await this.theaterRepository.delete({ id: theaterId });
    this.logger.warn(`Theater ${theaterId} deleted${cascade ? ' with cascade' : ''}`);
  }

  private async findTheaterOrFail(theaterId: number): Promise<Theater> {
    const theater = await this.theaterRepository.findOne({ where: { id: theaterId } });
    if (!theater) {
      throw new NotFoundException(`Theater ${theaterId} not found`);
    }
    return theater;
  }
}
