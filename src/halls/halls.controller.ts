import {
  Controller,
  Post,
  Get,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HallsService } from './halls.service';
import { SeatsService } from './seats.service';
import { CreateHallDto, HallResponseDto, UpdateHallDto } from '../dto/hall.dto';
import { CreateSeatsDto, SeatResponseDto } from '../dto/seat.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('halls')
@Controller('halls')
export class HallsController {
  constructor(
    private readonly hallsService: HallsService,
    private readonly seatsService: SeatsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a hall in a theater' })
  @ApiResponse({ status: 201, description: 'Hall created', type: HallResponseDto })
  @ApiResponse({ status: 409, description: 'The theater already has a hall with that name' })
  async createHall(@Body() createHallDto: CreateHallDto): Promise<HallResponseDto> {
    return this.hallsService.createHall(createHallDto);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a hall' })
  @ApiResponse({ status: 200, type: HallResponseDto })
  @ApiResponse({ status: 404, description: 'Hall not found' })
  async getHall(@Param('id', ParseIntPipe) hallId: number): Promise<HallResponseDto> {
    return this.hallsService.getHall(hallId);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a hall' })
  @ApiResponse({ status: 200, type: HallResponseDto })
  @ApiResponse({ status: 409, description: 'A show of the hall has more seats booked than the new capacity' })
  async updateHall(
    @Param('id', ParseIntPipe) hallId: number,
    @Body() updateHallDto: UpdateHallDto,
  ): Promise<HallResponseDto> {
    return this.hallsService.updateHall(hallId, updateHallDto);
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate a hall' })
  @ApiResponse({ status: 200, type: HallResponseDto })
  async deactivateHall(@Param('id', ParseIntPipe) hallId: number): Promise<HallResponseDto> {
    return this.hallsService.deactivateHall(hallId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a hall; pass cascade=true to delete its seats and shows too' })
  @ApiResponse({ status: 204, description: 'Hall deleted' })
  @ApiResponse({ status: 409, description: 'The hall still has seats or shows' })
  async deleteHall(@Param('id', ParseIntPipe) hallId: number, @Query() options: DeleteOptionsDto): Promise<void> {
    await this.hallsService.deleteHall(hallId, options.cascade ?? false);
  }

  @Post(':id/seats')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add seats to a hall' })
  @ApiResponse({ status: 201, description: 'Seats created', type: [SeatResponseDto] })
  @ApiResponse({ status: 409, description: 'A seat position is already taken' })
  async addSeats(
    @Param('id', ParseIntPipe) hallId: number,
    @Body() createSeatsDto: CreateSeatsDto,
  ): Promise<SeatResponseDto[]> {
    return this.seatsService.addSeats(hallId, createSeatsDto);
  }

  @Get(':id/seats')
  @ApiOperation({ summary: 'List the seats of a hall' })
  @ApiResponse({ status: 200, type: [SeatResponseDto] })
  async getSeats(@Param('id', ParseIntPipe) hallId: number): Promise<SeatResponseDto[]> {
    return this.seatsService.getSeatsByHall(hallId);
  }
}
