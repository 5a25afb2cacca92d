import { Controller, Get, Patch, Delete, Body, Param, Query, HttpCode, HttpStatus, ParseIntPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SeatsService } from './seats.service';
import { SeatResponseDto, UpdateSeatDto } from '../dto/seat.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('seats')
@Controller('seats')
export class SeatsController {
  constructor(private readonly seatsService: SeatsService) {}

  @Get(':id')
  @ApiOperation({ summary: 'Get a seat' })
  @ApiResponse({ status: 200, type: SeatResponseDto })
  @ApiResponse({ status: 404, description: 'Seat not found' })
  async getSeat(@Param('id', ParseIntPipe) seatId: number): Promise<SeatResponseDto> {
    return this.seatsService.getSeat(seatId);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Change the type of a seat' })
  @ApiResponse({ status: 200, type: SeatResponseDto })
  async updateSeat(
    @Param('id', ParseIntPipe) seatId: number,
    @Body() updateSeatDto: UpdateSeatDto,
  ): Promise<SeatResponseDto> {
    return this.seatsService.updateSeat(seatId, updateSeatDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a seat; pass cascade=true to drop it from bookings too' })
  @ApiResponse({ status: 204, description: 'Seat deleted' })
  @ApiResponse({ status: 409, description: 'The seat is part of a booking' })
  async deleteSeat(@Param('id', ParseIntPipe) seatId: number, @Query() options: DeleteOptionsDto): Promise<void> {
    await this.seatsService.deleteSeat(seatId, options.cascade ?? false);
  }
}
