import { IsNotEmpty, IsString, Matches } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { DATE_PATTERN } from '../common/utils/time.util';

export class ShowsByTheaterQueryDto {
  @ApiProperty({ example: 'Cineplex Riverside', description: 'Theater id or exact theater name' })
  @IsString()
  @IsNotEmpty()
  theater!: string;

  @ApiProperty({ example: '2026-10-18', description: 'YYYY-MM-DD' })
  @Matches(DATE_PATTERN, { message: 'date must be formatted as YYYY-MM-DD' })
  date!: string;
}

export class ShowAvailabilityDto {
  @ApiProperty()
  showId!: number;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  language!: string;

  @ApiProperty()
  format!: string;

  @ApiProperty({ nullable: true, type: String })
  rating!: string | null;

  @ApiProperty()
  hallName!: string;

  @ApiProperty()
  startTime!: string;

  @ApiProperty()
  basePrice!: number;

  @ApiProperty({ description: 'Hall capacity minus seats held by Confirmed bookings. Negative means over-booked.' })
  availableSeats!: number;
}

export class SeatAvailabilityDto {
  @ApiProperty()
  seatId!: number;

  @ApiProperty()
  rowLabel!: string;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty()
  seatType!: string;

  @ApiProperty()
  isAvailable!: boolean;
}

export class ShowSeatAvailabilityDto {
  @ApiProperty()
  showId!: number;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  hallName!: string;

  @ApiProperty()
  showDate!: string;

  @ApiProperty()
  startTime!: string;

  @ApiProperty()
  seatingCapacity!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty({ type: [SeatAvailabilityDto] })
  seats!: SeatAvailabilityDto[];
}
