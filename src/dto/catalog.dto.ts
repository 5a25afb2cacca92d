import { IsOptional, Matches } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { DATE_PATTERN } from '../common/utils/time.util';

export class SetupCatalogDto {
  @ApiPropertyOptional({ example: '2026-10-18', description: 'Day 0 of the fixture schedule. Defaults to today.' })
  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'baseDate must be formatted as YYYY-MM-DD' })
  baseDate?: string;
}

export class CatalogCountsDto {
  @ApiProperty()
  theaters!: number;

  @ApiProperty()
  halls!: number;

  @ApiProperty()
  movies!: number;

  @ApiProperty()
  seats!: number;

  @ApiProperty()
  shows!: number;

  @ApiProperty()
  bookings!: number;

  @ApiProperty()
  bookingSeats!: number;
}

export type TableCheckStatus = 'OK' | 'WARN' | 'FAIL';

export class TableCheckDto {
  @ApiProperty()
  table!: string;

  @ApiProperty()
  count!: number;

  @ApiProperty()
  expectedMinimum!: number;

  @ApiProperty({ enum: ['OK', 'WARN', 'FAIL'] })
  status!: TableCheckStatus;
}

export class AvailabilityDefectDto {
  @ApiProperty()
  showId!: number;

  @ApiProperty()
  seatingCapacity!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty()
  availableSeats!: number;
}

export class CatalogVerificationDto {
  @ApiProperty()
  passed!: boolean;

  @ApiProperty({ type: [TableCheckDto] })
  tables!: TableCheckDto[];

  @ApiProperty({ type: [AvailabilityDefectDto] })
  availabilityDefects!: AvailabilityDefectDto[];
}
