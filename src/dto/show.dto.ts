import { IsOptional, IsBoolean, IsInt, Min, IsNumber, Matches } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { DATE_PATTERN, TIME_PATTERN } from '../common/utils/time.util';

export class CreateShowDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Type(() => Number)
  movieId!: number;

  @ApiProperty({ example: 1 })
  @IsInt()
  @Type(() => Number)
  hallId!: number;

  @ApiProperty({ example: '2026-10-18', description: 'YYYY-MM-DD' })
  @Matches(DATE_PATTERN, { message: 'showDate must be formatted as YYYY-MM-DD' })
  showDate!: string;

  @ApiProperty({ example: '18:30', description: 'HH:MM or HH:MM:SS' })
  @Matches(TIME_PATTERN, { message: 'startTime must be formatted as HH:MM or HH:MM:SS' })
  startTime!: string;

  @ApiProperty({ example: 250.0, minimum: 0 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Type(() => Number)
  basePrice!: number;
}

/** endTime is not accepted: it is always recomputed from startTime and the movie's duration. */
export class UpdateShowDto extends PartialType(CreateShowDto) {
  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class ShowResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  movieId!: number;

  @ApiProperty()
  hallId!: number;

  @ApiProperty()
  showDate!: string;

  @ApiProperty()
  startTime!: string;

  @ApiProperty()
  endTime!: string;

  @ApiProperty()
  basePrice!: number;

  @ApiProperty()
  isActive!: boolean;
}

export class ShowFilterQueryDto {
  @ApiPropertyOptional({ example: '2026-10-18' })
  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'date must be formatted as YYYY-MM-DD' })
  date?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Type(() => Number)
  hallId?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Type(() => Number)
  movieId?: number;
}
