import { IsString, IsOptional, IsInt, Min, IsNotEmpty, MaxLength, IsArray, ArrayMinSize, ValidateNested } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';

export class CreateSeatDto {
  @ApiProperty({ example: 'A' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(5)
  rowLabel!: string;

  @ApiProperty({ example: 1, minimum: 1 })
  @IsInt()
  @Min(1)
  @Type(() => Number)
  seatNumber!: number;

  @ApiPropertyOptional({ example: 'Regular', default: 'Regular' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  seatType?: string;
}

export class CreateSeatsDto {
  @ApiProperty({ type: [CreateSeatDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CreateSeatDto)
  seats!: CreateSeatDto[];
}

export class UpdateSeatDto {
  @ApiProperty({ example: 'Premium' })
  @IsString()
  @IsNotEmpty()
  seatType!: string;
}

export class SeatResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  hallId!: number;

  @ApiProperty()
  rowLabel!: string;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty()
  seatType!: string;
}
