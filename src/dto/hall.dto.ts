import { IsString, IsOptional, IsBoolean, IsInt, Min, IsNotEmpty, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, OmitType, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';

export class CreateHallDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Type(() => Number)
  theaterId!: number;

  @ApiProperty({ example: 'Screen 4' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ example: 150, minimum: 1 })
  @IsInt()
  @Min(1)
  @Type(() => Number)
  seatingCapacity!: number;

  @ApiPropertyOptional({ example: 'Standard', default: 'Standard' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  screenType?: string;
}

export class UpdateHallDto extends PartialType(OmitType(CreateHallDto, ['theaterId'] as const)) {
  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class HallResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  theaterId!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  seatingCapacity!: number;

  @ApiProperty()
  screenType!: string;

  @ApiProperty()
  isActive!: boolean;
}
