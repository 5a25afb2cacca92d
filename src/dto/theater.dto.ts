import { IsString, IsOptional, IsBoolean, IsNotEmpty, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { HallResponseDto } from './hall.dto';

export class CreateTheaterDto {
  @ApiProperty({ example: 'Cineplex Riverside' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  name!: string;

  @ApiProperty({ example: 'Riverside Mall, 2nd floor' })
  @IsString()
  @IsNotEmpty()
  location!: string;

  @ApiProperty({ example: 'Springfield' })
  @IsString()
  @IsNotEmpty()
  city!: string;

  @ApiProperty({ example: 'Oregon' })
  @IsString()
  @IsNotEmpty()
  state!: string;

  @ApiProperty({ example: '97477' })
  @IsString()
  @IsNotEmpty()
  postalCode!: string;

  @ApiPropertyOptional({ example: '555-0100' })
  @IsOptional()
  @IsString()
  contactNumber?: string;
}

export class UpdateTheaterDto extends PartialType(CreateTheaterDto) {
  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class TheaterResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  location!: string;

  @ApiProperty()
  city!: string;

  @ApiProperty()
  state!: string;

  @ApiProperty()
  postalCode!: string;

  @ApiProperty({ nullable: true, type: String })
  contactNumber!: string | null;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty()
  createdAt!: Date;
}

export class TheaterDetailDto extends TheaterResponseDto {
  @ApiProperty({ type: [HallResponseDto] })
  halls!: HallResponseDto[];
}
