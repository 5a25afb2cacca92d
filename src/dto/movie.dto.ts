import { IsString, IsOptional, IsBoolean, IsInt, Min, IsNotEmpty, Matches, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { DATE_PATTERN } from '../common/utils/time.util';

export class CreateMovieDto {
  @ApiProperty({ example: 'The Long Weekend' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @ApiProperty({ example: 'English' })
  @IsString()
  @IsNotEmpty()
  language!: string;

  @ApiProperty({ example: '2D', description: 'Free text, e.g. 2D, 3D, IMAX' })
  @IsString()
  @IsNotEmpty()
  format!: string;

  @ApiPropertyOptional({ example: 'UA' })
  @IsOptional()
  @IsString()
  rating?: string;

  @ApiProperty({ example: 120, minimum: 1 })
  @IsInt()
  @Min(1)
  @Type(() => Number)
  durationMinutes!: number;

  @ApiPropertyOptional({ example: 'Drama' })
  @IsOptional()
  @IsString()
  genre?: string;

  @ApiPropertyOptional({ example: '2026-01-15' })
  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'releaseDate must be formatted as YYYY-MM-DD' })
  releaseDate?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;
}

export class UpdateMovieDto extends PartialType(CreateMovieDto) {
  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class MovieResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  language!: string;

  @ApiProperty()
  format!: string;

  @ApiProperty({ nullable: true, type: String })
  rating!: string | null;

  @ApiProperty()
  durationMinutes!: number;

  @ApiProperty({ nullable: true, type: String })
  genre!: string | null;

  @ApiProperty({ nullable: true, type: String })
  releaseDate!: string | null;

  @ApiProperty({ nullable: true, type: String })
  description!: string | null;

  @ApiProperty()
  isActive!: boolean;
}

export class MovieFilterQueryDto {
  @ApiPropertyOptional({ example: 'Dasara' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiPropertyOptional({ example: 'Telugu' })
  @IsOptional()
  @IsString()
  language?: string;
}
