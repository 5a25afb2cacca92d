import {
  IsString,
  IsOptional,
  IsInt,
  Min,
  IsNumber,
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsArray,
  ArrayMinSize,
  ArrayUnique,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { BookingStatus, PaymentStatus } from '../entities';

export class BookingSeatRequestDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Type(() => Number)
  seatId!: number;

  @ApiPropertyOptional({ example: 250.0, description: "Defaults to the show's base price" })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Type(() => Number)
  price?: number;
}

export class CreateBookingDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Type(() => Number)
  showId!: number;

  @ApiProperty({ example: 'Jane Doe' })
  @IsString()
  @IsNotEmpty()
  customerName!: string;

  @ApiProperty({ example: 'jane@example.com' })
  @IsEmail()
  customerEmail!: string;

  @ApiProperty({ example: '555-0101' })
  @IsString()
  @IsNotEmpty()
  customerPhone!: string;

  @ApiProperty({ type: [BookingSeatRequestDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayUnique((seat: BookingSeatRequestDto) => seat.seatId, { message: 'seats must not repeat a seatId' })
  @ValidateNested({ each: true })
  @Type(() => BookingSeatRequestDto)
  seats!: BookingSeatRequestDto[];

  @ApiPropertyOptional({ enum: PaymentStatus, default: PaymentStatus.PENDING })
  @IsOptional()
  @IsEnum(PaymentStatus)
  paymentStatus?: PaymentStatus;
}

export class UpdatePaymentStatusDto {
  @ApiProperty({ enum: PaymentStatus })
  @IsEnum(PaymentStatus)
  paymentStatus!: PaymentStatus;
}

export class BookingSeatResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  seatId!: number;

  @ApiProperty()
  rowLabel!: string;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty()
  seatPrice!: number;
}

export class BookingResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  showId!: number;

  @ApiProperty()
  customerName!: string;

  @ApiProperty()
  customerEmail!: string;

  @ApiProperty()
  customerPhone!: string;

  @ApiProperty()
  bookingTime!: Date;

  @ApiProperty()
  totalAmount!: number;

  @ApiProperty({ enum: PaymentStatus })
  paymentStatus!: PaymentStatus;

  @ApiProperty({ enum: BookingStatus })
  bookingStatus!: BookingStatus;

  @ApiProperty({ type: [BookingSeatResponseDto] })
  seats!: BookingSeatResponseDto[];
}

export class BookingHistoryItemDto extends BookingResponseDto {
  @ApiProperty()
  theaterName!: string;

  @ApiProperty()
  hallName!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  language!: string;

  @ApiProperty()
  format!: string;

  @ApiProperty()
  showDate!: string;

  @ApiProperty()
  startTime!: string;
}

export class CustomerBookingHistoryDto {
  @ApiProperty()
  customerEmail!: string;

  @ApiProperty({ type: [BookingHistoryItemDto] })
  bookings!: BookingHistoryItemDto[];

  @ApiProperty()
  totalBookings!: number;

  @ApiProperty()
  totalAmount!: number;
}
