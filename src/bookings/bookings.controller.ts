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
import { BookingsService } from './bookings.service';
import {
  BookingResponseDto,
  BookingSeatRequestDto,
  CreateBookingDto,
  CustomerBookingHistoryDto,
  UpdatePaymentStatusDto,
} from '../dto/booking.dto';
import { DeleteOptionsDto } from '../dto/common.dto';

@ApiTags('bookings')
@Controller('bookings')
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Book one or more seats for a show' })
  @ApiResponse({ status: 201, description: 'Booking confirmed', type: BookingResponseDto })
  @ApiResponse({ status: 400, description: 'Inactive show or movie, or seats outside the show hall' })
  @ApiResponse({ status: 404, description: 'Show not found' })
  @ApiResponse({ status: 409, description: 'Seats already booked or not enough seats available' })
  async createBooking(@Body() createBookingDto: CreateBookingDto): Promise<BookingResponseDto> {
    return this.bookingsService.createBooking(createBookingDto);
  }

  @Get('customer/:email')
  @ApiOperation({ summary: 'Booking history of a customer, most recent first' })
  @ApiResponse({ status: 200, type: CustomerBookingHistoryDto })
  async getCustomerHistory(@Param('email') customerEmail: string): Promise<CustomerBookingHistoryDto> {
    return this.bookingsService.getCustomerHistory(customerEmail);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a booking with its seats' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  async getBooking(@Param('id', ParseIntPipe) bookingId: number): Promise<BookingResponseDto> {
    return this.bookingsService.getBooking(bookingId);
  }

  @Patch(':id/cancel')
  @ApiOperation({ summary: 'Cancel a booking and release its seats' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  async cancelBooking(@Param('id', ParseIntPipe) bookingId: number): Promise<BookingResponseDto> {
    return this.bookingsService.cancelBooking(bookingId);
  }

  @Patch(':id/payment-status')
  @ApiOperation({ summary: 'Move a booking to another payment status' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 400, description: 'Transition not allowed' })
  async updatePaymentStatus(
    @Param('id', ParseIntPipe) bookingId: number,
    @Body() updatePaymentStatusDto: UpdatePaymentStatusDto,
  ): Promise<BookingResponseDto> {
    return this.bookingsService.updatePaymentStatus(bookingId, updatePaymentStatusDto.paymentStatus);
  }

  @Post(':id/seats')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a seat to a confirmed booking' })
  @ApiResponse({ status: 201, type: BookingResponseDto })
  @ApiResponse({ status: 409, description: 'Seat already booked, or already part of this booking' })
  async addSeat(
    @Param('id', ParseIntPipe) bookingId: number,
    @Body() seatRequest: BookingSeatRequestDto,
  ): Promise<BookingResponseDto> {
    return this.bookingsService.addSeat(bookingId, seatRequest);
  }

  @Delete(':id/seats/:seatId')
  @ApiOperation({ summary: 'Remove a seat from a booking' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  async removeSeat(
    @Param('id', ParseIntPipe) bookingId: number,
    @Param('seatId', ParseIntPipe) seatId: number,
  ): Promise<BookingResponseDto> {
    return this.bookingsService.removeSeat(bookingId, seatId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a booking; pass cascade=true to delete its seats too' })
  @ApiResponse({ status: 204, description: 'Booking deleted' })
  @ApiResponse({ status: 409, description: 'The booking still has seats' })
  async deleteBooking(
    @Param('id', ParseIntPipe) bookingId: number,
    @Query() options: DeleteOptionsDto,
  ): Promise<void> {
    await this.bookingsService.deleteBooking(bookingId, options.cascade ?? false);
  }
}
