import { ArgumentsHost, BadRequestException, HttpException, Logger, NotFoundException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { HttpExceptionFilter } from './http-exception.filter';
import { SeatsAlreadyBookedException } from '../errors/catalog.exceptions';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new HttpExceptionFilter();
    response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);

    const httpContext = {
      getResponse: jest.fn().mockReturnValue(response),
      getRequest: jest.fn().mockReturnValue({ url: '/bookings' }),
      getNext: jest.fn(),
    };
    host = {
      switchToHttp: () => httpContext,
      switchToRpc: jest.fn(),
      switchToWs: jest.fn(),
      getArgs: jest.fn(),
      getArgByIndex: jest.fn(),
      getType: jest.fn(),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should keep the error code and details of a domain exception', () => {
    filter.catch(new SeatsAlreadyBookedException(3, ['A1', 'A2']), host);

    expect(response.status).toHaveBeenCalledWith(409);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 409,
      errorCode: 'SEATS_ALREADY_BOOKED',
      message: 'Seats already booked for show 3: A1, A2',
      timestamp: expect.any(String),
      path: '/bookings',
      details: { showId: 3, seats: ['A1', 'A2'] },
    });
  });

  it('should fall back to a code derived from the status', () => {
    filter.catch(new NotFoundException('Show 5 not found'), host);

    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 404, errorCode: 'NOT_FOUND', message: 'Show 5 not found' }),
    );
  });

  it('should use a plain string response as the message', () => {
    filter.catch(new HttpException('Show listing is gone', 410), host);

    expect(response.status).toHaveBeenCalledWith(410);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 410, errorCode: 'UNKNOWN_ERROR', message: 'Show listing is gone' }),
    );
  });

  it('should pass validation messages through as a list', () => {
    filter.catch(new BadRequestException(['showId must be an integer number']), host);

    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        errorCode: 'BAD_REQUEST',
        message: ['showId must be an integer number'],
      }),
    );
  });

  it('should report an escaped constraint failure as a conflict', () => {
    const driverError = Object.assign(
      new Error('UNIQUE constraint failed: booking_seats.bookingId, booking_seats.seatId'),
      { code: 'SQLITE_CONSTRAINT_UNIQUE' },
    );

    filter.catch(new QueryFailedError('INSERT INTO "booking_seats"', [], driverError), host);

    expect(response.status).toHaveBeenCalledWith(409);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: 'CONSTRAINT_VIOLATION',
        details: { constraint: 'UQ_booking_seat', kind: 'unique' },
      }),
    );
  });

  it('should hide the message of an unexpected error', () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    filter.catch(new Error('connection reset'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: 'INTERNAL_ERROR', message: 'An unexpected error occurred' }),
    );
    expect(errorSpy).toHaveBeenCalledWith('Unhandled exception: connection reset', expect.any(String));
  });
});
