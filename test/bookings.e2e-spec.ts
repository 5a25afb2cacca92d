import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { DataSource } from 'typeorm';
import { BookingStatus, PaymentStatus } from '../src/entities';
import { BookingResponseDto, CustomerBookingHistoryDto } from '../src/dto/booking.dto';
import { ShowAvailabilityDto, ShowSeatAvailabilityDto } from '../src/dto/availability.dto';
import { HallResponseDto } from '../src/dto/hall.dto';
import { ShowResponseDto } from '../src/dto/show.dto';
import { ErrorResponse } from '../src/common/filters/http-exception.filter';
import { toIsoDate } from '../src/common/utils/time.util';
import { clearDatabase, createTestApp, createVenue, Venue } from './test-app';

describe('Bookings (e2e)', () => {
  let app: INestApplication<App>;
  let dataSource: DataSource;
  let venue: Venue;
  const today = toIsoDate();

  const seatId = (seatNumber: number): number =>
    venue.seats.find((seat) => seat.seatNumber === seatNumber)?.id ?? -1;

  const book = (seatNumbers: number[], customerEmail = 'jane@example.com') =>
    request(app.getHttpServer())
      .post('/bookings')
      .send({
        showId: venue.show.id,
        customerName: 'Jane Doe',
        customerEmail,
        customerPhone: '555-0101',
        seats: seatNumbers.map((seatNumber) => ({ seatId: seatId(seatNumber) })),
      });

  const availability = async (): Promise<ShowSeatAvailabilityDto> => {
    const response = await request(app.getHttpServer()).get(`/shows/${venue.show.id}/availability`).expect(200);
    const body: ShowSeatAvailabilityDto = response.body;
    return body;
  };

  const getBooking = async (bookingId: number): Promise<BookingResponseDto> => {
    const response = await request(app.getHttpServer()).get(`/bookings/${bookingId}`).expect(200);
    const body: BookingResponseDto = response.body;
    return body;
  };

  beforeAll(async () => {
    app = await createTestApp();
    dataSource = app.get(DataSource);
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    await clearDatabase(dataSource);
    // capacity 3, seats A1-A4
    venue = await createVenue(app, { showDate: today });
  });

  describe('creating a booking', () => {
    it('should confirm the booking and take the seats out of availability', async () => {
      const response = await request(app.getHttpServer())
        .post('/bookings')
        .send({
          showId: venue.show.id,
          customerName: 'Jane Doe',
          customerEmail: 'jane@example.com',
          customerPhone: '555-0101',
          seats: [{ seatId: seatId(1) }, { seatId: seatId(2), price: 300 }],
        })
        .expect(201);

      const booking: BookingResponseDto = response.body;
      expect(booking).toMatchObject({
        showId: venue.show.id,
        customerEmail: 'jane@example.com',
        totalAmount: 550,
        paymentStatus: PaymentStatus.PENDING,
        bookingStatus: BookingStatus.CONFIRMED,
      });
      expect(booking.seats.map((seat) => [seat.rowLabel, seat.seatNumber, seat.seatPrice])).toEqual([
        ['A', 1, 250],
        ['A', 2, 300],
      ]);

      const seatMap = await availability();
      expect(seatMap.bookedSeats).toBe(2);
      expect(seatMap.availableSeats).toBe(1);
      expect(seatMap.seats.map((seat) => seat.isAvailable)).toEqual([false, false, true, true]);
    });

    it('should count the booking in the theater listing', async () => {
      await book([1, 2]).expect(201);

      const response = await request(app.getHttpServer())
        .get('/shows/availability')
        .query({ theater: 'E2E Cinema', date: today })
        .expect(200);

      const shows: ShowAvailabilityDto[] = response.body;
      expect(shows).toEqual([
        {
          showId: venue.show.id,
          movieTitle: 'E2E Test Movie',
          language: 'English',
          format: '2D',
          rating: 'U',
          hallName: 'Hall 1',
          startTime: '12:15:00',
          basePrice: 250,
          availableSeats: 1,
        },
      ]);
    });

    it('should reject seats another booking holds', async () => {
      await book([1]).expect(201);

      const response = await book([2, 1], 'other@example.com').expect(409);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('SEATS_ALREADY_BOOKED');
      expect(error.details).toEqual({ showId: venue.show.id, seats: ['A1'] });
      expect((await availability()).bookedSeats).toBe(1);
    });

    it('should let only one of two simultaneous requests take a seat', async () => {
      const responses = await Promise.all([book([1], 'first@example.com'), book([1], 'second@example.com')]);

      expect(responses.map((response) => response.status).sort()).toEqual([201, 409]);
      expect((await availability()).bookedSeats).toBe(1);
    });

    it('should refuse more seats than the hall has left', async () => {
      await book([1, 2, 3]).expect(201);

      const response = await book([4], 'late@example.com').expect(409);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('INSUFFICIENT_AVAILABILITY');
      expect(error.details).toEqual({ showId: venue.show.id, requested: 1, available: 0 });
    });

    it('should reject a seat outside the show hall', async () => {
      await request(app.getHttpServer())
        .post('/bookings')
        .send({
          showId: venue.show.id,
          customerName: 'Jane Doe',
          customerEmail: 'jane@example.com',
          customerPhone: '555-0101',
          seats: [{ seatId: 999999 }],
        })
        .expect(400);
    });

    it('should reject bookings for an inactive show', async () => {
      await request(app.getHttpServer()).patch(`/shows/${venue.show.id}/deactivate`).expect(200);

      await book([1]).expect(400);
    });

    it('should return 404 for an unknown show', async () => {
      await request(app.getHttpServer())
        .post('/bookings')
        .send({
          showId: 999999,
          customerName: 'Jane Doe',
          customerEmail: 'jane@example.com',
          customerPhone: '555-0101',
          seats: [{ seatId: seatId(1) }],
        })
        .expect(404);
    });

    it('should validate the request body', async () => {
      await request(app.getHttpServer())
        .post('/bookings')
        .send({
          showId: venue.show.id,
          customerName: 'Jane Doe',
          customerEmail: 'not-an-email',
          customerPhone: '555-0101',
          seats: [],
        })
        .expect(400);

      const response = await request(app.getHttpServer())
        .post('/bookings')
        .send({
          showId: venue.show.id,
          customerName: 'Jane Doe',
          customerEmail: 'jane@example.com',
          customerPhone: '555-0101',
          seats: [{ seatId: seatId(1) }, { seatId: seatId(1) }],
        })
        .expect(400);

      const error: ErrorResponse = response.body;
      expect(error.message).toEqual(['seats must not repeat a seatId']);
    });
  });

  describe('cancelling', () => {
    it('should release the seats of a cancelled booking', async () => {
      const created = await book([1, 2]).expect(201);
      const booking: BookingResponseDto = created.body;

      const response = await request(app.getHttpServer()).patch(`/bookings/${booking.id}/cancel`).expect(200);
      const cancelled: BookingResponseDto = response.body;
      expect(cancelled.bookingStatus).toBe(BookingStatus.CANCELLED);

      const seatMap = await availability();
      expect(seatMap.bookedSeats).toBe(0);
      expect(seatMap.availableSeats).toBe(3);

      await book([1], 'next@example.com').expect(201);
    });

    it('should accept cancelling twice', async () => {
      const created = await book([1]).expect(201);
      const booking: BookingResponseDto = created.body;

      await request(app.getHttpServer()).patch(`/bookings/${booking.id}/cancel`).expect(200);
      const response = await request(app.getHttpServer()).patch(`/bookings/${booking.id}/cancel`).expect(200);

      const cancelled: BookingResponseDto = response.body;
      expect(cancelled.bookingStatus).toBe(BookingStatus.CANCELLED);
    });
  });

  describe('payment status', () => {
    it('should follow the allowed transitions', async () => {
      const created = await book([1]).expect(201);
      const booking: BookingResponseDto = created.body;

      const completed = await request(app.getHttpServer())
        .patch(`/bookings/${booking.id}/payment-status`)
        .send({ paymentStatus: PaymentStatus.COMPLETED })
        .expect(200);
      expect(completed.body).toMatchObject({ paymentStatus: PaymentStatus.COMPLETED });

      const response = await request(app.getHttpServer())
        .patch(`/bookings/${booking.id}/payment-status`)
        .send({ paymentStatus: PaymentStatus.PENDING })
        .expect(400);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('INVALID_STATUS_TRANSITION');
      expect(error.details).toEqual({
        field: 'paymentStatus',
        from: PaymentStatus.COMPLETED,
        to: PaymentStatus.PENDING,
      });
    });
  });

  describe('booking seats', () => {
    let booking: BookingResponseDto;

    beforeEach(async () => {
      const created = await book([1, 2]).expect(201);
      booking = created.body;
    });

    it('should add a seat and raise the total', async () => {
      const response = await request(app.getHttpServer())
        .post(`/bookings/${booking.id}/seats`)
        .send({ seatId: seatId(3), price: 275.5 })
        .expect(201);

      const updated: BookingResponseDto = response.body;
      expect(updated.totalAmount).toBe(775.5);
      expect(updated.seats.map((seat) => seat.seatNumber)).toEqual([1, 2, 3]);
    });

    it('should reject the same seat twice in one booking', async () => {
      const response = await request(app.getHttpServer())
        .post(`/bookings/${booking.id}/seats`)
        .send({ seatId: seatId(1) })
        .expect(409);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('CONSTRAINT_VIOLATION');
      expect(error.details).toEqual({ constraint: 'UQ_booking_seat', kind: 'unique' });
    });

    it('should remove a seat and lower the total', async () => {
      const response = await request(app.getHttpServer())
        .delete(`/bookings/${booking.id}/seats/${seatId(1)}`)
        .expect(200);

      const updated: BookingResponseDto = response.body;
      expect(updated.totalAmount).toBe(250);
      expect(updated.seats.map((seat) => seat.seatNumber)).toEqual([2]);
      expect((await availability()).bookedSeats).toBe(1);
    });

    it('should return 404 for a seat the booking does not hold', async () => {
      await request(app.getHttpServer()).delete(`/bookings/${booking.id}/seats/${seatId(4)}`).expect(404);
    });
  });

  describe('concurrent writes to one booking', () => {
    it('should keep both prices when two seats are added at once', async () => {
      const booking: BookingResponseDto = (await book([1]).expect(201)).body;

      const responses = await Promise.all([
        request(app.getHttpServer()).post(`/bookings/${booking.id}/seats`).send({ seatId: seatId(2) }),
        request(app.getHttpServer()).post(`/bookings/${booking.id}/seats`).send({ seatId: seatId(3) }),
      ]);

      expect(responses.map((response) => response.status)).toEqual([201, 201]);
      const updated = await getBooking(booking.id);
      expect(updated.totalAmount).toBe(750);
      expect(updated.seats.map((seat) => seat.seatNumber)).toEqual([1, 2, 3]);
    });

    it('should take both prices off when two seats are removed at once', async () => {
      const booking: BookingResponseDto = (await book([1, 2, 3]).expect(201)).body;

      const responses = await Promise.all([
        request(app.getHttpServer()).delete(`/bookings/${booking.id}/seats/${seatId(1)}`),
        request(app.getHttpServer()).delete(`/bookings/${booking.id}/seats/${seatId(2)}`),
      ]);

      expect(responses.map((response) => response.status)).toEqual([200, 200]);
      const updated = await getBooking(booking.id);
      expect(updated.totalAmount).toBe(250);
      expect(updated.seats.map((seat) => seat.seatNumber)).toEqual([3]);
    });

    it('should never add a seat to a booking cancelled at the same time', async () => {
      const booking: BookingResponseDto = (await book([1]).expect(201)).body;

      const [added, cancelled] = await Promise.all([
        request(app.getHttpServer()).post(`/bookings/${booking.id}/seats`).send({ seatId: seatId(2) }),
        request(app.getHttpServer()).patch(`/bookings/${booking.id}/cancel`),
      ]);

      expect(cancelled.status).toBe(200);
      expect([201, 400]).toContain(added.status);
      const final = await getBooking(booking.id);
      expect(final.bookingStatus).toBe(BookingStatus.CANCELLED);
      expect(final.seats).toHaveLength(added.status === 201 ? 2 : 1);
      expect(final.totalAmount).toBe(final.seats.reduce((total, seat) => total + seat.seatPrice, 0));
    });
  });

  describe('hall capacity', () => {
    it('should refuse a capacity below the seats already booked', async () => {
      await book([1, 2]).expect(201);

      const response = await request(app.getHttpServer())
        .patch(`/halls/${venue.hall.id}`)
        .send({ seatingCapacity: 1 })
        .expect(409);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('CAPACITY_BELOW_BOOKINGS');
      expect(error.details).toEqual({
        hallId: venue.hall.id,
        seatingCapacity: 1,
        shows: [{ showId: venue.show.id, bookedSeats: 2 }],
      });
      expect((await availability()).availableSeats).toBe(1);
    });

    it('should accept a capacity that still covers the bookings', async () => {
      await book([1, 2]).expect(201);

      const response = await request(app.getHttpServer())
        .patch(`/halls/${venue.hall.id}`)
        .send({ seatingCapacity: 2 })
        .expect(200);

      const hall: HallResponseDto = response.body;
      expect(hall.seatingCapacity).toBe(2);
      expect((await availability()).availableSeats).toBe(0);
    });

    it('should not count cancelled bookings against the new capacity', async () => {
      const booking: BookingResponseDto = (await book([1, 2]).expect(201)).body;
      await request(app.getHttpServer()).patch(`/bookings/${booking.id}/cancel`).expect(200);

      await request(app.getHttpServer()).patch(`/halls/${venue.hall.id}`).send({ seatingCapacity: 1 }).expect(200);
    });
  });

  describe('moving a show to another hall', () => {
    let otherHall: HallResponseDto;

    beforeEach(async () => {
      const response = await request(app.getHttpServer())
        .post('/halls')
        .send({ theaterId: venue.theater.id, name: 'Hall 2', seatingCapacity: 1 })
        .expect(201);
      otherHall = response.body;
    });

    it('should refuse while the show has bookings', async () => {
      await book([1, 2]).expect(201);

      const response = await request(app.getHttpServer())
        .patch(`/shows/${venue.show.id}`)
        .send({ hallId: otherHall.id })
        .expect(409);

      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('SHOW_HAS_BOOKINGS');
      expect(error.details).toEqual({ showId: venue.show.id, bookings: 1 });
      expect((await availability()).availableSeats).toBe(1);
    });

    it('should move a show without bookings', async () => {
      const response = await request(app.getHttpServer())
        .patch(`/shows/${venue.show.id}`)
        .send({ hallId: otherHall.id })
        .expect(200);

      const show: ShowResponseDto = response.body;
      expect(show.hallId).toBe(otherHall.id);
      expect((await availability()).availableSeats).toBe(1);
    });
  });

  describe('deleting a booked seat', () => {
    it('should take the seat price off the booking with cascade', async () => {
      const booking: BookingResponseDto = (await book([1, 2]).expect(201)).body;

      await request(app.getHttpServer()).delete(`/seats/${seatId(1)}`).query({ cascade: true }).expect(204);

      const updated = await getBooking(booking.id);
      expect(updated.totalAmount).toBe(250);
      expect(updated.seats.map((seat) => seat.seatNumber)).toEqual([2]);
    });
  });

  describe('deleting', () => {
    it('should refuse without cascade while the booking has seats', async () => {
      const created = await book([1]).expect(201);
      const booking: BookingResponseDto = created.body;

      const response = await request(app.getHttpServer()).delete(`/bookings/${booking.id}`).expect(409);
      const error: ErrorResponse = response.body;
      expect(error.errorCode).toBe('HAS_DEPENDENTS');
      expect(error.details).toEqual({ entity: 'Booking', id: booking.id, dependents: { bookingSeats: 1 } });

      await request(app.getHttpServer()).delete(`/bookings/${booking.id}`).query({ cascade: true }).expect(204);
      await request(app.getHttpServer()).get(`/bookings/${booking.id}`).expect(404);
      expect((await availability()).bookedSeats).toBe(0);
    });
  });

  describe('customer history', () => {
    it('should list bookings newest first and total the confirmed ones', async () => {
      const first: BookingResponseDto = (await book([1]).expect(201)).body;
      const second: BookingResponseDto = (await book([2]).expect(201)).body;
      const third: BookingResponseDto = (await book([3]).expect(201)).body;
      await request(app.getHttpServer()).patch(`/bookings/${second.id}/cancel`).expect(200);
      await book([4], 'someone.else@example.com').expect(201);

      const response = await request(app.getHttpServer()).get('/bookings/customer/jane@example.com').expect(200);

      const history: CustomerBookingHistoryDto = response.body;
      expect(history.bookings.map((booking) => booking.id)).toEqual([third.id, second.id, first.id]);
      expect(history.totalBookings).toBe(3);
      expect(history.totalAmount).toBe(500);
      expect(history.bookings[0]).toMatchObject({
        theaterName: 'E2E Cinema',
        hallName: 'Hall 1',
        movieTitle: 'E2E Test Movie',
        showDate: today,
        startTime: '12:15:00',
      });
    });

    it('should return an empty history for an unknown customer', async () => {
      const response = await request(app.getHttpServer()).get('/bookings/customer/nobody@example.com').expect(200);

      expect(response.body).toEqual({
        customerEmail: 'nobody@example.com',
        bookings: [],
        totalBookings: 0,
        totalAmount: 0,
      });
    });
  });
});
