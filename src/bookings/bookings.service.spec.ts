import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { BookingsService } from './bookings.service';
import { Booking, BookingSeat, BookingStatus, PaymentStatus, Show } from '../entities';
import { ReservationLockService } from '../common/locks/reservation-lock.service';
import { DependentRowsException, InvalidStatusTransitionException } from '../common/errors/catalog.exceptions';

function makeBooking(overrides: Partial<Booking> = {}): Booking {
  return Object.assign(new Booking(), {
    id: 7,
    showId: 1,
    customerName: 'Test Customer',
    customerEmail: 'customer@example.com',
    customerPhone: '555-0101',
    bookingTime: new Date('2026-10-18T09:00:00.000Z'),
    totalAmount: 500,
    paymentStatus: PaymentStatus.PENDING,
    bookingStatus: BookingStatus.CONFIRMED,
    bookingSeats: [
      { id: 12, bookingId: 7, seatId: 2, seatPrice: 250, seat: { id: 2, rowLabel: 'A', seatNumber: 2 } },
      { id: 11, bookingId: 7, seatId: 1, seatPrice: 250, seat: { id: 1, rowLabel: 'A', seatNumber: 1 } },
    ],
    ...overrides,
  });
}

function makeManager(booking: Booking | null) {
  const query = { where: jest.fn(), setLock: jest.fn(), getOne: jest.fn().mockResolvedValue(booking) };
  query.where.mockReturnValue(query);
  return {
    query,
    createQueryBuilder: jest.fn().mockReturnValue(query),
    find: jest.fn().mockResolvedValue(booking?.bookingSeats ?? []),
    insert: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
  };
}

type ManagerMock = ReturnType<typeof makeManager>;

describe('BookingsService', () => {
  let service: BookingsService;
  let bookingRepository: Record<'findOne' | 'find' | 'update' | 'delete', jest.Mock>;
  let bookingSeatRepository: Record<'count', jest.Mock>;
  let dataSource: Record<'transaction' | 'createQueryRunner', jest.Mock> & { options: { type: string } };
  let lockService: Record<'withShowLock', jest.Mock>;

  /** The booking as read before the lock, and the copy re-read inside the transaction. */
  function givenBooking(outside: Booking, inside: Booking = outside): ManagerMock {
    const manager = makeManager(inside);
    bookingRepository.findOne.mockResolvedValue(outside);
    dataSource.transaction.mockImplementation((work: (entityManager: ManagerMock) => Promise<unknown>) =>
      work(manager),
    );
    return manager;
  }

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BookingsService,
        {
          provide: getRepositoryToken(Booking),
          useValue: {
            findOne: jest.fn(),
            find: jest.fn(),
            update: jest.fn(),
            delete: jest.fn(),
          },
        },
        { provide: getRepositoryToken(BookingSeat), useValue: { count: jest.fn() } },
        {
          provide: DataSource,
          useValue: { transaction: jest.fn(), createQueryRunner: jest.fn(), options: { type: 'better-sqlite3' } },
        },
        {
          provide: ReservationLockService,
          useValue: {
            withShowLock: jest.fn((_showId: number, callback: () => Promise<unknown>) => callback()),
          },
        },
      ],
    }).compile();

    service = module.get<BookingsService>(BookingsService);
    bookingRepository = module.get(getRepositoryToken(Booking));
    bookingSeatRepository = module.get(getRepositoryToken(BookingSeat));
    dataSource = module.get(DataSource);
    lockService = module.get(ReservationLockService);
  });

  describe('getBooking', () => {
    it('should list seats in the order they were booked', async () => {
      bookingRepository.findOne.mockResolvedValue(makeBooking());

      const result = await service.getBooking(7);

      expect(result.seats).toEqual([
        { id: 11, seatId: 1, rowLabel: 'A', seatNumber: 1, seatPrice: 250 },
        { id: 12, seatId: 2, rowLabel: 'A', seatNumber: 2, seatPrice: 250 },
      ]);
    });

    it('should throw NotFoundException for an unknown booking', async () => {
      bookingRepository.findOne.mockResolvedValue(null);

      await expect(service.getBooking(404)).rejects.toThrow(NotFoundException);
    });
  });

  describe('cancelBooking', () => {
    it('should mark a confirmed booking as cancelled under the show lock', async () => {
      const manager = givenBooking(makeBooking());

      const result = await service.cancelBooking(7);

      expect(result.bookingStatus).toBe(BookingStatus.CANCELLED);
      expect(lockService.withShowLock).toHaveBeenCalledWith(1, expect.any(Function));
      expect(manager.update).toHaveBeenCalledWith(Booking, { id: 7 }, { bookingStatus: BookingStatus.CANCELLED });
    });

    it('should leave an already cancelled booking untouched', async () => {
      const manager = givenBooking(makeBooking({ bookingStatus: BookingStatus.CANCELLED }));

      const result = await service.cancelBooking(7);

      expect(result.bookingStatus).toBe(BookingStatus.CANCELLED);
      expect(manager.update).not.toHaveBeenCalled();
    });

    it('should decide on the booking as it is inside the lock', async () => {
      const manager = givenBooking(makeBooking(), makeBooking({ bookingStatus: BookingStatus.CANCELLED }));

      await service.cancelBooking(7);

      expect(manager.update).not.toHaveBeenCalled();
    });

    it('should lock the booking row on PostgreSQL', async () => {
      dataSource.options.type = 'postgres';
      const manager = givenBooking(makeBooking());

      await service.cancelBooking(7);

      expect(manager.query.setLock).toHaveBeenCalledWith('pessimistic_write');
    });

    it('should not lock rows on SQLite', async () => {
      const manager = givenBooking(makeBooking());

      await service.cancelBooking(7);

      expect(manager.query.setLock).not.toHaveBeenCalled();
    });
  });

  describe('updatePaymentStatus', () => {
    it('should complete a pending payment', async () => {
      const manager = givenBooking(makeBooking());

      const result = await service.updatePaymentStatus(7, PaymentStatus.COMPLETED);

      expect(result.paymentStatus).toBe(PaymentStatus.COMPLETED);
      expect(manager.update).toHaveBeenCalledWith(Booking, { id: 7 }, { paymentStatus: PaymentStatus.COMPLETED });
    });

    it('should treat the current status as a no-op', async () => {
      const manager = givenBooking(makeBooking({ paymentStatus: PaymentStatus.COMPLETED }));

      await service.updatePaymentStatus(7, PaymentStatus.COMPLETED);

      expect(manager.update).not.toHaveBeenCalled();
    });

    it('should reject refunding a payment that never completed', async () => {
      const manager = givenBooking(makeBooking());

      await expect(service.updatePaymentStatus(7, PaymentStatus.REFUNDED)).rejects.toThrow(
        InvalidStatusTransitionException,
      );
      expect(manager.update).not.toHaveBeenCalled();
    });

    it('should check the transition against the status read inside the lock', async () => {
      const manager = givenBooking(makeBooking(), makeBooking({ paymentStatus: PaymentStatus.FAILED }));

      await expect(service.updatePaymentStatus(7, PaymentStatus.COMPLETED)).rejects.toThrow(
        InvalidStatusTransitionException,
      );
      expect(manager.update).not.toHaveBeenCalled();
    });
  });

  describe('addSeat', () => {
    it('should refuse seats on a cancelled booking', async () => {
      const manager = givenBooking(makeBooking({ bookingStatus: BookingStatus.CANCELLED }));

      await expect(service.addSeat(7, { seatId: 3 })).rejects.toThrow(BadRequestException);
      expect(manager.insert).not.toHaveBeenCalled();
    });

    it('should refuse a booking cancelled while waiting for the lock', async () => {
      const manager = givenBooking(makeBooking(), makeBooking({ bookingStatus: BookingStatus.CANCELLED }));

      await expect(service.addSeat(7, { seatId: 3 })).rejects.toThrow(BadRequestException);
      expect(manager.insert).not.toHaveBeenCalled();
      expect(manager.update).not.toHaveBeenCalled();
    });
  });

  describe('removeSeat', () => {
    it('should throw NotFoundException for a seat outside the booking', async () => {
      const manager = givenBooking(makeBooking());

      await expect(service.removeSeat(7, 99)).rejects.toThrow(NotFoundException);
      expect(manager.delete).not.toHaveBeenCalled();
    });

    it('should delete the booking seat and lower the total', async () => {
      const manager = givenBooking(makeBooking());

      await service.removeSeat(7, 2);

      expect(lockService.withShowLock).toHaveBeenCalledWith(1, expect.any(Function));
      expect(manager.delete).toHaveBeenCalledWith(BookingSeat, { id: 12 });
      expect(manager.update).toHaveBeenCalledWith(Booking, { id: 7 }, { totalAmount: 250 });
    });

    it('should take the price off the total read inside the lock', async () => {
      const fresh = makeBooking({ totalAmount: 750 });
      fresh.bookingSeats.push(
        Object.assign(new BookingSeat(), {
          id: 13,
          bookingId: 7,
          seatId: 3,
          seatPrice: 250,
          seat: { id: 3, rowLabel: 'A', seatNumber: 3 },
        }),
      );
      const manager = givenBooking(makeBooking(), fresh);

      await service.removeSeat(7, 2);

      expect(manager.update).toHaveBeenCalledWith(Booking, { id: 7 }, { totalAmount: 500 });
    });
  });

  describe('deleteBooking', () => {
    it('should refuse while booking seats exist', async () => {
      bookingRepository.findOne.mockResolvedValue(makeBooking());
      bookingSeatRepository.count.mockResolvedValue(2);

      await expect(service.deleteBooking(7)).rejects.toThrow(DependentRowsException);
      expect(bookingRepository.delete).not.toHaveBeenCalled();
    });

    it('should delete with cascade', async () => {
      bookingRepository.findOne.mockResolvedValue(makeBooking());

      await service.deleteBooking(7, true);

      expect(bookingRepository.delete).toHaveBeenCalledWith({ id: 7 });
    });
  });

  describe('getCustomerHistory', () => {
    it('should total confirmed bookings only', async () => {
      const show = {
        showDate: '2026-10-18',
        startTime: '12:15:00',
        movie: { title: 'Dasara', language: 'Telugu', format: '2D' },
        hall: { name: 'Audi 11', theater: { name: 'PVR: Nexus' } },
      };
      bookingRepository.find.mockResolvedValue([
        makeBooking({ id: 9, totalAmount: 250.5, show: Object.assign(new Show(), show) }),
        makeBooking({
          id: 8,
          totalAmount: 700,
          bookingStatus: BookingStatus.CANCELLED,
          show: Object.assign(new Show(), show),
        }),
        makeBooking({ id: 7, totalAmount: 500.25, show: Object.assign(new Show(), show) }),
      ]);

      const history = await service.getCustomerHistory('customer@example.com');

      expect(history.totalBookings).toBe(3);
      expect(history.totalAmount).toBe(750.75);
      expect(history.bookings.map((booking) => booking.id)).toEqual([9, 8, 7]);
      expect(history.bookings[0]).toMatchObject({
        theaterName: 'PVR: Nexus',
        hallName: 'Audi 11',
        movieTitle: 'Dasara',
        showDate: '2026-10-18',
      });
      expect(bookingRepository.find).toHaveBeenCalledWith(
        expect.objectContaining({
          where: { customerEmail: 'customer@example.com' },
          order: { bookingTime: 'DESC', id: 'DESC' },
        }),
      );
    });
  });
});
