import { Theater } from './theater.entity';
import { Hall } from './hall.entity';
import { Movie } from './movie.entity';
import { Seat } from './seat.entity';
import { Show } from './show.entity';
import { Booking } from './booking.entity';
import { BookingSeat } from './booking-seat.entity';

export { Theater, Hall, Movie, Seat, Show, Booking, BookingSeat };
export { BookingStatus, PaymentStatus } from './booking.entity';
export { UNIQUE_CONSTRAINTS, CHECK_CONSTRAINTS, FOREIGN_KEYS } from './constraints';

export const ENTITIES = [Theater, Hall, Movie, Seat, Show, Booking, BookingSeat];
