import { BadRequestException, ConflictException } from '@nestjs/common';

export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null' | 'check';

/** A write was rejected by the schema. `constraint` names the rule that failed. */
export class ConstraintViolationException extends ConflictException {
  constructor(
    readonly constraint: string,
    readonly kind: ConstraintKind,
    detail?: string,
  ) {
    super({
      errorCode: 'CONSTRAINT_VIOLATION',
      message: `Constraint ${constraint} violated${detail ? `: ${detail}` : ''}`,
      details: { constraint, kind },
    });
  }
}

/** Raised by a non-cascading delete when the row still has dependents. */
export class DependentRowsException extends ConflictException {
  constructor(entity: string, id: number, dependents: Record<string, number>) {
    const summary = Object.entries(dependents)
      .map(([name, count]) => `${count} ${name}`)
      .join(', ');
    super({
      errorCode: 'HAS_DEPENDENTS',
      message: `${entity} ${id} still has ${summary}; delete with cascade=true to remove them as well`,
      details: { entity, id, dependents },
    });
  }
}

export class SeatsAlreadyBookedException extends ConflictException {
  constructor(showId: number, seatLabels: string[]) {
    super({
      errorCode: 'SEATS_ALREADY_BOOKED',
      message: `Seats already booked for show ${showId}: ${seatLabels.join(', ')}`,
      details: { showId, seats: seatLabels },
    });
  }
}

export class InsufficientAvailabilityException extends ConflictException {
  constructor(showId: number, requested: number, available: number) {
    super({
      errorCode: 'INSUFFICIENT_AVAILABILITY',
      message: `Show ${showId} has ${available} seats available, ${requested} requested`,
      details: { showId, requested, available },
    });
  }
}

export class InvalidStatusTransitionException extends BadRequestException {
  constructor(field: string, from: string, to: string) {
    super({
      errorCode: 'INVALID_STATUS_TRANSITION',
      message: `Cannot change ${field} from ${from} to ${to}`,
      details: { field, from, to },
    });
  }
}

/** A hall's capacity may not drop below the Confirmed seats of any of its shows. */
export class CapacityBelowBookingsException extends ConflictException {
  constructor(hallId: number, seatingCapacity: number, shows: { showId: number; bookedSeats: number }[]) {
    super({
      errorCode: 'CAPACITY_BELOW_BOOKINGS',
      message: `Hall ${hallId} cannot shrink to ${seatingCapacity} seats: ${shows
        .map((show) => `show ${show.showId} has ${show.bookedSeats} booked`)
        .join(', ')}`,
      details: { hallId, seatingCapacity, shows },
    });
  }
}

/** Bookings pin a show to its hall. */
export class ShowHasBookingsException extends ConflictException {
  constructor(showId: number, bookings: number) {
    super({
      errorCode: 'SHOW_HAS_BOOKINGS',
      message: `Show ${showId} has ${bookings} bookings and cannot move to another hall`,
      details: { showId, bookings },
    });
  }
}
