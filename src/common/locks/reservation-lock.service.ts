import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

/**
 * Serializes seat reservations in this process.
 *
 * The lock must wrap the whole DB transaction: acquire → begin → check availability →
 * insert → commit → release. Across processes the PostgreSQL path additionally takes a
 * row lock on the show inside the transaction.
 *
 * SQLite runs every transaction on one shared connection, so there all locked work
 * shares a single key.
 */
@Injectable()
export class ReservationLockService {
  private static readonly SQLITE_KEY = 'sqlite';

  private readonly logger = new Logger(ReservationLockService.name);
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly dataSource: DataSource) {}

  async withShowLock<T>(showId: number, callback: () => Promise<T>): Promise<T> {
    return this.withLock(this.keyFor(`show:${showId}`), callback);
  }

  async withDatabaseLock<T>(name: string, callback: () => Promise<T>): Promise<T> {
    return this.withLock(this.keyFor(name), callback);
  }

  async withLock<T>(key: string, callback: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    this.logger.debug(`Lock acquired: ${key}`);

    try {
      return await callback();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
      this.logger.debug(`Lock released: ${key}`);
    }
  }

  isHeld(key: string): boolean {
    return this.tails.has(key);
  }

  private keyFor(name: string): string {
    return this.dataSource.options.type === 'better-sqlite3' ? ReservationLockService.SQLITE_KEY : name;
  }
}
