import { QueryFailedError } from 'typeorm';
import { UNIQUE_CONSTRAINTS } from '../../entities/constraints';
import { ConstraintKind, ConstraintViolationException } from './catalog.exceptions';

const POSTGRES_CODES: Record<string, ConstraintKind> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23502': 'not_null',
  '23514': 'check',
};

const SQLITE_CODES: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
  SQLITE_CONSTRAINT_CHECK: 'check',
};

interface DriverErrorFields {
  code?: string;
  constraint?: string;
  table?: string;
  column?: string;
  message?: string;
}

function readDriverError(error: QueryFailedError): DriverErrorFields {
  const source: unknown = error.driverError;
  if (typeof source !== 'object' || source === null) {
    return { message: error.message };
  }
  const pick = (key: string): string | undefined => {
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'string' ? value : undefined;
  };
  return {
    code: pick('code'),
    constraint: pick('constraint'),
    table: pick('table'),
    column: pick('column'),
    message: pick('message') ?? error.message,
  };
}

/** Maps `UNIQUE constraint failed: shows.hallId, shows.showDate, shows.startTime` to its name. */
function sqliteUniqueConstraintName(message: string): string {
  const columnsPart = message.split('constraint failed:')[1]?.trim() ?? '';
  const qualified = columnsPart.split(',').map((column) => column.trim());
  const table = qualified[0]?.split('.')[0] ?? '';
  const columns = qualified.map((column) => column.split('.')[1] ?? column);

  const known = Object.values(UNIQUE_CONSTRAINTS).find(
    (definition) =>
      definition.table === table &&
      definition.columns.length === columns.length &&
      definition.columns.every((column) => columns.includes(column)),
  );
  return known?.name ?? `UNIQUE:${columnsPart}`;
}

function sqliteConstraintName(kind: ConstraintKind, message: string): string {
  const subject = message.split('constraint failed:')[1]?.trim();
  switch (kind) {
    case 'unique':
      return sqliteUniqueConstraintName(message);
    case 'check':
      return subject ?? 'CHECK';
    case 'not_null':
      return `NOT_NULL:${subject ?? 'unknown'}`;
    case 'foreign_key':
      return 'FOREIGN_KEY';
  }
}

/**
 * Turns a driver-level constraint failure into a ConstraintViolationException that names
 * the constraint. Anything that is not a constraint failure is returned unchanged.
 */
export function translateDatabaseError(error: unknown): unknown {
  if (!(error instanceof QueryFailedError)) {
    return error;
  }

  const fields = readDriverError(error);
  const code = fields.code ?? '';
  const message = fields.message ?? '';

  const postgresKind = POSTGRES_CODES[code];
  if (postgresKind) {
    const constraint =
      postgresKind === 'not_null'
        ? `NOT_NULL:${fields.table ?? 'unknown'}.${fields.column ?? 'unknown'}`
        : (fields.constraint ?? code);
    return new ConstraintViolationException(constraint, postgresKind, message);
  }

  const sqliteKind = SQLITE_CODES[code];
  if (sqliteKind) {
    const detail =
      sqliteKind === 'foreign_key' ? `${message} (SQLite does not report which foreign key failed)` : message;
    return new ConstraintViolationException(sqliteConstraintName(sqliteKind, message), sqliteKind, detail);
  }

  return error;
}
