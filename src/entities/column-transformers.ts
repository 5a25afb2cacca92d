import { ValueTransformer } from 'typeorm';

/** node-postgres hands decimals back as strings; SQLite hands back numbers. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
