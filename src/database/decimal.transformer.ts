import { ValueTransformer } from 'typeorm';

/** PostgreSQL hands DECIMAL back as a string; SQLite as a number. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
