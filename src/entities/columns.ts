import type { ColumnType, ValueTransformer } from 'typeorm';
import { resolveDbType } from '../config/config';

// Postgres has no 'datetime'; sqlite (dev/test) has no 'timestamptz'
export const timestampType: ColumnType = resolveDbType() === 'postgres' ? 'timestamptz' : 'datetime';

// GitHub ids are 64-bit; pg hands bigint back as a string
export const bigintToNumber: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
