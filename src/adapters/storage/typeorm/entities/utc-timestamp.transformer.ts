import { ValueTransformer } from 'typeorm';
import { formatUtcTimestamp, parseUtcTimestamp } from '../../../../core';

/**
 * Persist Date as a sortable `YYYY-MM-DD HH:MM:SS` UTC string
 */
export const utcTimestampTransformer: ValueTransformer = {
  to: (value: Date | string | null | undefined) =>
    value instanceof Date ? formatUtcTimestamp(value) : value,
  from: (value: string | null) => (value === null ? null : parseUtcTimestamp(value)),
};
