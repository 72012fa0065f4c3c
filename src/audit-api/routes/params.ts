import { z } from 'zod';
import { EVENT_TYPES } from '@shared/constants';

export const isoTimestampParam = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO-8601 timestamp' });

/** Comma-separated event types, e.g. `?eventTypes=run_failed,log_entry`. */
export const eventTypesParam = z
  .string()
  .optional()
  .transform((value) =>
    value
      ? value
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part !== '')
      : [],
  )
  .pipe(z.array(z.enum(EVENT_TYPES)));

export const daysParam = z.coerce.number().int().min(1).max(365);

export const limitParam = z.coerce.number().int().min(1).max(100);

export const gapMinutesParam = z.coerce.number().positive().max(24 * 60);
