import { z } from 'zod';
import { tripTypeFromKey } from '@rolling-stock/domain';
import type {
  Response,
  ScheduleItem,
  SchemaVariant,
  Trip,
} from '@rolling-stock/domain';

// Optimizer timestamps: `YYYY-MM-DD`, optionally followed by a `T` or space
// separated time and an optional `Z` or `±HH:MM` offset.
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-](\d{2}):(\d{2}))?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses an ISO-8601 timestamp. Values without an offset are local
 * wall-clock time, as the optimizer writes them. Calendar fields out of
 * range (February 30th, hour 24) are rejected rather than rolled over.
 */
export function parseTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value);
  if (!match) return null;
  // Absent time and offset groups are undefined and take the defaults.
  const [, year, month, day, hour = '0', minute = '0', second = '0', , offsetHour = '0', offsetMinute = '0'] =
    match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return null;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;
  if (Number(offsetHour) > 23 || Number(offsetMinute) > 59) return null;

  const normalized = value.length === 10 ? `${value}T00:00:00` : value.replace(' ', 'T');
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

const timestampSchema = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ISO-8601 timestamp: "${value}"`,
    });
    return z.NEVER;
  }
  return date;
});

// Integers may arrive as numbers or as digit strings.
const countSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, 'Expected an integer')])
  .pipe(z.coerce.number().int().nonnegative());

export const objectiveValueSchema = z.object({
  numberOfUnservedPassengers: countSchema,
  numberOfVehicles: countSchema,
  seatDistanceTraveled: countSchema,
});

const tripPayloadSchema = z.object({
  id: z.string().nullish(),
  origin: z.string(),
  destination: z.string(),
  departure_time: timestampSchema,
  arrival_time: timestampSchema,
});

/**
 * A tour entry is an object keyed by trip category, normally with a single
 * key. Every key becomes one trip, in key order.
 */
const tourEntrySchema = z
  .record(z.string(), tripPayloadSchema)
  .refine((entry) => Object.keys(entry).length > 0, {
    message: 'Tour entry must contain a trip',
  })
  // Object.entries lists integer-like keys first, ascending, then the rest in
  // insertion order. Category keys are never numeric in practice.
  .transform((entry): Trip[] =>
    Object.entries(entry).map(([key, payload]) => ({
      ...(payload.id != null ? { id: payload.id } : {}),
      type: tripTypeFromKey(key),
      origin: payload.origin,
      destination: payload.destination,
      departureTime: payload.departure_time,
      arrivalTime: payload.arrival_time,
    })),
  );

function scheduleItemSchema(requireVehicleId: boolean) {
  return z
    .object({
      vehicleId: requireVehicleId ? z.string() : z.string().optional(),
      vehicleType: z.string(),
      startDepot: z.string(),
      endDepot: z.string(),
      tour: z.array(tourEntrySchema),
    })
    .transform(
      (item): ScheduleItem => ({
        ...(item.vehicleId !== undefined ? { vehicleId: item.vehicleId } : {}),
        vehicleType: item.vehicleType,
        startDepot: item.startDepot,
        endDepot: item.endDepot,
        trips: item.tour.flat(),
      }),
    );
}

/** Builds the document schema for a schema variant. */
export function responseSchema(variant: SchemaVariant) {
  const objectiveValue =
    variant === 'current' ? objectiveValueSchema : objectiveValueSchema.optional();
  return z
    .object({
      objectiveValue,
      schedule: z.array(scheduleItemSchema(variant === 'legacy')),
    })
    .transform(
      (doc): Response => ({
        ...(doc.objectiveValue ? { objectiveValue: doc.objectiveValue } : {}),
        schedule: doc.schedule,
      }),
    );
}

/** Detects which historical schema a parsed document was written with. */
export function detectSchemaVariant(document: unknown): Exclude<SchemaVariant, 'auto'> {
  return typeof document === 'object' && document !== null && 'objectiveValue' in document
    ? 'current'
    : 'legacy';
}
