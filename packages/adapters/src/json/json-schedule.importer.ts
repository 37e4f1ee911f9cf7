import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import {
  FileAccessError,
  MalformedInputError,
  SchemaValidationError,
  vehicleLabel,
} from '@rolling-stock/domain';
import type {
  ImportOptions,
  Response,
  ScheduleSourcePort,
  SchemaIssue,
} from '@rolling-stock/domain';
import { detectSchemaVariant, responseSchema } from './schedule-json.schema.js';

export interface ParseOptions extends ImportOptions {
  /** File the document came from, used in error messages. */
  source?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toSchemaIssues(err: ZodError): SchemaIssue[] {
  return err.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validates an already-parsed JSON document and builds the schedule model.
 * Throws SchemaValidationError listing every problem found; nothing is
 * returned for a partially valid document.
 */
export function parseResponse(document: unknown, options: ParseOptions = {}): Response {
  const variant = options.schema ?? 'auto';
  const result = responseSchema(variant).safeParse(document);
  if (!result.success) {
    throw new SchemaValidationError(toSchemaIssues(result.error), options.source);
  }
  warnOnReversedTrips(result.data, options.source);
  return result.data;
}

// Chronology is not validated, only reported.
function warnOnReversedTrips(response: Response, source?: string): void {
  response.schedule.forEach((item, index) => {
    item.trips.forEach((trip, tripIndex) => {
      if (trip.arrivalTime.getTime() < trip.departureTime.getTime()) {
        console.warn(
          `[importer] ${source ?? 'response'}: ${vehicleLabel(item, index)} trip ${
            trip.id ?? `#${tripIndex + 1}`
          } arrives before it departs`,
        );
      }
    });
  });
}

/** Reads and validates an optimizer response file. */
export async function importResponse(path: string, options: ImportOptions = {}): Promise<Response> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new FileAccessError(`Cannot read ${path}: ${errorMessage(err)}`, path, { cause: err });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new MalformedInputError(`${path} is not valid JSON: ${errorMessage(err)}`, path, {
      cause: err,
    });
  }

  if ((options.schema ?? 'auto') === 'auto') {
    console.log(`[importer] ${path}: detected ${detectSchemaVariant(document)} schema`);
  }
  return parseResponse(document, { ...options, source: path });
}

export class JsonScheduleSource implements ScheduleSourcePort {
  importResponse(path: string, options?: ImportOptions): Promise<Response> {
    return importResponse(path, options);
  }
}
