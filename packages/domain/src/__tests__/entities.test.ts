/**
 * Schedule Model Tests
 *
 * The domain package exports readonly interfaces plus a few pure helpers.
 * These tests cover trip-type derivation from tour keys, vehicle labels,
 * summary counts and the error taxonomy.
 */

import { describe, it, expect } from '@jest/globals';

import {
  TRIP_TYPE_LABELS,
  tripTypeFromKey,
  vehicleLabel,
  countTrips,
  countTripsOfType,
  summarizeResponse,
  ScheduleImportError,
  FileAccessError,
  MalformedInputError,
  SchemaValidationError,
} from '../index.js';
import type { Trip, ScheduleItem, Response, ObjectiveValue } from '../index.js';

// ─── Factory helpers ──────────────────────────────────────────────────────────

function makeTrip(overrides: Partial<Trip> = {}): Trip {
  return {
    id: 'trip-1',
    type: 'SERVICE',
    origin: 'Aarau',
    destination: 'Olten',
    departureTime: new Date(2024, 0, 1, 8, 0),
    arrivalTime: new Date(2024, 0, 1, 8, 30),
    ...overrides,
  };
}

function makeItem(overrides: Partial<ScheduleItem> = {}): ScheduleItem {
  return {
    vehicleType: 'IC2000',
    startDepot: 'depot-north',
    endDepot: 'depot-north',
    trips: [makeTrip()],
    ...overrides,
  };
}

const OBJECTIVE: ObjectiveValue = {
  numberOfUnservedPassengers: 12,
  numberOfVehicles: 2,
  seatDistanceTraveled: 48000,
};

// ═══════════════════════════════════════════════════════════════════════════════
// Test Suites
// ═══════════════════════════════════════════════════════════════════════════════

describe('tripTypeFromKey', () => {
  it.each(['ServiceTrip', 'serviceTrip', 'SERVICE', 'extraServiceLeg'])(
    'maps %s to SERVICE',
    (key) => {
      expect(tripTypeFromKey(key)).toBe('SERVICE');
    },
  );

  it.each(['DeadHeadTrip', 'deadhead', 'serv1ce', ''])('maps %s to DEADHEAD', (key) => {
    expect(tripTypeFromKey(key)).toBe('DEADHEAD');
  });

  it('display labels match the chart categories', () => {
    expect(TRIP_TYPE_LABELS.SERVICE).toBe('ServiceTrip');
    expect(TRIP_TYPE_LABELS.DEADHEAD).toBe('DeadHeadTrip');
  });
});

describe('vehicleLabel', () => {
  it('uses the vehicle id when present', () => {
    expect(vehicleLabel(makeItem({ vehicleId: 'veh-7' }), 3)).toBe('veh-7');
  });

  it('numbers the vehicle type by 1-based position otherwise', () => {
    expect(vehicleLabel(makeItem(), 0)).toBe('IC2000 1');
    expect(vehicleLabel(makeItem({ vehicleType: 'FLIRT' }), 2)).toBe('FLIRT 3');
  });
});

describe('Response helpers', () => {
  const response: Response = {
    objectiveValue: OBJECTIVE,
    schedule: [
      makeItem({ trips: [makeTrip(), makeTrip({ type: 'DEADHEAD' })] }),
      makeItem({ trips: [makeTrip({ id: 'trip-2' })] }),
      makeItem({ trips: [] }),
    ],
  };

  it('countTrips sums trips over all vehicles', () => {
    expect(countTrips(response)).toBe(3);
  });

  it('countTripsOfType filters by type', () => {
    expect(countTripsOfType(response, 'SERVICE')).toBe(2);
    expect(countTripsOfType(response, 'DEADHEAD')).toBe(1);
  });

  it('summarizeResponse includes the objective value when present', () => {
    expect(summarizeResponse(response)).toEqual({
      vehicles: 3,
      trips: 3,
      serviceTrips: 2,
      deadheadTrips: 1,
      objectiveValue: OBJECTIVE,
    });
  });

  it('summarizeResponse omits the objective value for legacy responses', () => {
    const summary = summarizeResponse({ schedule: [makeItem({ vehicleId: 'v1' })] });
    expect(summary).toEqual({ vehicles: 1, trips: 1, serviceTrips: 1, deadheadTrips: 0 });
    expect('objectiveValue' in summary).toBe(false);
  });
});

describe('Error taxonomy', () => {
  it('all import errors extend ScheduleImportError', () => {
    expect(new FileAccessError('x')).toBeInstanceOf(ScheduleImportError);
    expect(new MalformedInputError('x')).toBeInstanceOf(ScheduleImportError);
    expect(new SchemaValidationError([])).toBeInstanceOf(ScheduleImportError);
  });

  it('sets name from the concrete class', () => {
    expect(new FileAccessError('x').name).toBe('FileAccessError');
    expect(new MalformedInputError('x').name).toBe('MalformedInputError');
  });

  it('keeps the source path and cause', () => {
    const cause = new Error('ENOENT');
    const err = new FileAccessError('cannot read', 'a.json', { cause });
    expect(err.source).toBe('a.json');
    expect(err.cause).toBe(cause);
  });

  it('SchemaValidationError lists every issue in its message', () => {
    const err = new SchemaValidationError(
      [
        { path: 'schedule.0.tour.1.ServiceTrip.origin', message: 'Required' },
        { path: '', message: 'Expected object' },
      ],
      'out.json',
    );
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe(
      [
        'Invalid schedule in out.json:',
        '  schedule.0.tour.1.ServiceTrip.origin: Required',
        '  (root): Expected object',
      ].join('\n'),
    );
  });
});
