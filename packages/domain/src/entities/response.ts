import type { ObjectiveValue } from './objective-value.js';
import type { ScheduleItem } from './schedule-item.js';
import type { TripType } from './trip.js';

/**
 * Root of an imported optimizer response. `objectiveValue` is absent for
 * documents written with the legacy schema.
 */
export interface Response {
  readonly objectiveValue?: ObjectiveValue;
  readonly schedule: ReadonlyArray<ScheduleItem>;
}

export interface ResponseSummary {
  vehicles: number;
  trips: number;
  serviceTrips: number;
  deadheadTrips: number;
  objectiveValue?: ObjectiveValue;
}

export function countTrips(response: Response): number {
  return response.schedule.reduce((sum, item) => sum + item.trips.length, 0);
}

export function countTripsOfType(response: Response, type: TripType): number {
  let count = 0;
  for (const item of response.schedule) {
    for (const trip of item.trips) {
      if (trip.type === type) count++;
    }
  }
  return count;
}

export function summarizeResponse(response: Response): ResponseSummary {
  return {
    vehicles: response.schedule.length,
    trips: countTrips(response),
    serviceTrips: countTripsOfType(response, 'SERVICE'),
    deadheadTrips: countTripsOfType(response, 'DEADHEAD'),
    ...(response.objectiveValue ? { objectiveValue: response.objectiveValue } : {}),
  };
}
