import type { Trip } from './trip.js';

export interface ScheduleItem {
  /** Only written by the legacy schema. */
  readonly vehicleId?: string;
  readonly vehicleType: string;
  readonly startDepot: string;
  readonly endDepot: string;
  /** Operational order of the tour, exactly as in the input. */
  readonly trips: ReadonlyArray<Trip>;
}

/**
 * Row label for a vehicle: its id when the schema provides one, otherwise
 * its type numbered by 1-based position in the schedule.
 */
export function vehicleLabel(item: ScheduleItem, index: number): string {
  return item.vehicleId ?? `${item.vehicleType} ${index + 1}`;
}
