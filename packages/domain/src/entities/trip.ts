// Trip categories and the movement segments that make up a tour

export type TripType = 'SERVICE' | 'DEADHEAD';

/** Display strings used as chart categories and legend entries. */
export const TRIP_TYPE_LABELS = {
  SERVICE: 'ServiceTrip',
  DEADHEAD: 'DeadHeadTrip',
} as const satisfies Record<TripType, string>;

export type TripTypeLabel = (typeof TRIP_TYPE_LABELS)[TripType];

/**
 * Tour entries are tagged by their JSON key rather than by a field: any key
 * containing "service" (case-insensitive) is a service trip, everything else
 * is a deadhead.
 */
export function tripTypeFromKey(key: string): TripType {
  return key.toLowerCase().includes('service') ? 'SERVICE' : 'DEADHEAD';
}

export interface Trip {
  readonly id?: string;
  readonly type: TripType;
  readonly origin: string;
  readonly destination: string;
  readonly departureTime: Date;
  /** Not checked against departureTime; passed through as given. */
  readonly arrivalTime: Date;
}
