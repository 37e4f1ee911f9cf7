// Solver-reported quality metrics (current schema only)

export interface ObjectiveValue {
  readonly numberOfUnservedPassengers: number;
  readonly numberOfVehicles: number;
  readonly seatDistanceTraveled: number;
}
