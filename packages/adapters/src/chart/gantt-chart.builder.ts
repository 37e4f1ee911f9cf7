import type { ChartConfiguration } from 'chart.js';
import { TRIP_TYPE_LABELS, vehicleLabel } from '@rolling-stock/domain';
import type { Response, TripTypeLabel } from '@rolling-stock/domain';

/** Fixed palette keyed by trip category. */
export const CHART_COLORS: Readonly<Record<TripTypeLabel, string>> = {
  ServiceTrip: 'rgb(220, 0, 0)',
  DeadHeadTrip: 'rgb(255, 230, 41)',
};

const CATEGORY_ORDER: readonly TripTypeLabel[] = [
  TRIP_TYPE_LABELS.SERVICE,
  TRIP_TYPE_LABELS.DEADHEAD,
];

/** One timed interval of the chart: a single trip of a single vehicle. */
export interface GanttRow {
  readonly task: string;
  readonly start: Date;
  readonly finish: Date;
  readonly type: TripTypeLabel;
  readonly origin: string;
  readonly destination: string;
  readonly tripId?: string;
}

export interface FlattenOptions {
  /**
   * Fill `start` from the arrival time and `finish` from the departure
   * time, as charts rendered by earlier releases did.
   */
  legacyIntervalMapping?: boolean;
}

/** Floating bar as handed to Chart.js: `x` is [start, finish] in epoch ms. */
export interface GanttBar {
  x: [number, number];
  y: string;
  origin: string;
  destination: string;
  tripId?: string;
}

export type GanttChartConfiguration = ChartConfiguration<'bar', GanttBar[], string>;

export interface GanttChart {
  readonly title: string;
  readonly rows: ReadonlyArray<GanttRow>;
  /** Vehicle labels in first-appearance order, one chart row each. */
  readonly tasks: ReadonlyArray<string>;
  readonly config: GanttChartConfiguration;
}

export function flattenResponse(response: Response, options: FlattenOptions = {}): GanttRow[] {
  const rows: GanttRow[] = [];
  response.schedule.forEach((item, index) => {
    const task = vehicleLabel(item, index);
    for (const trip of item.trips) {
      const [start, finish] = options.legacyIntervalMapping
        ? [trip.arrivalTime, trip.departureTime]
        : [trip.departureTime, trip.arrivalTime];
      rows.push({
        task,
        start,
        finish,
        type: TRIP_TYPE_LABELS[trip.type],
        origin: trip.origin,
        destination: trip.destination,
        ...(trip.id !== undefined ? { tripId: trip.id } : {}),
      });
    }
  });
  return rows;
}

function groupTasks(rows: ReadonlyArray<GanttRow>): string[] {
  return [...new Set(rows.map((row) => row.task))];
}

function timeBounds(rows: ReadonlyArray<GanttRow>): { min: number; max: number } | null {
  if (rows.length === 0) return null;
  return rows.reduce(
    (bounds, row) => {
      const a = row.start.getTime();
      const b = row.finish.getTime();
      return { min: Math.min(bounds.min, a, b), max: Math.max(bounds.max, a, b) };
    },
    { min: Infinity, max: -Infinity },
  );
}

function toBar(row: GanttRow): GanttBar {
  return {
    x: [row.start.getTime(), row.finish.getTime()],
    y: row.task,
    origin: row.origin,
    destination: row.destination,
    ...(row.tripId !== undefined ? { tripId: row.tripId } : {}),
  };
}

/**
 * Builds a horizontal floating-bar chart: one row per vehicle, one bar per
 * trip, coloured by trip category. Both categories share a vehicle row.
 */
export function buildGanttConfig(
  rows: ReadonlyArray<GanttRow>,
  title: string,
): GanttChartConfiguration {
  const bounds = timeBounds(rows);

  return {
    type: 'bar',
    data: {
      labels: groupTasks(rows),
      datasets: CATEGORY_ORDER.map((category) => ({
        label: category,
        data: rows.filter((row) => row.type === category).map(toBar),
        backgroundColor: CHART_COLORS[category],
        borderColor: CHART_COLORS[category],
        borderWidth: 1,
        grouped: false,
        barPercentage: 0.6,
      })),
    },
    options: {
      indexAxis: 'y',
      responsive: true,
      maintainAspectRatio: false,
      scales: {
        x: {
          type: 'linear',
          position: 'top',
          ...(bounds ? { min: bounds.min, max: bounds.max } : {}),
          grid: { display: true },
          title: { display: true, text: 'Time' },
        },
        y: {
          type: 'category',
          grid: { display: true },
        },
      },
      plugins: {
        title: { display: true, text: title },
        legend: { display: true, position: 'top' },
      },
    },
  };
}

/** Flattens a response and builds its chart. */
export function renderGantt(
  response: Response,
  title: string,
  options: FlattenOptions = {},
): GanttChart {
  const rows = flattenResponse(response, options);
  return {
    title,
    rows,
    tasks: groupTasks(rows),
    config: buildGanttConfig(rows, title),
  };
}
