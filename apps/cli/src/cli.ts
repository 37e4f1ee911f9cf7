import path from 'path';
import { z } from 'zod';
import { summarizeResponse } from '@rolling-stock/domain';
import type {
  ChartViewerPort,
  ResponseSummary,
  ScheduleSourcePort,
} from '@rolling-stock/domain';
import {
  JsonScheduleSource,
  SystemChartViewer,
  renderGantt,
  writeChartHtml,
} from '@rolling-stock/adapters';
import { loadConfig } from './config.js';
import type { CliConfig } from './config.js';

export const USAGE = 'Usage: npm start -- <response.json>';

export class CliUsageError extends Error {
  constructor(detail: string) {
    super(`${detail}\n${USAGE}`);
    this.name = 'CliUsageError';
  }
}

export interface CliOptions {
  source: string;
}

const argsSchema = z.tuple([
  z
    .string()
    .min(1)
    .refine((arg) => !arg.startsWith('-'), { message: 'Options are not supported' }),
]);

/** Exactly one positional argument: the response file to render. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const parsed = argsSchema.safeParse(argv.filter((arg) => arg !== '--'));
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? 'Invalid arguments';
    throw new CliUsageError(detail);
  }
  const [source] = parsed.data;
  return { source };
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatSummary(summary: ResponseSummary): string {
  const parts = [
    plural(summary.vehicles, 'vehicle'),
    `${plural(summary.trips, 'trip')} (${summary.serviceTrips} service, ${summary.deadheadTrips} deadhead)`,
  ];
  const objective = summary.objectiveValue;
  if (objective) {
    parts.push(
      `objective: ${objective.numberOfUnservedPassengers} unserved passengers, ` +
        `${plural(objective.numberOfVehicles, 'vehicle')}, ` +
        `${objective.seatDistanceTraveled} seat distance`,
    );
  }
  return parts.join(', ');
}

export function chartTitle(source: string): string {
  return `Rolling stock schedule: ${path.parse(source).name}`;
}

export interface CliDeps {
  config?: CliConfig;
  scheduleSource?: ScheduleSourcePort;
  viewer?: ChartViewerPort;
}

/** Imports a response file, renders it and shows the chart. Returns the chart path. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<string> {
  const { source } = parseCliArgs(argv);
  const config = deps.config ?? loadConfig();
  const scheduleSource = deps.scheduleSource ?? new JsonScheduleSource();

  console.log(`Render visualization: ${source}`);
  const response = await scheduleSource.importResponse(source, { schema: config.schema });
  console.log(`[cli] ${formatSummary(summarizeResponse(response))}`);

  const chart = renderGantt(response, chartTitle(source), {
    legacyIntervalMapping: config.legacyIntervalMapping,
  });
  const written = await writeChartHtml(chart, { outputDir: config.outputDir });
  console.log(`[cli] chart written to ${written}`);

  if (config.openViewer) {
    const viewer = deps.viewer ?? new SystemChartViewer();
    await viewer.open(written);
  }
  return written;
}
