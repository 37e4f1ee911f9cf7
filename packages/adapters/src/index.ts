// ─── JSON Import ──────────────────────────────────────────────────────────────
export {
  importResponse,
  parseResponse,
  JsonScheduleSource,
} from './json/json-schedule.importer.js';
export type { ParseOptions } from './json/json-schedule.importer.js';
export {
  responseSchema,
  objectiveValueSchema,
  detectSchemaVariant,
  parseTimestamp,
} from './json/schedule-json.schema.js';

// ─── Gantt Chart ──────────────────────────────────────────────────────────────
export {
  CHART_COLORS,
  flattenResponse,
  buildGanttConfig,
  renderGantt,
} from './chart/gantt-chart.builder.js';
export type {
  GanttRow,
  GanttBar,
  GanttChart,
  GanttChartConfiguration,
  FlattenOptions,
} from './chart/gantt-chart.builder.js';
export {
  writeChartHtml,
  renderChartHtml,
  resolveChartBundle,
} from './chart/html-chart.writer.js';
export type { WriteChartOptions } from './chart/html-chart.writer.js';
export { SystemChartViewer, viewerCommand } from './chart/system-chart-viewer.js';

// ─── Sample Data ──────────────────────────────────────────────────────────────
export { locateSampleResponse } from './data/access.js';
export type { SampleVariant } from './data/access.js';
