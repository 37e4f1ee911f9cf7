import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { GanttChart } from './gantt-chart.builder.js';

const CHART_JS_CDN = 'https://cdn.jsdelivr.net/npm/chart.js@4';

// Browser bundle names shipped in chart.js/dist across 4.x releases.
const BUNDLE_NAMES = ['chart.umd.js', 'chart.umd.min.js'];

export interface WriteChartOptions {
  outputDir: string;
  /** Defaults to a slug of the chart title. */
  fileName?: string;
  /**
   * Chart.js browser bundle to inline. When omitted the installed package's
   * bundle is used, or the CDN build if none is found.
   */
  chartScript?: string;
  /** Locates the Chart.js bundle when `chartScript` is omitted. */
  resolveBundle?: () => string | null;
}

/** Path of the installed Chart.js browser bundle, if any. */
export function resolveChartBundle(): string | null {
  let entry: string;
  try {
    entry = require.resolve('chart.js');
  } catch {
    return null;
  }
  const distDir = path.dirname(entry);
  for (const name of BUNDLE_NAMES) {
    const candidate = path.join(distDir, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'chart';
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// JSON embedded in a <script> element must not close it.
function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

async function chartScriptTag(options: WriteChartOptions): Promise<string> {
  if (options.chartScript !== undefined) {
    return `<script>${options.chartScript}</script>`;
  }
  const bundle = (options.resolveBundle ?? resolveChartBundle)();
  if (!bundle) {
    console.warn('[chart] chart.js bundle not found locally, linking the CDN build');
    return `<script src="${CHART_JS_CDN}"></script>`;
  }
  return `<script>${await readFile(bundle, 'utf-8')}</script>`;
}

// Axis ticks and tooltips need functions, which JSON cannot carry.
const BOOTSTRAP = `
const config = JSON.parse(document.getElementById('chart-config').textContent);
const formatTime = (ms) =>
  new Date(ms).toLocaleString(undefined, { dateStyle: 'short', timeStyle: 'short' });
config.options.scales.x.ticks = { callback: (value) => formatTime(value) };
config.options.plugins.tooltip = {
  callbacks: {
    label: (ctx) => {
      const bar = ctx.raw;
      const trip = bar.tripId ? bar.tripId + ' ' : '';
      return ctx.dataset.label + ' ' + trip + bar.origin + ' \\u2192 ' + bar.destination +
        ' (' + formatTime(bar.x[0]) + ' - ' + formatTime(bar.x[1]) + ')';
    },
  },
};
new Chart(document.getElementById('chart'), config);
`;

export function renderChartHtml(chart: GanttChart, scriptTag: string): string {
  const height = Math.max(320, chart.tasks.length * 48 + 160);
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(chart.title)}</title>`,
    scriptTag,
    '</head>',
    '<body>',
    `<div style="position: relative; height: ${height}px">`,
    '<canvas id="chart"></canvas>',
    '</div>',
    `<script type="application/json" id="chart-config">${scriptSafeJson(chart.config)}</script>`,
    `<script>${BOOTSTRAP}</script>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/** Writes the chart as a standalone HTML page and returns its path. */
export async function writeChartHtml(chart: GanttChart, options: WriteChartOptions): Promise<string> {
  const fileName = options.fileName ?? `${slugify(chart.title)}.html`;
  const target = path.resolve(options.outputDir, fileName);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, renderChartHtml(chart, await chartScriptTag(options)), 'utf-8');
  return target;
}
