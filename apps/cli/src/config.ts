import os from 'os';
import { z } from 'zod';
import type { SchemaVariant } from '@rolling-stock/domain';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const envSchema = z.object({
  SCHEDULE_SCHEMA: z.enum(['auto', 'legacy', 'current']).default('auto'),
  CHART_OUTPUT_DIR: z.string().min(1).optional(),
  CHART_OPEN: booleanFlag.default('true'),
  CHART_LEGACY_INTERVALS: booleanFlag.default('false'),
});

export interface CliConfig {
  schema: SchemaVariant;
  /** Directory the HTML chart is written to. */
  outputDir: string;
  openViewer: boolean;
  legacyIntervalMapping: boolean;
}

/**
 * Reads settings from the environment (a `.env` file is loaded by the entry
 * point):
 *   SCHEDULE_SCHEMA         auto | legacy | current (default: auto)
 *   CHART_OUTPUT_DIR        output directory (default: OS temp dir)
 *   CHART_OPEN              open the chart after writing it (default: true)
 *   CHART_LEGACY_INTERVALS  reproduce the historical start/finish swap (default: false)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`);
  }
  const vars = parsed.data;
  return {
    schema: vars.SCHEDULE_SCHEMA,
    outputDir: vars.CHART_OUTPUT_DIR ?? os.tmpdir(),
    openViewer: vars.CHART_OPEN,
    legacyIntervalMapping: vars.CHART_LEGACY_INTERVALS,
  };
}
