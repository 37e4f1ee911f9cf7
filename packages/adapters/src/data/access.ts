import path from 'path';

export type SampleVariant = 'current' | 'legacy';

const DATA_DIR = path.resolve(__dirname, '../../data');

const SAMPLE_FILES: Record<SampleVariant, string> = {
  current: 'sample-response.json',
  legacy: 'sample-response-legacy.json',
};

/** Absolute path of a bundled sample optimizer response (4 vehicles). */
export function locateSampleResponse(variant: SampleVariant = 'current'): string {
  return path.join(DATA_DIR, SAMPLE_FILES[variant]);
}
