import type { Response } from '../../entities/response.js';

/**
 * `auto` sniffs the document (an `objectiveValue` key means the current
 * schema), `legacy` requires `vehicleId` on every item, `current` requires
 * `objectiveValue`.
 */
export type SchemaVariant = 'auto' | 'legacy' | 'current';

export interface ImportOptions {
  schema?: SchemaVariant;
}

export interface ScheduleSourcePort {
  importResponse(path: string, options?: ImportOptions): Promise<Response>;
}
