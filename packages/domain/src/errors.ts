// Failures raised while loading a schedule. None of them are recovered
// internally; callers report them and stop.

export interface SchemaIssue {
  /** Dotted JSON path, e.g. `schedule.0.tour.2.origin`. Empty for the root. */
  readonly path: string;
  readonly message: string;
}

export class ScheduleImportError extends Error {
  constructor(
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The file is missing or cannot be read. */
export class FileAccessError extends ScheduleImportError {}

/** The file content is not valid JSON. */
export class MalformedInputError extends ScheduleImportError {}

/** Valid JSON that does not match the schedule schema. */
export class SchemaValidationError extends ScheduleImportError {
  readonly issues: ReadonlyArray<SchemaIssue>;

  constructor(issues: ReadonlyArray<SchemaIssue>, source?: string) {
    super(formatIssues(issues, source), source);
    this.issues = issues;
  }
}

function formatIssues(issues: ReadonlyArray<SchemaIssue>, source?: string): string {
  const where = source ? ` in ${source}` : '';
  const lines = issues.map((i) => `  ${i.path || '(root)'}: ${i.message}`);
  return [`Invalid schedule${where}:`, ...lines].join('\n');
}
