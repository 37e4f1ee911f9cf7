export interface ChartViewerPort {
  /** Show a written chart file to the user. */
  open(path: string): Promise<void>;
}
