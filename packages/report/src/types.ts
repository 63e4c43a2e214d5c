export interface TextReportOptions {
  /** Time printed in the header. Defaults to now. */
  generatedAt?: Date;
  /** Total line width of separators. */
  width?: number;
}
