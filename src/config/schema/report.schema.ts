/**
 * Report Config Schema
 *
 * Controls how estimation results are rendered by the CLI.
 *
 * @module config/schema/report
 */

export interface ReportConfigSchema {
  /** Decimal places for numeric table cells and totals */
  precision: number;
  /** Minimum width of right-aligned numeric cells */
  cellWidth: number;
}

/** Default report configuration */
export const DEFAULT_REPORT_CONFIG: ReportConfigSchema = {
  precision: 3,
  cellWidth: 8,
};
