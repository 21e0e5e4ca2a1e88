/**
 * CLI Types - Shared type definitions for the estimator CLI
 */

import type { LayerExecution, ReportConfigSchema } from '../../src/config/schema/index.js';

export type WorkflowName = 'afd' | 'large-ep';

export interface CLIOptions {
  /** Workflow key (first positional) */
  workflow: string | null;
  /** Workflow command (second positional) */
  command: string | null;
  /** Scenario file path (third positional) */
  scenario: string | null;
  batch: number | null;
  seq: number | null;
  /** Path to dump the raw result record as JSON */
  output: string | null;
  /** Settings reference (inline JSON or path) */
  config: string | null;
  /** Log level override; wins over the settings file */
  logLevel: string | null;
  help: boolean;
}

/** Renders one table (header line first) */
export type TableRenderer = (
  layers: readonly LayerExecution[],
  report: ReportConfigSchema
) => string[];

export interface WorkflowDefinition {
  name: WorkflowName;
  helpText: string;
  command: string;
  commandHelp: string;
  tableRenderer: TableRenderer;
}
