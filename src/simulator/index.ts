/**
 * Simulator Module
 *
 * Scenario-level orchestration on top of the estimation engine.
 *
 * @module simulator
 */

export { type RunSimulationOptions, runSimulation } from './run.js';
export { type LayerTableRow, type SummaryRow, layerTable, summaryRow } from './report.js';
