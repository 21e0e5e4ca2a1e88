/**
 * Simulation Run
 *
 * @module simulator/run
 */

import type { RuntimeSpec, SimulationResult } from '../config/schema/index.js';
import { log } from '../debug/log.js';
import { perf } from '../debug/perf.js';
import { AnalyticEstimator } from '../estimation/analytic.js';
import { summarizeExecutions } from '../estimation/aggregate.js';
import type { Scenario } from '../scenario/loader.js';

export interface RunSimulationOptions {
  /** Reuse an estimator instead of building one from the scenario hardware */
  estimator?: AnalyticEstimator;
}

/**
 * Estimate every layer of a scenario and fold the results.
 */
export function runSimulation(
  scenario: Scenario,
  runtime: RuntimeSpec,
  options: RunSimulationOptions = {}
): SimulationResult {
  const estimator = options.estimator ?? new AnalyticEstimator(scenario.hardware, runtime);
  const { result: executions } = perf.timeSync(
    `Estimate ${scenario.layers.length} layer(s)`,
    () => estimator.estimateLayers(scenario.layers),
    'Simulator'
  );
  const result = summarizeExecutions(executions);

  log.verbose(
    'Simulator',
    `${scenario.name}: ${result.totalLatencyMs.toFixed(3)}ms total, bottleneck ${result.bottleneckLayer}`
  );
  return result;
}
