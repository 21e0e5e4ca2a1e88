/**
 * Estimator CLI commands: argument parsing and the simulate/evaluate run.
 *
 * @module cli/simulate
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';

import {
  FLOPS_PER_GFLOP,
  BYTES_PER_GB,
  LOG_LEVEL_NAMES,
  createRuntimeSpec,
  isLogLevelName,
  simulationResultToRecord,
  type SettingsSchema,
} from '../src/config/schema/index.js';
import { setSettings } from '../src/config/settings.js';
import { applyDebugConfig, log, perf, setLogLevel } from '../src/debug/index.js';
import { ERROR_CODES, createEstimatorError } from '../src/errors/estimator-error.js';
import { AnalyticEstimator } from '../src/estimation/analytic.js';
import { loadScenario } from '../src/scenario/loader.js';
import { runSimulation } from '../src/simulator/run.js';
import { loadSettings } from './config/index.js';
import { formatCell, nonFiniteReplacer } from './helpers/format.js';
import { WORKFLOWS, getWorkflow } from './helpers/tables.js';
import type { CLIOptions } from './helpers/types.js';

// ============================================================================
// Argument Parsing
// ============================================================================

function usageError(message: string): Error {
  return createEstimatorError(ERROR_CODES.CLI_USAGE, message);
}

function takeValue(tokens: string[], flag: string): string {
  const value = tokens.shift();
  if (value === undefined || value.startsWith('--')) {
    throw usageError(`${flag} requires a value`);
  }
  return value;
}

function parsePositiveInt(raw: string, flag: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw usageError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CLIOptions {
  const opts: CLIOptions = {
    workflow: null,
    command: null,
    scenario: null,
    batch: null,
    seq: null,
    output: null,
    config: null,
    logLevel: null,
    help: false,
  };

  const tokens = [...argv];
  const positionals: string[] = [];

  while (tokens.length) {
    const arg = tokens.shift();
    if (arg === undefined) break;
    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--batch':
      case '-b':
        opts.batch = parsePositiveInt(takeValue(tokens, arg), arg);
        break;
      case '--seq':
      case '-s':
        opts.seq = parsePositiveInt(takeValue(tokens, arg), arg);
        break;
      case '--output':
      case '-o':
        opts.output = takeValue(tokens, arg);
        break;
      case '--config':
      case '-c':
        opts.config = takeValue(tokens, arg);
        break;
      case '--log-level': {
        const level = takeValue(tokens, arg).toLowerCase();
        if (!isLogLevelName(level)) {
          throw usageError(`${arg} must be one of: ${LOG_LEVEL_NAMES.join(', ')}`);
        }
        opts.logLevel = level;
        break;
      }
      case '--verbose':
      case '-v':
        opts.logLevel = 'verbose';
        break;
      default:
        if (arg.startsWith('-')) {
          throw usageError(`Unknown option "${arg}"`);
        }
        positionals.push(arg);
        break;
    }
  }

  if (positionals.length > 3) {
    throw usageError(`Unexpected argument "${positionals[3]}"`);
  }
  opts.workflow = positionals[0] ?? null;
  opts.command = positionals[1] ?? null;
  opts.scenario = positionals[2] ?? null;
  return opts;
}

export function helpText(): string {
  const lines = [
    'Usage: layer-roofline <workflow> <command> <scenario.json> --batch N --seq N [options]',
    '',
    'Workflows:',
  ];
  for (const definition of Object.values(WORKFLOWS)) {
    lines.push(`  ${definition.name.padEnd(10)} ${definition.helpText}`);
    lines.push(`    ${definition.command.padEnd(8)} ${definition.commandHelp}`);
  }
  lines.push(
    '',
    'Options:',
    '  --batch, -b N        Batch size (required)',
    '  --seq, -s N          Sequence length (required)',
    '  --output, -o PATH    Dump the raw result as JSON',
    '  --config, -c REF     Settings file or inline JSON',
    '  --log-level LEVEL    debug | verbose | info | warn | error | silent',
    '  --verbose, -v        Same as --log-level verbose',
    '  --help, -h           Show this help'
  );
  return lines.join('\n');
}

// ============================================================================
// Run
// ============================================================================

async function applySettings(opts: CLIOptions): Promise<SettingsSchema> {
  const loaded = opts.config ? await loadSettings(opts.config) : null;
  const settings = setSettings(loaded?.settings);
  applyDebugConfig(settings.debug);
  if (opts.logLevel) {
    setLogLevel(opts.logLevel);
  }
  if (loaded) {
    log.verbose('CLI', `Settings loaded from ${loaded.source}`);
  }
  return settings;
}

async function runWorkflow(opts: CLIOptions): Promise<void> {
  if (!opts.workflow) {
    throw usageError('Missing workflow; expected one of: ' + Object.keys(WORKFLOWS).join(', '));
  }
  const definition = getWorkflow(opts.workflow);
  if (definition === null) {
    throw usageError(`Unknown workflow '${opts.workflow}'`);
  }
  if (opts.command !== definition.command) {
    throw usageError(
      `Workflow '${definition.name}' expects command '${definition.command}', got '${opts.command ?? ''}'`
    );
  }
  const { scenario: scenarioPath, batch: batchSize, seq: seqLen } = opts;
  if (!scenarioPath) {
    throw usageError('Missing scenario path');
  }
  if (batchSize === null) {
    throw usageError('--batch is required');
  }
  if (seqLen === null) {
    throw usageError('--seq is required');
  }

  const { report } = await applySettings(opts);

  const { result: scenario } = await perf.time(
    'Scenario load',
    () => loadScenario(scenarioPath),
    'CLI'
  );
  const runtime = createRuntimeSpec({ batchSize, seqLen });
  const estimator = new AnalyticEstimator(scenario.hardware, runtime);
  const result = runSimulation(scenario, runtime, { estimator });

  console.log(`Scenario: ${scenario.name}`);
  console.log(`Hardware: ${scenario.hardware.name}`);
  for (const line of definition.tableRenderer(result.layers, report)) {
    console.log(line);
  }

  // Totals are unpadded
  const total = (value: number): string => formatCell(value, { ...report, cellWidth: 0 });
  console.log('\nTotals:');
  console.log(`  Total latency (ms): ${total(result.totalLatencyMs)}`);
  console.log(`  Total FLOPs (GFLOPs): ${total(result.totalFlops / FLOPS_PER_GFLOP)}`);
  console.log(`  Peak memory (GB): ${total(result.peakMemoryBytes / BYTES_PER_GB)}`);
  console.log(`  Bottleneck layer: ${result.bottleneckLayer ?? '-'}`);

  if (opts.output) {
    const outputPath = resolve(opts.output);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(simulationResultToRecord(result), nonFiniteReplacer, 2));
    console.log(`\nSaved raw result to ${outputPath}`);
  }
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  try {
    const opts = parseArgs(argv);
    if (opts.help) {
      console.log(helpText());
      return 0;
    }
    await runWorkflow(opts);
    return 0;
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(`Error: ${error.message}`);
    log.debug('CLI', 'Failure details', error.stack);
    return 1;
  }
}
