/**
 * Workflow registry and per-workflow layer tables.
 */

import type { LayerExecution, ReportConfigSchema } from '../../src/config/schema/index.js';
import { formatGb, formatGflops, formatMs } from './format.js';
import type { TableRenderer, WorkflowDefinition, WorkflowName } from './types.js';

const HEADER_PAD = 12;

function headerLine(headers: readonly string[]): string {
  return headers.map((header) => header.padStart(HEADER_PAD)).join(' ');
}

/** Attention/FFN disaggregation view: compute vs memory per layer */
export const renderAfdTable: TableRenderer = (
  layers: readonly LayerExecution[],
  report: ReportConfigSchema
) => {
  const lines = [headerLine(['layer', 'type', 'gflops', 'compute_ms', 'memory_ms', 'latency_ms'])];
  for (const layer of layers) {
    lines.push(
      [
        layer.layerName.padStart(12),
        layer.layerType.padStart(10),
        formatGflops(layer.flops, report).padStart(10),
        formatMs(layer.computeTimeMs, report).padStart(12),
        formatMs(layer.memoryTimeMs, report).padStart(12),
        formatMs(layer.dominantLatencyMs, report).padStart(12),
      ].join(' ')
    );
  }
  return lines;
};

/** Expert-parallel view: traffic volume per layer */
export const renderLargeEpTable: TableRenderer = (
  layers: readonly LayerExecution[],
  report: ReportConfigSchema
) => {
  const lines = [headerLine(['layer', 'type', 'gflops', 'bytes_gb', 'latency_ms'])];
  for (const layer of layers) {
    lines.push(
      [
        layer.layerName.padStart(12),
        layer.layerType.padStart(12),
        formatGflops(layer.flops, report).padStart(10),
        formatGb(layer.bytesRead + layer.bytesWritten, report).padStart(10),
        formatMs(layer.dominantLatencyMs, report).padStart(12),
      ].join(' ')
    );
  }
  return lines;
};

export const WORKFLOWS: Readonly<Record<WorkflowName, WorkflowDefinition>> = {
  afd: {
    name: 'afd',
    helpText: 'Attention-FFN disaggregation workflows',
    command: 'simulate',
    commandHelp: 'Run analytic AFD simulation',
    tableRenderer: renderAfdTable,
  },
  'large-ep': {
    name: 'large-ep',
    helpText: 'Large expert-parallel workflows',
    command: 'evaluate',
    commandHelp: 'Run expert-parallel analytic simulation',
    tableRenderer: renderLargeEpTable,
  },
};

export function getWorkflow(name: string): WorkflowDefinition | null {
  return name === 'afd' || name === 'large-ep' ? WORKFLOWS[name] : null;
}
