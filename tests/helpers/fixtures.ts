import {
  createHardwareSpec,
  type HardwareSpec,
  type HardwareSpecInput,
  type LayerExecution,
} from '../../src/config/schema/index.js';

export function testHardware(overrides: Partial<HardwareSpecInput> = {}): HardwareSpec {
  return createHardwareSpec({
    name: 'TestGPU',
    peakTflops: 100,
    memoryBandwidthGbps: 1000,
    hbmGb: 80,
    interconnectGbps: 500,
    ...overrides,
  });
}

export function execution(
  layerName: string,
  dominantLatencyMs: number,
  bytesRead = 0,
  bytesWritten = 0,
  flops = 0
): LayerExecution {
  return {
    layerName,
    layerType: 'ffn',
    flops,
    bytesRead,
    bytesWritten,
    computeTimeMs: dominantLatencyMs,
    memoryTimeMs: 0,
    dominantLatencyMs,
    estimatedExecutionTimeMs: dominantLatencyMs,
    features: {},
    breakdown: {},
  };
}

/** The value a synchronous call throws, or undefined */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
