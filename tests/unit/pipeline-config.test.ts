import { afterEach, describe, expect, it } from 'vitest';

import {
  describePipelineConfig,
  detectConstrainedEnvironment,
  deriveThreadCount,
  resolvePipelineConfig,
} from '../../src/config/pipeline-config.js';
import { getRuntimeConfig, resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { DEFAULT_GENERATION_DEFAULTS, createRuntimeConfig } from '../../src/config/schema/index.js';
import { ERROR_CODES, isCadenceError } from '../../src/errors/cadence-error.js';

function runtimeFor(cpuCount: number, constrained: boolean) {
  return createRuntimeConfig({ platform: { cpuCount, constrained } });
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('resolvePipelineConfig', () => {
  afterEach(() => {
    resetRuntimeConfig();
  });

  it('starts from the documented defaults', () => {
    const config = resolvePipelineConfig({}, runtimeFor(4, false));
    expect(config.contextLength).toBe(2048);
    expect(config.temperature).toBe(0.8);
    expect(config.maxTokens).toBe(512);
    expect(config.batchSize).toBe(512);
    expect(config.historySize).toBe(5);
    expect(config.stopSequences).toEqual([]);
    expect(config.family).toBeNull();
    expect(config.busyPolicy).toBe('queue');
    expect(config.gpuLayers).toBe(99);
    expect(config.sources.get('temperature')).toBe('default');
  });

  it('prefers overrides and tracks sources', () => {
    const config = resolvePipelineConfig(
      { temperature: 0.1, family: 'ChatML', stopSequences: ['\n\n'] },
      runtimeFor(4, false)
    );
    expect(config.temperature).toBe(0.1);
    expect(config.family).toBe('chatml');
    expect(config.stopSequences).toEqual(['\n\n']);
    expect(config.sources.get('temperature')).toBe('override');
    expect(config.sources.get('family')).toBe('override');
    expect(config.sources.get('contextLength')).toBe('default');
  });

  it('derives threads from the CPU count', () => {
    expect(resolvePipelineConfig({}, runtimeFor(16, false)).threads).toBe(8);
    expect(resolvePipelineConfig({}, runtimeFor(6, false)).threads).toBe(4);
    expect(resolvePipelineConfig({}, runtimeFor(2, false)).threads).toBe(1);
    expect(resolvePipelineConfig({}, runtimeFor(4, false)).sources.get('threads')).toBe('derived');
    expect(resolvePipelineConfig({ threads: 3 }, runtimeFor(16, false)).threads).toBe(3);
  });

  it('forces gpu layers to zero on constrained platforms', () => {
    const config = resolvePipelineConfig({ gpuLayers: 40 }, runtimeFor(4, true));
    expect(config.constrained).toBe(true);
    expect(config.gpuLayers).toBe(0);
    expect(config.sources.get('gpuLayers')).toBe('derived');
  });

  it('attributes the constrained flag to where it was set', () => {
    expect(resolvePipelineConfig({}, runtimeFor(4, true)).sources.get('constrained')).toBe('default');
    expect(
      resolvePipelineConfig({ platform: { constrained: false } }, runtimeFor(4, true)).sources.get('constrained')
    ).toBe('override');
    const detected = resolvePipelineConfig({}, createRuntimeConfig({ platform: { cpuCount: 4 } }));
    expect(detected.sources.get('constrained')).toBe('derived');
  });

  it('accepts platform overrides per pipeline', () => {
    const config = resolvePipelineConfig({ platform: { cpuCount: 12, constrained: true } }, runtimeFor(4, false));
    expect(config.threads).toBe(8);
    expect(config.gpuLayers).toBe(0);
  });

  it('reads process-wide defaults from the runtime config', () => {
    setRuntimeConfig({ generation: { historySize: 2 }, platform: { cpuCount: 4, constrained: false } });
    expect(getRuntimeConfig().generation.historySize).toBe(2);
    expect(resolvePipelineConfig().historySize).toBe(2);
    expect(DEFAULT_GENERATION_DEFAULTS.historySize).toBe(5);
  });

  it('freezes the result', () => {
    const config = resolvePipelineConfig({}, runtimeFor(4, false));
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.stopSequences)).toBe(true);
  });

  it('rejects out-of-range values', () => {
    const runtime = runtimeFor(4, false);

    const contextError = captureError(() => resolvePipelineConfig({ contextLength: 0 }, runtime));
    expect(isCadenceError(contextError, ERROR_CODES.CONFIG_INVALID)).toBe(true);
    expect(isCadenceError(contextError) && contextError.message).toBe(
      'contextLength must be an integer >= 1, got 0'
    );

    const temperatureError = captureError(() => resolvePipelineConfig({ temperature: -1 }, runtime));
    expect(isCadenceError(temperatureError, ERROR_CODES.CONFIG_INVALID)).toBe(true);

    const historyError = captureError(() => resolvePipelineConfig({ historySize: 1.5 }, runtime));
    expect(isCadenceError(historyError, ERROR_CODES.CONFIG_INVALID)).toBe(true);

    const familyError = captureError(() => resolvePipelineConfig({ family: 'nope' }, runtime));
    expect(isCadenceError(familyError, ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN)).toBe(true);
  });

  it('allows a zero history window', () => {
    expect(resolvePipelineConfig({ historySize: 0 }, runtimeFor(4, false)).historySize).toBe(0);
  });

  it('describes values with their sources', () => {
    const summary = describePipelineConfig(resolvePipelineConfig({ maxTokens: 64 }, runtimeFor(4, false)));
    expect(summary['maxTokens']).toBe('64 (override)');
    expect(summary['temperature']).toBe('0.8 (default)');
    expect(summary['threads']).toBe('2 (derived)');
    expect(summary['constrained']).toBe('false (default)');
  });
});

describe('platform detection', () => {
  it('reads the constrained flag from the environment', () => {
    expect(detectConstrainedEnvironment({ CADENCE_CPU_ONLY: '1' })).toBe(true);
    expect(detectConstrainedEnvironment({ CADENCE_CPU_ONLY: 'TRUE' })).toBe(true);
    expect(detectConstrainedEnvironment({ CADENCE_CPU_ONLY: '0' })).toBe(false);
    expect(detectConstrainedEnvironment({})).toBe(false);
  });

  it('clamps derived thread counts', () => {
    expect(deriveThreadCount(1)).toBe(1);
    expect(deriveThreadCount(3)).toBe(1);
    expect(deriveThreadCount(10)).toBe(8);
    expect(deriveThreadCount(64)).toBe(8);
  });
});
