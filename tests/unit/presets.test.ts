import { describe, it, expect } from 'vitest';
import {
  PERFORMANCE_TIERS,
  PRESETS,
  createPipelines,
  createPipelinesForConfig,
  getEffectiveScale,
  getPerformanceTierLabel,
  getPresetLabel,
  isPerformanceTier,
  isUpscalePreset,
} from '../../src/engine/upscale/presets';
import { PipelineConfigError } from '../../src/engine/upscale/errors';

describe('createPipelines', () => {
  it('composes mode C at light for a 2x target', () => {
    expect(createPipelines('c', 'light', 2.0)).toEqual(['CLAMP_HIGHLIGHTS', 'UPSCALE_DENOISE_CNN_X2_S']);
  });

  it('adds one subsequent upscale for a 4x target', () => {
    expect(createPipelines('c', 'light', 4.0)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'UPSCALE_DENOISE_CNN_X2_S',
      'UPSCALE_CNN_X2_S',
    ]);
  });

  it('rounds a non-power-of-two target up', () => {
    expect(createPipelines('c', 'light', 5.0)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'UPSCALE_DENOISE_CNN_X2_S',
      'UPSCALE_CNN_X2_S',
      'UPSCALE_CNN_X2_S',
    ]);
  });

  it('adds nothing for targets at or below 2x', () => {
    expect(createPipelines('a', 'medium', 1.5)).toEqual(['CLAMP_HIGHLIGHTS', 'RESTORE_CNN_M', 'UPSCALE_CNN_X2_M']);
  });

  it('uses initial and subsequent variants per tier', () => {
    expect(createPipelines('aa', 'high', 4)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'RESTORE_CNN_L',
      'UPSCALE_CNN_X2_L',
      'RESTORE_CNN_M',
      'UPSCALE_CNN_X2_M',
    ]);
    expect(createPipelines('bb', 'extreme', 2)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'RESTORE_SOFT_CNN_UL',
      'UPSCALE_CNN_X2_UL',
      'RESTORE_SOFT_CNN_L',
    ]);
    expect(createPipelines('ca', 'ultra', 2)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'UPSCALE_DENOISE_CNN_X2_VL',
      'RESTORE_CNN_L',
    ]);
    expect(createPipelines('b', 'light', 2)).toEqual([
      'CLAMP_HIGHLIGHTS',
      'RESTORE_SOFT_CNN_S',
      'UPSCALE_CNN_X2_S',
    ]);
  });

  it('returns an empty list for off', () => {
    expect(createPipelines('off', 'extreme', 8)).toEqual([]);
  });

  it('is deterministic', () => {
    expect(createPipelines('ca', 'medium', 8)).toEqual(createPipelines('ca', 'medium', 8));
  });

  it('rejects non-finite and non-positive targets', () => {
    expect(() => createPipelines('a', 'light', 0)).toThrow(PipelineConfigError);
    expect(() => createPipelines('a', 'light', -2)).toThrow(PipelineConfigError);
    expect(() => createPipelines('a', 'light', Number.NaN)).toThrow(PipelineConfigError);
    expect(() => createPipelines('a', 'light', Number.POSITIVE_INFINITY)).toThrow(
      'Target scale must be a positive number, got Infinity'
    );
  });
});

describe('createPipelinesForConfig', () => {
  it('treats a null config as off', () => {
    expect(createPipelinesForConfig(null)).toEqual([]);
  });

  it('forwards the config fields', () => {
    expect(createPipelinesForConfig({ preset: 'c', performance: 'light', scale: 2 }))
      .toEqual(['CLAMP_HIGHLIGHTS', 'UPSCALE_DENOISE_CNN_X2_S']);
  });
});

describe('getEffectiveScale', () => {
  it('reports the power of two actually produced', () => {
    expect(getEffectiveScale('a', 1)).toBe(2);
    expect(getEffectiveScale('a', 2)).toBe(2);
    expect(getEffectiveScale('a', 3)).toBe(4);
    expect(getEffectiveScale('c', 5)).toBe(8);
  });

  it('is 1 when upscaling is off', () => {
    expect(getEffectiveScale('off', 4)).toBe(1);
  });
});

describe('labels and guards', () => {
  it('has a label for every preset and tier', () => {
    for (const preset of PRESETS) {
      expect(getPresetLabel(preset).length).toBeGreaterThan(0);
    }
    for (const tier of PERFORMANCE_TIERS) {
      expect(getPerformanceTierLabel(tier).length).toBeGreaterThan(0);
    }
    expect(getPresetLabel('off')).toBe('Off');
    expect(getPerformanceTierLabel('ultra')).toBe('Ultra');
  });

  it('recognizes valid values only', () => {
    expect(isUpscalePreset('ca')).toBe(true);
    expect(isUpscalePreset('d')).toBe(false);
    expect(isUpscalePreset(2)).toBe(false);
    expect(isPerformanceTier('extreme')).toBe(true);
    expect(isPerformanceTier('max')).toBe(false);
  });
});
