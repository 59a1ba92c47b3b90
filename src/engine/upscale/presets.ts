// Preset composer: turns (preset, performance tier, target scale) into an
// ordered list of stage names

import { PipelineConfigError } from './errors';
import type { RestoreVariant, StageName } from './stageCatalog';

export type UpscalePreset = 'a' | 'b' | 'c' | 'aa' | 'bb' | 'ca' | 'off';

export type PerformanceTier = 'light' | 'medium' | 'high' | 'ultra' | 'extreme';

export interface UpscaleConfig {
  readonly preset: UpscalePreset;
  readonly performance: PerformanceTier;
  readonly scale: number;
}

export const PRESETS: readonly UpscalePreset[] = ['a', 'b', 'c', 'aa', 'bb', 'ca', 'off'];

export const PERFORMANCE_TIERS: readonly PerformanceTier[] = ['light', 'medium', 'high', 'ultra', 'extreme'];

const PRESET_LABELS: Record<UpscalePreset, string> = {
  a: 'Mode A (restore, then upscale)',
  b: 'Mode B (soft restore, then upscale)',
  c: 'Mode C (upscale with denoise)',
  aa: 'Mode A+A',
  bb: 'Mode B+B',
  ca: 'Mode C+A',
  off: 'Off',
};

const TIER_LABELS: Record<PerformanceTier, string> = {
  light: 'Light',
  medium: 'Medium',
  high: 'High',
  ultra: 'Ultra',
  extreme: 'Extreme',
};

/** Model size used for the first stage of each kind */
const INITIAL_VARIANT: Record<PerformanceTier, RestoreVariant> = {
  light: 'S',
  medium: 'M',
  high: 'L',
  ultra: 'VL',
  extreme: 'UL',
};

/** Smaller models for stages that run at already-upscaled resolution */
const SUBSEQUENT_VARIANT: Record<PerformanceTier, RestoreVariant> = {
  light: 'S',
  medium: 'S',
  high: 'M',
  ultra: 'L',
  extreme: 'L',
};

export function isUpscalePreset(value: unknown): value is UpscalePreset {
  return typeof value === 'string' && PRESETS.some(p => p === value);
}

export function isPerformanceTier(value: unknown): value is PerformanceTier {
  return typeof value === 'string' && PERFORMANCE_TIERS.some(t => t === value);
}

export function getPresetLabel(preset: UpscalePreset): string {
  return PRESET_LABELS[preset];
}

export function getPerformanceTierLabel(tier: PerformanceTier): string {
  return TIER_LABELS[tier];
}

function assertTargetScale(targetScale: number): void {
  if (!Number.isFinite(targetScale) || targetScale <= 0) {
    throw new PipelineConfigError(`Target scale must be a positive number, got ${targetScale}`);
  }
}

/**
 * The scale the composed stages actually produce: 2 doubled until it
 * reaches `targetScale`. Non-power-of-two targets round up.
 */
export function getEffectiveScale(preset: UpscalePreset, targetScale: number): number {
  assertTargetScale(targetScale);
  if (preset === 'off') return 1;

  let scale = 2.0;
  while (scale < targetScale) {
    scale *= 2.0;
  }
  return scale;
}

/**
 * Ordered stage names for a preset. Pure: the same arguments always give
 * the same list. `off` gives an empty list.
 */
export function createPipelines(
  preset: UpscalePreset,
  tier: PerformanceTier,
  targetScale: number
): StageName[] {
  assertTargetScale(targetScale);

  const initial = INITIAL_VARIANT[tier];
  const subsequent = SUBSEQUENT_VARIANT[tier];

  let stages: StageName[];
  switch (preset) {
    case 'a':
      stages = ['CLAMP_HIGHLIGHTS', `RESTORE_CNN_${initial}`, `UPSCALE_CNN_X2_${initial}`];
      break;
    case 'b':
      stages = ['CLAMP_HIGHLIGHTS', `RESTORE_SOFT_CNN_${initial}`, `UPSCALE_CNN_X2_${initial}`];
      break;
    case 'c':
      stages = ['CLAMP_HIGHLIGHTS', `UPSCALE_DENOISE_CNN_X2_${initial}`];
      break;
    case 'aa':
      stages = [
        'CLAMP_HIGHLIGHTS',
        `RESTORE_CNN_${initial}`,
        `UPSCALE_CNN_X2_${initial}`,
        `RESTORE_CNN_${subsequent}`,
      ];
      break;
    case 'bb':
      stages = [
        'CLAMP_HIGHLIGHTS',
        `RESTORE_SOFT_CNN_${initial}`,
        `UPSCALE_CNN_X2_${initial}`,
        `RESTORE_SOFT_CNN_${subsequent}`,
      ];
      break;
    case 'ca':
      stages = ['CLAMP_HIGHLIGHTS', `UPSCALE_DENOISE_CNN_X2_${initial}`, `RESTORE_CNN_${subsequent}`];
      break;
    case 'off':
      return [];
  }

  let scale = 2.0;
  while (scale < targetScale) {
    stages.push(`UPSCALE_CNN_X2_${subsequent}`);
    scale *= 2.0;
  }

  return stages;
}

export function createPipelinesForConfig(config: UpscaleConfig | null): StageName[] {
  return config ? createPipelines(config.preset, config.performance, config.scale) : [];
}
