// Upscaling settings: preset, performance tier and target scale
// Persisted in localStorage; pushed to a running renderer on change

import { create } from 'zustand';
import { subscribeWithSelector, persist, createJSONStorage } from 'zustand/middleware';
import { shallow } from 'zustand/shallow';
import { Logger } from '../services/logger';
import { isPerformanceTier, isUpscalePreset } from '../engine/upscale/presets';
import type { PerformanceTier, UpscaleConfig, UpscalePreset } from '../engine/upscale/presets';
import type { UpscaleRenderer } from '../engine/render/UpscaleRenderer';

const log = Logger.create('UpscaleSettingsStore');

export const MAX_TARGET_SCALE = 16;

interface UpscaleSettingsState {
  enabled: boolean;
  preset: UpscalePreset;
  performance: PerformanceTier;
  scale: number;

  // Actions
  setEnabled: (enabled: boolean) => void;
  setPreset: (preset: UpscalePreset) => void;
  setPerformance: (performance: PerformanceTier) => void;
  setScale: (scale: number) => void;
  reset: () => void;

  /** Null when upscaling is off */
  getConfig: () => UpscaleConfig | null;
}

type UpscaleSettings = Pick<UpscaleSettingsState, 'enabled' | 'preset' | 'performance' | 'scale'>;

const DEFAULT_SETTINGS: UpscaleSettings = {
  enabled: true,
  preset: 'a',
  performance: 'medium',
  scale: 2,
};

export function isValidTargetScale(scale: number): boolean {
  return Number.isFinite(scale) && scale > 0 && scale <= MAX_TARGET_SCALE;
}

/**
 * Keeps only the stored fields that pass the same checks as the setters.
 * Anything else falls back to the current value.
 */
export function sanitizePersistedSettings(persisted: unknown): Partial<UpscaleSettings> {
  if (typeof persisted !== 'object' || persisted === null) return {};

  const settings: Partial<UpscaleSettings> = {};
  if ('enabled' in persisted && typeof persisted.enabled === 'boolean') {
    settings.enabled = persisted.enabled;
  }
  if ('preset' in persisted && isUpscalePreset(persisted.preset)) {
    settings.preset = persisted.preset;
  }
  if ('performance' in persisted && isPerformanceTier(persisted.performance)) {
    settings.performance = persisted.performance;
  }
  if ('scale' in persisted && typeof persisted.scale === 'number' && isValidTargetScale(persisted.scale)) {
    settings.scale = persisted.scale;
  }

  const dropped = Object.keys(persisted).filter(key => !(key in settings));
  if (dropped.length > 0) {
    log.warn(`Discarding invalid stored settings: ${dropped.join(', ')}`);
  }
  return settings;
}

export const useUpscaleSettingsStore = create<UpscaleSettingsState>()(
  subscribeWithSelector(
    persist(
      (set, get) => ({
        enabled: DEFAULT_SETTINGS.enabled,
        preset: DEFAULT_SETTINGS.preset,
        performance: DEFAULT_SETTINGS.performance,
        scale: DEFAULT_SETTINGS.scale,

        setEnabled: (enabled) => {
          set({ enabled });
        },

        setPreset: (preset) => {
          if (!isUpscalePreset(preset)) {
            log.warn(`Ignoring unknown preset "${preset}"`);
            return;
          }
          set({ preset });
        },

        setPerformance: (performance) => {
          if (!isPerformanceTier(performance)) {
            log.warn(`Ignoring unknown performance tier "${performance}"`);
            return;
          }
          set({ performance });
        },

        setScale: (scale) => {
          if (!isValidTargetScale(scale)) {
            log.warn(`Ignoring target scale ${scale} (must be in (0, ${MAX_TARGET_SCALE}])`);
            return;
          }
          set({ scale });
        },

        reset: () => {
          set({ ...DEFAULT_SETTINGS });
        },

        getConfig: () => {
          const { enabled, preset, performance, scale } = get();
          if (!enabled || preset === 'off') return null;
          return { preset, performance, scale };
        },
      }),
      {
        name: 'upscale-settings',
        storage: createJSONStorage(() => localStorage),
        partialize: (state): UpscaleSettings => ({
          enabled: state.enabled,
          preset: state.preset,
          performance: state.performance,
          scale: state.scale,
        }),
        merge: (persisted, current) => ({ ...current, ...sanitizePersistedSettings(persisted) }),
      }
    )
  )
);

/**
 * Pushes the current config to `renderer` now and on every change.
 * Returns the unsubscribe function.
 */
export function connectRendererToSettings(renderer: Pick<UpscaleRenderer, 'updateConfig'>): () => void {
  return useUpscaleSettingsStore.subscribe(
    (state) => [state.enabled, state.preset, state.performance, state.scale] as const,
    () => {
      renderer.updateConfig(useUpscaleSettingsStore.getState().getConfig());
    },
    { equalityFn: shallow, fireImmediately: true }
  );
}
