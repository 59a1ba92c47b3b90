// WebGPU adapter and device acquisition for the upscaling engine

import { Logger } from '../../services/logger';
import { UpscaleError } from '../upscale/errors';

const log = Logger.create('WebGPUContext');

/** Filtering samplers over r/rg/rgba32float textures need this feature */
export const REQUIRED_FEATURES: readonly GPUFeatureName[] = ['float32-filterable'];

export type DeviceLostCallback = (info: GPUDeviceLostInfo) => void;

export interface UpscaleDeviceOptions {
  powerPreference?: GPUPowerPreference;
  onDeviceLost?: DeviceLostCallback;
}

export interface UpscaleDevice {
  adapter: GPUAdapter;
  device: GPUDevice;
  preferredCanvasFormat: GPUTextureFormat;
}

/**
 * Requests an adapter and a device that can run every pipeline: the
 * adapter must expose float32-filterable. Uncaptured errors and device loss
 * are reported through the logger.
 */
export async function requestUpscaleDevice(
  gpu: GPU,
  options: UpscaleDeviceOptions = {}
): Promise<UpscaleDevice> {
  const powerPreference = options.powerPreference ?? 'high-performance';

  const adapter = await gpu.requestAdapter({ powerPreference });
  if (!adapter) {
    throw new UpscaleError('resource-exhaustion', 'WebGPU adapter not available');
  }
  log.info(`Requested adapter with powerPreference: ${powerPreference}`);

  const missing = REQUIRED_FEATURES.filter(feature => !adapter.features.has(feature));
  if (missing.length > 0) {
    throw new UpscaleError('resource-exhaustion', `Adapter lacks required features: ${missing.join(', ')}`);
  }

  const device = await adapter.requestDevice({
    label: 'Upscale device',
    requiredFeatures: [...REQUIRED_FEATURES],
  });

  device.addEventListener('uncapturederror', (event) => {
    log.error('Uncaptured WebGPU error', event.error.message);
  });

  device.lost.then((info) => {
    if (info.reason === 'destroyed') {
      log.info('Device destroyed');
    } else {
      log.error('Device lost', info.message);
    }
    options.onDeviceLost?.(info);
  }).catch((error: unknown) => {
    log.error('Error in device lost callback', error);
  });

  log.info('Context initialized successfully');
  return {
    adapter,
    device,
    preferredCanvasFormat: gpu.getPreferredCanvasFormat(),
  };
}
