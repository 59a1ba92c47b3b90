// Surfaces WebGPU object-creation failures at bind time instead of as uncaptured errors

import { PipelineConfigError, ResourceAllocationError } from './errors';

export interface ScopedErrors {
  validation: GPUError | null;
  outOfMemory: GPUError | null;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs `create` inside an `out-of-memory` and a `validation` error scope.
 * Both scopes are popped even when `create` throws; the throw is then
 * rethrown unchanged.
 */
export async function captureErrors<T>(
  device: GPUDevice,
  create: () => T
): Promise<{ value: T; errors: ScopedErrors }> {
  device.pushErrorScope('out-of-memory');
  device.pushErrorScope('validation');

  let attempt: Attempt<T>;
  try {
    attempt = { ok: true, value: create() };
  } catch (error) {
    attempt = { ok: false, error };
  }

  const validation = await device.popErrorScope();
  const outOfMemory = await device.popErrorScope();

  if (!attempt.ok) throw attempt.error;
  return { value: attempt.value, errors: { validation, outOfMemory } };
}

/**
 * Out-of-memory becomes ResourceAllocationError, validation becomes
 * PipelineConfigError.
 */
export function throwIfScopeFailed(errors: ScopedErrors, pipelineName: string, what: string): void {
  if (errors.outOfMemory) {
    throw new ResourceAllocationError(pipelineName, `Out of GPU memory creating ${what}: ${errors.outOfMemory.message}`);
  }
  if (errors.validation) {
    throw new PipelineConfigError(`Invalid ${what}: ${errors.validation.message}`, pipelineName);
  }
}
