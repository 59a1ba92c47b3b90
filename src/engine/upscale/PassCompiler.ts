// Compiles pass programs and builds one compute pipeline per pass

import { Logger } from '../../services/logger';
import { PipelineConfigError, ResourceAllocationError, ShaderCompilationError, describeError } from './errors';
import {
  CHECKED_ENTRY_POINT,
  COMPUTE_WORKGROUP_SIZE_X,
  COMPUTE_WORKGROUP_SIZE_Y,
  UNCHECKED_ENTRY_POINT,
} from './types';
import type { ExecutablePass, TextureSize } from './types';

const log = Logger.create('PassCompiler');

export type ComputeEntryPoint = typeof CHECKED_ENTRY_POINT | typeof UNCHECKED_ENTRY_POINT;

export interface CompiledPass {
  name: string;
  /** Invocation extent in pixels */
  dispatchExtent: TextureSize;
  entryPoint: ComputeEntryPoint;
  computePipeline: GPUComputePipeline;
}

export function computeDispatchExtent(inputSize: TextureSize, scale: readonly [number, number]): TextureSize {
  return {
    width: Math.floor(inputSize.width * scale[0]),
    height: Math.floor(inputSize.height * scale[1]),
  };
}

/**
 * The unchecked entry point skips the per-invocation range test, which is
 * only safe when every workgroup lies fully inside the extent.
 */
export function selectEntryPoint(extent: TextureSize): ComputeEntryPoint {
  const aligned = extent.width % COMPUTE_WORKGROUP_SIZE_X === 0 &&
    extent.height % COMPUTE_WORKGROUP_SIZE_Y === 0;
  return aligned ? UNCHECKED_ENTRY_POINT : CHECKED_ENTRY_POINT;
}

export function workgroupCount(extent: TextureSize): [number, number] {
  return [
    Math.ceil(extent.width / COMPUTE_WORKGROUP_SIZE_X),
    Math.ceil(extent.height / COMPUTE_WORKGROUP_SIZE_Y),
  ];
}

function isPipelineError(error: unknown): error is { reason: 'validation' | 'internal' } {
  return typeof error === 'object' && error !== null && 'reason' in error &&
    (error.reason === 'validation' || error.reason === 'internal');
}

/**
 * createComputePipelineAsync rejects with a GPUPipelineError: `validation`
 * for a missing entry point or a layout the program disagrees with,
 * `internal` when the implementation could not build the pipeline.
 */
function pipelineCreationError(pass: ExecutablePass, entryPoint: ComputeEntryPoint, error: unknown): Error {
  const detail = describeError(error);
  if (isPipelineError(error) && error.reason === 'internal') {
    return new ResourceAllocationError(pass.name, `Compute pipeline creation failed: ${detail}`, { cause: error });
  }
  return new PipelineConfigError(`Compute pipeline for ${pass.name} (${entryPoint}) is invalid: ${detail}`);
}

function formatDiagnostic(message: GPUCompilationMessage): string {
  return message.lineNum > 0
    ? `${message.lineNum}:${message.linePos} ${message.message}`
    : message.message;
}

export async function compileShaderModule(device: GPUDevice, pass: ExecutablePass): Promise<GPUShaderModule> {
  const module = device.createShaderModule({
    label: pass.name,
    code: pass.shader,
  });

  const info = await module.getCompilationInfo();
  const errors = info.messages.filter(m => m.type === 'error');
  if (errors.length > 0) {
    throw new ShaderCompilationError(pass.name, errors.map(formatDiagnostic));
  }

  for (const warning of info.messages.filter(m => m.type === 'warning')) {
    log.warn(`${pass.name}: ${formatDiagnostic(warning)}`);
  }

  return module;
}

/**
 * Compiles `pass` against the explicit bind group layout built for it, so
 * the program and its bindings cannot disagree.
 */
export async function compilePass(
  device: GPUDevice,
  pass: ExecutablePass,
  inputSize: TextureSize,
  bindGroupLayout: GPUBindGroupLayout
): Promise<CompiledPass> {
  const module = await compileShaderModule(device, pass);

  const dispatchExtent = computeDispatchExtent(inputSize, pass.computeScaleFactors);
  const entryPoint = selectEntryPoint(dispatchExtent);

  const layout = device.createPipelineLayout({
    label: `${pass.name} pipeline layout`,
    bindGroupLayouts: [bindGroupLayout],
  });

  let computePipeline: GPUComputePipeline;
  try {
    computePipeline = await device.createComputePipelineAsync({
      label: pass.name,
      layout,
      compute: { module, entryPoint },
    });
  } catch (error) {
    throw pipelineCreationError(pass, entryPoint, error);
  }

  log.debug(`${pass.name}: ${dispatchExtent.width}x${dispatchExtent.height} via ${entryPoint}`);

  return { name: pass.name, dispatchExtent, entryPoint, computePipeline };
}
