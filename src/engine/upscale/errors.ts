// Error taxonomy for binding and running upscaling pipelines

export type UpscaleErrorKind =
  | 'configuration'        // malformed descriptors, binding collisions, unknown stages
  | 'compilation'          // a pass program failed to compile
  | 'resource-exhaustion'  // texture or sampler allocation failed
  | 'frame';               // a single frame failed to render

export class UpscaleError extends Error {
  readonly kind: UpscaleErrorKind;

  constructor(kind: UpscaleErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpscaleError';
    this.kind = kind;
  }
}

export class PipelineConfigError extends UpscaleError {
  /** Pipeline (or stage) the problem was found in, when known */
  readonly pipelineName: string | null;

  constructor(message: string, pipelineName: string | null = null) {
    super('configuration', pipelineName ? `${pipelineName}: ${message}` : message);
    this.name = 'PipelineConfigError';
    this.pipelineName = pipelineName;
  }
}

export class ShaderCompilationError extends UpscaleError {
  readonly passName: string;
  readonly diagnostics: readonly string[];

  constructor(passName: string, diagnostics: readonly string[]) {
    super('compilation', `Shader compilation failed for ${passName}: ${diagnostics.join(', ')}`);
    this.name = 'ShaderCompilationError';
    this.passName = passName;
    this.diagnostics = diagnostics;
  }
}

export class ResourceAllocationError extends UpscaleError {
  readonly pipelineName: string;

  constructor(pipelineName: string, message: string, options?: { cause?: unknown }) {
    super('resource-exhaustion', `${pipelineName}: ${message}`, options);
    this.name = 'ResourceAllocationError';
    this.pipelineName = pipelineName;
  }
}

export class FrameRenderError extends UpscaleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('frame', message, options);
    this.name = 'FrameRenderError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
