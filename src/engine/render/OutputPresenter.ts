// Draws the upscaled result onto a presentation target (usually a canvas)

import { Logger } from '../../services/logger';
import type { BorrowedTexture } from '../upscale/ResourceScope';
import type { TextureSize } from '../upscale/types';

const log = Logger.create('OutputPresenter');

/**
 * Receives the final texture of every rendered frame.
 */
export interface FramePresenter {
  present(encoder: GPUCommandEncoder, output: BorrowedTexture): void;
  /** Called after a rebind changes the output size */
  resize?(size: TextureSize): void;
}

export type PresenterColorConversion = 'none' | 'rec709-to-srgb';

export interface OutputPresenterOptions {
  colorConversion?: PresenterColorConversion;
}

const PRESENT_SHADER = /* wgsl */ `
struct VertexOutput {
  @builtin(position) position: vec4f,
  @location(0) uv: vec2f,
}

@vertex
fn vs_main(@builtin(vertex_index) index: u32) -> VertexOutput {
  var pos = array<vec2f, 6>(
    vec2f(-1.0, -1.0), vec2f(1.0, -1.0), vec2f(-1.0, 1.0),
    vec2f(1.0, -1.0), vec2f(1.0, 1.0), vec2f(-1.0, 1.0)
  );
  var uv = array<vec2f, 6>(
    vec2f(0.0, 1.0), vec2f(1.0, 1.0), vec2f(0.0, 0.0),
    vec2f(1.0, 1.0), vec2f(1.0, 0.0), vec2f(0.0, 0.0)
  );
  var output: VertexOutput;
  output.position = vec4f(pos[index], 0.0, 1.0);
  output.uv = uv[index];
  return output;
}

@group(0) @binding(0) var inputTexture: texture_2d<f32>;
@group(0) @binding(1) var inputSampler: sampler;

fn rec709ToLinear(color: vec3f) -> vec3f {
  let alpha = 1.09929682680944;
  let beta = 0.018053968510807;
  return select(pow((color + alpha - 1.0) / alpha, vec3f(1.0 / 0.45)), color / 4.5, color < vec3f(beta));
}

fn linearToSrgb(linear: vec3f) -> vec3f {
  return select(pow(linear, vec3f(1.0 / 2.4)) * 1.055 - 0.055, linear * 12.92, linear <= vec3f(0.0031308));
}

@fragment
fn fs_passthrough(input: VertexOutput) -> @location(0) vec4f {
  let color = textureSampleLevel(inputTexture, inputSampler, input.uv, 0.0);
  return vec4f(color.rgb, 1.0);
}

@fragment
fn fs_rec709(input: VertexOutput) -> @location(0) vec4f {
  let color = textureSampleLevel(inputTexture, inputSampler, input.uv, 0.0);
  return vec4f(linearToSrgb(rec709ToLinear(color.rgb)), 1.0);
}
`;

const FRAGMENT_ENTRY_POINTS: Record<PresenterColorConversion, string> = {
  'none': 'fs_passthrough',
  'rec709-to-srgb': 'fs_rec709',
};

export class OutputPresenter {
  private readonly device: GPUDevice;
  private readonly bindGroupLayout: GPUBindGroupLayout;
  private readonly pipeline: GPURenderPipeline;
  private readonly sampler: GPUSampler;
  private bindGroup: GPUBindGroup | null = null;
  private boundTexture: BorrowedTexture | null = null;

  constructor(device: GPUDevice, format: GPUTextureFormat, options: OutputPresenterOptions = {}) {
    this.device = device;
    const colorConversion = options.colorConversion ?? 'none';

    const module = device.createShaderModule({ label: 'Present shader', code: PRESENT_SHADER });

    this.bindGroupLayout = device.createBindGroupLayout({
      label: 'Present layout',
      entries: [
        {
          binding: 0,
          visibility: GPUShaderStage.FRAGMENT,
          texture: { sampleType: 'float', viewDimension: '2d', multisampled: false },
        },
        {
          binding: 1,
          visibility: GPUShaderStage.FRAGMENT,
          sampler: { type: 'filtering' },
        },
      ],
    });

    this.pipeline = device.createRenderPipeline({
      label: 'Present pipeline',
      layout: device.createPipelineLayout({
        label: 'Present pipeline layout',
        bindGroupLayouts: [this.bindGroupLayout],
      }),
      vertex: { module, entryPoint: 'vs_main' },
      fragment: {
        module,
        entryPoint: FRAGMENT_ENTRY_POINTS[colorConversion],
        targets: [{ format }],
      },
      primitive: { topology: 'triangle-list' },
    });

    this.sampler = device.createSampler({
      label: 'Present sampler',
      magFilter: 'linear',
      minFilter: 'linear',
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
    });

    log.debug(`Created for ${format} (${colorConversion})`);
  }

  /** Points the presenter at a new texture. Rebuilds the bind group only when it changes. */
  bind(texture: BorrowedTexture): void {
    if (this.boundTexture === texture && this.bindGroup) return;

    this.bindGroup = this.device.createBindGroup({
      label: 'Present bind group',
      layout: this.bindGroupLayout,
      entries: [
        { binding: 0, resource: texture.createView() },
        { binding: 1, resource: this.sampler },
      ],
    });
    this.boundTexture = texture;
  }

  get boundTo(): BorrowedTexture | null {
    return this.boundTexture;
  }

  encode(encoder: GPUCommandEncoder, target: GPUTextureView): void {
    if (!this.bindGroup) {
      throw new Error('OutputPresenter has no texture bound');
    }

    const pass = encoder.beginRenderPass({
      label: 'Present pass',
      colorAttachments: [
        {
          view: target,
          clearValue: { r: 0, g: 0, b: 0, a: 1 },
          loadOp: 'clear',
          storeOp: 'store',
        },
      ],
    });
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, this.bindGroup);
    pass.draw(6);
    pass.end();
  }
}

export interface PresentationCanvas {
  width: number;
  height: number;
}

/**
 * FramePresenter for a WebGPU canvas: resizes the canvas to the output and
 * draws each frame into its current texture.
 */
export class CanvasPresenter implements FramePresenter {
  private readonly output: OutputPresenter;
  private configured = false;

  constructor(
    private readonly device: GPUDevice,
    private readonly canvas: PresentationCanvas,
    private readonly context: Pick<GPUCanvasContext, 'configure' | 'getCurrentTexture'>,
    private readonly format: GPUTextureFormat,
    options: OutputPresenterOptions = {}
  ) {
    this.output = new OutputPresenter(device, format, options);
  }

  resize(size: TextureSize): void {
    if (this.configured && this.canvas.width === size.width && this.canvas.height === size.height) return;
    this.canvas.width = size.width;
    this.canvas.height = size.height;
    this.configure();
    log.debug(`Canvas resized to ${size.width}x${size.height}`);
  }

  present(encoder: GPUCommandEncoder, output: BorrowedTexture): void {
    if (!this.configured) this.configure();
    this.output.bind(output);
    this.output.encode(encoder, this.context.getCurrentTexture().createView());
  }

  private configure(): void {
    this.context.configure({ device: this.device, format: this.format, alphaMode: 'opaque' });
    this.configured = true;
  }
}
