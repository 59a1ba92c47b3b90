// Loads the translator's prebuilt stage descriptors and resolves stage names

import { Logger } from '../../services/logger';
import { validatePipeline } from './descriptorValidation';
import { PipelineConfigError } from './errors';
import type {
  ExecutablePass,
  ExecutablePipeline,
  InputTextureBinding,
  OutputTextureBinding,
  PhysicalTexture,
  SamplerBinding,
  SamplerFilterMode,
  ScaleFactor,
  ScaleFactorPair,
  TextureComponents,
} from './types';

const log = Logger.create('StageCatalog');

export type RestoreVariant = 'S' | 'M' | 'L' | 'VL' | 'UL';

/**
 * Every stage a preset can name. The catalog file is expected to provide
 * each of them; resolving a missing one is a configuration error.
 */
export type StageName =
  | 'CLAMP_HIGHLIGHTS'
  | `RESTORE_CNN_${RestoreVariant}`
  | `RESTORE_SOFT_CNN_${RestoreVariant}`
  | `UPSCALE_CNN_X2_${RestoreVariant}`
  | `UPSCALE_DENOISE_CNN_X2_${RestoreVariant}`;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Field readers that name the stage and path of whatever is malformed */
class FieldReader {
  constructor(private readonly stage: string) {}

  fail(path: string, expected: string): never {
    throw new PipelineConfigError(`Field "${path}" must be ${expected}`, this.stage);
  }

  record(value: unknown, path: string): UnknownRecord {
    return isRecord(value) ? value : this.fail(path, 'an object');
  }

  array(value: unknown, path: string): unknown[] {
    return Array.isArray(value) ? value : this.fail(path, 'an array');
  }

  string(value: unknown, path: string): string {
    return typeof value === 'string' ? value : this.fail(path, 'a string');
  }

  boolean(value: unknown, path: string): boolean {
    return typeof value === 'boolean' ? value : this.fail(path, 'a boolean');
  }

  integer(value: unknown, path: string): number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0
      ? value
      : this.fail(path, 'a non-negative integer');
  }

  positive(value: unknown, path: string): number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0
      ? value
      : this.fail(path, 'a positive number');
  }

  pair<T>(value: unknown, path: string, read: (item: unknown, path: string) => T): readonly [T, T] {
    const items = this.array(value, path);
    if (items.length !== 2) this.fail(path, 'a pair');
    return [read(items[0], `${path}[0]`), read(items[1], `${path}[1]`)];
  }

  components(value: unknown, path: string): TextureComponents {
    return value === 1 || value === 2 || value === 4 ? value : this.fail(path, '1, 2 or 4');
  }

  filterMode(value: unknown, path: string): SamplerFilterMode {
    return value === 'nearest' || value === 'linear' ? value : this.fail(path, '"nearest" or "linear"');
  }
}

function parseScale(r: FieldReader, value: unknown, path: string): ScaleFactor {
  const raw = r.record(value, path);
  return {
    numerator: r.integer(raw.numerator, `${path}.numerator`),
    denominator: r.integer(raw.denominator, `${path}.denominator`),
  };
}

function parseTexture(r: FieldReader, value: unknown, path: string): PhysicalTexture {
  const raw = r.record(value, path);
  const scaleFactor: ScaleFactorPair = r.pair(raw.scale_factor, `${path}.scale_factor`, (v, p) => parseScale(r, v, p));
  return {
    id: r.integer(raw.id, `${path}.id`),
    components: r.components(raw.components, `${path}.components`),
    scaleFactor,
    isSource: r.boolean(raw.is_source, `${path}.is_source`),
  };
}

function parseTextureBinding(r: FieldReader, value: unknown, path: string): InputTextureBinding & OutputTextureBinding {
  const raw = r.record(value, path);
  return {
    binding: r.integer(raw.binding, `${path}.binding`),
    physicalId: r.integer(raw.physical_id, `${path}.physical_id`),
  };
}

function parseSamplerBinding(r: FieldReader, value: unknown, path: string): SamplerBinding {
  const raw = r.record(value, path);
  return {
    binding: r.integer(raw.binding, `${path}.binding`),
    filterMode: r.filterMode(raw.filter_mode, `${path}.filter_mode`),
  };
}

function parsePass(r: FieldReader, value: unknown, path: string): ExecutablePass {
  const raw = r.record(value, path);
  // The translator writes `id`; older dumps used `name`
  const name = r.string(raw.id ?? raw.name, `${path}.id`);
  return {
    name,
    shader: r.string(raw.shader, `${path}.shader`),
    computeScaleFactors: r.pair(raw.compute_scale_factors, `${path}.compute_scale_factors`, (v, p) => r.positive(v, p)),
    inputTextures: r.array(raw.input_textures, `${path}.input_textures`)
      .map((b, i) => parseTextureBinding(r, b, `${path}.input_textures[${i}]`)),
    outputTextures: r.array(raw.output_textures, `${path}.output_textures`)
      .map((b, i) => parseTextureBinding(r, b, `${path}.output_textures[${i}]`)),
    samplers: r.array(raw.samplers, `${path}.samplers`)
      .map((b, i) => parseSamplerBinding(r, b, `${path}.samplers[${i}]`)),
  };
}

/**
 * Parses one stage descriptor in the translator's wire format.
 */
export function parseStage(key: string, value: unknown): ExecutablePipeline {
  const r = new FieldReader(key);
  const raw = r.record(value, key);

  const pipeline: ExecutablePipeline = {
    id: typeof raw.id === 'string' ? raw.id : key,
    name: typeof raw.name === 'string' ? raw.name : key,
    physicalTextures: r.array(raw.physical_textures, 'physical_textures')
      .map((t, i) => parseTexture(r, t, `physical_textures[${i}]`)),
    requiredSamplers: r.array(raw.required_samplers, 'required_samplers')
      .map((m, i) => r.filterMode(m, `required_samplers[${i}]`)),
    passes: r.array(raw.passes, 'passes')
      .map((p, i) => parsePass(r, p, `passes[${i}]`)),
  };

  validatePipeline(pipeline);
  return pipeline;
}

/**
 * Parses a catalog object keyed by stage name. Every entry is validated, so
 * a malformed file fails at load time rather than at bind time.
 */
export function parseStageCatalog(raw: unknown): StageCatalog {
  if (!isRecord(raw)) {
    throw new PipelineConfigError('Stage catalog must be an object keyed by stage name');
  }

  const stages = new Map<string, ExecutablePipeline>();
  for (const [key, value] of Object.entries(raw)) {
    stages.set(key, parseStage(key, value));
  }

  log.info(`Loaded ${stages.size} stages`);
  return new StageCatalog(stages);
}

export class StageCatalog {
  constructor(private readonly stages: ReadonlyMap<string, ExecutablePipeline>) {}

  has(name: string): boolean {
    return this.stages.has(name);
  }

  get(name: string): ExecutablePipeline | undefined {
    return this.stages.get(name);
  }

  names(): string[] {
    return [...this.stages.keys()].sort();
  }

  get size(): number {
    return this.stages.size;
  }

  /**
   * Descriptors for `names`, in order. All names are checked before any
   * descriptor is returned.
   */
  resolve(names: readonly StageName[]): ExecutablePipeline[] {
    const missing = names.filter(name => !this.stages.has(name));
    if (missing.length > 0) {
      throw new PipelineConfigError(`Unknown stages: ${[...new Set(missing)].join(', ')}`);
    }

    const resolved: ExecutablePipeline[] = [];
    for (const name of names) {
      const stage = this.stages.get(name);
      if (stage) resolved.push(stage);
    }
    return resolved;
  }
}
