import { describe, it, expect, vi } from 'vitest';
import { CanvasPresenter, OutputPresenter } from '../../src/engine/render/OutputPresenter';
import { FakeDevice, FakeTexture, asDevice, asEncoder, asTexture, asView } from '../helpers/mockGpu';

function outputTexture(): FakeTexture {
  return new FakeTexture('result', 128, 72, 'rgba32float', 0x04);
}

describe('OutputPresenter', () => {
  it('builds a render pipeline for the target format', () => {
    const device = new FakeDevice();
    new OutputPresenter(asDevice(device), 'bgra8unorm');
    new OutputPresenter(asDevice(device), 'bgra8unorm', { colorConversion: 'rec709-to-srgb' });

    expect(device.renderPipelines.map(p => p.fragmentEntryPoint)).toEqual(['fs_passthrough', 'fs_rec709']);
    expect(device.samplers[0]).toMatchObject({ magFilter: 'linear', minFilter: 'linear' });
  });

  it('draws a full-screen quad into the target view', () => {
    const device = new FakeDevice();
    const presenter = new OutputPresenter(asDevice(device), 'bgra8unorm');
    const target = new FakeTexture('canvas', 128, 72, 'bgra8unorm', 0x10).createView();

    presenter.bind(asTexture(outputTexture()));
    const encoder = device.createCommandEncoder();
    presenter.encode(asEncoder(encoder), asView(target));

    expect(encoder.draws).toEqual([{ label: 'Present pass', vertexCount: 6, target }]);
  });

  it('rebuilds the bind group only when the texture changes', () => {
    const device = new FakeDevice();
    const presenter = new OutputPresenter(asDevice(device), 'bgra8unorm');
    const first = asTexture(outputTexture());

    presenter.bind(first);
    presenter.bind(first);
    expect(device.bindGroups).toHaveLength(1);

    presenter.bind(asTexture(outputTexture()));
    expect(device.bindGroups).toHaveLength(2);
    expect(presenter.boundTo).not.toBe(first);
  });

  it('refuses to draw with nothing bound', () => {
    const device = new FakeDevice();
    const presenter = new OutputPresenter(asDevice(device), 'bgra8unorm');
    const target = asView(new FakeTexture('canvas', 8, 8, 'bgra8unorm', 0x10).createView());
    expect(() => presenter.encode(asEncoder(device.createCommandEncoder()), target)).toThrow('OutputPresenter has no texture bound');
  });
});

describe('CanvasPresenter', () => {
  function canvasSetup() {
    const device = new FakeDevice();
    const canvas = { width: 300, height: 150 };
    const current = new FakeTexture('canvas', 300, 150, 'bgra8unorm', 0x10);
    const context = {
      configure: vi.fn(),
      getCurrentTexture: vi.fn(() => asTexture(current)),
    };
    const presenter = new CanvasPresenter(asDevice(device), canvas, context, 'bgra8unorm');
    return { device, canvas, context, presenter };
  }

  it('resizes the canvas to the output and reconfigures it', () => {
    const { canvas, context, presenter } = canvasSetup();

    presenter.resize({ width: 1280, height: 720 });
    presenter.resize({ width: 1280, height: 720 });

    expect(canvas).toEqual({ width: 1280, height: 720 });
    expect(context.configure).toHaveBeenCalledTimes(1);
    expect(context.configure.mock.calls[0][0]).toMatchObject({ format: 'bgra8unorm', alphaMode: 'opaque' });
  });

  it('configures a canvas that already has the output size', () => {
    const { canvas, context, presenter } = canvasSetup();

    presenter.resize({ width: 300, height: 150 });
    presenter.resize({ width: 300, height: 150 });

    expect(canvas).toEqual({ width: 300, height: 150 });
    expect(context.configure).toHaveBeenCalledTimes(1);
  });

  it('configures the context before the first present when never resized', () => {
    const { device, context, presenter } = canvasSetup();

    presenter.present(asEncoder(device.createCommandEncoder()), asTexture(outputTexture()));
    presenter.present(asEncoder(device.createCommandEncoder()), asTexture(outputTexture()));

    expect(context.configure).toHaveBeenCalledTimes(1);
    expect(context.configure.mock.invocationCallOrder[0]).toBeLessThan(context.getCurrentTexture.mock.invocationCallOrder[0]);
  });

  it('draws each frame into the current canvas texture', () => {
    const { device, context, presenter } = canvasSetup();
    const encoder = device.createCommandEncoder();

    presenter.present(asEncoder(encoder), asTexture(outputTexture()));

    expect(context.getCurrentTexture).toHaveBeenCalledTimes(1);
    expect(encoder.draws).toHaveLength(1);
    expect(encoder.draws[0].target.texture.label).toBe('canvas');
  });
});
