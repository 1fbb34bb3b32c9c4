import { describe, it, expect, beforeAll, vi } from 'vitest';
import { CanvasTarget, DeviceLostError, TextureTarget, createGpuContext } from './gpu-context';
import { MockGpu, installGpuGlobals } from './test-utils/mock-gpu';

beforeAll(() => {
  installGpuGlobals();
});

describe('DeviceLostError', () => {
  it('carries the loss reason and cause', () => {
    const cause = new Error('adapter gone');
    const err = new DeviceLostError('driver reset', { cause });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('DeviceLostError');
    expect(err.message).toBe('GPU device lost: driver reset');
    expect(err.reason).toBe('driver reset');
    expect(err.cause).toBe(cause);
  });
});

describe('TextureTarget', () => {
  it('allocates its texture on configure', () => {
    const gpu = new MockGpu();
    const target = new TextureTarget(320, 200);
    expect(() => target.currentView()).toThrow(/before configure/);
    target.configure(gpu.device);
    const tex = gpu.textures.find(t => t.label === 'offscreen-target');
    expect([tex?.width, tex?.height, tex?.format]).toEqual([320, 200, 'rgba8unorm']);
    expect(target.currentView()).toEqual({ label: 'offscreen-target-view' });
  });

  it('reallocates on resize and ignores same-size resizes', () => {
    const gpu = new MockGpu();
    const target = new TextureTarget(100, 100);
    target.configure(gpu.device);
    target.resize(100, 100);
    expect(gpu.textures).toHaveLength(1);
    target.resize(50, 25);
    expect(gpu.textures).toHaveLength(2);
    expect(gpu.textures[0].destroyed).toBe(true);
    expect([target.width, target.height]).toEqual([50, 25]);
    expect(target.gpuTexture?.width).toBe(50);
  });

  it('moves to a new device on reconfigure', () => {
    const first = new MockGpu();
    const second = new MockGpu();
    const target = new TextureTarget(8, 8);
    target.configure(first.device);
    target.configure(second.device);
    expect(first.textures[0].destroyed).toBe(true);
    expect(second.textures).toHaveLength(1);
  });

  it('destroy releases the texture', () => {
    const gpu = new MockGpu();
    const target = new TextureTarget(8, 8);
    target.configure(gpu.device);
    target.destroy();
    expect(gpu.textures[0].destroyed).toBe(true);
    expect(target.gpuTexture).toBeNull();
  });
});

describe('CanvasTarget', () => {
  const fakeCanvas = () => {
    const context = { configure: vi.fn(), unconfigure: vi.fn(), getCurrentTexture: vi.fn() };
    const canvas = { width: 300, height: 150, getContext: vi.fn(() => context) };
    return { canvas, context };
  };

  it('configures the context with format and alpha mode', () => {
    const { canvas, context } = fakeCanvas();
    const gpu = new MockGpu();
    const target = new CanvasTarget(canvas as unknown as HTMLCanvasElement, 'bgra8unorm', 'premultiplied');
    target.configure(gpu.device);
    expect(canvas.getContext).toHaveBeenCalledWith('webgpu');
    expect(context.configure).toHaveBeenCalledWith({ device: gpu.device, format: 'bgra8unorm', alphaMode: 'premultiplied' });
    expect([target.width, target.height]).toEqual([300, 150]);
  });

  it('resize sets the canvas size and reconfigures', () => {
    const { canvas, context } = fakeCanvas();
    const target = new CanvasTarget(canvas as unknown as HTMLCanvasElement, 'bgra8unorm');
    target.resize(640, 480);
    expect(context.configure).not.toHaveBeenCalled();
    target.configure(new MockGpu().device);
    target.resize(800, 600);
    expect([canvas.width, canvas.height]).toEqual([800, 600]);
    expect(context.configure).toHaveBeenCalledTimes(2);
  });

  it('throws when the canvas has no webgpu context', () => {
    const canvas = { width: 1, height: 1, getContext: () => null };
    expect(() => new CanvasTarget(canvas as unknown as HTMLCanvasElement, 'bgra8unorm')).toThrow(/WebGPU canvas context/);
  });
});

describe('createGpuContext', () => {
  it('fails without WebGPU', async () => {
    await expect(createGpuContext(undefined)).rejects.toThrow('WebGPU is not available');
  });

  it('fails without an adapter', async () => {
    const gpu = { requestAdapter: async () => null, getPreferredCanvasFormat: () => 'bgra8unorm' };
    await expect(createGpuContext(gpu as unknown as GPU)).rejects.toThrow('No WebGPU adapter found');
  });

  it('returns the device and preferred format', async () => {
    const mock = new MockGpu();
    const adapter = { requestDevice: async () => mock.device };
    const gpu = { requestAdapter: async () => adapter, getPreferredCanvasFormat: () => 'rgba8unorm' };
    const ctx = await createGpuContext(gpu as unknown as GPU);
    expect(ctx.device).toBe(mock.device);
    expect(ctx.format).toBe('rgba8unorm');
  });
});
