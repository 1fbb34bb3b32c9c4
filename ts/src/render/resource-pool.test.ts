import { describe, it, expect, vi } from 'vitest';
import { ResourcePool } from './resource-pool';

describe('ResourcePool', () => {
  it('should register and retrieve named buffers', () => {
    const pool = new ResourcePool();
    const mockBuffer = {} as GPUBuffer;
    pool.setBuffer('camera-uniform', mockBuffer);
    expect(pool.getBuffer('camera-uniform')).toBe(mockBuffer);
  });

  it('should return undefined for unknown resources', () => {
    const pool = new ResourcePool();
    expect(pool.getBuffer('nonexistent')).toBeUndefined();
    expect(pool.getSampler('nonexistent')).toBeUndefined();
    expect(pool.getTextureView('nonexistent')).toBeUndefined();
  });

  it('destroys a texture it replaces', () => {
    const pool = new ResourcePool();
    const first = { destroy: vi.fn() } as unknown as GPUTexture;
    const second = { destroy: vi.fn() } as unknown as GPUTexture;
    pool.setTexture('depth', first);
    pool.setTexture('depth', second);
    expect(first.destroy).toHaveBeenCalledTimes(1);
    expect(pool.getTexture('depth')).toBe(second);
  });

  it('records the target format', () => {
    const pool = new ResourcePool();
    expect(pool.targetFormat).toBeNull();
    pool.setTargetFormat('bgra8unorm');
    expect(pool.targetFormat).toBe('bgra8unorm');
  });

  it('destroy releases buffers and textures and forgets everything', () => {
    const pool = new ResourcePool();
    const buffer = { destroy: vi.fn() } as unknown as GPUBuffer;
    const texture = { destroy: vi.fn() } as unknown as GPUTexture;
    pool.setBuffer('quad-vertices', buffer);
    pool.setTexture('depth', texture);
    pool.setBindGroup('camera', {} as GPUBindGroup);
    pool.destroy();
    expect(buffer.destroy).toHaveBeenCalledTimes(1);
    expect(texture.destroy).toHaveBeenCalledTimes(1);
    expect(pool.getBuffer('quad-vertices')).toBeUndefined();
    expect(pool.getBindGroup('camera')).toBeUndefined();
  });
});
