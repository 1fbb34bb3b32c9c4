import { describe, it, expect, beforeAll, vi } from 'vitest';
import { GlyphPass } from './glyph-pass';
import { POOL } from './instanced-pass';
import { ResourcePool } from '../resource-pool';
import type { FrameState } from '../render-pass';
import { FrameBuilder } from '../../frame-builder';
import { Camera } from '../../camera';
import { glyph } from '../../instances';
import { MockGpu, installGpuGlobals } from '../../test-utils/mock-gpu';

beforeAll(() => {
  installGpuGlobals();
});

function setup() {
  const gpu = new MockGpu();
  const device = gpu.device;
  const pool = new ResourcePool();
  pool.setTargetFormat('bgra8unorm');
  const layout = device.createBindGroupLayout({ label: 'camera-layout', entries: [] });
  pool.setBindGroupLayout(POOL.cameraLayout, layout);
  pool.setBindGroup(POOL.cameraBindGroup, device.createBindGroup({ label: 'camera-bind-group', layout, entries: [] }));
  pool.setBuffer(POOL.quadVertices, device.createBuffer({ label: 'quad-vertices', size: 32, usage: 0 }));
  pool.setBuffer(POOL.quadIndices, device.createBuffer({ label: 'quad-indices', size: 12, usage: 0 }));
  const warn = vi.fn();
  const pass = new GlyphPass(warn);
  pass.setup(device, pool);
  return { gpu, pool, pass, warn };
}

function glyphFrame(count: number): FrameState {
  const fb = new FrameBuilder();
  for (let i = 0; i < count; i++) fb.addGlyph(glyph(i * 8, 0, 8, 12, [0, 0], [0.5, 0.5], [1, 1, 1, 1]));
  return {
    snapshot: fb.finish(),
    camera: Camera.identity(100, 100).snapshot(),
    slot: 0,
    colorView: {} as GPUTextureView,
    depthView: {} as GPUTextureView,
    clearColor: { r: 0, g: 0, b: 0, a: 1 },
  };
}

function bindAtlas(pool: ResourcePool, label: string): void {
  pool.setTextureView(POOL.atlasView, { label } as unknown as GPUTextureView);
  pool.setSampler(POOL.atlasSampler, { label: 'glyph-atlas-sampler' } as unknown as GPUSampler);
}

function run(gpu: MockGpu, pass: GlyphPass, pool: ResourcePool, state: FrameState): number {
  pass.prepare(gpu.device, state);
  return pass.execute(gpu.device.createCommandEncoder({ label: 'test' }), state, pool);
}

describe('GlyphPass', () => {
  it('declares its place between rects and cursors', () => {
    const pass = new GlyphPass(() => {});
    expect(pass.name).toBe('glyphs');
    expect(pass.reads).toContain('rect-layer');
    expect(pass.writes).toEqual(['glyph-layer']);
  });

  it('skips the draw without an atlas and warns once', () => {
    const { gpu, pool, pass, warn } = setup();
    expect(run(gpu, pass, pool, glyphFrame(2))).toBe(0);
    expect(run(gpu, pass, pool, glyphFrame(2))).toBe(0);
    expect(gpu.passes).toHaveLength(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/glyph atlas/);
  });

  it('does not warn for frames without glyphs', () => {
    const { gpu, pool, pass, warn } = setup();
    expect(run(gpu, pass, pool, glyphFrame(0))).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });

  it('binds the atlas at group 1 once one is available', () => {
    const { gpu, pool, pass } = setup();
    bindAtlas(pool, 'atlas-view-a');
    expect(run(gpu, pass, pool, glyphFrame(3))).toBe(1);
    expect(gpu.passes[0].commands).toEqual([
      'setPipeline:glyphs-pipeline',
      'setBindGroup:0:camera-bind-group',
      'setBindGroup:1:glyph-atlas-bind-group',
      'setVertexBuffer:0:quad-vertices',
      'setVertexBuffer:1:glyphs-instances-0',
      'setIndexBuffer:quad-indices:uint16',
      'drawIndexed:6:3',
    ]);
    expect(gpu.passes[0].loadOp).toBe('load');
  });

  it('reuses the atlas bind group until the atlas view changes', () => {
    const { gpu, pool, pass } = setup();
    const atlasGroups = () => gpu.log.filter(l => l === 'createBindGroup:glyph-atlas-bind-group').length;
    bindAtlas(pool, 'atlas-view-a');
    run(gpu, pass, pool, glyphFrame(1));
    run(gpu, pass, pool, glyphFrame(1));
    expect(atlasGroups()).toBe(1);
    bindAtlas(pool, 'atlas-view-b');
    run(gpu, pass, pool, glyphFrame(1));
    expect(atlasGroups()).toBe(2);
  });

  it('warns when the atlas disappears after having been bound', () => {
    const { gpu, pool, pass, warn } = setup();
    bindAtlas(pool, 'atlas-view-a');
    run(gpu, pass, pool, glyphFrame(1));
    pool.destroy();
    run(gpu, pass, pool, glyphFrame(1));
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
