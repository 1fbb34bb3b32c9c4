import type { FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import type { PackedInstances } from '../../frame-builder';
import type { WarnFn } from '../../types';
import { GLYPH_FLOATS, GLYPH_INSTANCE_LAYOUT } from '../../instances';
import { DEPTH_FORMAT, InstancedPass, POOL } from './instanced-pass';
import shaderSource from '../../shaders/glyph.wgsl?raw';

/**
 * Text glyphs sampling the shared atlas (group 1: texture + sampler).
 *
 * Composited over every rectangle regardless of z (`always`, no depth
 * write). Until an atlas is bound the pass is skipped and warns once.
 */
export class GlyphPass extends InstancedPass {
  private atlasLayout: GPUBindGroupLayout | null = null;
  private atlasBindGroup: GPUBindGroup | null = null;
  private atlasBoundView: GPUTextureView | null = null;
  private warnedMissingAtlas = false;
  private readonly warn: WarnFn;

  constructor(warn: WarnFn, source: string = shaderSource) {
    super({
      name: 'glyphs',
      reads: ['camera-uniform', 'rect-layer'],
      writes: ['glyph-layer'],
      shaderSource: source,
      instanceLayout: GLYPH_INSTANCE_LAYOUT,
      floatsPerInstance: GLYPH_FLOATS,
      depthStencil: { format: DEPTH_FORMAT, depthWriteEnabled: false, depthCompare: 'always' },
      clearsTarget: false,
    });
    this.warn = warn;
  }

  protected instancesOf(frame: FrameState): PackedInstances {
    return frame.snapshot.glyphs;
  }

  protected extraBindGroupLayouts(device: GPUDevice): GPUBindGroupLayout[] {
    this.atlasLayout = device.createBindGroupLayout({
      label: 'glyph-atlas-layout',
      entries: [
        { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float', viewDimension: '2d' } },
        { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: { type: 'filtering' } },
      ],
    });
    this.atlasBindGroup = null;
    this.atlasBoundView = null;
    return [this.atlasLayout];
  }

  protected canDraw(resources: ResourcePool): boolean {
    const view = resources.getTextureView(POOL.atlasView);
    const sampler = resources.getSampler(POOL.atlasSampler);
    if (!view || !sampler || !this.device || !this.atlasLayout) {
      if (!this.warnedMissingAtlas) {
        this.warnedMissingAtlas = true;
        this.warn('No glyph atlas bound; skipping glyph draws until one is uploaded');
      }
      return false;
    }
    if (view !== this.atlasBoundView || !this.atlasBindGroup) {
      this.atlasBindGroup = this.device.createBindGroup({
        label: 'glyph-atlas-bind-group',
        layout: this.atlasLayout,
        entries: [
          { binding: 0, resource: view },
          { binding: 1, resource: sampler },
        ],
      });
      this.atlasBoundView = view;
    }
    this.warnedMissingAtlas = false;
    return true;
  }

  protected bindExtraGroups(pass: GPURenderPassEncoder): void {
    if (this.atlasBindGroup) pass.setBindGroup(1, this.atlasBindGroup);
  }

  destroy(): void {
    this.atlasLayout = null;
    this.atlasBindGroup = null;
    this.atlasBoundView = null;
    super.destroy();
  }
}
