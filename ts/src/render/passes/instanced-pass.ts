import type { RenderPass, FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import type { PackedInstances } from '../../frame-builder';
import { QUAD_VERTEX_LAYOUT } from '../../instances';
import { InstanceBuffer } from '../instance-buffer';

/** Frames that may be in flight at once; one instance-buffer set per frame. */
export const FRAMES_IN_FLIGHT = 2;

export const DEPTH_FORMAT: GPUTextureFormat = 'depth24plus';

/** Source-over blending of non-premultiplied fragment colors. */
export const ALPHA_BLENDING: GPUBlendState = {
  color: { srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha', operation: 'add' },
  alpha: { srcFactor: 'one', dstFactor: 'one-minus-src-alpha', operation: 'add' },
};

/** Pool keys shared by every canvas pass. */
export const POOL = {
  cameraBuffer: 'camera-uniform',
  cameraLayout: 'camera',
  cameraBindGroup: 'camera',
  quadVertices: 'quad-vertices',
  quadIndices: 'quad-indices',
  atlasView: 'glyph-atlas',
  atlasSampler: 'glyph-atlas',
} as const;

export interface InstancedPassConfig {
  name: string;
  reads: string[];
  writes: string[];
  shaderSource: string;
  instanceLayout: GPUVertexBufferLayout;
  floatsPerInstance: number;
  depthStencil: GPUDepthStencilState;
  /** The first pass of the frame clears color and depth; later passes load. */
  clearsTarget: boolean;
}

/**
 * One pipeline drawing every instance of a primitive kind with a single
 * indexed, instanced draw over the shared unit quad.
 *
 * Bind group 0 is the shared camera uniform. Subclasses add further groups
 * through `extraBindGroupLayouts()` / `bindExtraGroups()` and pick their
 * instance list from the frame snapshot.
 */
export abstract class InstancedPass implements RenderPass {
  readonly name: string;
  readonly reads: string[];
  readonly writes: string[];

  protected device: GPUDevice | null = null;
  protected pipeline: GPURenderPipeline | null = null;
  private readonly config: InstancedPassConfig;
  private slots: InstanceBuffer[] = [];
  private activeSlot = 0;

  constructor(config: InstancedPassConfig) {
    this.config = config;
    this.name = config.name;
    this.reads = config.reads;
    this.writes = config.writes;
  }

  /** The instance list this pass draws from a frame snapshot. */
  protected abstract instancesOf(frame: FrameState): PackedInstances;

  protected extraBindGroupLayouts(_device: GPUDevice, _resources: ResourcePool): GPUBindGroupLayout[] {
    return [];
  }

  /** False skips the pass for this frame (a resource it samples is not available yet). */
  protected canDraw(_resources: ResourcePool): boolean {
    return true;
  }

  /** Bind groups beyond group 0. */
  protected bindExtraGroups(_pass: GPURenderPassEncoder, _resources: ResourcePool): void {}

  setup(device: GPUDevice, resources: ResourcePool): void {
    this.device = device;

    const cameraLayout = resources.getBindGroupLayout(POOL.cameraLayout);
    if (!cameraLayout) throw new Error(`${this.name}.setup: missing '${POOL.cameraLayout}' layout in ResourcePool`);
    const format = resources.targetFormat;
    if (!format) throw new Error(`${this.name}.setup: ResourcePool has no target format`);

    const module = device.createShaderModule({ label: `${this.name}-shader`, code: this.config.shaderSource });
    const layout = device.createPipelineLayout({
      label: `${this.name}-layout`,
      bindGroupLayouts: [cameraLayout, ...this.extraBindGroupLayouts(device, resources)],
    });

    this.pipeline = device.createRenderPipeline({
      label: `${this.name}-pipeline`,
      layout,
      vertex: {
        module,
        entryPoint: 'vs_main',
        buffers: [QUAD_VERTEX_LAYOUT, this.config.instanceLayout],
      },
      fragment: {
        module,
        entryPoint: 'fs_main',
        targets: [{ format, blend: ALPHA_BLENDING, writeMask: GPUColorWrite.ALL }],
      },
      depthStencil: this.config.depthStencil,
      // 2D: no back-face culling
      primitive: { topology: 'triangle-list', cullMode: 'none' },
    });

    this.slots.forEach(s => s.destroy());
    this.slots = [];
    for (let i = 0; i < FRAMES_IN_FLIGHT; i++) {
      this.slots.push(new InstanceBuffer(device, `${this.name}-instances-${i}`, this.config.floatsPerInstance));
    }
  }

  prepare(_device: GPUDevice, frame: FrameState): void {
    const slot = this.slots[frame.slot];
    if (!slot) throw new Error(`${this.name}.prepare: no instance buffer for slot ${frame.slot}`);
    this.activeSlot = frame.slot;
    slot.upload(this.instancesOf(frame));
  }

  execute(encoder: GPUCommandEncoder, frame: FrameState, resources: ResourcePool): number {
    let count = this.instancesOf(frame).count;
    if (count > 0 && !this.canDraw(resources)) count = 0;
    if (count === 0 && !this.config.clearsTarget) return 0;

    const pass = encoder.beginRenderPass({
      label: `${this.name}-pass`,
      colorAttachments: [{
        view: frame.colorView,
        loadOp: this.config.clearsTarget ? 'clear' : 'load',
        storeOp: 'store',
        clearValue: frame.clearColor,
      }],
      depthStencilAttachment: {
        view: frame.depthView,
        depthLoadOp: this.config.clearsTarget ? 'clear' : 'load',
        depthStoreOp: 'store',
        depthClearValue: 1.0,
      },
    });

    const drawn = this.draw(pass, count, resources);
    pass.end();
    return drawn;
  }

  private draw(pass: GPURenderPassEncoder, count: number, resources: ResourcePool): number {
    if (count === 0 || !this.pipeline) return 0;
    const instances = this.slots[this.activeSlot]?.gpuBuffer;
    const camera = resources.getBindGroup(POOL.cameraBindGroup);
    const vertices = resources.getBuffer(POOL.quadVertices);
    const indices = resources.getBuffer(POOL.quadIndices);
    if (!instances || !camera || !vertices || !indices) return 0;

    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, camera);
    this.bindExtraGroups(pass, resources);
    pass.setVertexBuffer(0, vertices);
    pass.setVertexBuffer(1, instances);
    pass.setIndexBuffer(indices, 'uint16');
    pass.drawIndexed(6, count);
    return 1;
  }

  /** Instance buffer backing `slot` (inspection and tests). */
  instanceBuffer(slot: number): InstanceBuffer | undefined {
    return this.slots[slot];
  }

  destroy(): void {
    for (const s of this.slots) s.destroy();
    this.slots = [];
    this.pipeline = null;
    this.device = null;
  }
}
