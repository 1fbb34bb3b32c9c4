import { Camera } from './camera';
import type { FrameSnapshot } from './frame-builder';
import { CanvasTarget, DeviceLostError, TextureTarget, createGpuContext } from './gpu-context';
import type { CanvasLike, RenderTarget } from './gpu-context';
import { QUAD_INDICES, QUAD_VERTICES } from './instances';
import type { Rgba } from './instances';
import { GlyphAtlas } from './render/glyph-atlas';
import type { AtlasImage } from './render/glyph-atlas';
import { RenderGraph } from './render/render-graph';
import type { FrameState } from './render/render-pass';
import { ResourcePool } from './render/resource-pool';
import { CursorPass } from './render/passes/cursor-pass';
import { GlyphPass } from './render/passes/glyph-pass';
import { DEPTH_FORMAT, FRAMES_IN_FLIGHT, POOL } from './render/passes/instanced-pass';
import { RectPass } from './render/passes/rect-pass';
import { validateColor, validateConfig } from './types';
import type { CompositorConfig, CompositorStats, FrameStats, ResolvedConfig } from './types';

/** Supplies a fresh device when the current one is lost. */
export type DeviceProvider = () => Promise<GPUDevice>;

const DEPTH_KEY = 'depth';
const CAMERA_UNIFORM_BYTES = 64; // mat4x4<f32>

/**
 * Draws frame snapshots into a render target.
 *
 * One frame: camera uniform written once, the three instance lists uploaded,
 * then rects → glyphs → cursors encoded into one command buffer. Producers
 * hand snapshots over with `submit()`; the render loop drains the mailbox
 * with `renderPending()`. Two frame slots keep the CPU from overwriting an
 * instance buffer the GPU is still reading.
 */
export class FrameCompositor {
  private device: GPUDevice;
  private readonly target: RenderTarget;
  private readonly config: ResolvedConfig;
  private readonly requestDevice: DeviceProvider | null;
  private readonly ownsDevice: boolean;

  private readonly pool = new ResourcePool();
  private readonly graph = new RenderGraph();
  private readonly atlas: GlyphAtlas;
  private readonly _camera: Camera;

  private clearColor: Rgba;
  private pending: FrameSnapshot | null = null;
  private slotBusy: boolean[] = new Array<boolean>(FRAMES_IN_FLIGHT).fill(false);
  private nextSlot = 0;
  /** Bumped on every (re)attach so fences from a dead device are ignored. */
  private generation = 0;
  private lost = false;
  private lostReason = '';
  private destroyed = false;
  private staleWarned = false;
  private recovery: Promise<void> | null = null;

  private readonly _stats: CompositorStats = {
    framesRendered: 0,
    framesDropped: 0,
    framesSkipped: 0,
    deviceLosses: 0,
    lastFrame: null,
  };

  private constructor(
    device: GPUDevice,
    target: RenderTarget,
    config: ResolvedConfig,
    requestDevice: DeviceProvider | null,
    ownsDevice: boolean,
  ) {
    this.device = device;
    this.target = target;
    this.config = config;
    this.requestDevice = requestDevice;
    this.ownsDevice = ownsDevice;
    this.clearColor = config.clearColor;
    this._camera = Camera.identity(target.width, target.height);
    this.atlas = new GlyphAtlas(device);

    this.graph.addPass(new RectPass());
    this.graph.addPass(new GlyphPass(config.onWarn));
    this.graph.addPass(new CursorPass());
    this.graph.compile();

    this.attach(device);
  }

  /** Acquire a WebGPU device and render into `canvas`. */
  static async create(canvas: CanvasLike, config: CompositorConfig = {}): Promise<FrameCompositor> {
    const resolved = validateConfig(config);
    const { device, format } = await createGpuContext();
    const target = new CanvasTarget(canvas, format, resolved.alphaMode);
    return new FrameCompositor(device, target, resolved, reacquireDevice, true);
  }

  /** Render into an offscreen texture (thumbnails, exports, readback). */
  static async headless(width: number, height: number, config: CompositorConfig = {}): Promise<FrameCompositor> {
    const resolved = validateConfig(config);
    const { device } = await createGpuContext();
    return new FrameCompositor(device, new TextureTarget(width, height), resolved, reacquireDevice, true);
  }

  /**
   * Use a device the caller owns. Without `requestDevice` a lost device
   * cannot be replaced and recovery fails with DeviceLostError.
   */
  static fromDevice(
    device: GPUDevice,
    target: RenderTarget,
    config: CompositorConfig = {},
    requestDevice?: DeviceProvider,
  ): FrameCompositor {
    return new FrameCompositor(device, target, validateConfig(config), requestDevice ?? null, false);
  }

  get camera(): Camera {
    return this._camera;
  }

  get renderTarget(): RenderTarget {
    return this.target;
  }

  get isLost(): boolean {
    return this.lost;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  get stats(): Readonly<CompositorStats> {
    return { ...this._stats };
  }

  /** Pass execution order, for diagnostics. */
  get passOrder(): string[] {
    return this.graph.compile();
  }

  /**
   * Hand a snapshot to the compositor. Only the latest one is kept; a
   * snapshot replaced before it was drawn counts as dropped.
   */
  submit(snapshot: FrameSnapshot): void {
    if (this.pending) this._stats.framesDropped++;
    this.pending = snapshot;
  }

  /** Draw the mailbox snapshot if there is one and a frame slot is free. */
  renderPending(): FrameStats | null {
    const snapshot = this.pending;
    if (!snapshot || this.lost || this.destroyed) return null;
    if (this.slotBusy[this.nextSlot]) return null;
    this.pending = null;
    return this.draw(snapshot);
  }

  /**
   * Draw `snapshot` now. Returns null when nothing was drawn: device lost,
   * camera out of date for the target, or both frame slots still in flight
   * (the snapshot then waits in the mailbox).
   */
  renderFrame(snapshot: FrameSnapshot): FrameStats | null {
    if (this.lost || this.destroyed) return null;
    if (this.slotBusy[this.nextSlot]) {
      this.submit(snapshot);
      return null;
    }
    return this.draw(snapshot);
  }

  resize(width: number, height: number): void {
    this._camera.setViewport(width, height);
    this.target.resize(width, height);
    if (!this.lost) this.createDepthTarget();
    this.staleWarned = false;
  }

  setClearColor(color: Rgba): void {
    this.clearColor = validateColor(color, 'clearColor');
  }

  /** Upload (or replace) the glyph atlas bitmap. A CPU copy is kept for device loss. */
  uploadAtlas(image: AtlasImage): void {
    this.atlas.upload(image);
    this.publishAtlas();
  }

  /**
   * Rebuild device, pipelines, buffers and atlas after device loss.
   * Rejects with DeviceLostError (also passed to `onError`) when no new
   * device can be set up.
   */
  recover(): Promise<void> {
    if (!this.recovery) {
      this.recovery = this.rebuild().finally(() => {
        this.recovery = null;
      });
    }
    return this.recovery;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.pending = null;
    this.graph.destroy();
    this.atlas.destroy();
    this.pool.destroy();
    this.target.destroy();
    if (this.ownsDevice) this.device.destroy();
  }

  private draw(snapshot: FrameSnapshot): FrameStats | null {
    const camera = this._camera.snapshot();
    if (camera.viewportWidth !== this.target.width || camera.viewportHeight !== this.target.height) {
      this._stats.framesSkipped++;
      if (!this.staleWarned) {
        this.staleWarned = true;
        this.config.onWarn(
          `Skipping frame ${snapshot.frameId}: camera viewport ${camera.viewportWidth}x${camera.viewportHeight} ` +
          `does not match render target ${this.target.width}x${this.target.height}; call resize()`,
        );
      }
      return null;
    }
    this.staleWarned = false;

    // The target may have been resized without resize(); depth must match the color attachment.
    const depth = this.pool.getTexture(DEPTH_KEY);
    if (depth && (depth.width !== this.target.width || depth.height !== this.target.height)) {
      this.createDepthTarget();
    }

    const cameraBuffer = this.pool.getBuffer(POOL.cameraBuffer);
    const depthView = this.pool.getTextureView(DEPTH_KEY);
    if (!cameraBuffer || !depthView) {
      throw new Error('FrameCompositor: GPU resources missing; was the compositor destroyed?');
    }

    const slot = this.nextSlot;
    this.device.queue.writeBuffer(cameraBuffer, 0, camera.viewProjection);

    const [r, g, b, a] = this.clearColor;
    const frame: FrameState = {
      snapshot,
      camera,
      slot,
      colorView: this.target.currentView(),
      depthView,
      clearColor: { r, g, b, a },
    };
    const drawCalls = this.graph.render(this.device, frame, this.pool);
    this.fence(slot);
    this.nextSlot = (slot + 1) % FRAMES_IN_FLIGHT;

    const stats: FrameStats = {
      frameId: snapshot.frameId,
      rectCount: snapshot.rects.count,
      glyphCount: snapshot.glyphs.count,
      cursorCount: snapshot.cursors.count,
      drawCalls,
      rejected: snapshot.rejected,
    };
    this._stats.framesRendered++;
    this._stats.lastFrame = stats;
    return stats;
  }

  /** Mark `slot` busy until the GPU has finished the work just submitted. */
  private fence(slot: number): void {
    this.slotBusy[slot] = true;
    const generation = this.generation;
    const release = (): void => {
      if (generation === this.generation) this.slotBusy[slot] = false;
    };
    void this.device.queue.onSubmittedWorkDone().then(release, (error: unknown) => {
      release();
      this.config.onWarn(`Frame slot ${slot} fence failed: ${errorMessage(error)}`);
    });
  }

  private attach(device: GPUDevice): void {
    this.device = device;
    this.generation++;
    this.slotBusy = new Array<boolean>(FRAMES_IN_FLIGHT).fill(false);
    this.nextSlot = 0;

    this.pool.destroy();
    this.pool.setTargetFormat(this.target.format);
    this.target.configure(device);

    const cameraBuffer = device.createBuffer({
      label: 'camera-uniform',
      size: CAMERA_UNIFORM_BYTES,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });
    const cameraLayout = device.createBindGroupLayout({
      label: 'camera-layout',
      entries: [{ binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } }],
    });
    this.pool.setBuffer(POOL.cameraBuffer, cameraBuffer);
    this.pool.setBindGroupLayout(POOL.cameraLayout, cameraLayout);
    this.pool.setBindGroup(POOL.cameraBindGroup, device.createBindGroup({
      label: 'camera-bind-group',
      layout: cameraLayout,
      entries: [{ binding: 0, resource: { buffer: cameraBuffer } }],
    }));

    const vertices = device.createBuffer({
      label: 'quad-vertices',
      size: QUAD_VERTICES.byteLength,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
    device.queue.writeBuffer(vertices, 0, QUAD_VERTICES);
    this.pool.setBuffer(POOL.quadVertices, vertices);

    const indices = device.createBuffer({
      label: 'quad-indices',
      size: QUAD_INDICES.byteLength,
      usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
    });
    device.queue.writeBuffer(indices, 0, QUAD_INDICES);
    this.pool.setBuffer(POOL.quadIndices, indices);

    this.createDepthTarget();
    this.atlas.restore(device);
    this.publishAtlas();
    this.graph.setup(device, this.pool);

    void device.lost.then((info) => this.onDeviceLost(device, info));
  }

  private createDepthTarget(): void {
    const depth = this.device.createTexture({
      label: 'canvas-depth',
      size: { width: this.target.width, height: this.target.height },
      format: DEPTH_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    });
    this.pool.setTexture(DEPTH_KEY, depth);
    this.pool.setTextureView(DEPTH_KEY, depth.createView());
  }

  private publishAtlas(): void {
    const view = this.atlas.view;
    if (!view) return;
    this.pool.setTextureView(POOL.atlasView, view);
    this.pool.setSampler(POOL.atlasSampler, this.atlas.sampler);
  }

  private onDeviceLost(device: GPUDevice, info: GPUDeviceLostInfo): void {
    if (device !== this.device || this.destroyed) return;
    const reason = info.message || info.reason;
    this.lost = true;
    this.lostReason = reason;
    this.pending = null;
    this._stats.deviceLosses++;
    this.config.onWarn(`GPU device lost (${reason})`);
    this.config.onDeviceLost?.(reason);

    // 'destroyed' means someone called device.destroy(); nothing to recover from.
    if (!this.config.autoRecover || info.reason === 'destroyed') return;
    void this.recover().then(
      () => this.config.onWarn('GPU device recovered'),
      (error: unknown) => {
        // onError has already received it.
        if (!this.config.onError) this.config.onWarn(errorMessage(error));
      },
    );
  }

  private async rebuild(): Promise<void> {
    if (!this.lost) return;
    try {
      if (!this.requestDevice) {
        throw new DeviceLostError(`${this.lostReason} (no device provider to recover with)`);
      }
      const device = await this.requestDevice();
      if (this.destroyed) {
        device.destroy();
        return;
      }
      this.attach(device);
      this.lost = false;
    } catch (error) {
      const failure = error instanceof DeviceLostError
        ? error
        : new DeviceLostError(this.lostReason, { cause: error });
      this.config.onError?.(failure);
      throw failure;
    }
  }
}

const reacquireDevice: DeviceProvider = async () => (await createGpuContext()).device;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
