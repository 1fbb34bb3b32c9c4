/** Raised when the GPU device is lost and could not be rebuilt. */
export class DeviceLostError extends Error {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`GPU device lost: ${reason}`, options);
    this.name = 'DeviceLostError';
    this.reason = reason;
  }
}

/** Anything a frame can be drawn into. */
export interface RenderTarget {
  readonly width: number;
  readonly height: number;
  readonly format: GPUTextureFormat;
  /** Bind to a (possibly new) device. Called at start-up and after device loss. */
  configure(device: GPUDevice): void;
  /** View of the texture to draw the current frame into. */
  currentView(): GPUTextureView;
  resize(width: number, height: number): void;
  destroy(): void;
}

export type CanvasLike = HTMLCanvasElement | OffscreenCanvas;

/** On-screen target backed by a canvas `webgpu` context. */
export class CanvasTarget implements RenderTarget {
  readonly format: GPUTextureFormat;
  private readonly context: GPUCanvasContext;
  private readonly alphaMode: GPUCanvasAlphaMode;
  private device: GPUDevice | null = null;

  constructor(
    private readonly canvas: CanvasLike,
    format: GPUTextureFormat,
    alphaMode: GPUCanvasAlphaMode = 'opaque',
  ) {
    const context = canvas.getContext('webgpu');
    if (!context) throw new Error('Failed to get WebGPU canvas context');
    this.context = context;
    this.format = format;
    this.alphaMode = alphaMode;
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  configure(device: GPUDevice): void {
    this.device = device;
    this.context.configure({ device, format: this.format, alphaMode: this.alphaMode });
  }

  currentView(): GPUTextureView {
    return this.context.getCurrentTexture().createView();
  }

  resize(width: number, height: number): void {
    this.canvas.width = width;
    this.canvas.height = height;
    // The swapchain picks up the new canvas size on the next getCurrentTexture().
    if (this.device) this.configure(this.device);
  }

  destroy(): void {
    this.context.unconfigure();
    this.device = null;
  }
}

/** Offscreen texture target for headless rendering and readback. */
export class TextureTarget implements RenderTarget {
  readonly format: GPUTextureFormat;
  private device: GPUDevice | null = null;
  private texture: GPUTexture | null = null;
  private view: GPUTextureView | null = null;
  private _width: number;
  private _height: number;

  constructor(width: number, height: number, format: GPUTextureFormat = 'rgba8unorm') {
    this._width = width;
    this._height = height;
    this.format = format;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /** The backing texture, for copies and readback. */
  get gpuTexture(): GPUTexture | null {
    return this.texture;
  }

  configure(device: GPUDevice): void {
    this.device = device;
    this.allocate();
  }

  currentView(): GPUTextureView {
    if (!this.view) throw new Error('TextureTarget used before configure()');
    return this.view;
  }

  resize(width: number, height: number): void {
    if (width === this._width && height === this._height) return;
    this._width = width;
    this._height = height;
    if (this.device) this.allocate();
  }

  private allocate(): void {
    if (!this.device) return;
    this.texture?.destroy();
    this.texture = this.device.createTexture({
      label: 'offscreen-target',
      size: { width: this._width, height: this._height },
      format: this.format,
      usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.COPY_SRC | GPUTextureUsage.TEXTURE_BINDING,
    });
    this.view = this.texture.createView();
  }

  destroy(): void {
    this.texture?.destroy();
    this.texture = null;
    this.view = null;
    this.device = null;
  }
}

export interface GpuContext {
  device: GPUDevice;
  /** Preferred swapchain format of this platform. */
  format: GPUTextureFormat;
}

/** Acquire an adapter and device from `navigator.gpu`. */
export async function createGpuContext(gpu: GPU | undefined = globalThis.navigator?.gpu): Promise<GpuContext> {
  if (!gpu) throw new Error('WebGPU is not available in this environment');
  const adapter = await gpu.requestAdapter();
  if (!adapter) throw new Error('No WebGPU adapter found');
  const device = await adapter.requestDevice();
  return { device, format: gpu.getPreferredCanvasFormat() };
}
