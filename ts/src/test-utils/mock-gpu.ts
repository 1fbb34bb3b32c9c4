import { vi } from 'vitest';
import type { RenderTarget } from '../gpu-context';

/** WebGPU flag namespaces are browser globals; Node has none. */
export function installGpuGlobals(): void {
  vi.stubGlobal('GPUBufferUsage', {
    MAP_READ: 0x0001, MAP_WRITE: 0x0002, COPY_SRC: 0x0004, COPY_DST: 0x0008, INDEX: 0x0010,
    VERTEX: 0x0020, UNIFORM: 0x0040, STORAGE: 0x0080, INDIRECT: 0x0100, QUERY_RESOLVE: 0x0200,
  });
  vi.stubGlobal('GPUTextureUsage', {
    COPY_SRC: 0x01, COPY_DST: 0x02, TEXTURE_BINDING: 0x04, STORAGE_BINDING: 0x08, RENDER_ATTACHMENT: 0x10,
  });
  vi.stubGlobal('GPUShaderStage', { VERTEX: 0x1, FRAGMENT: 0x2, COMPUTE: 0x4 });
  vi.stubGlobal('GPUColorWrite', { RED: 0x1, GREEN: 0x2, BLUE: 0x4, ALPHA: 0x8, ALL: 0xf });
}

export interface MockBuffer {
  label: string;
  size: number;
  usage: number;
  destroyed: boolean;
  destroy(): void;
}

export interface MockTexture {
  label: string;
  width: number;
  height: number;
  format: string;
  destroyed: boolean;
  createView(): { label: string };
  destroy(): void;
}

export interface BufferWrite {
  label: string;
  offset: number;
  values: number[];
}

export interface RecordedPass {
  label: string;
  loadOp: string;
  depthLoadOp: string;
  clearValue: unknown;
  /** setPipeline / setBindGroup / setVertexBuffer / drawIndexed, in call order. */
  commands: string[];
}

export interface MockGpuOptions {
  /** Resolve onSubmittedWorkDone() immediately instead of on completeWork(). */
  autoComplete?: boolean;
}

/**
 * Recording stand-in for a GPUDevice.
 *
 * Only the calls the renderer makes are implemented. Everything is logged in
 * `log` as short strings so tests can assert call order.
 */
export class MockGpu {
  readonly log: string[] = [];
  readonly buffers: MockBuffer[] = [];
  readonly textures: MockTexture[] = [];
  readonly writes: BufferWrite[] = [];
  readonly textureWrites: { label: string; bytes: number }[] = [];
  /** Bytes of every writeTexture, parallel to textureWrites. */
  readonly textureData: number[][] = [];
  readonly pipelines: GPURenderPipelineDescriptor[] = [];
  readonly passes: RecordedPass[] = [];
  readonly device: GPUDevice;
  submits = 0;
  destroyed = false;

  private readonly autoComplete: boolean;
  private pendingWork: (() => void)[] = [];
  private resolveLost: (info: GPUDeviceLostInfo) => void = () => {};

  constructor(options: MockGpuOptions = {}) {
    this.autoComplete = options.autoComplete ?? false;
    const lost = new Promise<GPUDeviceLostInfo>((resolve) => {
      this.resolveLost = resolve;
    });
    this.device = this.buildDevice(lost) as unknown as GPUDevice;
  }

  get pendingWorkCount(): number {
    return this.pendingWork.length;
  }

  /** Resolve every outstanding onSubmittedWorkDone(). */
  completeWork(): void {
    const work = this.pendingWork;
    this.pendingWork = [];
    for (const done of work) done();
  }

  loseDevice(message = 'test device loss', reason: GPUDeviceLostReason = 'unknown'): void {
    this.resolveLost({ reason, message } as unknown as GPUDeviceLostInfo);
  }

  buffer(label: string): MockBuffer | undefined {
    return this.buffers.filter(b => b.label === label).pop();
  }

  writesTo(label: string): BufferWrite[] {
    return this.writes.filter(w => w.label === label);
  }

  draws(): string[] {
    return this.passes.flatMap(p => p.commands.filter(c => c.startsWith('drawIndexed')).map(c => `${p.label}:${c}`));
  }

  private buildDevice(lost: Promise<GPUDeviceLostInfo>): object {
    const labelOf = (desc?: { label?: string }): string => desc?.label ?? '';
    const named = (desc?: { label?: string }) => ({ label: labelOf(desc) });

    const queue = {
      writeBuffer: (buffer: MockBuffer, offset: number, data: ArrayLike<number>, dataOffset = 0, size?: number) => {
        const end = size === undefined ? data.length : dataOffset + size;
        this.writes.push({ label: buffer.label, offset, values: Array.from(data).slice(dataOffset, end) });
        this.log.push(`writeBuffer:${buffer.label}`);
      },
      writeTexture: (dest: { texture: MockTexture }, data: ArrayLike<number>) => {
        this.textureWrites.push({ label: dest.texture.label, bytes: data.length });
        this.textureData.push(Array.from(data));
        this.log.push(`writeTexture:${dest.texture.label}`);
      },
      submit: (buffers: unknown[]) => {
        this.submits += buffers.length;
        this.log.push('submit');
      },
      onSubmittedWorkDone: () => {
        if (this.autoComplete) return Promise.resolve();
        return new Promise<void>((resolve) => this.pendingWork.push(resolve));
      },
    };

    return {
      queue,
      lost,
      createBuffer: (desc: { label?: string; size: number; usage: number }) => {
        const buf: MockBuffer = {
          label: labelOf(desc), size: desc.size, usage: desc.usage, destroyed: false,
          destroy() { this.destroyed = true; },
        };
        this.buffers.push(buf);
        this.log.push(`createBuffer:${buf.label}`);
        return buf;
      },
      createTexture: (desc: { label?: string; size: { width: number; height: number }; format: string }) => {
        const label = labelOf(desc);
        const tex: MockTexture = {
          label, width: desc.size.width, height: desc.size.height, format: desc.format, destroyed: false,
          createView: () => ({ label: `${label}-view` }),
          destroy() { this.destroyed = true; },
        };
        this.textures.push(tex);
        return tex;
      },
      createSampler: named,
      createShaderModule: named,
      createBindGroupLayout: named,
      createBindGroup: (desc: { label?: string }) => {
        this.log.push(`createBindGroup:${labelOf(desc)}`);
        return named(desc);
      },
      createPipelineLayout: named,
      createRenderPipeline: (desc: GPURenderPipelineDescriptor) => {
        this.pipelines.push(desc);
        return { label: labelOf(desc) };
      },
      createCommandEncoder: (desc?: { label?: string }) => {
        this.log.push(`encoder:${labelOf(desc)}`);
        return {
          beginRenderPass: (pass: GPURenderPassDescriptor) => this.beginPass(pass),
          finish: () => ({}),
        };
      },
      destroy: () => {
        this.destroyed = true;
        this.resolveLost({ reason: 'destroyed', message: '' } as unknown as GPUDeviceLostInfo);
      },
    };
  }

  private beginPass(desc: GPURenderPassDescriptor): object {
    const color = Array.from(desc.colorAttachments)[0];
    const recorded: RecordedPass = {
      label: desc.label ?? '',
      loadOp: color?.loadOp ?? '',
      depthLoadOp: desc.depthStencilAttachment?.depthLoadOp ?? '',
      clearValue: color?.clearValue,
      commands: [],
    };
    this.passes.push(recorded);
    this.log.push(`pass:${recorded.label}`);
    const labelOf = (o: { label?: string }): string => o.label ?? '';
    return {
      setPipeline: (p: { label?: string }) => recorded.commands.push(`setPipeline:${labelOf(p)}`),
      setBindGroup: (i: number, g: { label?: string }) => recorded.commands.push(`setBindGroup:${i}:${labelOf(g)}`),
      setVertexBuffer: (i: number, b: { label?: string }) => recorded.commands.push(`setVertexBuffer:${i}:${labelOf(b)}`),
      setIndexBuffer: (b: { label?: string }, format: string) => recorded.commands.push(`setIndexBuffer:${labelOf(b)}:${format}`),
      drawIndexed: (indexCount: number, instanceCount = 1) => recorded.commands.push(`drawIndexed:${indexCount}:${instanceCount}`),
      end: () => this.log.push(`end:${recorded.label}`),
    };
  }
}

/** Fixed-size target whose views are plain labelled objects. */
export class MockTarget implements RenderTarget {
  readonly format: GPUTextureFormat = 'bgra8unorm';
  configured = 0;
  destroyed = false;

  constructor(public width: number, public height: number) {}

  configure(_device: GPUDevice): void {
    this.configured++;
  }

  currentView(): GPUTextureView {
    return { label: 'target-view' } as unknown as GPUTextureView;
  }

  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

/** Let pending promise callbacks run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
