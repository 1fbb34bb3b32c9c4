import type { PackedInstances } from '../frame-builder';

/** Smallest allocation, in instances. */
export const MIN_INSTANCE_CAPACITY = 64;

/** Next power of two ≥ `count`, never below MIN_INSTANCE_CAPACITY. */
export function growCapacity(count: number): number {
  let capacity = MIN_INSTANCE_CAPACITY;
  while (capacity < count) capacity *= 2;
  return capacity;
}

/**
 * GPU vertex buffer holding one pipeline's per-instance records.
 *
 * Allocated lazily and grown geometrically before an upload that would not
 * fit; growth replaces the buffer, since WebGPU buffers cannot be resized.
 */
export class InstanceBuffer {
  private buffer: GPUBuffer | null = null;
  private _capacity = 0;
  private _count = 0;
  private _grows = 0;

  constructor(
    private readonly device: GPUDevice,
    private readonly label: string,
    private readonly floatsPerInstance: number,
  ) {}

  get capacity(): number {
    return this._capacity;
  }

  /** Instances written by the last upload. */
  get count(): number {
    return this._count;
  }

  /** Number of reallocations so far. */
  get grows(): number {
    return this._grows;
  }

  get gpuBuffer(): GPUBuffer | null {
    return this.buffer;
  }

  upload(instances: PackedInstances): number {
    this._count = instances.count;
    if (instances.count === 0) return 0;
    this.ensureCapacity(instances.count);
    if (!this.buffer) return 0;
    this.device.queue.writeBuffer(
      this.buffer, 0,
      instances.data, 0,
      instances.count * this.floatsPerInstance,
    );
    return instances.count;
  }

  private ensureCapacity(count: number): void {
    if (this.buffer && count <= this._capacity) return;
    const capacity = growCapacity(count);
    if (this.buffer) {
      this.buffer.destroy();
      this._grows++;
    }
    this.buffer = this.device.createBuffer({
      label: this.label,
      size: capacity * this.floatsPerInstance * 4,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
    this._capacity = capacity;
  }

  destroy(): void {
    this.buffer?.destroy();
    this.buffer = null;
    this._capacity = 0;
    this._count = 0;
  }
}
