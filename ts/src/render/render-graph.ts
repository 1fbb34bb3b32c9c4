import type { RenderPass, FrameState } from './render-pass';
import type { ResourcePool } from './resource-pool';

/**
 * Directed acyclic graph of render passes.
 *
 * Passes declare resource reads/writes; `compile()` topologically sorts them
 * via Kahn's algorithm. Ties keep registration order, so the canvas layers
 * (rects → glyphs → cursors) chained through their layer resources always
 * execute in the same sequence. Call `render()` each frame to prepare +
 * encode every pass into a single command buffer.
 */
export class RenderGraph {
  private passes = new Map<string, RenderPass>();
  private executionOrder: RenderPass[] = [];
  private _needsRecompile = true;

  addPass(pass: RenderPass): void {
    if (this.passes.has(pass.name)) {
      throw new Error(`RenderPass '${pass.name}' already registered`);
    }
    this.passes.set(pass.name, pass);
    this._needsRecompile = true;
  }

  /**
   * Build the topologically sorted execution order.
   *
   * Returns the ordered list of pass names that will execute each frame.
   * Throws if the dependency graph contains a cycle or a resource has more
   * than one writer.
   */
  compile(): string[] {
    // --- 1. Build adjacency list from resource dependencies ---
    const resourceWriters = new Map<string, string>();
    const adj = new Map<string, string[]>();
    const inDegree = new Map<string, number>();

    for (const [name, pass] of this.passes) {
      adj.set(name, []);
      inDegree.set(name, 0);
      for (const w of pass.writes) {
        const existing = resourceWriters.get(w);
        if (existing !== undefined) {
          throw new Error(`Resource '${w}' has multiple writers: '${existing}' and '${name}'`);
        }
        resourceWriters.set(w, name);
      }
    }

    for (const [name, pass] of this.passes) {
      for (const r of pass.reads) {
        const writer = resourceWriters.get(r);
        if (writer !== undefined && writer !== name) {
          adj.get(writer)?.push(name);
          inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
        }
      }
    }

    // --- 2. Kahn's algorithm ---
    const queue: string[] = [];
    for (const [name, deg] of inDegree) {
      if (deg === 0) queue.push(name);
    }

    const sorted: RenderPass[] = [];
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const pass = this.passes.get(current);
      if (pass) sorted.push(pass);
      for (const neighbor of adj.get(current) ?? []) {
        const newDeg = (inDegree.get(neighbor) ?? 0) - 1;
        inDegree.set(neighbor, newDeg);
        if (newDeg === 0) queue.push(neighbor);
      }
    }

    if (sorted.length !== this.passes.size) {
      throw new Error('RenderGraph has a cycle, cannot compile');
    }

    this.executionOrder = sorted;
    this._needsRecompile = false;
    return sorted.map(p => p.name);
  }

  /** Call `setup()` on every pass in execution order. */
  setup(device: GPUDevice, resources: ResourcePool): void {
    if (this._needsRecompile) this.compile();
    for (const pass of this.executionOrder) pass.setup(device, resources);
  }

  /**
   * Prepare and execute every pass, submitting a single command buffer.
   * Returns the total number of draw calls encoded.
   */
  render(device: GPUDevice, frame: FrameState, resources: ResourcePool): number {
    if (this._needsRecompile) this.compile();

    for (const pass of this.executionOrder) {
      pass.prepare(device, frame);
    }

    const encoder = device.createCommandEncoder({ label: `canvas-frame-${frame.snapshot.frameId}` });
    let drawCalls = 0;
    for (const pass of this.executionOrder) {
      drawCalls += pass.execute(encoder, frame, resources);
    }
    device.queue.submit([encoder.finish()]);
    return drawCalls;
  }

  destroy(): void {
    for (const pass of this.passes.values()) pass.destroy();
    this.passes.clear();
    this.executionOrder = [];
    this._needsRecompile = true;
  }
}
