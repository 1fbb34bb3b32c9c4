import type { CameraUniform } from '../camera';
import type { FrameSnapshot } from '../frame-builder';
import type { ResourcePool } from './resource-pool';

/** Everything one frame's passes need. Built by the compositor, read-only for passes. */
export interface FrameState {
  snapshot: FrameSnapshot;
  camera: CameraUniform;
  /** Index of the instance-buffer set this frame may overwrite. */
  slot: number;
  colorView: GPUTextureView;
  depthView: GPUTextureView;
  clearColor: GPUColorDict;
}

export interface RenderPass {
  readonly name: string;
  readonly reads: string[];
  readonly writes: string[];
  setup(device: GPUDevice, resources: ResourcePool): void;
  /** Upload this pass's instance data. Runs after the camera uniform is written. */
  prepare(device: GPUDevice, frame: FrameState): void;
  /** Encode the pass. Returns the number of draw calls issued. */
  execute(encoder: GPUCommandEncoder, frame: FrameState, resources: ResourcePool): number;
  destroy(): void;
}
