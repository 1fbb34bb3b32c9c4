import type { FrameState } from '../render-pass';
import type { PackedInstances } from '../../frame-builder';
import { RECT_FLOATS, RECT_INSTANCE_LAYOUT } from '../../instances';
import { DEPTH_FORMAT, InstancedPass } from './instanced-pass';
import shaderSource from '../../shaders/rect.wgsl?raw';

/**
 * Rounded rectangles. First layer of the canvas: clears the target and is
 * the only pass that writes depth, so overlapping rects resolve by z-index
 * (`less-equal`: equal z falls back to submission order).
 */
export class RectPass extends InstancedPass {
  constructor(source: string = shaderSource) {
    super({
      name: 'rects',
      reads: ['camera-uniform'],
      writes: ['rect-layer'],
      shaderSource: source,
      instanceLayout: RECT_INSTANCE_LAYOUT,
      floatsPerInstance: RECT_FLOATS,
      depthStencil: { format: DEPTH_FORMAT, depthWriteEnabled: true, depthCompare: 'less-equal' },
      clearsTarget: true,
    });
  }

  protected instancesOf(frame: FrameState): PackedInstances {
    return frame.snapshot.rects;
  }
}
