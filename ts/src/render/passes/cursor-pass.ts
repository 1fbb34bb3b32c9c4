import type { FrameState } from '../render-pass';
import type { PackedInstances } from '../../frame-builder';
import { CURSOR_FLOATS, CURSOR_INSTANCE_LAYOUT } from '../../instances';
import { DEPTH_FORMAT, InstancedPass } from './instanced-pass';
import shaderSource from '../../shaders/cursor.wgsl?raw';

/**
 * Remote collaborator cursors. Last canvas layer; drawn at clip depth 0 so
 * they pass the depth test over every rectangle without writing depth.
 */
export class CursorPass extends InstancedPass {
  constructor(source: string = shaderSource) {
    super({
      name: 'cursors',
      reads: ['camera-uniform', 'glyph-layer'],
      writes: ['canvas'],
      shaderSource: source,
      instanceLayout: CURSOR_INSTANCE_LAYOUT,
      floatsPerInstance: CURSOR_FLOATS,
      depthStencil: { format: DEPTH_FORMAT, depthWriteEnabled: false, depthCompare: 'less-equal' },
      clearsTarget: false,
    });
  }

  protected instancesOf(frame: FrameState): PackedInstances {
    return frame.snapshot.cursors;
  }
}
