export { FrameCompositor } from './frame-compositor';
export type { DeviceProvider } from './frame-compositor';
export { FrameBuilder } from './frame-builder';
export type { FrameSnapshot, PackedInstances } from './frame-builder';
export { Camera, MAX_Z_INDEX, canvasProjection } from './camera';
export type { CameraUniform } from './camera';
export type { CompositorConfig, ResolvedConfig, FrameStats, CompositorStats, WarnFn } from './types';
export { DEFAULT_CLEAR_COLOR, validateConfig } from './types';
export { RenderLoop } from './render-loop';
export type { FrameSink, HookPhase, HookFn } from './render-loop';
export { CanvasTarget, TextureTarget, DeviceLostError, createGpuContext } from './gpu-context';
export type { RenderTarget, CanvasLike, GpuContext } from './gpu-context';

// Instance records
export {
  rect, glyph, cursor,
  CURSOR_SIZE, RECT_FLOATS, GLYPH_FLOATS, CURSOR_FLOATS,
  RECT_INSTANCE_LAYOUT, GLYPH_INSTANCE_LAYOUT, CURSOR_INSTANCE_LAYOUT,
} from './instances';
export type { RectInstance, GlyphInstance, CursorInstance, RectOptions, Rgba, Vec2, RectBounds } from './instances';

// Glyph atlas
export type { AtlasImage } from './render/glyph-atlas';

// Headless
export { rasterizeFrame, RasterImage } from './render/software-rasterizer';
export type { RasterOptions } from './render/software-rasterizer';

// Upstream adapters
export {
  collectRectInstances, rectsFromTuples, glyphInstancesFromText,
  cursorColorFromId, buildCursorInstances, LAYER_COLORS,
} from './scene-bridge';
export type {
  LayerKind, CanvasLayer, ComputedLayout, LayoutLookup, RectTuple,
  AtlasRegion, GlyphQuad, ShapedText, RemoteCursor,
} from './scene-bridge';
