import { MAX_Z_INDEX } from './camera';

export type Vec2 = readonly [number, number];
export type Rgba = readonly [number, number, number, number];
/** x, y, width, height */
export type RectBounds = readonly [number, number, number, number];

/** One filled, optionally rounded, axis-aligned rectangle. */
export interface RectInstance {
  /** World-space top-left corner. */
  position: Vec2;
  /** Width and height; negative values are packed as 0. */
  size: Vec2;
  color: Rgba;
  /** Clamped to min(size)/2 by the fragment stage, not here. */
  borderRadius: number;
  /** Larger draws on top. */
  zIndex: number;
}

/** One textured glyph quad referencing a region of the shared atlas. */
export interface GlyphInstance {
  position: Vec2;
  size: Vec2;
  uvMin: Vec2;
  uvMax: Vec2;
  color: Rgba;
}

/** One remote collaborator cursor, anchored at its tip. */
export interface CursorInstance {
  position: Vec2;
  color: Rgba;
  /** Reserved: uploaded, not yet composited. */
  selectionRect: RectBounds;
}

/** Fixed cursor glyph extent in world units. */
export const CURSOR_SIZE = 20;

export const QUAD_FLOATS = 2;
export const RECT_FLOATS = 10;   // position 2 + size 2 + color 4 + radius 1 + z 1
export const GLYPH_FLOATS = 12;  // position 2 + size 2 + uvMin 2 + uvMax 2 + color 4
export const CURSOR_FLOATS = 10; // position 2 + color 4 + selection 4

/** Unit quad (0,0)→(1,1), shared by every pipeline. */
export const QUAD_VERTICES = new Float32Array([
  0, 0, // top-left
  1, 0, // top-right
  0, 1, // bottom-left
  1, 1, // bottom-right
]);
export const QUAD_INDICES = new Uint16Array([0, 1, 2, 2, 1, 3]);

export const QUAD_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: QUAD_FLOATS * 4,
  stepMode: 'vertex',
  attributes: [{ shaderLocation: 0, offset: 0, format: 'float32x2' }],
};

export const RECT_INSTANCE_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: RECT_FLOATS * 4,
  stepMode: 'instance',
  attributes: [
    { shaderLocation: 1, offset: 0, format: 'float32x2' },  // position
    { shaderLocation: 2, offset: 8, format: 'float32x2' },  // size
    { shaderLocation: 3, offset: 16, format: 'float32x4' }, // color
    { shaderLocation: 4, offset: 32, format: 'float32' },   // border_radius
    { shaderLocation: 5, offset: 36, format: 'float32' },   // z_index
  ],
};

export const GLYPH_INSTANCE_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: GLYPH_FLOATS * 4,
  stepMode: 'instance',
  attributes: [
    { shaderLocation: 1, offset: 0, format: 'float32x2' },  // position
    { shaderLocation: 2, offset: 8, format: 'float32x2' },  // size
    { shaderLocation: 3, offset: 16, format: 'float32x2' }, // uv_min
    { shaderLocation: 4, offset: 24, format: 'float32x2' }, // uv_max
    { shaderLocation: 5, offset: 32, format: 'float32x4' }, // color
  ],
};

export const CURSOR_INSTANCE_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: CURSOR_FLOATS * 4,
  stepMode: 'instance',
  attributes: [
    { shaderLocation: 1, offset: 0, format: 'float32x2' },  // position
    { shaderLocation: 2, offset: 8, format: 'float32x4' },  // color
    { shaderLocation: 3, offset: 24, format: 'float32x4' }, // selection_rect
  ],
};

export interface RectOptions {
  radius?: number;
  z?: number;
}

export function rect(x: number, y: number, w: number, h: number, color: Rgba, opts?: RectOptions): RectInstance {
  return {
    position: [x, y],
    size: [w, h],
    color,
    borderRadius: opts?.radius ?? 0,
    zIndex: opts?.z ?? 0,
  };
}

export function glyph(
  x: number, y: number, w: number, h: number,
  uvMin: Vec2, uvMax: Vec2, color: Rgba,
): GlyphInstance {
  return { position: [x, y], size: [w, h], uvMin, uvMax, color };
}

export function cursor(x: number, y: number, color: Rgba, selectionRect: RectBounds = [0, 0, 0, 0]): CursorInstance {
  return { position: [x, y], color, selectionRect };
}

/** Finite after rounding to f32: values beyond ±3.4e38 would be stored as Infinity. */
function finite(values: readonly number[]): boolean {
  for (const v of values) {
    if (!Number.isFinite(Math.fround(v))) return false;
  }
  return true;
}

function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}

function writeColor(out: Float32Array, offset: number, c: Rgba): void {
  out[offset] = clamp(c[0], 0, 1);
  out[offset + 1] = clamp(c[1], 0, 1);
  out[offset + 2] = clamp(c[2], 0, 1);
  out[offset + 3] = clamp(c[3], 0, 1);
}

/*
 * Packers write one record at `offset` (in floats) and return false when the
 * record carries NaN/Inf and must not reach the rasterizer. Everything else is
 * clamped into range.
 */

export function packRect(out: Float32Array, offset: number, r: RectInstance): boolean {
  if (!finite([...r.position, ...r.size, ...r.color, r.borderRadius, r.zIndex])) return false;
  out[offset] = r.position[0];
  out[offset + 1] = r.position[1];
  out[offset + 2] = Math.max(0, r.size[0]);
  out[offset + 3] = Math.max(0, r.size[1]);
  writeColor(out, offset + 4, r.color);
  out[offset + 8] = Math.max(0, r.borderRadius);
  out[offset + 9] = clamp(r.zIndex, 0, MAX_Z_INDEX);
  return true;
}

export function packGlyph(out: Float32Array, offset: number, g: GlyphInstance): boolean {
  if (!finite([...g.position, ...g.size, ...g.uvMin, ...g.uvMax, ...g.color])) return false;
  out[offset] = g.position[0];
  out[offset + 1] = g.position[1];
  out[offset + 2] = Math.max(0, g.size[0]);
  out[offset + 3] = Math.max(0, g.size[1]);
  out[offset + 4] = g.uvMin[0];
  out[offset + 5] = g.uvMin[1];
  out[offset + 6] = g.uvMax[0];
  out[offset + 7] = g.uvMax[1];
  writeColor(out, offset + 8, g.color);
  return true;
}

export function packCursor(out: Float32Array, offset: number, c: CursorInstance): boolean {
  if (!finite([...c.position, ...c.color])) return false;
  out[offset] = c.position[0];
  out[offset + 1] = c.position[1];
  writeColor(out, offset + 2, c.color);
  const sel = finite(c.selectionRect) ? c.selectionRect : [0, 0, 0, 0];
  out[offset + 6] = sel[0];
  out[offset + 7] = sel[1];
  out[offset + 8] = sel[2];
  out[offset + 9] = sel[3];
  return true;
}

export function unpackRect(data: ArrayLike<number>, index: number): RectInstance {
  const o = index * RECT_FLOATS;
  return {
    position: [data[o], data[o + 1]],
    size: [data[o + 2], data[o + 3]],
    color: [data[o + 4], data[o + 5], data[o + 6], data[o + 7]],
    borderRadius: data[o + 8],
    zIndex: data[o + 9],
  };
}

export function unpackGlyph(data: ArrayLike<number>, index: number): GlyphInstance {
  const o = index * GLYPH_FLOATS;
  return {
    position: [data[o], data[o + 1]],
    size: [data[o + 2], data[o + 3]],
    uvMin: [data[o + 4], data[o + 5]],
    uvMax: [data[o + 6], data[o + 7]],
    color: [data[o + 8], data[o + 9], data[o + 10], data[o + 11]],
  };
}

export function unpackCursor(data: ArrayLike<number>, index: number): CursorInstance {
  const o = index * CURSOR_FLOATS;
  return {
    position: [data[o], data[o + 1]],
    color: [data[o + 2], data[o + 3], data[o + 4], data[o + 5]],
    selectionRect: [data[o + 6], data[o + 7], data[o + 8], data[o + 9]],
  };
}
