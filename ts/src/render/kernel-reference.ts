/**
 * CPU reference implementation of the fragment kernels in ../shaders/.
 *
 * Same formulas and thresholds as the WGSL, evaluated in f64. Used by the
 * software rasterizer and by tests; any change here must be mirrored in the
 * shader and vice versa.
 */

import type { Rgba, Vec2 } from '../instances';

export const RECT_DISCARD_ALPHA = 0.001;
export const GLYPH_DISCARD_ALPHA = 0.004;
export const CURSOR_DISCARD_COVERAGE = 0.01;

/** Half width of the cursor edge anti-aliasing band, in uv units. */
const CURSOR_AA = 0.02;
const CURSOR_TIP_EXTENT = 0.65;
const CURSOR_BORDER_WIDTH = 0.06;
const CURSOR_BORDER_MIX = 0.3;

/** WGSL `smoothstep(low, high, x)`. */
export function smoothstep(low: number, high: number, x: number): number {
  const t = Math.min(Math.max((x - low) / (high - low), 0), 1);
  return t * t * (3 - 2 * t);
}

/** WGSL `step(edge, x)`. */
export function step(edge: number, x: number): number {
  return x >= edge ? 1 : 0;
}

function mix(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

// --- Rectangle -------------------------------------------------------------

/** Signed distance from the quad-local point `uv` to the rounded rect boundary (negative inside). */
export function roundedRectDistance(uv: Vec2, size: Vec2, borderRadius: number): number {
  const hx = size[0] * 0.5;
  const hy = size[1] * 0.5;
  const cx = uv[0] * size[0] - hx;
  const cy = uv[1] * size[1] - hy;
  const r = Math.min(borderRadius, Math.min(hx, hy));
  const qx = Math.abs(cx) - hx + r;
  const qy = Math.abs(cy) - hy + r;
  const outside = Math.hypot(Math.max(qx, 0), Math.max(qy, 0));
  return outside + Math.min(Math.max(qx, qy), 0) - r;
}

export function rectCoverage(uv: Vec2, size: Vec2, borderRadius: number): number {
  return 1 - smoothstep(-0.5, 0.5, roundedRectDistance(uv, size, borderRadius));
}

/** Fragment output, or null when the fragment is discarded. */
export function shadeRect(uv: Vec2, size: Vec2, borderRadius: number, color: Rgba): Rgba | null {
  const alpha = rectCoverage(uv, size, borderRadius);
  if (alpha < RECT_DISCARD_ALPHA) return null;
  return [color[0], color[1], color[2], color[3] * alpha];
}

// --- Glyph -----------------------------------------------------------------

export function glyphUv(quadPos: Vec2, uvMin: Vec2, uvMax: Vec2): Vec2 {
  return [mix(uvMin[0], uvMax[0], quadPos[0]), mix(uvMin[1], uvMax[1], quadPos[1])];
}

export function shadeGlyph(atlasAlpha: number, color: Rgba): Rgba | null {
  if (atlasAlpha < GLYPH_DISCARD_ALPHA) return null;
  return [color[0], color[1], color[2], color[3] * atlasAlpha];
}

// --- Cursor ----------------------------------------------------------------

export interface CursorEdges {
  /** Left margin. */
  e1: number;
  /** Bottom-left-to-tip diagonal. */
  e2: number;
  /** Top-to-tip diagonal. */
  e3: number;
}

export function cursorEdges(uv: Vec2): CursorEdges {
  return {
    e1: uv[0] - 0.05,
    e2: (uv[1] - 0.05) - uv[0] * 1.5,
    e3: uv[0] * 1.4 - (uv[1] - 0.05),
  };
}

/** Binary classification against the three half-planes. */
export function cursorInside(uv: Vec2): boolean {
  const { e1, e2, e3 } = cursorEdges(uv);
  return step(0, e1) * step(0, -e2 + CURSOR_TIP_EXTENT) * step(0, e3) === 1;
}

export function cursorCoverage(uv: Vec2): number {
  const { e1, e2, e3 } = cursorEdges(uv);
  return smoothstep(-CURSOR_AA, CURSOR_AA, e1)
    * smoothstep(-CURSOR_AA, CURSOR_AA, CURSOR_TIP_EXTENT - e2)
    * smoothstep(-CURSOR_AA, CURSOR_AA, e3);
}

/** Outline weight: 1 on the boundary, 0 deeper than the border width inside. */
export function cursorBorder(uv: Vec2): number {
  const { e1, e2, e3 } = cursorEdges(uv);
  return 1 - smoothstep(0, CURSOR_BORDER_WIDTH, Math.min(Math.min(e1, CURSOR_TIP_EXTENT - e2), e3));
}

export function shadeCursor(uv: Vec2, color: Rgba): Rgba | null {
  const coverage = cursorCoverage(uv);
  if (coverage < CURSOR_DISCARD_COVERAGE) return null;
  const t = cursorBorder(uv) * CURSOR_BORDER_MIX;
  return [mix(color[0], 1, t), mix(color[1], 1, t), mix(color[2], 1, t), coverage * color[3]];
}
