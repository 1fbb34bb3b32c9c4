// Converters from upstream collaborators (document layers + layout, text
// shaping, presence) into instance records. Nothing here touches the GPU.

import { cursor, glyph, rect } from './instances';
import type { CursorInstance, GlyphInstance, RectBounds, RectInstance, Rgba, Vec2 } from './instances';

export type LayerKind = 'rect' | 'ellipse' | 'text' | 'frame';

export interface CanvasLayer {
  readonly id: string;
  readonly kind: LayerKind;
}

/** Resolved box of one layer, as computed by the layout engine. */
export interface ComputedLayout {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Anything that can look up a layer's computed layout (a Map works). */
export interface LayoutLookup {
  get(id: string): ComputedLayout | undefined;
}

/** Placeholder fills until layers carry their own style. */
export const LAYER_COLORS: Readonly<Record<LayerKind, Rgba>> = {
  rect: [0.26, 0.52, 0.96, 1.0],
  ellipse: [0.96, 0.26, 0.42, 1.0],
  text: [0.96, 0.78, 0.26, 1.0],
  frame: [0.22, 0.22, 0.24, 0.8],
};

/**
 * One rectangle per laid-out layer, z = position in `layers` (back to
 * front). Layers without a computed layout yet are skipped.
 */
export function collectRectInstances(layers: readonly CanvasLayer[], layouts: LayoutLookup): RectInstance[] {
  const out: RectInstance[] = [];
  layers.forEach((layer, i) => {
    const box = layouts.get(layer.id);
    if (!box) return;
    out.push(rect(box.x, box.y, box.width, box.height, LAYER_COLORS[layer.kind], { z: i }));
  });
  return out;
}

export type RectTuple = readonly [x: number, y: number, width: number, height: number, color: Rgba];

/** Rectangles straight from position/size data, z = index. */
export function rectsFromTuples(tuples: readonly RectTuple[]): RectInstance[] {
  return tuples.map(([x, y, w, h, color], i) => rect(x, y, w, h, color, { z: i }));
}

// --- Text ---------------------------------------------------------------

export interface AtlasRegion {
  readonly uMin: number;
  readonly vMin: number;
  readonly uMax: number;
  readonly vMax: number;
}

/** A positioned glyph from the shaping engine, in text-local pixels. */
export interface GlyphQuad {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly atlasRegion: AtlasRegion;
  readonly color: Rgba;
}

export interface ShapedText {
  readonly glyphs: readonly GlyphQuad[];
  readonly width: number;
  readonly height: number;
}

/** Place a shaped text block at (originX, originY) in world space. */
export function glyphInstancesFromText(shaped: ShapedText, originX: number, originY: number): GlyphInstance[] {
  return shaped.glyphs.map((q) => glyph(
    originX + q.x, originY + q.y, q.width, q.height,
    [q.atlasRegion.uMin, q.atlasRegion.vMin],
    [q.atlasRegion.uMax, q.atlasRegion.vMax],
    q.color,
  ));
}

// --- Presence -----------------------------------------------------------

const CURSOR_SATURATION = 0.7;
const CURSOR_LIGHTNESS = 0.6;
const UUID_RE = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

/** Hue bucket 0..359 for a peer id. UUIDs use their 128-bit value, other ids an FNV-1a hash. */
export function hueBucket(id: string): number {
  if (UUID_RE.test(id)) {
    return Number(BigInt(`0x${id.replace(/-/g, '')}`) % 360n);
  }
  let h = 0x811c9dc5;
  for (let i = 0; i < id.length; i++) {
    h ^= id.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return (h >>> 0) % 360;
}

/** Stable, vivid color for a collaborator. */
export function cursorColorFromId(id: string): Rgba {
  const [r, g, b] = hslToRgb(hueBucket(id) / 360, CURSOR_SATURATION, CURSOR_LIGHTNESS);
  return [r, g, b, 1.0];
}

/** HSL (all components in [0, 1]) to RGB. */
export function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  if (s === 0) return [l, l, l];
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return [hueToRgb(p, q, h + 1 / 3), hueToRgb(p, q, h), hueToRgb(p, q, h - 1 / 3)];
}

function hueToRgb(p: number, q: number, t: number): number {
  if (t < 0) t += 1;
  if (t > 1) t -= 1;
  if (t < 1 / 6) return p + (q - p) * 6 * t;
  if (t < 1 / 2) return q;
  if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
  return p;
}

/** A remote peer's cursor as tracked by the presence layer. */
export interface RemoteCursor {
  readonly userId: string;
  readonly position: Vec2;
  /** Defaults to cursorColorFromId(userId). */
  readonly color?: Rgba;
  /** Bounds of the peer's selection, if any. */
  readonly selection?: RectBounds;
}

export function buildCursorInstances(cursors: readonly RemoteCursor[]): CursorInstance[] {
  return cursors.map((c) => cursor(
    c.position[0], c.position[1],
    c.color ?? cursorColorFromId(c.userId),
    c.selection,
  ));
}
