import { transformPoint, MAX_Z_INDEX } from '../camera';
import type { CameraUniform } from '../camera';
import type { FrameSnapshot, PackedInstances } from '../frame-builder';
import { CURSOR_SIZE, unpackCursor, unpackGlyph, unpackRect } from '../instances';
import type { Rgba, Vec2 } from '../instances';
import { sampleAtlas } from './glyph-atlas';
import type { AtlasImage } from './glyph-atlas';
import { glyphUv, shadeCursor, shadeGlyph, shadeRect } from './kernel-reference';

export interface RasterOptions {
  width: number;
  height: number;
  /** Default: transparent black. */
  clearColor?: Rgba;
  /** Without an atlas the glyph layer is skipped, as on the GPU. */
  atlas?: AtlasImage | null;
}

/** RGBA float image, row-major, top row first. */
export class RasterImage {
  readonly data: Float32Array;

  constructor(readonly width: number, readonly height: number, clear: Rgba) {
    this.data = new Float32Array(width * height * 4);
    for (let i = 0; i < this.data.length; i += 4) {
      this.data[i] = clear[0];
      this.data[i + 1] = clear[1];
      this.data[i + 2] = clear[2];
      this.data[i + 3] = clear[3];
    }
  }

  pixel(x: number, y: number): Rgba {
    const o = (y * this.width + x) * 4;
    return [this.data[o], this.data[o + 1], this.data[o + 2], this.data[o + 3]];
  }
}

type DepthCompare = 'less-equal' | 'always';

interface DepthMode {
  compare: DepthCompare;
  write: boolean;
}

/** Fragment for quad-local `uv`, or null when discarded. */
type Shader = (uv: Vec2) => Rgba | null;

interface Quad {
  x: number;
  y: number;
  w: number;
  h: number;
  /** World z fed to the projection. */
  z: number;
  shade: Shader;
}

const RECT_DEPTH: DepthMode = { compare: 'less-equal', write: true };
const GLYPH_DEPTH: DepthMode = { compare: 'always', write: false };
const CURSOR_DEPTH: DepthMode = { compare: 'less-equal', write: false };

/**
 * Render a frame on the CPU with the reference kernels.
 *
 * Mirrors the GPU frame: clear, then rects, glyphs and cursors in that order,
 * same depth states and blending, fragments evaluated at pixel centers.
 * Headless previews and pixel-level tests use it.
 */
export function rasterizeFrame(snapshot: FrameSnapshot, camera: CameraUniform, options: RasterOptions): RasterImage {
  const { width, height } = options;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`rasterizeFrame: size must be positive integers, got ${width}x${height}`);
  }
  const image = new RasterImage(width, height, options.clearColor ?? [0, 0, 0, 0]);
  const depth = new Float64Array(width * height).fill(1.0);
  const target: Target = { image, depth, matrix: camera.viewProjection };

  drawQuads(target, rectQuads(snapshot.rects), RECT_DEPTH);
  const atlas = options.atlas;
  if (atlas) drawQuads(target, glyphQuads(snapshot.glyphs, atlas), GLYPH_DEPTH);
  drawQuads(target, cursorQuads(snapshot.cursors), CURSOR_DEPTH);

  return image;
}

function* rectQuads(list: PackedInstances): Generator<Quad> {
  for (let i = 0; i < list.count; i++) {
    const r = unpackRect(list.data, i);
    yield {
      x: r.position[0], y: r.position[1], w: r.size[0], h: r.size[1], z: r.zIndex,
      shade: (uv) => shadeRect(uv, r.size, r.borderRadius, r.color),
    };
  }
}

function* glyphQuads(list: PackedInstances, atlas: AtlasImage): Generator<Quad> {
  for (let i = 0; i < list.count; i++) {
    const g = unpackGlyph(list.data, i);
    yield {
      x: g.position[0], y: g.position[1], w: g.size[0], h: g.size[1], z: 0,
      shade: (uv) => {
        const [u, v] = glyphUv(uv, g.uvMin, g.uvMax);
        return shadeGlyph(sampleAtlas(atlas, u, v), g.color);
      },
    };
  }
}

function* cursorQuads(list: PackedInstances): Generator<Quad> {
  for (let i = 0; i < list.count; i++) {
    const c = unpackCursor(list.data, i);
    yield {
      x: c.position[0], y: c.position[1], w: CURSOR_SIZE, h: CURSOR_SIZE, z: MAX_Z_INDEX,
      shade: (uv) => shadeCursor(uv, c.color),
    };
  }
}

interface Target {
  image: RasterImage;
  depth: Float64Array;
  matrix: ArrayLike<number>;
}

function drawQuads(target: Target, quads: Iterable<Quad>, mode: DepthMode): void {
  for (const quad of quads) drawQuad(target, quad, mode);
}

function drawQuad(target: Target, quad: Quad, mode: DepthMode): void {
  const { image, depth, matrix } = target;
  const [ax, ay, az] = transformPoint(matrix, quad.x, quad.y, quad.z);
  const [bx, by] = transformPoint(matrix, quad.x + quad.w, quad.y + quad.h, quad.z);
  if (az < 0 || az > 1) return; // clipped by the near/far planes

  // Clip → framebuffer pixels (y down).
  const sx0 = (ax + 1) * 0.5 * image.width;
  const sx1 = (bx + 1) * 0.5 * image.width;
  const sy0 = (1 - ay) * 0.5 * image.height;
  const sy1 = (1 - by) * 0.5 * image.height;
  if (sx0 === sx1 || sy0 === sy1) return;

  const xStart = Math.max(0, Math.ceil(Math.min(sx0, sx1) - 0.5));
  const xEnd = Math.min(image.width, Math.ceil(Math.max(sx0, sx1) - 0.5));
  const yStart = Math.max(0, Math.ceil(Math.min(sy0, sy1) - 0.5));
  const yEnd = Math.min(image.height, Math.ceil(Math.max(sy0, sy1) - 0.5));

  for (let py = yStart; py < yEnd; py++) {
    const v = (py + 0.5 - sy0) / (sy1 - sy0);
    for (let px = xStart; px < xEnd; px++) {
      const di = py * image.width + px;
      if (mode.compare === 'less-equal' && !(az <= depth[di])) continue;

      const u = (px + 0.5 - sx0) / (sx1 - sx0);
      const color = quad.shade([u, v]);
      if (!color) continue;

      blend(image.data, di * 4, color);
      if (mode.write) depth[di] = az;
    }
  }
}

/** src-alpha / one-minus-src-alpha for color, one / one-minus-src-alpha for alpha. */
function blend(out: Float32Array, o: number, src: Rgba): void {
  const a = src[3];
  out[o] = src[0] * a + out[o] * (1 - a);
  out[o + 1] = src[1] * a + out[o + 1] * (1 - a);
  out[o + 2] = src[2] * a + out[o + 2] * (1 - a);
  out[o + 3] = a + out[o + 3] * (1 - a);
}
