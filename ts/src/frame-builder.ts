import {
  CURSOR_FLOATS, GLYPH_FLOATS, RECT_FLOATS,
  packCursor, packGlyph, packRect,
} from './instances';
import type { CursorInstance, GlyphInstance, RectInstance } from './instances';

/** Tightly packed instance records of one kind. */
export interface PackedInstances {
  readonly data: Float32Array<ArrayBuffer>;
  readonly count: number;
}

/**
 * Everything the compositor draws in one frame.
 * Frozen, and its buffers are copies owned by the snapshot alone: the
 * builder never writes them again. Consumers must treat `data` as read-only.
 */
export interface FrameSnapshot {
  readonly frameId: number;
  readonly rects: PackedInstances;
  readonly glyphs: PackedInstances;
  readonly cursors: PackedInstances;
  /** Records dropped by the packers (non-finite values). */
  readonly rejected: number;
}

const INITIAL_ARENA_INSTANCES = 64;

type Packer<T> = (out: Float32Array, offset: number, record: T) => boolean;

/** Growable float arena reused across frames. */
class InstanceArena<T> {
  private data: Float32Array<ArrayBuffer>;
  private _count = 0;
  rejected = 0;

  constructor(
    private readonly stride: number,
    private readonly pack: Packer<T>,
  ) {
    this.data = new Float32Array(INITIAL_ARENA_INSTANCES * stride);
  }

  get count(): number {
    return this._count;
  }

  get capacity(): number {
    return this.data.length / this.stride;
  }

  push(record: T): boolean {
    if (this._count === this.capacity) this.grow();
    if (!this.pack(this.data, this._count * this.stride, record)) {
      this.rejected++;
      return false;
    }
    this._count++;
    return true;
  }

  /** Copy the filled prefix out so the arena can be refilled immediately. */
  take(): PackedInstances {
    const packed = Object.freeze({
      data: this.data.slice(0, this._count * this.stride),
      count: this._count,
    });
    this._count = 0;
    this.rejected = 0;
    return packed;
  }

  private grow(): void {
    const next = new Float32Array(this.data.length * 2);
    next.set(this.data);
    this.data = next;
  }
}

/**
 * Per-frame instance list assembly.
 *
 * Upstream collaborators push resolved primitives, then `finish()` hands the
 * compositor a self-contained snapshot. The arenas are reused for the next
 * frame without ever aliasing a snapshot that is still in flight.
 */
export class FrameBuilder {
  private readonly rects = new InstanceArena<RectInstance>(RECT_FLOATS, packRect);
  private readonly glyphs = new InstanceArena<GlyphInstance>(GLYPH_FLOATS, packGlyph);
  private readonly cursors = new InstanceArena<CursorInstance>(CURSOR_FLOATS, packCursor);
  private nextFrameId = 1;

  get rectCount(): number {
    return this.rects.count;
  }

  get glyphCount(): number {
    return this.glyphs.count;
  }

  get cursorCount(): number {
    return this.cursors.count;
  }

  addRect(r: RectInstance): boolean {
    return this.rects.push(r);
  }

  addGlyph(g: GlyphInstance): boolean {
    return this.glyphs.push(g);
  }

  addCursor(c: CursorInstance): boolean {
    return this.cursors.push(c);
  }

  addRects(list: Iterable<RectInstance>): this {
    for (const r of list) this.rects.push(r);
    return this;
  }

  addGlyphs(list: Iterable<GlyphInstance>): this {
    for (const g of list) this.glyphs.push(g);
    return this;
  }

  addCursors(list: Iterable<CursorInstance>): this {
    for (const c of list) this.cursors.push(c);
    return this;
  }

  finish(): FrameSnapshot {
    const rejected = this.rects.rejected + this.glyphs.rejected + this.cursors.rejected;
    return Object.freeze({
      frameId: this.nextFrameId++,
      rects: this.rects.take(),
      glyphs: this.glyphs.take(),
      cursors: this.cursors.take(),
      rejected,
    });
  }
}
