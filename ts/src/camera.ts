/** Largest z-index the projection maps into clip depth (depth 0). */
export const MAX_Z_INDEX = 65_535;

/**
 * Canvas projection matrix (column-major, WebGPU depth 0..1).
 *
 * Maps world coordinates to clip space:
 * - X: panX..panX + width/zoom → -1..1
 * - Y: panY..panY + height/zoom → 1..-1  (top-left origin, Y grows down)
 * - Z: z-index 0..MAX_Z_INDEX → MAX/(MAX+1)..0  (higher z is nearer)
 */
export function canvasProjection(
  width: number,
  height: number,
  panX: number,
  panY: number,
  zoom: number,
): Float32Array<ArrayBuffer> {
  const sx = (2 * zoom) / width;
  const sy = (-2 * zoom) / height;
  const tx = -panX * sx - 1;
  const ty = -panY * sy + 1;
  const sz = -1 / (MAX_Z_INDEX + 1);
  const tz = MAX_Z_INDEX / (MAX_Z_INDEX + 1);

  // Column-major 4x4
  return new Float32Array([
    sx, 0,  0,  0, // col 0
    0,  sy, 0,  0, // col 1
    0,  0,  sz, 0, // col 2
    tx, ty, tz, 1, // col 3
  ]);
}

/** Multiply a column-major 4x4 by the point (x, y, z, 1). Orthographic only: w stays 1. */
export function transformPoint(
  m: ArrayLike<number>,
  x: number,
  y: number,
  z: number,
): [number, number, number] {
  return [
    m[0] * x + m[4] * y + m[8] * z + m[12],
    m[1] * x + m[5] * y + m[9] * z + m[13],
    m[2] * x + m[6] * y + m[10] * z + m[14],
  ];
}

/**
 * The camera state every pipeline reads during one frame.
 * Frozen; the matrix is a private copy and never written after creation.
 */
export interface CameraUniform {
  readonly viewProjection: Float32Array<ArrayBuffer>;
  readonly viewportWidth: number;
  readonly viewportHeight: number;
  /** Increments on every camera change; lets consumers spot reuse. */
  readonly version: number;
}

/** Pan/zoom controller for the 2D canvas. Owns the only cross-frame state of the renderer. */
export class Camera {
  private width: number;
  private height: number;
  private panX = 0;
  private panY = 0;
  private _zoom = 1;
  private _viewProjection: Float32Array<ArrayBuffer> = new Float32Array(16);
  private dirty = true;
  private _version = 0;

  constructor(width: number, height: number) {
    assertViewport(width, height);
    this.width = width;
    this.height = height;
  }

  /** 1 world unit = 1 pixel, no pan. */
  static identity(width: number, height: number): Camera {
    return new Camera(width, height);
  }

  get viewportWidth(): number {
    return this.width;
  }

  get viewportHeight(): number {
    return this.height;
  }

  get zoom(): number {
    return this._zoom;
  }

  get pan(): [number, number] {
    return [this.panX, this.panY];
  }

  get version(): number {
    return this._version;
  }

  /** Must be called whenever the render target is resized. */
  setViewport(width: number, height: number): void {
    assertViewport(width, height);
    if (width === this.width && height === this.height) return;
    this.width = width;
    this.height = height;
    this.invalidate();
  }

  /** World coordinate shown at the top-left corner of the viewport. */
  setPan(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error(`Camera pan must be finite, got (${x}, ${y})`);
    }
    this.panX = x;
    this.panY = y;
    this.invalidate();
  }

  setZoom(zoom: number): void {
    if (!Number.isFinite(zoom) || zoom <= 0) {
      throw new Error(`Camera zoom must be a positive finite number, got ${zoom}`);
    }
    this._zoom = zoom;
    this.invalidate();
  }

  /** Scale by `factor` keeping the world point under (screenX, screenY) fixed. */
  zoomAt(screenX: number, screenY: number, factor: number): void {
    if (!Number.isFinite(screenX) || !Number.isFinite(screenY)) {
      throw new Error(`Camera zoom anchor must be finite, got (${screenX}, ${screenY})`);
    }
    const [wx, wy] = this.screenToWorld(screenX, screenY);
    const zoom = this._zoom * factor;
    if (!Number.isFinite(zoom) || zoom <= 0) {
      throw new Error(`Camera zoom must be a positive finite number, got ${zoom}`);
    }
    this._zoom = zoom;
    this.setPan(wx - screenX / zoom, wy - screenY / zoom);
  }

  screenToWorld(screenX: number, screenY: number): [number, number] {
    return [this.panX + screenX / this._zoom, this.panY + screenY / this._zoom];
  }

  worldToScreen(worldX: number, worldY: number): [number, number] {
    return [(worldX - this.panX) * this._zoom, (worldY - this.panY) * this._zoom];
  }

  /** Combined view-projection matrix (column-major). Recomputed lazily. */
  get viewProjection(): Float32Array<ArrayBuffer> {
    if (this.dirty) {
      this._viewProjection = canvasProjection(this.width, this.height, this.panX, this.panY, this._zoom);
      this.dirty = false;
    }
    return this._viewProjection;
  }

  snapshot(): CameraUniform {
    return Object.freeze({
      viewProjection: this.viewProjection.slice(),
      viewportWidth: this.width,
      viewportHeight: this.height,
      version: this._version,
    });
  }

  private invalidate(): void {
    this.dirty = true;
    this._version++;
  }
}

function assertViewport(width: number, height: number): void {
  if (!(width > 0) || !(height > 0) || !Number.isFinite(width) || !Number.isFinite(height)) {
    throw new Error(`Camera viewport must be positive, got ${width}x${height}`);
  }
}
