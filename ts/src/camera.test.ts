import { describe, it, expect } from 'vitest';
import { Camera, MAX_Z_INDEX, canvasProjection, transformPoint } from './camera';

describe('canvasProjection', () => {
  it('maps the viewport corners to clip space with a top-left origin', () => {
    const m = canvasProjection(800, 600, 0, 0, 1);
    const [x0, y0] = transformPoint(m, 0, 0, 0);
    const [x1, y1] = transformPoint(m, 800, 600, 0);
    expect(x0).toBeCloseTo(-1);
    expect(y0).toBeCloseTo(1);
    expect(x1).toBeCloseTo(1);
    expect(y1).toBeCloseTo(-1);
  });

  it('maps the viewport center to the clip origin', () => {
    const m = canvasProjection(800, 600, 0, 0, 1);
    const [x, y] = transformPoint(m, 400, 300, 0);
    expect(x).toBeCloseTo(0);
    expect(y).toBeCloseTo(0);
  });

  it('applies pan and zoom', () => {
    // pan (100, 50), zoom 2: visible world is 100..500 x 50..350
    const m = canvasProjection(800, 600, 100, 50, 2);
    const [x0, y0] = transformPoint(m, 100, 50, 0);
    const [x1, y1] = transformPoint(m, 500, 350, 0);
    expect(x0).toBeCloseTo(-1);
    expect(y0).toBeCloseTo(1);
    expect(x1).toBeCloseTo(1);
    expect(y1).toBeCloseTo(-1);
  });

  it('maps z-index 0..MAX to depth just below 1 down to 0', () => {
    const m = canvasProjection(100, 100, 0, 0, 1);
    expect(transformPoint(m, 0, 0, 0)[2]).toBe(65535 / 65536);
    expect(transformPoint(m, 0, 0, MAX_Z_INDEX)[2]).toBe(0);
    expect(transformPoint(m, 0, 0, 10)[2]).toBeLessThan(transformPoint(m, 0, 0, 9)[2]);
  });

  it('is column-major with the translation in the last column', () => {
    const m = canvasProjection(200, 100, 0, 0, 1);
    expect(m[0]).toBeCloseTo(0.01);
    expect(m[5]).toBeCloseTo(-0.02);
    expect(m[12]).toBe(-1);
    expect(m[13]).toBe(1);
    expect(m[15]).toBe(1);
  });
});

describe('Camera', () => {
  it('identity shows world = screen pixels', () => {
    const cam = Camera.identity(640, 480);
    expect(cam.zoom).toBe(1);
    expect(cam.pan).toEqual([0, 0]);
    expect(cam.screenToWorld(10, 20)).toEqual([10, 20]);
  });

  it('rejects non-positive or non-finite zoom', () => {
    const cam = new Camera(100, 100);
    expect(() => cam.setZoom(0)).toThrow(/zoom/);
    expect(() => cam.setZoom(-2)).toThrow(/zoom/);
    expect(() => cam.setZoom(Number.NaN)).toThrow(/zoom/);
    expect(() => cam.setZoom(Number.POSITIVE_INFINITY)).toThrow(/zoom/);
    expect(cam.zoom).toBe(1);
  });

  it('rejects empty viewports', () => {
    expect(() => new Camera(0, 100)).toThrow(/viewport/);
    expect(() => new Camera(100, -1)).toThrow(/viewport/);
  });

  it('rejects non-finite pan', () => {
    const cam = new Camera(100, 100);
    expect(() => cam.setPan(Number.NaN, 0)).toThrow(/pan/);
  });

  it('screenToWorld and worldToScreen are inverse', () => {
    const cam = new Camera(800, 600);
    cam.setPan(30, -40);
    cam.setZoom(2.5);
    const [wx, wy] = cam.screenToWorld(123, 456);
    const [sx, sy] = cam.worldToScreen(wx, wy);
    expect(sx).toBeCloseTo(123);
    expect(sy).toBeCloseTo(456);
  });

  it('zoomAt keeps the world point under the cursor fixed', () => {
    const cam = new Camera(800, 600);
    const before = cam.screenToWorld(200, 150);
    cam.zoomAt(200, 150, 4);
    expect(cam.zoom).toBe(4);
    const after = cam.screenToWorld(200, 150);
    expect(after[0]).toBeCloseTo(before[0]);
    expect(after[1]).toBeCloseTo(before[1]);
  });

  it('zoomAt rejects a non-finite anchor without touching the camera', () => {
    const cam = Camera.identity(100, 100);
    const version = cam.version;
    expect(() => cam.zoomAt(Number.NaN, 0, 2)).toThrow(/anchor/);
    expect(() => cam.zoomAt(0, Number.POSITIVE_INFINITY, 2)).toThrow(/anchor/);
    expect(() => cam.zoomAt(10, 10, 0)).toThrow(/zoom/);
    expect(cam.zoom).toBe(1);
    expect(cam.pan).toEqual([0, 0]);
    expect(cam.version).toBe(version);
    expect(Array.from(cam.viewProjection).every(Number.isFinite)).toBe(true);
  });

  it('recomputes the matrix only after a change', () => {
    const cam = new Camera(100, 100);
    const first = cam.viewProjection;
    expect(cam.viewProjection).toBe(first);
    cam.setPan(10, 0);
    expect(cam.viewProjection).not.toBe(first);
  });

  it('bumps the version on every change, not on no-op resizes', () => {
    const cam = new Camera(100, 100);
    const v0 = cam.version;
    cam.setViewport(100, 100);
    expect(cam.version).toBe(v0);
    cam.setViewport(200, 100);
    expect(cam.version).toBe(v0 + 1);
    cam.setZoom(2);
    expect(cam.version).toBe(v0 + 2);
  });

  it('snapshot is frozen and does not follow later camera changes', () => {
    const cam = new Camera(100, 100);
    const snap = cam.snapshot();
    const m12 = snap.viewProjection[12];
    cam.setPan(50, 50);
    expect(snap.viewProjection[12]).toBe(m12);
    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap.viewportWidth).toBe(100);
    expect(snap.viewProjection).not.toBe(cam.viewProjection);
  });
});
