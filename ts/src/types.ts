import type { Rgba } from './instances';

export type WarnFn = (message: string) => void;

/** Configuration for FrameCompositor.create(). */
export interface CompositorConfig {
  /** Background the first pass clears to. Default: dark canvas grey. */
  clearColor?: Rgba;
  /** Canvas alpha mode for on-screen targets. Default 'opaque'. */
  alphaMode?: GPUCanvasAlphaMode;
  /** Rebuild device and pipelines after device loss. Default true. */
  autoRecover?: boolean;
  onDeviceLost?: (reason: string) => void;
  /** Failures that cannot be returned to a caller (background recovery). */
  onError?: (error: Error) => void;
  onWarn?: WarnFn;
}

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  clearColor: Rgba;
  alphaMode: GPUCanvasAlphaMode;
  autoRecover: boolean;
  onDeviceLost?: (reason: string) => void;
  onError?: (error: Error) => void;
  onWarn: WarnFn;
}

/** What one rendered frame contained. */
export interface FrameStats {
  frameId: number;
  rectCount: number;
  glyphCount: number;
  cursorCount: number;
  drawCalls: number;
  /** Records the packers refused (non-finite values). */
  rejected: number;
}

/** Lifetime counters of a compositor. */
export interface CompositorStats {
  framesRendered: number;
  /** Snapshots replaced in the mailbox before they were drawn. */
  framesDropped: number;
  /** Frames not drawn because the camera did not match the target. */
  framesSkipped: number;
  deviceLosses: number;
  lastFrame: FrameStats | null;
}

export const DEFAULT_CLEAR_COLOR: Rgba = [0.12, 0.12, 0.13, 1.0];

export const defaultWarn: WarnFn = (message) => {
  console.warn(`[Canvas] ${message}`);
};

export function validateColor(color: Rgba, what: string): Rgba {
  for (const c of color) {
    if (!Number.isFinite(c) || c < 0 || c > 1) {
      throw new Error(`${what} components must be within [0, 1], got [${color.join(', ')}]`);
    }
  }
  return color;
}

export function validateConfig(config: CompositorConfig = {}): ResolvedConfig {
  const clearColor = validateColor(config.clearColor ?? DEFAULT_CLEAR_COLOR, 'clearColor');
  const alphaMode = config.alphaMode ?? 'opaque';
  if (alphaMode !== 'opaque' && alphaMode !== 'premultiplied') {
    throw new Error(`alphaMode must be 'opaque' or 'premultiplied', got '${String(alphaMode)}'`);
  }
  return {
    clearColor,
    alphaMode,
    autoRecover: config.autoRecover ?? true,
    onDeviceLost: config.onDeviceLost,
    onError: config.onError,
    onWarn: config.onWarn ?? defaultWarn,
  };
}
