import { describe, it, expect } from 'vitest';
import {
  LAYER_COLORS, buildCursorInstances, collectRectInstances, cursorColorFromId, glyphInstancesFromText,
  hslToRgb, hueBucket, rectsFromTuples,
} from './scene-bridge';
import type { CanvasLayer, ComputedLayout, ShapedText } from './scene-bridge';

describe('collectRectInstances', () => {
  const layers: CanvasLayer[] = [
    { id: 'bg', kind: 'frame' },
    { id: 'pending', kind: 'rect' },
    { id: 'title', kind: 'text' },
  ];
  const layouts = new Map<string, ComputedLayout>([
    ['bg', { x: 0, y: 0, width: 800, height: 600 }],
    ['title', { x: 40, y: 32, width: 200, height: 24 }],
  ]);

  it('emits one rect per laid-out layer with the kind color', () => {
    const rects = collectRectInstances(layers, layouts);
    expect(rects).toHaveLength(2);
    expect(rects[0]).toMatchObject({ position: [0, 0], size: [800, 600], color: LAYER_COLORS.frame });
    expect(rects[1]).toMatchObject({ position: [40, 32], size: [200, 24], color: LAYER_COLORS.text });
  });

  it('uses the layer index as z, so skipped layers leave gaps', () => {
    expect(collectRectInstances(layers, layouts).map(r => r.zIndex)).toEqual([0, 2]);
  });

  it('returns nothing before layout has run', () => {
    expect(collectRectInstances(layers, new Map())).toEqual([]);
  });
});

describe('rectsFromTuples', () => {
  it('maps tuples in order with z = index', () => {
    const rects = rectsFromTuples([
      [1, 2, 3, 4, [1, 0, 0, 1]],
      [5, 6, 7, 8, [0, 1, 0, 1]],
    ]);
    expect(rects.map(r => [...r.position, ...r.size, r.zIndex])).toEqual([[1, 2, 3, 4, 0], [5, 6, 7, 8, 1]]);
    expect(rects[1].color).toEqual([0, 1, 0, 1]);
    expect(rects[0].borderRadius).toBe(0);
  });
});

describe('glyphInstancesFromText', () => {
  it('offsets glyphs by the text origin and copies the atlas region', () => {
    const shaped: ShapedText = {
      width: 20,
      height: 12,
      glyphs: [
        { x: 0, y: 2, width: 8, height: 10, atlasRegion: { uMin: 0, vMin: 0, uMax: 0.25, vMax: 0.5 }, color: [0, 0, 0, 1] },
        { x: 9, y: 0, width: 8, height: 12, atlasRegion: { uMin: 0.25, vMin: 0, uMax: 0.5, vMax: 0.5 }, color: [0, 0, 0, 1] },
      ],
    };
    const out = glyphInstancesFromText(shaped, 100, 50);
    expect(out.map(g => g.position)).toEqual([[100, 52], [109, 50]]);
    expect(out[1].size).toEqual([8, 12]);
    expect(out[1].uvMin).toEqual([0.25, 0]);
    expect(out[1].uvMax).toEqual([0.5, 0.5]);
  });
});

describe('presence colors', () => {
  it('buckets UUIDs by their numeric value', () => {
    expect(hueBucket('00000000-0000-0000-0000-000000000168')).toBe(0); // 0x168 = 360
    expect(hueBucket('00000000-0000-0000-0000-0000000000b4')).toBe(180);
    expect(hueBucket('000000000000000000000000000000B5')).toBe(181);
  });

  it('hashes other ids into 0..359 deterministically', () => {
    const h = hueBucket('peer-alpha');
    expect(Number.isInteger(h)).toBe(true);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThan(360);
    expect(hueBucket('peer-alpha')).toBe(h);
  });

  it('converts HSL to RGB', () => {
    const [r, g, b] = hslToRgb(0, 0.7, 0.6);
    expect(r).toBeCloseTo(0.88);
    expect(g).toBeCloseTo(0.32);
    expect(b).toBeCloseTo(0.32);
    expect(hslToRgb(0.3, 0, 0.4)).toEqual([0.4, 0.4, 0.4]);
  });

  it('colors a peer with saturation 0.7, lightness 0.6 at its hue', () => {
    const [r, g, b, a] = cursorColorFromId('00000000-0000-0000-0000-0000000000b4');
    expect(r).toBeCloseTo(0.32);
    expect(g).toBeCloseTo(0.88);
    expect(b).toBeCloseTo(0.88);
    expect(a).toBe(1);
  });
});

describe('buildCursorInstances', () => {
  it('derives the color from the user id unless one is given', () => {
    const out = buildCursorInstances([
      { userId: 'peer-alpha', position: [10, 20] },
      { userId: 'peer-beta', position: [30, 40], color: [1, 0, 0, 1], selection: [0, 0, 50, 20] },
    ]);
    expect(out[0].position).toEqual([10, 20]);
    expect(out[0].color).toEqual(cursorColorFromId('peer-alpha'));
    expect(out[0].selectionRect).toEqual([0, 0, 0, 0]);
    expect(out[1].color).toEqual([1, 0, 0, 1]);
    expect(out[1].selectionRect).toEqual([0, 0, 50, 20]);
  });
});
