/** Single-channel coverage bitmap, row-major, one byte per texel. */
export interface AtlasImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array<ArrayBuffer>;
}

export const ATLAS_FORMAT: GPUTextureFormat = 'r8unorm';

export function validateAtlasImage(image: AtlasImage): void {
  if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width <= 0 || image.height <= 0) {
    throw new Error(`Glyph atlas size must be positive integers, got ${image.width}x${image.height}`);
  }
  if (image.data.length !== image.width * image.height) {
    throw new Error(
      `Glyph atlas data has ${image.data.length} bytes, expected ${image.width * image.height} ` +
      `for ${image.width}x${image.height} r8`,
    );
  }
}

/**
 * GPU side of the shared glyph atlas.
 *
 * Packing and glyph caching belong to the text-shaping collaborator; this
 * class only mirrors its bitmap into an r8unorm texture. The last uploaded
 * bitmap is retained so the texture can be rebuilt after device loss.
 */
export class GlyphAtlas {
  private device: GPUDevice;
  private texture: GPUTexture | null = null;
  private _view: GPUTextureView | null = null;
  private _sampler: GPUSampler;
  private _image: AtlasImage | null = null;

  constructor(device: GPUDevice) {
    this.device = device;
    this._sampler = createAtlasSampler(device);
  }

  get view(): GPUTextureView | null {
    return this._view;
  }

  get sampler(): GPUSampler {
    return this._sampler;
  }

  upload(image: AtlasImage): void {
    validateAtlasImage(image);
    const retained: AtlasImage = { width: image.width, height: image.height, data: image.data.slice() };
    this._image = retained;
    this.writeImage(retained);
  }

  /** Move to a new device and re-upload the retained bitmap, if any. */
  restore(device: GPUDevice): void {
    this.texture = null;
    this._view = null;
    this.device = device;
    this._sampler = createAtlasSampler(device);
    if (this._image) this.writeImage(this._image);
  }

  private writeImage(image: AtlasImage): void {
    if (!this.texture || this.texture.width !== image.width || this.texture.height !== image.height) {
      this.texture?.destroy();
      this.texture = this.device.createTexture({
        label: 'glyph-atlas',
        size: { width: image.width, height: image.height },
        format: ATLAS_FORMAT,
        usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
      });
      this._view = this.texture.createView();
    }
    this.device.queue.writeTexture(
      { texture: this.texture },
      image.data,
      { bytesPerRow: image.width, rowsPerImage: image.height },
      { width: image.width, height: image.height },
    );
  }

  destroy(): void {
    this.texture?.destroy();
    this.texture = null;
    this._view = null;
    this._image = null;
  }
}

function createAtlasSampler(device: GPUDevice): GPUSampler {
  return device.createSampler({
    label: 'glyph-atlas-sampler',
    addressModeU: 'clamp-to-edge',
    addressModeV: 'clamp-to-edge',
    magFilter: 'linear',
    minFilter: 'linear',
  });
}

/**
 * Bilinear, clamp-to-edge sample of the atlas at `uv`, matching the GPU
 * sampler configuration above. Returns coverage in [0, 1].
 */
export function sampleAtlas(image: AtlasImage, u: number, v: number): number {
  const x = u * image.width - 0.5;
  const y = v * image.height - 0.5;
  const x0 = Math.floor(x);
  const y0 = Math.floor(y);
  const fx = x - x0;
  const fy = y - y0;
  const texel = (tx: number, ty: number): number => {
    const cx = Math.min(Math.max(tx, 0), image.width - 1);
    const cy = Math.min(Math.max(ty, 0), image.height - 1);
    return image.data[cy * image.width + cx] / 255;
  };
  const top = texel(x0, y0) * (1 - fx) + texel(x0 + 1, y0) * fx;
  const bottom = texel(x0, y0 + 1) * (1 - fx) + texel(x0 + 1, y0 + 1) * fx;
  return top * (1 - fy) + bottom * fy;
}
