import sharp from 'sharp';
import { AppConfig } from '../config';
import { errorMessage, RemovalError } from '../errors/sprite-errors';
import { callCollaborator, FetchLike } from './collaborator-http';

/**
 * Turns an image into an image with a meaningful alpha channel
 */
export interface BackgroundRemover {
  readonly name: string;
  removeBackground(image: Buffer): Promise<Buffer>;
}

export interface ChromaKeyOptions {
  /** Per-channel tolerance; summed RGB distance below 3× this is background */
  tolerance: number;
  /** Width of the soft alpha ramp beyond the core threshold */
  softEdge: number;
}

const DEFAULT_CHROMA_KEY: ChromaKeyOptions = {
  tolerance: 20,
  softEdge: 60
};

/**
 * Local remover. Images that already carry transparency pass through; fully
 * opaque images have the colour of their top-left pixel keyed out.
 */
export class LocalBackgroundRemover implements BackgroundRemover {
  readonly name = 'local';
  private readonly options: ChromaKeyOptions;

  constructor(options: Partial<ChromaKeyOptions> = {}) {
    this.options = { ...DEFAULT_CHROMA_KEY, ...options };
  }

  async removeBackground(image: Buffer): Promise<Buffer> {
    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      decoded = await sharp(image)
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new RemovalError(`Unsupported image: ${errorMessage(error)}`);
    }

    const { data, info } = decoded;
    if (this.hasTransparency(data)) {
      return image;
    }

    this.applyChromaKey(data, data[0], data[1], data[2]);
    return sharp(data, { raw: { width: info.width, height: info.height, channels: 4 } })
      .png()
      .toBuffer();
  }

  private hasTransparency(rgba: Buffer): boolean {
    for (let i = 3; i < rgba.length; i += 4) {
      if (rgba[i] < 255) return true;
    }
    return false;
  }

  /**
   * Key out pixels close to (keyR, keyG, keyB) in place
   */
  applyChromaKey(rgba: Buffer, keyR: number, keyG: number, keyB: number): void {
    const core = this.options.tolerance * 3;
    const outer = core + this.options.softEdge;

    for (let i = 0; i < rgba.length; i += 4) {
      const distance =
        Math.abs(rgba[i] - keyR) + Math.abs(rgba[i + 1] - keyG) + Math.abs(rgba[i + 2] - keyB);
      if (distance < core) {
        rgba[i + 3] = 0;
      } else if (distance < outer) {
        const t = (distance - core) / this.options.softEdge;
        rgba[i + 3] = Math.round(t * rgba[i + 3]);
      }
    }
  }
}

/**
 * Delegates to an external matting service: multipart `file` in, PNG out
 */
export class HttpBackgroundRemover implements BackgroundRemover {
  readonly name = 'http';

  constructor(
    private readonly serviceUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async removeBackground(image: Buffer): Promise<Buffer> {
    const form = new FormData();
    form.append('file', new Blob([image]), 'image.png');

    const response = await callCollaborator(
      this.fetchImpl,
      this.serviceUrl,
      { method: 'POST', body: form },
      this.timeoutMs,
      (message, transient) => new RemovalError(`Background removal failed: ${message}`, transient)
    );

    const result = Buffer.from(await response.arrayBuffer());
    if (result.length === 0) {
      throw new RemovalError('Background removal service returned an empty body');
    }
    return result;
  }
}

export function createBackgroundRemover(config: AppConfig): BackgroundRemover {
  if (config.removalBackend === 'http' && config.removalServiceUrl) {
    return new HttpBackgroundRemover(config.removalServiceUrl, config.collaboratorTimeoutMs);
  }
  return new LocalBackgroundRemover();
}
