import os from 'os';
import pLimit from 'p-limit';
import sharp from 'sharp';
import { OriginalSprite, OutputSize, SourceImage, SpriteAsset } from '../models/sprite.types';

export interface SpriteCrop {
  index: number;
  image: SourceImage;
}

export interface Placement {
  width: number;
  height: number;
  left: number;
  top: number;
}

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export class SpriteExporterService {
  private readonly concurrency: number;

  constructor(concurrency = Math.max(1, os.cpus().length - 1)) {
    this.concurrency = concurrency;
  }

  /**
   * Where a `sourceWidth`×`sourceHeight` crop lands on a canvas of the given
   * size. Content is shrunk to fit but never enlarged.
   */
  computePlacement(sourceWidth: number, sourceHeight: number, size: OutputSize): Placement {
    const scale = Math.min(1, size.width / sourceWidth, size.height / sourceHeight);
    // Epsilon keeps exact fits (e.g. 200 * 0.32 = 64) from flooring to 63
    const width = Math.min(size.width, Math.max(1, Math.floor(sourceWidth * scale + 1e-9)));
    const height = Math.min(size.height, Math.max(1, Math.floor(sourceHeight * scale + 1e-9)));

    return {
      width,
      height,
      left: Math.floor((size.width - width) / 2),
      top: Math.floor((size.height - height) / 2)
    };
  }

  /**
   * Render one crop onto a transparent canvas of exactly `size`
   */
  async renderSize(crop: SourceImage, size: OutputSize): Promise<Buffer> {
    const placement = this.computePlacement(crop.width, crop.height, size);

    const content =
      placement.width === crop.width && placement.height === crop.height
        ? crop.data
        : await sharp(crop.data, { raw: { width: crop.width, height: crop.height, channels: 4 } })
            .resize(placement.width, placement.height, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
            .raw()
            .toBuffer();

    return sharp({
      create: { width: size.width, height: size.height, channels: 4, background: TRANSPARENT }
    })
      .composite([
        {
          input: content,
          raw: { width: placement.width, height: placement.height, channels: 4 },
          left: placement.left,
          top: placement.top
        }
      ])
      .png()
      .toBuffer();
  }

  /**
   * Produce one asset per output size for a single crop
   */
  async exportSprite(crop: SpriteCrop, sizes: OutputSize[]): Promise<SpriteAsset[]> {
    const assets: SpriteAsset[] = [];
    for (const size of sizes) {
      assets.push({
        sizeName: size.name,
        index: crop.index,
        width: size.width,
        height: size.height,
        png: await this.renderSize(crop.image, size)
      });
    }
    return assets;
  }

  /**
   * Export every crop at every size, up to `concurrency` crops at a time.
   * Output order follows input.
   */
  async exportAll(crops: SpriteCrop[], sizes: OutputSize[]): Promise<SpriteAsset[]> {
    const limit = pLimit(this.concurrency);
    const perCrop = await Promise.all(crops.map(crop => limit(() => this.exportSprite(crop, sizes))));
    return perCrop.flat();
  }

  /**
   * Encode every crop as-is, up to `concurrency` at a time
   */
  async exportOriginals(crops: SpriteCrop[]): Promise<OriginalSprite[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(
      crops.map(crop =>
        limit(async () => ({
          index: crop.index,
          png: await sharp(crop.image.data, {
            raw: { width: crop.image.width, height: crop.image.height, channels: 4 }
          })
            .png()
            .toBuffer()
        }))
      )
    );
  }
}
