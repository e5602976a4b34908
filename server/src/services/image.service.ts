import sharp from 'sharp';
import { errorMessage } from '../errors/sprite-errors';
import { BoundingBox, SourceImage } from '../models/sprite.types';

export class ImageService {
  /**
   * Decode any supported image into an 8-bit sRGB RGBA pixel buffer
   */
  async loadImage(buffer: Buffer): Promise<SourceImage> {
    try {
      const { data, info } = await sharp(buffer)
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 4) {
        throw new Error(`expected 4 channels, decoded ${info.channels}`);
      }

      return { width: info.width, height: info.height, data };
    } catch (error) {
      throw new Error(`Failed to decode image: ${errorMessage(error)}`);
    }
  }

  /**
   * Encode an RGBA image as PNG
   */
  async encodePng(image: SourceImage): Promise<Buffer> {
    return sharp(image.data, { raw: { width: image.width, height: image.height, channels: 4 } })
      .png()
      .toBuffer();
  }

  /**
   * Copy a rectangle out of an image. The rectangle must lie inside it.
   */
  crop(image: SourceImage, rect: BoundingBox): SourceImage {
    if (
      rect.width <= 0 ||
      rect.height <= 0 ||
      rect.x < 0 ||
      rect.y < 0 ||
      rect.x + rect.width > image.width ||
      rect.y + rect.height > image.height
    ) {
      throw new Error(
        `Crop rectangle ${rect.width}x${rect.height}+${rect.x}+${rect.y} is outside ${image.width}x${image.height} image`
      );
    }

    const rowBytes = rect.width * 4;
    const data = Buffer.alloc(rowBytes * rect.height);
    for (let row = 0; row < rect.height; row++) {
      const start = ((rect.y + row) * image.width + rect.x) * 4;
      image.data.copy(data, row * rowBytes, start, start + rowBytes);
    }

    return { width: rect.width, height: rect.height, data };
  }

  /**
   * Grow a box by `padding` on every side, clamped to the image bounds
   */
  expandBox(box: BoundingBox, padding: number, imageWidth: number, imageHeight: number): BoundingBox {
    const x = Math.max(0, box.x - padding);
    const y = Math.max(0, box.y - padding);
    const right = Math.min(imageWidth, box.x + box.width + padding);
    const bottom = Math.min(imageHeight, box.y + box.height + padding);
    return { x, y, width: right - x, height: bottom - y };
  }
}
