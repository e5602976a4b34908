import { ConfigError } from '../errors/sprite-errors';
import { Mask, SourceImage } from '../models/sprite.types';

export class MaskService {
  /**
   * Threshold the alpha channel: a pixel is foreground iff alpha > cutoff
   */
  buildMask(image: SourceImage, alphaThreshold: number): Mask {
    if (!Number.isInteger(alphaThreshold) || alphaThreshold < 1 || alphaThreshold > 254) {
      throw new ConfigError(`alpha_threshold must be an integer between 1 and 254, got ${alphaThreshold}`, 'alpha_threshold');
    }

    const pixelCount = image.width * image.height;
    const data = new Uint8Array(pixelCount);
    for (let i = 0; i < pixelCount; i++) {
      data[i] = image.data[i * 4 + 3] > alphaThreshold ? 1 : 0;
    }

    return { width: image.width, height: image.height, data };
  }

  countForeground(mask: Mask): number {
    let count = 0;
    for (let i = 0; i < mask.data.length; i++) {
      count += mask.data[i];
    }
    return count;
  }
}
