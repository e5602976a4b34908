import sharp from 'sharp';
import { SpriteExporterService } from '../services/sprite-exporter.service';
import { createImage, decodePng, pixelAt, RED, TRANSPARENT } from './helpers/image-fixtures.helper';

describe('SpriteExporterService', () => {
  let exporter: SpriteExporterService;

  beforeEach(() => {
    exporter = new SpriteExporterService(2);
  });

  describe('computePlacement', () => {
    it('should centre content that already fits without enlarging it', () => {
      expect(exporter.computePlacement(40, 40, { name: 'large', width: 64, height: 64 })).toEqual({
        width: 40,
        height: 40,
        left: 12,
        top: 12
      });
    });

    it('should shrink oversized content preserving aspect ratio', () => {
      expect(exporter.computePlacement(200, 100, { name: 'small', width: 64, height: 64 })).toEqual({
        width: 64,
        height: 32,
        left: 0,
        top: 16
      });
    });

    it('should never produce a zero-sized placement', () => {
      const placement = exporter.computePlacement(1000, 1, { name: 'tiny', width: 10, height: 10 });
      expect(placement.width).toBe(10);
      expect(placement.height).toBe(1);
    });
  });

  describe('renderSize', () => {
    it('should place the crop centred on a transparent canvas', async () => {
      const crop = createImage(40, 40, RED);

      const png = await exporter.renderSize(crop, { name: 'large', width: 64, height: 64 });
      const rendered = await decodePng(png);

      expect(rendered.width).toBe(64);
      expect(rendered.height).toBe(64);
      expect(pixelAt(rendered, 11, 11)).toEqual(TRANSPARENT);
      expect(pixelAt(rendered, 12, 12)).toEqual(RED);
      expect(pixelAt(rendered, 51, 51)).toEqual(RED);
      expect(pixelAt(rendered, 52, 52)).toEqual(TRANSPARENT);
    });

    it('should downscale content to the canvas', async () => {
      const crop = createImage(128, 64, RED);

      const png = await exporter.renderSize(crop, { name: 'small', width: 32, height: 32 });
      const rendered = await decodePng(png);

      expect([rendered.width, rendered.height]).toEqual([32, 32]);
      expect(pixelAt(rendered, 16, 7)).toEqual(TRANSPARENT);
      expect(pixelAt(rendered, 16, 16)[3]).toBe(255);
    });
  });

  describe('exportAll', () => {
    const sizes = [
      { name: 'large', width: 48, height: 48 },
      { name: 'small', width: 16, height: 24 }
    ];

    it('should produce every size for every crop with exact dimensions', async () => {
      const crops = [
        { index: 0, image: createImage(30, 20, RED) },
        { index: 1, image: createImage(10, 40, RED) }
      ];

      const assets = await exporter.exportAll(crops, sizes);

      expect(assets.map(asset => [asset.index, asset.sizeName])).toEqual([
        [0, 'large'],
        [0, 'small'],
        [1, 'large'],
        [1, 'small']
      ]);
      for (const asset of assets) {
        const metadata = await sharp(asset.png).metadata();
        expect([metadata.width, metadata.height]).toEqual([asset.width, asset.height]);
        expect(metadata.format).toBe('png');
      }
      expect(assets.map(asset => [asset.width, asset.height])).toEqual([
        [48, 48],
        [16, 24],
        [48, 48],
        [16, 24]
      ]);
    });

    it('should be deterministic', async () => {
      const crops = [{ index: 0, image: createImage(30, 20, RED) }];

      const first = await exporter.exportAll(crops, sizes);
      const second = await exporter.exportAll(crops, sizes);

      expect(second).toHaveLength(first.length);
      first.forEach((asset, i) => {
        expect(asset.png.equals(second[i].png)).toBe(true);
      });
    });

    it('should return nothing for no crops', async () => {
      expect(await exporter.exportAll([], sizes)).toEqual([]);
    });
  });
});
