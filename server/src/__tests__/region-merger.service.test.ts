import { Region } from '../models/sprite.types';
import { RegionDetectorService } from '../services/region-detector.service';
import { RegionMergerService } from '../services/region-merger.service';
import { solidRegion } from './helpers/image-fixtures.helper';

const summary = (regions: Region[]) =>
  regions.map(region => ({ bbox: region.bbox, pixelCount: region.pixelCount, mergedFrom: region.mergedFrom }));

describe('RegionMergerService', () => {
  let merger: RegionMergerService;

  beforeEach(() => {
    merger = new RegionMergerService();
  });

  describe('gap', () => {
    it('should measure the distance between closest edges', () => {
      expect(merger.gap({ x: 0, y: 0, width: 10, height: 10 }, { x: 15, y: 0, width: 10, height: 10 })).toBe(5);
      expect(merger.gap({ x: 0, y: 0, width: 10, height: 10 }, { x: 13, y: 14, width: 5, height: 5 })).toBe(5);
    });

    it('should be zero for touching or overlapping boxes', () => {
      expect(merger.gap({ x: 0, y: 0, width: 10, height: 10 }, { x: 10, y: 0, width: 5, height: 5 })).toBe(0);
      expect(merger.gap({ x: 0, y: 0, width: 10, height: 10 }, { x: 5, y: 5, width: 10, height: 10 })).toBe(0);
    });

    it('should measure between centres with the centroid metric', () => {
      const gap = merger.gap({ x: 0, y: 0, width: 10, height: 10 }, { x: 30, y: 40, width: 10, height: 10 }, 'centroid');
      expect(gap).toBe(50);
    });
  });

  describe('merge', () => {
    const pair = [solidRegion(0, 0, 10, 10), solidRegion(15, 0, 10, 10)];

    it('should merge squares 5px apart at a threshold of 10', () => {
      const merged = merger.merge(pair, 10);

      expect(summary(merged)).toEqual([
        { bbox: { x: 0, y: 0, width: 25, height: 10 }, pixelCount: 200, mergedFrom: 2 }
      ]);
      expect(merged[0].mergeGroup).toBe(0);
    });

    it('should keep squares 5px apart separate at a threshold of 2', () => {
      const merged = merger.merge(pair, 2);

      expect(summary(merged)).toEqual(summary(pair));
      expect(merged.map(region => region.mergeGroup)).toEqual([0, 1]);
    });

    it('should sum pixel counts of merged regions', () => {
      const [merged] = merger.merge([solidRegion(0, 0, 1, 1), solidRegion(2, 0, 1, 1)], 1);

      expect(merged.bbox).toEqual({ x: 0, y: 0, width: 3, height: 1 });
      expect(merged.pixelCount).toBe(2);
      expect(merged.mergedFrom).toBe(2);
    });

    it('should pair a wide box with regions that start further right', () => {
      const regions = [solidRegion(50, 0, 5, 5), solidRegion(0, 20, 100, 5), solidRegion(120, 0, 5, 5)];

      const merged = merger.merge(regions, 16);

      expect(summary(merged)).toEqual([
        { bbox: { x: 0, y: 0, width: 100, height: 25 }, pixelCount: 525, mergedFrom: 2 },
        { bbox: { x: 120, y: 0, width: 5, height: 5 }, pixelCount: 25, mergedFrom: 1 }
      ]);
    });

    it('should merge by centre distance with the centroid metric', () => {
      const regions = [solidRegion(0, 0, 10, 10), solidRegion(30, 40, 10, 10)];

      expect(merger.merge(regions, 50, 'centroid')).toHaveLength(1);
      expect(merger.merge(regions, 49, 'centroid')).toHaveLength(2);
    });

    it('should merge a dense field of specks quickly', () => {
      const side = 800;
      const data = new Uint8Array(side * side);
      for (let y = 0; y < side; y += 8) {
        for (let x = 0; x < side; x += 8) {
          data[y * side + x] = 1;
        }
      }
      const specks = new RegionDetectorService().detect({ width: side, height: side, data });
      expect(specks).toHaveLength(10000);

      const startedAt = Date.now();
      const merged = merger.merge(specks, 10);

      expect(Date.now() - startedAt).toBeLessThan(5000);
      expect(summary(merged)).toEqual([
        { bbox: { x: 0, y: 0, width: 793, height: 793 }, pixelCount: 10000, mergedFrom: 10000 }
      ]);
    });

    it('should keep merging until the grown boxes stop reaching new regions', () => {
      // C is too far from A and from B, but within reach of their union
      const regions = [solidRegion(0, 0, 10, 40), solidRegion(14, 0, 10, 10), solidRegion(20, 45, 10, 10)];

      const merged = merger.merge(regions, 5);

      expect(summary(merged)).toEqual([
        { bbox: { x: 0, y: 0, width: 30, height: 55 }, pixelCount: 600, mergedFrom: 3 }
      ]);
    });

    it('should be idempotent', () => {
      const regions = [
        solidRegion(0, 0, 10, 10),
        solidRegion(15, 0, 10, 10),
        solidRegion(60, 0, 10, 10),
        solidRegion(0, 60, 20, 20),
        solidRegion(25, 70, 4, 4)
      ];

      const once = merger.merge(regions, 8);
      const twice = merger.merge(once, 8);

      expect(summary(twice)).toEqual(summary(once));
      expect(once).toHaveLength(3);
    });
  });

  describe('filterByArea', () => {
    it('should keep regions exactly on the bounds and drop those just outside', () => {
      // 100x100 image: 0.01 -> 100px, 0.25 -> 2500px
      const regions = [
        solidRegion(0, 0, 10, 10, 99),
        solidRegion(0, 0, 10, 10, 100),
        solidRegion(0, 0, 50, 50, 2500),
        solidRegion(0, 0, 51, 50, 2501)
      ];

      const kept = merger.filterByArea(regions, 100, 100, 0.01, 0.25);

      expect(kept.map(region => region.pixelCount)).toEqual([100, 2500]);
    });
  });

  describe('filterBySizeRatio', () => {
    it('should drop regions whose box is below the ratio of the largest box', () => {
      const regions = [solidRegion(0, 0, 20, 20), solidRegion(30, 0, 10, 16), solidRegion(50, 0, 10, 15)];

      const kept = merger.filterBySizeRatio(regions, 0.4);

      expect(kept.map(region => region.bbox.height)).toEqual([20, 16]);
    });

    it('should pass an empty list through', () => {
      expect(merger.filterBySizeRatio([], 0.4)).toEqual([]);
    });
  });

  describe('sortReadingOrder', () => {
    it('should order rows top to bottom and regions left to right', () => {
      const regions = [solidRegion(5, 30, 10, 10), solidRegion(50, 0, 10, 10), solidRegion(0, 2, 10, 10)];

      const sorted = merger.sortReadingOrder(regions);

      expect(sorted.map(region => [region.bbox.x, region.bbox.y])).toEqual([[0, 2], [50, 0], [5, 30]]);
      expect(sorted.map(region => region.index)).toEqual([0, 1, 2]);
    });
  });

  describe('mergeAndFilter', () => {
    it('should report counts for every stage', () => {
      const regions = [
        solidRegion(0, 0, 10, 10),
        solidRegion(15, 0, 10, 10),
        solidRegion(100, 0, 20, 20),
        solidRegion(150, 150, 1, 1)
      ];

      const result = merger.mergeAndFilter(regions, 200, 200, {
        distanceThreshold: 10,
        sizeRatioThreshold: 0.4,
        minAreaRatio: 0.0005,
        maxAreaRatio: 0.25
      });

      expect(result.detectedCount).toBe(4);
      expect(result.mergedCount).toBe(3);
      expect(result.afterAreaFilterCount).toBe(2);
      expect(result.regions.map(region => region.bbox)).toEqual([
        { x: 0, y: 0, width: 25, height: 10 },
        { x: 100, y: 0, width: 20, height: 20 }
      ]);
    });
  });
});
