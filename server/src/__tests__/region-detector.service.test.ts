import { RegionDetectorService } from '../services/region-detector.service';
import { maskFromRows } from './helpers/image-fixtures.helper';

describe('RegionDetectorService', () => {
  let detector: RegionDetectorService;

  beforeEach(() => {
    detector = new RegionDetectorService();
  });

  it('should return no regions for an empty mask', () => {
    expect(detector.detect(maskFromRows(['....', '....']))).toEqual([]);
  });

  it('should label separate blobs with tight bounding boxes and pixel counts', () => {
    const mask = maskFromRows([
      '##....',
      '##..#.',
      '....##',
      '......'
    ]);

    const regions = detector.detect(mask);

    expect(regions).toHaveLength(2);
    expect(regions[0].bbox).toEqual({ x: 0, y: 0, width: 2, height: 2 });
    expect(regions[0].pixelCount).toBe(4);
    expect(regions[1].bbox).toEqual({ x: 4, y: 1, width: 2, height: 2 });
    expect(regions[1].pixelCount).toBe(3);
    expect(regions.every(region => region.mergedFrom === 1)).toBe(true);
  });

  it('should join diagonal neighbours only with 8-connectivity', () => {
    const mask = maskFromRows([
      '#..',
      '.#.',
      '..#'
    ]);

    expect(detector.detect(mask, 8)).toHaveLength(1);
    expect(detector.detect(mask, 4)).toHaveLength(3);
  });

  it('should order regions by the raster position of their first pixel', () => {
    const mask = maskFromRows([
      '....#',
      '#....',
      '..#..'
    ]);

    const regions = detector.detect(mask, 4);

    expect(regions.map(region => [region.bbox.x, region.bbox.y])).toEqual([[4, 0], [0, 1], [2, 2]]);
  });

  it('should handle a region spanning the whole mask', () => {
    const regions = detector.detect(maskFromRows(['###', '###']));
    expect(regions).toHaveLength(1);
    expect(regions[0].bbox).toEqual({ x: 0, y: 0, width: 3, height: 2 });
    expect(regions[0].pixelCount).toBe(6);
  });
});
