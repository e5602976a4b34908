import { ConfigError, GridDetectionError } from '../errors/sprite-errors';
import { SourceImage } from '../models/sprite.types';
import { GridPartitionerService } from '../services/grid-partitioner.service';
import { BLACK, createImage, fillRect, RED, setPixel, WHITE } from './helpers/image-fixtures.helper';

/**
 * Checkerboard content, so no row or column reads as a uniform line
 */
function checkerboard(width: number, height: number): SourceImage {
  const image = createImage(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      setPixel(image, x, y, (x + y) % 2 === 0 ? WHITE : RED);
    }
  }
  return image;
}

describe('GridPartitionerService', () => {
  let partitioner: GridPartitionerService;

  beforeEach(() => {
    partitioner = new GridPartitionerService();
  });

  describe('explicit rows and cols', () => {
    it('should split 100x100 into four 50x50 cells in row-major order', () => {
      const cells = partitioner.partition(createImage(100, 100), { autoDetect: false, rows: 2, cols: 2, padding: 0 });

      expect(cells).toEqual([
        { row: 0, col: 0, index: 0, x: 0, y: 0, width: 50, height: 50 },
        { row: 0, col: 1, index: 1, x: 50, y: 0, width: 50, height: 50 },
        { row: 1, col: 0, index: 2, x: 0, y: 50, width: 50, height: 50 },
        { row: 1, col: 1, index: 3, x: 50, y: 50, width: 50, height: 50 }
      ]);
    });

    it('should spread uneven remainders across cells', () => {
      const cells = partitioner.partition(createImage(10, 1), { autoDetect: false, rows: 1, cols: 3, padding: 0 });

      expect(cells.map(cell => [cell.x, cell.width])).toEqual([[0, 3], [3, 4], [7, 3]]);
    });

    it('should trim padding from every cell edge', () => {
      const cells = partitioner.partition(createImage(100, 100), { autoDetect: false, rows: 2, cols: 2, padding: 5 });

      expect(cells[3]).toEqual({ row: 1, col: 1, index: 3, x: 55, y: 55, width: 40, height: 40 });
    });

    it('should reject padding that leaves a cell empty', () => {
      expect(() =>
        partitioner.partition(createImage(100, 100), { autoDetect: false, rows: 2, cols: 2, padding: 25 })
      ).toThrow(ConfigError);
    });

    it('should reject non-positive row or column counts', () => {
      expect(() =>
        partitioner.partition(createImage(10, 10), { autoDetect: false, rows: 0, cols: 2, padding: 0 })
      ).toThrow(ConfigError);
    });
  });

  describe('auto-detect', () => {
    const detect = { autoDetect: true, lineThreshold: 30, minLineLengthRatio: 0.8, padding: 0 } as const;

    it('should find cells between separator lines', () => {
      const image = checkerboard(100, 100);
      fillRect(image, { x: 0, y: 49, width: 100, height: 2 }, BLACK);
      fillRect(image, { x: 49, y: 0, width: 2, height: 100 }, BLACK);

      const cells = partitioner.partition(image, detect);

      expect(cells.map(cell => [cell.x, cell.y, cell.width, cell.height])).toEqual([
        [0, 0, 49, 49],
        [51, 0, 49, 49],
        [0, 51, 49, 49],
        [51, 51, 49, 49]
      ]);
    });

    it('should split along one axis when only that axis has separators', () => {
      const image = checkerboard(60, 20);
      fillRect(image, { x: 29, y: 0, width: 2, height: 20 }, BLACK);

      const cells = partitioner.partition(image, detect);

      expect(cells.map(cell => [cell.x, cell.y, cell.width, cell.height])).toEqual([
        [0, 0, 29, 20],
        [31, 0, 29, 20]
      ]);
    });

    it('should throw GridDetectionError when no separators are found', () => {
      expect(() => partitioner.partition(checkerboard(40, 40), detect)).toThrow(GridDetectionError);
    });

    it('should throw GridDetectionError for a blank image', () => {
      expect(() => partitioner.partition(createImage(40, 40), detect)).toThrow(GridDetectionError);
    });
  });
});
