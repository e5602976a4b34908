import { ConfigError, GridDetectionError } from '../errors/sprite-errors';
import { GridCell, SourceImage } from '../models/sprite.types';

export interface ExplicitGridOptions {
  autoDetect: false;
  rows: number;
  cols: number;
  padding: number;
}

export interface DetectedGridOptions {
  autoDetect: true;
  lineThreshold: number;
  minLineLengthRatio: number;
  padding: number;
}

export type GridOptions = ExplicitGridOptions | DetectedGridOptions;

interface Span {
  start: number;
  /** Exclusive */
  end: number;
}

// Content strips thinner than this between separator bands are treated as line noise
const MIN_SPAN = 2;

export class GridPartitionerService {
  /**
   * Slice an image into grid cells, row-major
   */
  partition(image: SourceImage, options: GridOptions): GridCell[] {
    if (options.autoDetect) {
      const { rowSpans, colSpans } = this.detectSpans(image, options.lineThreshold, options.minLineLengthRatio);
      return this.buildCells(rowSpans, colSpans, options.padding);
    }

    const { rows, cols, padding } = options;
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
      throw new ConfigError(`rows and cols must be positive integers, got ${rows}x${cols}`, 'rows');
    }
    return this.buildCells(
      this.evenSpans(image.height, rows),
      this.evenSpans(image.width, cols),
      padding
    );
  }

  /**
   * Find content spans between separator lines on both axes
   *
   * @throws GridDetectionError when neither axis has an interior separator
   */
  detectSpans(
    image: SourceImage,
    lineThreshold: number,
    minLineLengthRatio: number
  ): { rowSpans: Span[]; colSpans: Span[] } {
    const separatorRows: boolean[] = [];
    for (let y = 0; y < image.height; y++) {
      const run = this.longestUniformRun(image, lineThreshold, image.width, x => (y * image.width + x) * 4);
      separatorRows.push(run >= minLineLengthRatio * image.width);
    }

    const separatorCols: boolean[] = [];
    for (let x = 0; x < image.width; x++) {
      const run = this.longestUniformRun(image, lineThreshold, image.height, y => (y * image.width + x) * 4);
      separatorCols.push(run >= minLineLengthRatio * image.height);
    }

    const rowSpans = this.contentSpans(separatorRows);
    const colSpans = this.contentSpans(separatorCols);

    if (rowSpans.length === 0 || colSpans.length === 0) {
      throw new GridDetectionError('Image has no content between separator lines; retry with explicit rows and cols');
    }
    if (rowSpans.length < 2 && colSpans.length < 2) {
      throw new GridDetectionError();
    }

    return { rowSpans, colSpans };
  }

  /**
   * Length of the longest run of pixels that stay within `threshold` of the
   * run's first pixel (max per-channel difference; fully transparent pixels
   * match each other regardless of colour)
   */
  private longestUniformRun(
    image: SourceImage,
    threshold: number,
    length: number,
    offsetOf: (i: number) => number
  ): number {
    const data = image.data;
    let reference = offsetOf(0);
    let run = 0;
    let longest = 0;

    for (let i = 0; i < length; i++) {
      const offset = offsetOf(i);
      if (i > 0 && this.channelDistance(data, reference, offset) > threshold) {
        reference = offset;
        run = 0;
      }
      run++;
      if (run > longest) longest = run;
    }

    return longest;
  }

  private channelDistance(data: Buffer, a: number, b: number): number {
    if (data[a + 3] === 0 && data[b + 3] === 0) return 0;
    return Math.max(
      Math.abs(data[a] - data[b]),
      Math.abs(data[a + 1] - data[b + 1]),
      Math.abs(data[a + 2] - data[b + 2]),
      Math.abs(data[a + 3] - data[b + 3])
    );
  }

  private contentSpans(separators: boolean[]): Span[] {
    const spans: Span[] = [];
    let start = -1;

    for (let i = 0; i <= separators.length; i++) {
      const isContent = i < separators.length && !separators[i];
      if (isContent && start < 0) {
        start = i;
      } else if (!isContent && start >= 0) {
        if (i - start >= MIN_SPAN) spans.push({ start, end: i });
        start = -1;
      }
    }

    return spans;
  }

  private evenSpans(length: number, count: number): Span[] {
    const spans: Span[] = [];
    for (let i = 0; i < count; i++) {
      spans.push({
        start: Math.round((i * length) / count),
        end: Math.round(((i + 1) * length) / count)
      });
    }
    return spans;
  }

  private buildCells(rowSpans: Span[], colSpans: Span[], padding: number): GridCell[] {
    const cells: GridCell[] = [];

    rowSpans.forEach((rowSpan, row) => {
      colSpans.forEach((colSpan, col) => {
        const width = colSpan.end - colSpan.start - 2 * padding;
        const height = rowSpan.end - rowSpan.start - 2 * padding;
        if (width <= 0 || height <= 0) {
          throw new ConfigError(
            `padding ${padding} leaves no pixels in grid cell (${row}, ${col})`,
            'padding'
          );
        }
        cells.push({
          row,
          col,
          index: cells.length,
          x: colSpan.start + padding,
          y: rowSpan.start + padding,
          width,
          height
        });
      });
    });

    return cells;
  }
}
