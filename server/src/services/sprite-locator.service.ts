import { ProcessingParams } from '../models/processing-params';
import { BoundingBox, SourceImage } from '../models/sprite.types';
import { GridPartitionerService } from './grid-partitioner.service';
import { MaskService } from './mask.service';
import { RegionDetectorService } from './region-detector.service';
import { RegionMergerService } from './region-merger.service';

export interface LocatedSprite {
  /** Reading-order index */
  index: number;
  bbox: BoundingBox;
}

export interface LocatedSprites {
  sprites: LocatedSprite[];
  /** One-line account of how the boxes were found, for the task log */
  summary: string;
}

/**
 * Finds sprite boxes in a decoded image: merged alpha regions in auto mode,
 * grid cells in grid mode
 */
export interface SpriteLocator {
  locate(image: SourceImage, params: ProcessingParams): Promise<LocatedSprites>;
}

/**
 * Locates sprites on the calling thread
 */
export class SpriteLocatorService implements SpriteLocator {
  constructor(
    private readonly maskService = new MaskService(),
    private readonly regionDetector = new RegionDetectorService(),
    private readonly regionMerger = new RegionMergerService(),
    private readonly gridPartitioner = new GridPartitionerService()
  ) {}

  async locate(image: SourceImage, params: ProcessingParams): Promise<LocatedSprites> {
    return this.locateSync(image, params);
  }

  locateSync(image: SourceImage, params: ProcessingParams): LocatedSprites {
    if (params.mode === 'grid') {
      const cells = this.gridPartitioner.partition(
        image,
        params.autoDetect
          ? {
              autoDetect: true,
              lineThreshold: params.lineThreshold,
              minLineLengthRatio: params.minLineLengthRatio,
              padding: params.padding
            }
          : { autoDetect: false, rows: params.rows, cols: params.cols, padding: params.padding }
      );
      return {
        sprites: cells.map(cell => ({
          index: cell.index,
          bbox: { x: cell.x, y: cell.y, width: cell.width, height: cell.height }
        })),
        summary: `partitioned into ${cells.length} grid cells`
      };
    }

    const mask = this.maskService.buildMask(image, params.alphaThreshold);
    const detected = this.regionDetector.detect(mask, params.connectivity);
    const result = this.regionMerger.mergeAndFilter(detected, image.width, image.height, {
      distanceThreshold: params.distanceThreshold,
      sizeRatioThreshold: params.sizeRatioThreshold,
      minAreaRatio: params.minAreaRatio,
      maxAreaRatio: params.maxAreaRatio,
      gapMetric: params.gapMetric
    });

    return {
      sprites: result.regions.map((region, position) => ({ index: region.index ?? position, bbox: region.bbox })),
      summary:
        `${this.maskService.countForeground(mask)} foreground pixels, ${result.detectedCount} blobs -> ` +
        `${result.mergedCount} merged -> ${result.afterAreaFilterCount} after area filter -> ` +
        `${result.regions.length} sprites`
    };
  }
}
