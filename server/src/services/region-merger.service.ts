import { BoundingBox, GapMetric, Region } from '../models/sprite.types';
import { UnionFind } from './union-find';

export interface MergeFilterOptions {
  distanceThreshold: number;
  sizeRatioThreshold: number;
  minAreaRatio: number;
  maxAreaRatio: number;
  gapMetric?: GapMetric;
}

export interface MergeFilterResult {
  regions: Region[];
  detectedCount: number;
  mergedCount: number;
  afterAreaFilterCount: number;
}

export class RegionMergerService {
  /**
   * Distance between two boxes.
   * `edge`: Euclidean distance between their closest edges, 0 when they touch or overlap.
   * `centroid`: Euclidean distance between their centres.
   */
  gap(a: BoundingBox, b: BoundingBox, metric: GapMetric = 'edge'): number {
    if (metric === 'centroid') {
      const dx = (a.x + a.width / 2) - (b.x + b.width / 2);
      const dy = (a.y + a.height / 2) - (b.y + b.height / 2);
      return Math.hypot(dx, dy);
    }

    const dx = Math.max(0, b.x - (a.x + a.width), a.x - (b.x + b.width));
    const dy = Math.max(0, b.y - (a.y + a.height), a.y - (b.y + b.height));
    return Math.hypot(dx, dy);
  }

  /**
   * Union every pair of regions whose gap is within the threshold, repeating
   * until a pass merges nothing. The output is a fixpoint, so merging it
   * again returns the same sequence.
   */
  merge(regions: Region[], distanceThreshold: number, metric: GapMetric = 'edge'): Region[] {
    let current = regions;

    for (;;) {
      const unionFind = new UnionFind(current.length);
      let unions = 0;

      this.forEachNearbyPair(current, distanceThreshold, metric, (i, j) => {
        if (unionFind.union(i, j)) unions++;
      });

      if (unions === 0) break;

      const previous = current;
      current = unionFind.groups().map(group =>
        group.slice(1).reduce((merged, member) => this.combine(merged, previous[member]), previous[group[0]])
      );
    }

    return current.map((region, mergeGroup) => ({ ...region, mergeGroup }));
  }

  /**
   * Keep regions whose pixel area ratio lies within [minAreaRatio, maxAreaRatio]
   */
  filterByArea(
    regions: Region[],
    imageWidth: number,
    imageHeight: number,
    minAreaRatio: number,
    maxAreaRatio: number
  ): Region[] {
    const totalArea = imageWidth * imageHeight;
    return regions.filter(region => {
      const ratio = region.pixelCount / totalArea;
      return ratio >= minAreaRatio && ratio <= maxAreaRatio;
    });
  }

  /**
   * Drop regions whose bounding box is much smaller than the largest one
   */
  filterBySizeRatio(regions: Region[], sizeRatioThreshold: number): Region[] {
    if (regions.length === 0) return regions;

    const largest = regions.reduce((max, region) => Math.max(max, region.bbox.width * region.bbox.height), 0);
    const minimum = sizeRatioThreshold * largest;
    return regions.filter(region => region.bbox.width * region.bbox.height >= minimum);
  }

  /**
   * Sort into reading order and assign indices.
   *
   * A region joins the current row when its vertical centre lies inside the
   * vertical span of the row's first (topmost) region.
   */
  sortReadingOrder(regions: Region[]): Region[] {
    const byTop = [...regions].sort((a, b) => a.bbox.y - b.bbox.y || a.bbox.x - b.bbox.x);
    const rows: Region[][] = [];

    for (const region of byTop) {
      const row = rows[rows.length - 1];
      const centerY = region.bbox.y + region.bbox.height / 2;
      if (row && centerY >= row[0].bbox.y && centerY < row[0].bbox.y + row[0].bbox.height) {
        row.push(region);
      } else {
        rows.push([region]);
      }
    }

    return rows
      .flatMap(row => row.sort((a, b) => a.bbox.x - b.bbox.x || a.bbox.y - b.bbox.y))
      .map((region, index) => ({ ...region, index }));
  }

  /**
   * Merge, area-filter, size-ratio-filter and order detected regions
   */
  mergeAndFilter(
    regions: Region[],
    imageWidth: number,
    imageHeight: number,
    options: MergeFilterOptions
  ): MergeFilterResult {
    const merged = this.merge(regions, options.distanceThreshold, options.gapMetric);
    const areaFiltered = this.filterByArea(
      merged,
      imageWidth,
      imageHeight,
      options.minAreaRatio,
      options.maxAreaRatio
    );
    const sized = this.filterBySizeRatio(areaFiltered, options.sizeRatioThreshold);

    return {
      regions: this.sortReadingOrder(sized),
      detectedCount: regions.length,
      mergedCount: merged.length,
      afterAreaFilterCount: areaFiltered.length
    };
  }

  /**
   * Visit every pair whose gap is within the threshold.
   *
   * Boxes are swept in order of their left edge (or centre, for the centroid
   * metric). Once a box starts further right than the current one can reach,
   * every later box does too.
   */
  private forEachNearbyPair(
    regions: Region[],
    distanceThreshold: number,
    metric: GapMetric,
    visit: (i: number, j: number) => void
  ): void {
    const start = (box: BoundingBox) => (metric === 'centroid' ? box.x + box.width / 2 : box.x);
    const end = (box: BoundingBox) => (metric === 'centroid' ? box.x + box.width / 2 : box.x + box.width);

    const order = regions.map((_, i) => i).sort((a, b) => start(regions[a].bbox) - start(regions[b].bbox) || a - b);

    for (let p = 0; p < order.length; p++) {
      const a = regions[order[p]].bbox;
      const reach = end(a) + distanceThreshold;
      for (let q = p + 1; q < order.length; q++) {
        const b = regions[order[q]].bbox;
        if (start(b) > reach) break;
        if (this.gap(a, b, metric) <= distanceThreshold) {
          visit(order[p], order[q]);
        }
      }
    }
  }

  /**
   * Union of two regions: box union, summed pixel count
   */
  private combine(a: Region, b: Region): Region {
    const x = Math.min(a.bbox.x, b.bbox.x);
    const y = Math.min(a.bbox.y, b.bbox.y);
    const right = Math.max(a.bbox.x + a.bbox.width, b.bbox.x + b.bbox.width);
    const bottom = Math.max(a.bbox.y + a.bbox.height, b.bbox.y + b.bbox.height);

    return {
      bbox: { x, y, width: right - x, height: bottom - y },
      pixelCount: a.pixelCount + b.pixelCount,
      mergedFrom: a.mergedFrom + b.mergedFrom
    };
  }
}
