import { Connectivity, Mask, Region } from '../models/sprite.types';

const NEIGHBORS_4: ReadonlyArray<[number, number]> = [
  [1, 0], [-1, 0], [0, 1], [0, -1]
];

const NEIGHBORS_8: ReadonlyArray<[number, number]> = [
  ...NEIGHBORS_4,
  [1, 1], [1, -1], [-1, 1], [-1, -1]
];

export class RegionDetectorService {
  /**
   * Label connected foreground components of a mask.
   *
   * Regions come back in the raster-scan order of their first pixel
   * (top row first, left to right). An empty mask yields no regions.
   */
  detect(mask: Mask, connectivity: Connectivity = 8): Region[] {
    const { width, height } = mask;
    const labels = new Int32Array(width * height);
    const stack = new Int32Array(width * height);
    const neighbors = connectivity === 8 ? NEIGHBORS_8 : NEIGHBORS_4;
    const regions: Region[] = [];
    let nextLabel = 1;

    for (let start = 0; start < mask.data.length; start++) {
      if (mask.data[start] === 0 || labels[start] !== 0) continue;

      const label = nextLabel++;
      let pixelCount = 0;
      let minX = width;
      let minY = height;
      let maxX = -1;
      let maxY = -1;

      let top = 0;
      stack[top++] = start;
      labels[start] = label;

      while (top > 0) {
        const index = stack[--top];
        const x = index % width;
        const y = (index - x) / width;
        pixelCount++;

        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;

        for (const [dx, dy] of neighbors) {
          const nx = x + dx;
          const ny = y + dy;
          if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
          const neighbor = ny * width + nx;
          if (mask.data[neighbor] === 1 && labels[neighbor] === 0) {
            labels[neighbor] = label;
            stack[top++] = neighbor;
          }
        }
      }

      regions.push({
        bbox: { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 },
        pixelCount,
        mergedFrom: 1
      });
    }

    return regions;
  }
}
