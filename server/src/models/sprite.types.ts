/**
 * Pixel-level types shared by the extraction pipeline
 */

/**
 * Decoded RGBA image, 4 bytes per pixel, row-major
 */
export interface SourceImage {
  width: number;
  height: number;
  data: Buffer;
}

/**
 * Binary foreground mask, one byte per pixel (1 = foreground)
 */
export interface Mask {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Axis-aligned rectangle; right and bottom edges are exclusive
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Region {
  bbox: BoundingBox;
  pixelCount: number;
  /** Number of detected blobs folded into this region */
  mergedFrom: number;
  mergeGroup?: number;
  /** Reading-order index, assigned after filtering */
  index?: number;
}

export interface GridCell extends BoundingBox {
  row: number;
  col: number;
  index: number;
}

export interface OutputSize {
  name: string;
  width: number;
  height: number;
}

export interface SpriteAsset {
  sizeName: string;
  index: number;
  width: number;
  height: number;
  png: Buffer;
}

/** Archive directory holding the unresized crops */
export const ORIGINALS_DIR = 'original_sprites';

/**
 * A crop at its detected size, before any resizing
 */
export interface OriginalSprite {
  index: number;
  png: Buffer;
}

export type Connectivity = 4 | 8;

export type GapMetric = 'edge' | 'centroid';

export const DEFAULT_OUTPUT_SIZES: OutputSize[] = [
  { name: 'large', width: 256, height: 256 },
  { name: 'medium', width: 128, height: 128 },
  { name: 'small', width: 64, height: 64 }
];
