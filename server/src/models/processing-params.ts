import { z } from 'zod';
import { ConfigError } from '../errors/sprite-errors';
import { Connectivity, DEFAULT_OUTPUT_SIZES, GapMetric, ORIGINALS_DIR, OutputSize } from './sprite.types';

export type ProcessingMode = 'auto' | 'grid';

/**
 * Validated, fully-defaulted parameters for one task
 */
export interface ProcessingParams {
  mode: ProcessingMode;
  alphaThreshold: number;
  distanceThreshold: number;
  sizeRatioThreshold: number;
  minAreaRatio: number;
  maxAreaRatio: number;
  gapMetric: GapMetric;
  connectivity: Connectivity;
  cropPadding: number;
  autoDetect: boolean;
  rows: number;
  cols: number;
  padding: number;
  lineThreshold: number;
  minLineLengthRatio: number;
  outputSizes: OutputSize[];
}

const MAX_OUTPUT_SIZES = 16;
const MAX_CANVAS_SIDE = 4096;

// Multipart form fields arrive as strings; blank means "use the default"
const blankToUndefined = (value: unknown): unknown =>
  value === '' || value === null ? undefined : value;

const intField = (min: number, max: number, fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const ratioField = (min: number, max: number, fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(fallback));

const booleanField = (fallback: boolean) =>
  z.preprocess((value) => {
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return blankToUndefined(value);
  }, z.boolean().default(fallback));

const connectivityField = z.preprocess(
  (value) => (typeof value === 'string' && value !== '' ? Number(value) : blankToUndefined(value)),
  z.union([z.literal(4), z.literal(8)]).default(8)
);

const canvasSide = z.number().int().min(1).max(MAX_CANVAS_SIDE);

const outputSizesField = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return blankToUndefined(value);
    if (value.trim() === '') return undefined;
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  },
  z
    .record(
      z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'size names may only contain letters, digits, "_" and "-"'),
      // [width, height] or the legacy [max_side, width, height]
      z.union([z.tuple([canvasSide, canvasSide]), z.tuple([canvasSide, canvasSide, canvasSide])])
    )
    .refine((sizes) => Object.keys(sizes).length > 0, 'at least one output size is required')
    .refine((sizes) => !(ORIGINALS_DIR in sizes), `output size name "${ORIGINALS_DIR}" is reserved`)
    .refine(
      (sizes) => Object.keys(sizes).length <= MAX_OUTPUT_SIZES,
      `at most ${MAX_OUTPUT_SIZES} output sizes are allowed`
    )
    .optional()
);

export const processingParamsSchema = z
  .object({
    mode: z.preprocess(blankToUndefined, z.enum(['auto', 'grid']).default('auto')),
    alpha_threshold: intField(1, 254, 50),
    distance_threshold: ratioField(10, 500, 80),
    size_ratio_threshold: ratioField(0.1, 1.0, 0.4),
    min_area_ratio: ratioField(0.0001, 0.1, 0.0005),
    max_area_ratio: ratioField(0.05, 0.9, 0.25),
    gap_metric: z.preprocess(blankToUndefined, z.enum(['edge', 'centroid']).default('edge')),
    connectivity: connectivityField,
    crop_padding: intField(0, 64, 0),
    auto_detect: booleanField(false),
    rows: intField(1, 64, 1),
    cols: intField(1, 64, 1),
    padding: intField(0, 256, 0),
    line_threshold: ratioField(10, 200, 30),
    min_line_length_ratio: ratioField(0.1, 1.0, 0.8),
    output_sizes: outputSizesField
  })
  .strict()
  .superRefine((params, ctx) => {
    if (params.min_area_ratio > params.max_area_ratio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min_area_ratio'],
        message: 'min_area_ratio must not exceed max_area_ratio'
      });
    }
  });

export type ProcessingParamsInput = z.input<typeof processingParamsSchema>;

/**
 * Validate a raw (snake_case) parameter bag and fill in defaults
 *
 * @throws ConfigError naming the first invalid field
 */
export function parseProcessingParams(input: unknown): ProcessingParams {
  const result = processingParamsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigError(field ? `Invalid parameter "${field}": ${issue.message}` : issue.message, field || undefined);
  }

  const raw = result.data;
  const outputSizes: OutputSize[] = raw.output_sizes
    ? Object.entries(raw.output_sizes).map(([name, dims]) => {
        const [width, height] = dims.length === 3 ? [dims[1], dims[2]] : dims;
        return { name, width, height };
      })
    : DEFAULT_OUTPUT_SIZES.map(size => ({ ...size }));

  return {
    mode: raw.mode,
    alphaThreshold: raw.alpha_threshold,
    distanceThreshold: raw.distance_threshold,
    sizeRatioThreshold: raw.size_ratio_threshold,
    minAreaRatio: raw.min_area_ratio,
    maxAreaRatio: raw.max_area_ratio,
    gapMetric: raw.gap_metric,
    connectivity: raw.connectivity,
    cropPadding: raw.crop_padding,
    autoDetect: raw.auto_detect,
    rows: raw.rows,
    cols: raw.cols,
    padding: raw.padding,
    lineThreshold: raw.line_threshold,
    minLineLengthRatio: raw.min_line_length_ratio,
    outputSizes
  };
}
