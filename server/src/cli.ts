#!/usr/bin/env node
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from './config';
import { errorMessage } from './errors/sprite-errors';
import { parseProcessingParams } from './models/processing-params';
import { LocalRunner } from './pipeline/local-runner';
import { createPipelineDependencies, SpritePipeline } from './pipeline/sprite-pipeline';
import { createBackgroundRemover } from './services/background-removal.service';
import { WorkspaceService } from './services/workspace.service';

// Option name -> wire parameter name
const PARAM_OPTIONS = {
  mode: 'mode',
  alphaThreshold: 'alpha_threshold',
  distance: 'distance_threshold',
  sizeRatio: 'size_ratio_threshold',
  minAreaRatio: 'min_area_ratio',
  maxAreaRatio: 'max_area_ratio',
  gapMetric: 'gap_metric',
  connectivity: 'connectivity',
  cropPadding: 'crop_padding',
  autoDetect: 'auto_detect',
  rows: 'rows',
  cols: 'cols',
  padding: 'padding',
  lineThreshold: 'line_threshold',
  minLineLengthRatio: 'min_line_length_ratio',
  outputSizes: 'output_sizes'
} as const;

const cliOptionsSchema = z
  .object({
    batch: z.string().optional(),
    output: z.string().optional(),
    verbose: z.boolean().optional()
  })
  .passthrough();

/**
 * Map parsed CLI options onto the raw parameter bag
 */
export function paramsFromOptions(options: Record<string, unknown>): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const [option, param] of Object.entries(PARAM_OPTIONS)) {
    if (options[option] !== undefined) params[param] = options[option];
  }
  return params;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('sprite-extract')
    .description('Remove the background of a sprite sheet, split it into sprites and export them in several sizes.')
    .version('1.0.0')
    .argument('[input]', 'Input image (single-file mode)')
    .option('-b, --batch <dir>', 'Process every image below a directory')
    .option('-o, --output <dir>', 'Output directory (default: output_processed, or output_batch with --batch)')
    .option('--mode <mode>', 'Extraction mode: auto or grid')
    .option('--alpha-threshold <n>', 'Alpha cutoff for the foreground mask (1-254)')
    .option('--distance <px>', 'Merge regions closer than this many pixels')
    .option('--size-ratio <ratio>', 'Keep regions at least this fraction of the largest one')
    .option('--min-area-ratio <ratio>', 'Drop regions smaller than this fraction of the image')
    .option('--max-area-ratio <ratio>', 'Drop regions larger than this fraction of the image')
    .option('--gap-metric <metric>', 'Region gap measure: edge or centroid')
    .option('--connectivity <n>', 'Pixel connectivity: 4 or 8')
    .option('--crop-padding <px>', 'Extra pixels kept around each detected sprite')
    .option('--auto-detect', 'Grid mode: find separator lines instead of using rows/cols')
    .option('--rows <n>', 'Grid mode: number of rows')
    .option('--cols <n>', 'Grid mode: number of columns')
    .option('--padding <px>', 'Grid mode: pixels trimmed from every cell edge')
    .option('--line-threshold <n>', 'Grid mode: max colour difference along a separator line')
    .option('--min-line-length-ratio <ratio>', 'Grid mode: min separator length as a fraction of the image')
    .option('--output-sizes <json>', 'Output sizes as JSON, e.g. {"large":[256,256]}')
    .option('-v, --verbose', 'Log pipeline state transitions')
    .action(async (input: string | undefined, rawOptions: Record<string, unknown>) => {
      const options = cliOptionsSchema.parse(rawOptions);

      if (options.batch && input) {
        program.error('Cannot combine an input file with --batch');
      }
      if (!options.batch && !input) {
        program.help({ error: true });
      }

      const params = parseProcessingParams(paramsFromOptions(rawOptions));
      const config = loadConfig();
      const scratchRoot = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'sprite-extract-'));
      const pipeline = new SpritePipeline(
        createPipelineDependencies(createBackgroundRemover(config), null),
        new WorkspaceService(scratchRoot),
        options.verbose ?? false
      );
      const runner = new LocalRunner(pipeline);

      try {
        if (options.batch) {
          const outputDir = path.resolve(options.output ?? 'output_batch');
          const summary = await runner.runBatch(path.resolve(options.batch), outputDir, params);

          console.log(`\nProcessed ${summary.total} files: ${summary.succeeded} succeeded, ${summary.failed} failed`);
          console.log(`Sprites written: ${summary.spriteCount}`);
          for (const failure of summary.failures) {
            console.log(`  ✗ ${failure.file}: ${failure.error}`);
          }
          console.log(`Output: ${outputDir}`);
          if (summary.failed > 0) process.exitCode = 1;
        } else if (input) {
          const outputDir = path.resolve(options.output ?? 'output_processed');
          const result = await runner.runFile(path.resolve(input), outputDir, params);
          console.log(
            result.spriteCount > 0
              ? `Extracted ${result.spriteCount} sprites in ${result.sizes.length} sizes to ${outputDir}`
              : 'No sprites found'
          );
        }
      } finally {
        await fs.promises.rm(scratchRoot, { recursive: true, force: true });
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
