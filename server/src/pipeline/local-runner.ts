import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, NoSpritesFoundError } from '../errors/sprite-errors';
import { ProcessingParams } from '../models/processing-params';
import { PipelineResult, TaskState } from '../models/task.types';
import { SpritePipeline } from './sprite-pipeline';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.webp', '.gif', '.tif', '.tiff', '.bmp']);

export interface BatchFailure {
  file: string;
  error: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  spriteCount: number;
  failures: BatchFailure[];
}

/**
 * Runs the pipeline directly on local files, bypassing the queue.
 * Sprites are written as `<outputDir>/<size>/sprite_NNN.png`.
 */
export class LocalRunner {
  constructor(private readonly pipeline: SpritePipeline) {}

  async runFile(inputPath: string, outputDir: string, params: ProcessingParams): Promise<PipelineResult> {
    const taskId = `local-${uuidv4()}`;
    try {
      return await this.pipeline.execute(
        {
          taskId,
          attempt: 1,
          source: { kind: 'upload', path: inputPath },
          params,
          output: { kind: 'directory', outputDir }
        },
        (state, progress, message) => {
          if (progress > 0 && state !== TaskState.PENDING) {
            console.log(`[LocalRunner] ${path.basename(inputPath)}: ${message} (${progress}%)`);
          }
        }
      );
    } catch (error) {
      if (error instanceof NoSpritesFoundError) {
        return { spriteCount: 0, sizes: [], archivePath: null };
      }
      throw error;
    }
  }

  /**
   * Process every image under `inputDir`, mirroring its tree below `outputDir`.
   * A failing file is recorded and the batch moves on.
   */
  async runBatch(inputDir: string, outputDir: string, params: ProcessingParams): Promise<BatchSummary> {
    const files = await collectImages(inputDir);
    const summary: BatchSummary = { total: files.length, succeeded: 0, failed: 0, spriteCount: 0, failures: [] };

    for (const [position, file] of files.entries()) {
      const relative = path.relative(inputDir, file);
      const target = path.join(outputDir, path.dirname(relative), path.parse(file).name);
      console.log(`[LocalRunner] [${position + 1}/${files.length}] ${relative}`);

      try {
        const result = await this.runFile(file, target, params);
        summary.succeeded++;
        summary.spriteCount += result.spriteCount;
      } catch (error) {
        summary.failed++;
        summary.failures.push({ file: relative, error: errorMessage(error) });
        console.error(`[LocalRunner] Failed on ${relative}: ${errorMessage(error)}`);
      }
    }

    return summary;
  }
}

/**
 * All image files below `dir`, recursively, in sorted order
 */
export async function collectImages(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const found: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await collectImages(fullPath)));
    } else if (entry.isFile() && IMAGE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      found.push(fullPath);
    }
  }
  return found.sort();
}
