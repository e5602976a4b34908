import fs from 'fs';
import { errorMessage, GenerationError, NoSpritesFoundError, RemovalError } from '../errors/sprite-errors';
import { ProcessingParams } from '../models/processing-params';
import { OriginalSprite, SourceImage, SpriteAsset } from '../models/sprite.types';
import { PipelineResult, TaskSource, TaskState } from '../models/task.types';
import { AbstractStateMachine, StateMachineOptions } from '../state-machine/abstract-state-machine';
import { ArchiveContents } from '../services/archive.service';
import { SpriteCrop } from '../services/sprite-exporter.service';
import { PipelineDependencies } from './pipeline.types';

export type PackagingTarget =
  | { kind: 'archive'; resultDir: string }
  | { kind: 'directory'; outputDir: string };

export type ProgressReporter = (state: TaskState, progress: number, message: string) => void;

export interface SpriteTaskOptions extends StateMachineOptions {
  taskId: string;
  source: TaskSource;
  params: ProcessingParams;
  output: PackagingTarget;
  scratchDir: string;
  deps: PipelineDependencies;
  onProgress: ProgressReporter;
}

export const PROGRESS = {
  generated: 10,
  backgroundRemoved: 30,
  detected: 50,
  exported: 80,
  packaged: 90,
  done: 100
} as const;

/**
 * One pipeline run for one task: (generate) → load → remove background →
 * detect or partition → export → package
 */
export class SpriteTaskStateMachine extends AbstractStateMachine<TaskState, SpriteTaskOptions> {
  private sourceBuffer: Buffer | null = null;
  private original: SourceImage | null = null;
  private matted: SourceImage | null = null;
  private mattedPng: Buffer | null = null;
  private crops: SpriteCrop[] = [];
  private assets: SpriteAsset[] = [];
  private originals: OriginalSprite[] = [];
  private archivePath: string | null = null;

  constructor(options: SpriteTaskOptions) {
    super(TaskState.PENDING, options);

    if (options.source.kind === 'prompt') {
      this.stateTransitions.push({ state: TaskState.GENERATING, handler: this.generateSource });
    }
    this.stateTransitions.push(
      { state: TaskState.PROCESSING, handler: this.loadSource },
      { state: TaskState.PROCESSING, handler: this.removeBackground },
      { state: TaskState.PROCESSING, handler: this.locateSprites },
      { state: TaskState.PROCESSING, handler: this.exportSprites },
      { state: TaskState.PACKAGING, handler: this.packageSprites }
    );
  }

  protected getCompletionState(): TaskState {
    return TaskState.SUCCESS;
  }

  protected getErrorState(): TaskState {
    return TaskState.FAILURE;
  }

  protected onStateEntered(_previous: TaskState, next: TaskState): void {
    if (next === TaskState.SUCCESS) return;
    this.options.onProgress(next, 0, `Entered ${next}`);
  }

  getResult(): PipelineResult {
    if (this.state !== TaskState.SUCCESS) {
      throw new Error(`Pipeline for task ${this.options.taskId} has not completed (state ${this.state})`);
    }
    return {
      spriteCount: this.crops.length,
      sizes: this.options.params.outputSizes.map(size => size.name),
      archivePath: this.archivePath
    };
  }

  private async generateSource(): Promise<void> {
    const { source, deps, taskId } = this.options;
    if (source.kind !== 'prompt') return;
    if (!deps.imageGenerator) {
      throw new GenerationError('Image generation is not configured (set GEMINI_API_KEY)');
    }

    const referenceImage = source.referencePath
      ? await fs.promises.readFile(source.referencePath)
      : undefined;
    const image = await deps.imageGenerator.generate({
      prompt: source.prompt,
      model: source.model,
      referenceImage
    });

    this.sourceBuffer = image;
    console.log(`[Pipeline] Task ${taskId}: source image generated (${image.length} bytes)`);
    this.options.onProgress(TaskState.GENERATING, PROGRESS.generated, 'Image generated');
  }

  private async loadSource(): Promise<void> {
    const { source, deps } = this.options;
    if (source.kind === 'upload') {
      this.sourceBuffer = await fs.promises.readFile(source.path);
    }
    if (!this.sourceBuffer) {
      throw new Error('No source image available');
    }
    this.original = await deps.imageService.loadImage(this.sourceBuffer);
  }

  private async removeBackground(): Promise<void> {
    const { deps, taskId } = this.options;
    const original = this.requireOriginal();
    if (!this.sourceBuffer) throw new Error('No source image available');

    const mattedBuffer = await deps.backgroundRemover.removeBackground(this.sourceBuffer);

    let matted: SourceImage;
    try {
      matted = await deps.imageService.loadImage(mattedBuffer);
    } catch (error) {
      throw new RemovalError(`Background removal returned an unreadable image: ${errorMessage(error)}`);
    }
    if (matted.width !== original.width || matted.height !== original.height) {
      throw new RemovalError(
        `Background removal changed image size from ${original.width}x${original.height} to ${matted.width}x${matted.height}`
      );
    }

    this.matted = matted;
    // Removers may answer in any format; the archive copy is always PNG
    this.mattedPng = await deps.imageService.encodePng(matted);
    console.log(`[Pipeline] Task ${taskId}: background removed via ${deps.backgroundRemover.name}`);
    this.options.onProgress(TaskState.PROCESSING, PROGRESS.backgroundRemoved, 'Background removed');
  }

  private async locateSprites(): Promise<void> {
    const { params, deps, taskId } = this.options;
    const matted = this.requireMatted();

    // Separator lines are looked for in the untouched image; matting may erase them
    const searched = params.mode === 'grid' ? this.requireOriginal() : matted;
    const located = await deps.spriteLocator.locate(searched, params);
    console.log(`[Pipeline] Task ${taskId}: ${located.summary}`);

    this.crops = located.sprites.map(sprite => ({
      index: sprite.index,
      image: deps.imageService.crop(
        matted,
        params.mode === 'grid'
          ? sprite.bbox
          : deps.imageService.expandBox(sprite.bbox, params.cropPadding, matted.width, matted.height)
      )
    }));

    if (this.crops.length === 0) {
      throw new NoSpritesFoundError();
    }
    this.options.onProgress(TaskState.PROCESSING, PROGRESS.detected, `Found ${this.crops.length} sprites`);
  }

  private async exportSprites(): Promise<void> {
    const { params, deps } = this.options;
    this.assets = await deps.spriteExporter.exportAll(this.crops, params.outputSizes);
    this.originals = await deps.spriteExporter.exportOriginals(this.crops);
    this.options.onProgress(
      TaskState.PROCESSING,
      PROGRESS.exported,
      `Exported ${this.crops.length} sprites in ${params.outputSizes.length} sizes`
    );
  }

  private async packageSprites(): Promise<void> {
    const { output, deps, taskId, scratchDir } = this.options;
    const contents: ArchiveContents = {
      assets: this.assets,
      originals: this.originals,
      backgroundRemoved: this.mattedPng ?? undefined
    };
    if (output.kind === 'archive') {
      this.archivePath = await deps.archiveService.writeArchive(contents, output.resultDir, taskId, scratchDir);
    } else {
      await deps.archiveService.writeDirectory(contents, output.outputDir);
      this.archivePath = null;
    }
    this.options.onProgress(TaskState.PACKAGING, PROGRESS.packaged, 'Sprites packaged');
  }

  private requireOriginal(): SourceImage {
    if (!this.original) throw new Error('Source image has not been loaded');
    return this.original;
  }

  private requireMatted(): SourceImage {
    if (!this.matted) throw new Error('Background has not been removed');
    return this.matted;
  }
}
