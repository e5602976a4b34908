import { ProcessingParams } from '../models/processing-params';
import { PipelineResult, TaskSource } from '../models/task.types';
import { ArchiveService } from '../services/archive.service';
import { BackgroundRemover } from '../services/background-removal.service';
import { ImageGenerator } from '../services/image-generator.service';
import { ImageService } from '../services/image.service';
import { SpriteExporterService } from '../services/sprite-exporter.service';
import { SpriteLocator, SpriteLocatorService } from '../services/sprite-locator.service';
import { WorkspaceService } from '../services/workspace.service';
import { PipelineDependencies } from './pipeline.types';
import { PackagingTarget, ProgressReporter, SpriteTaskStateMachine } from './sprite-task.state-machine';

export interface PipelineJob {
  taskId: string;
  attempt: number;
  source: TaskSource;
  params: ProcessingParams;
  output: PackagingTarget;
}

export interface PipelineDependencyOptions {
  exportConcurrency?: number;
  /** Defaults to locating sprites on the calling thread */
  spriteLocator?: SpriteLocator;
}

/**
 * Builds default pipeline services around the given collaborators
 */
export function createPipelineDependencies(
  backgroundRemover: BackgroundRemover,
  imageGenerator: ImageGenerator | null,
  options: PipelineDependencyOptions = {}
): PipelineDependencies {
  return {
    imageService: new ImageService(),
    spriteLocator: options.spriteLocator ?? new SpriteLocatorService(),
    spriteExporter: new SpriteExporterService(options.exportConcurrency),
    archiveService: new ArchiveService(),
    backgroundRemover,
    imageGenerator
  };
}

/**
 * Orchestrates a single task run inside its own scratch directory.
 * A fresh state machine is built per run; nothing is shared between runs
 * except the stateless services.
 */
export class SpritePipeline {
  constructor(
    private readonly deps: PipelineDependencies,
    private readonly workspace: WorkspaceService,
    private readonly verbose = false
  ) {}

  get supportsGeneration(): boolean {
    return this.deps.imageGenerator !== null;
  }

  async execute(job: PipelineJob, onProgress: ProgressReporter): Promise<PipelineResult> {
    return this.workspace.withScratchDir(job.taskId, job.attempt, async (scratchDir) => {
      const machine = new SpriteTaskStateMachine({
        verbose: this.verbose,
        taskId: job.taskId,
        source: job.source,
        params: job.params,
        output: job.output,
        scratchDir,
        deps: this.deps,
        onProgress
      });
      await machine.run();
      return machine.getResult();
    });
  }
}
