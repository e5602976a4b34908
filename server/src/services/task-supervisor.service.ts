/**
 * Task Supervisor Service
 * Owns the task lifecycle: submission, queueing, execution, retry and retention
 */
import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { v4 as uuidv4 } from 'uuid';
import {
  classifyError,
  ConfigError,
  errorMessage,
  NoSpritesFoundError
} from '../errors/sprite-errors';
import { parseProcessingParams, ProcessingParams } from '../models/processing-params';
import {
  TaskProgressEvent,
  TaskRecord,
  TaskSource,
  TaskState,
  TaskStatusView,
  TERMINAL_STATES
} from '../models/task.types';
import { SpritePipeline } from '../pipeline/sprite-pipeline';
import { DEFAULT_MODEL } from './image-generator.service';
import { TaskQueue } from './task-queue.service';
import { TaskPatch, TaskStore } from './task-store.service';
import { WorkerPoolService } from './worker-pool.service';

export type TaskEventName = 'task:progress' | 'task:complete' | 'task:error';

/**
 * Push channel for clients that asked for live updates (Socket.IO in the server)
 */
export type TaskEventSink = (socketId: string, event: TaskEventName, payload: TaskProgressEvent | TaskStatusView) => void;

export interface TaskSupervisorOptions {
  uploadDir: string;
  resultDir: string;
  concurrency: number;
  retentionMs: number;
  /** Automatic retries granted to a task for transient failures */
  maxRetries?: number;
  onEvent?: TaskEventSink;
}

export interface SubmitOptions {
  socketId?: string | null;
}

export interface SubmitPromptOptions extends SubmitOptions {
  referenceImage?: Buffer;
}

export type TaskResultLookup =
  | { status: 'not_found' }
  | { status: 'not_ready'; state: TaskState }
  | { status: 'missing' }
  | { status: 'ready'; path: string };

const MIN_SWEEP_INTERVAL_MS = 1000;

export class TaskSupervisor {
  private readonly store = new TaskStore();
  private readonly queue = new TaskQueue();
  private readonly pool: WorkerPoolService;
  private readonly maxRetries: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly pipeline: SpritePipeline,
    private readonly options: TaskSupervisorOptions
  ) {
    this.maxRetries = options.maxRetries ?? 1;
    this.pool = new WorkerPoolService(this.queue, (taskId) => this.executeTask(taskId), options.concurrency);
  }

  async start(): Promise<void> {
    await fs.promises.mkdir(this.options.uploadDir, { recursive: true });
    await fs.promises.mkdir(this.options.resultDir, { recursive: true });
    this.pool.start();

    const interval = Math.max(MIN_SWEEP_INTERVAL_MS, Math.floor(this.options.retentionMs / 4));
    this.sweepTimer = setInterval(() => {
      this.sweepExpired().catch((error) => {
        console.error(`[TaskSupervisor] Retention sweep failed: ${errorMessage(error)}`);
      });
    }, interval);
    this.sweepTimer.unref();
    console.log(`[TaskSupervisor] Started (retention ${this.options.retentionMs}ms, sweep every ${interval}ms)`);
  }

  /**
   * Stop taking work and wait for in-flight tasks. Queued tasks stay PENDING.
   */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.pool.stop();
  }

  /**
   * Queue extraction of sprites from an uploaded image
   *
   * @throws ConfigError for invalid parameters or an undecodable image
   */
  async submitImage(image: Buffer, rawParams: unknown, options: SubmitOptions = {}): Promise<{ taskId: string }> {
    const params = parseProcessingParams(rawParams);
    await this.assertDecodable(image, 'image');

    const taskId = uuidv4();
    const uploadPath = path.join(this.options.uploadDir, `${taskId}_source`);
    await fs.promises.writeFile(uploadPath, image);

    this.enqueueNew(taskId, { kind: 'upload', path: uploadPath }, params, options.socketId ?? null);
    return { taskId };
  }

  /**
   * Queue generation of a sprite sheet from a prompt, followed by extraction
   *
   * @throws ConfigError for an empty prompt, invalid parameters, an undecodable
   * reference image, or when no generator is configured
   */
  async submitPrompt(
    prompt: string,
    model: string | undefined,
    rawParams: unknown,
    options: SubmitPromptOptions = {}
  ): Promise<{ taskId: string }> {
    if (!this.pipeline.supportsGeneration) {
      throw new ConfigError('Image generation is not configured (set GEMINI_API_KEY)');
    }
    const trimmed = prompt.trim();
    if (!trimmed) {
      throw new ConfigError('Prompt must not be empty', 'prompt');
    }
    const params = parseProcessingParams(rawParams);

    const taskId = uuidv4();
    let referencePath: string | undefined;
    if (options.referenceImage) {
      await this.assertDecodable(options.referenceImage, 'reference image');
      referencePath = path.join(this.options.uploadDir, `${taskId}_reference`);
      await fs.promises.writeFile(referencePath, options.referenceImage);
    }

    this.enqueueNew(
      taskId,
      { kind: 'prompt', prompt: trimmed, model: model || DEFAULT_MODEL, referencePath },
      params,
      options.socketId ?? null
    );
    return { taskId };
  }

  getStatus(taskId: string): TaskStatusView | null {
    const record = this.store.get(taskId);
    return record ? this.toStatusView(record) : null;
  }

  async getResult(taskId: string): Promise<TaskResultLookup> {
    const record = this.store.get(taskId);
    if (!record) return { status: 'not_found' };
    if (record.state !== TaskState.SUCCESS) return { status: 'not_ready', state: record.state };
    if (!record.resultPath) return { status: 'missing' };

    try {
      await fs.promises.access(record.resultPath);
    } catch {
      return { status: 'missing' };
    }
    return { status: 'ready', path: record.resultPath };
  }

  getActiveWorkerCount(): number {
    return this.pool.getActiveWorkerCount();
  }

  /**
   * Drop terminal tasks older than the retention window, with their files
   *
   * @returns number of tasks removed
   */
  async sweepExpired(now = Date.now()): Promise<number> {
    let removed = 0;
    for (const record of this.store.list()) {
      if (!TERMINAL_STATES.has(record.state) || record.completedAt === null) continue;
      if (now - record.completedAt <= this.options.retentionMs) continue;

      await this.removeSourceFiles(record.source);
      if (record.resultPath) {
        await this.removeFile(record.resultPath);
      }
      this.store.delete(record.id);
      removed++;
    }
    if (removed > 0) {
      console.log(`[TaskSupervisor] Retention sweep removed ${removed} tasks`);
    }
    return removed;
  }

  private enqueueNew(taskId: string, source: TaskSource, params: ProcessingParams, socketId: string | null): void {
    const now = Date.now();
    this.store.create({
      id: taskId,
      state: TaskState.PENDING,
      progress: 0,
      source,
      params,
      resultPath: null,
      spriteCount: null,
      sizes: null,
      error: null,
      message: 'Task queued',
      retriesLeft: this.maxRetries,
      attempts: 0,
      socketId,
      createdAt: now,
      updatedAt: now,
      completedAt: null
    });
    this.queue.enqueue(taskId);
    console.log(`[TaskSupervisor] Queued task ${taskId} (${source.kind}, mode ${params.mode})`);
  }

  private async executeTask(taskId: string): Promise<void> {
    const claimed = this.store.get(taskId);
    if (!claimed || claimed.state !== TaskState.PENDING) {
      console.warn(`[TaskSupervisor] Skipping task ${taskId}: no longer pending`);
      return;
    }
    const attempt = claimed.attempts + 1;
    this.store.update(taskId, { attempts: attempt });
    console.log(`[TaskSupervisor] Task ${taskId} started (attempt ${attempt})`);

    try {
      const result = await this.pipeline.execute(
        {
          taskId,
          attempt,
          source: claimed.source,
          params: claimed.params,
          output: { kind: 'archive', resultDir: this.options.resultDir }
        },
        (state, progress, message) => {
          const record = this.store.transition(taskId, state, { progress, message });
          this.notify(record, 'task:progress', {
            taskId,
            state: record.state,
            progress: record.progress,
            message
          });
        }
      );

      await this.finish(taskId, claimed.source, TaskState.SUCCESS, 'task:complete', {
        progress: 100,
        message: `Extracted ${result.spriteCount} sprites`,
        resultPath: result.archivePath,
        spriteCount: result.spriteCount,
        sizes: result.sizes
      });
      console.log(`[TaskSupervisor] Task ${taskId} completed with ${result.spriteCount} sprites`);
    } catch (error) {
      await this.handleFailure(taskId, error);
    }
  }

  private async handleFailure(taskId: string, error: unknown): Promise<void> {
    const failure = classifyError(error);
    const record = this.store.get(taskId);
    if (!record) return;

    if (failure instanceof NoSpritesFoundError) {
      await this.finish(taskId, record.source, TaskState.SUCCESS, 'task:complete', {
        progress: 100,
        message: failure.message,
        resultPath: null,
        spriteCount: 0,
        sizes: []
      });
      console.log(`[TaskSupervisor] Task ${taskId} finished without sprites`);
      return;
    }

    // Retries need an open queue; once shutdown has begun the task fails instead
    if (failure.transient && record.retriesLeft > 0 && !this.queue.isClosed) {
      this.store.transition(taskId, TaskState.PENDING, {
        retriesLeft: record.retriesLeft - 1,
        message: `Retrying after transient error: ${failure.message}`
      });
      console.warn(`[TaskSupervisor] Task ${taskId} hit a transient ${failure.code}, retrying: ${failure.message}`);
      this.queue.enqueue(taskId);
      return;
    }

    await this.finish(taskId, record.source, TaskState.FAILURE, 'task:error', {
      error: failure.message,
      message: `Task failed (${failure.code})`
    });
    console.error(`[TaskSupervisor] Task ${taskId} failed with ${failure.code}: ${failure.message}`);
  }

  /**
   * Commit a terminal state. Inputs are deleted first, so a task that reads
   * as finished never still holds its upload.
   */
  private async finish(
    taskId: string,
    source: TaskSource,
    state: TaskState.SUCCESS | TaskState.FAILURE,
    event: TaskEventName,
    patch: TaskPatch
  ): Promise<void> {
    await this.removeSourceFiles(source);
    const record = this.store.transition(taskId, state, { ...patch, completedAt: Date.now() });
    this.notify(record, event, this.toStatusView(record));
  }

  private notify(record: TaskRecord, event: TaskEventName, payload: TaskProgressEvent | TaskStatusView): void {
    if (!record.socketId || !this.options.onEvent) return;
    try {
      this.options.onEvent(record.socketId, event, payload);
    } catch (error) {
      console.error(`[TaskSupervisor] Failed to emit ${event} for task ${record.id}: ${errorMessage(error)}`);
    }
  }

  private toStatusView(record: TaskRecord): TaskStatusView {
    const view: TaskStatusView = {
      task_id: record.id,
      status: record.state,
      progress: record.progress
    };
    if (record.message) view.message = record.message;
    if (record.spriteCount !== null) view.sprite_count = record.spriteCount;
    if (record.sizes) view.sizes = record.sizes;
    if (record.error) view.error = record.error;
    if (record.state === TaskState.SUCCESS && record.resultPath) {
      view.download_url = `/api/download/${record.id}`;
    }
    return view;
  }

  private async assertDecodable(image: Buffer, label: string): Promise<void> {
    try {
      const metadata = await sharp(image).metadata();
      if (!metadata.width || !metadata.height) {
        throw new Error('missing dimensions');
      }
    } catch (error) {
      throw new ConfigError(`Unsupported or corrupt ${label}: ${errorMessage(error)}`, 'file');
    }
  }

  private async removeSourceFiles(source: TaskSource): Promise<void> {
    if (source.kind === 'upload') {
      await this.removeFile(source.path);
    } else if (source.referencePath) {
      await this.removeFile(source.referencePath);
    }
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await fs.promises.rm(filePath, { force: true });
    } catch (error) {
      console.error(`[TaskSupervisor] Failed to remove ${filePath}: ${errorMessage(error)}`);
    }
  }
}
