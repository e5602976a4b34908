/**
 * Worker Pool Service
 * Runs a fixed number of in-process workers that pull task ids from a shared queue
 */
import { errorMessage } from '../errors/sprite-errors';
import { TaskQueue } from './task-queue.service';

export type TaskHandler = (taskId: string) => Promise<void>;

export class WorkerPoolService {
  private activeWorkers: Map<number, string> = new Map();
  private loops: Promise<void>[] = [];
  private running = false;

  constructor(
    private readonly queue: TaskQueue,
    private readonly handler: TaskHandler,
    private readonly concurrency: number
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Worker concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /**
   * Start the worker loops. Calling start twice is a no-op.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`[WorkerPool] Starting ${this.concurrency} workers`);
    for (let workerId = 0; workerId < this.concurrency; workerId++) {
      this.loops.push(this.runWorker(workerId));
    }
  }

  /**
   * Stop pulling new tasks and wait for in-flight tasks to finish
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    console.log(`[WorkerPool] Stopping, waiting for ${this.activeWorkers.size} in-flight tasks`);
    this.queue.close();
    await Promise.all(this.loops);
    this.loops = [];
    this.running = false;
    console.log('[WorkerPool] All workers stopped');
  }

  /**
   * Get count of workers currently executing a task
   */
  getActiveWorkerCount(): number {
    return this.activeWorkers.size;
  }

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      const taskId = await this.queue.dequeue();
      if (taskId === null) return;

      this.activeWorkers.set(workerId, taskId);
      try {
        await this.handler(taskId);
      } catch (error) {
        // The handler records task failures itself; anything reaching here is a bug in it
        console.error(`[WorkerPool] Worker ${workerId} failed on task ${taskId}: ${errorMessage(error)}`);
      } finally {
        this.activeWorkers.delete(workerId);
      }
    }
  }
}
