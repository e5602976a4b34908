import fs from 'fs';
import path from 'path';
import { errorMessage } from '../errors/sprite-errors';

/**
 * Per-task scratch directories under a shared temp root
 */
export class WorkspaceService {
  constructor(private readonly tempDir: string) {}

  scratchPath(taskId: string, attempt: number): string {
    return path.join(this.tempDir, `${taskId}-${attempt}`);
  }

  /**
   * Run `work` with a fresh scratch directory that is removed afterwards,
   * whether `work` resolves or throws
   */
  async withScratchDir<T>(taskId: string, attempt: number, work: (dir: string) => Promise<T>): Promise<T> {
    const dir = this.scratchPath(taskId, attempt);
    await fs.promises.mkdir(dir, { recursive: true });
    try {
      return await work(dir);
    } finally {
      try {
        await fs.promises.rm(dir, { recursive: true, force: true });
      } catch (error) {
        console.error(`[Workspace] Failed to remove scratch directory ${dir}: ${errorMessage(error)}`);
      }
    }
  }
}
