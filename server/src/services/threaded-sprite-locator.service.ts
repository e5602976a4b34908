/**
 * Threaded Sprite Locator
 * Runs sprite location in a worker thread, one thread per call
 */
import { Worker } from 'worker_threads';
import path from 'path';
import { errorMessage, reviveError } from '../errors/sprite-errors';
import { ProcessingParams } from '../models/processing-params';
import { SourceImage } from '../models/sprite.types';
import type { LocateWorkerData, LocateWorkerMessage } from '../workers/locate-sprites.worker';
import { LocatedSprites, SpriteLocator } from './sprite-locator.service';

export class ThreadedSpriteLocator implements SpriteLocator {
  private activeWorkers: Set<Worker> = new Set();

  locate(image: SourceImage, params: ProcessingParams): Promise<LocatedSprites> {
    return new Promise((resolve, reject) => {
      // Compiled builds ship the .js worker; sources (development, tests) load through ts-node
      const extension = path.extname(__filename);
      const workerPath = path.join(__dirname, `../workers/locate-sprites.worker${extension}`);
      const data: LocateWorkerData = { width: image.width, height: image.height, pixels: image.data, params };

      const worker = new Worker(workerPath, {
        workerData: data,
        execArgv: extension === '.ts' ? ['-r', 'ts-node/register/transpile-only'] : []
      });
      this.activeWorkers.add(worker);

      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        this.activeWorkers.delete(worker);
        outcome();
        worker.terminate().catch((error: unknown) => {
          console.error(`[SpriteLocator] Failed to terminate worker: ${errorMessage(error)}`);
        });
      };

      worker.on('message', (message: LocateWorkerMessage) => {
        if (message.type === 'result') {
          settle(() => resolve(message.result));
        } else {
          settle(() => reject(reviveError(message.code, message.message, message.transient, message.field)));
        }
      });

      worker.on('error', (error) => {
        console.error(`[SpriteLocator] Worker error: ${error.message}`);
        settle(() => reject(error));
      });

      worker.on('exit', (code) => {
        settle(() => reject(new Error(`Sprite locator worker stopped with exit code ${code} before answering`)));
      });
    });
  }

  /**
   * Get count of worker threads currently running
   */
  getActiveWorkerCount(): number {
    return this.activeWorkers.size;
  }
}
