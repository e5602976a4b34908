/**
 * Worker thread for sprite location (alpha mask, labelling and merging, or grid line detection)
 * These passes are CPU-bound and would otherwise stall the HTTP and Socket.IO event loop
 */
import { MessagePort, parentPort, workerData } from 'worker_threads';
import { classifyError, ConfigError, SpriteErrorCode } from '../errors/sprite-errors';
import { ProcessingParams } from '../models/processing-params';
import { LocatedSprites, SpriteLocatorService } from '../services/sprite-locator.service';

export interface LocateWorkerData {
  width: number;
  height: number;
  /** RGBA pixels; typed arrays cross the thread boundary as plain Uint8Array */
  pixels: Uint8Array;
  params: ProcessingParams;
}

export interface LocateWorkerResult {
  type: 'result';
  result: LocatedSprites;
}

export interface LocateWorkerError {
  type: 'error';
  code: SpriteErrorCode;
  message: string;
  transient: boolean;
  field?: string;
}

export type LocateWorkerMessage = LocateWorkerResult | LocateWorkerError;

function run(port: MessagePort, data: LocateWorkerData): void {
  let message: LocateWorkerMessage;
  try {
    const image = {
      width: data.width,
      height: data.height,
      data: Buffer.from(data.pixels.buffer, data.pixels.byteOffset, data.pixels.byteLength)
    };
    message = { type: 'result', result: new SpriteLocatorService().locateSync(image, data.params) };
  } catch (error) {
    const failure = classifyError(error);
    message = {
      type: 'error',
      code: failure.code,
      message: failure.message,
      transient: failure.transient,
      field: failure instanceof ConfigError ? failure.field : undefined
    };
  }
  port.postMessage(message);
}

if (parentPort) {
  run(parentPort, workerData);
}
