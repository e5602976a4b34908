import { ProcessingParams } from './processing-params';

export enum TaskState {
  PENDING = 'PENDING',
  GENERATING = 'GENERATING',
  PROCESSING = 'PROCESSING',
  PACKAGING = 'PACKAGING',
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE'
}

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set([TaskState.SUCCESS, TaskState.FAILURE]);

/**
 * Where the source image of a task comes from
 */
export type TaskSource =
  | { kind: 'upload'; path: string }
  | { kind: 'prompt'; prompt: string; model: string; referencePath?: string };

export interface TaskRecord {
  id: string;
  state: TaskState;
  progress: number;
  source: TaskSource;
  params: ProcessingParams;
  resultPath: string | null;
  spriteCount: number | null;
  sizes: string[] | null;
  error: string | null;
  message: string | null;
  retriesLeft: number;
  attempts: number;
  /** Socket.IO client to notify, if the submitter asked for push updates */
  socketId: string | null;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
}

/**
 * Public status view returned by the status endpoint
 */
export interface TaskStatusView {
  task_id: string;
  status: TaskState;
  progress: number;
  message?: string;
  sprite_count?: number;
  sizes?: string[];
  error?: string;
  download_url?: string;
}

export interface PipelineResult {
  spriteCount: number;
  sizes: string[];
  /** Null when no sprites survived filtering */
  archivePath: string | null;
}

export interface TaskProgressEvent {
  taskId: string;
  state: TaskState;
  progress: number;
  message: string;
}
