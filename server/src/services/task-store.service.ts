import { TaskRecord, TaskState } from '../models/task.types';

const ALLOWED_TRANSITIONS: Record<TaskState, TaskState[]> = {
  [TaskState.PENDING]: [TaskState.GENERATING, TaskState.PROCESSING, TaskState.FAILURE],
  // PENDING again means the task was re-queued for its retry
  [TaskState.GENERATING]: [TaskState.PROCESSING, TaskState.PENDING, TaskState.FAILURE],
  [TaskState.PROCESSING]: [TaskState.PACKAGING, TaskState.PENDING, TaskState.SUCCESS, TaskState.FAILURE],
  [TaskState.PACKAGING]: [TaskState.SUCCESS, TaskState.PENDING, TaskState.FAILURE],
  [TaskState.SUCCESS]: [],
  [TaskState.FAILURE]: []
};

export type TaskPatch = Partial<Omit<TaskRecord, 'id' | 'state' | 'createdAt'>>;

/**
 * In-memory task records. Readers always receive copies, so a status query
 * sees the last committed update and never a half-applied one.
 */
export class TaskStore {
  private readonly tasks = new Map<string, TaskRecord>();

  create(record: TaskRecord): TaskRecord {
    if (this.tasks.has(record.id)) {
      throw new Error(`Task ${record.id} already exists`);
    }
    this.tasks.set(record.id, this.copy(record));
    return this.copy(record);
  }

  get(id: string): TaskRecord | null {
    const record = this.tasks.get(id);
    return record ? this.copy(record) : null;
  }

  list(): TaskRecord[] {
    return Array.from(this.tasks.values(), record => this.copy(record));
  }

  /**
   * Apply a patch without changing state. Progress never moves backwards.
   */
  update(id: string, patch: TaskPatch): TaskRecord {
    const record = this.require(id);
    const next: TaskRecord = {
      ...record,
      ...patch,
      progress: Math.max(record.progress, patch.progress ?? record.progress),
      updatedAt: Date.now()
    };
    this.tasks.set(id, next);
    return this.copy(next);
  }

  /**
   * Move a task to `state`, rejecting transitions the lifecycle does not allow
   */
  transition(id: string, state: TaskState, patch: TaskPatch = {}): TaskRecord {
    const record = this.require(id);
    if (record.state !== state && !ALLOWED_TRANSITIONS[record.state].includes(state)) {
      throw new Error(`Illegal task transition ${record.state} -> ${state} for task ${id}`);
    }
    this.tasks.set(id, { ...record, state });
    return this.update(id, patch);
  }

  delete(id: string): boolean {
    return this.tasks.delete(id);
  }

  private require(id: string): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) {
      throw new Error(`Unknown task ${id}`);
    }
    return record;
  }

  private copy(record: TaskRecord): TaskRecord {
    return {
      ...record,
      source: { ...record.source },
      params: { ...record.params, outputSizes: record.params.outputSizes.map(size => ({ ...size })) },
      sizes: record.sizes ? [...record.sizes] : null
    };
  }
}
