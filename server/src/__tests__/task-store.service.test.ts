import { parseProcessingParams } from '../models/processing-params';
import { TaskRecord, TaskState } from '../models/task.types';
import { TaskStore } from '../services/task-store.service';

const newRecord = (id: string): TaskRecord => ({
  id,
  state: TaskState.PENDING,
  progress: 0,
  source: { kind: 'upload', path: `/tmp/${id}` },
  params: parseProcessingParams({}),
  resultPath: null,
  spriteCount: null,
  sizes: null,
  error: null,
  message: null,
  retriesLeft: 1,
  attempts: 0,
  socketId: null,
  createdAt: 1,
  updatedAt: 1,
  completedAt: null
});

describe('TaskStore', () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore();
    store.create(newRecord('t1'));
  });

  it('should return copies that callers cannot mutate', () => {
    const snapshot = store.get('t1');
    if (!snapshot) throw new Error('missing task');
    snapshot.progress = 99;
    snapshot.params.outputSizes[0].width = 1;

    expect(store.get('t1')?.progress).toBe(0);
    expect(store.get('t1')?.params.outputSizes[0].width).toBe(256);
  });

  it('should return null for unknown ids', () => {
    expect(store.get('nope')).toBeNull();
  });

  it('should refuse duplicate ids', () => {
    expect(() => store.create(newRecord('t1'))).toThrow('already exists');
  });

  it('should never move progress backwards', () => {
    store.transition('t1', TaskState.PROCESSING, { progress: 50 });
    const updated = store.transition('t1', TaskState.PROCESSING, { progress: 0, message: 'again' });

    expect(updated.progress).toBe(50);
    expect(updated.message).toBe('again');
  });

  it('should follow the task lifecycle', () => {
    store.transition('t1', TaskState.GENERATING);
    store.transition('t1', TaskState.PROCESSING);
    store.transition('t1', TaskState.PACKAGING);
    expect(store.transition('t1', TaskState.SUCCESS).state).toBe(TaskState.SUCCESS);
  });

  it('should allow returning to PENDING for a retry', () => {
    store.transition('t1', TaskState.PROCESSING, { progress: 30 });
    const retried = store.transition('t1', TaskState.PENDING, { retriesLeft: 0 });

    expect(retried.state).toBe(TaskState.PENDING);
    expect(retried.progress).toBe(30);
  });

  it('should reject illegal transitions', () => {
    expect(() => store.transition('t1', TaskState.SUCCESS)).toThrow('Illegal task transition PENDING -> SUCCESS');
    store.transition('t1', TaskState.FAILURE);
    expect(() => store.transition('t1', TaskState.PENDING)).toThrow('Illegal task transition');
  });

  it('should delete and list tasks', () => {
    store.create(newRecord('t2'));
    expect(store.list().map(record => record.id)).toEqual(['t1', 't2']);
    expect(store.delete('t1')).toBe(true);
    expect(store.list().map(record => record.id)).toEqual(['t2']);
  });
});
