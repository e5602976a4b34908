/**
 * FIFO of task ids shared by all workers. Every enqueued id is handed to
 * exactly one `dequeue` caller.
 */
export class TaskQueue {
  private readonly items: string[] = [];
  private readonly waiters: Array<(taskId: string | null) => void> = [];
  private closed = false;

  enqueue(taskId: string): void {
    if (this.closed) {
      throw new Error('Task queue is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(taskId);
    } else {
      this.items.push(taskId);
    }
  }

  /**
   * Resolves with the next task id, or null once the queue is closed
   */
  dequeue(): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  /**
   * Stop accepting and delivering work, and release idle consumers.
   * Ids not yet delivered stay queued.
   */
  close(): void {
    this.closed = true;
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      waiter?.(null);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
