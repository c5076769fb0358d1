import PQueue from 'p-queue';

/**
 * Mutual exclusion per key. Tasks for the same key run one at a time in
 * arrival order; tasks for different keys never wait on each other.
 */
export class KeyedLock {
  private queues = new Map<string, PQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    try {
      return await queue.add(task, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  // Keys with queued or running work
  get activeKeys(): number {
    return this.queues.size;
  }
}
