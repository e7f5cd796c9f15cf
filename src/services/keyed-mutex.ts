import PQueue from 'p-queue';

interface Lane {
  queue: PQueue;
  holders: number;
}

/** Serializes work per key; different keys run independently. */
export class KeyedMutex {
  private lanes = new Map<string, Lane>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lane = this.lanes.get(key);
    if (!lane) {
      lane = { queue: new PQueue({ concurrency: 1 }), holders: 0 };
      this.lanes.set(key, lane);
    }

    lane.holders++;
    try {
      return await lane.queue.add(() => fn(), { throwOnTimeout: true });
    } finally {
      lane.holders--;
      if (lane.holders === 0) this.lanes.delete(key);
    }
  }

  get activeKeys(): number {
    return this.lanes.size;
  }
}
