import { logger } from './logger';

const log = logger.child({ component: 'KeyedLock' });

/**
 * Serialises async work per key inside this process. Work for different keys
 * runs concurrently; work for the same key runs in arrival order.
 *
 * Only covers a single process. Cross-process ordering comes from the row
 * locks taken inside the store transaction.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    log.debug('Lock acquired', { key });

    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
      log.debug('Lock released', { key });
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
