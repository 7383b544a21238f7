import { KeyedLock } from '../../src/utils/keyed-lock';

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs work for the same key in arrival order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.withLock('listing:1', async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = lock.withLock('listing:1', async () => {
      events.push('second:start');
      return 2;
    });

    await tick();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.withLock('listing:1', () => firstGate);
    await expect(lock.withLock('listing:2', async () => 'other')).resolves.toBe('other');

    releaseFirst();
    await first;
  });

  it('releases the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.withLock('listing:1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.withLock('listing:1', async () => 'next')).resolves.toBe('next');
    expect(lock.pendingKeys).toBe(0);
  });
});
