import { KeyedLock } from './keyedLock';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs sections for the same key one after another', async () => {
    const lock = new KeyedLock<number>();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run(1, async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 'first';
    });
    const second = lock.run(1, async () => {
      events.push('second:start');
      return 'second';
    });

    await tick();
    expect(events).toEqual(['first:start']);
    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual(['first', 'second']);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.pending).toBe(0);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock<number>();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.run(1, async () => {
      await firstGate;
      events.push('repo-1');
    });
    await lock.run(2, async () => {
      events.push('repo-2');
    });
    expect(events).toEqual(['repo-2']);
    releaseFirst();
    await first;
    expect(events).toEqual(['repo-2', 'repo-1']);
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock<string>();
    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(lock.run('a', async () => 'next')).resolves.toBe('next');
    expect(lock.pending).toBe(0);
  });
});
