import { KeyedMutex } from '../src/core/keyedMutex';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('runs work for one key strictly in arrival order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string) =>
      mutex.runExclusive('u1', async () => {
        log.push(`${name}:start`);
        await tick();
        log.push(`${name}:end`);
        return name;
      });
    const results = await Promise.all([task('a'), task('b'), task('c')]);
    expect(results).toEqual(['a', 'b', 'c']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked('u1')).toBe(false);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow = mutex.runExclusive('u1', async () => {
      await gate;
      log.push('u1');
    });
    await mutex.runExclusive('u2', async () => {
      log.push('u2');
    });
    release();
    await slow;
    expect(log).toEqual(['u2', 'u1']);
  });

  it('releases the lock when the work throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('u1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('u1', async () => 'next')).resolves.toBe('next');
  });
});
