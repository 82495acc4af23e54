import { KeyedMutex } from '@parley/service';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  test('runs calls for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.withLock('k', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.withLock('k', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  test('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const held = mutex.withLock('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await mutex.withLock('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await held;
    expect(order).toEqual(['b', 'a']);
  });

  test('releases the key after a rejection', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.withLock('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('k')).toBe(false);
    await expect(mutex.withLock('k', async () => 7)).resolves.toBe(7);
  });

  test('isLocked reports running and queued work', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.withLock('k', () => gate.promise);

    expect(mutex.isLocked('k')).toBe(true);
    gate.resolve();
    await held;
    expect(mutex.isLocked('k')).toBe(false);
  });
});
