import { KeyedLock } from '../../src/utils/keyed-lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run tasks on the same key one after another', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let different keys proceed independently', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const slow = lock.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('b', async () => {
      order.push('b');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['b', 'a']);
  });

  it('should pass a rejection to its caller without blocking the next task', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(lock.run('a', async () => 42)).resolves.toBe(42);
    expect(lock.pendingKeys).toBe(0);
  });
});
