import { KeyedMutex } from './keyedMutex';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function gate() {
  let open: () => void = () => undefined;
  const closed = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { closed, open };
}

test('work on the same key runs one at a time in arrival order', async () => {
  const mutex = new KeyedMutex();
  const order: string[] = [];
  const g = gate();

  const first = mutex.runExclusive(['k'], async () => {
    order.push('first:start');
    await g.closed;
    order.push('first:end');
  });
  const second = mutex.runExclusive(['k'], async () => {
    order.push('second');
  });

  await tick();
  expect(order).toEqual(['first:start']);
  g.open();
  await Promise.all([first, second]);
  expect(order).toEqual(['first:start', 'first:end', 'second']);
  expect(mutex.pendingKeys).toBe(0);
});

test('different keys do not wait on each other', async () => {
  const mutex = new KeyedMutex();
  const g = gate();
  const held = mutex.runExclusive(['a'], () => g.closed);

  await expect(mutex.runExclusive(['b'], async () => 'done')).resolves.toBe('done');
  g.open();
  await held;
});

test('a failing section still releases its key', async () => {
  const mutex = new KeyedMutex();
  await expect(mutex.runExclusive(['k'], async () => {
    throw new Error('boom');
  })).rejects.toThrow('boom');
  await expect(mutex.runExclusive(['k'], async () => 1)).resolves.toBe(1);
  expect(mutex.pendingKeys).toBe(0);
});

test('multi-key sections taken in opposite order do not deadlock', async () => {
  const mutex = new KeyedMutex();
  const results = await Promise.all([
    mutex.runExclusive(['a', 'b'], async () => 'ab'),
    mutex.runExclusive(['b', 'a'], async () => 'ba'),
    mutex.runExclusive(['a', 'a'], async () => 'aa'),
  ]);
  expect(results).toEqual(['ab', 'ba', 'aa']);
});
