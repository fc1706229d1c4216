import { KeyedMutex } from '../../src';

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('should run tasks for one key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const task = (label: string) => async () => {
      order.push(`${label}:start`);
      await tick();
      order.push(`${label}:end`);
      return label;
    };

    const results = await Promise.all([
      mutex.runExclusive('ref', task('first')),
      mutex.runExclusive('ref', task('second')),
    ]);

    expect(results).toEqual(['first', 'second']);
    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should run tasks for different keys independently', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const task = (label: string) => async () => {
      order.push(`${label}:start`);
      await tick();
      order.push(`${label}:end`);
    };

    await Promise.all([mutex.runExclusive('a', task('a')), mutex.runExclusive('b', task('b'))]);

    expect(order.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('should release the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('ref', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('ref', async () => 'next')).resolves.toBe('next');

    expect(mutex.size).toBe(0);
  });
});
