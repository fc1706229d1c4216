import { InMemoryKeyValueCache } from '../../src';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('InMemoryKeyValueCache', () => {
  it('should store and delete values', async () => {
    const cache = new InMemoryKeyValueCache<string>();

    await cache.put('key', 'value', 60);
    await expect(cache.get('key')).resolves.toBe('value');

    await cache.delete('key');
    await expect(cache.get('key')).resolves.toBeUndefined();
  });

  it('should expire entries after their TTL', async () => {
    const cache = new InMemoryKeyValueCache<string>();

    await cache.put('key', 'value', 0.1);
    await sleep(200);

    await expect(cache.get('key')).resolves.toBeUndefined();
  });

  it('should cache false results', async () => {
    const cache = new InMemoryKeyValueCache<boolean>();
    const producer = jest.fn().mockResolvedValue(false);

    await cache.getOrCompute('health', 60, producer);
    await expect(cache.getOrCompute('health', 60, producer)).resolves.toBe(false);

    expect(producer).toHaveBeenCalledTimes(1);
  });

  it('should share one producer call between concurrent callers', async () => {
    const cache = new InMemoryKeyValueCache<number>();
    let release: (value: number) => void = () => undefined;
    const producer = jest.fn(
      () =>
        new Promise<number>((resolve) => {
          release = resolve;
        }),
    );

    const pending = Promise.all([
      cache.getOrCompute('answer', 60, producer),
      cache.getOrCompute('answer', 60, producer),
      cache.getOrCompute('answer', 60, producer),
    ]);
    expect(cache.getStats().inflight).toBe(1);

    release(42);

    await expect(pending).resolves.toEqual([42, 42, 42]);
    expect(producer).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ size: 1, inflight: 0, hits: 2, misses: 1 });
  });

  it('should not cache a rejected producer', async () => {
    const cache = new InMemoryKeyValueCache<string>();
    const producer = jest.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce('ok');

    await expect(cache.getOrCompute('key', 60, producer)).rejects.toThrow('boom');
    await expect(cache.getOrCompute('key', 60, producer)).resolves.toBe('ok');

    expect(producer).toHaveBeenCalledTimes(2);
  });

  it('should evict the least recently used entry', async () => {
    const cache = new InMemoryKeyValueCache<string>({ max: 2 });

    await cache.put('a', '1', 60);
    await cache.put('b', '2', 60);
    await cache.get('a');
    await cache.put('c', '3', 60);

    await expect(cache.get('a')).resolves.toBe('1');
    await expect(cache.get('b')).resolves.toBeUndefined();
  });
});
