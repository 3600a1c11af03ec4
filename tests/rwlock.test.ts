import { ReadWriteLock } from '../src/runtime/rwlock';
import { ArtifactCache, contentHash } from '../src/runtime/cache';

describe('ReadWriteLock', () => {
  it('should serve queued writers first, then every queued reader', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];

    const pending = [
      lock.write(() => { order.push('write-1'); }),
      lock.read(() => { order.push('read-a'); }),
      lock.read(() => { order.push('read-b'); }),
      lock.write(() => { order.push('write-2'); }),
    ];

    await Promise.all(pending);
    expect(order).toEqual(['write-1', 'write-2', 'read-a', 'read-b']);
  });

  it('should admit a waiting writer before readers that arrive after it', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];

    const first = lock.read(() => { order.push('read-1'); });
    const writer = lock.write(() => { order.push('write'); });
    const second = lock.read(() => { order.push('read-2'); });

    await Promise.all([first, writer, second]);
    expect(order).toEqual(['read-1', 'write', 'read-2']);
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();
    await expect(lock.write(() => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(lock.read(() => 'still usable')).resolves.toBe('still usable');
    await expect(lock.write(() => 'writable')).resolves.toBe('writable');
  });
});

describe('ArtifactCache', () => {
  it('should hash snippets with sha256', () => {
    expect(contentHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(contentHash('print(1)')).toHaveLength(64);
    expect(contentHash('print(1)')).toBe(contentHash('print(1)'));
    expect(contentHash('print(1)')).not.toBe(contentHash('print(2)'));
  });

  it('should store and clear outputs', () => {
    const cache = new ArtifactCache();
    cache.set('abc', 'out');
    expect(cache.has('abc')).toBe(true);
    expect(cache.get('abc')).toBe('out');
    expect(cache.get('missing')).toBeUndefined();
    expect(cache.keys()).toEqual(['abc']);
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
