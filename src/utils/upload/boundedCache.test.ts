// src/utils/upload/boundedCache.test.ts
import { BoundedCache } from './boundedCache';

describe('BoundedCache', () => {
    it('evicts exactly the oldest key when the 101st key is inserted', () => {
        const cache = new BoundedCache<number>(100);
        for (let i = 0; i < 100; i++) {
            cache.set(`key-${i}`, i);
        }
        expect(cache.size).toBe(100);

        cache.set('key-100', 100);

        expect(cache.size).toBe(100);
        expect(cache.has('key-0')).toBe(false);
        expect(cache.get('key-1')).toBe(1);
        expect(cache.get('key-100')).toBe(100);
    });

    it('does not refresh an entry on read', () => {
        const cache = new BoundedCache<string>(2);
        cache.set('a', 'A');
        cache.set('b', 'B');
        expect(cache.get('a')).toBe('A');

        cache.set('c', 'C');

        expect(cache.keys()).toEqual(['b', 'c']);
    });

    it('overwrites an existing key without evicting', () => {
        const cache = new BoundedCache<string>(2);
        cache.set('a', 'A');
        cache.set('b', 'B');
        cache.set('a', 'A2');

        expect(cache.keys()).toEqual(['a', 'b']);
        expect(cache.get('a')).toBe('A2');
    });

    it('rejects a non-positive capacity', () => {
        expect(() => new BoundedCache(0)).toThrow(RangeError);
    });
});
