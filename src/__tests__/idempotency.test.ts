import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { IdempotencyStore, makeIdempotencyCacheKey } from '../idempotency.js';

function clock(start = 1_700_000_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('makeIdempotencyCacheKey', () => {
  it('joins the token with a sha256 of entity and subject', () => {
    const digest = createHash('sha256').update('5:Stand up mirror').digest('hex');

    expect(makeIdempotencyCacheKey('abc123', 5, 'Stand up mirror')).toBe(`abc123:${digest}`);
  });

  it('differs when the subject differs', () => {
    expect(makeIdempotencyCacheKey('abc123', 5, 'Stand up mirror')).not.toBe(
      makeIdempotencyCacheKey('abc123', 5, 'Hang mirror')
    );
  });

  it('differs when the parent differs', () => {
    expect(makeIdempotencyCacheKey('abc123', 5, 'Paint')).not.toBe(
      makeIdempotencyCacheKey('abc123', 'project-5', 'Paint')
    );
  });
});

describe('IdempotencyStore', () => {
  it('returns null for unknown keys', async () => {
    const store = new IdempotencyStore();

    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('returns a stored value before the TTL elapses', async () => {
    const time = clock();
    const store = new IdempotencyStore({ ttlSeconds: 60, now: time.now });

    await store.store('k', { id: 1, subject: 'Paint' });
    time.advance(59_999);

    await expect(store.get('k')).resolves.toEqual({ id: 1, subject: 'Paint' });
  });

  it('treats an entry as expired once its deadline is reached', async () => {
    const time = clock();
    const store = new IdempotencyStore({ ttlSeconds: 60, now: time.now });

    await store.store('k', { id: 1 });
    time.advance(60_000);

    await expect(store.get('k')).resolves.toBeNull();
  });

  it('purges every expired entry on access', async () => {
    const time = clock();
    const store = new IdempotencyStore({ ttlSeconds: 10, now: time.now });

    await store.store('a', { id: 1 });
    await store.store('b', { id: 2 });
    time.advance(5_000);
    await store.store('c', { id: 3 });
    time.advance(6_000);

    await expect(store.get('c')).resolves.toEqual({ id: 3 });
    expect(store.size).toBe(1);
  });

  it('restarts the TTL when a key is stored again', async () => {
    const time = clock();
    const store = new IdempotencyStore({ ttlSeconds: 10, now: time.now });

    await store.store('k', { id: 1 });
    time.advance(8_000);
    await store.store('k', { id: 2 });
    time.advance(8_000);

    await expect(store.get('k')).resolves.toEqual({ id: 2 });
  });

  it('copies values on the way in and out', async () => {
    const store = new IdempotencyStore();
    const source = { id: 1, tags: ['a'] };

    await store.store('k', source);
    source.tags.push('b');
    const first = await store.get('k');
    if (first) first.subject = 'changed';

    await expect(store.get('k')).resolves.toEqual({ id: 1, tags: ['a'] });
  });

  it('evicts the least recently used entry beyond the bound', async () => {
    const store = new IdempotencyStore({ maxEntries: 2 });

    await store.store('a', { id: 1 });
    await store.store('b', { id: 2 });
    await store.get('a');
    await store.store('c', { id: 3 });

    await expect(store.get('a')).resolves.toEqual({ id: 1 });
    await expect(store.get('b')).resolves.toBeNull();
    await expect(store.get('c')).resolves.toEqual({ id: 3 });
  });

  it('serializes concurrent access', async () => {
    const store = new IdempotencyStore();

    await Promise.all(
      Array.from({ length: 20 }, (_, index) => store.store(`k${index}`, { id: index }))
    );
    const values = await Promise.all(Array.from({ length: 20 }, (_, index) => store.get(`k${index}`)));

    expect(values.map((value) => value?.id)).toEqual(Array.from({ length: 20 }, (_, index) => index));
  });
});
