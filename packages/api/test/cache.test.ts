import { describe, expect, it } from 'vitest';
import type { CachedAnswer } from '@knowledge-assistant/shared';
import { AnswerCache, cacheKey, checkAdmission } from '../src/services/cache';
import type { KeyValueStore } from '../src/utils/redis';
import { FakeClock, MemoryKeyValueStore } from './helpers';

const goodAnswer: CachedAnswer = {
  answer: 'Employees receive 20 vacation days per year.',
  sources: [{ documentName: 'Handbook', relevantExcerpt: '20 vacation days' }],
  confidence: 0.95,
  insufficientContext: false,
};

describe('cacheKey', () => {
  it('hashes tenant, question and sorted ids', () => {
    expect(cacheKey('t', 'q', ['b', 'a'])).toBe(
      'cache:llm:fddbafc410cf94987673dc79789e8e0dfd2d8f6b2ea815b7be93a690ed945d67'
    );
  });

  it('does not depend on id order', () => {
    expect(cacheKey('acme', 'How many days?', ['d2', 'd1', 'd3'])).toBe(
      cacheKey('acme', 'How many days?', ['d3', 'd2', 'd1'])
    );
  });

  it('does not mutate the ids it is given', () => {
    const ids = ['b', 'a'];
    cacheKey('t', 'q', ids);
    expect(ids).toEqual(['b', 'a']);
  });

  it('differs per tenant', () => {
    expect(cacheKey('acme', 'q', ['d1'])).not.toBe(cacheKey('globex', 'q', ['d1']));
  });
});

describe('checkAdmission', () => {
  it('admits a confident, general answer', () => {
    expect(checkAdmission('What is the vacation policy?', goodAnswer)).toEqual({ admitted: true });
  });

  it('admits an answer exactly at the confidence floor', () => {
    expect(checkAdmission('What is the vacation policy?', { ...goodAnswer, confidence: 0.7 })).toEqual({
      admitted: true,
    });
  });

  it('rejects low confidence', () => {
    expect(checkAdmission('What is the vacation policy?', { ...goodAnswer, confidence: 0.69 })).toEqual({
      admitted: false,
      reason: 'low_confidence',
    });
  });

  it('rejects insufficient-context answers', () => {
    expect(
      checkAdmission('What is the vacation policy?', { ...goodAnswer, insufficientContext: true })
    ).toEqual({ admitted: false, reason: 'insufficient_context' });
  });

  it('rejects time-sensitive questions', () => {
    expect(checkAdmission('What is the LATEST travel policy?', goodAnswer)).toEqual({
      admitted: false,
      reason: 'time_sensitive',
    });
  });

  it('rejects personal questions', () => {
    expect(checkAdmission('What is my vacation policy?', goodAnswer)).toEqual({
      admitted: false,
      reason: 'personal',
    });
  });
});

describe('AnswerCache', () => {
  it('stores an admitted answer and expires it after the TTL', async () => {
    const clock = new FakeClock();
    const cache = new AnswerCache({ store: new MemoryKeyValueStore(clock.now), defaultTtlSeconds: 3600 });
    const question = 'What is the vacation policy?';

    const stored = await cache.put('acme', question, ['d1'], goodAnswer);
    const key = cache.key('acme', question, ['d1']);

    expect(stored).toBe(true);
    clock.advance(3_599_000);
    expect(await cache.get(key)).toEqual(goodAnswer);
    clock.advance(2_000);
    expect(await cache.get(key)).toBeNull();
  });

  it('finds an answer stored under a different id order', async () => {
    const cache = new AnswerCache({ store: new MemoryKeyValueStore() });

    await cache.put('acme', 'What is the vacation policy?', ['d2', 'd1'], goodAnswer);

    expect(await cache.get(cache.key('acme', 'What is the vacation policy?', ['d1', 'd2']))).toEqual(goodAnswer);
  });

  it('skips answers the policy rejects', async () => {
    const store = new MemoryKeyValueStore();
    const cache = new AnswerCache({ store });

    expect(await cache.put('acme', 'What is my vacation policy?', ['d1'], { ...goodAnswer, confidence: 0.9 })).toBe(false);
    expect(await cache.put('acme', 'What is the vacation policy?', ['d1'], { ...goodAnswer, confidence: 0.69 })).toBe(false);
    expect(store.entries.size).toBe(0);
  });

  it('uses an explicit TTL over the default', async () => {
    const store = new MemoryKeyValueStore(() => 0);
    const cache = new AnswerCache({ store, defaultTtlSeconds: 3600 });

    await cache.put('acme', 'What is the vacation policy?', ['d1'], goodAnswer, 60);

    expect(store.ttlOf(cache.key('acme', 'What is the vacation policy?', ['d1']))).toBe(60);
  });

  it('treats unreadable entries as a miss', async () => {
    const store = new MemoryKeyValueStore();
    const cache = new AnswerCache({ store });
    await store.setWithExpiry('cache:llm:broken', '{not json', 60);
    await store.setWithExpiry('cache:llm:wrong', JSON.stringify({ answer: 1 }), 60);

    expect(await cache.get('cache:llm:broken')).toBeNull();
    expect(await cache.get('cache:llm:wrong')).toBeNull();
  });

  it('treats a store read failure as a miss', async () => {
    const failing: KeyValueStore = {
      get: () => Promise.reject(new Error('connection refused')),
      setWithExpiry: () => Promise.resolve(),
      incrementWithExpiry: () => Promise.resolve(1),
    };
    const cache = new AnswerCache({ store: failing });

    expect(await cache.get('cache:llm:any')).toBeNull();
  });
});
