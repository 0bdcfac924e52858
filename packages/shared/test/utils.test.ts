import { describe, expect, it } from 'vitest';
import { checkLatencyBudget, cosineSimilarity, generateRequestId, sortByScoreDesc } from '../src/utils';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vectors must have same dimensions');
  });
});

describe('sortByScoreDesc', () => {
  it('orders by score and keeps ties in arrival order', () => {
    const items = [
      { id: 'a', score: 0.7 },
      { id: 'b', score: 0.9 },
      { id: 'c', score: 0.7 },
    ];

    expect(sortByScoreDesc(items).map((item) => item.id)).toEqual(['b', 'a', 'c']);
    expect(items.map((item) => item.id)).toEqual(['a', 'b', 'c']);
  });
});

describe('checkLatencyBudget', () => {
  it('flags only latencies over the budget', () => {
    expect(checkLatencyBudget(200, 200, 'retrieval')).toEqual({ exceeded: false });
    expect(checkLatencyBudget(250, 200, 'retrieval')).toEqual({
      exceeded: true,
      violation: 'retrieval: 250ms exceeded budget of 200ms',
    });
  });
});

describe('generateRequestId', () => {
  it('produces prefixed ids', () => {
    expect(generateRequestId()).toMatch(/^req_\d+_[0-9a-z]+$/);
  });
});
