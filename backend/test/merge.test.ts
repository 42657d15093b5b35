import { describe, it, expect } from 'vitest';
import { mergeResults } from '../src/search/merge.js';
import { clamp01, compareResults } from '../src/search/rank.js';
import type { SearchResult } from '../src/types.js';

function result(fileId: number, similarity: number | null, modifiedAt = '2024-01-01T00:00:00.000Z'): SearchResult {
  return {
    file_id: fileId,
    file_name: `file-${fileId}.png`,
    file_path: `/projects/file-${fileId}.png`,
    file_type: 'image',
    extension: '.png',
    show: null,
    file_size: 100,
    modified_at: modifiedAt,
    width: 1920,
    height: 1080,
    thumbnail_url: null,
    similarity,
  };
}

const ids = (results: SearchResult[]) => results.map((r) => r.file_id);

describe('clamp01', () => {
  it('keeps values inside [0, 1] and maps NaN to 0', () => {
    expect(clamp01(0.42)).toBe(0.42);
    expect(clamp01(1.0000001)).toBe(1);
    expect(clamp01(-0.3)).toBe(0);
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe('compareResults', () => {
  it('puts scored results before unscored ones', () => {
    const sorted = [result(1, null), result(2, 0.1)].sort(compareResults);
    expect(ids(sorted)).toEqual([2, 1]);
  });

  it('breaks similarity ties by recency, then by lower file id', () => {
    const sorted = [
      result(5, 0.5, '2024-01-01T00:00:00.000Z'),
      result(3, 0.5, '2024-01-01T00:00:00.000Z'),
      result(4, 0.5, '2024-06-01T00:00:00.000Z'),
    ].sort(compareResults);
    expect(ids(sorted)).toEqual([4, 3, 5]);
  });
});

describe('mergeResults', () => {
  it('keeps the highest similarity for a file found by several strategies', () => {
    const merged = mergeResults(
      [
        [result(1, 0.4), result(2, 0.9)],
        [result(1, 0.8), result(3, 0.5)],
      ],
      10
    );
    expect(merged.map((r) => [r.file_id, r.similarity])).toEqual([
      [2, 0.9],
      [1, 0.8],
      [3, 0.5],
    ]);
  });

  it('prefers a scored duplicate over an unscored one', () => {
    const merged = mergeResults([[result(7, null)], [result(7, 0.2)]], 10);
    expect(merged).toHaveLength(1);
    expect(merged[0]?.similarity).toBe(0.2);
  });

  it('applies the limit after merging', () => {
    const merged = mergeResults(
      [
        [result(1, 0.3), result(2, 0.2)],
        [result(3, 0.9), result(4, 0.8)],
      ],
      2
    );
    expect(ids(merged)).toEqual([3, 4]);
  });

  it('returns nothing for empty input or a zero limit', () => {
    expect(mergeResults([], 5)).toEqual([]);
    expect(mergeResults([[result(1, 0.5)]], 0)).toEqual([]);
  });

  it('orders unscored results by recency', () => {
    const merged = mergeResults(
      [[result(1, null, '2023-01-01T00:00:00.000Z'), result(2, null, '2024-01-01T00:00:00.000Z')]],
      10
    );
    expect(ids(merged)).toEqual([2, 1]);
  });
});
