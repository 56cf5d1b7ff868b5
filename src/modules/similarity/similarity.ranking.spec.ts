import { cosineSimilarity } from './metrics/similarity-metric';
import { rankResults, scoreCandidates } from './similarity.ranking';

describe('scoreCandidates', () => {
  it('scores candidates in input order', () => {
    const { scored, mismatched } = scoreCandidates(
      [1, 0],
      [
        { id: 'B', vector: [0, 1] },
        { id: 'A', vector: [1, 0] },
      ],
      cosineSimilarity,
    );

    expect(scored).toEqual([
      { id: 'B', score: 0 },
      { id: 'A', score: 1 },
    ]);
    expect(mismatched).toEqual([]);
  });

  it('reports candidates whose dimension differs from the query', () => {
    const { scored, mismatched } = scoreCandidates(
      [1, 0],
      [
        { id: 'two', vector: [1, 0] },
        { id: 'three', vector: [1, 0, 0] },
      ],
      cosineSimilarity,
    );

    expect(scored).toEqual([{ id: 'two', score: 1 }]);
    expect(mismatched).toEqual(['three']);
  });
});

describe('rankResults', () => {
  it('orders similarities descending and breaks ties by id', () => {
    const ranked = rankResults(
      [
        { id: 'C', score: 1 },
        { id: 'B', score: 0 },
        { id: 'A', score: 1 },
      ],
      'desc',
      2,
    );

    expect(ranked).toEqual([
      { id: 'A', score: 1 },
      { id: 'C', score: 1 },
    ]);
  });

  it('orders distances ascending', () => {
    const ranked = rankResults(
      [
        { id: 'far', score: 5 },
        { id: 'near', score: 0.5 },
      ],
      'asc',
      10,
    );

    expect(ranked.map((result) => result.id)).toEqual(['near', 'far']);
  });

  it('puts NaN scores last in either direction', () => {
    const results = [
      { id: 'zero-norm', score: NaN },
      { id: 'low', score: -0.5 },
      { id: 'high', score: 0.9 },
    ];

    expect(rankResults(results, 'desc', 3).map((result) => result.id)).toEqual([
      'high',
      'low',
      'zero-norm',
    ]);
    expect(rankResults(results, 'asc', 3).map((result) => result.id)).toEqual([
      'low',
      'high',
      'zero-norm',
    ]);
  });

  it('returns nothing for topK below 1', () => {
    expect(rankResults([{ id: 'A', score: 1 }], 'desc', 0)).toEqual([]);
  });

  it('does not reorder its input', () => {
    const results = [
      { id: 'B', score: 0 },
      { id: 'A', score: 1 },
    ];
    rankResults(results, 'desc', 2);

    expect(results.map((result) => result.id)).toEqual(['B', 'A']);
  });
});
