import { aggregate, summarize } from './aggregationEngine';
import { place, review, utc } from '../test/fixtures';

describe('aggregate', () => {
  it('gives a place with no reviews a zero row', () => {
    const [row] = aggregate([place('P1', { distanceMiles: 1.2 })], []);

    expect(row).toEqual({
      placeId: 'P1',
      name: 'Place P1',
      address: 'P1 address',
      lat: 33.0198,
      lng: -96.6989,
      distanceMiles: 1.2,
      reviewCount: 0,
      meanRating: null,
      ratingDistribution: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 },
      sentimentCounts: { positive: 0, neutral: 0, negative: 0 },
      negativeShare: null,
      monthlyCounts: {},
      highNegative: false,
      detailsAvailable: true,
    });
  });

  it('computes counts, mean and negative share', () => {
    const reviews = [
      review('P1', { rating: 5, sentiment: 'Positive' }),
      review('P1', { rating: 4, sentiment: 'Positive' }),
      review('P1', { rating: 1, sentiment: 'Negative' }),
      review('P1', { rating: 2, sentiment: 'Negative' }),
    ];

    const [row] = aggregate([place('P1')], reviews);

    expect(row.reviewCount).toBe(4);
    expect(row.meanRating).toBe(3);
    expect(row.ratingDistribution).toEqual({ 1: 1, 2: 1, 3: 0, 4: 1, 5: 1 });
    expect(row.sentimentCounts).toEqual({ positive: 2, neutral: 0, negative: 2 });
    expect(row.negativeShare).toBe(0.5);
    expect(row.highNegative).toBe(true);
  });

  it('keeps sentiment counts summing to the review count', () => {
    const reviews = [
      review('A', { rating: 3, sentiment: 'Neutral' }),
      review('A', { rating: 5, sentiment: 'Positive' }),
      review('B', { rating: 3, sentiment: 'Negative' }),
    ];

    for (const row of aggregate([place('A'), place('B'), place('C')], reviews)) {
      const { positive, neutral, negative } = row.sentimentCounts;
      expect(positive + neutral + negative).toBe(row.reviewCount);
    }
  });

  it('does not flag a place below the review floor', () => {
    const reviews = [review('P1', { rating: 1, sentiment: 'Negative' }), review('P1', { rating: 2, sentiment: 'Negative' })];
    const [row] = aggregate([place('P1')], reviews);

    expect(row.negativeShare).toBe(1);
    expect(row.highNegative).toBe(false);
  });

  it('flags at exactly the threshold share', () => {
    const reviews = [
      ...Array.from({ length: 7 }, () => review('P1', { rating: 5, sentiment: 'Positive' })),
      ...Array.from({ length: 3 }, () => review('P1', { rating: 1, sentiment: 'Negative' })),
    ];
    const [row] = aggregate([place('P1')], reviews);

    expect(row.negativeShare).toBe(0.3);
    expect(row.highNegative).toBe(true);
  });

  it('honours a configured threshold', () => {
    const reviews = [
      review('P1', { rating: 5, sentiment: 'Positive' }),
      review('P1', { rating: 4, sentiment: 'Positive' }),
      review('P1', { rating: 1, sentiment: 'Negative' }),
      review('P1', { rating: 2, sentiment: 'Negative' }),
    ];
    const [row] = aggregate([place('P1')], reviews, { negativeShareThreshold: 0.6 });

    expect(row.highNegative).toBe(false);
  });

  it('buckets reviews by UTC month and skips undated ones', () => {
    const reviews = [
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: utc(2024, 3, 1) }),
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: utc(2024, 1, 15) }),
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: utc(2024, 1, 31, 23, 59, 59) }),
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: null }),
    ];
    const [row] = aggregate([place('P1')], reviews);

    expect(row.monthlyCounts).toEqual({ '2024-01': 2, '2024-03': 1 });
    expect(Object.keys(row.monthlyCounts)).toEqual(['2024-01', '2024-03']);
  });

  it('leaves a review with an out-of-range time out of the monthly counts', () => {
    const reviews = [
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: 1e13 }),
      review('P1', { rating: 4, sentiment: 'Positive', unixTime: utc(2024, 5, 2) }),
    ];
    const [row] = aggregate([place('P1')], reviews);

    expect(row.reviewCount).toBe(2);
    expect(row.monthlyCounts).toEqual({ '2024-05': 1 });
  });

  it('ignores reviews for places that are not in the list', () => {
    const [row] = aggregate([place('P1')], [review('P2', { rating: 1, sentiment: 'Negative' })]);
    expect(row.reviewCount).toBe(0);
  });

  it('marks places whose details were unavailable', () => {
    const rows = aggregate([place('P1'), place('P2')], [], { detailsUnavailable: new Set(['P2']) });
    expect(rows.map((r) => r.detailsAvailable)).toEqual([true, false]);
  });
});

describe('summarize', () => {
  const places = [
    place('near', { name: 'Near', distanceMiles: 0.5 }),
    place('mid', { name: 'Mid', distanceMiles: 2 }),
    place('far', { name: 'Far', distanceMiles: 4 }),
  ];
  const reviews = [
    review('near', { rating: 5, sentiment: 'Positive', author: 'ann', unixTime: utc(2024, 2, 10) }),
    review('near', { rating: 1, sentiment: 'Negative', author: 'bob', issues: ['food'] }),
    review('mid', { rating: 2, sentiment: 'Negative', author: 'ann', issues: ['food', 'price'] }),
    review('mid', { rating: 1, sentiment: 'Negative', author: null, issues: ['service'] }),
    review('far', { rating: 3, sentiment: 'Neutral', author: 'cat', unixTime: utc(2024, 2, 20) }),
    review('elsewhere', { rating: 1, sentiment: 'Negative', author: 'dan' }),
  ];

  it('totals the rows and their reviews', () => {
    const insights = summarize(aggregate(places, reviews), reviews);

    expect(insights.placeCount).toBe(3);
    expect(insights.reviewCount).toBe(5);
    expect(insights.meanRating).toBe(2.4);
    expect(insights.uniqueAuthors).toBe(3);
    expect(insights.ratingDistribution).toEqual({ 1: 2, 2: 1, 3: 1, 4: 0, 5: 1 });
    expect(insights.sentimentCounts).toEqual({ positive: 1, neutral: 1, negative: 3 });
    expect(insights.monthlyCounts).toEqual({ '2024-02': 2 });
    expect(insights.issueCounts).toEqual({ food: 2, service: 1, cleanliness: 0, price: 1 });
  });

  it('ranks places by negative reviews and by distance', () => {
    const insights = summarize(aggregate(places, reviews), reviews);

    expect(insights.topNegativePlaces).toEqual([
      { placeId: 'mid', name: 'Mid', count: 2 },
      { placeId: 'near', name: 'Near', count: 1 },
    ]);
    expect(insights.nearestPlaces.map((p) => p.placeId)).toEqual(['near', 'mid', 'far']);
  });

  it('reports an empty run', () => {
    const insights = summarize([], []);
    expect(insights.placeCount).toBe(0);
    expect(insights.meanRating).toBeNull();
    expect(insights.topNegativePlaces).toEqual([]);
  });
});
