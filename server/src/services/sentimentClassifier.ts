import lexicon from '../data/sentimentLexicon.json';
import type { RawReview, Review, ReviewIssue, SentimentLabel } from '../types/search';

/*
 * Review sentiment is a pure function of (rating, text):
 *
 * 1. rating >= 4 is Positive, rating <= 2 is Negative.
 * 2. rating 3 falls back to keyword polarity. Distinct positive and negative
 *    lexicon words are counted on word boundaries in the lower-cased text; a
 *    word directly after a negator ("not", "never", ...) counts for the other
 *    side. More negative words gives Negative, more positive gives Positive,
 *    a tie gives Neutral.
 */

export interface SentimentInput {
  rating: number;
  text: string;
}

export interface Polarity {
  positive: number;
  negative: number;
}

const POSITIVE = new Set(lexicon.positive);
const NEGATIVE = new Set(lexicon.negative);
const NEGATORS = new Set(lexicon.negators);

const ISSUE_ORDER: readonly ReviewIssue[] = ['food', 'service', 'cleanliness', 'price'];

const ISSUE_PATTERNS: ReadonlyArray<[ReviewIssue, RegExp]> = ISSUE_ORDER.map((issue): [ReviewIssue, RegExp] => [
  issue,
  new RegExp(`\\b(${lexicon.issues[issue].map(escapeRegExp).join('|')})\\b`),
]);

export function classify(input: SentimentInput): SentimentLabel {
  if (input.rating >= 4) return 'Positive';
  if (input.rating <= 2) return 'Negative';

  const { positive, negative } = polarity(input.text);
  if (negative > positive) return 'Negative';
  if (positive > negative) return 'Positive';
  return 'Neutral';
}

export function polarity(text: string): Polarity {
  const tokens = text.toLowerCase().match(/[a-z']+/g) ?? [];
  const positive = new Set<string>();
  const negative = new Set<string>();

  tokens.forEach((token, i) => {
    const negated = i > 0 && NEGATORS.has(tokens[i - 1]);
    if (POSITIVE.has(token)) {
      if (negated) negative.add(`not ${token}`);
      else positive.add(token);
    } else if (NEGATIVE.has(token)) {
      if (negated) positive.add(`not ${token}`);
      else negative.add(token);
    }
  });

  return { positive: positive.size, negative: negative.size };
}

/** Issue tags in a fixed order: food, service, cleanliness, price. */
export function detectIssues(text: string): ReviewIssue[] {
  const lower = text.toLowerCase();
  return ISSUE_PATTERNS.filter(([, pattern]) => pattern.test(lower)).map(([issue]) => issue);
}

export function classifyReview(review: RawReview): Review {
  return {
    ...review,
    sentiment: classify(review),
    issues: detectIssues(review.text),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
