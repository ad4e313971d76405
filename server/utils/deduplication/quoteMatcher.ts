/**
 * Duplicate decision for a pair of (quote, author) submissions.
 *
 * Rules are checked in order and the first one that fires wins:
 * 1. exact_match                  quote and author equal after normalization
 * 2. similar_quote_same_author_Q  quote similarity >= 0.90, authors equal
 * 3. same_quote_similar_author_A  quotes equal, author similarity >= 0.85
 * 4. both_similar_qQ_aA           quote similarity >= 0.95, author similarity >= 0.90
 *
 * Q and A are the scores with two decimals.
 */

import { normalizeText } from './textNormalizer';
import { calculateSimilarity } from './similarity';

export const MATCH_THRESHOLDS = {
  similarQuoteSameAuthor: 0.9,
  sameQuoteSimilarAuthor: 0.85,
  bothSimilarQuote: 0.95,
  bothSimilarAuthor: 0.9,
} as const;

export type MatchRule =
  | 'exact_match'
  | 'similar_quote_same_author'
  | 'same_quote_similar_author'
  | 'both_similar';

export type QuotePairVerdict =
  | { isMatch: true; rule: MatchRule; reason: string }
  | { isMatch: false; rule: null; reason: null };

const NO_MATCH: QuotePairVerdict = { isMatch: false, rule: null, reason: null };

function formatScore(score: number): string {
  return score.toFixed(2);
}

export function classifyQuotePair(
  candidateQuote: string,
  candidateAuthor: string,
  existingQuote: string,
  existingAuthor: string,
): QuotePairVerdict {
  const quoteA = normalizeText(candidateQuote);
  const quoteB = normalizeText(existingQuote);
  const authorA = normalizeText(candidateAuthor);
  const authorB = normalizeText(existingAuthor);

  const sameQuote = quoteA === quoteB;
  const sameAuthor = authorA === authorB;

  if (sameQuote && sameAuthor) {
    return { isMatch: true, rule: 'exact_match', reason: 'exact_match' };
  }

  const quoteSimilarity = calculateSimilarity(quoteA, quoteB);
  if (quoteSimilarity >= MATCH_THRESHOLDS.similarQuoteSameAuthor && sameAuthor) {
    return {
      isMatch: true,
      rule: 'similar_quote_same_author',
      reason: `similar_quote_same_author_${formatScore(quoteSimilarity)}`,
    };
  }

  // Attribution variants such as "M. Twain" vs "Mark Twain"
  const authorSimilarity = calculateSimilarity(authorA, authorB);
  if (sameQuote && authorSimilarity >= MATCH_THRESHOLDS.sameQuoteSimilarAuthor) {
    return {
      isMatch: true,
      rule: 'same_quote_similar_author',
      reason: `same_quote_similar_author_${formatScore(authorSimilarity)}`,
    };
  }

  if (
    quoteSimilarity >= MATCH_THRESHOLDS.bothSimilarQuote &&
    authorSimilarity >= MATCH_THRESHOLDS.bothSimilarAuthor
  ) {
    return {
      isMatch: true,
      rule: 'both_similar',
      reason: `both_similar_q${formatScore(quoteSimilarity)}_a${formatScore(authorSimilarity)}`,
    };
  }

  return NO_MATCH;
}
