/**
 * Deduplication Module
 *
 * Fuzzy near-duplicate detection for quotes
 */

export { normalizeText } from './textNormalizer';

export {
  calculateSimilarity,
  POSITIONAL_LENGTH_TOLERANCE,
  MIN_SIGNIFICANT_WORD_LENGTH,
} from './similarity';

export {
  classifyQuotePair,
  MATCH_THRESHOLDS,
  type MatchRule,
  type QuotePairVerdict,
} from './quoteMatcher';

export {
  QuoteDuplicateScanner,
  buildDuplicateReport,
  MAX_REPORTED_DUPLICATES,
  type DuplicateMatch,
  type DuplicateReport,
} from './duplicateScanner';
