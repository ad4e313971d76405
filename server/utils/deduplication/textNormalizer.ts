/**
 * Text normalization for quote comparison.
 *
 * Folds the differences people introduce when re-typing a quote: letter case,
 * stray whitespace, typographic punctuation and trailing periods. The result
 * is only used for comparison and is never stored.
 */

const PUNCTUATION_FOLDS: ReadonlyArray<[RegExp, string]> = [
  [/[“”]/g, '"'], // curly double quotes
  [/[‘’]/g, "'"], // curly single quotes / apostrophes
  [/[—–]/g, '-'], // em and en dashes
  [/…/g, '...'], // ellipsis glyph
];

/**
 * Normalize quote or author text for comparison.
 *
 * Trailing periods are all removed, so "Twain.." and "Twain" compare equal.
 * Quotes that end in an ellipsis lose it too; that loss is accepted.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';

  let normalized = text.trim().toLowerCase().replace(/[\n\t]/g, ' ');
  for (const [pattern, replacement] of PUNCTUATION_FOLDS) {
    normalized = normalized.replace(pattern, replacement);
  }

  // Whitespace is stripped along with the periods so "wilde. ." folds in one pass
  return normalized
    .replace(/[.\s]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}
