/**
 * String similarity for normalized quote and author text.
 *
 * Two strategies, picked by length difference:
 * - lengths within 3 characters: positional character agreement
 * - otherwise: Dice-style overlap of words longer than 2 characters
 *
 * The positional strategy does not align the strings, so one character
 * inserted near the start shifts everything after it and the score collapses.
 */

export const POSITIONAL_LENGTH_TOLERANCE = 3;
export const MIN_SIGNIFICANT_WORD_LENGTH = 3;

function positionalSimilarity(a: string[], b: string[]): number {
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 0;

  let matches = 0;
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    if (a[i] === b[i]) matches++;
  }
  return matches / maxLength;
}

function wordOverlapSimilarity(a: string, b: string): number {
  const wordsA = a.split(' ');
  const wordsB = b.split(' ');
  const totalWords = wordsA.length + wordsB.length;
  if (totalWords === 0) return 0;

  // Repeated words in `a` each count once per occurrence
  let commonWords = 0;
  for (const word of wordsA) {
    if (Array.from(word).length >= MIN_SIGNIFICANT_WORD_LENGTH && wordsB.includes(word)) {
      commonWords++;
    }
  }
  return (2 * commonWords) / totalWords;
}

/**
 * Similarity in [0, 1] between two already-normalized strings.
 * Both empty is 1, exactly one empty is 0.
 */
export function calculateSimilarity(a: string, b: string): number {
  if (!a && !b) return 1;
  if (!a || !b) return 0;

  const charsA = Array.from(a);
  const charsB = Array.from(b);

  if (Math.abs(charsA.length - charsB.length) <= POSITIONAL_LENGTH_TOLERANCE) {
    return positionalSimilarity(charsA, charsB);
  }
  return wordOverlapSimilarity(a, b);
}
