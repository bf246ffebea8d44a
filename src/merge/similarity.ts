/**
 * Jaro similarity between two strings, in [0, 1]
 *
 * Compared by code point and case-sensitive. Two empty strings are identical (1);
 * an empty string against a non-empty one scores 0.
 */
export function jaroSimilarity(a: string, b: string): number {
  if (a === b) return 1;

  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0 || right.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(left.length, right.length) / 2) - 1);
  const leftMatched = new Array<boolean>(left.length).fill(false);
  const rightMatched = new Array<boolean>(right.length).fill(false);

  let matches = 0;
  for (let i = 0; i < left.length; i++) {
    const from = Math.max(0, i - window);
    const to = Math.min(right.length - 1, i + window);
    for (let j = from; j <= to; j++) {
      if (!rightMatched[j] && left[i] === right[j]) {
        leftMatched[i] = true;
        rightMatched[j] = true;
        matches++;
        break;
      }
    }
  }

  if (matches === 0) return 0;

  // Matched characters that appear in a different order, counted in pairs
  let outOfOrder = 0;
  let j = 0;
  for (let i = 0; i < left.length; i++) {
    if (!leftMatched[i]) continue;
    while (!rightMatched[j]) j++;
    if (left[i] !== right[j]) outOfOrder++;
    j++;
  }
  const transpositions = outOfOrder / 2;

  return (
    (matches / left.length +
      matches / right.length +
      (matches - transpositions) / matches) /
    3
  );
}
