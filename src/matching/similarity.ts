/**
 * Token-set similarity
 *
 * Order-insensitive, duplicate-insensitive overlap score in [0, 100].
 * Tokens are whitespace-separated; no other preprocessing happens here,
 * callers pass already normalized text.
 */

/**
 * Length of the longest common subsequence of two strings.
 *
 * Rolling single-row DP, O(|a| * |b|) time, O(|b|) memory.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const row = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      row[j] =
        a[i - 1] === b[j - 1] ? diagonal + 1 : Math.max(above, row[j - 1]);
      diagonal = above;
    }
  }

  return row[b.length];
}

/**
 * Normalized insertion/deletion similarity: 100 * 2 * LCS / (|a| + |b|)
 */
function similarityFromLengths(lcs: number, lengthSum: number): number {
  return lengthSum === 0 ? 100 : (200 * lcs) / lengthSum;
}

function uniqueSortedTokens(text: string): string[] {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  return [...new Set(tokens)].sort();
}

/**
 * Token-set ratio between two texts.
 *
 * Both sides are reduced to sorted unique token sets. The score is the best
 * of three comparisons built from the shared tokens (`sect`) and each side's
 * leftovers (`diffAb`, `diffBa`):
 *
 * - `sect` vs `sect + diffAb`
 * - `sect` vs `sect + diffBa`
 * - `sect + diffAb` vs `sect + diffBa`
 *
 * A subset relation scores 100. Either side without tokens scores 0.
 *
 * @example
 * tokenSetRatio("software engineer", "engineer software")      // 100
 * tokenSetRatio("python developer", "senior python developer") // 100
 * tokenSetRatio("data scientist", "product designer")          // < 60
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = uniqueSortedTokens(a);
  const tokensB = uniqueSortedTokens(b);

  if (tokensA.length === 0 || tokensB.length === 0) {
    return 0;
  }

  const setA = new Set(tokensA);
  const setB = new Set(tokensB);

  const intersection = tokensA.filter((token) => setB.has(token));
  const diffAb = tokensA.filter((token) => !setB.has(token));
  const diffBa = tokensB.filter((token) => !setA.has(token));

  if (intersection.length > 0 && (diffAb.length === 0 || diffBa.length === 0)) {
    return 100;
  }

  const sect = intersection.join(" ");
  const ab = diffAb.join(" ");
  const ba = diffBa.join(" ");

  // "sect ab" and "sect ba" share the "sect " prefix, so only the
  // leftovers need a real LCS computation.
  const separator = sect.length > 0 ? 1 : 0;
  const sectAbLength = sect.length + separator + ab.length;
  const sectBaLength = sect.length + separator + ba.length;

  const combinedLcs = sect.length + separator + longestCommonSubsequence(ab, ba);
  let best = similarityFromLengths(combinedLcs, sectAbLength + sectBaLength);

  if (sect.length > 0) {
    best = Math.max(
      best,
      similarityFromLengths(sect.length, sect.length + sectAbLength),
      similarityFromLengths(sect.length, sect.length + sectBaLength),
    );
  }

  return best;
}
