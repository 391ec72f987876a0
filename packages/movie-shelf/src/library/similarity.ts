/**
 * Title similarity for the search fallback.
 * Pure functions, no side effects.
 */

/** Length of the longest common subsequence */
export function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/**
 * Normalised indel similarity (0..1): 1 - insertions+deletions / combined length.
 * "incepton" vs "inception" needs one insertion, so 1 - 1/17.
 */
export function indelSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * lcsLength(a, b)) / total;
}

/** Best score of the query against the whole title or any single word of it */
export function titleScore(query: string, title: string): number {
  const q = query.toLowerCase();
  const t = title.toLowerCase();
  let best = indelSimilarity(q, t);
  for (const word of t.split(/\s+/).filter(Boolean)) {
    best = Math.max(best, indelSimilarity(q, word));
  }
  return best;
}
