/**
 * Ratcliff/Obershelp "matching blocks" similarity.
 *
 * The longest common substring of the two strings is found first (earliest
 * position in `a`, then in `b`, on ties) and the search recurses into the
 * unmatched text on either side of it. The ratio is `2 * M / (|a| + |b|)`,
 * where `M` is the total length of all matched blocks, so the score lies in
 * [0, 1] and two empty strings score 1.
 */

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j);
    const list = positions.get(ch);
    if (list) list.push(j);
    else positions.set(ch, [j]);
  }
  return positions;
}

function longestMatch(
  a: string,
  bPositions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  // run length of the match ending at (i - 1, j), keyed by j
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of bPositions.get(a.charAt(i)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) best = { i: i - size + 1, j: j - size + 1, size };
    }
    runs = next;
  }

  return best;
}

function matchedLength(a: string, b: string): number {
  const bPositions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, bPositions, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }

  return total;
}

function directedRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchedLength(a, b)) / length;
}

/**
 * Symmetric similarity ratio. Tie-breaking between equally long blocks can
 * make the directed ratio differ when the arguments are swapped, so both
 * directions are scored and the higher one wins.
 */
export function similarityRatio(a: string, b: string): number {
  if (a === b) return 1;
  return Math.max(directedRatio(a, b), directedRatio(b, a));
}

/** Upper bound on `similarityRatio` from the lengths alone. */
export function lengthBound(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * Math.min(a.length, b.length)) / length;
}

export interface CloseMatch {
  key: string;
  score: number;
}

/**
 * Best `limit` keys scoring at least `cutoff` against `word`, highest score
 * first. Equal scores keep the iteration order of `keys`.
 */
export function closeMatches(
  word: string,
  keys: Iterable<string>,
  limit: number,
  cutoff: number,
): CloseMatch[] {
  if (limit <= 0) return [];

  const scored: CloseMatch[] = [];
  for (const key of keys) {
    if (lengthBound(word, key) < cutoff) continue;
    const score = similarityRatio(word, key);
    if (score >= cutoff) scored.push({ key, score });
  }

  return scored.sort((x, y) => y.score - x.score).slice(0, limit);
}
