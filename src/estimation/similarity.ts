/**
 * String similarity for approximate fact-key matching
 *
 * Ratcliff/Obershelp "gestalt" matching: find the longest common block,
 * recurse on both sides of it, and score 2·M / (|a| + |b|) where M is the
 * number of matched characters.
 */

interface Block {
  i: number;
  j: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }
  return positions;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]. Ties go to the block
 * starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    lengths = next;
  }

  return best;
}

function matchedCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const { i, j, size } = findLongestMatch(a, positions, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) {
      queue.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      queue.push([i + size, ahi, j + size, bhi]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]. Not symmetric in general: `a` is the
 * candidate, `b` the word being looked up.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchedCharacters(a, b)) / total;
}

export interface CloseMatch {
  key: string;
  similarity: number;
}

/**
 * Best candidate whose similarity to `word` is at least `cutoff`.
 * Highest similarity wins; ties go to the lexicographically greatest key
 * so the result does not depend on candidate order.
 */
export function findClosestMatch(word: string, candidates: readonly string[], cutoff: number): CloseMatch | null {
  let best: CloseMatch | null = null;

  for (const candidate of candidates) {
    const similarity = similarityRatio(candidate, word);
    if (similarity < cutoff) continue;
    if (
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && candidate > best.key)
    ) {
      best = { key: candidate, similarity };
    }
  }

  return best;
}
