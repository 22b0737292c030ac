/**
 * Newsbrief — Sequence Similarity
 *
 * Ratio of matching characters between two strings, 2*M / (|a| + |b|),
 * where M is the total length of the matching blocks found by repeatedly
 * taking the longest common contiguous block and recursing on both sides.
 * This is the classic sequence-matcher ratio (not edit distance and not
 * token overlap), so scores agree with other implementations of it.
 *
 * Strings are compared per code point. When `b` has 200 or more elements,
 * elements occurring in more than 1% of it (+1) are treated as "popular":
 * they cannot seed a match but can still extend one.
 */

const AUTOJUNK_MIN_LENGTH = 200;

interface Match {
  i: number;
  j: number;
  size: number;
}

class SequenceMatcher {
  private readonly b2j = new Map<string, number[]>();

  constructor(
    private readonly a: string[],
    private readonly b: string[]
  ) {
    b.forEach((element, j) => {
      const indices = this.b2j.get(element);
      if (indices) indices.push(j);
      else this.b2j.set(element, [j]);
    });

    if (b.length >= AUTOJUNK_MIN_LENGTH) {
      const popularLimit = Math.floor(b.length / 100) + 1;
      for (const [element, indices] of this.b2j) {
        if (indices.length > popularLimit) this.b2j.delete(element);
      }
    }
  }

  /**
   * Longest matching block in a[alo:ahi] x b[blo:bhi]; earliest in `a`,
   * then earliest in `b`, wins ties.
   */
  private findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): Match {
    const { a, b } = this;
    let besti = alo;
    let bestj = blo;
    let bestSize = 0;

    // j2len[j] = length of the match ending at a[i-1], b[j]
    let j2len = new Map<number, number>();
    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>();
      for (const j of this.b2j.get(a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestSize) {
          besti = i - k + 1;
          bestj = j - k + 1;
          bestSize = k;
        }
      }
      j2len = next;
    }

    // Grow across popular elements that were left out of b2j
    while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
      besti--;
      bestj--;
      bestSize++;
    }
    while (besti + bestSize < ahi && bestj + bestSize < bhi && a[besti + bestSize] === b[bestj + bestSize]) {
      bestSize++;
    }

    return { i: besti, j: bestj, size: bestSize };
  }

  matchedLength(): number {
    let total = 0;
    const pending: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];

    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      const [alo, ahi, blo, bhi] = next;

      const { i, j, size } = this.findLongestMatch(alo, ahi, blo, bhi);
      if (size === 0) continue;

      total += size;
      if (alo < i && blo < j) pending.push([alo, i, blo, j]);
      if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
    }

    return total;
  }
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical (1).
 */
export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = left.length + right.length;
  if (length === 0) return 1;

  return (2 * new SequenceMatcher(left, right).matchedLength()) / length;
}

/**
 * Case-insensitive title similarity used for duplicate detection.
 */
export function titleSimilarity(a: string, b: string): number {
  return similarityRatio(a.toLowerCase(), b.toLowerCase());
}
