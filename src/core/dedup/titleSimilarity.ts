/** Lowercase, punctuation removed, whitespace collapsed. */
export const normalizeTitle = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .split(/\s+/)
    .filter((word) => word !== "")
    .join(" ");

type Match = { a: number; b: number; size: number };

// Longest common substring of a[aLo..aHi) and b[bLo..bHi); earliest in `a` wins ties, then earliest in `b`.
const longestMatch = (a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Match => {
  let best: Match = { a: aLo, b: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) continue;
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) best = { a: i - size + 1, b: j - size + 1, size };
    }
    previous = current;
  }
  return best;
};

const matchingCharacters = (a: string, b: string): number => {
  let total = 0;
  const ranges: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let range = ranges.pop(); range; range = ranges.pop()) {
    const [aLo, aHi, bLo, bHi] = range;
    const match = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (match.size === 0) continue;

    total += match.size;
    if (aLo < match.a && bLo < match.b) ranges.push([aLo, match.a, bLo, match.b]);
    if (match.a + match.size < aHi && match.b + match.size < bHi) {
      ranges.push([match.a + match.size, aHi, match.b + match.size, bHi]);
    }
  }
  return total;
};

/**
 * Ratcliff/Obershelp similarity: 2 * matching characters / total characters,
 * in 0..1. Two empty strings are identical.
 */
export const similarityRatio = (a: string, b: string): number => {
  const totalLength = a.length + b.length;
  if (totalLength === 0) return 1;
  return (2 * matchingCharacters(a, b)) / totalLength;
};
