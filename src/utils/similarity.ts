/**
 * Longest common block of `a[aLo:aHi]` and `b[bLo:bHi]` as `[i, j, size]`.
 * Among equally long blocks the one ending earliest in `a` wins.
 */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number) {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  // lengths of the runs ending at (i - 1, j), indexed by j
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }

      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    previous = current;
  }

  return [bestI, bestJ, bestSize] as const;
}

/**
 * Total size of the matching blocks found by recursively taking the longest
 * common block and repeating on both sides of it (Ratcliff/Obershelp).
 */
function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) {
      break;
    }

    const [aLo, aHi, bLo, bHi] = next;
    const [i, j, size] = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (size === 0) {
      continue;
    }

    total += size;
    if (aLo < i && bLo < j) {
      queue.push([aLo, i, bLo, j]);
    }

    if (i + size < aHi && j + size < bHi) {
      queue.push([i + size, aHi, j + size, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity in `[0, 1]`: twice the matched characters over the combined length.
 * Two empty strings are identical.
 */
export function similarity(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) {
    return 1;
  }

  return (2 * matchingCharacters(a, b)) / length;
}

/**
 * Best candidate for `word` scoring at least `cutoff`, or `null`.
 * Ties go to the lexicographically greater candidate so the pick is stable regardless of input order.
 */
export function closestMatch(word: string, candidates: Iterable<string>, cutoff = 0.5): string | null {
  if (cutoff < 0 || cutoff > 1) {
    throw new RangeError(`cutoff must be in [0, 1], got ${cutoff}`);
  }

  let best: string | null = null;
  let bestScore = -1;
  for (const candidate of candidates) {
    const score = similarity(candidate, word);
    if (score < cutoff) {
      continue;
    }

    if (score > bestScore || (score === bestScore && best !== null && candidate > best)) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
