/**
 * Case-insensitive similarity ratio in [0, 1].
 *
 * Ratcliff/Obershelp: twice the number of characters in matching blocks
 * divided by the combined length. The longest common block is taken
 * first, then both remainders are matched recursively.
 */
export function titleSimilarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }
  return (2 * matchingCharacters(left, right)) / total;
}

function matchingCharacters(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const { startA, startB, length } = longestCommonBlock(a, b);
  if (length === 0) {
    return 0;
  }

  return (
    length +
    matchingCharacters(a.slice(0, startA), b.slice(0, startB)) +
    matchingCharacters(a.slice(startA + length), b.slice(startB + length))
  );
}

/**
 * Longest common substring, earliest in `a` on ties
 */
function longestCommonBlock(a: string, b: string): { startA: number; startB: number; length: number } {
  let best = { startA: 0, startB: 0, length: 0 };
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        const run = (previous[j - 1] ?? 0) + 1;
        current[j] = run;
        if (run > best.length) {
          best = { startA: i - run, startB: j - run, length: run };
        }
      }
    }
    previous = current;
  }

  return best;
}
