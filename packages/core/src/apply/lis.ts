/**
 * Longest increasing subsequence over current positions.
 *
 * `positions[i]` is the current index of the node that must end up at index i.
 * The returned indices (into `positions`, ascending) name nodes that can stay
 * where they are; every other node is moved. Negative entries are skipped.
 *
 * @example
 * computeLIS([2, 0, 1, 4, 3]) // [1, 2, 4]
 */
export function computeLIS(positions: readonly number[]): number[] {
  const n = positions.length;
  if (n === 0) return [];

  // tails[len - 1] = index of the smallest tail of an increasing run of length len
  const tails: number[] = [];
  const predecessors = new Array<number>(n).fill(-1);

  for (let i = 0; i < n; i++) {
    const value = positions[i];
    if (value === undefined || value < 0) continue;

    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const tail = tails[mid];
      if (tail !== undefined && (positions[tail] ?? -1) < value) lo = mid + 1;
      else hi = mid;
    }

    if (lo > 0) predecessors[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  const lis = new Array<number>(tails.length);
  let idx = tails[tails.length - 1] ?? -1;
  for (let len = tails.length - 1; len >= 0; len--) {
    lis[len] = idx;
    idx = predecessors[idx] ?? -1;
  }
  return lis;
}
