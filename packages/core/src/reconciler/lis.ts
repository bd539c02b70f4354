/**
 * Longest increasing subsequence of `sequence`, as indices into it.
 * Negative entries mark positions with no previous counterpart and are
 * skipped. O(n log n) with patience sorting and predecessor links.
 */
export function longestIncreasingSubsequence(sequence: readonly number[]): number[] {
  const predecessors = new Array<number>(sequence.length).fill(-1);
  const result: number[] = [];

  for (let i = 0; i < sequence.length; i++) {
    const value = sequence[i];
    if (value < 0) continue;

    const last = result[result.length - 1];
    if (result.length === 0 || sequence[last] < value) {
      predecessors[i] = result.length > 0 ? last : -1;
      result.push(i);
      continue;
    }

    let low = 0;
    let high = result.length - 1;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (sequence[result[mid]] < value) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    if (value < sequence[result[low]]) {
      predecessors[i] = low > 0 ? result[low - 1] : -1;
      result[low] = i;
    }
  }

  let cursor = result.length > 0 ? result[result.length - 1] : -1;
  for (let k = result.length - 1; k >= 0; k--) {
    result[k] = cursor;
    cursor = predecessors[cursor];
  }
  return result;
}
