/**
 * Diff buffer helpers.
 *
 * A diff is an Int32Array holding the indices that changed during the
 * most recent tick, in ascending order, with every slot after the last
 * entry set to DIFF_SENTINEL. When every cell changed the buffer is full
 * and carries no sentinel.
 */

export const DIFF_SENTINEL = -1;

/**
 * Number of entries before the sentinel (or the buffer length).
 */
export const diffLength = (diff: Int32Array): number => {
  for (let i = 0; i < diff.length; i++) {
    if (diff[i] === DIFF_SENTINEL) return i;
  }
  return diff.length;
};

/**
 * Copy the live entries of a sentinel-terminated diff into a plain array.
 */
export const readDiff = (diff: Int32Array): number[] =>
  Array.from(diff.subarray(0, diffLength(diff)));

/**
 * Iterate changed indices without allocating.
 */
export const forEachChanged = (
  diff: Int32Array,
  callback: (index: number) => void
): void => {
  for (let i = 0; i < diff.length; i++) {
    const index = diff[i];
    if (index === DIFF_SENTINEL) return;
    callback(index);
  }
};

/**
 * Flip every cell named by `diff` in `cells`. Applied to the generation a
 * tick started from, this reproduces the generation it produced.
 */
export const applyDiff = (cells: Uint8Array, diff: Int32Array): void => {
  forEachChanged(diff, (index) => {
    cells[index] ^= 1;
  });
};

/**
 * Mark the diff as empty: every slot becomes the sentinel.
 */
export const resetDiff = (diff: Int32Array): void => {
  diff.fill(DIFF_SENTINEL);
};
