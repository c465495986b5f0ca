const MIN_PREFIX_LEN = 8;

/**
 * Shortest prefix length that keeps every id in the set distinct, never
 * below eight characters. Returns a function truncating ids to it.
 */
export function createShortId(ids: readonly string[]): (id: string) => string {
  const sorted = [...new Set(ids)].sort();
  let maxCommon = 0;

  for (let i = 0; i < sorted.length - 1; i++) {
    const a = sorted[i];
    const b = sorted[i + 1];
    let j = 0;
    while (j < a.length && a[j] === b[j]) {
      j++;
    }
    if (j > maxCommon) maxCommon = j;
  }

  const prefixLen = Math.max(MIN_PREFIX_LEN, maxCommon + 1);
  return (id: string) => id.slice(0, prefixLen);
}
