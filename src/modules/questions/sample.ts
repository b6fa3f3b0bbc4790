/**
 * Draws `count` items uniformly at random without replacement
 * (partial Fisher–Yates over a copy; the input is left untouched).
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: () => number = Math.random
): T[] {
  if (count > items.length) {
    throw new RangeError(`Cannot sample ${count} items from ${items.length}`);
  }
  const out = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (out.length - i));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out.slice(0, count);
}
