/** Groups items by a string key, preserving first-seen group order and member order. */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) bucket.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

export function pairKey(time: number, category: number): string {
  return `${time}:${category}`;
}

export function comparePairs(a: [number, number], b: [number, number]): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * Left fold that stacks each member on top of the previous one. The running
 * offset starts at zero for every call, so callers invoke it once per group.
 */
export function stackFold<T, R>(
  members: readonly T[],
  extent: (member: T) => number,
  make: (member: T, low: number, high: number) => R
): R[] {
  const { out } = members.reduce<{ offset: number; out: R[] }>(
    (acc, member) => {
      const low = acc.offset;
      const high = low + extent(member);
      acc.out.push(make(member, low, high));
      return { offset: high, out: acc.out };
    },
    { offset: 0, out: [] }
  );
  return out;
}
