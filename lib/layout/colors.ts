import { ConfigurationError } from '@/lib/alluvial/errors';

export type ColorMap = ReadonlyMap<number, string>;

/** Positional lookup: category `k` takes `colorList[k - 1]`. */
export function assignColors(maxCategory: number, colorList: readonly string[]): ColorMap {
  if (maxCategory > colorList.length) {
    throw new ConfigurationError(
      'CONFIG/PALETTE_EXHAUSTED',
      `${maxCategory} categories but only ${colorList.length} colors configured`
    );
  }
  const colors = new Map<number, string>();
  for (let category = 1; category <= maxCategory; category += 1) {
    colors.set(category, colorList[category - 1]);
  }
  return colors;
}

export function colorFor(colors: ColorMap, category: number): string {
  const color = colors.get(category);
  if (color === undefined) {
    throw new ConfigurationError('CONFIG/PALETTE_EXHAUSTED', `No color assigned to category ${category}`);
  }
  return color;
}
