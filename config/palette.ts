export type PaletteName = 'paired' | 'set3';

// ColorBrewer qualitative schemes, 12 classes each.
const PALETTES: Record<PaletteName, readonly string[]> = {
  paired: [
    '#A6CEE3', '#1F78B4', '#B2DF8A', '#33A02C', '#FB9A99', '#E31A1C',
    '#FDBF6F', '#FF7F00', '#CAB2D6', '#6A3D9A', '#FFFF99', '#B15928'
  ],
  set3: [
    '#8DD3C7', '#FFFFB3', '#BEBADA', '#FB8072', '#80B1D3', '#FDB462',
    '#B3DE69', '#FCCDE5', '#D9D9D9', '#BC80BD', '#CCEBC5', '#FFED6F'
  ]
};

export const DEFAULT_PALETTE: readonly string[] = PALETTES.paired;

export function isPaletteName(name: string): name is PaletteName {
  return Object.prototype.hasOwnProperty.call(PALETTES, name);
}

export function getPalette(name: string | undefined): readonly string[] {
  if (!name) return DEFAULT_PALETTE;
  const key = name.toLowerCase();
  return isPaletteName(key) ? PALETTES[key] : DEFAULT_PALETTE;
}
