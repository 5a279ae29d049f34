import type { Interpolation, Stat, YesNo } from '@/lib/alluvial/schema';
import { getPalette } from '@/config/palette';

export interface LayoutDefaults {
  barWidth: number;
  interpolation: Interpolation;
  stat: Stat;
  showDataLabels: YesNo;
  curveStep: number;
  bandOpacity: number;
  labelThreshold: number;       // share of N below which data labels are dropped
  edgeInset: number;            // band endpoints sit at time ± edgeInset·barWidth
  colorList: readonly string[];
}

function envChoice<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const value = raw?.trim().toLowerCase();
  return allowed.find((option) => option === value) ?? fallback;
}

export const LAYOUT_DEFAULTS: LayoutDefaults = {
  barWidth: 0.25,
  interpolation: envChoice(process.env.ALLUVIAL_INTERPOLATION, ['linear', 'cosine'] as const, 'cosine'),
  stat: envChoice(process.env.ALLUVIAL_STAT, ['percent', 'count'] as const, 'percent'),
  showDataLabels: 'yes',
  curveStep: 0.01,
  bandOpacity: 0.5,
  labelThreshold: 0.01,
  edgeInset: 0.48,
  colorList: getPalette(process.env.ALLUVIAL_PALETTE)
};
