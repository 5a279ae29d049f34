import type {
  AxisTickPrimitive,
  Band,
  BandPrimitive,
  BarPrimitive,
  LabelPrimitive,
  LegendEntry,
  LegendPrimitive,
  Primitive,
  Segment,
  Stat,
  YesNo
} from '@/lib/alluvial/schema';
import { materializeCurve } from './curve';
import type { LabelFormat } from './segments';

export interface EmitOptions {
  stat: Stat;
  showDataLabels: YesNo;
  barWidth: number;
  bandOpacity: number;
  labelThreshold: number;
  legendTitle?: string;
  timeLabelFormat?: LabelFormat;
}

export interface EmitInput {
  segments: readonly Segment[];
  bands: readonly Band[];
  population: number;
  timeLabels: ReadonlyMap<number, string>;
  options: EmitOptions;
}

export interface EmitResult {
  primitives: Primitive[];
  suppressedLabels: number;
  samplePoints: number;
}

const THRESHOLD_EPSILON = 1e-9;

export function statScale(stat: Stat, population: number): number {
  return stat === 'percent' ? 100 : population;
}

function trimDecimals(value: number): string {
  return value.toFixed(2).replace(/\.?0+$/, '');
}

export function formatDataLabel(segment: Segment, stat: Stat, population: number): string {
  if (stat === 'percent') {
    // multiply first: size / N * 100 drifts below exact half percents
    return `${Math.round((segment.size * 100) / population)}%`;
  }
  return Number.isInteger(segment.size) ? String(segment.size) : trimDecimals(segment.size);
}

function bar(segment: Segment, scale: number, halfWidth: number): BarPrimitive {
  return {
    kind: 'bar',
    time: segment.time,
    category: segment.category,
    halfWidth,
    lowY: segment.lowFraction * scale,
    highY: segment.highFraction * scale,
    color: segment.color,
    legendLabel: segment.label
  };
}

function band(source: Band, scale: number, opacity: number): BandPrimitive {
  const curve = materializeCurve(source).map((point) => ({
    x: point.x,
    yLow: point.yLow * scale,
    yHigh: point.yHigh * scale
  }));
  return {
    kind: 'band',
    from: { time: source.link.time1, category: source.link.category1 },
    to: { time: source.link.time2, category: source.link.category2 },
    curve,
    color: source.color,
    opacity
  };
}

function axisTicks(segments: readonly Segment[], timeLabels: ReadonlyMap<number, string>, format?: LabelFormat): AxisTickPrimitive[] {
  const times = Array.from(new Set(segments.map((segment) => segment.time))).sort((a, b) => a - b);
  return times.map((time) => {
    const raw = timeLabels.get(time) ?? String(time);
    return { kind: 'axisTick', x: time, text: format ? format(raw, time) : raw };
  });
}

function legend(segments: readonly Segment[], title?: string): LegendPrimitive {
  const entries = new Map<number, LegendEntry>();
  for (const segment of segments) {
    if (!entries.has(segment.category)) {
      entries.set(segment.category, { category: segment.category, color: segment.color, label: segment.label });
    }
  }
  const ordered = Array.from(entries.values()).sort((a, b) => a.category - b.category);
  return title === undefined ? { kind: 'legend', entries: ordered } : { kind: 'legend', title, entries: ordered };
}

/**
 * Final stage: scales normalized geometry to the requested statistic and
 * orders primitives for painting (bands beneath bars, text on top).
 */
export function emitPrimitives(input: EmitInput): EmitResult {
  const { segments, bands, population, options } = input;
  const scale = statScale(options.stat, population);
  const halfWidth = options.barWidth / 2;

  const bandPrims = bands.map((source) => band(source, scale, options.bandOpacity));
  const barPrims = segments.map((segment) => bar(segment, scale, halfWidth));

  const labels: LabelPrimitive[] = [];
  let suppressedLabels = 0;
  if (options.showDataLabels === 'yes') {
    for (const segment of segments) {
      if (segment.size / population + THRESHOLD_EPSILON < options.labelThreshold) {
        suppressedLabels += 1;
        continue;
      }
      labels.push({
        kind: 'label',
        x: segment.time,
        y: ((segment.lowFraction + segment.highFraction) / 2) * scale,
        text: formatDataLabel(segment, options.stat, population)
      });
    }
  }

  const primitives: Primitive[] = [
    ...bandPrims,
    ...barPrims,
    ...labels,
    ...axisTicks(segments, input.timeLabels, options.timeLabelFormat),
    legend(segments, options.legendTitle)
  ];
  const samplePoints = bandPrims.reduce((sum, prim) => sum + prim.curve.length, 0);
  return { primitives, suppressedLabels, samplePoints };
}
