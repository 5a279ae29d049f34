export type Interpolation = 'linear' | 'cosine';
export type Stat = 'percent' | 'count';
export type YesNo = 'yes' | 'no';

export interface AlluvialNode {
  time: number;                      // integer ≥ 1
  category: number;                  // integer ≥ 1
  size: number;                      // subjects at (time, category)
  timeLabel?: string;
  categoryLabel?: string;
}

export interface AlluvialLink {
  time1: number; category1: number;
  time2: number; category2: number;  // time1 < time2
  thickness: number;
}

export interface Segment {
  time: number;
  category: number;
  size: number;
  lowFraction: number;               // 0..1 of N
  highFraction: number;
  lowCount: number;                  // 0..N
  highCount: number;
  color: string;
  label: string;
}

export interface EdgeLink extends AlluvialLink {
  originLow: number;                 // absolute, 0..1 of N
  originHigh: number;
  destLow: number;
  destHigh: number;
}

export interface CurvePoint {
  x: number;
  yLow: number;
  yHigh: number;
}

export interface Band {
  link: EdgeLink;
  color: string;
  curve: Iterable<CurvePoint>;
}

export interface BarPrimitive {
  kind: 'bar';
  time: number;
  category: number;
  halfWidth: number;
  lowY: number;
  highY: number;
  color: string;
  legendLabel: string;
}

export interface BandPrimitive {
  kind: 'band';
  from: { time: number; category: number };
  to: { time: number; category: number };
  curve: CurvePoint[];
  color: string;
  opacity: number;
}

export interface LabelPrimitive {
  kind: 'label';
  x: number;
  y: number;
  text: string;
}

export interface AxisTickPrimitive {
  kind: 'axisTick';
  x: number;
  text: string;
}

export interface LegendEntry {
  category: number;
  color: string;
  label: string;
}

export interface LegendPrimitive {
  kind: 'legend';
  title?: string;
  entries: LegendEntry[];
}

export type Primitive =
  | BarPrimitive
  | BandPrimitive
  | LabelPrimitive
  | AxisTickPrimitive
  | LegendPrimitive;

export interface AlluvialLayout {
  population: number;
  segments: readonly Segment[];
  links: readonly EdgeLink[];
}
