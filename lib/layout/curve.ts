import type { Band, CurvePoint, EdgeLink, Interpolation } from '@/lib/alluvial/schema';
import { ConfigurationError } from '@/lib/alluvial/errors';

export interface CurveOptions {
  barWidth: number;
  interpolation: Interpolation;
  step: number;
  inset: number;
}

const COUNT_EPSILON = 1e-9;

export function bandEndpoints(link: EdgeLink, barWidth: number, inset: number): { leftX: number; rightX: number } {
  return {
    leftX: link.time1 + inset * barWidth,
    rightX: link.time2 - inset * barWidth
  };
}

/** Inclusive sample count: both `leftX` and `rightX` are always sampled. */
export function sampleCount(leftX: number, rightX: number, step: number): number {
  if (!(step > 0)) {
    throw new ConfigurationError('CONFIG/INVALID_OPTION', `Curve step must be positive, got ${step}`);
  }
  const span = rightX - leftX;
  if (span <= 0) return 1;
  return Math.ceil(span / step - COUNT_EPSILON) + 1;
}

function interpolator(mode: Interpolation, start: number, end: number): (t: number) => number {
  if (mode === 'linear') {
    return (t) => (t <= 0 ? start : t >= 1 ? end : start + (end - start) * t);
  }
  const amplitude = (start - end) / 2;
  const offset = start - amplitude;
  return (t) => (t <= 0 ? start : t >= 1 ? end : amplitude * Math.cos(Math.PI * t) + offset);
}

/**
 * Samples both band boundaries from just right of the origin bar to just left
 * of the destination bar. Single pass: the returned generator is consumed once.
 */
export function* generateBandCurve(link: EdgeLink, options: CurveOptions): Generator<CurvePoint, void, undefined> {
  const { leftX, rightX } = bandEndpoints(link, options.barWidth, options.inset);
  const count = sampleCount(leftX, rightX, options.step);
  const low = interpolator(options.interpolation, link.originLow, link.destLow);
  const high = interpolator(options.interpolation, link.originHigh, link.destHigh);
  for (let i = 0; i < count; i += 1) {
    const t = count === 1 ? 0 : i / (count - 1);
    const x = i === count - 1 && count > 1 ? rightX : leftX + t * (rightX - leftX);
    yield { x, yLow: low(t), yHigh: high(t) };
  }
}

export function buildBand(link: EdgeLink, color: string, options: CurveOptions): Band {
  return { link, color, curve: generateBandCurve(link, options) };
}

export function materializeCurve(band: Band): CurvePoint[] {
  return Array.from(band.curve);
}
