import type { AlluvialNode, Segment } from '@/lib/alluvial/schema';
import { ComputationError, ConfigurationError } from '@/lib/alluvial/errors';
import { colorFor, type ColorMap } from './colors';
import { groupBy, stackFold } from './group';

export type LabelFormat = (label: string, value: number) => string;

const POPULATION_TOLERANCE = 1e-9;

function tolerance(population: number): number {
  return POPULATION_TOLERANCE * Math.max(1, Math.abs(population));
}

/**
 * Total subjects per time point. Every time point must carry the same total;
 * an explicit `expected` value must agree with it.
 */
export function populationDenominator(nodes: readonly AlluvialNode[], expected?: number): number {
  const totals = new Map<number, number>();
  for (const node of nodes) {
    totals.set(node.time, (totals.get(node.time) ?? 0) + node.size);
  }
  const ordered = Array.from(totals.entries()).sort((a, b) => a[0] - b[0]);
  if (!ordered.length) {
    throw new ComputationError('COMPUTE/ZERO_POPULATION', 'Node table has no rows; population is zero');
  }
  const [firstTime, population] = ordered[0];
  for (const [time, total] of ordered) {
    if (Math.abs(total - population) > tolerance(population)) {
      throw new ConfigurationError(
        'CONFIG/POPULATION_INCONSISTENT',
        `Population at time ${time} is ${total}, expected ${population} as at time ${firstTime}`
      );
    }
  }
  if (population <= 0) {
    throw new ComputationError('COMPUTE/ZERO_POPULATION', 'Total population is zero');
  }
  if (expected !== undefined && Math.abs(expected - population) > tolerance(population)) {
    throw new ConfigurationError(
      'CONFIG/POPULATION_MISMATCH',
      `Configured population ${expected} does not match node totals ${population}`
    );
  }
  return population;
}

export function stackSegments(
  nodes: readonly AlluvialNode[],
  population: number,
  colors: ColorMap,
  format?: LabelFormat
): Segment[] {
  if (!(population > 0)) {
    throw new ComputationError('COMPUTE/ZERO_POPULATION', 'Cannot normalize segments against a zero population');
  }
  const columns = Array.from(groupBy(nodes, (node) => String(node.time)).values())
    .sort((a, b) => a[0].time - b[0].time);

  const segments: Segment[] = [];
  for (const column of columns) {
    const ordered = [...column].sort((a, b) => a.category - b.category);
    const stacked = stackFold(ordered, (node) => node.size, (node, lowCount, rawHigh) => {
      const last = node === ordered[ordered.length - 1];
      // absorb summation drift so each column closes at exactly N
      const highCount = last && Math.abs(rawHigh - population) <= tolerance(population) ? population : rawHigh;
      const raw = node.categoryLabel ?? String(node.category);
      const segment: Segment = {
        time: node.time,
        category: node.category,
        size: node.size,
        lowCount,
        highCount,
        lowFraction: lowCount / population,
        highFraction: highCount / population,
        color: colorFor(colors, node.category),
        label: format ? format(raw, node.category) : raw
      };
      return Object.freeze(segment);
    });
    segments.push(...stacked);
  }
  return segments;
}
