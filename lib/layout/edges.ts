import type { AlluvialLink, EdgeLink, Segment } from '@/lib/alluvial/schema';
import { ComputationError, SchemaError } from '@/lib/alluvial/errors';
import { comparePairs, groupBy, pairKey, stackFold } from './group';

interface Indexed {
  index: number;
  link: AlluvialLink;
}

interface Extent {
  low: number;
  high: number;
}

type Endpoint = 'origin' | 'dest';

function segmentFloors(segments: readonly Segment[]): Map<string, number> {
  return new Map(segments.map((segment) => [pairKey(segment.time, segment.category), segment.lowFraction]));
}

function ownPair(link: AlluvialLink, side: Endpoint): [number, number] {
  return side === 'origin' ? [link.time1, link.category1] : [link.time2, link.category2];
}

function partnerPair(link: AlluvialLink, side: Endpoint): [number, number] {
  return side === 'origin' ? [link.time2, link.category2] : [link.time1, link.category1];
}

/**
 * One stacking pass. Links sharing an endpoint segment are ordered by their
 * partner's (time, category) and stacked upward from the segment floor.
 */
function stackPass(
  links: readonly Indexed[],
  side: Endpoint,
  floors: ReadonlyMap<string, number>,
  population: number
): Extent[] {
  const extents: Extent[] = new Array(links.length);
  const groups = groupBy(links, (item) => pairKey(...ownPair(item.link, side)));
  for (const [key, members] of groups) {
    const floor = floors.get(key);
    if (floor === undefined) {
      throw new SchemaError('SCHEMA/LINK_ENDPOINT_UNKNOWN', `Link endpoint ${key} has no matching node`);
    }
    const ordered = [...members].sort(
      (a, b) => comparePairs(partnerPair(a.link, side), partnerPair(b.link, side)) || a.index - b.index
    );
    stackFold(ordered, (item) => item.link.thickness / population, (item, low, high) => {
      extents[item.index] = { low: floor + low, high: floor + high };
      return item;
    });
  }
  return extents;
}

export function resolveLinkEdges(
  links: readonly AlluvialLink[],
  segments: readonly Segment[],
  population: number
): EdgeLink[] {
  if (!(population > 0)) {
    throw new ComputationError('COMPUTE/ZERO_POPULATION', 'Cannot normalize links against a zero population');
  }
  const floors = segmentFloors(segments);
  const indexed = links.map((link, index) => ({ index, link }));
  const origins = stackPass(indexed, 'origin', floors, population);
  const destinations = stackPass(indexed, 'dest', floors, population);
  return links.map((link, index) => {
    const edge: EdgeLink = {
      time1: link.time1,
      category1: link.category1,
      time2: link.time2,
      category2: link.category2,
      thickness: link.thickness,
      originLow: origins[index].low,
      originHigh: origins[index].high,
      destLow: destinations[index].low,
      destHigh: destinations[index].high
    };
    return Object.freeze(edge);
  });
}
