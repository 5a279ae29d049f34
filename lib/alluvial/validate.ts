import type { AlluvialLink, AlluvialNode } from '@/lib/alluvial/schema';
import { SchemaError } from '@/lib/alluvial/errors';
import { parseLinkTable, parseNodeTable, resolveOptions, type ResolvedLayoutOptions } from '@/lib/alluvial/input';
import { assignColors, type ColorMap } from '@/lib/layout/colors';
import { pairKey } from '@/lib/layout/group';
import { populationDenominator } from '@/lib/layout/segments';

export interface ValidatedInputs {
  nodes: AlluvialNode[];
  links: AlluvialLink[];
  options: ResolvedLayoutOptions;
  population: number;
  colors: ColorMap;
  overflows: string[];
}

const FLOW_TOLERANCE = 1e-9;

function checkEndpoints(nodes: readonly AlluvialNode[], links: readonly AlluvialLink[]): void {
  const known = new Set(nodes.map((node) => pairKey(node.time, node.category)));
  const unknown: string[] = [];
  links.forEach((link, row) => {
    if (!known.has(pairKey(link.time1, link.category1))) unknown.push(`row ${row} origin ${link.time1}:${link.category1}`);
    if (!known.has(pairKey(link.time2, link.category2))) unknown.push(`row ${row} destination ${link.time2}:${link.category2}`);
  });
  if (unknown.length) {
    throw new SchemaError('SCHEMA/LINK_ENDPOINT_UNKNOWN', 'Links reference (time, category) pairs with no node', unknown);
  }
}

/**
 * Links may leave part of a segment unused. Claiming more than a segment holds
 * is allowed too, but the band overlaps the next segment up, so it is reported.
 */
function reportFlowOverflow(nodes: readonly AlluvialNode[], links: readonly AlluvialLink[]): string[] {
  const outgoing = new Map<string, number>();
  const incoming = new Map<string, number>();
  for (const link of links) {
    const from = pairKey(link.time1, link.category1);
    const to = pairKey(link.time2, link.category2);
    outgoing.set(from, (outgoing.get(from) ?? 0) + link.thickness);
    incoming.set(to, (incoming.get(to) ?? 0) + link.thickness);
  }
  const overflows: string[] = [];
  for (const node of nodes) {
    const key = pairKey(node.time, node.category);
    const limit = node.size + FLOW_TOLERANCE * Math.max(1, node.size);
    const out = outgoing.get(key) ?? 0;
    const inc = incoming.get(key) ?? 0;
    if (out > limit) overflows.push(`${key} outgoing ${out} > ${node.size}`);
    if (inc > limit) overflows.push(`${key} incoming ${inc} > ${node.size}`);
  }
  if (overflows.length) {
    console.warn('[ALLUVIAL_LINK_OVERFLOW]', { segments: overflows });
  }
  return overflows;
}

/**
 * Every check that can reject an invocation runs here, before any geometry is
 * computed, so a failed call produces no primitives at all.
 */
export function validateInputs(rawNodes: unknown, rawLinks: unknown, rawOptions?: unknown): ValidatedInputs {
  const options = resolveOptions(rawOptions);
  const nodes = parseNodeTable(rawNodes);
  const links = parseLinkTable(rawLinks);
  const population = populationDenominator(nodes, options.population);
  checkEndpoints(nodes, links);
  const overflows = reportFlowOverflow(nodes, links);
  const maxCategory = nodes.reduce((max, node) => Math.max(max, node.category), 0);
  const colors = assignColors(maxCategory, options.colorList);
  return { nodes, links, options, population, colors, overflows };
}
