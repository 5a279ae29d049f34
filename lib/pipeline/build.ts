import { performance } from 'node:perf_hooks';
import type { AlluvialLayout, Band, Primitive } from '@/lib/alluvial/schema';
import { isAlluvialError, type ErrorCode } from '@/lib/alluvial/errors';
import type { LayoutOptions } from '@/lib/alluvial/input';
import { validateInputs, type ValidatedInputs } from '@/lib/alluvial/validate';
import { colorFor } from '@/lib/layout/colors';
import { buildBand } from '@/lib/layout/curve';
import { resolveLinkEdges } from '@/lib/layout/edges';
import { emitPrimitives } from '@/lib/layout/emit';
import { stackSegments } from '@/lib/layout/segments';
import { LAYOUT_DEFAULTS } from '@/config/layout';
import { emitLayoutMetrics, type LayoutMetrics } from '@/lib/metrics/telemetry';

const APP_VERSION = process.env.APP_VERSION || 'dev';

export type BuildOk = { ok: true; primitives: Primitive[]; layout: AlluvialLayout; metrics: LayoutMetrics };
export type BuildErr = { ok: false; error: string; code: ErrorCode };
export type BuildResult = BuildOk | BuildErr;

export interface StagedLayout {
  layout: AlluvialLayout;
  bands: Band[];
  stackMs: number;
}

function timeLabelsOf(inputs: ValidatedInputs): Map<number, string> {
  const labels = new Map<number, string>();
  for (const node of inputs.nodes) {
    if (node.timeLabel !== undefined && !labels.has(node.time)) labels.set(node.time, node.timeLabel);
  }
  return labels;
}

/** Stacking stages; assumes `inputs` already passed validation. */
export function computeLayout(inputs: ValidatedInputs): StagedLayout {
  const { nodes, links, options, population, colors } = inputs;
  const stackStart = performance.now();
  const segments = stackSegments(nodes, population, colors, options.categoryLabelFormat);
  const edges = resolveLinkEdges(links, segments, population);
  const stackMs = performance.now() - stackStart;
  const curveOptions = {
    barWidth: options.barWidth,
    interpolation: options.interpolation,
    step: options.curveStep,
    inset: LAYOUT_DEFAULTS.edgeInset
  };
  const bands = edges.map((edge) => buildBand(edge, colorFor(colors, edge.category1), curveOptions));
  return {
    layout: { population, segments: Object.freeze(segments), links: Object.freeze(edges) },
    bands,
    stackMs
  };
}

export function buildAlluvialOrThrow(nodes: unknown, links: unknown, options?: LayoutOptions | Record<string, unknown>): BuildOk {
  const validateStart = performance.now();
  const inputs = validateInputs(nodes, links, options);
  const validateMs = performance.now() - validateStart;

  const { layout, bands, stackMs } = computeLayout(inputs);

  const emitStart = performance.now();
  const emitted = emitPrimitives({
    segments: layout.segments,
    bands,
    population: layout.population,
    timeLabels: timeLabelsOf(inputs),
    options: {
      stat: inputs.options.stat,
      showDataLabels: inputs.options.showDataLabels,
      barWidth: inputs.options.barWidth,
      bandOpacity: inputs.options.bandOpacity,
      labelThreshold: LAYOUT_DEFAULTS.labelThreshold,
      legendTitle: inputs.options.legendTitle,
      timeLabelFormat: inputs.options.timeLabelFormat
    }
  });
  // curves are lazy, so sampling time is part of emitMs
  const emitMs = performance.now() - emitStart;

  const metrics: LayoutMetrics = {
    segments: layout.segments.length,
    links: layout.links.length,
    bands: bands.length,
    labels: emitted.primitives.filter((p) => p.kind === 'label').length,
    suppressedLabels: emitted.suppressedLabels,
    samplePoints: emitted.samplePoints,
    population: layout.population,
    interpolation: inputs.options.interpolation,
    stat: inputs.options.stat,
    validateMs,
    stackMs,
    emitMs,
    version: { app: APP_VERSION }
  };
  emitLayoutMetrics(metrics);
  return { ok: true, primitives: emitted.primitives, layout, metrics };
}

export function buildAlluvial(nodes: unknown, links: unknown, options?: LayoutOptions | Record<string, unknown>): BuildResult {
  try {
    return buildAlluvialOrThrow(nodes, links, options);
  } catch (error) {
    if (!isAlluvialError(error)) throw error;
    console.warn('[ALLUVIAL_BUILD_FAIL]', { code: error.code, error: error.message });
    return { ok: false, error: error.message, code: error.code };
  }
}
