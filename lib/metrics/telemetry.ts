export interface LayoutMetrics {
  segments: number; links: number; bands: number;
  labels: number; suppressedLabels: number; samplePoints: number;
  population: number;
  interpolation: 'linear' | 'cosine';
  stat: 'percent' | 'count';
  validateMs: number; stackMs: number; emitMs: number;
  version: { app: string };
}

export function metricsEnabled(): boolean {
  return process.env.ALLUVIAL_METRICS === '1' || process.env.ALLUVIAL_METRICS === 'true';
}

export function emitLayoutMetrics(m: LayoutMetrics): void {
  if (!metricsEnabled()) return;
  const ms = (n: number) => n.toFixed(2);
  console.info(
    `[ALLUVIAL][v=${m.version.app}] N=${m.population} segments=${m.segments} links=${m.links} bands=${m.bands} ` +
      `labels=${m.labels} (suppressed ${m.suppressedLabels}) points=${m.samplePoints} mode=${m.interpolation}/${m.stat} ` +
      `ms(validate=${ms(m.validateMs)}, stack=${ms(m.stackMs)}, emit=${ms(m.emitMs)})`
  );
}
