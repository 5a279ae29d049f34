export { buildAlluvial, buildAlluvialOrThrow, computeLayout } from './pipeline/build';
export type { BuildErr, BuildOk, BuildResult, StagedLayout } from './pipeline/build';
export { validateInputs } from './alluvial/validate';
export type { ValidatedInputs } from './alluvial/validate';
export { resolveOptions, LayoutOptionsSchema } from './alluvial/input';
export type { LayoutOptions, ResolvedLayoutOptions } from './alluvial/input';
export { parseDelimited, readLinkTable, readNodeTable } from './alluvial/tables';
export {
  AlluvialError,
  ComputationError,
  ConfigurationError,
  InputMissingError,
  SchemaError,
  isAlluvialError
} from './alluvial/errors';
export type { ErrorCode } from './alluvial/errors';
export type * from './alluvial/schema';
export { populationDenominator, stackSegments } from './layout/segments';
export type { LabelFormat } from './layout/segments';
export { resolveLinkEdges } from './layout/edges';
export { bandEndpoints, buildBand, generateBandCurve, materializeCurve, sampleCount } from './layout/curve';
export type { CurveOptions } from './layout/curve';
export { assignColors, colorFor } from './layout/colors';
export { emitPrimitives, formatDataLabel, statScale } from './layout/emit';
export { renderSvg } from './export/svg';
export type { SvgOptions, SvgResult } from './export/svg';
