import { z } from 'zod';
import type { AlluvialLink, AlluvialNode } from '@/lib/alluvial/schema';
import { ComputationError, ConfigurationError, InputMissingError, SchemaError } from '@/lib/alluvial/errors';
import { LAYOUT_DEFAULTS } from '@/config/layout';
import type { LabelFormat } from '@/lib/layout/segments';

// CSV readers hand over strings; everything else passes through to the number checks.
const numeric = <T extends z.ZodTypeAny>(inner: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value), inner);

const optionalText = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value === '' || value === null ? undefined : value),
  z.string().optional()
);

export const NodeRowSchema = z.object({
  time: numeric(z.number().int().min(1)),
  category: numeric(z.number().int().min(1)),
  size: numeric(z.number().finite().min(0)),
  timeLabel: optionalText,
  categoryLabel: optionalText
});

export const LinkRowSchema = z.object({
  time1: numeric(z.number().int().min(1)),
  category1: numeric(z.number().int().min(1)),
  time2: numeric(z.number().int().min(1)),
  category2: numeric(z.number().int().min(1)),
  thickness: numeric(z.number().finite().min(0))
});

const NODE_COLUMNS = ['time', 'category', 'size'] as const;
const LINK_COLUMNS = ['time1', 'category1', 'time2', 'category2', 'thickness'] as const;

const COLOR_PATTERN = /^(#[0-9a-fA-F]{3}|#[0-9a-fA-F]{6}|#[0-9a-fA-F]{8}|rgba?\([^)]*\)|[a-zA-Z]+)$/;

const labelFormat = z.custom<LabelFormat>((value) => typeof value === 'function', {
  message: 'Expected a formatting function'
});

export const LayoutOptionsSchema = z
  .object({
    colorList: z.array(z.string().regex(COLOR_PATTERN, 'Invalid color')).min(1).optional(),
    barWidth: z.number().gt(0).lte(1).optional(),
    timeLabelFormat: labelFormat.optional(),
    categoryLabelFormat: labelFormat.optional(),
    legendTitle: z.string().optional(),
    interpolation: z.enum(['linear', 'cosine']).optional(),
    stat: z.enum(['percent', 'count']).optional(),
    showDataLabels: z.enum(['yes', 'no']).optional(),
    population: z.number().positive().optional(),
    curveStep: z.number().positive().max(1).optional(),
    bandOpacity: z.number().min(0).max(1).optional()
  })
  .strict();

export type LayoutOptions = z.input<typeof LayoutOptionsSchema>;

export interface ResolvedLayoutOptions {
  colorList: readonly string[];
  barWidth: number;
  timeLabelFormat?: LabelFormat;
  categoryLabelFormat?: LabelFormat;
  legendTitle?: string;
  interpolation: 'linear' | 'cosine';
  stat: 'percent' | 'count';
  showDataLabels: 'yes' | 'no';
  population?: number;
  curveStep: number;
  bandOpacity: number;
}

const DEPRECATED_OPTIONS: Record<string, string> = {
  colour: 'colorList',
  bw: 'barWidth',
  smooth: 'interpolation'
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function resolveOptions(raw: unknown): ResolvedLayoutOptions {
  const source = raw ?? {};
  if (!isRecord(source)) {
    throw new ConfigurationError('CONFIG/INVALID_OPTION', 'Layout options must be an object');
  }
  for (const key of Object.keys(source)) {
    const replacement = DEPRECATED_OPTIONS[key];
    if (replacement) {
      throw new ConfigurationError('CONFIG/DEPRECATED_OPTION', `Option "${key}" is no longer supported; use "${replacement}"`);
    }
  }
  const parsed = LayoutOptionsSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError('CONFIG/INVALID_OPTION', `Invalid layout options: ${describeIssues(parsed.error).join('; ')}`);
  }
  const o = parsed.data;
  return {
    colorList: o.colorList ?? LAYOUT_DEFAULTS.colorList,
    barWidth: o.barWidth ?? LAYOUT_DEFAULTS.barWidth,
    timeLabelFormat: o.timeLabelFormat,
    categoryLabelFormat: o.categoryLabelFormat,
    legendTitle: o.legendTitle,
    interpolation: o.interpolation ?? LAYOUT_DEFAULTS.interpolation,
    stat: o.stat ?? LAYOUT_DEFAULTS.stat,
    showDataLabels: o.showDataLabels ?? LAYOUT_DEFAULTS.showDataLabels,
    population: o.population,
    curveStep: o.curveStep ?? LAYOUT_DEFAULTS.curveStep,
    bandOpacity: o.bandOpacity ?? LAYOUT_DEFAULTS.bandOpacity
  };
}

function requireTable(value: unknown, table: string): unknown[] {
  if (value === undefined || value === null) throw new InputMissingError(table);
  if (!Array.isArray(value)) {
    throw new SchemaError('SCHEMA/INVALID_VALUE', `The ${table} table must be an array of rows`);
  }
  return value;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/** A column no row carries is missing; a blank cell in a present column is an invalid value. */
function requireColumns(rows: unknown[], columns: readonly string[], table: string): void {
  const records = rows.filter(isRecord);
  const missing = records.length ? columns.filter((column) => records.every((row) => row[column] === undefined)) : [];
  if (missing.length) {
    throw new SchemaError('SCHEMA/COLUMN_MISSING', `The ${table} table is missing required columns`, missing);
  }
  const blanks: string[] = [];
  rows.forEach((row, index) => {
    if (!isRecord(row)) {
      blanks.push(`row ${index}: not a record`);
      return;
    }
    const empty = columns.filter((column) => isBlank(row[column]));
    if (empty.length) blanks.push(`row ${index}: ${empty.join(', ')}`);
  });
  if (blanks.length) {
    throw new SchemaError('SCHEMA/INVALID_VALUE', `The ${table} table has blank required cells`, blanks);
  }
}

function parseRows<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, table: string): T[] {
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    throw new SchemaError('SCHEMA/INVALID_VALUE', `Invalid ${table} table`, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseNodeTable(value: unknown): AlluvialNode[] {
  const rows = requireTable(value, 'node');
  requireColumns(rows, NODE_COLUMNS, 'node');
  const nodes = parseRows(rows, NodeRowSchema, 'node').map((row) => {
    const node: AlluvialNode = { time: row.time, category: row.category, size: row.size };
    if (row.timeLabel !== undefined) node.timeLabel = row.timeLabel;
    if (row.categoryLabel !== undefined) node.categoryLabel = row.categoryLabel;
    return node;
  });
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const node of nodes) {
    const key = `${node.time}:${node.category}`;
    if (seen.has(key)) duplicates.push(`time ${node.time}, category ${node.category}`);
    seen.add(key);
  }
  if (duplicates.length) {
    throw new SchemaError('SCHEMA/DUPLICATE_NODE', 'Node table repeats (time, category) pairs', duplicates);
  }
  return nodes;
}

export function parseLinkTable(value: unknown): AlluvialLink[] {
  const rows = requireTable(value, 'link');
  requireColumns(rows, LINK_COLUMNS, 'link');
  const links: AlluvialLink[] = parseRows(rows, LinkRowSchema, 'link');
  const backwards = links.findIndex((link) => link.time1 >= link.time2);
  if (backwards >= 0) {
    const link = links[backwards];
    throw new ComputationError(
      'COMPUTE/TIME_ORDER',
      `Link row ${backwards} runs from time ${link.time1} to time ${link.time2}; time1 must be before time2`
    );
  }
  return links;
}
