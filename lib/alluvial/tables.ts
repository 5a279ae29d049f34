import Papa from 'papaparse';
import type { AlluvialLink, AlluvialNode } from '@/lib/alluvial/schema';
import { SchemaError } from '@/lib/alluvial/errors';
import { parseLinkTable, parseNodeTable } from '@/lib/alluvial/input';

export type RawRow = Record<string, string>;

const CANONICAL_HEADERS: Record<string, string> = {
  time: 'time',
  category: 'category',
  size: 'size',
  timelabel: 'timeLabel',
  time_label: 'timeLabel',
  categorylabel: 'categoryLabel',
  category_label: 'categoryLabel',
  time1: 'time1',
  category1: 'category1',
  time2: 'time2',
  category2: 'category2',
  thickness: 'thickness'
};

function canonicalHeader(raw: string): string {
  const trimmed = raw.trim();
  return CANONICAL_HEADERS[trimmed.toLowerCase()] ?? trimmed;
}

// only line breaks: a trailing delimiter still marks a blank last cell
function stripEnds(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/^[\r\n]+/, '').replace(/[\r\n]+$/, '');
}

/** Header-row CSV/TSV; the delimiter is detected from the first line. */
export function parseDelimited(text: string): RawRow[] {
  const result = Papa.parse<RawRow>(stripEnds(text), {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: canonicalHeader,
    transform: (value) => value.trim()
  });
  // a single-column table has no delimiter to detect; the column checks report it instead
  const errors = result.errors.filter((error) => error.type !== 'Delimiter');
  if (errors.length) {
    throw new SchemaError(
      'SCHEMA/INVALID_VALUE',
      'Malformed delimited table',
      errors.map((error) => `row ${error.row ?? '?'}: ${error.message}`)
    );
  }
  return result.data;
}

export function readNodeTable(text: string): AlluvialNode[] {
  return parseNodeTable(parseDelimited(text));
}

export function readLinkTable(text: string): AlluvialLink[] {
  return parseLinkTable(parseDelimited(text));
}
