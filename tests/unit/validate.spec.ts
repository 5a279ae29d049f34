import { describe, it, expect } from 'vitest';
import { buildAlluvial, buildAlluvialOrThrow, type BuildResult } from '@/lib/pipeline/build';
import { validateInputs } from '@/lib/alluvial/validate';
import { resolveOptions } from '@/lib/alluvial/input';
import { SchemaError } from '@/lib/alluvial/errors';
import { LAYOUT_DEFAULTS } from '@/config/layout';
import { SCENARIO_A_LINKS, SCENARIO_A_NODES, TEST_COLORS } from '../fixtures/scenarios';

function failure(result: BuildResult) {
  if (result.ok) throw new Error('expected the build to fail');
  return result;
}

describe('resolveOptions', () => {
  it('fills defaults for omitted options', () => {
    const options = resolveOptions(undefined);
    expect(options.barWidth).toBe(0.25);
    expect(options.curveStep).toBe(0.01);
    expect(options.bandOpacity).toBe(0.5);
    expect(options.showDataLabels).toBe('yes');
    expect(options.colorList).toBe(LAYOUT_DEFAULTS.colorList);
  });

  it('rejects deprecated option names with their replacement', () => {
    const result = failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { bw: 0.3 }));
    expect(result.code).toBe('CONFIG/DEPRECATED_OPTION');
    expect(result.error).toBe('Option "bw" is no longer supported; use "barWidth"');
  });

  it('rejects unknown interpolation modes', () => {
    const result = failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { interpolation: 'spline' }));
    expect(result.code).toBe('CONFIG/INVALID_OPTION');
    expect(result.error).toMatch(/^Invalid layout options: interpolation: /);
  });

  it('rejects unknown option keys', () => {
    const result = failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { wiggle: true }));
    expect(result.code).toBe('CONFIG/INVALID_OPTION');
    expect(result.error).toContain("Unrecognized key(s) in object: 'wiggle'");
  });

  it('rejects bar widths outside (0, 1]', () => {
    expect(failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { barWidth: 0 })).code).toBe('CONFIG/INVALID_OPTION');
    expect(failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { barWidth: 1.5 })).code).toBe('CONFIG/INVALID_OPTION');
  });
});

describe('validateInputs', () => {
  it('reports a missing table', () => {
    const result = failure(buildAlluvial(undefined, SCENARIO_A_LINKS));
    expect(result).toEqual({ ok: false, code: 'INPUT/TABLE_MISSING', error: 'Required node table is missing' });
  });

  it('names missing columns', () => {
    const nodes = SCENARIO_A_NODES.map(({ time, category }) => ({ time, category }));
    const result = failure(buildAlluvial(nodes, SCENARIO_A_LINKS));
    expect(result.code).toBe('SCHEMA/COLUMN_MISSING');
    expect(result.error).toBe('The node table is missing required columns: size');
  });

  it('reports blank cells in a present column by row', () => {
    const nodes = SCENARIO_A_NODES.map((node, i) => (i === 1 ? { ...node, size: '' } : node));
    const result = failure(buildAlluvial(nodes, SCENARIO_A_LINKS));
    expect(result.code).toBe('SCHEMA/INVALID_VALUE');
    expect(result.error).toBe('The node table has blank required cells: row 1: size');
  });

  it('treats null labels as absent', () => {
    const nodes = SCENARIO_A_NODES.map((node) => ({ ...node, timeLabel: null, categoryLabel: null }));
    const inputs = validateInputs(nodes, SCENARIO_A_LINKS, { colorList: TEST_COLORS });
    expect(inputs.nodes).toEqual(SCENARIO_A_NODES);
  });

  it('rejects fractional time values', () => {
    const nodes = [{ time: 1.5, category: 1, size: 1 }];
    const result = failure(buildAlluvial(nodes, []));
    expect(result.code).toBe('SCHEMA/INVALID_VALUE');
    expect(result.error).toMatch(/^Invalid node table: 0\.time: /);
  });

  it('rejects repeated (time, category) pairs', () => {
    const nodes = [...SCENARIO_A_NODES, { time: 2, category: 2, size: 1 }];
    const result = failure(buildAlluvial(nodes, SCENARIO_A_LINKS));
    expect(result.code).toBe('SCHEMA/DUPLICATE_NODE');
    expect(result.error).toBe('Node table repeats (time, category) pairs: time 2, category 2');
  });

  it('rejects links that do not move forward in time', () => {
    const links = [{ time1: 1, category1: 1, time2: 1, category2: 2, thickness: 1 }];
    const result = failure(buildAlluvial(SCENARIO_A_NODES, links));
    expect(result.code).toBe('COMPUTE/TIME_ORDER');
    expect(result.error).toBe('Link row 0 runs from time 1 to time 1; time1 must be before time2');
  });

  it('rejects time points with different totals', () => {
    const nodes = SCENARIO_A_NODES.map((node) => (node.time === 2 && node.category === 2 ? { ...node, size: 6 } : node));
    const result = failure(buildAlluvial(nodes, SCENARIO_A_LINKS));
    expect(result.code).toBe('CONFIG/POPULATION_INCONSISTENT');
    expect(result.error).toBe('Population at time 2 is 14, expected 15 as at time 1');
  });

  it('rejects link endpoints with no node', () => {
    const links = [{ time1: 1, category1: 1, time2: 2, category2: 3, thickness: 1 }];
    const result = failure(buildAlluvial(SCENARIO_A_NODES, links));
    expect(result.code).toBe('SCHEMA/LINK_ENDPOINT_UNKNOWN');
    expect(result.error).toBe('Links reference (time, category) pairs with no node: row 0 destination 2:3');
  });

  it('rejects a color list shorter than the category count', () => {
    const result = failure(buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { colorList: ['#111111'] }));
    expect(result.code).toBe('CONFIG/PALETTE_EXHAUSTED');
    expect(result.error).toBe('2 categories but only 1 colors configured');
  });

  it('emits no primitives and logs the failure', () => {
    const result = buildAlluvial(SCENARIO_A_NODES, SCENARIO_A_LINKS, { smooth: true });
    expect('primitives' in result).toBe(false);
    expect(console.warn).toHaveBeenCalledWith('[ALLUVIAL_BUILD_FAIL]', {
      code: 'CONFIG/DEPRECATED_OPTION',
      error: 'Option "smooth" is no longer supported; use "interpolation"'
    });
  });

  it('throws typed errors from the throwing variant', () => {
    expect(() => buildAlluvialOrThrow(SCENARIO_A_NODES, [{ time1: 1 }])).toThrow(SchemaError);
  });

  it('accepts numeric strings from delimited readers', () => {
    const nodes = SCENARIO_A_NODES.map((node) => ({
      time: String(node.time),
      category: String(node.category),
      size: String(node.size)
    }));
    const inputs = validateInputs(nodes, SCENARIO_A_LINKS, { colorList: TEST_COLORS });
    expect(inputs.nodes).toEqual(SCENARIO_A_NODES);
    expect(inputs.population).toBe(15);
  });

  it('reports links that claim more than a segment holds without failing', () => {
    const inputs = validateInputs(SCENARIO_A_NODES, SCENARIO_A_LINKS, { colorList: TEST_COLORS });
    expect(inputs.overflows).toEqual(['1:2 outgoing 7 > 5', '2:1 incoming 10 > 8']);
    expect(console.warn).toHaveBeenCalledWith('[ALLUVIAL_LINK_OVERFLOW]', { segments: inputs.overflows });
  });
});
