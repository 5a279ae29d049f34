import { describe, it, expect } from 'vitest';
import { DOMParser } from '@xmldom/xmldom';
import { buildAlluvialOrThrow, renderSvg } from '@/lib/index';
import { SCENARIO_A_LINKS, SCENARIO_A_NODES, TEST_COLORS } from '../fixtures/scenarios';

const { primitives } = buildAlluvialOrThrow(SCENARIO_A_NODES, SCENARIO_A_LINKS, {
  colorList: TEST_COLORS,
  interpolation: 'cosine',
  stat: 'percent',
  legendTitle: 'Severity'
});

function parse(svg: string) {
  return new DOMParser().parseFromString(svg, 'image/svg+xml');
}

function nth(svg: string, tag: string, index: number) {
  const element = parse(svg).getElementsByTagName(tag).item(index);
  if (!element) throw new Error(`no <${tag}> at ${index}`);
  return element;
}

describe('renderSvg', () => {
  it('sizes the root element', () => {
    const result = renderSvg(primitives);
    const root = parse(result.svg).documentElement;
    expect(result.width).toBe(800);
    expect(result.height).toBe(500);
    expect(root.getAttribute('width')).toBe('800px');
    expect(root.getAttribute('viewBox')).toBe('0 0 800 500');
  });

  it('draws one element per primitive part', () => {
    const doc = parse(renderSvg(primitives).svg);
    expect(doc.getElementsByTagName('path').length).toBe(3);
    expect(doc.getElementsByTagName('rect').length).toBe(7);
    expect(doc.getElementsByTagName('text').length).toBe(9);
  });

  it('skips the background when it is transparent', () => {
    const doc = parse(renderSvg(primitives, { background: 'transparent' }).svg);
    expect(doc.getElementsByTagName('rect').length).toBe(6);
  });

  it('maps bar geometry into the plot area', () => {
    const bar = nth(renderSvg(primitives).svg, 'rect', 1);
    expect(bar.getAttribute('x')).toBe('130');
    expect(bar.getAttribute('y')).toBe('164');
    expect(bar.getAttribute('width')).toBe('76');
    expect(bar.getAttribute('height')).toBe('296');
    expect(bar.getAttribute('fill')).toBe('#111111');
  });

  it('traces band outlines from the upper edge and closes them', () => {
    const path = nth(renderSvg(primitives).svg, 'path', 0);
    expect(path.getAttribute('d')?.startsWith('M204.48,223.2 ')).toBe(true);
    expect(path.getAttribute('d')?.endsWith(' Z')).toBe(true);
    expect(path.getAttribute('fill-opacity')).toBe('0.5');
  });

  it('places labels, ticks and the legend title', () => {
    const { svg } = renderSvg(primitives);
    const text = (index: number) => nth(svg, 'text', index);
    expect(text(0).textContent).toBe('67%');
    expect(text(0).getAttribute('x')).toBe('168');
    expect(text(0).getAttribute('y')).toBe('312');
    expect(text(4).textContent).toBe('1');
    expect(text(4).getAttribute('y')).toBe('476');
    expect(text(6).textContent).toBe('Severity');
    expect(text(6).getAttribute('font-weight')).toBe('bold');
    expect(text(7).textContent).toBe('1');
  });
});
