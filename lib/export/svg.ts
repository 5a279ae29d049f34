import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import type {
  AxisTickPrimitive,
  BandPrimitive,
  BarPrimitive,
  LabelPrimitive,
  LegendPrimitive,
  Primitive
} from '@/lib/alluvial/schema';

const SVG_NS = 'http://www.w3.org/2000/svg';

export interface SvgOptions {
  width?: number;
  height?: number;
  padding?: number;
  legendWidth?: number;
  background?: string;
  fontSize?: number;
}

export interface SvgResult {
  svg: string;
  width: number;
  height: number;
}

interface Frame {
  xMin: number;
  xMax: number;
  yMax: number;
  left: number;
  top: number;
  plotWidth: number;
  plotHeight: number;
}

function fmt(n: number): string {
  return String(Number(n.toFixed(2)));
}

function px(frame: Frame, x: number): number {
  return frame.left + ((x - frame.xMin) / (frame.xMax - frame.xMin)) * frame.plotWidth;
}

// axis y grows upward, SVG y grows downward
function py(frame: Frame, y: number): number {
  return frame.top + frame.plotHeight - (y / frame.yMax) * frame.plotHeight;
}

function measureFrame(primitives: readonly Primitive[], width: number, height: number, padding: number, legendWidth: number): Frame {
  const bars = primitives.filter((p): p is BarPrimitive => p.kind === 'bar');
  const times = bars.map((b) => b.time);
  const xMin = times.length ? Math.min(...times) - 0.5 : 0;
  const xMax = times.length ? Math.max(...times) + 0.5 : 1;
  const yMax = bars.reduce((max, b) => Math.max(max, b.highY), 0) || 1;
  return {
    xMin,
    xMax,
    yMax,
    left: padding,
    top: padding,
    plotWidth: Math.max(1, width - padding * 2 - legendWidth),
    plotHeight: Math.max(1, height - padding * 2 - 24)
  };
}

export function renderSvg(primitives: readonly Primitive[], options: SvgOptions = {}): SvgResult {
  const width = options.width ?? 800;
  const height = options.height ?? 500;
  const padding = Math.max(0, options.padding ?? 16);
  const legendWidth = options.legendWidth ?? 160;
  const fontSize = options.fontSize ?? 12;
  const background = options.background ?? '#ffffff';
  const frame = measureFrame(primitives, width, height, padding, legendWidth);

  const doc = new DOMImplementation().createDocument(SVG_NS, 'svg', null);
  const svg = doc.documentElement;
  svg.setAttribute('width', `${width}px`);
  svg.setAttribute('height', `${height}px`);
  svg.setAttribute('viewBox', `0 0 ${width} ${height}`);
  svg.setAttribute('font-size', String(fontSize));

  const el = (name: string, attrs: Record<string, string>, text?: string) => {
    const node = doc.createElementNS(SVG_NS, name);
    for (const [key, value] of Object.entries(attrs)) node.setAttribute(key, value);
    if (text !== undefined) node.appendChild(doc.createTextNode(text));
    svg.appendChild(node);
    return node;
  };

  if (background !== 'transparent') {
    el('rect', { x: '0', y: '0', width: String(width), height: String(height), fill: background });
  }

  const drawBand = (band: BandPrimitive) => {
    if (!band.curve.length) return;
    const upper = band.curve.map((p, i) => `${i === 0 ? 'M' : 'L'}${fmt(px(frame, p.x))},${fmt(py(frame, p.yHigh))}`);
    const lower = [...band.curve].reverse().map((p) => `L${fmt(px(frame, p.x))},${fmt(py(frame, p.yLow))}`);
    el('path', {
      d: `${upper.join(' ')} ${lower.join(' ')} Z`,
      fill: band.color,
      'fill-opacity': String(band.opacity),
      stroke: 'none'
    });
  };

  const drawBar = (bar: BarPrimitive) => {
    const x0 = px(frame, bar.time - bar.halfWidth);
    const x1 = px(frame, bar.time + bar.halfWidth);
    const yTop = py(frame, bar.highY);
    el('rect', {
      x: fmt(x0),
      y: fmt(yTop),
      width: fmt(x1 - x0),
      height: fmt(py(frame, bar.lowY) - yTop),
      fill: bar.color,
      stroke: '#000000',
      'stroke-width': '0.5'
    });
  };

  const drawLabel = (label: LabelPrimitive) => {
    el('text', {
      x: fmt(px(frame, label.x)),
      y: fmt(py(frame, label.y)),
      'text-anchor': 'middle',
      'dominant-baseline': 'middle'
    }, label.text);
  };

  const drawTick = (tick: AxisTickPrimitive) => {
    el('text', {
      x: fmt(px(frame, tick.x)),
      y: fmt(frame.top + frame.plotHeight + 16),
      'text-anchor': 'middle'
    }, tick.text);
  };

  const drawLegend = (legend: LegendPrimitive) => {
    const x = frame.left + frame.plotWidth + 12;
    let y = frame.top;
    if (legend.title) {
      el('text', { x: fmt(x), y: fmt(y + fontSize), 'font-weight': 'bold' }, legend.title);
      y += fontSize + 8;
    }
    for (const entry of legend.entries) {
      el('rect', { x: fmt(x), y: fmt(y), width: String(fontSize), height: String(fontSize), fill: entry.color });
      el('text', { x: fmt(x + fontSize + 6), y: fmt(y + fontSize - 2) }, entry.label);
      y += fontSize + 6;
    }
  };

  for (const primitive of primitives) {
    switch (primitive.kind) {
      case 'band': drawBand(primitive); break;
      case 'bar': drawBar(primitive); break;
      case 'label': drawLabel(primitive); break;
      case 'axisTick': drawTick(primitive); break;
      case 'legend': drawLegend(primitive); break;
    }
  }

  return { svg: new XMLSerializer().serializeToString(doc), width, height };
}
