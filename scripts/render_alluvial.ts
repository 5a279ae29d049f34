#!/usr/bin/env tsx
import { readFile, writeFile } from 'node:fs/promises';
import { readLinkTable, readNodeTable } from '@/lib/alluvial/tables';
import { buildAlluvial } from '@/lib/pipeline/build';
import { renderSvg } from '@/lib/export/svg';

const USAGE =
  'Usage: npm run render -- <nodes.csv> <links.csv> [--stat=percent|count] [--interpolation=cosine|linear] ' +
  '[--labels=yes|no] [--bar-width=0.25] [--title=Legend] [--out=chart.svg]';

function flag(args: string[], name: string): string | undefined {
  const hit = args.find((arg) => arg.startsWith(`--${name}=`));
  return hit ? hit.slice(name.length + 3) : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const [nodesPath, linksPath] = args.filter((arg) => !arg.startsWith('--'));
  if (!nodesPath || !linksPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const nodes = readNodeTable(await readFile(nodesPath, 'utf8'));
  const links = readLinkTable(await readFile(linksPath, 'utf8'));

  const options: Record<string, unknown> = {};
  const stat = flag(args, 'stat');
  const interpolation = flag(args, 'interpolation');
  const labels = flag(args, 'labels');
  const barWidth = flag(args, 'bar-width');
  const title = flag(args, 'title');
  if (stat) options.stat = stat;
  if (interpolation) options.interpolation = interpolation;
  if (labels) options.showDataLabels = labels;
  if (barWidth) options.barWidth = Number(barWidth);
  if (title) options.legendTitle = title;

  // option values are checked by the layout validator
  const result = buildAlluvial(nodes, links, options);
  if (!result.ok) {
    console.error(`${result.code}: ${result.error}`);
    process.exit(2);
  }

  const { svg, width, height } = renderSvg(result.primitives);
  const out = flag(args, 'out');
  if (out) {
    await writeFile(out, svg, 'utf8');
    console.error(`Wrote ${out} (${width}x${height}, ${result.primitives.length} primitives)`);
  } else {
    console.log(svg);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
