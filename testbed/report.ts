import fs from 'fs/promises';
import path from 'path';
import { ChartSpec } from './charts';
import { describeRegion } from './inventory';
import { Logger, logger } from './logger';
import { fileTimestamp } from './paths';
import { RegionPairStats, ResultsSummary, ValueStats } from './types';

export const PLOTLY_CDN = 'https://cdn.plot.ly/plotly-2.35.2.min.js';

export interface ReportInput {
  summary: ResultsSummary;
  charts: ChartSpec[];
  regionNames: Record<string, string>;
  generatedAt?: Date;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

// JSON that is safe inside a <script> element
export function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c').replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');
}

const cell = (value: number | null | undefined, digits = 2) =>
  value === null || value === undefined ? '&ndash;' : escapeHtml(value.toFixed(digits));

function statsRow(label: string, stats: ValueStats, unit: string): string {
  return (
    `<tr><th>${escapeHtml(label)}</th><td>${stats.count}</td>` +
    `<td>${cell(stats.avg)} ${escapeHtml(unit)}</td><td>${cell(stats.min)} ${escapeHtml(unit)}</td>` +
    `<td>${cell(stats.max)} ${escapeHtml(unit)}</td></tr>`
  );
}

function statsTable(rows: string[]): string {
  return [
    '<table class="stats">',
    '<thead><tr><th>Metric</th><th>Samples</th><th>Average</th><th>Min</th><th>Max</th></tr></thead>',
    `<tbody>${rows.join('')}</tbody>`,
    '</table>',
  ].join('\n');
}

type PairColumn = [keyof RegionPairStats, string];

function pairTable(pairs: RegionPairStats[], columns: PairColumn[], names: Record<string, string>, labels: [string, string]): string {
  if (pairs.length === 0) return '<p class="empty">No successful tests.</p>';
  const head = [labels[0], labels[1], 'Tests', ...columns.map(([, title]) => title)].map((title) => `<th>${escapeHtml(title)}</th>`);
  const body = pairs.map((pair) => {
    const cells = columns.map(([key]) => {
      const value = pair[key];
      return `<td>${typeof value === 'number' ? cell(value) : '&ndash;'}</td>`;
    });
    return (
      `<tr><td>${escapeHtml(describeRegion(pair.source_region, names))}</td>` +
      `<td>${escapeHtml(describeRegion(pair.target_region, names))}</td>` +
      `<td>${pair.tests}</td>${cells.join('')}</tr>`
    );
  });
  return `<table class="pairs">\n<thead><tr>${head.join('')}</tr></thead>\n<tbody>\n${body.join('\n')}\n</tbody>\n</table>`;
}

function chartDiv(chart: ChartSpec): string {
  return `<div class="chart" id="chart-${escapeHtml(chart.id)}"></div>`;
}

function sectionCharts(charts: ChartSpec[], ids: string[]): string {
  return charts
    .filter((chart) => ids.includes(chart.id))
    .map(chartDiv)
    .join('\n');
}

function connectionSections(charts: ChartSpec[]): string {
  const byConnection = new Map<string, ChartSpec[]>();
  for (const chart of charts) {
    if (!chart.connection) continue;
    const list = byConnection.get(chart.connection) ?? [];
    list.push(chart);
    byConnection.set(chart.connection, list);
  }
  if (byConnection.size === 0) return '';
  const sections = [...byConnection.entries()].map(
    ([connection, list]) =>
      `<details>\n<summary>${escapeHtml(connection)}</summary>\n${list.map(chartDiv).join('\n')}\n</details>`
  );
  return `<h2>Per-connection detail</h2>\n${sections.join('\n')}`;
}

const STYLE = `
body { font-family: 'Segoe UI', Helvetica, Arial, sans-serif; margin: 2em auto; max-width: 1200px; color: #222; }
h1 { border-bottom: 2px solid #4c72b0; padding-bottom: 0.3em; }
.summary { background: #f4f7fb; border: 1px solid #d5deea; border-radius: 6px; padding: 1em 1.5em; }
table { border-collapse: collapse; margin: 1em 0; }
th, td { border: 1px solid #ccc; padding: 0.35em 0.8em; text-align: left; }
thead th { background: #eef2f7; }
.chart { width: 100%; height: 480px; margin: 1em 0; }
details { margin: 0.5em 0; border: 1px solid #ddd; border-radius: 4px; padding: 0.5em 1em; }
summary { cursor: pointer; font-weight: 600; }
.empty { color: #777; }
`;

/**
 * Self-contained report page. Charts are drawn in the browser by plotly.js.
 */
export function renderReport({ summary, charts, regionNames, generatedAt = new Date() }: ReportInput): string {
  const { point_to_point: p2p, udp_multicast: udp, latency } = summary;
  const regions = new Set(
    [...p2p.region_pairs, ...udp.region_pairs, ...latency.region_pairs].flatMap((pair) => [pair.source_region, pair.target_region])
  );

  const body = [
    `<h1>Network Benchmark Report</h1>`,
    `<p>Generated ${escapeHtml(generatedAt.toISOString())} from results of ${escapeHtml(summary.timestamp)}</p>`,
    '<div class="summary">',
    '<h2>Summary</h2>',
    '<ul>',
    `<li>Regions: ${escapeHtml([...regions].sort().join(', ') || 'none')}</li>`,
    `<li>Point-to-point tests: ${p2p.successful_tests} of ${p2p.total_tests} successful</li>`,
    `<li>UDP tests: ${udp.successful_tests} of ${udp.total_tests} successful</li>`,
    `<li>Latency tests: ${latency.successful_tests} of ${latency.total_tests} successful</li>`,
    '</ul>',
    '</div>',

    '<h2>Point-to-point TCP</h2>',
    statsTable([statsRow('Bandwidth', p2p.bandwidth_mbps, 'Mbps')]),
    pairTable(p2p.region_pairs, [['avg_bandwidth_mbps', 'Avg bandwidth (Mbps)']], regionNames, ['Source', 'Target']),
    sectionCharts(charts, ['p2p-bandwidth-histogram', 'p2p-bandwidth-heatmap']),

    '<h2>One-to-many UDP</h2>',
    statsTable([
      statsRow('Bandwidth', udp.bandwidth_mbps, 'Mbps'),
      statsRow('Jitter', udp.jitter_ms, 'ms'),
      statsRow('Packet loss', udp.lost_percent, '%'),
    ]),
    pairTable(
      udp.region_pairs,
      [
        ['avg_bandwidth_mbps', 'Avg bandwidth (Mbps)'],
        ['avg_lost_percent', 'Avg loss (%)'],
        ['avg_jitter_ms', 'Avg jitter (ms)'],
      ],
      regionNames,
      ['Server', 'Client']
    ),
    sectionCharts(charts, ['udp-bandwidth-histogram', 'udp-loss-histogram', 'udp-jitter-histogram', 'udp-bandwidth-heatmap', 'udp-loss-heatmap']),

    '<h2>Latency</h2>',
    statsTable([
      statsRow('Average RTT', latency.avg_latency_ms, 'ms'),
      statsRow('Packet loss', latency.packet_loss_percent, '%'),
    ]),
    pairTable(
      latency.region_pairs,
      [
        ['avg_latency_ms', 'Avg RTT (ms)'],
        ['avg_lost_percent', 'Avg loss (%)'],
      ],
      regionNames,
      ['Source', 'Target']
    ),
    sectionCharts(charts, ['latency-histogram', 'latency-heatmap']),

    connectionSections(charts),
  ];

  const figures = charts.map((chart) => ({ id: `chart-${chart.id}`, data: chart.data, layout: chart.layout }));

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Network Benchmark Report</title>
<script src="${PLOTLY_CDN}"></script>
<style>${STYLE}</style>
</head>
<body>
${body.filter((part) => part !== '').join('\n')}
<script>
const figures = ${scriptJson(figures)};
for (const figure of figures) {
  const el = document.getElementById(figure.id);
  if (el) Plotly.newPlot(el, figure.data, figure.layout, { responsive: true });
}
for (const details of document.querySelectorAll('details')) {
  details.addEventListener('toggle', () => {
    for (const el of details.querySelectorAll('.chart')) Plotly.Plots.resize(el);
  });
}
</script>
</body>
</html>
`;
}

export async function writeReport(input: ReportInput, outputDir: string, log: Logger = logger): Promise<string> {
  const generatedAt = input.generatedAt ?? new Date();
  const file = path.join(outputDir, `network_benchmark_report_${fileTimestamp(generatedAt)}.html`);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(file, renderReport({ ...input, generatedAt }));
  log.success(`Report written to ${file}`);
  return file;
}
