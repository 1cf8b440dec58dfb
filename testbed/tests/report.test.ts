import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import {
  buildCharts,
  ChartSpec,
  connectionCharts,
  ConnectionSeries,
  heatmapChart,
  histogramChart,
  loadConnectionSeries,
  writeCharts,
} from '../charts';
import { formatData } from '../format';
import { p2pRows, ParsedRows, summarizeResults } from '../parse';
import { writeJson } from '../paths';
import { escapeHtml, PLOTLY_CDN, renderReport, scriptJson, writeReport } from '../report';
import { CollectedResults } from '../types';
import { FIXED_NOW, memoryLogger, tcpDocument, tempDir } from './helpers';

const P2P_FILE = 'p2p_3.0.0.1_to_3.1.0.1_20240102_030405.json';

const collected: CollectedResults = {
  timestamp: FIXED_NOW.toISOString(),
  point_to_point_tests: [
    {
      file: P2P_FILE,
      source_region: 'us-east-1',
      target_region: 'eu-west-2',
      timestamp: FIXED_NOW.toISOString(),
      result: { status: 'success', protocol: 'TCP', bandwidthMbps: 500, transferMB: 625, durationSec: 10, retransmits: 3 },
    },
  ],
  udp_multicast_tests: [],
  latency_tests: [],
};

const rows: ParsedRows = { p2p: p2pRows(collected.point_to_point_tests), udp: [], latency: [] };

function series(protocol: 'TCP' | 'UDP', retransmits: number | null): ConnectionSeries {
  return {
    connection: protocol === 'UDP' ? 'eu-west-2 <- us-east-1' : 'us-east-1 -> eu-west-2',
    protocol,
    file: 'result.json',
    intervals: [
      { endSec: 1, bandwidthMbps: 100, retransmits, jitterMs: 0.1, lostPercent: 0 },
      { endSec: 2, bandwidthMbps: 300, retransmits, jitterMs: 0.2, lostPercent: 1 },
    ],
  };
}

describe('charts', () => {
  it('draws histogram bars at the bin centres with summary statistics', () => {
    const chart = histogramChart(
      'bandwidth',
      'Bandwidth',
      { counts: [1, 1, 2], binEdges: [1, 2, 3, 4] },
      [1, 2, 3, 4],
      'Bandwidth (Mbps)',
      'Mbps',
      '#4c72b0'
    );

    expect(chart).toMatchObject({ id: 'bandwidth', group: 'histogram', data: [{ type: 'bar', x: [1.5, 2.5, 3.5], y: [1, 1, 2], width: [1, 1, 1] }] });
    expect(chart?.layout.annotations?.[0]?.text).toBe(
      'Mean: 2.50 Mbps<br>Median: 2.50 Mbps<br>Min: 1.00 Mbps<br>Max: 4.00 Mbps'
    );
    expect(histogramChart('none', 'None', null, [], 'x', 'ms', '#000')).toBeNull();
  });

  it('labels every tested heatmap cell', () => {
    const chart = heatmapChart(
      'latency',
      'Latency',
      { regions: ['eu-west-2', 'us-east-1'], values: [[null, 72.26], [71.9, null]] },
      'Viridis',
      true,
      'ms'
    );

    expect(chart?.layout.annotations?.map((note) => [note.x, note.y, note.text])).toEqual([
      ['us-east-1', 'eu-west-2', '72.3'],
      ['eu-west-2', 'us-east-1', '71.9'],
    ]);
    expect(heatmapChart('empty', 'Empty', { regions: [], values: [] }, 'Viridis', false, 'ms')).toBeNull();
  });

  it('plots loss and jitter for UDP connections', () => {
    expect(connectionCharts(series('UDP', null)).map((chart) => chart.id)).toEqual([
      'udp-eu-west-2-us-east-1-bandwidth',
      'udp-eu-west-2-us-east-1-loss',
      'udp-eu-west-2-us-east-1-jitter',
      'udp-eu-west-2-us-east-1-distribution',
    ]);
  });

  it('plots retransmits for TCP only when there were any', () => {
    expect(connectionCharts(series('TCP', 0)).map((chart) => chart.id)).toEqual([
      'tcp-us-east-1-eu-west-2-bandwidth',
      'tcp-us-east-1-eu-west-2-distribution',
    ]);
    expect(connectionCharts(series('TCP', 2)).map((chart) => chart.id)).toContain('tcp-us-east-1-eu-west-2-retransmits');
    expect(connectionCharts({ ...series('TCP', 0), intervals: [] })).toEqual([]);
  });

  it('builds section and per-connection charts from the run data', async () => {
    const dataDir = await tempDir();
    await writeJson(path.join(dataDir, 'p2p', P2P_FILE), tcpDocument({ intervals: [400_000_000, 600_000_000] }));

    const loaded = await loadConnectionSeries(dataDir, collected);
    expect(loaded).toEqual([
      {
        connection: 'us-east-1 -> eu-west-2',
        protocol: 'TCP',
        file: P2P_FILE,
        intervals: [
          { endSec: 1, bandwidthMbps: 400, retransmits: 0, jitterMs: null, lostPercent: null },
          { endSec: 2, bandwidthMbps: 600, retransmits: 0, jitterMs: null, lostPercent: null },
        ],
      },
    ]);

    const charts = buildCharts(rows, formatData(rows, FIXED_NOW), loaded);
    expect(charts.map((chart) => chart.id)).toEqual([
      'p2p-bandwidth-histogram',
      'p2p-bandwidth-heatmap',
      'tcp-us-east-1-eu-west-2-bandwidth',
      'tcp-us-east-1-eu-west-2-distribution',
    ]);

    const outputDir = await tempDir();
    const file = await writeCharts(charts, outputDir, memoryLogger().log);
    const saved = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(path.basename(file)).toBe('charts.json');
    expect(saved.charts).toHaveLength(4);
  });

  it('keeps chart ids unique when a connection was tested twice', () => {
    const again = { ...series('TCP', 0), file: 'result-2.json' };
    const charts = buildCharts({ p2p: [], udp: [], latency: [] }, formatData({ p2p: [], udp: [], latency: [] }, FIXED_NOW), [
      series('TCP', 0),
      again,
    ]);

    expect(charts.map((chart) => chart.id)).toEqual([
      'tcp-us-east-1-eu-west-2-bandwidth',
      'tcp-us-east-1-eu-west-2-distribution',
      'tcp-us-east-1-eu-west-2-2-bandwidth',
      'tcp-us-east-1-eu-west-2-2-distribution',
    ]);

    const html = renderReport({
      summary: summarizeResults(collected, rows, FIXED_NOW),
      charts,
      regionNames: {},
      generatedAt: FIXED_NOW,
    });
    const ids = [...html.matchAll(/<div class="chart" id="([^"]+)"/g)].map((match) => match[1]);
    expect(new Set(ids).size).toBe(4);
    expect(ids).toHaveLength(4);
  });
});

describe('escaping', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
  });

  it('keeps embedded JSON from closing the script element', () => {
    expect(scriptJson({ title: '</script><script>alert(1)' })).toBe('{"title":"\\u003c/script>\\u003cscript>alert(1)"}');
    expect(scriptJson({ text: 'a\u2028b\u2029c' })).toBe('{"text":"a\\u2028b\\u2029c"}');
  });
});

describe('renderReport', () => {
  const summary = summarizeResults(collected, rows, FIXED_NOW);
  const regionNames = { 'us-east-1': 'US East (N. Virginia)', 'eu-west-2': 'Europe <London>' };
  const histogram: ChartSpec = {
    id: 'p2p-bandwidth-histogram',
    title: 'Point-to-point bandwidth',
    group: 'histogram',
    data: [{ type: 'bar', x: [500], y: [1] }],
    layout: {},
  };

  it('summarises each test type', () => {
    const html = renderReport({ summary, charts: [histogram], regionNames, generatedAt: FIXED_NOW });

    expect(html).toContain(`<script src="${PLOTLY_CDN}"></script>`);
    expect(html).toContain('<li>Regions: eu-west-2, us-east-1</li>');
    expect(html).toContain('<li>Point-to-point tests: 1 of 1 successful</li>');
    expect(html).toContain('<li>UDP tests: 0 of 0 successful</li>');
    expect(html).toContain(
      '<tr><td>us-east-1 (US East (N. Virginia))</td><td>eu-west-2 (Europe &lt;London&gt;)</td><td>1</td><td>500.00</td></tr>'
    );
    expect(html).toContain(
      '<tr><th>Bandwidth</th><td>0</td><td>&ndash; Mbps</td><td>&ndash; Mbps</td><td>&ndash; Mbps</td></tr>'
    );
    expect(html).toContain('<p class="empty">No successful tests.</p>');
    expect(html).toContain('<div class="chart" id="chart-p2p-bandwidth-histogram"></div>');
    expect(html).toContain('"id":"chart-p2p-bandwidth-histogram"');
    expect(html).not.toContain('Per-connection detail');
  });

  it('folds per-connection charts into expandable sections', () => {
    const html = renderReport({
      summary,
      charts: [histogram, ...connectionCharts(series('TCP', 0))],
      regionNames,
      generatedAt: FIXED_NOW,
    });

    expect(html).toContain('<h2>Per-connection detail</h2>');
    expect(html).toContain(
      '<details>\n<summary>us-east-1 -&gt; eu-west-2</summary>\n' +
        '<div class="chart" id="chart-tcp-us-east-1-eu-west-2-bandwidth"></div>\n' +
        '<div class="chart" id="chart-tcp-us-east-1-eu-west-2-distribution"></div>\n</details>'
    );
  });

  it('names the file after its generation time', async () => {
    const outputDir = await tempDir();
    const file = await writeReport({ summary, charts: [], regionNames, generatedAt: FIXED_NOW }, outputDir, memoryLogger().log);

    expect(path.basename(file)).toBe('network_benchmark_report_20240102_030405.html');
    expect(await fs.readFile(file, 'utf8')).toContain('<title>Network Benchmark Report</title>');
  });
});
