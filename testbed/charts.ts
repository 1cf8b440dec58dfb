/**
 * Chart definitions for the report, as Plotly figures (data + layout).
 *
 * Nothing is rendered here: the report page hands these to plotly.js in the
 * browser, and charts.json keeps them for anyone who wants to re-plot.
 */
import type { Annotations, Data, Layout } from 'plotly.js';
import fs from 'fs/promises';
import path from 'path';
import { listJsonFiles } from './collect';
import { Logger, logger } from './logger';
import { ParsedRows } from './parse';
import { writeJson } from './paths';
import { mean, median, numbers } from './stats';
import { parseIperf3Intervals, parseJson } from './tools';
import { CollectedResults, FormattedData, Histogram, Iperf3Interval, Iperf3Protocol, RegionMatrix } from './types';

export type ChartGroup = 'histogram' | 'heatmap' | 'interval' | 'distribution';

export interface ChartSpec {
  id: string;
  title: string;
  group: ChartGroup;
  // set for per-connection charts
  connection?: string;
  data: Data[];
  layout: Partial<Layout>;
}

export interface ConnectionSeries {
  connection: string;
  protocol: Iperf3Protocol;
  file: string;
  intervals: Iperf3Interval[];
}

const BASE_LAYOUT: Partial<Layout> = {
  margin: { l: 70, r: 30, t: 60, b: 70 },
  font: { family: 'Segoe UI, Helvetica, Arial, sans-serif', size: 12 },
};

const fixed = (value: number | null, digits = 2) => (value === null ? 'n/a' : value.toFixed(digits));

function statsAnnotation(values: number[], unit: string): Partial<Annotations> {
  const text = [
    `Mean: ${fixed(mean(values))} ${unit}`,
    `Median: ${fixed(median(values))} ${unit}`,
    `Min: ${fixed(Math.min(...values))} ${unit}`,
    `Max: ${fixed(Math.max(...values))} ${unit}`,
  ].join('<br>');
  return {
    xref: 'paper',
    yref: 'paper',
    x: 0.98,
    y: 0.98,
    xanchor: 'right',
    yanchor: 'top',
    align: 'left',
    showarrow: false,
    bordercolor: '#999',
    borderwidth: 1,
    bgcolor: 'rgba(255,255,255,0.85)',
    text,
  };
}

export function histogramChart(
  id: string,
  title: string,
  hist: Histogram | null,
  values: number[],
  axisTitle: string,
  unit: string,
  color: string
): ChartSpec | null {
  if (!hist || values.length === 0) return null;
  const centers = hist.counts.map((_, i) => (hist.binEdges[i] + hist.binEdges[i + 1]) / 2);
  const widths = hist.counts.map((_, i) => hist.binEdges[i + 1] - hist.binEdges[i]);
  return {
    id,
    title,
    group: 'histogram',
    data: [
      {
        type: 'bar',
        x: centers,
        y: hist.counts,
        width: widths,
        marker: { color, line: { color: '#333', width: 1 } },
        name: title,
      },
    ],
    layout: {
      ...BASE_LAYOUT,
      title: { text: title },
      xaxis: { title: { text: axisTitle } },
      yaxis: { title: { text: 'Count' } },
      bargap: 0,
      annotations: [statsAnnotation(values, unit)],
    },
  };
}

export function heatmapChart(
  id: string,
  title: string,
  matrix: RegionMatrix,
  colorscale: string,
  reverse: boolean,
  unit: string
): ChartSpec | null {
  if (matrix.regions.length === 0) return null;
  const annotations: Partial<Annotations>[] = [];
  matrix.values.forEach((row, i) => {
    row.forEach((value, j) => {
      if (value === null) return;
      annotations.push({
        x: matrix.regions[j],
        y: matrix.regions[i],
        text: value.toFixed(1),
        showarrow: false,
        font: { size: 11 },
      });
    });
  });
  return {
    id,
    title,
    group: 'heatmap',
    data: [
      {
        type: 'heatmap',
        x: matrix.regions,
        y: matrix.regions,
        z: matrix.values,
        colorscale,
        reversescale: reverse,
        hovertemplate: `%{y} -> %{x}: %{z:.2f} ${unit}<extra></extra>`,
      },
    ],
    layout: {
      ...BASE_LAYOUT,
      title: { text: title },
      xaxis: { title: { text: 'Target region' }, type: 'category' },
      yaxis: { title: { text: 'Source region' }, type: 'category', autorange: 'reversed' },
      annotations,
      margin: { l: 140, r: 30, t: 60, b: 120 },
    },
  };
}

function lineChart(id: string, title: string, series: ConnectionSeries, y: (number | null)[], axisTitle: string, color: string): ChartSpec {
  return {
    id,
    title,
    group: 'interval',
    connection: series.connection,
    data: [
      {
        type: 'scatter',
        mode: 'lines+markers',
        x: series.intervals.map((interval) => interval.endSec),
        y,
        line: { color },
        name: axisTitle,
      },
    ],
    layout: {
      ...BASE_LAYOUT,
      title: { text: title },
      xaxis: { title: { text: 'Time (s)' } },
      yaxis: { title: { text: axisTitle }, rangemode: 'tozero' },
    },
  };
}

const slug = (text: string) => text.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');

export function connectionKey(series: ConnectionSeries): string {
  return slug(`${series.protocol}-${series.connection}`);
}

/**
 * `key` must be unique within a report; it defaults to the protocol and connection.
 */
export function connectionCharts(series: ConnectionSeries, key: string = connectionKey(series)): ChartSpec[] {
  if (series.intervals.length === 0) return [];
  const bandwidth = series.intervals.map((interval) => interval.bandwidthMbps);
  const charts: ChartSpec[] = [
    lineChart(`${key}-bandwidth`, `${series.connection} bandwidth over time`, series, bandwidth, 'Bandwidth (Mbps)', '#1f77b4'),
  ];

  if (series.protocol === 'UDP') {
    charts.push(
      lineChart(
        `${key}-loss`,
        `${series.connection} packet loss over time`,
        series,
        series.intervals.map((interval) => interval.lostPercent),
        'Packet loss (%)',
        '#d62728'
      ),
      lineChart(
        `${key}-jitter`,
        `${series.connection} jitter over time`,
        series,
        series.intervals.map((interval) => interval.jitterMs),
        'Jitter (ms)',
        '#2ca02c'
      )
    );
  } else {
    const retransmits = series.intervals.map((interval) => interval.retransmits);
    if (numbers(retransmits).reduce((sum, value) => sum + value, 0) > 0) {
      charts.push(
        lineChart(`${key}-retransmits`, `${series.connection} retransmits over time`, series, retransmits, 'Retransmits', '#ff7f0e')
      );
    }
  }

  charts.push({
    id: `${key}-distribution`,
    title: `${series.connection} bandwidth distribution`,
    group: 'distribution',
    connection: series.connection,
    data: [{ type: 'histogram', x: bandwidth, nbinsx: 20, marker: { color: '#1f77b4' }, name: 'Bandwidth' }],
    layout: {
      ...BASE_LAYOUT,
      title: { text: `${series.connection} bandwidth distribution` },
      xaxis: { title: { text: 'Bandwidth (Mbps)' } },
      yaxis: { title: { text: 'Intervals' } },
      annotations: [statsAnnotation(bandwidth, 'Mbps')],
    },
  });
  return charts;
}

/**
 * Per-interval series of every successful iperf3 test under `dataDir`.
 */
export async function loadConnectionSeries(dataDir: string, collected: CollectedResults): Promise<ConnectionSeries[]> {
  const byName = new Map((await listJsonFiles(dataDir)).map((file): [string, string] => [path.basename(file), file]));
  const series: ConnectionSeries[] = [];

  const tests = [
    ...collected.point_to_point_tests.map((test) => ({ test, arrow: '->' })),
    ...collected.udp_multicast_tests.map((test) => ({ test, arrow: '<-' })),
  ];
  for (const { test, arrow } of tests) {
    const file = byName.get(test.file);
    if (!file || test.result.status !== 'success') continue;
    const intervals = parseIperf3Intervals(parseJson(await fs.readFile(file, 'utf8')));
    series.push({
      connection: `${test.source_region ?? 'unknown'} ${arrow} ${test.target_region ?? 'unknown'}`,
      protocol: test.result.protocol,
      file: test.file,
      intervals,
    });
  }
  return series;
}

export function buildCharts(rows: ParsedRows, formatted: FormattedData, series: ConnectionSeries[]): ChartSpec[] {
  const p2pBandwidth = rows.p2p.map((row) => row.bandwidth_mbps);
  const udpBandwidth = rows.udp.map((row) => row.bandwidth_mbps);
  const udpLoss = numbers(rows.udp.map((row) => row.lost_percent));
  const udpJitter = numbers(rows.udp.map((row) => row.jitter_ms));
  const latency = numbers(rows.latency.map((row) => row.avg_latency_ms));
  const { histograms, matrices } = formatted;

  const charts = [
    histogramChart('p2p-bandwidth-histogram', 'Point-to-point bandwidth', histograms.p2p_bandwidth, p2pBandwidth, 'Bandwidth (Mbps)', 'Mbps', '#4c72b0'),
    histogramChart('udp-bandwidth-histogram', 'UDP bandwidth', histograms.udp_bandwidth, udpBandwidth, 'Bandwidth (Mbps)', 'Mbps', '#55a868'),
    histogramChart('udp-loss-histogram', 'UDP packet loss', histograms.udp_loss, udpLoss, 'Packet loss (%)', '%', '#c44e52'),
    histogramChart('udp-jitter-histogram', 'UDP jitter', histograms.udp_jitter, udpJitter, 'Jitter (ms)', 'ms', '#8172b2'),
    histogramChart('latency-histogram', 'Average latency', histograms.latency, latency, 'Latency (ms)', 'ms', '#ccb974'),
    heatmapChart('p2p-bandwidth-heatmap', 'Point-to-point bandwidth by region (Mbps)', matrices.p2p_bandwidth, 'YlGnBu', false, 'Mbps'),
    heatmapChart('udp-bandwidth-heatmap', 'UDP bandwidth by region (Mbps)', matrices.udp_bandwidth, 'YlGnBu', false, 'Mbps'),
    heatmapChart('udp-loss-heatmap', 'UDP packet loss by region (%)', matrices.udp_loss, 'Reds', false, '%'),
    heatmapChart('latency-heatmap', 'Average latency by region (ms)', matrices.latency, 'Viridis', true, 'ms'),
  ].filter((chart): chart is ChartSpec => chart !== null);

  // repeated tests of one connection get -2, -3, ...
  const seen = new Map<string, number>();
  for (const connection of series) {
    const base = connectionKey(connection);
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    charts.push(...connectionCharts(connection, count > 1 ? `${base}-${count}` : base));
  }
  return charts;
}

export const CHARTS_FILE = 'charts.json';

export async function writeCharts(charts: ChartSpec[], outputDir: string, log: Logger = logger): Promise<string> {
  const file = path.join(outputDir, CHARTS_FILE);
  await writeJson(file, { generated: new Date().toISOString(), charts });
  log.info(`${charts.length} chart(s) written to ${file}`);
  return file;
}
