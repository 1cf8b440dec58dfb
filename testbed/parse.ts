import path from 'path';
import { writeCsv } from './csv';
import { LATENCY_COLUMNS } from './latency';
import { Logger, logger } from './logger';
import { writeJson } from './paths';
import { groupBy, mean, numbers, valueStats } from './stats';
import {
  CollectedResults,
  CollectedTest,
  LatencyRow,
  P2PRow,
  RegionPairStats,
  ResultsSummary,
  UdpRow,
} from './types';

export const P2P_COLUMNS: (keyof P2PRow & string)[] = [
  'source_region',
  'target_region',
  'protocol',
  'bandwidth_mbps',
  'transfer_mb',
  'duration_sec',
  'retransmits',
  'jitter_ms',
  'lost_packets',
  'lost_percent',
  'timestamp',
  'file',
];

export const UDP_COLUMNS: (keyof UdpRow & string)[] = [
  'server_region',
  'client_region',
  'protocol',
  'bandwidth_mbps',
  'transfer_mb',
  'duration_sec',
  'jitter_ms',
  'lost_packets',
  'packets',
  'lost_percent',
  'timestamp',
  'file',
];

export interface ParsedRows {
  p2p: P2PRow[];
  udp: UdpRow[];
  latency: LatencyRow[];
}

export function p2pRows(tests: CollectedTest[]): P2PRow[] {
  const rows: P2PRow[] = [];
  for (const test of tests) {
    const result = test.result;
    if (result.status !== 'success') continue;
    rows.push({
      source_region: test.source_region ?? 'unknown',
      target_region: test.target_region ?? 'unknown',
      protocol: result.protocol,
      bandwidth_mbps: result.bandwidthMbps,
      transfer_mb: result.transferMB,
      duration_sec: result.durationSec,
      retransmits: result.protocol === 'TCP' ? result.retransmits ?? 0 : null,
      jitter_ms: result.protocol === 'UDP' ? result.jitterMs : null,
      lost_packets: result.protocol === 'UDP' ? result.lostPackets : null,
      lost_percent: result.protocol === 'UDP' ? result.lostPercent : null,
      timestamp: test.timestamp ?? '',
      file: test.file,
    });
  }
  return rows;
}

export function udpRows(tests: CollectedTest[]): UdpRow[] {
  const rows: UdpRow[] = [];
  for (const test of tests) {
    const result = test.result;
    if (result.status !== 'success') continue;
    rows.push({
      server_region: test.source_region ?? 'unknown',
      client_region: test.target_region ?? 'unknown',
      protocol: result.protocol,
      bandwidth_mbps: result.bandwidthMbps,
      transfer_mb: result.transferMB,
      duration_sec: result.durationSec,
      jitter_ms: result.protocol === 'UDP' ? result.jitterMs : null,
      lost_packets: result.protocol === 'UDP' ? result.lostPackets : null,
      packets: result.protocol === 'UDP' ? result.packets : null,
      lost_percent: result.protocol === 'UDP' ? result.lostPercent : null,
      timestamp: test.timestamp ?? '',
      file: test.file,
    });
  }
  return rows;
}

export function latencyRows(collected: CollectedResults): LatencyRow[] {
  return collected.latency_tests
    .filter((test) => test.status === 'success' && test.stats !== null)
    .map((test) => ({
      source_region: test.source_region,
      target_region: test.target_region,
      min_latency_ms: test.stats?.minMs ?? null,
      avg_latency_ms: test.stats?.avgMs ?? null,
      max_latency_ms: test.stats?.maxMs ?? null,
      mdev_ms: test.stats?.mdevMs ?? null,
      packet_loss_percent: test.stats?.packetLossPercent ?? null,
      timestamp: test.timestamp,
      file: test.file,
    }));
}

type PairMetric = 'avg_bandwidth_mbps' | 'avg_lost_percent' | 'avg_jitter_ms' | 'avg_latency_ms';

const PAIR_METRICS: PairMetric[] = ['avg_bandwidth_mbps', 'avg_lost_percent', 'avg_jitter_ms', 'avg_latency_ms'];

/**
 * Per (source, target) averages, ordered by source then target.
 */
export function regionPairStats<T>(
  rows: T[],
  pair: (row: T) => [string, string],
  metrics: Partial<Record<PairMetric, (row: T) => number | null>>
): RegionPairStats[] {
  const groups = groupBy(rows, (row) => pair(row).join('\u0000'));
  const stats: RegionPairStats[] = [];
  for (const group of groups.values()) {
    const [source_region, target_region] = pair(group[0]);
    const entry: RegionPairStats = { source_region, target_region, tests: group.length };
    for (const name of PAIR_METRICS) {
      const metric = metrics[name];
      if (metric) entry[name] = mean(numbers(group.map(metric)));
    }
    stats.push(entry);
  }
  return stats.sort(
    (a, b) => a.source_region.localeCompare(b.source_region) || a.target_region.localeCompare(b.target_region)
  );
}

export function summarizeResults(collected: CollectedResults, rows: ParsedRows, now: Date = new Date()): ResultsSummary {
  return {
    timestamp: now.toISOString(),
    point_to_point: {
      total_tests: collected.point_to_point_tests.length,
      successful_tests: rows.p2p.length,
      bandwidth_mbps: valueStats(rows.p2p.map((row) => row.bandwidth_mbps)),
      region_pairs: regionPairStats(rows.p2p, (row) => [row.source_region, row.target_region], {
        avg_bandwidth_mbps: (row) => row.bandwidth_mbps,
      }),
    },
    udp_multicast: {
      total_tests: collected.udp_multicast_tests.length,
      successful_tests: rows.udp.length,
      bandwidth_mbps: valueStats(rows.udp.map((row) => row.bandwidth_mbps)),
      jitter_ms: valueStats(numbers(rows.udp.map((row) => row.jitter_ms))),
      lost_percent: valueStats(numbers(rows.udp.map((row) => row.lost_percent))),
      region_pairs: regionPairStats(rows.udp, (row) => [row.server_region, row.client_region], {
        avg_bandwidth_mbps: (row) => row.bandwidth_mbps,
        avg_lost_percent: (row) => row.lost_percent,
        avg_jitter_ms: (row) => row.jitter_ms,
      }),
    },
    latency: {
      total_tests: collected.latency_tests.length,
      successful_tests: rows.latency.length,
      avg_latency_ms: valueStats(numbers(rows.latency.map((row) => row.avg_latency_ms))),
      packet_loss_percent: valueStats(numbers(rows.latency.map((row) => row.packet_loss_percent))),
      region_pairs: regionPairStats(rows.latency, (row) => [row.source_region, row.target_region], {
        avg_latency_ms: (row) => row.avg_latency_ms,
        avg_lost_percent: (row) => row.packet_loss_percent,
      }),
    },
  };
}

export const SUMMARY_FILE = 'results_summary.json';

export interface ParseOutput {
  rows: ParsedRows;
  summary: ResultsSummary;
  files: string[];
}

/**
 * Turns collected results into CSV tables and a summary in `outputDir`.
 */
export async function parseResults(collected: CollectedResults, outputDir: string, log: Logger = logger): Promise<ParseOutput> {
  const rows: ParsedRows = {
    p2p: p2pRows(collected.point_to_point_tests),
    udp: udpRows(collected.udp_multicast_tests),
    latency: latencyRows(collected),
  };
  const files: string[] = [];

  async function writeTable<T extends object>(label: string, fileName: string, columns: (keyof T & string)[], table: T[]) {
    if (table.length === 0) {
      log.info(`No successful ${label} results`);
      return;
    }
    const filePath = path.join(outputDir, fileName);
    await writeCsv(filePath, columns, table);
    files.push(filePath);
    log.info(`${table.length} ${label} result(s) saved to ${fileName}`);
  }

  await writeTable('point-to-point', 'p2p_results.csv', P2P_COLUMNS, rows.p2p);
  await writeTable('UDP', 'udp_results.csv', UDP_COLUMNS, rows.udp);
  await writeTable('latency', 'latency_results.csv', LATENCY_COLUMNS, rows.latency);

  const summary = summarizeResults(collected, rows);
  const summaryFile = path.join(outputDir, SUMMARY_FILE);
  await writeJson(summaryFile, summary);
  files.push(summaryFile);
  return { rows, summary, files };
}
