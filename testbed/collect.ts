import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage, PipelineError } from './errors';
import { Logger, logger } from './logger';
import { pathExists, writeJson } from './paths';
import { parseIperf3Result, parseJson } from './tools';
import { CollectedLatencyTest, CollectedResults, CollectedTest } from './types';

const p2pSummarySchema = z.object({
  tests: z.array(
    z.object({
      timestamp: z.string().optional(),
      source_region: z.string(),
      target_region: z.string(),
      result_file: z.string().nullable(),
    })
  ),
});

const udpSummarySchema = z.object({
  timestamp: z.string().optional(),
  ip_to_region_map: z.record(z.string(), z.string()).default({}),
  results: z
    .array(
      z.object({
        server_region: z.string(),
        client_region: z.string(),
        result_file: z.string().nullable(),
      })
    )
    .default([]),
});

const latencyFileSchema = z.object({
  source_region: z.string(),
  target_region: z.string(),
  timestamp: z.string(),
  stats: z.object({
    packetsTransmitted: z.number().nullable(),
    packetsReceived: z.number().nullable(),
    packetLossPercent: z.number().nullable(),
    minMs: z.number().nullable(),
    avgMs: z.number().nullable(),
    maxMs: z.number().nullable(),
    mdevMs: z.number().nullable(),
  }),
});

const iperf3Meta = z
  .object({
    start: z.object({ timestamp: z.object({ timesecs: z.number() }).passthrough().optional() }).passthrough().optional(),
    server_region: z.string().optional(),
    client_region: z.string().optional(),
  })
  .passthrough();

interface RegionInfo {
  source_region: string;
  target_region: string;
  timestamp?: string;
}

export async function listJsonFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listJsonFiles(full)));
    else if (entry.isFile() && entry.name.endsWith('.json')) files.push(full);
  }
  return files.sort();
}

// <prefix>_<ip>_to_<ip>_<yyyymmdd>_<hhmmss>.json
export function ipsFromFileName(fileName: string): { from: string; to: string } | null {
  const match = fileName.match(/_([\d.a-fA-F:]+)_to_([\d.a-fA-F:]+)_\d{8}_\d{6}\.json$/);
  return match ? { from: match[1], to: match[2] } : null;
}

async function readJsonFile(file: string): Promise<unknown> {
  return parseJson(await fs.readFile(file, 'utf8'));
}

function iperf3Timestamp(doc: unknown): string | null {
  const meta = iperf3Meta.safeParse(doc);
  const secs = meta.success ? meta.data.start?.timestamp?.timesecs : undefined;
  return secs === undefined ? null : new Date(secs * 1000).toISOString();
}

export function classify(fileName: string): 'p2p-summary' | 'udp-summary' | 'p2p' | 'udp' | 'latency' | null {
  if (fileName.startsWith('p2p_test_summary_')) return 'p2p-summary';
  if (fileName.startsWith('udp_multicast_summary_')) return 'udp-summary';
  if (fileName.startsWith('p2p_')) return 'p2p';
  if (fileName.startsWith('udp_multicast_')) return 'udp';
  if (fileName.startsWith('latency_')) return 'latency';
  return null;
}

/**
 * Gathers every raw result file under `dataDir` into one document.
 */
export async function collectResults(dataDir: string, log: Logger = logger): Promise<CollectedResults> {
  if (!(await pathExists(dataDir))) {
    throw new PipelineError('collect', `Data directory ${dataDir} does not exist`);
  }
  const files = await listJsonFiles(dataDir);
  const byKind = (kind: ReturnType<typeof classify>) => files.filter((file) => classify(path.basename(file)) === kind);

  const ipToRegion: Record<string, string> = {};
  const udpRegions = new Map<string, RegionInfo>();
  for (const file of byKind('udp-summary')) {
    const summary = udpSummarySchema.safeParse(await readJsonFile(file));
    if (!summary.success) {
      log.warn(`Skipping malformed UDP summary ${path.basename(file)}`);
      continue;
    }
    Object.assign(ipToRegion, summary.data.ip_to_region_map);
    for (const result of summary.data.results) {
      if (result.result_file) {
        udpRegions.set(result.result_file, {
          source_region: result.server_region,
          target_region: result.client_region,
          timestamp: summary.data.timestamp,
        });
      }
    }
  }

  const p2pRegions = new Map<string, RegionInfo>();
  for (const file of byKind('p2p-summary')) {
    const summary = p2pSummarySchema.safeParse(await readJsonFile(file));
    if (!summary.success) {
      log.warn(`Skipping malformed point-to-point summary ${path.basename(file)}`);
      continue;
    }
    for (const test of summary.data.tests) {
      if (test.result_file) p2pRegions.set(path.basename(test.result_file), test);
    }
  }

  const fromIps = (fileName: string): Partial<RegionInfo> => {
    const ips = ipsFromFileName(fileName);
    if (!ips) return {};
    return { source_region: ipToRegion[ips.from], target_region: ipToRegion[ips.to] };
  };

  const point_to_point_tests: CollectedTest[] = [];
  for (const file of byKind('p2p')) {
    const fileName = path.basename(file);
    const doc = await readJsonFile(file);
    const regions = p2pRegions.get(fileName) ?? fromIps(fileName);
    point_to_point_tests.push({
      file: fileName,
      source_region: regions.source_region ?? null,
      target_region: regions.target_region ?? null,
      timestamp: iperf3Timestamp(doc) ?? regions.timestamp ?? null,
      result: doc === undefined ? { status: 'error', error: 'File is not valid JSON' } : parseIperf3Result(doc),
    });
  }

  const udp_multicast_tests: CollectedTest[] = [];
  for (const file of byKind('udp')) {
    const fileName = path.basename(file);
    const doc = await readJsonFile(file);
    const meta = iperf3Meta.safeParse(doc);
    const fromSummary = udpRegions.get(fileName);
    const fromName = fromIps(fileName);
    udp_multicast_tests.push({
      file: fileName,
      source_region: (meta.success ? meta.data.server_region : undefined) ?? fromSummary?.source_region ?? fromName.source_region ?? null,
      target_region: (meta.success ? meta.data.client_region : undefined) ?? fromSummary?.target_region ?? fromName.target_region ?? null,
      timestamp: iperf3Timestamp(doc) ?? fromSummary?.timestamp ?? null,
      result: doc === undefined ? { status: 'error', error: 'File is not valid JSON' } : parseIperf3Result(doc),
    });
  }

  const latency_tests: CollectedLatencyTest[] = [];
  for (const file of byKind('latency')) {
    const fileName = path.basename(file);
    try {
      const test = latencyFileSchema.parse(await readJsonFile(file));
      const ok = test.stats.packetsTransmitted !== null;
      latency_tests.push({
        file: fileName,
        source_region: test.source_region,
        target_region: test.target_region,
        timestamp: test.timestamp,
        status: ok ? 'success' : 'error',
        stats: test.stats,
        ...(ok ? {} : { error: 'No ping summary in output' }),
      });
    } catch (error) {
      log.warn(`Malformed latency file ${fileName}: ${errorMessage(error)}`);
      latency_tests.push({
        file: fileName,
        source_region: 'unknown',
        target_region: 'unknown',
        timestamp: '',
        status: 'error',
        stats: null,
        error: errorMessage(error),
      });
    }
  }

  log.info(
    `Collected ${point_to_point_tests.length} point-to-point, ${udp_multicast_tests.length} UDP and ${latency_tests.length} latency results`
  );
  return {
    timestamp: new Date().toISOString(),
    point_to_point_tests,
    udp_multicast_tests,
    latency_tests,
  };
}

export async function writeCollectedResults(results: CollectedResults, outputFile: string): Promise<void> {
  await writeJson(outputFile, results);
}
