import fs from 'fs/promises';
import path from 'path';
import { writeCsv } from './csv';
import { errorMessage } from './errors';
import { planPairs, TestContext } from './pairs';
import { fileTimestamp, writeJson } from './paths';
import { PingTool } from './tools';
import { InstanceInfo, LatencyRow, LatencyTestFile, StageError } from './types';

export const LATENCY_COLUMNS: (keyof LatencyRow & string)[] = [
  'source_region',
  'target_region',
  'min_latency_ms',
  'avg_latency_ms',
  'max_latency_ms',
  'mdev_ms',
  'packet_loss_percent',
  'timestamp',
  'file',
];

// ping interval in seconds; below 0.2 needs root
const PING_INTERVAL = '0.2';

export interface LatencyOptions {
  outputDir: string;
  pingCount: number;
  usePrivateIp: boolean;
  intraRegion: boolean;
}

export interface LatencyRun {
  files: string[];
  rows: LatencyRow[];
  errors: StageError[];
}

export function latencyRow(test: LatencyTestFile, file: string): LatencyRow {
  return {
    source_region: test.source_region,
    target_region: test.target_region,
    min_latency_ms: test.stats.minMs,
    avg_latency_ms: test.stats.avgMs,
    max_latency_ms: test.stats.maxMs,
    mdev_ms: test.stats.mdevMs,
    packet_loss_percent: test.stats.packetLossPercent,
    timestamp: test.timestamp,
    file,
  };
}

export async function runLatencyTests(info: InstanceInfo, options: LatencyOptions, ctx: TestContext): Promise<LatencyRun> {
  const now = ctx.now ?? (() => new Date());
  const ping = new PingTool();
  const pairs = planPairs(info, options);
  const run: LatencyRun = { files: [], rows: [], errors: [] };
  await fs.mkdir(options.outputDir, { recursive: true });

  if (pairs.length === 0) {
    ctx.log.warn('No host pairs to ping; latency tests need at least two hosts');
    return run;
  }

  for (const { source, target } of pairs) {
    ctx.log.info(`Latency ${source.label} -> ${target.label}`);
    try {
      const session = ctx.sessions(source.sshHost);
      // ping exits non-zero when replies are lost; the summary is still printed
      const result = await session.runTool(ping, `ping -c ${options.pingCount} -i ${PING_INTERVAL} ${target.ip}`, {
        allowFailure: true,
      });
      if (result.parsed.packetsTransmitted === null) {
        throw new Error(`ping produced no summary (exit code ${result.code})`);
      }

      const startedAt = now();
      const test: LatencyTestFile = {
        source_ip: source.ip,
        source_region: source.label,
        target_ip: target.ip,
        target_region: target.label,
        timestamp: startedAt.toISOString(),
        ping_count: options.pingCount,
        stats: result.parsed,
        raw_output: result.rawOutput,
      };
      const file = path.join(options.outputDir, `latency_${source.ip}_to_${target.ip}_${fileTimestamp(startedAt)}.json`);
      await writeJson(file, test);
      run.files.push(file);
      run.rows.push(latencyRow(test, path.basename(file)));

      const avg = test.stats.avgMs === null ? 'n/a' : `${test.stats.avgMs} ms`;
      ctx.log.success(`${source.label} -> ${target.label}: avg ${avg}, loss ${test.stats.packetLossPercent}%`);
    } catch (error) {
      ctx.log.error(`Latency ${source.label} -> ${target.label} failed: ${errorMessage(error)}`);
      run.errors.push({ stage: 'latency', error: `${source.label} -> ${target.label}: ${errorMessage(error)}` });
    }
  }

  if (run.rows.length > 0) {
    const csvFile = path.join(options.outputDir, `latency_results_${fileTimestamp(now())}.csv`);
    await writeCsv(csvFile, LATENCY_COLUMNS, run.rows);
    ctx.log.info(`Latency summary written to ${csvFile}`);
  }
  return run;
}
