import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from './errors';
import { allEndpoints, planPairs, TestContext } from './pairs';
import { fileTimestamp, writeJson } from './paths';
import { round } from './stats';
import { Iperf3Tool, parseIperf3Result } from './tools';
import { InstanceInfo, P2PSummaryFile, P2PTestRecord, StageError } from './types';

const MEGABIT = 1_000_000;
const SERVER_START_DELAY_MS = 2000;

export const ENSURE_SERVER = 'pgrep -x iperf3 >/dev/null || iperf3 -s -D';
export const RESTART_SERVICE = 'sudo pkill -x iperf3; sudo systemctl restart iperf3';

export interface P2POptions {
  outputDir: string;
  durationSec: number;
  parallel: number;
  usePrivateIp: boolean;
  intraRegion: boolean;
}

export interface P2PRun {
  records: P2PTestRecord[];
  summaryFile: string;
  errors: StageError[];
}

/**
 * Restarts the iperf3 service everywhere so no test daemon outlives the run.
 */
export async function resetIperf3Servers(hosts: string[], ctx: TestContext): Promise<void> {
  for (const host of new Set(hosts)) {
    try {
      await ctx.sessions(host).exec(RESTART_SERVICE, { allowFailure: true });
    } catch (error) {
      ctx.log.warn(`Could not reset iperf3 on ${host}: ${errorMessage(error)}`);
    }
  }
}

export async function runPointToPointTests(info: InstanceInfo, options: P2POptions, ctx: TestContext): Promise<P2PRun> {
  const now = ctx.now ?? (() => new Date());
  const iperf3 = new Iperf3Tool();
  const pairs = planPairs(info, options);
  const records: P2PTestRecord[] = [];
  const errors: StageError[] = [];
  await fs.mkdir(options.outputDir, { recursive: true });

  try {
    for (const { source, target } of pairs) {
      const startedAt = now();
      const record: P2PTestRecord = {
        timestamp: startedAt.toISOString(),
        source_region: source.label,
        source_ip: source.ip,
        target_region: target.label,
        target_ip: target.ip,
        protocol: 'TCP',
        duration_sec: options.durationSec,
        parallel_streams: options.parallel,
        sent_mbps: 0,
        received_mbps: 0,
        retransmits: null,
        result_file: null,
        error: null,
      };
      ctx.log.info(`Point-to-point ${source.label} -> ${target.label} (${options.durationSec}s, ${options.parallel} stream(s))`);

      try {
        await ctx.sessions(target.sshHost).exec(ENSURE_SERVER);
        await ctx.sleep(SERVER_START_DELAY_MS);

        const result = await ctx
          .sessions(source.sshHost)
          .runTool(iperf3, `iperf3 -c ${target.ip} -t ${options.durationSec} -P ${options.parallel} -J`, {
            allowFailure: true,
          });
        if (!result.rawOutput.trim()) {
          throw new Error(`Client execution failed (exit code ${result.code})`);
        }

        const fileName = `p2p_${source.ip}_to_${target.ip}_${fileTimestamp(startedAt)}.json`;
        await fs.writeFile(path.join(options.outputDir, fileName), result.rawOutput);
        record.result_file = fileName;

        const summary = parseIperf3Result(result.parsed);
        if (summary.status === 'success') {
          record.received_mbps = round(summary.bandwidthMbps);
          record.sent_mbps = round((result.parsed?.end?.sum_sent?.bits_per_second ?? 0) / MEGABIT);
          record.retransmits = summary.protocol === 'TCP' ? summary.retransmits : null;
          ctx.log.success(`${source.label} -> ${target.label}: ${record.received_mbps} Mbps received`);
        } else {
          record.error = summary.error;
        }
      } catch (error) {
        record.error = errorMessage(error);
      }

      if (record.error) {
        ctx.log.error(`Point-to-point ${source.label} -> ${target.label} failed: ${record.error}`);
        errors.push({ stage: 'p2p', error: `${source.label} -> ${target.label}: ${record.error}` });
      }
      records.push(record);
    }
  } finally {
    await resetIperf3Servers(
      allEndpoints(info, options.usePrivateIp).map((host) => host.sshHost),
      ctx
    );
  }

  const summary: P2PSummaryFile = {
    timestamp: now().toISOString(),
    ip_type: options.usePrivateIp ? 'private' : 'public',
    tests: records,
  };
  const summaryFile = path.join(options.outputDir, `p2p_test_summary_${fileTimestamp(now())}.json`);
  await writeJson(summaryFile, summary);
  return { records, summaryFile, errors };
}
