import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from './errors';
import { planUdpRounds, TestContext, UdpRound } from './pairs';
import { fileTimestamp, writeJson } from './paths';
import { Iperf3Tool, isRecord, parseIperf3Result, parseJson } from './tools';
import { InstanceInfo, StageError, UdpSummaryFile, UdpTestRecord } from './types';

const SERVER_START_DELAY_MS = 2000;

export const START_DAEMON = 'sudo systemctl stop iperf3; iperf3 -s -D';
export const RESTORE_SERVICE = 'pkill -x iperf3; sudo systemctl start iperf3';

export interface UdpOptions {
  outputDir: string;
  serverRegion: string;
  bandwidth: string;
  durationSec: number;
  usePrivateIp: boolean;
  intraRegion: boolean;
}

export interface UdpRun {
  records: UdpTestRecord[];
  summaryFile: string | null;
  errors: StageError[];
}

async function runRound(round: UdpRound, options: UdpOptions, ctx: TestContext, iperf3: Iperf3Tool): Promise<UdpTestRecord[]> {
  const now = ctx.now ?? (() => new Date());
  const { server } = round;
  const serverSession = ctx.sessions(server.sshHost);
  const records: UdpTestRecord[] = [];

  try {
    await serverSession.exec(START_DAEMON);
    await ctx.sleep(SERVER_START_DELAY_MS);

    for (const client of round.clients) {
      const record: UdpTestRecord = {
        server_region: server.label,
        server_ip: server.ip,
        client_region: client.label,
        client_ip: client.ip,
        result_file: null,
        error: null,
      };
      ctx.log.info(`UDP ${server.label} <- ${client.label} at ${options.bandwidth}bps for ${options.durationSec}s`);

      try {
        const result = await ctx
          .sessions(client.sshHost)
          .runTool(iperf3, `iperf3 -c ${server.ip} -u -b ${options.bandwidth} -t ${options.durationSec} -J`, {
            allowFailure: true,
          });
        const doc = parseJson(result.rawOutput);
        if (!isRecord(doc)) {
          throw new Error(`Client execution failed (exit code ${result.code})`);
        }

        const fileName = `udp_multicast_${server.ip}_to_${client.ip}_${fileTimestamp(now())}.json`;
        await writeJson(path.join(options.outputDir, fileName), {
          ...doc,
          server_region: server.label,
          client_region: client.label,
        });
        record.result_file = fileName;

        const summary = parseIperf3Result(result.parsed);
        if (summary.status === 'success' && summary.protocol === 'UDP') {
          ctx.log.success(
            `${client.label}: ${summary.bandwidthMbps.toFixed(2)} Mbps, ${summary.lostPercent.toFixed(2)}% loss, jitter ${summary.jitterMs.toFixed(3)} ms`
          );
        } else if (summary.status !== 'success') {
          record.error = summary.error;
        }
      } catch (error) {
        record.error = errorMessage(error);
      }

      if (record.error) ctx.log.error(`UDP ${server.label} <- ${client.label} failed: ${record.error}`);
      records.push(record);
    }
  } finally {
    await serverSession.exec(RESTORE_SERVICE, { allowFailure: true });
  }
  return records;
}

export async function runUdpTests(info: InstanceInfo, options: UdpOptions, ctx: TestContext): Promise<UdpRun> {
  const now = ctx.now ?? (() => new Date());
  const iperf3 = new Iperf3Tool();
  const run: UdpRun = { records: [], summaryFile: null, errors: [] };
  await fs.mkdir(options.outputDir, { recursive: true });

  const rounds = planUdpRounds(info, options.serverRegion, options);
  const ipToRegion: Record<string, string> = {};

  for (const round of rounds) {
    ipToRegion[round.server.ip] = round.server.label;
    for (const client of round.clients) ipToRegion[client.ip] = client.label;

    if (round.clients.length === 0) {
      const error = `No clients for UDP server ${round.server.label}`;
      ctx.log.error(error);
      run.errors.push({ stage: 'udp', error });
      continue;
    }

    try {
      const records = await runRound(round, options, ctx, iperf3);
      run.records.push(...records);
      for (const record of records) {
        if (record.error) {
          run.errors.push({ stage: 'udp', error: `${record.server_region} <- ${record.client_region}: ${record.error}` });
        }
      }
    } catch (error) {
      ctx.log.error(`UDP round on ${round.server.label} failed: ${errorMessage(error)}`);
      run.errors.push({ stage: 'udp', error: `${round.server.label}: ${errorMessage(error)}` });
    }
  }

  const summary: UdpSummaryFile = {
    server_region: options.serverRegion,
    ip_type: options.usePrivateIp ? 'private' : 'public',
    timestamp: now().toISOString(),
    results: run.records,
    ip_to_region_map: ipToRegion,
  };
  run.summaryFile = path.join(options.outputDir, `udp_multicast_summary_${fileTimestamp(now())}.json`);
  await writeJson(run.summaryFile, summary);
  return run;
}
