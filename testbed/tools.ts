import { spawn } from 'child_process';
import { performance } from 'perf_hooks';
import { z } from 'zod';
import { CommandError } from './errors';
import { Logger, logger } from './logger';
import { Iperf3Interval, Iperf3Summary, PingResult, Timing } from './types';

export interface CommandOptions {
  cwd?: string;
  // merged over process.env
  env?: Record<string, string | undefined>;
  input?: string;
  // resolve instead of rejecting on a non-zero exit code
  allowFailure?: boolean;
  onLine?: (line: string) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/[\s'"]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part)).join(' ');
}

class LineBuffer {
  private pending = '';

  constructor(private readonly onLine: (line: string) => void) {}

  push(chunk: string): void {
    this.pending += chunk;
    const lines = this.pending.split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) this.onLine(line.replace(/\r$/, ''));
  }

  flush(): void {
    if (this.pending) this.onLine(this.pending);
    this.pending = '';
  }
}

export class ProcessRunner implements CommandRunner {
  constructor(private readonly log: Logger = logger) {}

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const commandLine = formatCommand(command, args);
    return new Promise((resolve, reject) => {
      this.log.debug(`Executing command: ${commandLine}`);
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
      });
      let stdout = '';
      let stderr = '';
      const outLines = options.onLine ? new LineBuffer(options.onLine) : undefined;
      const errLines = options.onLine ? new LineBuffer(options.onLine) : undefined;

      child.stdout.on('data', (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        outLines?.push(text);
      });

      child.stderr.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        errLines?.push(text);
      });

      child.on('error', (error) => {
        reject(new CommandError(commandLine, null, error.message));
      });

      child.on('close', (code) => {
        outLines?.flush();
        errLines?.flush();
        if (code === 0 || options.allowFailure) {
          resolve({ stdout, stderr, code });
        } else {
          reject(new CommandError(commandLine, code, stderr));
        }
      });

      child.stdin.end(options.input);
    });
  }
}

export class Stopwatch {
  private startTime: number = 0;
  private endTime: number = 0;

  start(): void {
    this.startTime = performance.now();
  }

  stop(): void {
    this.endTime = performance.now();
  }

  getTiming(): Timing {
    return {
      duration: this.endTime - this.startTime,
    };
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ToolRun<T> {
  rawOutput: string;
  parsed: T;
  code: number | null;
  timing: Timing;
}

export abstract class CliTool<T> {
  abstract parse(output: string): T;

  async run(runner: CommandRunner, command: string, args: string[], options?: CommandOptions): Promise<ToolRun<T>> {
    const stopwatch = new Stopwatch();
    stopwatch.start();
    const { stdout, code } = await runner.run(command, args, options);
    stopwatch.stop();
    return {
      rawOutput: stdout,
      parsed: this.parse(stdout),
      code,
      timing: stopwatch.getTiming(),
    };
  }
}

export class PingTool extends CliTool<PingResult> {
  parse(output: string): PingResult {
    const result: PingResult = {
      packetsTransmitted: null,
      packetsReceived: null,
      packetLossPercent: null,
      minMs: null,
      avgMs: null,
      maxMs: null,
      mdevMs: null,
    };

    // "20 packets transmitted, 18 received, +2 errors, 10% packet loss, time 3805ms"
    // "4 packets transmitted, 4 received, +1 duplicates, +1 corrupted, 0% packet loss"
    // "5 packets transmitted, 5 packets received, 0.0% packet loss"
    const packets = output.match(
      /(\d+) packets transmitted, (\d+) (?:packets )?received,(?: \+\d+ \w+,)* ([\d.]+)% packet loss/
    );
    if (packets) {
      result.packetsTransmitted = parseInt(packets[1], 10);
      result.packetsReceived = parseInt(packets[2], 10);
      result.packetLossPercent = parseFloat(packets[3]);
    }

    // "rtt min/avg/max/mdev = 0.041/0.052/0.071/0.010 ms" or "round-trip min/avg/max/stddev = ..."
    const rtt = output.match(/(?:rtt|round-trip) min\/avg\/max\/(?:mdev|stddev) = ([\d.]+)\/([\d.]+)\/([\d.]+)\/([\d.]+) ms/);
    if (rtt) {
      result.minMs = parseFloat(rtt[1]);
      result.avgMs = parseFloat(rtt[2]);
      result.maxMs = parseFloat(rtt[3]);
      result.mdevMs = parseFloat(rtt[4]);
    }

    return result;
  }
}

const iperf3Sum = z
  .object({
    start: z.number().optional(),
    end: z.number().optional(),
    seconds: z.number().optional(),
    bytes: z.number().optional(),
    bits_per_second: z.number().optional(),
    retransmits: z.number().optional(),
    jitter_ms: z.number().optional(),
    lost_packets: z.number().optional(),
    packets: z.number().optional(),
    lost_percent: z.number().optional(),
  })
  .passthrough();

export const iperf3DocumentSchema = z
  .object({
    start: z
      .object({
        test_start: z.object({ protocol: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
    intervals: z.array(z.object({ sum: iperf3Sum.optional() }).passthrough()).optional(),
    end: z
      .object({
        sum_sent: iperf3Sum.optional(),
        sum_received: iperf3Sum.optional(),
        sum: iperf3Sum.optional(),
      })
      .passthrough()
      .optional(),
    error: z.string().optional(),
    server_region: z.string().optional(),
    client_region: z.string().optional(),
  })
  .passthrough();

export type Iperf3Document = z.infer<typeof iperf3DocumentSchema>;

const BITS_PER_MEGABIT = 1_000_000;
const BYTES_PER_MEGABYTE = 1_000_000;

export function iperf3Protocol(doc: Iperf3Document): 'TCP' | 'UDP' | null {
  const declared = doc.start?.test_start?.protocol?.toUpperCase();
  if (declared === 'TCP' || declared === 'UDP') return declared;
  if (doc.end?.sum_received) return 'TCP';
  if (doc.end?.sum) return 'UDP';
  return null;
}

export function parseIperf3Result(raw: unknown): Iperf3Summary {
  const parsed = iperf3DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 'unknown', error: 'Not an iperf3 JSON document' };
  }
  const doc = parsed.data;
  if (doc.error) {
    return { status: 'error', error: doc.error };
  }

  const protocol = iperf3Protocol(doc);
  if (protocol === 'TCP') {
    const received = doc.end?.sum_received;
    if (!received) return { status: 'unknown', error: 'TCP result without end.sum_received' };
    return {
      status: 'success',
      protocol,
      bandwidthMbps: (received.bits_per_second ?? 0) / BITS_PER_MEGABIT,
      transferMB: (received.bytes ?? 0) / BYTES_PER_MEGABYTE,
      durationSec: received.seconds ?? 0,
      retransmits: doc.end?.sum_sent?.retransmits ?? null,
    };
  }
  if (protocol === 'UDP') {
    const sum = doc.end?.sum;
    if (!sum) return { status: 'unknown', error: 'UDP result without end.sum' };
    return {
      status: 'success',
      protocol,
      bandwidthMbps: (sum.bits_per_second ?? 0) / BITS_PER_MEGABIT,
      transferMB: (sum.bytes ?? 0) / BYTES_PER_MEGABYTE,
      durationSec: sum.seconds ?? 0,
      jitterMs: sum.jitter_ms ?? 0,
      lostPackets: sum.lost_packets ?? 0,
      packets: sum.packets ?? 0,
      lostPercent: sum.lost_percent ?? 0,
    };
  }
  return { status: 'unknown', error: 'Unrecognised iperf3 result' };
}

export function parseIperf3Intervals(raw: unknown): Iperf3Interval[] {
  const parsed = iperf3DocumentSchema.safeParse(raw);
  if (!parsed.success) return [];

  const intervals: Iperf3Interval[] = [];
  for (const interval of parsed.data.intervals ?? []) {
    const sum = interval.sum;
    if (!sum || sum.end === undefined) continue;
    intervals.push({
      endSec: sum.end,
      bandwidthMbps: (sum.bits_per_second ?? 0) / BITS_PER_MEGABIT,
      retransmits: sum.retransmits ?? null,
      jitterMs: sum.jitter_ms ?? null,
      lostPercent: sum.lost_percent ?? null,
    });
  }
  return intervals;
}

export class Iperf3Tool extends CliTool<Iperf3Document | null> {
  parse(output: string): Iperf3Document | null {
    const parsed = iperf3DocumentSchema.safeParse(parseJson(output));
    return parsed.success ? parsed.data : null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
