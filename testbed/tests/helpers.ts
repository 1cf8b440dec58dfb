import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CallerIdentity, CloudApi, TaggedInstance } from '../aws';
import { CommandError } from '../errors';
import { Logger, MemorySink } from '../logger';
import { TestContext } from '../pairs';
import { sessionFactory } from '../ssh';
import { CommandOptions, CommandResult, CommandRunner, formatCommand, Sleep } from '../tools';

export interface RecordedCall {
  command: string;
  args: string[];
  options: CommandOptions;
}

export type Responder = (command: string, args: string[], options: CommandOptions) => Partial<CommandResult> | undefined;

/**
 * Records every command and answers from `respond`; unanswered commands succeed with no output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder = () => undefined) {}

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const response = this.respond(command, args, options) ?? {};
    const result: CommandResult = {
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
      code: response.code === undefined ? 0 : response.code,
    };
    if (options.onLine) {
      for (const line of result.stdout.split('\n').filter(Boolean)) options.onLine(line);
    }
    if (result.code !== 0 && !options.allowFailure) {
      throw new CommandError(formatCommand(command, args), result.code, result.stderr);
    }
    return result;
  }

  /**
   * Commands run over ssh, as `host: command`.
   */
  remote(): string[] {
    return this.calls.filter((call) => call.command === 'ssh').map((call) => `${sshHost(call.args)}: ${remoteCommand(call.args)}`);
  }
}

export function sshHost(args: string[]): string {
  return args[args.length - 2].replace(/^.*@/, '');
}

export function remoteCommand(args: string[]): string {
  return args[args.length - 1];
}

/**
 * In-memory EC2/STS. Instances change state as the stop and reboot calls arrive.
 */
export class FakeCloud implements CloudApi {
  readonly stopped: string[] = [];
  readonly rebooted: string[] = [];
  amiLookups: string[] = [];

  constructor(
    public instances: TaggedInstance[] = [],
    private readonly amis: Record<string, string | Error | null> = {}
  ) {}

  async latestAmazonLinuxAmi(region: string): Promise<string | null> {
    this.amiLookups.push(region);
    const ami = this.amis[region];
    if (ami instanceof Error) throw ami;
    return ami ?? null;
  }

  async findTaggedInstances(region: string, projectTag: string, states: string[]): Promise<TaggedInstance[]> {
    if (projectTag === 'broken') throw new Error(`DescribeInstances denied in ${region}`);
    return this.instances.filter((instance) => instance.region === region && states.includes(instance.state));
  }

  async stopInstances(region: string, instanceIds: string[]): Promise<void> {
    this.stopped.push(...instanceIds);
    for (const instance of this.instances) {
      if (instance.region === region && instanceIds.includes(instance.instanceId)) instance.state = 'stopped';
    }
  }

  async rebootInstances(_region: string, instanceIds: string[]): Promise<void> {
    this.rebooted.push(...instanceIds);
  }

  async callerIdentity(): Promise<CallerIdentity> {
    return { account: '123456789012', arn: 'arn:aws:iam::123456789012:user/bench', userId: 'AIDATEST' };
  }
}

export function memoryLogger(): { log: Logger; sink: MemorySink } {
  const sink = new MemorySink();
  return { log: new Logger({ silent: true, level: 'debug', sinks: [sink] }), sink };
}

export const noSleep: Sleep = async () => undefined;

// local time, so file names come out as 20240102_030405
export const FIXED_NOW = new Date(2024, 0, 2, 3, 4, 5);

export function fakeContext(runner: FakeRunner, log: Logger = memoryLogger().log): TestContext {
  return {
    sessions: sessionFactory(runner, { keyPath: '/keys/test.pem' }, log, noSleep),
    log,
    sleep: noSleep,
    now: () => FIXED_NOW,
  };
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'netbench-test-'));
}

export const PING_OUTPUT = `PING 10.1.1.10 (10.1.1.10) 56(84) bytes of data.
64 bytes from 10.1.1.10: icmp_seq=1 ttl=63 time=71.9 ms

--- 10.1.1.10 ping statistics ---
5 packets transmitted, 5 received, 0% packet loss, time 806ms
rtt min/avg/max/mdev = 71.812/72.345/73.020/0.412 ms
`;

interface TcpDocumentOptions {
  receivedBps?: number;
  sentBps?: number;
  bytes?: number;
  seconds?: number;
  retransmits?: number;
  intervals?: number[];
  intervalRetransmits?: number;
}

export function tcpDocument({
  receivedBps = 500_000_000,
  sentBps = 512_345_678,
  bytes = 625_000_000,
  seconds = 10,
  retransmits = 3,
  intervals = [],
  intervalRetransmits = 0,
}: TcpDocumentOptions = {}) {
  return {
    start: { test_start: { protocol: 'TCP' }, timestamp: { timesecs: 1704164645 } },
    intervals: intervals.map((bps, i) => ({
      sum: { start: i, end: i + 1, seconds: 1, bytes: bps / 8, bits_per_second: bps, retransmits: intervalRetransmits },
    })),
    end: {
      sum_sent: { seconds, bytes, bits_per_second: sentBps, retransmits },
      sum_received: { seconds, bytes, bits_per_second: receivedBps },
    },
  };
}

interface UdpDocumentOptions {
  bps?: number;
  bytes?: number;
  seconds?: number;
  jitterMs?: number;
  lostPackets?: number;
  packets?: number;
  lostPercent?: number;
  intervals?: number[];
}

export function udpDocument({
  bps = 900_000_000,
  bytes = 1_125_000_000,
  seconds = 10,
  jitterMs = 0.05,
  lostPackets = 10,
  packets = 1000,
  lostPercent = 1,
  intervals = [],
}: UdpDocumentOptions = {}) {
  return {
    start: { test_start: { protocol: 'UDP' }, timestamp: { timesecs: 1704164645 } },
    intervals: intervals.map((value, i) => ({
      sum: { start: i, end: i + 1, seconds: 1, bytes: value / 8, bits_per_second: value, jitter_ms: 0.04, lost_percent: 0.5 },
    })),
    end: {
      sum: { seconds, bytes, bits_per_second: bps, jitter_ms: jitterMs, lost_packets: lostPackets, packets, lost_percent: lostPercent },
    },
  };
}
