import { ConfigError } from './errors';
import { Logger } from './logger';
import { SessionFactory } from './ssh';
import { Sleep } from './tools';
import { Endpoint, InstanceInfo, TestPair } from './types';

/**
 * What the test drivers need to reach hosts.
 */
export interface TestContext {
  sessions: SessionFactory;
  log: Logger;
  sleep: Sleep;
  now?: () => Date;
}

export interface PlanOptions {
  usePrivateIp: boolean;
  intraRegion: boolean;
}

export function instanceLabel(region: string, index: number): string {
  return `${region}_instance${index + 1}`;
}

function endpoint(info: InstanceInfo, region: string, index: number, usePrivateIp: boolean, label: string): Endpoint | null {
  const entry = info.instances[region];
  if (!entry) return null;
  const publicIp = entry.public_ips[index] ?? '';
  const privateIp = entry.private_ips[index] ?? '';
  const ip = usePrivateIp ? privateIp : publicIp;
  if (!ip) return null;
  return { label, region, ip, sshHost: publicIp || privateIp };
}

function instanceCount(info: InstanceInfo, region: string): number {
  const entry = info.instances[region];
  return entry ? Math.max(entry.public_ips.length, entry.private_ips.length) : 0;
}

function pushPair(pairs: TestPair[], source: Endpoint | null, target: Endpoint | null): void {
  if (source && target && source.ip !== target.ip) pairs.push({ source, target });
}

/**
 * Ordered source/target pairs for latency and point-to-point tests.
 * Cross-region pairs use the first host of each region; with intra-region
 * testing every ordered pair of distinct hosts within a region is added.
 */
export function planPairs(info: InstanceInfo, { usePrivateIp, intraRegion }: PlanOptions): TestPair[] {
  const regions = Object.keys(info.instances);
  const pairs: TestPair[] = [];

  for (const source of regions) {
    for (const target of regions) {
      if (source !== target) {
        pushPair(
          pairs,
          endpoint(info, source, 0, usePrivateIp, source),
          endpoint(info, target, 0, usePrivateIp, target)
        );
        continue;
      }
      const count = instanceCount(info, source);
      if (!intraRegion || count < 2) continue;
      for (let i = 0; i < count; i++) {
        for (let j = 0; j < count; j++) {
          if (i === j) continue;
          pushPair(
            pairs,
            endpoint(info, source, i, usePrivateIp, instanceLabel(source, i)),
            endpoint(info, source, j, usePrivateIp, instanceLabel(source, j))
          );
        }
      }
    }
  }
  return pairs;
}

export interface UdpRound {
  server: Endpoint;
  clients: Endpoint[];
}

/**
 * Server/client rounds for the one-to-many UDP test. With intra-region testing
 * and several hosts in the server region, each of them serves one round.
 */
export function planUdpRounds(info: InstanceInfo, serverRegion: string, { usePrivateIp, intraRegion }: PlanOptions): UdpRound[] {
  if (!info.instances[serverRegion]) {
    throw new ConfigError(`UDP server region ${serverRegion} has no instances`);
  }
  const otherRegions = Object.keys(info.instances).filter((region) => region !== serverRegion);
  const remoteClients = otherRegions
    .map((region) => endpoint(info, region, 0, usePrivateIp, region))
    .filter((client): client is Endpoint => client !== null);

  const count = instanceCount(info, serverRegion);
  if (!intraRegion || count < 2) {
    const server = endpoint(info, serverRegion, 0, usePrivateIp, serverRegion);
    if (!server) throw new ConfigError(`UDP server in ${serverRegion} has no usable IP address`);
    return [{ server, clients: remoteClients }];
  }

  const rounds: UdpRound[] = [];
  for (let i = 0; i < count; i++) {
    const server = endpoint(info, serverRegion, i, usePrivateIp, instanceLabel(serverRegion, i));
    if (!server) continue;
    const localClients: Endpoint[] = [];
    for (let j = 0; j < count; j++) {
      if (j === i) continue;
      const client = endpoint(info, serverRegion, j, usePrivateIp, instanceLabel(serverRegion, j));
      if (client) localClients.push(client);
    }
    rounds.push({ server, clients: [...remoteClients, ...localClients] });
  }
  return rounds;
}

/**
 * Every distinct host that takes part in the tests.
 */
export function allEndpoints(info: InstanceInfo, usePrivateIp: boolean): Endpoint[] {
  const endpoints: Endpoint[] = [];
  for (const region of Object.keys(info.instances)) {
    for (let i = 0; i < instanceCount(info, region); i++) {
      const host = endpoint(info, region, i, usePrivateIp, instanceLabel(region, i));
      if (host) endpoints.push(host);
    }
  }
  return endpoints;
}
