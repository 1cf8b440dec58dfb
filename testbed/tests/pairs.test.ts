import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { allEndpoints, planPairs, planUdpRounds } from '../pairs';
import { InstanceInfo } from '../types';

const info: InstanceInfo = {
  instances: {
    'us-east-1': { public_ips: ['3.0.0.1'], private_ips: ['10.0.0.1'] },
    'eu-west-2': { public_ips: ['3.1.0.1', '3.1.0.2'], private_ips: ['10.1.0.1', '10.1.0.2'] },
  },
};

const route = (pair: { source: { label: string; ip: string }; target: { label: string; ip: string } }) =>
  `${pair.source.label}(${pair.source.ip}) -> ${pair.target.label}(${pair.target.ip})`;

describe('planPairs', () => {
  it('pairs the first host of every region in both directions', () => {
    expect(planPairs(info, { usePrivateIp: false, intraRegion: false }).map(route)).toEqual([
      'us-east-1(3.0.0.1) -> eu-west-2(3.1.0.1)',
      'eu-west-2(3.1.0.1) -> us-east-1(3.0.0.1)',
    ]);
  });

  it('adds every ordered pair inside a region for intra-region tests', () => {
    expect(planPairs(info, { usePrivateIp: false, intraRegion: true }).map(route)).toEqual([
      'us-east-1(3.0.0.1) -> eu-west-2(3.1.0.1)',
      'eu-west-2(3.1.0.1) -> us-east-1(3.0.0.1)',
      'eu-west-2_instance1(3.1.0.1) -> eu-west-2_instance2(3.1.0.2)',
      'eu-west-2_instance2(3.1.0.2) -> eu-west-2_instance1(3.1.0.1)',
    ]);
  });

  it('tests private addresses but still reaches hosts on their public ones', () => {
    const [first] = planPairs(info, { usePrivateIp: true, intraRegion: false });
    expect(first.source).toEqual({ label: 'us-east-1', region: 'us-east-1', ip: '10.0.0.1', sshHost: '3.0.0.1' });
  });

  it('skips hosts without an address and pairs that share one', () => {
    const sparse: InstanceInfo = {
      instances: {
        'us-east-1': { public_ips: ['3.0.0.1'], private_ips: [] },
        'us-west-2': { public_ips: ['3.0.0.1'], private_ips: [] },
        'eu-west-2': { public_ips: [''], private_ips: ['10.1.0.1'] },
      },
    };
    expect(planPairs(sparse, { usePrivateIp: false, intraRegion: false })).toEqual([]);
  });
});

describe('planUdpRounds', () => {
  it('runs one round from the first server host', () => {
    const rounds = planUdpRounds(info, 'eu-west-2', { usePrivateIp: false, intraRegion: false });
    expect(rounds).toHaveLength(1);
    expect(rounds[0].server.label).toBe('eu-west-2');
    expect(rounds[0].clients.map((client) => client.label)).toEqual(['us-east-1']);
  });

  it('lets every host in the server region serve with intra-region tests', () => {
    const rounds = planUdpRounds(info, 'eu-west-2', { usePrivateIp: false, intraRegion: true });
    expect(rounds.map((round) => [round.server.label, round.clients.map((client) => client.label)])).toEqual([
      ['eu-west-2_instance1', ['us-east-1', 'eu-west-2_instance2']],
      ['eu-west-2_instance2', ['us-east-1', 'eu-west-2_instance1']],
    ]);
  });

  it('fails for a server region without instances', () => {
    expect(() => planUdpRounds(info, 'ap-south-1', { usePrivateIp: false, intraRegion: false })).toThrow(ConfigError);
    expect(() => planUdpRounds(info, 'ap-south-1', { usePrivateIp: false, intraRegion: false })).toThrow(
      'UDP server region ap-south-1 has no instances'
    );
  });
});

describe('allEndpoints', () => {
  it('lists every host with an instance label', () => {
    expect(allEndpoints(info, false).map((host) => host.label)).toEqual([
      'us-east-1_instance1',
      'eu-west-2_instance1',
      'eu-west-2_instance2',
    ]);
  });
});
