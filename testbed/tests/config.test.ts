import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, instanceCountFor, ipType, loadConfig, parseConfig } from '../config';
import { ConfigError } from '../errors';
import { tempDir } from './helpers';

function issuesOf(raw: unknown): string[] {
  try {
    parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('parseConfig', () => {
  it('fills in defaults and drops duplicate regions', () => {
    const config = parseConfig({ aws_regions: ['us-east-1', 'eu-west-2', 'us-east-1'] });

    expect(config.aws_regions).toEqual(['us-east-1', 'eu-west-2']);
    expect(config.instance_type).toBe('t2.micro');
    expect(config.ping_count).toBe(20);
    expect(config.run_latency_tests).toBe(true);
    expect(config.run_p2p_tests).toBe(false);
    expect(config.run_udp_tests).toBe(false);
    expect(config.udp_bandwidth).toBe('1G');
    expect(config.p2p_duration).toBe(10);
    expect(config.p2p_parallel).toBe(1);
    expect(config.cleanup_resources).toBe(true);
  });

  it('rejects region names that are not region codes', () => {
    expect(issuesOf({ aws_regions: ['us-east-1', 'Virginia'] })).toContain(
      'aws_regions.1 is not an AWS region code (for example us-east-1)'
    );
  });

  it('requires at least one region', () => {
    expect(issuesOf({ aws_regions: [] })).toEqual(['aws_regions must list at least one region']);
  });

  it('requires a UDP server region when UDP tests are on', () => {
    expect(issuesOf({ aws_regions: ['us-east-1'], run_udp_tests: true })).toEqual([
      'udp_server_region is required when run_udp_tests is enabled',
    ]);
  });

  it('requires the UDP server region to be one of the tested regions', () => {
    expect(issuesOf({ aws_regions: ['us-east-1'], run_udp_tests: true, udp_server_region: 'eu-west-1' })).toEqual([
      'udp_server_region eu-west-1 is not one of aws_regions',
    ]);
  });

  it('checks per-region instance counts against the region list', () => {
    expect(issuesOf({ aws_regions: ['us-east-1'], region_instance_counts: { 'eu-west-1': 2 } })).toEqual([
      'region_instance_counts.eu-west-1 eu-west-1 is not one of aws_regions',
    ]);
  });

  it('rejects malformed UDP bandwidth', () => {
    expect(issuesOf({ aws_regions: ['us-east-1'], udp_bandwidth: '10 Mbps' })).toEqual([
      'udp_bandwidth must look like 100M or 1G',
    ]);
  });

  it('lists every issue in the error message', () => {
    expect(() =>
      parseConfig({ aws_regions: ['us-east-1'], run_udp_tests: true, region_instance_counts: { 'eu-west-1': 2 } })
    ).toThrow(
      'Invalid configuration:\n  - udp_server_region is required when run_udp_tests is enabled\n' +
        '  - region_instance_counts.eu-west-1 eu-west-1 is not one of aws_regions'
    );
  });
});

describe('loadConfig', () => {
  it('reads and validates a JSON file', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, JSON.stringify({ aws_regions: ['ap-northeast-1'], ping_count: 5 }));

    const config = await loadConfig(file);

    expect(config.aws_regions).toEqual(['ap-northeast-1']);
    expect(config.ping_count).toBe(5);
  });

  it('reports a missing file', async () => {
    const file = path.join(await tempDir(), 'missing.json');
    await expect(loadConfig(file)).rejects.toThrow(`Configuration file ${file} not found`);
  });

  it('reports invalid JSON', async () => {
    const file = path.join(await tempDir(), 'config.json');
    await fs.writeFile(file, '{ "aws_regions": ');
    await expect(loadConfig(file)).rejects.toThrow(`Configuration file ${file} is not valid JSON`);
  });
});

describe('config helpers', () => {
  it('uses per-region instance counts over the global one', () => {
    const config = parseConfig({
      aws_regions: ['us-east-1', 'eu-west-2'],
      instance_count: 1,
      region_instance_counts: { 'eu-west-2': 3 },
    });
    expect(instanceCountFor(config, 'us-east-1')).toBe(1);
    expect(instanceCountFor(config, 'eu-west-2')).toBe(3);
  });

  it('names the address family under test', () => {
    expect(ipType(DEFAULT_CONFIG)).toBe('public');
    expect(ipType({ ...DEFAULT_CONFIG, use_private_ip: true })).toBe('private');
  });
});
