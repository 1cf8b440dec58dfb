import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { Logger, logger } from './logger';
import { ASSETS_DIR, writeJson } from './paths';
import { InstanceDescriptor, InstanceInfo, RegionInstances } from './types';

const regionInstancesSchema = z.object({
  public_ips: z.array(z.string()),
  private_ips: z.array(z.string()),
  instance_ids: z.array(z.string()).optional(),
});

export const instanceInfoSchema = z.object({
  instances: z.record(z.string(), regionInstancesSchema),
});

// `terraform output -json`: { name: { sensitive, type, value } }
const outputValue = <T extends z.ZodTypeAny>(value: T) => z.object({ value }).passthrough();
const ipsByRegion = z.record(z.string(), z.array(z.string().nullable()));

export const terraformOutputSchema = z
  .object({
    instance_public_ips: outputValue(ipsByRegion).optional(),
    instance_private_ips: outputValue(ipsByRegion).optional(),
    instance_ids: outputValue(z.record(z.string(), z.array(z.string()))).optional(),
  })
  .passthrough();

const present = (ips: (string | null)[]) => ips.map((ip) => ip ?? '');

export function instanceInfoFromTerraform(output: unknown, log: Logger = logger): InstanceInfo {
  const parsed = terraformOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new ConfigError('Unexpected terraform output', parsed.error.issues.map((issue) => issue.message));
  }
  const publicIps = parsed.data.instance_public_ips?.value ?? {};
  const privateIps = parsed.data.instance_private_ips?.value ?? {};
  const instanceIds = parsed.data.instance_ids?.value ?? {};

  const instances: Record<string, RegionInstances> = {};
  for (const region of Object.keys(publicIps)) {
    const privates = privateIps[region];
    if (!privates) {
      log.warn(`No private IPs in terraform output for ${region}, skipping it`);
      continue;
    }
    instances[region] = {
      public_ips: present(publicIps[region]),
      private_ips: present(privates),
      ...(instanceIds[region] ? { instance_ids: instanceIds[region] } : {}),
    };
  }
  for (const region of Object.keys(privateIps)) {
    if (!(region in publicIps)) log.warn(`No public IPs in terraform output for ${region}, skipping it`);
  }

  const allPublic = Object.values(instances).flatMap((entry) => entry.public_ips);
  if (allPublic.length > 0 && allPublic.every((ip) => ip === '')) {
    log.warn(
      'Every public IP is empty. Check that the subnets map public IPs on launch and that the instances are running; ' +
        'set use_private_ip to test over private addresses instead.'
    );
  }
  return { instances };
}

export function listInstances(info: InstanceInfo): InstanceDescriptor[] {
  const descriptors: InstanceDescriptor[] = [];
  for (const [region, entry] of Object.entries(info.instances)) {
    const count = Math.max(entry.public_ips.length, entry.private_ips.length);
    for (let i = 0; i < count; i++) {
      descriptors.push({
        region,
        publicIp: entry.public_ips[i] ?? '',
        privateIp: entry.private_ips[i] ?? '',
        instanceId: entry.instance_ids?.[i],
      });
    }
  }
  return descriptors;
}

export function ipsFor(info: InstanceInfo, region: string, usePrivate: boolean): string[] {
  const entry = info.instances[region];
  if (!entry) return [];
  return usePrivate ? entry.private_ips : entry.public_ips;
}

/**
 * Address to reach a host over ssh; tests may run over private IPs, ssh never does.
 */
export function sshAddress(instance: InstanceDescriptor): string {
  return instance.publicIp || instance.privateIp;
}

export async function readInstanceInfo(filePath: string): Promise<InstanceInfo> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch {
    throw new ConfigError(`Instance info ${filePath} is missing or not valid JSON`);
  }
  const parsed = instanceInfoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Instance info ${filePath} is malformed`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }
  return parsed.data;
}

export async function writeInstanceInfo(filePath: string, info: InstanceInfo): Promise<void> {
  await writeJson(filePath, info);
}

const regionNames = new Map<string, Record<string, string>>();

export async function loadRegionNames(file: string = path.join(ASSETS_DIR, 'regions.json')): Promise<Record<string, string>> {
  let names = regionNames.get(file);
  if (!names) {
    names = z.record(z.string(), z.string()).parse(JSON.parse(await fs.readFile(file, 'utf8')));
    regionNames.set(file, names);
  }
  return names;
}

export function describeRegion(region: string, names: Record<string, string>): string {
  const name = names[region];
  return name ? `${region} (${name})` : region;
}
