import readline from 'readline';
import { CloudApi, TaggedInstance } from './aws';
import { errorMessage } from './errors';
import { installIperf3, InstallOptions } from './install';
import { describeRegion, writeInstanceInfo } from './inventory';
import { Logger, logger } from './logger';
import { SessionFactory } from './ssh';
import { Sleep, sleep as defaultSleep } from './tools';
import { InstanceInfo, RegionInstances, StageError } from './types';

export const ACTIVE_STATES = ['running', 'pending'];
export const RESTARTABLE_STATES = ['running', 'stopped', 'pending', 'stopping'];
const SETTLED_STATES = ['stopped', 'terminated'];

export type Confirm = (question: string) => Promise<boolean>;

export const promptConfirm: Confirm = (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise<string>((resolve) => rl.question(`${question} (y/n): `, resolve)).then((answer) => {
    rl.close();
    return answer.trim().toLowerCase().startsWith('y');
  });
};

export interface OperationContext {
  cloud: CloudApi;
  log?: Logger;
  sleep?: Sleep;
  regionNames?: Record<string, string>;
}

/**
 * Tagged instances per region. Regions that fail to answer are logged and left out.
 */
export async function findInstances(
  regions: string[],
  projectTag: string,
  states: string[],
  { cloud, log = logger, regionNames = {} }: OperationContext
): Promise<Map<string, TaggedInstance[]>> {
  const found = new Map<string, TaggedInstance[]>();
  for (const region of regions) {
    const where = describeRegion(region, regionNames);
    try {
      const instances = await cloud.findTaggedInstances(region, projectTag, states);
      if (instances.length === 0) {
        log.info(`No ${states.join('/')} instances in ${where}`);
        continue;
      }
      log.success(`${instances.length} instance(s) in ${where}`);
      for (const instance of instances) {
        log.info(
          `  ${instance.instanceId} (${instance.name ?? 'unnamed'}) [${instance.publicIp ?? 'no public IP'}] ${instance.state}`
        );
      }
      found.set(region, instances);
    } catch (error) {
      log.error(`Listing instances in ${where} failed: ${errorMessage(error)}`);
    }
  }
  return found;
}

export function inventoryFromInstances(found: Map<string, TaggedInstance[]>): InstanceInfo {
  const instances: Record<string, RegionInstances> = {};
  for (const [region, list] of found) {
    instances[region] = {
      public_ips: list.map((instance) => instance.publicIp ?? ''),
      private_ips: list.map((instance) => instance.privateIp ?? ''),
      instance_ids: list.map((instance) => instance.instanceId),
    };
  }
  return { instances };
}

/**
 * Running instances tagged for the project, saved as an inventory file when `outputFile` is given.
 */
export async function discoverInstances(
  regions: string[],
  projectTag: string,
  ctx: OperationContext,
  outputFile?: string
): Promise<InstanceInfo> {
  const info = inventoryFromInstances(await findInstances(regions, projectTag, ACTIVE_STATES, ctx));
  if (outputFile) {
    await writeInstanceInfo(outputFile, info);
    (ctx.log ?? logger).success(`Inventory written to ${outputFile}`);
  }
  return info;
}

export interface StopOptions {
  confirm?: Confirm | false;
  attempts?: number;
  intervalMs?: number;
}

export interface StopResult {
  requested: number;
  stopped: boolean;
  errors: StageError[];
}

export async function stopInstances(
  regions: string[],
  projectTag: string,
  ctx: OperationContext,
  { confirm = promptConfirm, attempts = 10, intervalMs = 30_000 }: StopOptions = {}
): Promise<StopResult> {
  const { cloud, log = logger, sleep = defaultSleep, regionNames = {} } = ctx;
  const found = await findInstances(regions, projectTag, ACTIVE_STATES, ctx);
  const count = [...found.values()].reduce((sum, list) => sum + list.length, 0);
  const result: StopResult = { requested: 0, stopped: false, errors: [] };

  if (count === 0) {
    log.info('No running instances to stop');
    result.stopped = true;
    return result;
  }
  if (confirm && !(await confirm(`Stop ${count} instance(s)?`))) {
    log.warn('Stop cancelled');
    return result;
  }

  for (const [region, list] of found) {
    try {
      await cloud.stopInstances(
        region,
        list.map((instance) => instance.instanceId)
      );
      result.requested += list.length;
      log.success(`Stop requested for ${list.length} instance(s) in ${describeRegion(region, regionNames)}`);
    } catch (error) {
      result.errors.push({ stage: 'stop', error: `${region}: ${errorMessage(error)}` });
      log.error(`Stopping instances in ${region} failed: ${errorMessage(error)}`);
    }
  }

  const watched = [...found.keys()];
  for (let attempt = 1; attempt <= attempts; attempt++) {
    await sleep(intervalMs);
    let pending = 0;
    for (const region of watched) {
      try {
        const states = await cloud.findTaggedInstances(region, projectTag, RESTARTABLE_STATES);
        pending += states.filter((instance) => !SETTLED_STATES.includes(instance.state)).length;
      } catch (error) {
        log.warn(`Status check in ${region} failed: ${errorMessage(error)}`);
        pending++;
      }
    }
    if (pending === 0) {
      log.success('All instances stopped');
      result.stopped = true;
      return result;
    }
    log.info(`${pending} instance(s) still stopping (check ${attempt}/${attempts})`);
  }
  log.warn('Some instances are still stopping; check the EC2 console');
  return result;
}

export const REBOOT_WAIT_MS = 60_000;

export interface RestartOptions extends InstallOptions {
  sessions: SessionFactory;
  // pause after the reboot calls, before the first ssh attempt
  rebootWaitMs?: number;
}

/**
 * Reboots tagged instances, waits `rebootWaitMs`, then reinstalls iperf3 once each host answers over ssh.
 */
export async function restartInstances(
  regions: string[],
  projectTag: string,
  ctx: OperationContext,
  options: RestartOptions
): Promise<StageError[]> {
  const { cloud, log = logger, sleep = defaultSleep } = ctx;
  const found = await findInstances(regions, projectTag, RESTARTABLE_STATES, ctx);
  const errors: StageError[] = [];
  const hosts: string[] = [];

  for (const [region, list] of found) {
    try {
      await cloud.rebootInstances(
        region,
        list.map((instance) => instance.instanceId)
      );
      log.success(`Reboot requested for ${list.length} instance(s) in ${region}`);
      for (const instance of list) {
        if (instance.publicIp) hosts.push(instance.publicIp);
        else log.warn(`${instance.instanceId} has no public IP; iperf3 will not be reinstalled there`);
      }
    } catch (error) {
      errors.push({ stage: 'restart', error: `${region}: ${errorMessage(error)}` });
      log.error(`Rebooting instances in ${region} failed: ${errorMessage(error)}`);
    }
  }

  if (hosts.length === 0) return errors;

  const waitMs = options.rebootWaitMs ?? REBOOT_WAIT_MS;
  log.info(`Waiting ${Math.round(waitMs / 1000)}s for the instances to come back`);
  await sleep(waitMs);
  errors.push(...(await installIperf3(hosts, options.sessions, options, log)));
  return errors;
}
