#!/usr/bin/env node
import { Command, Option } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import { AwsCloudApi, resolveAmiIds, verifyCredentials } from './aws';
import { buildCharts, loadConnectionSeries, writeCharts } from './charts';
import { collectResults, writeCollectedResults } from './collect';
import { BenchmarkConfig, loadConfig } from './config';
import { errorMessage } from './errors';
import { formatData, writeFormattedData } from './format';
import { instanceInfoFromTerraform, readInstanceInfo, writeInstanceInfo } from './inventory';
import { runLatencyTests } from './latency';
import { logger } from './logger';
import { discoverInstances, restartInstances, stopInstances } from './operations';
import { runPointToPointTests } from './p2p';
import { TestContext } from './pairs';
import { parseResults } from './parse';
import {
  KEYS_DIR,
  listRunIds,
  pathExists,
  PROJECT_ROOT,
  RunLayout,
  runLayout,
  RUNS_DIR,
  startRun,
  TERRAFORM_DIR,
} from './paths';
import { analyzeResults, COLLECTED_FILE, runBenchmark } from './pipeline';
import { describeRequestError, DashboardClient } from './remote';
import { DEFAULT_PORT, startDashboard } from './server';
import { ensureSshKey, publicKeyPath, sessionFactory } from './ssh';
import { generateTerraform, TerraformRunner } from './terraform';
import { ProcessRunner, sleep } from './tools';
import { StageError } from './types';
import { runUdpTests } from './udp';

const DEFAULT_CONFIG_FILE = path.join(PROJECT_ROOT, 'config.json');
const DEFAULT_INVENTORY_FILE = path.join(PROJECT_ROOT, 'instance_info.json');

const log = logger.child('netbench');

function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      log.error(errorMessage(error));
      process.exitCode = 1;
    }
  };
}

function reportErrors(errors: StageError[]): void {
  if (errors.length === 0) return;
  for (const { stage, error } of errors) log.error(`${stage}: ${error}`);
  process.exitCode = 1;
}

async function resolveRun(runId?: string): Promise<RunLayout> {
  if (runId) {
    const layout = runLayout(RUNS_DIR, runId);
    if (!(await pathExists(layout.root))) throw new Error(`Run ${runId} not found in ${RUNS_DIR}`);
    return layout;
  }
  const [latest] = await listRunIds(RUNS_DIR);
  if (!latest) throw new Error(`No runs in ${RUNS_DIR}`);
  return runLayout(RUNS_DIR, latest);
}

async function testContext(config: BenchmarkConfig): Promise<TestContext> {
  const runner = new ProcessRunner(log);
  const keyPath = await ensureSshKey(runner, config.ssh_key_name, KEYS_DIR, false, log);
  return { sessions: sessionFactory(runner, { keyPath }, log, sleep), log, sleep };
}

export const program = new Command()
  .name('netbench')
  .description('Cross-region network benchmarks for EC2 instances')
  .version('0.1.0')
  .option('--verbose', 'Show debug output, including every command executed');

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) log.setLevel('debug');
});

const configOption = () => new Option('-c, --config <file>', 'Configuration file').default(DEFAULT_CONFIG_FILE);
const runOption = () => new Option('-r, --run <id>', 'Run id under runs/ (default: the newest run)');

program
  .command('run')
  .description('Provision, test, analyse and (optionally) tear down in one go')
  .addOption(configOption())
  .option('--no-progress', 'Hide the progress bar')
  .action(
    action(async (options: { config: string; progress: boolean }) => {
      const config = await loadConfig(options.config);
      const result = await runBenchmark(config, {
        runner: new ProcessRunner(log),
        cloud: new AwsCloudApi(),
        log,
        progress: options.progress && (process.stdout.isTTY ?? false),
      });
      if (result.reportPath) log.info(`Report: ${result.reportPath}`);
      if (result.errors.length > 0) process.exitCode = 1;
    })
  );

const terraform = program.command('terraform').description('Terraform configuration');

terraform
  .command('generate')
  .description('Write the Terraform files for the configured regions')
  .addOption(configOption())
  .option('--no-ami-lookup', 'Leave AMI selection to Terraform')
  .action(
    action(async (options: { config: string; amiLookup: boolean }) => {
      const config = await loadConfig(options.config);
      const amiIds = options.amiLookup
        ? await resolveAmiIds(new AwsCloudApi(), config.aws_regions, config.ami_ids, log)
        : config.ami_ids;
      const pubKey = publicKeyPath(path.join(KEYS_DIR, `${config.ssh_key_name}.pem`));
      const publicKey = (await pathExists(pubKey)) ? (await fs.readFile(pubKey, 'utf8')).trim() : '';
      await generateTerraform(config, TERRAFORM_DIR, { modulesDir: path.join(TERRAFORM_DIR, 'modules'), amiIds, publicKey }, log);
    })
  );

program
  .command('destroy')
  .description('Destroy every resource in the Terraform state')
  .action(
    action(async () => {
      await new TerraformRunner(new ProcessRunner(log), TERRAFORM_DIR, log).destroy();
      log.success('Resources destroyed');
    })
  );

program
  .command('inventory')
  .description('Write instance_info.json from terraform output, or from EC2 tags')
  .addOption(configOption())
  .option('-o, --output <file>', 'Inventory file', DEFAULT_INVENTORY_FILE)
  .option('--from-ec2', 'Discover instances by their Project tag instead of terraform output')
  .action(
    action(async (options: { config: string; output: string; fromEc2?: boolean }) => {
      if (options.fromEc2) {
        const config = await loadConfig(options.config);
        await discoverInstances(config.aws_regions, config.project_tag, { cloud: new AwsCloudApi(), log }, options.output);
        return;
      }
      const output = await new TerraformRunner(new ProcessRunner(log), TERRAFORM_DIR, log).output();
      await writeInstanceInfo(options.output, instanceInfoFromTerraform(output, log));
      log.success(`Inventory written to ${options.output}`);
    })
  );

const test = program.command('test').description('Run one kind of test against an inventory');

interface TestOptions {
  config: string;
  inventory: string;
  run?: string;
}

function testCommand(name: string, description: string, fn: (config: BenchmarkConfig, layout: RunLayout, ctx: TestContext, options: TestOptions) => Promise<StageError[]>) {
  test
    .command(name)
    .description(description)
    .addOption(configOption())
    .option('-i, --inventory <file>', 'Inventory file', DEFAULT_INVENTORY_FILE)
    .addOption(new Option('-r, --run <id>', 'Existing run to add results to (default: a new run)'))
    .action(
      action(async (options: TestOptions) => {
        const config = await loadConfig(options.config);
        const layout = options.run ? await resolveRun(options.run) : await startRun(RUNS_DIR);
        log.info(`Results go to ${layout.dataDir}`);
        reportErrors(await fn(config, layout, await testContext(config), options));
      })
    );
}

testCommand('latency', 'Ping every host pair', async (config, layout, ctx, options) => {
  const run = await runLatencyTests(
    await readInstanceInfo(options.inventory),
    {
      outputDir: layout.latencyDir,
      pingCount: config.ping_count,
      usePrivateIp: config.use_private_ip,
      intraRegion: config.test_intra_region,
    },
    ctx
  );
  return run.errors;
});

testCommand('p2p', 'iperf3 TCP between every host pair', async (config, layout, ctx, options) => {
  const run = await runPointToPointTests(
    await readInstanceInfo(options.inventory),
    {
      outputDir: layout.p2pDir,
      durationSec: config.p2p_duration,
      parallel: config.p2p_parallel,
      usePrivateIp: config.use_private_ip,
      intraRegion: config.test_intra_region,
    },
    ctx
  );
  return run.errors;
});

testCommand('udp', 'iperf3 UDP from one server region to every other host', async (config, layout, ctx, options) => {
  if (!config.udp_server_region) throw new Error('udp_server_region is not set in the configuration');
  const run = await runUdpTests(
    await readInstanceInfo(options.inventory),
    {
      outputDir: layout.udpDir,
      serverRegion: config.udp_server_region,
      bandwidth: config.udp_bandwidth,
      durationSec: config.udp_duration,
      usePrivateIp: config.use_private_ip,
      intraRegion: config.test_intra_region,
    },
    ctx
  );
  return run.errors;
});

program
  .command('collect')
  .description('Gather raw result files of a run into collected_results.json')
  .addOption(runOption())
  .action(
    action(async (options: { run?: string }) => {
      const layout = await resolveRun(options.run);
      const file = path.join(layout.resultsDir, COLLECTED_FILE);
      await writeCollectedResults(await collectResults(layout.dataDir, log), file);
      log.success(`Collected results written to ${file}`);
    })
  );

program
  .command('parse')
  .description('Write CSV tables and results_summary.json for a run')
  .addOption(runOption())
  .action(
    action(async (options: { run?: string }) => {
      const layout = await resolveRun(options.run);
      await parseResults(await collectResults(layout.dataDir, log), layout.resultsDir, log);
    })
  );

program
  .command('format')
  .description('Write region matrices and histogram data for a run')
  .addOption(runOption())
  .action(
    action(async (options: { run?: string }) => {
      const layout = await resolveRun(options.run);
      const { rows } = await parseResults(await collectResults(layout.dataDir, log), layout.resultsDir, log);
      await writeFormattedData(formatData(rows), layout.resultsDir, log);
    })
  );

program
  .command('visualize')
  .description('Write chart definitions (charts.json) for a run')
  .addOption(runOption())
  .action(
    action(async (options: { run?: string }) => {
      const layout = await resolveRun(options.run);
      const collected = await collectResults(layout.dataDir, log);
      const { rows } = await parseResults(collected, layout.resultsDir, log);
      const charts = buildCharts(rows, formatData(rows), await loadConnectionSeries(layout.dataDir, collected));
      await writeCharts(charts, layout.visualizationDir, log);
    })
  );

program
  .command('report')
  .description('Run the whole analysis of a run and write its HTML report')
  .addOption(runOption())
  .action(
    action(async (options: { run?: string }) => {
      const layout = await resolveRun(options.run);
      const { reportPath } = await analyzeResults(
        {
          dataDir: layout.dataDir,
          resultsDir: layout.resultsDir,
          visualizationDir: layout.visualizationDir,
          reportDir: layout.root,
          visualize: true,
          report: true,
        },
        log
      );
      if (reportPath) log.info(`Open ${reportPath} in a browser`);
    })
  );

const instances = program.command('instances').description('Tagged EC2 instances of the project');

instances
  .command('list')
  .description('List running instances per region')
  .addOption(configOption())
  .option('-o, --output <file>', 'Also write them as an inventory file')
  .action(
    action(async (options: { config: string; output?: string }) => {
      const config = await loadConfig(options.config);
      await discoverInstances(config.aws_regions, config.project_tag, { cloud: new AwsCloudApi(), log }, options.output);
    })
  );

instances
  .command('stop')
  .description('Stop running instances and wait until they are stopped')
  .addOption(configOption())
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(
    action(async (options: { config: string; yes?: boolean }) => {
      const config = await loadConfig(options.config);
      const result = await stopInstances(
        config.aws_regions,
        config.project_tag,
        { cloud: new AwsCloudApi(), log },
        options.yes ? { confirm: false } : {}
      );
      reportErrors(result.errors);
      if (!result.stopped) process.exitCode = 1;
    })
  );

instances
  .command('restart')
  .description('Reboot instances and reinstall iperf3 on them')
  .addOption(configOption())
  .action(
    action(async (options: { config: string }) => {
      const config = await loadConfig(options.config);
      const ctx = await testContext(config);
      reportErrors(await restartInstances(config.aws_regions, config.project_tag, { cloud: new AwsCloudApi(), log }, { sessions: ctx.sessions }));
    })
  );

program
  .command('verify-credentials')
  .description('Check the AWS credentials in the environment')
  .action(
    action(async () => {
      await verifyCredentials(new AwsCloudApi(), log);
    })
  );

program
  .command('dashboard')
  .description('Serve the web dashboard')
  .option('-p, --port <port>', 'Port to listen on', process.env.PORT ?? String(DEFAULT_PORT))
  .action(
    action(async (options: { port: string }) => {
      const port = Number(options.port);
      if (!Number.isInteger(port) || port < 0) throw new Error(`Invalid port ${options.port}`);
      await startDashboard(port);
    })
  );

const remote = program.command('remote').description('Drive a running dashboard over HTTP');
const urlOption = () => new Option('-u, --url <url>', 'Dashboard URL').default(`http://localhost:${DEFAULT_PORT}`);

remote
  .command('run')
  .description('Start a run on the dashboard and follow its output')
  .addOption(configOption())
  .addOption(urlOption())
  .action(
    action(async (options: { config: string; url: string }) => {
      const config = await loadConfig(options.config);
      const client = new DashboardClient(options.url);
      try {
        const jobId = await client.submitRun(config);
        log.info(`Job ${jobId} started`);
        const view = await client.follow(jobId, (line) => console.log(line));
        if (view.status !== 'succeeded') {
          log.error(`Job ${jobId} ${view.status}${view.error ? `: ${view.error}` : ''}`);
          process.exitCode = 1;
        } else if (view.runId) {
          log.success(`Run ${view.runId} finished; report at ${options.url}/api/runs/${view.runId}/report`);
        }
      } catch (error) {
        throw new Error(describeRequestError(error));
      }
    })
  );

remote
  .command('runs')
  .description('List the runs a dashboard knows about')
  .addOption(urlOption())
  .action(
    action(async (options: { url: string }) => {
      try {
        const runs = await new DashboardClient(options.url).listRuns();
        if (runs.length === 0) log.info('No runs');
        for (const run of runs) console.log(`${run.id}${run.report ? `  ${options.url}${run.report}` : ''}`);
      } catch (error) {
        throw new Error(describeRequestError(error));
      }
    })
  );

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    log.error(errorMessage(error));
    process.exitCode = 1;
  });
}
