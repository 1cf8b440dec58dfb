import cliProgress from 'cli-progress';
import fs from 'fs/promises';
import path from 'path';
import { AwsCredentials, CloudApi, credentialsEnv, resolveAmiIds } from './aws';
import { buildCharts, ChartSpec, loadConnectionSeries, writeCharts } from './charts';
import { collectResults, writeCollectedResults } from './collect';
import { BenchmarkConfig } from './config';
import { errorMessage, PipelineError } from './errors';
import { formatData, writeFormattedData } from './format';
import { installIperf3, InstallOptions } from './install';
import { instanceInfoFromTerraform, listInstances, loadRegionNames, sshAddress, writeInstanceInfo } from './inventory';
import { runLatencyTests } from './latency';
import { FileSink, Logger, logger } from './logger';
import { runPointToPointTests } from './p2p';
import { TestContext } from './pairs';
import { parseResults } from './parse';
import { createRunLayout, fileTimestamp, KEYS_DIR, linkLatest, pathExists, RunLayout, RUNS_DIR, TERRAFORM_DIR, writeJson } from './paths';
import { writeReport } from './report';
import { ensureSshKey, publicKeyPath, SessionFactory, sessionFactory, SshOptions } from './ssh';
import { generateTerraform, TerraformRunner } from './terraform';
import { CommandRunner, Sleep, sleep as defaultSleep, Stopwatch } from './tools';
import { InstanceInfo, RunResult, StageError, Timing } from './types';
import { runUdpTests } from './udp';

export const COLLECTED_FILE = 'collected_results.json';

export interface PipelineDeps {
  runner: CommandRunner;
  cloud: CloudApi;
  log?: Logger;
  sleep?: Sleep;
  // ssh sessions for a given key; defaults to the system ssh client
  sessions?: (options: SshOptions) => SessionFactory;
  credentials?: AwsCredentials;
  runsDir?: string;
  terraformDir?: string;
  keysDir?: string;
  runId?: string;
  progress?: boolean;
  install?: InstallOptions;
}

export interface AnalysisOptions {
  dataDir: string;
  resultsDir: string;
  visualizationDir: string;
  reportDir: string;
  visualize: boolean;
  report: boolean;
}

export type StageRunner = <T>(name: string, fn: () => Promise<T>) => Promise<T | undefined>;

const runDirectly: StageRunner = (_name, fn) => fn();

export interface AnalysisResult {
  reportPath?: string;
  charts: ChartSpec[];
}

/**
 * collect → parse → format → visualize → report over one data directory.
 * `stage` wraps each step so a caller can time it and record its failure.
 */
export async function analyzeResults(
  options: AnalysisOptions,
  log: Logger = logger,
  stage: StageRunner = runDirectly
): Promise<AnalysisResult> {
  const collected = await stage('collect', async () => {
    const results = await collectResults(options.dataDir, log);
    await writeCollectedResults(results, path.join(options.resultsDir, COLLECTED_FILE));
    return results;
  });
  if (!collected) return { charts: [] };

  const parsed = await stage('parse', () => parseResults(collected, options.resultsDir, log));
  if (!parsed) return { charts: [] };

  const formatted = await stage('format', async () => {
    const data = formatData(parsed.rows);
    await writeFormattedData(data, options.resultsDir, log);
    return data;
  });

  let charts: ChartSpec[] = [];
  if (options.visualize && formatted) {
    charts =
      (await stage('visualize', async () => {
        const series = await loadConnectionSeries(options.dataDir, collected);
        const built = buildCharts(parsed.rows, formatted, series);
        await writeCharts(built, options.visualizationDir, log);
        return built;
      })) ?? [];
  }

  let reportPath: string | undefined;
  if (options.report) {
    reportPath = await stage('report', async () =>
      writeReport({ summary: parsed.summary, charts, regionNames: await loadRegionNames() }, options.reportDir, log)
    );
  }
  return { reportPath, charts };
}

function plannedStages(config: BenchmarkConfig): string[] {
  const stages = ['provision', 'inventory'];
  if (config.install_iperf3) stages.push('install');
  if (config.run_tests) {
    if (config.run_latency_tests) stages.push('latency');
    if (config.run_p2p_tests) stages.push('p2p');
    if (config.run_udp_tests) stages.push('udp');
  }
  stages.push('collect', 'parse', 'format');
  if (config.generate_visualizations) stages.push('visualize');
  if (config.generate_report) stages.push('report');
  if (config.cleanup_resources) stages.push('cleanup');
  return stages;
}

/**
 * One complete benchmark run in its own directory under `runsDir`.
 *
 * Provisioning and inventory failures abort the run (destroying what was
 * applied when cleanup is enabled). Any other failing stage is recorded in
 * `errors` and the run carries on.
 */
export async function runBenchmark(config: BenchmarkConfig, deps: PipelineDeps): Promise<RunResult> {
  const log = deps.log ?? logger;
  const sleep = deps.sleep ?? defaultSleep;
  const runsDir = deps.runsDir ?? RUNS_DIR;
  const terraformDir = deps.terraformDir ?? TERRAFORM_DIR;
  const layout: RunLayout = await createRunLayout(runsDir, deps.runId ?? fileTimestamp());
  const fileSink = new FileSink(layout.logFile);
  log.addSink(fileSink);

  const planned = plannedStages(config);
  const bar = deps.progress
    ? new cliProgress.SingleBar(
        {
          format: `netbench | {bar} | {percentage}% | {value}/{total} stages | {stage}`,
          barCompleteChar: '█',
          barIncompleteChar: '░',
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic
      )
    : null;

  const errors: StageError[] = [];
  const stages: Record<string, Timing> = {};
  let completed = 0;

  async function stage<T>(name: string, fn: () => Promise<T>): Promise<T | undefined> {
    const stopwatch = new Stopwatch();
    stopwatch.start();
    bar?.update(completed, { stage: name });
    log.info(`Stage ${name} started`);
    try {
      return await fn();
    } catch (error) {
      log.error(`Stage ${name} failed: ${errorMessage(error)}`);
      errors.push({ stage: name, error: errorMessage(error) });
      return undefined;
    } finally {
      stopwatch.stop();
      stages[name] = stopwatch.getTiming();
      completed++;
      bar?.update(completed, { stage: name });
    }
  }

  const total = new Stopwatch();
  total.start();
  bar?.start(planned.length, 0, { stage: 'Starting' });
  log.info(`Benchmark run ${layout.runId} in ${layout.root}`);

  const env = credentialsEnv(deps.credentials);
  const terraform = new TerraformRunner(deps.runner, terraformDir, log.child('terraform'), env);
  let applyAttempted = false;

  const abort = async (): Promise<void> => {
    if (config.cleanup_resources && applyAttempted) {
      log.warn('Destroying provisioned resources after the failure');
      await stage('cleanup', () => terraform.destroy());
    }
  };

  try {
    await writeJson(path.join(layout.root, 'config.json'), config);

    const keyPath = await stage('provision', async () => {
      const key = await ensureSshKey(deps.runner, config.ssh_key_name, deps.keysDir ?? KEYS_DIR, config.create_ssh_key, log);
      const pubKey = publicKeyPath(key);
      const publicKey = (await pathExists(pubKey)) ? (await fs.readFile(pubKey, 'utf8')).trim() : '';
      const amiIds = await resolveAmiIds(deps.cloud, config.aws_regions, config.ami_ids, log);
      await generateTerraform(config, terraformDir, { modulesDir: path.join(terraformDir, 'modules'), amiIds, publicKey }, log);
      if (config.run_terraform_apply) {
        await terraform.init();
        applyAttempted = true;
        await terraform.apply();
      } else {
        log.info('Terraform apply disabled, using the existing deployment');
      }
      return key;
    });
    if (keyPath === undefined) {
      await abort();
      return await finish();
    }

    const info = await stage('inventory', async (): Promise<InstanceInfo> => {
      const result = instanceInfoFromTerraform(await terraform.output(), log);
      if (Object.keys(result.instances).length === 0) {
        throw new PipelineError('inventory', 'Terraform output lists no instances');
      }
      await writeInstanceInfo(layout.instanceInfoFile, result);
      log.success(`Instance info saved to ${layout.instanceInfoFile}`);
      return result;
    });
    if (!info) {
      await abort();
      return await finish();
    }

    const sessions = (deps.sessions ?? ((options: SshOptions) => sessionFactory(deps.runner, options, log, sleep)))({ keyPath });
    const ctx: TestContext = { sessions, log, sleep };
    const hosts = listInstances(info).map(sshAddress);

    if (config.install_iperf3) {
      await stage('install', async () => {
        errors.push(...(await installIperf3(hosts, sessions, deps.install, log)));
      });
    }

    if (config.run_tests) {
      if (config.run_latency_tests) {
        await stage('latency', async () => {
          const run = await runLatencyTests(
            info,
            {
              outputDir: layout.latencyDir,
              pingCount: config.ping_count,
              usePrivateIp: config.use_private_ip,
              intraRegion: config.test_intra_region,
            },
            ctx
          );
          errors.push(...run.errors);
        });
      }
      if (config.run_p2p_tests) {
        await stage('p2p', async () => {
          const run = await runPointToPointTests(
            info,
            {
              outputDir: layout.p2pDir,
              durationSec: config.p2p_duration,
              parallel: config.p2p_parallel,
              usePrivateIp: config.use_private_ip,
              intraRegion: config.test_intra_region,
            },
            ctx
          );
          errors.push(...run.errors);
        });
      }
      if (config.run_udp_tests) {
        await stage('udp', async () => {
          const serverRegion = config.udp_server_region;
          if (!serverRegion) throw new PipelineError('udp', 'udp_server_region is not set');
          const run = await runUdpTests(
            info,
            {
              outputDir: layout.udpDir,
              serverRegion,
              bandwidth: config.udp_bandwidth,
              durationSec: config.udp_duration,
              usePrivateIp: config.use_private_ip,
              intraRegion: config.test_intra_region,
            },
            ctx
          );
          errors.push(...run.errors);
        });
      }
    } else {
      log.info('Tests disabled');
    }

    const analysis = await analyzeResults(
      {
        dataDir: layout.dataDir,
        resultsDir: layout.resultsDir,
        visualizationDir: layout.visualizationDir,
        reportDir: layout.root,
        visualize: config.generate_visualizations,
        report: config.generate_report,
      },
      log,
      stage
    );

    if (config.cleanup_resources) {
      await stage('cleanup', () => terraform.destroy());
    } else {
      log.warn('Resources left running; destroy them with `netbench destroy`');
    }
    return await finish(analysis.reportPath);
  } finally {
    bar?.stop();
    log.removeSink(fileSink);
  }

  async function finish(reportPath?: string): Promise<RunResult> {
    total.stop();
    await linkLatest(runsDir, layout.runId);
    const result: RunResult = {
      runId: layout.runId,
      runDir: layout.root,
      durations: { total: total.getTiming(), stages },
      errors,
      ...(reportPath ? { reportPath } : {}),
    };
    await writeJson(path.join(layout.root, 'run_result.json'), result);
    if (errors.length > 0) {
      log.warn(`Run ${layout.runId} finished with ${errors.length} error(s)`);
      for (const { stage: name, error } of errors) log.warn(`  ${name}: ${error}`);
    } else {
      log.success(`Run ${layout.runId} finished in ${(total.getTiming().duration / 1000).toFixed(1)}s`);
    }
    return result;
  }
}
