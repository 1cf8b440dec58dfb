import express, { Request, Response } from 'express';
import fs from 'fs/promises';
import http from 'http';
import path from 'path';
import { z } from 'zod';
import { AwsCloudApi, AwsCredentials, CallerIdentity, credentialsEnv } from './aws';
import { BenchmarkConfig, DEFAULT_CONFIG, parseConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { JobManager } from './jobs';
import { Logger, logger } from './logger';
import { SUMMARY_FILE } from './parse';
import { listRunIds, pathExists, readJson, RUNS_DIR, TERRAFORM_DIR } from './paths';
import { runBenchmark } from './pipeline';
import { escapeHtml } from './report';
import { TerraformRunner } from './terraform';
import { ProcessRunner } from './tools';
import { RunResult } from './types';

export const DEFAULT_PORT = 3000;

const credentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

const runRequestSchema = z.object({
  config: z.unknown(),
  credentials: credentialsSchema.optional(),
});

const credentialsRequestSchema = z.object({ credentials: credentialsSchema.optional() }).default({});

const RUN_ID = /^\d{8}_\d{6}(_\d+)?$/;

export interface DashboardDeps {
  runsDir: string;
  jobs: JobManager;
  runBenchmark(config: BenchmarkConfig, credentials: AwsCredentials | undefined, log: Logger): Promise<RunResult>;
  cleanup(credentials: AwsCredentials | undefined, log: Logger): Promise<void>;
  verifyCredentials(credentials: AwsCredentials | undefined): Promise<CallerIdentity>;
  log?: Logger;
}

/**
 * Production wiring: real subprocesses, AWS SDK clients and the shared terraform directory.
 */
export function defaultDashboardDeps(log: Logger = logger): DashboardDeps {
  return {
    runsDir: RUNS_DIR,
    jobs: new JobManager(),
    log,
    runBenchmark: (config, credentials, jobLog) =>
      runBenchmark(config, {
        runner: new ProcessRunner(jobLog),
        cloud: new AwsCloudApi(credentials),
        credentials,
        log: jobLog,
      }),
    cleanup: (credentials, jobLog) =>
      new TerraformRunner(new ProcessRunner(jobLog), TERRAFORM_DIR, jobLog, credentialsEnv(credentials)).destroy(),
    verifyCredentials: (credentials) => new AwsCloudApi(credentials).callerIdentity(),
  };
}

interface RunListing {
  id: string;
  hasSummary: boolean;
  report: string | null;
}

async function findReport(runDir: string): Promise<string | null> {
  let names: string[];
  try {
    names = await fs.readdir(runDir);
  } catch {
    return null;
  }
  const reports = names.filter((name) => /^network_benchmark_report_.*\.html$/.test(name)).sort();
  return reports.length > 0 ? path.join(runDir, reports[reports.length - 1]) : null;
}

async function listRuns(runsDir: string): Promise<RunListing[]> {
  const runs: RunListing[] = [];
  for (const id of await listRunIds(runsDir)) {
    const runDir = path.join(runsDir, id);
    const report = await findReport(runDir);
    runs.push({
      id,
      hasSummary: await pathExists(path.join(runDir, 'results', SUMMARY_FILE)),
      report: report ? `/api/runs/${id}/report` : null,
    });
  }
  return runs;
}

function indexPage(runs: RunListing[], activeJob: string | null): string {
  const items = runs.map(
    (run) =>
      `<li>${escapeHtml(run.id)}${run.report ? ` &middot; <a href="${escapeHtml(run.report)}">report</a>` : ''}` +
      `${run.hasSummary ? ` &middot; <a href="/api/runs/${escapeHtml(run.id)}/summary">summary</a>` : ''}</li>`
  );
  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="utf-8"><title>netbench dashboard</title></head>
<body style="font-family: sans-serif; max-width: 900px; margin: 2em auto">
<h1>netbench</h1>
<p>${activeJob ? `Job ${escapeHtml(activeJob)} is running.` : 'No job running.'}</p>
<h2>Runs</h2>
<ul>${items.join('\n') || '<li>No runs yet</li>'}</ul>
</body>
</html>
`;
}

export function createApp(deps: DashboardDeps): express.Express {
  const log = (deps.log ?? logger).child('dashboard');
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const fail = (res: Response, status: number, error: unknown) => {
    const message = errorMessage(error);
    if (status >= 500) log.error(message);
    res.status(status).json({ error: message });
  };

  app.get('/', async (_req: Request, res: Response) => {
    try {
      res.type('html').send(indexPage(await listRuns(deps.runsDir), deps.jobs.activeJobId));
    } catch (error) {
      fail(res, 500, error);
    }
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), activeJob: deps.jobs.activeJobId });
  });

  app.get('/api/config/defaults', (_req: Request, res: Response) => {
    res.json(DEFAULT_CONFIG);
  });

  app.post('/api/credentials/verify', async (req: Request, res: Response) => {
    const body = credentialsRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid credentials payload' });
      return;
    }
    try {
      const identity = await deps.verifyCredentials(body.data.credentials);
      res.json({ valid: true, identity });
    } catch (error) {
      res.status(401).json({ valid: false, error: errorMessage(error) });
    }
  });

  app.post('/api/runs', (req: Request, res: Response) => {
    const body = runRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Expected { config, credentials? }' });
      return;
    }
    let config: BenchmarkConfig;
    try {
      config = parseConfig(body.data.config);
    } catch (error) {
      res.status(400).json({ error: errorMessage(error), issues: error instanceof ConfigError ? error.issues : [] });
      return;
    }
    const credentials = body.data.credentials;
    const jobId = deps.jobs.start('run', async (jobLog) => {
      const result = await deps.runBenchmark(config, credentials, jobLog);
      return { runId: result.runId, errors: result.errors.length };
    });
    if (!jobId) {
      res.status(409).json({ error: 'Another job is running', activeJob: deps.jobs.activeJobId });
      return;
    }
    log.info(`Run job ${jobId} started for ${config.aws_regions.join(', ')}`);
    res.status(202).json({ jobId });
  });

  app.get('/api/runs', async (_req: Request, res: Response) => {
    try {
      res.json({ runs: await listRuns(deps.runsDir) });
    } catch (error) {
      fail(res, 500, error);
    }
  });

  app.get('/api/jobs/:id', (req: Request, res: Response) => {
    const raw = req.query.offset;
    const offset = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : 0;
    const view = deps.jobs.view(req.params.id, offset);
    if (!view) {
      res.status(404).json({ error: `Unknown job ${req.params.id}` });
      return;
    }
    res.json(view);
  });

  app.get('/api/runs/:id/summary', async (req: Request, res: Response) => {
    const { id } = req.params;
    if (!RUN_ID.test(id)) {
      res.status(400).json({ error: `Invalid run id ${id}` });
      return;
    }
    const file = path.join(deps.runsDir, id, 'results', SUMMARY_FILE);
    if (!(await pathExists(file))) {
      res.status(404).json({ error: `No summary for run ${id}` });
      return;
    }
    try {
      res.json(await readJson(file));
    } catch (error) {
      fail(res, 500, error);
    }
  });

  app.get('/api/runs/:id/report', async (req: Request, res: Response) => {
    const { id } = req.params;
    if (!RUN_ID.test(id)) {
      res.status(400).json({ error: `Invalid run id ${id}` });
      return;
    }
    try {
      const report = await findReport(path.join(deps.runsDir, id));
      if (!report) {
        res.status(404).json({ error: `No report for run ${id}` });
        return;
      }
      res.type('html').send(await fs.readFile(report, 'utf8'));
    } catch (error) {
      fail(res, 500, error);
    }
  });

  app.post('/api/cleanup', (req: Request, res: Response) => {
    const body = credentialsRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid credentials payload' });
      return;
    }
    const credentials = body.data.credentials;
    const jobId = deps.jobs.start('cleanup', async (jobLog) => {
      await deps.cleanup(credentials, jobLog);
      jobLog.success('Cleanup finished');
      return {};
    });
    if (!jobId) {
      res.status(409).json({ error: 'Another job is running', activeJob: deps.jobs.activeJobId });
      return;
    }
    log.info(`Cleanup job ${jobId} started`);
    res.status(202).json({ jobId });
  });

  return app;
}

export function startDashboard(port: number, deps: DashboardDeps = defaultDashboardDeps()): Promise<http.Server> {
  const log = deps.log ?? logger;
  const app = createApp(deps);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.success(`Dashboard listening on http://localhost:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
