import fsSync from 'fs';
import fs from 'fs/promises';
import path from 'path';

function findProjectRoot(start: string): string {
  let dir = start;
  while (!fsSync.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

// Same answer from testbed/ and from dist/testbed/
export const PROJECT_ROOT = findProjectRoot(__dirname);

export const ASSETS_DIR = path.join(PROJECT_ROOT, 'assets');
export const TERRAFORM_DIR = process.env.NETBENCH_TERRAFORM_DIR ?? path.join(PROJECT_ROOT, 'terraform');
export const RUNS_DIR = process.env.NETBENCH_RUNS_DIR ?? path.join(PROJECT_ROOT, 'runs');
export const KEYS_DIR = path.join(PROJECT_ROOT, 'keys');
export const INSTALL_SCRIPT = path.join(ASSETS_DIR, 'install_iperf3.sh');

const pad = (value: number) => String(value).padStart(2, '0');

// yyyymmdd_hhmmss, local time
export function fileTimestamp(now: Date = new Date()): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export interface RunLayout {
  runId: string;
  root: string;
  dataDir: string;
  latencyDir: string;
  p2pDir: string;
  udpDir: string;
  resultsDir: string;
  visualizationDir: string;
  logFile: string;
  instanceInfoFile: string;
}

export function runLayout(runsDir: string, runId: string): RunLayout {
  const root = path.join(runsDir, runId);
  const dataDir = path.join(root, 'data');
  return {
    runId,
    root,
    dataDir,
    latencyDir: path.join(dataDir, 'latency'),
    p2pDir: path.join(dataDir, 'p2p'),
    udpDir: path.join(dataDir, 'udp'),
    resultsDir: path.join(root, 'results'),
    visualizationDir: path.join(root, 'visualization'),
    logFile: path.join(root, 'run.log'),
    instanceInfoFile: path.join(root, 'instance_info.json'),
  };
}

export async function createRunLayout(runsDir: string, runId: string = fileTimestamp()): Promise<RunLayout> {
  const layout = runLayout(runsDir, runId);
  for (const dir of [layout.latencyDir, layout.p2pDir, layout.udpDir, layout.resultsDir, layout.visualizationDir]) {
    await fs.mkdir(dir, { recursive: true });
  }
  return layout;
}

/**
 * Point `runs/latest` at the given run. Platforms without symlink support
 * get a plain file holding the run id.
 */
export async function linkLatest(runsDir: string, runId: string): Promise<void> {
  const link = path.join(runsDir, 'latest');
  await fs.rm(link, { force: true, recursive: true });
  try {
    await fs.symlink(runId, link, 'dir');
  } catch {
    await fs.writeFile(link, runId);
  }
}

/**
 * A new run directory that `runs/latest` points at.
 */
export async function startRun(runsDir: string, runId: string = fileTimestamp()): Promise<RunLayout> {
  const layout = await createRunLayout(runsDir, runId);
  await linkLatest(runsDir, runId);
  return layout;
}

export async function listRunIds(runsDir: string): Promise<string[]> {
  let entries: fsSync.Dirent[];
  try {
    entries = await fs.readdir(runsDir, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((entry) => entry.isDirectory() && /^\d{8}_\d{6}(_\d+)?$/.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .reverse();
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2));
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}
