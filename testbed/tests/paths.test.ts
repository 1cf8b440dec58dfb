import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { createRunLayout, fileTimestamp, linkLatest, listRunIds, pathExists, readJson, runLayout, startRun, writeJson } from '../paths';
import { FIXED_NOW, tempDir } from './helpers';

describe('run directories', () => {
  it('stamps files with local date and time', () => {
    expect(fileTimestamp(FIXED_NOW)).toBe('20240102_030405');
  });

  it('lays out a run', () => {
    const layout = runLayout('/runs', '20240102_030405');
    expect(layout.latencyDir).toBe(path.join('/runs', '20240102_030405', 'data', 'latency'));
    expect(layout.resultsDir).toBe(path.join('/runs', '20240102_030405', 'results'));
    expect(layout.instanceInfoFile).toBe(path.join('/runs', '20240102_030405', 'instance_info.json'));
  });

  it('creates the data and output directories', async () => {
    const runsDir = await tempDir();
    const layout = await createRunLayout(runsDir, '20240102_030405');

    for (const dir of [layout.latencyDir, layout.p2pDir, layout.udpDir, layout.resultsDir, layout.visualizationDir]) {
      expect(await pathExists(dir)).toBe(true);
    }
  });

  it('lists runs newest first and ignores other entries', async () => {
    const runsDir = await tempDir();
    for (const name of ['20240101_000000', '20240102_000000', '20240102_000000_2', 'notes']) {
      await fs.mkdir(path.join(runsDir, name));
    }
    await fs.writeFile(path.join(runsDir, '20240103_000000'), 'a file');

    expect(await listRunIds(runsDir)).toEqual(['20240102_000000_2', '20240102_000000', '20240101_000000']);
    expect(await listRunIds(path.join(runsDir, 'missing'))).toEqual([]);
  });

  it('points latest at the newest run', async () => {
    const runsDir = await tempDir();
    await createRunLayout(runsDir, '20240101_000000');
    await createRunLayout(runsDir, '20240102_000000');

    await linkLatest(runsDir, '20240101_000000');
    await linkLatest(runsDir, '20240102_000000');

    expect(await fs.readlink(path.join(runsDir, 'latest'))).toBe('20240102_000000');
  });

  it('moves latest to a run started later', async () => {
    const runsDir = await tempDir();
    await startRun(runsDir, '20240101_000000');
    const layout = await startRun(runsDir, '20240102_000000');

    expect(await pathExists(layout.p2pDir)).toBe(true);
    expect(await fs.readlink(path.join(runsDir, 'latest'))).toBe('20240102_000000');
  });

  it('writes JSON with parent directories', async () => {
    const file = path.join(await tempDir(), 'a', 'b.json');
    await writeJson(file, { ok: true });
    expect(await readJson(file)).toEqual({ ok: true });
  });
});
