import { describe, expect, it } from 'vitest';
import { JobManager } from '../jobs';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function manager() {
  let next = 0;
  return new JobManager({ silent: true, newId: () => `job-${String(++next).padStart(8, '0')}` });
}

describe('JobManager', () => {
  it('runs one job at a time', async () => {
    const jobs = manager();
    const gate = deferred<void>();

    const first = jobs.start('run', async () => {
      await gate.promise;
      return { runId: '20240102_030405', errors: 0 };
    });
    expect(first).toBe('job-00000001');
    expect(jobs.activeJobId).toBe('job-00000001');
    expect(jobs.start('cleanup', async () => ({}))).toBeNull();

    gate.resolve();
    await jobs.wait('job-00000001');

    expect(jobs.activeJobId).toBeNull();
    expect(jobs.view('job-00000001')).toMatchObject({ kind: 'run', status: 'succeeded', runId: '20240102_030405', errors: 0 });
    expect(jobs.start('cleanup', async () => ({}))).toBe('job-00000002');
  });

  it('keeps the log output of each job', async () => {
    const jobs = manager();
    const id = jobs.start('run', async (log) => {
      log.info('Stage provision started');
      log.warn('Resources left running');
      return {};
    });
    if (!id) throw new Error('job did not start');
    await jobs.wait(id);

    const view = jobs.view(id);
    expect(view?.lines).toHaveLength(2);
    expect(view?.lines[0].endsWith('[info] (run:job-0000) Stage provision started')).toBe(true);
    expect(view?.nextOffset).toBe(2);
    expect(jobs.view(id, 1)?.lines).toEqual([view?.lines[1]]);
    expect(jobs.view(id, 99)?.lines).toEqual([]);
  });

  it('marks rejected tasks and runs with errors as failed', async () => {
    const jobs = manager();
    const crashed = jobs.start('cleanup', async () => {
      throw new Error('terraform not found');
    });
    if (!crashed) throw new Error('job did not start');
    await jobs.wait(crashed);

    const view = jobs.view(crashed);
    expect(view).toMatchObject({ status: 'failed', error: 'terraform not found' });
    expect(view?.lines[view.lines.length - 1].endsWith('[error] (cleanup:job-0000) Job failed: terraform not found')).toBe(true);
    expect(view?.finishedAt).not.toBeNull();

    const partial = jobs.start('run', async () => ({ runId: '20240102_030405', errors: 2 }));
    if (!partial) throw new Error('job did not start');
    await jobs.wait(partial);
    expect(jobs.view(partial)).toMatchObject({ status: 'failed', errors: 2, error: null });
  });

  it('knows nothing of other ids', () => {
    expect(manager().view('nope')).toBeNull();
  });
});
