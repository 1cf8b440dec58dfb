import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { FileSink, Logger, MemorySink } from '../logger';
import { tempDir } from './helpers';

const stamped = (line: string) => line.replace(/^\S+ /, '');

describe('Logger', () => {
  it('writes tagged lines with their context to sinks', () => {
    const sink = new MemorySink();
    const log = new Logger({ silent: true, level: 'info', sinks: [sink], context: 'p2p' });

    log.info('Testing us-east-1 -> eu-west-2');
    log.success('Done');
    log.debug('hidden at info level');

    expect(sink.lines.map(stamped)).toEqual(['[info] (p2p) Testing us-east-1 -> eu-west-2', '[ok] (p2p) Done']);
    expect(Number.isNaN(Date.parse(sink.lines[0].split(' ')[0]))).toBe(false);
  });

  it('shares level and sinks with its children', () => {
    const sink = new MemorySink();
    const log = new Logger({ silent: true, sinks: [sink], context: 'run' });
    const child = log.child('udp');

    log.setLevel('debug');
    child.debug('round 1');
    child.output('raw iperf3 line');

    expect(sink.lines.map((line, index) => (index === 0 ? stamped(line) : line))).toEqual([
      '[debug] (run:udp) round 1',
      'raw iperf3 line',
    ]);
  });

  it('stops writing to removed sinks', () => {
    const sink = new MemorySink();
    const log = new Logger({ silent: true, level: 'info' });
    log.addSink(sink);
    log.warn('kept');
    log.removeSink(sink);
    log.error('dropped');

    expect(sink.lines.map(stamped)).toEqual(['[warn] kept']);
  });

  it('appends to a log file', async () => {
    const file = path.join(await tempDir(), 'logs', 'run.log');
    const log = new Logger({ silent: true, sinks: [new FileSink(file)] });

    log.info('first');
    log.info('second');

    const lines = (await fs.readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines.map(stamped)).toEqual(['[info] first', '[info] second']);
  });
});
