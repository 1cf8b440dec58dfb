import fsSync from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { installIperf3, REMOTE_SCRIPT_PATH } from '../install';
import { ensureSshKey, publicKeyPath, sessionFactory } from '../ssh';
import { FakeRunner, memoryLogger, noSleep, remoteCommand, sshHost, tempDir } from './helpers';

const COMMON = [
  '-i', '/keys/test.pem',
  '-o', 'StrictHostKeyChecking=no',
  '-o', 'UserKnownHostsFile=/dev/null',
  '-o', 'BatchMode=yes',
  '-o', 'LogLevel=ERROR',
  '-o', 'ConnectTimeout=5',
];

function recordingSleep() {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

describe('SshSession', () => {
  it('runs commands as ec2-user without host key prompts', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'Linux\n' }));
    const session = sessionFactory(runner, { keyPath: '/keys/test.pem' }, memoryLogger().log, noSleep)('3.0.0.1');

    const result = await session.exec('uname');

    expect(result.stdout).toBe('Linux\n');
    expect(runner.calls[0].command).toBe('ssh');
    expect(runner.calls[0].args).toEqual([...COMMON, 'ec2-user@3.0.0.1', 'uname']);
  });

  it('copies files with scp', async () => {
    const runner = new FakeRunner();
    const session = sessionFactory(runner, { keyPath: '/keys/test.pem', user: 'ubuntu' }, memoryLogger().log)('3.0.0.1');

    await session.upload('/local/install.sh', '/tmp/install.sh');

    expect(runner.calls[0].command).toBe('scp');
    expect(runner.calls[0].args).toEqual([...COMMON, '/local/install.sh', 'ubuntu@3.0.0.1:/tmp/install.sh']);
  });

  it('retries until the host answers', async () => {
    let probes = 0;
    const runner = new FakeRunner(() => {
      probes++;
      return { code: probes < 3 ? 255 : 0 };
    });
    const { waits, sleep } = recordingSleep();
    const session = sessionFactory(runner, { keyPath: '/keys/test.pem' }, memoryLogger().log, sleep)('3.0.0.1');

    await session.waitUntilReachable({ attempts: 5, delayMs: 1000 });

    expect(probes).toBe(3);
    expect(waits).toEqual([1000, 1000]);
    expect(runner.calls.map((call) => remoteCommand(call.args))).toEqual(['echo ok', 'echo ok', 'echo ok']);
  });

  it('gives up after the last attempt without sleeping again', async () => {
    const runner = new FakeRunner(() => ({ code: 255 }));
    const { waits, sleep } = recordingSleep();
    const session = sessionFactory(runner, { keyPath: '/keys/test.pem' }, memoryLogger().log, sleep)('3.0.0.1');

    await expect(session.waitUntilReachable({ attempts: 3, delayMs: 500 })).rejects.toThrow(
      '3.0.0.1: SSH not reachable after 3 attempts'
    );
    expect(waits).toEqual([500, 500]);
  });
});

describe('ensureSshKey', () => {
  it('uses an existing key', async () => {
    const dir = await tempDir();
    await fs.writeFile(path.join(dir, 'bench.pem'), 'test-key');
    const runner = new FakeRunner();

    expect(await ensureSshKey(runner, 'bench', dir, false, memoryLogger().log)).toBe(path.join(dir, 'bench.pem'));
    expect(runner.calls).toEqual([]);
  });

  it('refuses to invent a key unless asked', async () => {
    const dir = await tempDir();
    const keyPath = path.join(dir, 'bench.pem');
    await expect(ensureSshKey(new FakeRunner(), 'bench', dir, false, memoryLogger().log)).rejects.toThrow(
      `localhost: SSH key ${keyPath} not found; set create_ssh_key to generate one`
    );
  });

  it('generates a PEM key pair with ssh-keygen', async () => {
    const dir = path.join(await tempDir(), 'keys');
    const runner = new FakeRunner((command, args) => {
      if (command === 'ssh-keygen') {
        const target = args[args.length - 1];
        fsSync.writeFileSync(target, 'test-private-key');
        fsSync.writeFileSync(publicKeyPath(target), 'ssh-rsa AAAATEST bench');
      }
      return undefined;
    });

    const keyPath = await ensureSshKey(runner, 'bench', dir, true, memoryLogger().log);

    expect(keyPath).toBe(path.join(dir, 'bench.pem'));
    expect(runner.calls[0].args).toEqual(['-t', 'rsa', '-b', '2048', '-m', 'PEM', '-N', '', '-C', 'bench', '-f', keyPath]);
    expect((await fs.stat(keyPath)).mode & 0o777).toBe(0o600);
  });
});

describe('installIperf3', () => {
  it('uploads and runs the script on each host, carrying on past failures', async () => {
    const runner = new FakeRunner((command, args) => {
      if (command === 'ssh' && sshHost(args) === '3.0.0.2' && remoteCommand(args).includes('sudo bash')) {
        return { code: 1, stderr: 'yum failed' };
      }
      return undefined;
    });
    const { log } = memoryLogger();
    const sessions = sessionFactory(runner, { keyPath: '/keys/test.pem' }, log, noSleep);

    const errors = await installIperf3(['3.0.0.1', '3.0.0.2', ''], sessions, { scriptPath: '/assets/install.sh' }, log);

    expect(runner.remote().filter((line) => line.startsWith('3.0.0.1'))).toEqual([
      '3.0.0.1: echo ok',
      `3.0.0.1: chmod +x ${REMOTE_SCRIPT_PATH} && sudo bash ${REMOTE_SCRIPT_PATH}`,
    ]);
    const upload = runner.calls.find((call) => call.command === 'scp');
    expect(upload?.args.slice(-2)).toEqual(['/assets/install.sh', `ec2-user@3.0.0.1:${REMOTE_SCRIPT_PATH}`]);

    expect(errors).toHaveLength(2);
    expect(errors[0].stage).toBe('install');
    expect(errors[0].error.startsWith('3.0.0.2: Command failed with code 1: ssh ')).toBe(true);
    expect(errors[0].error.endsWith('\nyum failed')).toBe(true);
    expect(errors[1]).toEqual({ stage: 'install', error: 'Host without an address skipped' });
  });
});
