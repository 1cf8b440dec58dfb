import fs from 'fs/promises';
import path from 'path';
import { errorMessage, RemoteError } from './errors';
import { Logger, logger } from './logger';
import { CliTool, CommandOptions, CommandResult, CommandRunner, Sleep, sleep as defaultSleep, ToolRun } from './tools';

export const DEFAULT_SSH_USER = 'ec2-user';

export interface SshOptions {
  keyPath: string;
  user?: string;
  connectTimeoutSec?: number;
}

export interface WaitOptions {
  attempts?: number;
  delayMs?: number;
}

/**
 * Commands on one benchmark host, over the system ssh and scp clients.
 */
export class SshSession {
  readonly user: string;

  constructor(
    readonly host: string,
    private readonly runner: CommandRunner,
    private readonly options: SshOptions,
    private readonly log: Logger = logger,
    private readonly sleep: Sleep = defaultSleep
  ) {
    this.user = options.user ?? DEFAULT_SSH_USER;
  }

  private commonArgs(): string[] {
    return [
      '-i', this.options.keyPath,
      '-o', 'StrictHostKeyChecking=no',
      '-o', 'UserKnownHostsFile=/dev/null',
      '-o', 'BatchMode=yes',
      '-o', 'LogLevel=ERROR',
      '-o', `ConnectTimeout=${this.options.connectTimeoutSec ?? 5}`,
    ];
  }

  get target(): string {
    return `${this.user}@${this.host}`;
  }

  /**
   * Arguments for `ssh` running `remoteCommand` on this host.
   */
  sshArgs(remoteCommand: string): string[] {
    return [...this.commonArgs(), this.target, remoteCommand];
  }

  exec(remoteCommand: string, options: CommandOptions = {}): Promise<CommandResult> {
    this.log.debug(`[${this.host}] ${remoteCommand}`);
    return this.runner.run('ssh', this.sshArgs(remoteCommand), options);
  }

  runTool<T>(tool: CliTool<T>, remoteCommand: string, options: CommandOptions = {}): Promise<ToolRun<T>> {
    this.log.debug(`[${this.host}] ${remoteCommand}`);
    return tool.run(this.runner, 'ssh', this.sshArgs(remoteCommand), options);
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    await this.runner.run('scp', [...this.commonArgs(), localPath, `${this.target}:${remotePath}`]);
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await this.runner.run('scp', [...this.commonArgs(), `${this.target}:${remotePath}`, localPath]);
  }

  async isReachable(): Promise<boolean> {
    const { code } = await this.runner.run('ssh', this.sshArgs('echo ok'), { allowFailure: true });
    return code === 0;
  }

  async waitUntilReachable({ attempts = 10, delayMs = 10_000 }: WaitOptions = {}): Promise<void> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      let reachable = false;
      try {
        reachable = await this.isReachable();
      } catch (error) {
        this.log.debug(`ssh probe of ${this.host} failed: ${errorMessage(error)}`);
      }
      if (reachable) {
        this.log.debug(`${this.host} reachable after ${attempt} attempt(s)`);
        return;
      }
      if (attempt < attempts) {
        this.log.info(`Waiting for SSH on ${this.host} (attempt ${attempt}/${attempts})`);
        await this.sleep(delayMs);
      }
    }
    throw new RemoteError(this.host, `SSH not reachable after ${attempts} attempts`);
  }
}

export type SessionFactory = (host: string) => SshSession;

export function sessionFactory(
  runner: CommandRunner,
  options: SshOptions,
  log: Logger = logger,
  sleep: Sleep = defaultSleep
): SessionFactory {
  return (host) => new SshSession(host, runner, options, log, sleep);
}

/**
 * Private key for `name` under `keysDir`, created with ssh-keygen when
 * `create` is set and it does not exist yet.
 */
export async function ensureSshKey(
  runner: CommandRunner,
  name: string,
  keysDir: string,
  create: boolean,
  log: Logger = logger
): Promise<string> {
  const keyPath = path.join(keysDir, `${name}.pem`);
  try {
    await fs.access(keyPath);
    return keyPath;
  } catch {
    if (!create) {
      throw new RemoteError('localhost', `SSH key ${keyPath} not found; set create_ssh_key to generate one`);
    }
  }

  await fs.mkdir(keysDir, { recursive: true });
  log.info(`Creating SSH key ${keyPath}`);
  await runner.run('ssh-keygen', ['-t', 'rsa', '-b', '2048', '-m', 'PEM', '-N', '', '-C', name, '-f', keyPath]);
  await fs.chmod(keyPath, 0o600);
  return keyPath;
}

export function publicKeyPath(privateKeyPath: string): string {
  return `${privateKeyPath}.pub`;
}
