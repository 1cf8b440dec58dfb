import { errorMessage } from './errors';
import { Logger, logger } from './logger';
import { INSTALL_SCRIPT } from './paths';
import { SessionFactory } from './ssh';
import { StageError } from './types';

export const REMOTE_SCRIPT_PATH = '/tmp/install_iperf3.sh';

export interface InstallOptions {
  scriptPath?: string;
  waitAttempts?: number;
  waitDelayMs?: number;
}

/**
 * Copies the install script to every host and runs it with sudo.
 * Hosts are handled one after another; a failing host does not stop the rest.
 */
export async function installIperf3(
  hosts: string[],
  sessions: SessionFactory,
  options: InstallOptions = {},
  log: Logger = logger
): Promise<StageError[]> {
  const errors: StageError[] = [];
  const scriptPath = options.scriptPath ?? INSTALL_SCRIPT;

  for (const host of hosts) {
    if (!host) {
      errors.push({ stage: 'install', error: 'Host without an address skipped' });
      continue;
    }
    const session = sessions(host);
    try {
      await session.waitUntilReachable({ attempts: options.waitAttempts, delayMs: options.waitDelayMs });
      await session.upload(scriptPath, REMOTE_SCRIPT_PATH);
      await session.exec(`chmod +x ${REMOTE_SCRIPT_PATH} && sudo bash ${REMOTE_SCRIPT_PATH}`, {
        onLine: (line) => log.output(`[${host}] ${line}`),
      });
      log.success(`iperf3 installed on ${host}`);
    } catch (error) {
      log.error(`iperf3 installation on ${host} failed: ${errorMessage(error)}`);
      errors.push({ stage: 'install', error: `${host}: ${errorMessage(error)}` });
    }
  }
  return errors;
}
