// Listener Probe - who is listening on host:port
// Prefers `ss -ltnp` (gives owner pids); falls back to a TCP connect when ss is unavailable

import { execFile } from 'child_process';
import { promisify } from 'util';
import * as net from 'net';
import { BindAddress, ListenerInfo } from '../../../../domain/types/process';
import { formatBindAddress, isWildcardHost, occupiesAddress } from '../../../../domain/executors/bindAddress';
import { log as logShared, logVerbose } from '../../../adapters/logging/logger';

const execFileAsync = promisify(execFile);

const CONNECT_TIMEOUT_MS = 1000;

function log(message: string, ...args: unknown[]): void {
  logShared('ListenerProbe', message, ...args);
}

/**
 * Parse `ss -ltnp` output into the listener lines that occupy `address`.
 * Owner pids come from the process column: users:(("gunicorn",pid=812,fd=5),...)
 */
export function parseSsListeners(output: string, address: BindAddress): ListenerInfo {
  const details: string[] = [];
  const pids: number[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('State')) continue;

    const columns = line.split(/\s+/);
    const local = columns[3];
    if (!local) continue;

    // Interface-scoped addresses look like 127.0.0.53%lo:53
    const normalizedLocal = local.replace(/%[^:\]]+/, '');
    if (!occupiesAddress(normalizedLocal, address)) continue;

    details.push(line);
    for (const match of line.matchAll(/pid=(\d+)/g)) {
      const pid = parseInt(match[1], 10);
      if (!pids.includes(pid)) pids.push(pid);
    }
  }

  return { listening: details.length > 0, pids, details };
}

async function probeWithSs(address: BindAddress): Promise<ListenerInfo | null> {
  try {
    const { stdout } = await execFileAsync('ss', ['-ltnp']);
    return parseSsListeners(stdout, address);
  } catch (error) {
    log(`ss unavailable, falling back to connect probe: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function connectHost(address: BindAddress): string {
  if (!isWildcardHost(address.host)) return address.host;
  return address.host === '0.0.0.0' ? '127.0.0.1' : '::1';
}

/**
 * TCP connect probe. Says whether something accepts connections; never who.
 */
export function probeByConnect(address: BindAddress, timeoutMs: number = CONNECT_TIMEOUT_MS): Promise<ListenerInfo> {
  const host = connectHost(address);
  return new Promise<ListenerInfo>(resolve => {
    const socket = new net.Socket();
    const finish = (listening: boolean): void => {
      socket.destroy();
      resolve({
        listening,
        pids: [],
        details: listening ? [`${formatBindAddress(address)} accepts connections`] : [],
      });
    };
    socket.setTimeout(timeoutMs);
    socket.on('connect', () => finish(true));
    socket.on('timeout', () => finish(false));
    socket.on('error', () => finish(false));
    socket.connect(address.port, host);
  });
}

export async function probeListener(address: BindAddress): Promise<ListenerInfo> {
  const info = (await probeWithSs(address)) ?? (await probeByConnect(address));
  logVerbose('ListenerProbe', 'Probed bind address', {
    address: formatBindAddress(address),
    listening: info.listening,
    pids: info.pids,
  });
  return info;
}
