// Process Manager - detached spawn, signal-0 probe, termination, command-line lookup

import { spawn, execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs/promises';
import * as path from 'path';
import { SpawnRequest } from '../../../../domain/types/process';
import { SupervisorError, errnoCode } from '../../../../domain/errors/supervisorError';
import { log as logShared, logVerbose } from '../../../adapters/logging/logger';

const execFileAsync = promisify(execFile);

function log(message: string, ...args: unknown[]): void {
  logShared('ProcessManager', message, ...args);
}

function exitCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Launch the command in its own process group with stdout/stderr appended to the log.
 * Resolves once the OS has created the process; the child outlives this invocation.
 */
export async function spawnDetached(request: SpawnRequest): Promise<number> {
  const [executable, ...args] = request.command;
  if (!executable) {
    throw new SupervisorError('INVALID_CONFIG', 'No command configured to launch');
  }

  await fs.mkdir(path.dirname(request.logPath), { recursive: true });
  const logHandle = await fs.open(request.logPath, 'a');

  try {
    const child = spawn(executable, args, {
      cwd: request.cwd,
      detached: true,
      stdio: ['ignore', logHandle.fd, logHandle.fd],
      env: process.env,
    });

    const pid = await new Promise<number>((resolve, reject) => {
      child.once('error', reject);
      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new Error('spawned process has no pid'));
        } else {
          resolve(child.pid);
        }
      });
    });

    child.unref();
    log(`Spawned ${executable} as pid ${pid}`);
    logVerbose('ProcessManager', 'Detached child spawned', {
      pid,
      command: request.command,
      cwd: request.cwd,
      log_path: request.logPath,
    });
    return pid;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SupervisorError('SPAWN_FAILED', `Failed to launch '${request.command.join(' ')}': ${message}`, {
      cause: error,
    });
  } finally {
    await logHandle.close();
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists, owned by someone else
    return errnoCode(error) === 'EPERM';
  }
}

export function signalProcess(pid: number, signal: NodeJS.Signals = 'SIGTERM'): boolean {
  try {
    process.kill(pid, signal);
    log(`Sent ${signal} to pid ${pid}`);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ESRCH') {
      log(`Pid ${pid} already gone`);
      return false;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SupervisorError('SIGNAL_FAILED', `Cannot send ${signal} to pid ${pid}: ${message}`, { cause: error });
  }
}

/**
 * `ps -p <pid> -o args=`; exit status 1 means the pid does not exist
 */
export async function describeProcess(pid: number): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('ps', ['-p', String(pid), '-o', 'args=']);
    const command = stdout.trim();
    return command.length > 0 ? command : null;
  } catch (error) {
    if (exitCodeOf(error) === 1) {
      return null;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SupervisorError('PROBE_FAILED', `Cannot describe pid ${pid}: ${message}`, { cause: error });
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function parsePgrepOutput(stdout: string, excludePids: number[] = []): number[] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => /^\d+$/.test(line))
    .map(line => parseInt(line, 10))
    .filter(pid => !excludePids.includes(pid));
}

/**
 * `pgrep -f` over full command lines. Exit status 1 means no match.
 */
export async function listPidsByCommand(pattern: string): Promise<number[]> {
  try {
    const { stdout } = await execFileAsync('pgrep', ['-f', escapeRegExp(pattern)]);
    return parsePgrepOutput(stdout, [process.pid]);
  } catch (error) {
    if (exitCodeOf(error) === 1) {
      return [];
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SupervisorError('PROBE_FAILED', `Cannot list processes matching '${pattern}': ${message}`, {
      cause: error,
    });
  }
}
