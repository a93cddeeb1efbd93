// Pid File - read, exclusive create, replace, delete
// ENOENT and EEXIST are states of the record; every other errno is a SupervisorError

import * as fs from 'fs/promises';
import * as path from 'path';
import { PidFileRecord } from '../../../../domain/types/process';
import { SupervisorError, errnoCode } from '../../../../domain/errors/supervisorError';
import { log as logShared } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('PidFile', message, ...args);
}

export function parsePid(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const pid = parseInt(trimmed, 10);
  return pid > 0 ? pid : null;
}

function ioError(action: string, filePath: string, error: unknown): SupervisorError {
  const message = error instanceof Error ? error.message : String(error);
  return new SupervisorError('PID_FILE_IO', `Cannot ${action} pid file ${filePath}: ${message}`, { cause: error });
}

export async function readPidFile(filePath: string): Promise<PidFileRecord> {
  try {
    const handle = await fs.open(filePath, 'r');
    try {
      const raw = await handle.readFile('utf-8');
      const { mtimeMs } = await handle.stat();
      const pid = parsePid(raw);
      log(`Read ${filePath}: ${pid ?? 'invalid content'}`);
      return { exists: true, pid, raw, modifiedAt: mtimeMs };
    } finally {
      await handle.close();
    }
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return { exists: false };
    }
    throw ioError('read', filePath, error);
  }
}

/**
 * Open-fails-if-exists create. Closes the check-then-write window between
 * two invocations starting at the same time.
 */
export async function createPidFileExclusive(filePath: string, pid: number): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, 'wx');
    try {
      await handle.writeFile(`${pid}\n`, 'utf-8');
    } finally {
      await handle.close();
    }
    log(`Created ${filePath} with pid ${pid}`);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') {
      log(`${filePath} already exists`);
      return false;
    }
    throw ioError('create', filePath, error);
  }
}

/**
 * Replace the content through a rename so readers never see a partial pid
 */
export async function writePidFile(filePath: string, pid: number): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, `${pid}\n`, 'utf-8');
    await fs.rename(tmpPath, filePath);
    log(`Wrote pid ${pid} to ${filePath}`);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw ioError('write', filePath, error);
  }
}

/**
 * Delete the file only if it still holds `expectedRaw`.
 * The file is first renamed aside so no other invocation can replace it between
 * the comparison and the unlink; a record that changed is linked back.
 */
export async function discardPidFileIfUnchanged(filePath: string, expectedRaw: string): Promise<boolean> {
  const asidePath = `${filePath}.${process.pid}.stale`;
  try {
    await fs.rename(filePath, asidePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw ioError('move aside', filePath, error);
  }

  try {
    const raw = await fs.readFile(asidePath, 'utf-8');
    if (raw === expectedRaw) {
      await fs.unlink(asidePath);
      log(`Discarded stale ${filePath}`);
      return true;
    }

    try {
      await fs.link(asidePath, filePath);
      log(`${filePath} changed since it was read; restored`);
    } catch (error) {
      // EEXIST: a newer record already took the path
      if (errnoCode(error) !== 'EEXIST') throw error;
      log(`${filePath} replaced while set aside; keeping the newer record`);
    }
    await fs.unlink(asidePath);
    return false;
  } catch (error) {
    throw ioError('discard', filePath, error);
  }
}

export async function removePidFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
    log(`Removed ${filePath}`);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return;
    }
    throw ioError('remove', filePath, error);
  }
}
