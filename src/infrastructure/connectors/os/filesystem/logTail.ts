// Log Tail - last lines of the child's log file

import * as fs from 'fs/promises';
import { errnoCode } from '../../../../domain/errors/supervisorError';

// Enough for a few hundred lines of typical server output
const TAIL_WINDOW_BYTES = 64 * 1024;

export async function readLogTail(filePath: string, lines: number): Promise<string[]> {
  if (lines <= 0) return [];

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw error;
  }

  try {
    const { size } = await handle.stat();
    const start = Math.max(0, size - TAIL_WINDOW_BYTES);
    const buffer = Buffer.alloc(size - start);
    await handle.read(buffer, 0, buffer.length, start);

    const all = buffer.toString('utf-8').split(/\r?\n/);
    // Drop a possibly truncated first line when the window did not reach the start
    if (start > 0) all.shift();
    if (all.length > 0 && all[all.length - 1] === '') all.pop();
    return all.slice(-lines);
  } finally {
    await handle.close();
  }
}
