import { spawnSync } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  isProcessAlive,
  parsePgrepOutput,
  signalProcess,
  spawnDetached,
} from '../../../src/infrastructure/connectors/os/process/processManager';

async function waitForContent(filePath: string, expected: string, timeoutMs = 5000): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const content = await fs.readFile(filePath, 'utf-8');
    if (content.includes(expected) || Date.now() >= deadline) return content;
    await new Promise(resolve => setTimeout(resolve, 50));
  }
}

/**
 * Pid of a process that has run to completion and been reaped
 */
function exitedPid(): number {
  return spawnSync(process.execPath, ['-e', '']).pid;
}

describe('Process manager', () => {
  describe('parsePgrepOutput', () => {
    it('parses one pid per line and drops excluded pids', () => {
      expect(parsePgrepOutput('812\n811\n4242\n', [4242])).toEqual([812, 811]);
    });

    it('ignores blank and non-numeric lines', () => {
      expect(parsePgrepOutput('\n  812  \npgrep: warning\n')).toEqual([812]);
    });
  });

  describe('isProcessAlive', () => {
    it('sees the current process', () => {
      expect(isProcessAlive(process.pid)).toBe(true);
    });

    it('does not see a process that has exited', () => {
      expect(isProcessAlive(exitedPid())).toBe(false);
    });
  });

  describe('signalProcess', () => {
    it('returns false for a process that no longer exists', () => {
      expect(signalProcess(exitedPid(), 'SIGTERM')).toBe(false);
    });
  });

  describe('spawnDetached', () => {
    let dir: string;
    let logPath: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'procguard-spawn-'));
      logPath = path.join(dir, 'logs', 'child.log');
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('returns the child pid and appends its output to the log', async () => {
      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await fs.writeFile(logPath, 'earlier run\n', 'utf-8');

      const pid = await spawnDetached({
        command: [process.execPath, '-e', "console.log('child says hello')"],
        cwd: dir,
        logPath,
      });

      expect(Number.isInteger(pid)).toBe(true);
      expect(pid).toBeGreaterThan(0);
      expect(await waitForContent(logPath, 'child says hello')).toBe('earlier run\nchild says hello\n');
    });

    it('raises SPAWN_FAILED for an executable that does not exist', async () => {
      await expect(
        spawnDetached({ command: [path.join(dir, 'no-such-binary')], cwd: dir, logPath })
      ).rejects.toMatchObject({ code: 'SPAWN_FAILED' });
    });

    it('raises INVALID_CONFIG for an empty command', async () => {
      await expect(spawnDetached({ command: [], cwd: dir, logPath })).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
      });
    });
  });
});
