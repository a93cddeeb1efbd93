import * as path from 'path';
import { loadConfig, splitCommandLine } from '../../../src/config/supervisorConfig';

describe('Supervisor configuration', () => {
  describe('loadConfig', () => {
    it('applies defaults relative to the working directory', () => {
      const config = loadConfig({ PROCGUARD_CWD: '/srv/app' });

      expect(config).toEqual({
        target: {
          pidFilePath: '/srv/app/procguard.pid',
          bindAddress: { host: '127.0.0.1', port: 8083 },
          logPath: '/srv/app/procguard.log',
          command: [],
          cwd: '/srv/app',
        },
        timing: { graceMs: 2000, pollMs: 200, stopWaitMs: 1000, tailLines: 80 },
        verbose: false,
      });
    });

    it('reads environment variables', () => {
      const config = loadConfig({
        PROCGUARD_CWD: '/srv/app',
        PROCGUARD_PID_FILE: 'run/gunicorn.pid',
        PROCGUARD_BIND: '0.0.0.0:9000',
        PROCGUARD_LOG_FILE: '/var/log/app.log',
        PROCGUARD_GRACE_MS: '5000',
        PROCGUARD_COMMAND: '.venv/bin/gunicorn -w 3 -b 0.0.0.0:9000 wsgi:application',
        PROCGUARD_STOP_PATTERN: '.venv/bin/gunicorn',
        PROCGUARD_VERBOSE: 'true',
      });

      expect(config.target.pidFilePath).toBe('/srv/app/run/gunicorn.pid');
      expect(config.target.logPath).toBe('/var/log/app.log');
      expect(config.target.bindAddress).toEqual({ host: '0.0.0.0', port: 9000 });
      expect(config.target.command).toEqual(['.venv/bin/gunicorn', '-w', '3', '-b', '0.0.0.0:9000', 'wsgi:application']);
      expect(config.target.stopPattern).toBe('.venv/bin/gunicorn');
      expect(config.timing.graceMs).toBe(5000);
      expect(config.verbose).toBe(true);
    });

    it('lets CLI overrides win over the environment', () => {
      const config = loadConfig(
        { PROCGUARD_CWD: '/srv/app', PROCGUARD_BIND: '0.0.0.0:9000', PROCGUARD_COMMAND: 'node old.js' },
        { bind: '127.0.0.1:7000', command: ['node', 'server.js'], pollMs: '50' }
      );

      expect(config.target.bindAddress).toEqual({ host: '127.0.0.1', port: 7000 });
      expect(config.target.command).toEqual(['node', 'server.js']);
      expect(config.timing.pollMs).toBe(50);
    });

    it('falls back to the environment command when the CLI gives none', () => {
      const config = loadConfig({ PROCGUARD_CWD: '/srv/app', PROCGUARD_COMMAND: 'node server.js' }, { command: [] });

      expect(config.target.command).toEqual(['node', 'server.js']);
    });

    it('resolves the working directory against the current one', () => {
      const config = loadConfig({ PROCGUARD_CWD: 'relative/app' });

      expect(config.target.cwd).toBe(path.resolve('relative/app'));
    });

    it('rejects invalid values with INVALID_CONFIG', () => {
      expect(() => loadConfig({ PROCGUARD_GRACE_MS: 'soon' })).toThrow("grace-ms must be a non-negative integer, got 'soon'");
      expect(() => loadConfig({ PROCGUARD_POLL_MS: '0' })).toThrow('poll-ms must be greater than 0');
      expect(() => loadConfig({ PROCGUARD_BIND: 'nope:' })).toThrow('Invalid bind address');
    });
  });

  describe('splitCommandLine', () => {
    it('splits on whitespace', () => {
      expect(splitCommandLine('  node   server.js --port 8083 ')).toEqual(['node', 'server.js', '--port', '8083']);
    });

    it('keeps quoted arguments together', () => {
      expect(splitCommandLine(`sh -c "exec node server.js" --name 'my app'`)).toEqual([
        'sh',
        '-c',
        'exec node server.js',
        '--name',
        'my app',
      ]);
    });

    it('keeps an empty quoted argument', () => {
      expect(splitCommandLine(`app --label ""`)).toEqual(['app', '--label', '']);
    });

    it('returns nothing for an empty line', () => {
      expect(splitCommandLine('')).toEqual([]);
    });

    it('rejects an unterminated quote', () => {
      expect(() => splitCommandLine('node "server.js')).toThrow('Unterminated " in command');
    });
  });
});
