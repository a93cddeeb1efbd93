import { reportStart, reportStatus, reportStop } from '../../../src/application/services/statusReporter';

const ADDRESS = '127.0.0.1:8083';
const LOG = '/srv/app/app.log';

describe('Status Reporter', () => {
  describe('reportStart', () => {
    it('reports a successful start with exit code 0', () => {
      const report = reportStart({ kind: 'STARTED', pid: 1000 }, ADDRESS, LOG);

      expect(report).toEqual({
        lines: ['Started pid 1000, listening on 127.0.0.1:8083. Logs -> /srv/app/app.log'],
        exitCode: 0,
      });
    });

    it('mentions a recovered stale pid file', () => {
      const report = reportStart({ kind: 'STARTED', pid: 1000, recoveredStalePid: 31337 }, ADDRESS, LOG);

      expect(report.lines).toEqual([
        'Started pid 1000, listening on 127.0.0.1:8083 (removed stale pid file for pid 31337). Logs -> /srv/app/app.log',
      ]);
    });

    it('reports an already running process as success', () => {
      expect(reportStart({ kind: 'ALREADY_RUNNING', pid: 1000 }, ADDRESS, LOG)).toEqual({
        lines: ['Already running with pid 1000.'],
        exitCode: 0,
      });
    });

    it('reports a port conflict with exit code 2 and the listener lines', () => {
      const report = reportStart(
        { kind: 'PORT_CONFLICT', listenerPids: [777], listenerDetails: ['LISTEN 0 511 0.0.0.0:8083 0.0.0.0:*'] },
        ADDRESS,
        LOG
      );

      expect(report).toEqual({
        lines: [
          'Port 127.0.0.1:8083 already in use by pid 777. Refusing to start.',
          '  LISTEN 0 511 0.0.0.0:8083 0.0.0.0:*',
        ],
        exitCode: 2,
      });
    });

    it('names an unknown owner generically', () => {
      const report = reportStart({ kind: 'PORT_CONFLICT', listenerPids: [], listenerDetails: [] }, ADDRESS, LOG);

      expect(report.lines).toEqual(['Port 127.0.0.1:8083 already in use by another process. Refusing to start.']);
    });

    it('reports a start timeout with exit code 1 and the log tail', () => {
      const report = reportStart(
        {
          kind: 'START_TIMEOUT',
          pid: 1000,
          waitedMs: 2000,
          childExited: false,
          logTail: ['[INFO] Booting worker', '[ERROR] Exception in worker process'],
        },
        ADDRESS,
        LOG
      );

      expect(report).toEqual({
        lines: [
          'Failed to start: pid 1000 not listening on 127.0.0.1:8083 after 2000ms. Check /srv/app/app.log',
          '--- last 2 lines of /srv/app/app.log ---',
          '[INFO] Booting worker',
          '[ERROR] Exception in worker process',
        ],
        exitCode: 1,
      });
    });

    it('distinguishes a child that exited and an empty log', () => {
      const report = reportStart(
        { kind: 'START_TIMEOUT', pid: 1000, waitedMs: 400, childExited: true, logTail: [] },
        ADDRESS,
        LOG
      );

      expect(report.lines).toEqual([
        'Failed to start: pid 1000 exited before listening on 127.0.0.1:8083. Check /srv/app/app.log',
        '(/srv/app/app.log is empty)',
      ]);
    });
  });

  describe('reportStop', () => {
    it('reports nothing to stop as success', () => {
      expect(reportStop({ kind: 'NOT_RUNNING', sweptPids: [] })).toEqual({ lines: ['Not running.'], exitCode: 0 });
    });

    it('lists swept pids', () => {
      expect(reportStop({ kind: 'STOPPED', pid: 1000, sweptPids: [1001, 1002] }).lines).toEqual([
        'Stopped pid 1000. Swept leftover pids 1001, 1002.',
      ]);
    });

    it('handles an unreadable pid file', () => {
      expect(reportStop({ kind: 'STOPPED', pid: null, sweptPids: [] }).lines).toEqual([
        'Stopped unreadable pid file.',
      ]);
    });
  });

  describe('reportStatus', () => {
    it('describes a running process and its sockets', () => {
      const report = reportStatus({
        state: 'RUNNING',
        pid: 1000,
        pidFilePath: '/srv/app/app.pid',
        bindAddress: { host: '127.0.0.1', port: 8083 },
        listening: true,
        listenerPids: [1000],
        listenerDetails: ['LISTEN 0 2048 127.0.0.1:8083 0.0.0.0:*'],
        startFailed: false,
        command: 'python3 -m http.server 8083',
      });

      expect(report).toEqual({
        lines: [
          'RUNNING: pid 1000, listening on 127.0.0.1:8083 (pid 1000). Pid file: /srv/app/app.pid',
          '  Command: python3 -m http.server 8083',
          '  Listeners:',
          '    LISTEN 0 2048 127.0.0.1:8083 0.0.0.0:*',
        ],
        exitCode: 0,
      });
    });

    it('exits 0 for a stopped process', () => {
      const report = reportStatus({
        state: 'STOPPED',
        pidFilePath: '/srv/app/app.pid',
        bindAddress: { host: '127.0.0.1', port: 8083 },
        listening: false,
        listenerPids: [],
        listenerDetails: [],
        startFailed: false,
      });

      expect(report).toEqual({
        lines: ['STOPPED: no pid, not listening on 127.0.0.1:8083. Pid file: /srv/app/app.pid', '  Listeners: (none)'],
        exitCode: 0,
      });
    });

    it('marks a start that never bound within the grace period', () => {
      const report = reportStatus({
        state: 'STARTING',
        pid: 1000,
        pidFilePath: '/srv/app/app.pid',
        bindAddress: { host: '127.0.0.1', port: 8083 },
        listening: false,
        listenerPids: [],
        listenerDetails: [],
        startFailed: true,
        command: 'python3 -m http.server 8083',
        details: 'Process 1000 not listening 2000ms after launch (grace 2000ms)',
      });

      expect(report).toEqual({
        lines: [
          'STARTING (start failed): pid 1000, not listening on 127.0.0.1:8083. Pid file: /srv/app/app.pid',
          '  Process 1000 not listening 2000ms after launch (grace 2000ms)',
          '  Command: python3 -m http.server 8083',
          '  Listeners: (none)',
        ],
        exitCode: 0,
      });
    });
  });
});
