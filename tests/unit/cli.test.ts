import { SupervisorHarness } from '@helpers/supervisor-harness';
import { createProgram, executeCommand } from '@/cli';

describe('CLI', () => {
  let harness: SupervisorHarness;
  let printed: string[];

  const run = (name: 'start' | 'stop' | 'restart' | 'status') =>
    executeCommand(name, harness.supervisor, harness.config, line => printed.push(line));

  beforeEach(() => {
    harness = new SupervisorHarness();
    printed = [];
  });

  it('exits 0 and prints one line for a successful start', async () => {
    expect(await run('start')).toBe(0);
    expect(printed).toEqual(['Started pid 1000, listening on 127.0.0.1:8083. Logs -> /srv/app/app.log']);
  });

  it('exits 0 when already running', async () => {
    await run('start');
    printed = [];

    expect(await run('start')).toBe(0);
    expect(printed).toEqual(['Already running with pid 1000.']);
  });

  it('exits 2 on a port conflict', async () => {
    harness.host.bindExternal(harness.config.target.bindAddress);

    expect(await run('start')).toBe(2);
    expect(printed[0]).toBe('Port 127.0.0.1:8083 already in use by pid 1000. Refusing to start.');
  });

  it('exits 1 on a start timeout and prints the log tail', async () => {
    harness.host.spawnBehavior = { type: 'never-bind' };
    harness.writeLog(['Traceback (most recent call last):']);

    expect(await run('start')).toBe(1);
    expect(printed).toEqual([
      'Failed to start: pid 1000 not listening on 127.0.0.1:8083 after 2000ms. Check /srv/app/app.log',
      '--- last 1 lines of /srv/app/app.log ---',
      'Traceback (most recent call last):',
    ]);
  });

  it('exits 0 for stop and status when nothing runs', async () => {
    expect(await run('stop')).toBe(0);
    expect(await run('status')).toBe(0);
    expect(printed).toEqual([
      'Not running.',
      'STOPPED: no pid, not listening on 127.0.0.1:8083. Pid file: /srv/app/app.pid',
      '  Listeners: (none)',
    ]);
  });

  it('restarts with the start exit code', async () => {
    await run('start');
    printed = [];

    expect(await run('restart')).toBe(0);
    expect(printed).toEqual(['Started pid 1001, listening on 127.0.0.1:8083. Logs -> /srv/app/app.log']);
  });

  it('registers the four subcommands', () => {
    const program = createProgram();

    expect(program.commands.map(command => command.name())).toEqual(['start', 'stop', 'restart', 'status']);
  });
});
