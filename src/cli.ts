#!/usr/bin/env node
// procguard CLI entrypoint
// start | stop | restart | status for one supervised process

import { Command } from 'commander';
import { ProcessSupervisor } from './application/services/processSupervisor';
import { Report, reportStart, reportStatus, reportStop } from './application/services/statusReporter';
import { ConfigOverrides, DEFAULTS, SupervisorConfig, loadConfig, loadEnvFile } from './config/supervisorConfig';
import { formatBindAddress } from './domain/executors/bindAddress';
import { isSupervisorError } from './domain/errors/supervisorError';
import { PidFileAdapter } from './infrastructure/adapters/os/pidFileAdapter';
import { ProcessManagerAdapter } from './infrastructure/adapters/os/processManagerAdapter';
import { ListenerProbeAdapter } from './infrastructure/adapters/os/listenerProbeAdapter';
import { LogTailAdapter } from './infrastructure/adapters/os/logTailAdapter';
import { SystemClockAdapter } from './infrastructure/adapters/os/systemClockAdapter';
import { LoggerAdapter } from './infrastructure/adapters/logging/loggerAdapter';
import {
  logError,
  logPerformance as logPerformanceShared,
  logVerbose as logVerboseShared,
  setVerbose,
} from './infrastructure/adapters/logging/logger';

export type SupervisorCommand = 'start' | 'stop' | 'restart' | 'status';

type GlobalOptions = Omit<ConfigOverrides, 'command'>;

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`CLI:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[CLI] ${operation}`, duration, metadata);
}

/**
 * Wire the supervisor to the real OS adapters
 */
export function createSupervisor(config: SupervisorConfig): ProcessSupervisor {
  return new ProcessSupervisor(config.target, config.timing, {
    pidFile: new PidFileAdapter(config.target.pidFilePath),
    processes: new ProcessManagerAdapter(),
    listeners: new ListenerProbeAdapter(),
    logTail: new LogTailAdapter(),
    clock: new SystemClockAdapter(),
    logger: new LoggerAdapter(),
  });
}

async function reportFor(
  name: SupervisorCommand,
  supervisor: ProcessSupervisor,
  config: SupervisorConfig
): Promise<Report> {
  const bindAddress = formatBindAddress(config.target.bindAddress);
  switch (name) {
    case 'start':
      return reportStart(await supervisor.start(), bindAddress, config.target.logPath);
    case 'restart':
      return reportStart(await supervisor.restart(), bindAddress, config.target.logPath);
    case 'stop':
      return reportStop(await supervisor.stop());
    case 'status':
      return reportStatus(await supervisor.status());
  }
}

/**
 * Run one command against a supervisor and print its report.
 * Returns the process exit code.
 */
export async function executeCommand(
  name: SupervisorCommand,
  supervisor: ProcessSupervisor,
  config: SupervisorConfig,
  print: (line: string) => void
): Promise<number> {
  const report = await reportFor(name, supervisor, config);
  for (const line of report.lines) {
    print(line);
  }
  return report.exitCode;
}

async function run(name: SupervisorCommand, globalOpts: GlobalOptions, command: string[]): Promise<number> {
  const startTime = Date.now();
  try {
    const config = loadConfig(process.env, { ...globalOpts, command });
    setVerbose(config.verbose);
    logVerbose(name, 'Configuration loaded', {
      pid_file: config.target.pidFilePath,
      bind: formatBindAddress(config.target.bindAddress),
      log_file: config.target.logPath,
      command: config.target.command,
      timing: config.timing,
    });

    const exitCode = await executeCommand(name, createSupervisor(config), config, line => console.log(line));
    logPerformance(name, Date.now() - startTime, { exit_code: exitCode });
    return exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError('CLI', `${name} failed${isSupervisorError(error) ? ` [${error.code}]` : ''}`, error);
    console.error(`Error: ${message}`);
    return 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('procguard')
    .description('Keep exactly one instance of a server process running on its bind address')
    .option('--pid-file <path>', `Pid file location (env PROCGUARD_PID_FILE, default ${DEFAULTS.pidFile})`)
    .option('--bind <host:port>', `Address the process must listen on (env PROCGUARD_BIND, default ${DEFAULTS.bind})`)
    .option('--log-file <path>', `Child stdout/stderr log (env PROCGUARD_LOG_FILE, default ${DEFAULTS.logFile})`)
    .option('--cwd <path>', 'Working directory for the child and relative paths (env PROCGUARD_CWD)')
    .option('--grace-ms <ms>', `How long start waits for the listener (default ${DEFAULTS.graceMs})`)
    .option('--poll-ms <ms>', `Listener poll interval during start (default ${DEFAULTS.pollMs})`)
    .option('--stop-wait-ms <ms>', `Wait after SIGTERM before cleanup (default ${DEFAULTS.stopWaitMs})`)
    .option('--tail-lines <n>', `Log lines shown when start fails (default ${DEFAULTS.tailLines})`)
    .option('--stop-pattern <pattern>', 'Command-line pattern swept on stop (default: the launch command)')
    .option('--verbose', 'Diagnostic logging on stderr');

  program
    .command('start')
    .description('Start the process unless it is already running (exit 1 on timeout, 2 on port conflict)')
    .argument('[command...]', 'Launch command (env PROCGUARD_COMMAND)')
    .action(async (command: string[]) => {
      process.exitCode = await run('start', program.opts<GlobalOptions>(), command);
    });

  program
    .command('stop')
    .description('Stop the recorded process and sweep leftover workers')
    .argument('[command...]', 'Launch command, used as the default sweep pattern')
    .action(async (command: string[]) => {
      process.exitCode = await run('stop', program.opts<GlobalOptions>(), command);
    });

  program
    .command('restart')
    .description('Stop, then start')
    .argument('[command...]', 'Launch command (env PROCGUARD_COMMAND)')
    .action(async (command: string[]) => {
      process.exitCode = await run('restart', program.opts<GlobalOptions>(), command);
    });

  program
    .command('status')
    .description('Report the current state; never changes anything')
    .action(async () => {
      process.exitCode = await run('status', program.opts<GlobalOptions>(), []);
    });

  return program;
}

if (require.main === module) {
  loadEnvFile();
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logError('CLI', 'Unhandled error', error);
      process.exitCode = 1;
    });
}
