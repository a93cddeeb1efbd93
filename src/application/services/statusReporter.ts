// Status Reporter
// One status line per command, plus the exit code the CLI returns

import { StartOutcome, StatusReport, StopOutcome } from '../../domain/types/process';
import { formatBindAddress } from '../../domain/executors/bindAddress';

export const EXIT_OK = 0;
export const EXIT_START_FAILED = 1;
export const EXIT_PORT_CONFLICT = 2;

export interface Report {
  lines: string[];
  exitCode: number;
}

function ownerText(pids: number[]): string {
  if (pids.length === 0) return 'another process';
  return pids.length === 1 ? `pid ${pids[0]}` : `pids ${pids.join(', ')}`;
}

export function reportStart(outcome: StartOutcome, bindAddress: string, logPath: string): Report {
  const recovered =
    'recoveredStalePid' in outcome && outcome.recoveredStalePid !== undefined
      ? ` (removed stale pid file for pid ${outcome.recoveredStalePid})`
      : '';

  switch (outcome.kind) {
    case 'STARTED':
      return {
        lines: [`Started pid ${outcome.pid}, listening on ${bindAddress}${recovered}. Logs -> ${logPath}`],
        exitCode: EXIT_OK,
      };
    case 'ALREADY_RUNNING':
      return { lines: [`Already running with pid ${outcome.pid}.`], exitCode: EXIT_OK };
    case 'PORT_CONFLICT':
      return {
        lines: [
          `Port ${bindAddress} already in use by ${ownerText(outcome.listenerPids)}${recovered}. Refusing to start.`,
          ...outcome.listenerDetails.map(line => `  ${line}`),
        ],
        exitCode: EXIT_PORT_CONFLICT,
      };
    case 'START_TIMEOUT': {
      const reason = outcome.childExited
        ? `pid ${outcome.pid} exited before listening on ${bindAddress}`
        : `pid ${outcome.pid} not listening on ${bindAddress} after ${outcome.waitedMs}ms`;
      const tail =
        outcome.logTail.length > 0
          ? [`--- last ${outcome.logTail.length} lines of ${logPath} ---`, ...outcome.logTail]
          : [`(${logPath} is empty)`];
      return {
        lines: [`Failed to start: ${reason}${recovered}. Check ${logPath}`, ...tail],
        exitCode: EXIT_START_FAILED,
      };
    }
  }
}

export function reportStop(outcome: StopOutcome): Report {
  const swept = outcome.sweptPids.length > 0 ? ` Swept leftover pids ${outcome.sweptPids.join(', ')}.` : '';
  if (outcome.kind === 'NOT_RUNNING') {
    return { lines: [`Not running.${swept}`], exitCode: EXIT_OK };
  }
  const which = outcome.pid !== null ? `pid ${outcome.pid}` : 'unreadable pid file';
  return { lines: [`Stopped ${which}.${swept}`], exitCode: EXIT_OK };
}

export function reportStatus(report: StatusReport): Report {
  const address = formatBindAddress(report.bindAddress);
  const pid = report.pid !== undefined ? `pid ${report.pid}` : 'no pid';
  const listening = report.listening
    ? `listening on ${address}${report.listenerPids.length > 0 ? ` (${ownerText(report.listenerPids)})` : ''}`
    : `not listening on ${address}`;

  const state = report.startFailed ? `${report.state} (start failed)` : report.state;
  const lines = [`${state}: ${pid}, ${listening}. Pid file: ${report.pidFilePath}`];
  if (report.details !== undefined) lines.push(`  ${report.details}`);
  if (report.command !== undefined) lines.push(`  Command: ${report.command}`);
  if (report.listenerDetails.length === 0) {
    lines.push('  Listeners: (none)');
  } else {
    lines.push('  Listeners:', ...report.listenerDetails.map(line => `    ${line}`));
  }

  return { lines, exitCode: EXIT_OK };
}
