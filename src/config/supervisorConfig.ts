// Configuration loader for procguard
// Environment variables (optionally from .env) with defaults; CLI options override them

import * as path from 'path';
import dotenv from 'dotenv';
import { SupervisedProcess, SupervisorTiming } from '../domain/types/process';
import { parseBindAddress } from '../domain/executors/bindAddress';
import { SupervisorError } from '../domain/errors/supervisorError';

export interface SupervisorConfig {
  target: SupervisedProcess;
  timing: SupervisorTiming;
  verbose: boolean;
}

// Raw values as they arrive from commander; all optional
export interface ConfigOverrides {
  pidFile?: string;
  bind?: string;
  logFile?: string;
  cwd?: string;
  graceMs?: string;
  pollMs?: string;
  stopWaitMs?: string;
  tailLines?: string;
  stopPattern?: string;
  verbose?: boolean;
  command?: string[];
}

export const DEFAULTS = {
  pidFile: 'procguard.pid',
  bind: '127.0.0.1:8083',
  logFile: 'procguard.log',
  graceMs: 2000,
  pollMs: 200,
  stopWaitMs: 1000,
  tailLines: 80,
} as const;

/**
 * Load .env from the working directory if present
 */
export function loadEnvFile(): void {
  dotenv.config();
}

function parseNonNegativeInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw new SupervisorError('INVALID_CONFIG', `${name} must be a non-negative integer, got '${value}'`);
  }
  return parseInt(value.trim(), 10);
}

function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Split a command line on whitespace, honouring single and double quotes
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let hasToken = false;

  for (const char of line) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      hasToken = true;
    } else if (/\s/.test(char)) {
      if (hasToken) {
        args.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }

  if (quote) {
    throw new SupervisorError('INVALID_CONFIG', `Unterminated ${quote} in command: ${line}`);
  }
  if (hasToken) args.push(current);
  return args;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): SupervisorConfig {
  const cwd = path.resolve(overrides.cwd ?? env.PROCGUARD_CWD ?? process.cwd());
  const resolve = (value: string): string => path.resolve(cwd, value);

  const command =
    overrides.command && overrides.command.length > 0
      ? overrides.command
      : splitCommandLine(env.PROCGUARD_COMMAND ?? '');

  const timing: SupervisorTiming = {
    graceMs: parseNonNegativeInt('grace-ms', overrides.graceMs ?? env.PROCGUARD_GRACE_MS, DEFAULTS.graceMs),
    pollMs: parseNonNegativeInt('poll-ms', overrides.pollMs ?? env.PROCGUARD_POLL_MS, DEFAULTS.pollMs),
    stopWaitMs: parseNonNegativeInt('stop-wait-ms', overrides.stopWaitMs ?? env.PROCGUARD_STOP_WAIT_MS, DEFAULTS.stopWaitMs),
    tailLines: parseNonNegativeInt('tail-lines', overrides.tailLines ?? env.PROCGUARD_TAIL_LINES, DEFAULTS.tailLines),
  };
  if (timing.pollMs === 0) {
    throw new SupervisorError('INVALID_CONFIG', 'poll-ms must be greater than 0');
  }

  const stopPattern = overrides.stopPattern ?? env.PROCGUARD_STOP_PATTERN;

  return {
    target: {
      pidFilePath: resolve(overrides.pidFile ?? env.PROCGUARD_PID_FILE ?? DEFAULTS.pidFile),
      bindAddress: parseBindAddress(overrides.bind ?? env.PROCGUARD_BIND ?? DEFAULTS.bind),
      logPath: resolve(overrides.logFile ?? env.PROCGUARD_LOG_FILE ?? DEFAULTS.logFile),
      command,
      cwd,
      ...(stopPattern ? { stopPattern } : {}),
    },
    timing,
    verbose: overrides.verbose ?? parseFlag(env.PROCGUARD_VERBOSE),
  };
}
