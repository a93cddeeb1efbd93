// Shared logging utilities for procguard
// All modules should import from this file instead of defining their own.
// Diagnostics go to stderr; stdout is reserved for the command's status line.

let verbose = process.env.PROCGUARD_VERBOSE === 'true' || process.env.PROCGUARD_VERBOSE === '1';

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

function writeLine(line: string): void {
  if (typeof process !== 'undefined' && process.stderr) {
    process.stderr.write(line + '\n');
  } else {
    console.error(line);
  }
}

export function log(module: string, message: string, ...args: unknown[]): void {
  if (!verbose) return;
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + JSON.stringify(args) : '';
  writeLine(`[${timestamp}] [${module}] ${message}${argsStr}`);
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  if (!verbose) return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeLine(`[${timestamp}] [VERBOSE] [${component}] ${message}${dataStr}`);
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  if (!verbose) return;
  const timestamp = new Date().toISOString();
  const metadataStr = metadata ? ` | Metadata: ${JSON.stringify(metadata)}` : '';
  writeLine(`[${timestamp}] [PERFORMANCE] ${operation} took ${duration}ms${metadataStr}`);
}

export function logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
  if (!verbose) return;
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
  writeLine(`[${timestamp}] [STATE_TRANSITION] ${from} -> ${to}${contextStr}`);
}

export function logWarning(module: string, message: string, context?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
  writeLine(`[${timestamp}] [WARN] [${module}] ${message}${contextStr}`);
}

export function logError(module: string, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorStr = error instanceof Error ? ` | Error: ${error.message}` : error ? ` | Error: ${JSON.stringify(error)}` : '';
  writeLine(`[${timestamp}] [ERROR] [${module}] ${message}${errorStr}`);
}
