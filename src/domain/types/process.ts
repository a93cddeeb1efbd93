// Type definitions for the supervised process and its observed lifecycle

export type ProcessState =
  | 'STOPPED'        // no pid file, no listener
  | 'STARTING'       // pid file present, process alive, listener not up yet
  | 'RUNNING'        // pid file present, process alive, listener active
  | 'STALE'          // pid file present, process gone
  | 'PORT_CONFLICT'; // listener present that cannot be attributed to the recorded pid

export interface BindAddress {
  host: string;
  port: number;
}

export interface SupervisedProcess {
  pidFilePath: string;
  bindAddress: BindAddress;
  logPath: string;
  command: string[];
  cwd: string;
  // Pattern matched against full command lines for the post-stop sweep
  stopPattern?: string;
}

export interface SupervisorTiming {
  graceMs: number;
  pollMs: number;
  stopWaitMs: number;
  tailLines: number;
}

export type PidFileRecord =
  | { exists: false }
  | { exists: true; pid: number | null; raw: string; modifiedAt: number };

export interface ListenerInfo {
  listening: boolean;
  // Owners of the socket where the probe can tell; empty when unknown
  pids: number[];
  // Raw listener lines for display
  details: string[];
}

export interface LivenessObservation {
  pidFile: PidFileRecord;
  processAlive: boolean;
  listener: ListenerInfo;
  // Processes matching the launch command (workers of the recorded pid)
  relatedPids: number[];
}

export interface LivenessDetection {
  state: ProcessState;
  pid?: number;
  listening: boolean;
  listenerPids: number[];
  // STARTING past the grace window: the recorded process never bound
  startFailed?: boolean;
  details?: string;
}

export interface StartWindow {
  now: number;
  graceMs: number;
}

export type StartOutcome =
  | { kind: 'STARTED'; pid: number; recoveredStalePid?: number }
  | { kind: 'ALREADY_RUNNING'; pid: number }
  | {
      kind: 'PORT_CONFLICT';
      listenerPids: number[];
      listenerDetails: string[];
      recoveredStalePid?: number;
    }
  | {
      kind: 'START_TIMEOUT';
      pid: number;
      waitedMs: number;
      childExited: boolean;
      logTail: string[];
      recoveredStalePid?: number;
    };

export type StopOutcome =
  | { kind: 'STOPPED'; pid: number | null; sweptPids: number[] }
  | { kind: 'NOT_RUNNING'; sweptPids: number[] };

export interface StatusReport {
  state: ProcessState;
  pid?: number;
  pidFilePath: string;
  bindAddress: BindAddress;
  listening: boolean;
  listenerPids: number[];
  listenerDetails: string[];
  startFailed: boolean;
  // Command line of the recorded pid while it is alive
  command?: string;
  details?: string;
}

export interface SpawnRequest {
  command: string[];
  cwd: string;
  logPath: string;
}
