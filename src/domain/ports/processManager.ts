// Port: Process Manager
// Spawning, probing and signalling OS processes

import { SpawnRequest } from '../types/process';

export interface ProcessManagerPort {
  /**
   * Launch the command detached from this process, stdout/stderr appended to the log
   */
  spawnDetached(request: SpawnRequest): Promise<number>;

  /**
   * Non-destructive existence probe (signal 0)
   */
  isAlive(pid: number): Promise<boolean>;

  /**
   * Send a signal. Returns false if the process no longer exists.
   */
  terminate(pid: number, signal?: NodeJS.Signals): Promise<boolean>;

  /**
   * Full command line of a live process, or null when it no longer exists
   */
  describe(pid: number): Promise<string | null>;

  /**
   * Pids whose full command line matches the pattern, excluding this process
   */
  listFromCommand(pattern: string): Promise<number[]>;
}
