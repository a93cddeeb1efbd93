// Port: Pid File
// The persisted process-id record, shared with every other invocation on the host

import { PidFileRecord } from '../types/process';

export interface PidFilePort {
  readonly path: string;

  /**
   * Read the record with its modification time (epoch ms);
   * a missing file is `{ exists: false }`, never an error
   */
  read(): Promise<PidFileRecord>;

  /**
   * Create the file only if it does not exist yet.
   * Returns false when another invocation holds it.
   */
  createExclusive(pid: number): Promise<boolean>;

  /**
   * Replace the recorded pid of a file this invocation already holds
   */
  write(pid: number): Promise<void>;

  /**
   * Delete the file only if its content is still `expectedRaw`.
   * Returns false when the file is gone or holds a different record.
   */
  discardIfUnchanged(expectedRaw: string): Promise<boolean>;

  /**
   * Delete the file; a missing file is not an error
   */
  remove(): Promise<void>;
}
