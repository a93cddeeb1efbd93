import { PidFilePort } from '../../../domain/ports/pidFile';
import { PidFileRecord } from '../../../domain/types/process';
import {
  readPidFile,
  createPidFileExclusive,
  writePidFile,
  discardPidFileIfUnchanged,
  removePidFile,
} from '../../connectors/os/filesystem/pidFile';

export class PidFileAdapter implements PidFilePort {
  constructor(readonly path: string) {}

  async read(): Promise<PidFileRecord> {
    return readPidFile(this.path);
  }

  async createExclusive(pid: number): Promise<boolean> {
    return createPidFileExclusive(this.path, pid);
  }

  async write(pid: number): Promise<void> {
    return writePidFile(this.path, pid);
  }

  async discardIfUnchanged(expectedRaw: string): Promise<boolean> {
    return discardPidFileIfUnchanged(this.path, expectedRaw);
  }

  async remove(): Promise<void> {
    return removePidFile(this.path);
  }
}
