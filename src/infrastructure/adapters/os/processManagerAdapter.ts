import { ProcessManagerPort } from '../../../domain/ports/processManager';
import { SpawnRequest } from '../../../domain/types/process';
import {
  spawnDetached,
  isProcessAlive,
  signalProcess,
  describeProcess,
  listPidsByCommand,
} from '../../connectors/os/process/processManager';

export class ProcessManagerAdapter implements ProcessManagerPort {
  async spawnDetached(request: SpawnRequest): Promise<number> {
    return spawnDetached(request);
  }

  async isAlive(pid: number): Promise<boolean> {
    return isProcessAlive(pid);
  }

  async terminate(pid: number, signal: NodeJS.Signals = 'SIGTERM'): Promise<boolean> {
    return signalProcess(pid, signal);
  }

  async describe(pid: number): Promise<string | null> {
    return describeProcess(pid);
  }

  async listFromCommand(pattern: string): Promise<number[]> {
    return listPidsByCommand(pattern);
  }
}
