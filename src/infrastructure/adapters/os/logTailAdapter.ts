import { LogTailPort } from '../../../domain/ports/logTail';
import { readLogTail } from '../../connectors/os/filesystem/logTail';

export class LogTailAdapter implements LogTailPort {
  async tail(filePath: string, lines: number): Promise<string[]> {
    return readLogTail(filePath, lines);
  }
}
