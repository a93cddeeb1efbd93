// Port: Log Tail

export interface LogTailPort {
  /**
   * Last `lines` lines of the file; empty when the file does not exist
   */
  tail(filePath: string, lines: number): Promise<string[]>;
}
