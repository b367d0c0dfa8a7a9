/**
 * Trace sink port interface.
 * Receives diagnostic lines from the parser trace.
 */
export interface TraceSink {
  emit(line: string): void;
}

export const consoleTraceSink: TraceSink = {
  emit(line: string): void {
    console.log(line);
  },
};

export class MemoryTraceSink implements TraceSink {
  readonly lines: string[] = [];

  emit(line: string): void {
    this.lines.push(line);
  }
}
