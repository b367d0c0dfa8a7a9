/**
 * Output port interface.
 * Receives the lines written by the `print` built-in.
 */
export interface OutputPort {
  write(line: string): void;
}

export const consoleOutput: OutputPort = {
  write(line: string): void {
    console.log(line);
  },
};

/**
 * Collects output in memory; used by the runtime facade and tests.
 */
export class MemoryOutput implements OutputPort {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}

/**
 * Fan out to several ports, in order.
 */
export function teeOutput(...ports: OutputPort[]): OutputPort {
  return {
    write(line: string): void {
      for (const port of ports) port.write(line);
    },
  };
}
