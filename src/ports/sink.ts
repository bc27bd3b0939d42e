/**
 * Sink port interface.
 * Receives the bytes written by the '.' instruction, in execution order.
 */
export interface ByteSink {
  write(byte: number): void;

  /**
   * Push any buffered bytes to their destination.
   * Called before every blocking read and at the end of each run or turn.
   */
  flush(): void;
}

export class MemorySink implements ByteSink {
  private readonly bytes: number[] = [];
  flushes = 0;

  write(byte: number): void {
    this.bytes.push(byte & 0xff);
  }

  flush(): void {
    this.flushes++;
  }

  data(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  text(): string {
    return Buffer.from(this.bytes).toString("latin1");
  }

  clear(): void {
    this.bytes.length = 0;
  }
}
