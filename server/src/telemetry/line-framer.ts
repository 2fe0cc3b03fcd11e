const NEWLINE = 0x0a;

/**
 * Buffers incoming bytes and emits complete newline-terminated records.
 * Whatever follows the last newline is kept for the next chunk.
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Appends the chunk right away; records are split off lazily as the
   * returned iterator is consumed. Records left unconsumed are picked up
   * by the iterator of the next call.
   */
  feed(chunk: Buffer | string): Generator<string, void, undefined> {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, bytes]) : bytes;
    return this.records();
  }

  /** Bytes received after the last newline. */
  get remainder(): Buffer {
    return this.buffer;
  }

  private *records(): Generator<string, void, undefined> {
    let lineEnd: number;
    while ((lineEnd = this.buffer.indexOf(NEWLINE)) !== -1) {
      const record = this.buffer.subarray(0, lineEnd).toString('utf8');
      this.buffer = this.buffer.subarray(lineEnd + 1);
      yield record;
    }
  }
}
