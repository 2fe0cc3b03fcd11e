export interface LineWriter {
  write(chunk: string): unknown;
}

export type ReportListener = (line: string) => void;

/**
 * Append-only report log shared by every session. Each line reaches the
 * output in a single write, so concurrent sessions never split a line.
 */
export class ReportSink {
  private readonly listeners = new Set<ReportListener>();

  constructor(private readonly out: LineWriter = process.stdout) {}

  write(line: string): void {
    this.out.write(`${line}\n`);
    for (const listener of this.listeners) {
      try {
        listener(line);
      } catch (err) {
        console.error('[REPORT] Listener failed:', err);
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ReportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
