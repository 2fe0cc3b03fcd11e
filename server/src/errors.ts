/** Read failure on a single client connection. Ends that session only. */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

/** Bind or listen failure at start-up. Fatal for the process. */
export class ListenError extends Error {
  constructor(readonly port: number, cause?: unknown) {
    super(`Failed to listen on port ${port}: ${errorMessage(cause)}`, { cause });
    this.name = 'ListenError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
