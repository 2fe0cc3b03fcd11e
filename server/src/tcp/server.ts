import net from 'net';
import type { ConnectionDispatcher } from './dispatcher.js';
import { ListenError, errorMessage } from '../errors.js';

export interface TelemetryServerOptions {
  port: number;
  host: string;
  dispatcher: ConnectionDispatcher;
}

/**
 * Listens for flight clients and hands every accepted socket to the
 * dispatcher. Rejects with ListenError if the port cannot be bound.
 */
export function startTelemetryServer({ port, host, dispatcher }: TelemetryServerOptions): Promise<net.Server> {
  // Read errors surface through the socket's async iterator and are
  // logged by the session
  const server = net.createServer((socket) => {
    void dispatcher.dispatch(socket, socket.remoteAddress ?? null);
  });

  return new Promise((resolve, reject) => {
    const onStartupError = (err: Error) => reject(new ListenError(port, err));
    server.once('error', onStartupError);
    server.listen(port, host, () => {
      server.off('error', onStartupError);
      server.on('error', (err) => {
        console.error('[TCP] Server error:', errorMessage(err));
      });
      console.log(`[TCP] Telemetry server listening on ${host}:${port}`);
      resolve(server);
    });
  });
}
