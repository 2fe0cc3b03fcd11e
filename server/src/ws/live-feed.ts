import { WebSocket, type WebSocketServer } from 'ws';
import type { ReportSink } from '../report/sink.js';
import type { LiveFeedMessage } from '../../../shared/types.js';

export interface FeedClient {
  readonly readyState: number;
  send(data: string): void;
}

/** The part of a WebSocketServer the feed needs. */
export interface FeedClients {
  readonly clients: Iterable<FeedClient>;
}

function broadcast(wss: FeedClients, msg: LiveFeedMessage) {
  const data = JSON.stringify(msg);
  for (const client of wss.clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  }
}

/**
 * Mirrors every report line to connected WebSocket clients.
 * Returns a function that detaches the feed from the sink.
 */
export function setupLiveFeed(wss: FeedClients, sink: ReportSink): () => void {
  return sink.subscribe((line) => {
    broadcast(wss, { type: 'report', line, t: new Date().toISOString() });
  });
}

export function attachLiveFeedLogging(wss: WebSocketServer) {
  wss.on('connection', (ws, req) => {
    console.log(`[WS] Live feed client connected from ${req.socket.remoteAddress ?? 'unknown'}`);
    ws.on('close', () => console.log('[WS] Live feed client disconnected'));
  });
}
