import express from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import { WebSocketServer } from 'ws';
import type { ConnectionDispatcher } from '../tcp/dispatcher.js';
import type { ReportSink } from '../report/sink.js';
import { setupLiveFeed, attachLiveFeedLogging } from '../ws/live-feed.js';
import { ListenError } from '../errors.js';

export function createStatusApp(dispatcher: ConnectionDispatcher): express.Express {
  const app = express();
  app.use(cors());

  app.get('/api/health', (_req, res) => res.json({ ok: true }));
  app.get('/api/stats', (_req, res) => res.json(dispatcher.stats()));
  app.get('/api/flights', (_req, res) => res.json(dispatcher.activeSessions()));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/** HTTP status API with the live report feed on /live. */
export function startStatusServer(
  port: number,
  dispatcher: ConnectionDispatcher,
  sink: ReportSink,
): Promise<Server> {
  const server = createServer(createStatusApp(dispatcher));
  const wss = new WebSocketServer({ server, path: '/live' });
  attachLiveFeedLogging(wss);
  const detach = setupLiveFeed(wss, sink);
  server.on('close', detach);

  return new Promise((resolve, reject) => {
    const onStartupError = (err: Error) => reject(new ListenError(port, err));
    server.once('error', onStartupError);
    server.listen(port, () => {
      server.off('error', onStartupError);
      console.log(`[HTTP] Status API running on http://localhost:${port}`);
      resolve(server);
    });
  });
}
