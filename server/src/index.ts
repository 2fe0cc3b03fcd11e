import { loadConfig } from './config.js';
import { ReportSink } from './report/sink.js';
import { ConnectionDispatcher } from './tcp/dispatcher.js';
import { startTelemetryServer } from './tcp/server.js';
import { startStatusServer } from './http/status.js';
import { errorMessage } from './errors.js';

async function main() {
  const config = loadConfig();
  const sink = new ReportSink();
  const dispatcher = new ConnectionDispatcher(sink);

  await startTelemetryServer({
    port: config.telemetryPort,
    host: config.telemetryHost,
    dispatcher,
  });
  sink.write(`Server listening on port ${config.telemetryPort}`);

  if (config.statusPort !== null) {
    await startStatusServer(config.statusPort, dispatcher, sink);
  }
}

main().catch((err: unknown) => {
  console.error('[INIT] Startup failed:', errorMessage(err));
  process.exit(1);
});
