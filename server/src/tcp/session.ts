import { LineFramer } from '../telemetry/line-framer.js';
import { parseTelemetryRecord } from '../telemetry/record-parser.js';
import { ConsumptionTracker } from '../telemetry/tracker.js';
import type { ReportSink } from '../report/sink.js';
import {
  connectedMessage,
  consumptionMessage,
  parseFailureMessage,
  summaryMessage,
} from '../report/messages.js';
import { TransportError, errorMessage } from '../errors.js';
import type { ConsumptionEvent, Reading, SessionOutcome } from '../../../shared/types.js';

/** A client byte stream; net.Socket satisfies this. */
export interface TelemetryConnection extends AsyncIterable<Buffer | string> {
  destroy(): void;
}

export interface SessionHooks {
  onIdentified?: (airplaneId: string) => void;
  onReading?: (reading: Reading, event: ConsumptionEvent | null) => void;
  onParseFailure?: (raw: string) => void;
}

/**
 * Runs one flight session: the first line names the airplane, every line
 * after it is telemetry. Resolves once the client has gone away.
 */
export async function handleSession(
  connection: TelemetryConnection,
  sink: ReportSink,
  hooks: SessionHooks = {},
): Promise<SessionOutcome> {
  const framer = new LineFramer();
  let tracker: ConsumptionTracker | null = null;
  let readingsAccepted = 0;
  let parseFailures = 0;
  let transportError: TransportError | undefined;

  const identify = (airplaneId: string): ConsumptionTracker => {
    sink.write(connectedMessage(airplaneId));
    hooks.onIdentified?.(airplaneId);
    return new ConsumptionTracker(airplaneId);
  };

  const processRecord = (active: ConsumptionTracker, record: string) => {
    const line = record.trim();
    if (!line) return;

    const parsed = parseTelemetryRecord(line);
    if (!parsed.ok) {
      parseFailures++;
      sink.write(parseFailureMessage(line));
      hooks.onParseFailure?.(line);
      return;
    }

    readingsAccepted++;
    const event = active.accept(parsed.reading);
    if (event) sink.write(consumptionMessage(event));
    hooks.onReading?.(parsed.reading, event);
  };

  try {
    const reader = connection[Symbol.asyncIterator]();
    for (;;) {
      let next: IteratorResult<Buffer | string>;
      try {
        next = await reader.next();
      } catch (err) {
        transportError = new TransportError(`Read failed: ${errorMessage(err)}`, err);
        break;
      }
      if (next.done) break;

      for (const record of framer.feed(next.value)) {
        if (tracker) {
          processRecord(tracker, record);
        } else {
          tracker = identify(record);
        }
      }
    }

    const active = tracker;
    if (!active) {
      if (transportError) {
        console.error('[SESSION] Connection dropped before airplane ID:', transportError.message);
      } else {
        console.log('[SESSION] Connection closed before airplane ID, discarding');
      }
      return {
        status: 'discarded',
        readingsAccepted: 0,
        parseFailures: 0,
        transportError: transportError?.message,
      };
    }

    if (transportError) {
      console.error(`[SESSION] ${active.snapshot().sessionId}: ${transportError.message}`);
    }
    if (framer.remainder.length > 0) {
      console.log(`[SESSION] ${active.snapshot().sessionId}: dropping ${framer.remainder.length} unterminated byte(s)`);
    }

    const summary = active.finalize();
    sink.write(summaryMessage(summary));
    return {
      status: 'completed',
      sessionId: summary.sessionId,
      summary,
      readingsAccepted,
      parseFailures,
      transportError: transportError?.message,
    };
  } finally {
    connection.destroy();
  }
}
