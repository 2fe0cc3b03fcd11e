import { v4 as uuid } from 'uuid';
import { handleSession, type TelemetryConnection } from './session.js';
import type { ReportSink } from '../report/sink.js';
import { errorMessage } from '../errors.js';
import type { DispatcherStats, FlightSnapshot, SessionOutcome } from '../../../shared/types.js';

interface ActiveSession {
  snapshot: FlightSnapshot;
  task: Promise<SessionOutcome>;
}

/**
 * Starts one session task per connection and keeps track of it until it
 * settles. There is no cap on concurrent sessions.
 */
export class ConnectionDispatcher {
  private readonly active = new Map<string, ActiveSession>();
  private readonly counters = {
    accepted: 0,
    completed: 0,
    discarded: 0,
    transportErrors: 0,
  };

  constructor(private readonly sink: ReportSink) {}

  dispatch(connection: TelemetryConnection, remoteAddress: string | null = null): Promise<SessionOutcome> {
    const connectionId = uuid();
    const snapshot: FlightSnapshot = {
      connectionId,
      airplaneId: null,
      remoteAddress,
      connectedAt: new Date().toISOString(),
      readingsAccepted: 0,
      parseFailures: 0,
      lastFuel: null,
      lastRate: null,
    };
    this.counters.accepted++;
    console.log(`[TCP] Connection ${connectionId} accepted from ${remoteAddress ?? 'unknown'}`);

    const task = handleSession(connection, this.sink, {
      onIdentified: (airplaneId) => {
        snapshot.airplaneId = airplaneId;
      },
      onReading: (reading, event) => {
        snapshot.readingsAccepted++;
        snapshot.lastFuel = reading.fuelRemaining;
        if (event) snapshot.lastRate = event.instantaneousRate;
      },
      onParseFailure: () => {
        snapshot.parseFailures++;
      },
    })
      .then((outcome) => {
        if (outcome.status === 'completed') this.counters.completed++;
        else this.counters.discarded++;
        if (outcome.transportError) this.counters.transportErrors++;
        return outcome;
      }, (err: unknown) => {
        // Reads never reject; this is a hook or the report sink throwing
        console.error(`[TCP] Session ${connectionId} failed:`, errorMessage(err));
        this.counters.discarded++;
        const outcome: SessionOutcome = {
          status: 'discarded',
          sessionId: snapshot.airplaneId ?? undefined,
          readingsAccepted: snapshot.readingsAccepted,
          parseFailures: snapshot.parseFailures,
        };
        return outcome;
      })
      .finally(() => {
        this.active.delete(connectionId);
        console.log(`[TCP] Connection ${connectionId} closed`);
      });

    this.active.set(connectionId, { snapshot, task });
    return task;
  }

  /** Resolves once every session in flight at call time has settled. */
  async idle(): Promise<SessionOutcome[]> {
    return Promise.all(Array.from(this.active.values(), s => s.task));
  }

  activeSessions(): FlightSnapshot[] {
    return Array.from(this.active.values(), s => ({ ...s.snapshot }));
  }

  stats(): DispatcherStats {
    return { ...this.counters, active: this.active.size };
  }
}
