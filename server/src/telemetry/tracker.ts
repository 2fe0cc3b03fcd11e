import type { ConsumptionEvent, Reading, SessionState, SessionSummary } from '../../../shared/types.js';

const copyDate = (date: Date | null) => (date ? new Date(date.getTime()) : null);

function elapsedSeconds(from: Date | null, to: Date | null): number {
  if (!from || !to) return 0;
  return (to.getTime() - from.getTime()) / 1000;
}

/** Rate over a span; non-positive spans count as no consumption. */
function rate(fuelConsumed: number, seconds: number): number {
  return seconds > 0 ? fuelConsumed / seconds : 0;
}

/**
 * Folds the readings of one flight session into per-step consumption rates
 * and a session average. One instance per connection.
 */
export class ConsumptionTracker {
  private readonly state: SessionState;

  constructor(sessionId: string) {
    this.state = {
      sessionId,
      started: false,
      startTime: null,
      startFuel: 0,
      lastTime: null,
      lastFuel: 0,
    };
  }

  accept(reading: Reading): ConsumptionEvent | null {
    const s = this.state;

    // Readings are owned by the caller, so keep private copies of their dates
    if (!s.started) {
      s.started = true;
      s.startTime = new Date(reading.timestamp.getTime());
      s.startFuel = reading.fuelRemaining;
      s.lastTime = new Date(reading.timestamp.getTime());
      s.lastFuel = reading.fuelRemaining;
      return null;
    }

    // A fuel increase yields a negative rate; it is reported as-is
    const fuelConsumed = s.lastFuel - reading.fuelRemaining;
    const instantaneousRate = rate(fuelConsumed, elapsedSeconds(s.lastTime, reading.timestamp));

    s.lastTime = new Date(reading.timestamp.getTime());
    s.lastFuel = reading.fuelRemaining;

    return {
      sessionId: s.sessionId,
      timestamp: new Date(reading.timestamp.getTime()),
      fuelRemaining: reading.fuelRemaining,
      instantaneousRate,
    };
  }

  finalize(): SessionSummary {
    const s = this.state;
    return {
      sessionId: s.sessionId,
      averageRate: rate(s.startFuel - s.lastFuel, elapsedSeconds(s.startTime, s.lastTime)),
    };
  }

  snapshot(): Readonly<SessionState> {
    return {
      ...this.state,
      startTime: copyDate(this.state.startTime),
      lastTime: copyDate(this.state.lastTime),
    };
  }
}
