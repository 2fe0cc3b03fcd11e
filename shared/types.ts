// ---- Telemetry ----

export interface Reading {
  readonly timestamp: Date;
  readonly fuelRemaining: number;
}

export interface SessionState {
  sessionId: string;
  started: boolean;
  startTime: Date | null;
  startFuel: number;
  lastTime: Date | null;
  lastFuel: number;
}

export interface ConsumptionEvent {
  sessionId: string;
  timestamp: Date;
  fuelRemaining: number;
  instantaneousRate: number;
}

export interface SessionSummary {
  sessionId: string;
  averageRate: number;
}

export type ParseResult =
  | { ok: true; reading: Reading }
  | { ok: false; reason: ParseFailureReason; raw: string };

export type ParseFailureReason = 'field_count' | 'timestamp' | 'fuel';

// ---- Sessions ----

export type SessionStatus = 'completed' | 'discarded';

export interface SessionOutcome {
  status: SessionStatus;
  sessionId?: string;
  summary?: SessionSummary;
  readingsAccepted: number;
  parseFailures: number;
  transportError?: string;
}

export interface FlightSnapshot {
  connectionId: string;
  airplaneId: string | null;
  remoteAddress: string | null;
  connectedAt: string;
  readingsAccepted: number;
  parseFailures: number;
  lastFuel: number | null;
  lastRate: number | null;
}

export interface DispatcherStats {
  accepted: number;
  active: number;
  completed: number;
  discarded: number;
  transportErrors: number;
}

// ---- Live feed ----

export interface LiveFeedMessage {
  type: 'report';
  line: string;
  t: string;
}
