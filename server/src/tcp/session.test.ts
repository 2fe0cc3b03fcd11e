import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { handleSession, type TelemetryConnection } from './session.js';
import { ReportSink } from '../report/sink.js';

type Chunk = string | Buffer | Error;

function fakeConnection(chunks: Chunk[]) {
  const state = { destroyed: false };
  const connection: TelemetryConnection = {
    async *[Symbol.asyncIterator]() {
      for (const chunk of chunks) {
        await Promise.resolve();
        if (chunk instanceof Error) throw chunk;
        yield chunk;
      }
    },
    destroy() {
      state.destroyed = true;
    },
  };
  return { connection, state };
}

function captureSink() {
  const writes: string[] = [];
  const sink = new ReportSink({ write: (chunk: string) => writes.push(chunk) });
  const lines = () => writes.map(w => w.slice(0, -1));
  return { sink, writes, lines };
}

describe('handleSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports consumption and the session average', async () => {
    const { sink, lines } = captureSink();
    const { connection, state } = fakeConnection([
      'N12AB\n2024-01-01 00:00:00,100\n2024-01-01 00:00:10,95\n',
      '2024-01-01 00:00:20,88\n',
    ]);

    const outcome = await handleSession(connection, sink);

    expect(lines()).toEqual([
      'Connected client, airplane ID: N12AB',
      'Airplane N12AB | 2024-01-01 00:00:10 Fuel Remaining: 95 | Current Consumption: 0.5 fuel/sec',
      'Airplane N12AB | 2024-01-01 00:00:20 Fuel Remaining: 88 | Current Consumption: 0.7 fuel/sec',
      'Flight for airplane N12AB ended. Average Fuel Consumption: 0.6 fuel/sec',
    ]);
    expect(outcome).toEqual({
      status: 'completed',
      sessionId: 'N12AB',
      summary: { sessionId: 'N12AB', averageRate: 0.6 },
      readingsAccepted: 3,
      parseFailures: 0,
      transportError: undefined,
    });
    expect(state.destroyed).toBe(true);
  });

  it('assembles an airplane ID split across chunks', async () => {
    const { sink, lines } = captureSink();
    const { connection } = fakeConnection(['N1', '2A', 'B\n2024-01-01 00:00:00,100\n']);

    await handleSession(connection, sink);

    expect(lines()).toEqual([
      'Connected client, airplane ID: N12AB',
      'Flight for airplane N12AB ended. Average Fuel Consumption: 0 fuel/sec',
    ]);
  });

  it('discards a session that ends before the airplane ID', async () => {
    const { sink, writes } = captureSink();
    const { connection, state } = fakeConnection(['N12AB']);

    const outcome = await handleSession(connection, sink);

    expect(writes).toEqual([]);
    expect(outcome).toEqual({ status: 'discarded', readingsAccepted: 0, parseFailures: 0, transportError: undefined });
    expect(state.destroyed).toBe(true);
  });

  it('reports a malformed record and carries on', async () => {
    const { sink, lines } = captureSink();
    const onParseFailure = vi.fn();
    const { connection } = fakeConnection([
      'X1\n2024-01-01 00:00:00,100\nnot telemetry\n2024-01-01 00:00:10,95\n',
    ]);

    const outcome = await handleSession(connection, sink, { onParseFailure });

    expect(lines()).toEqual([
      'Connected client, airplane ID: X1',
      'Failed to parse telemetry data: not telemetry',
      'Airplane X1 | 2024-01-01 00:00:10 Fuel Remaining: 95 | Current Consumption: 0.5 fuel/sec',
      'Flight for airplane X1 ended. Average Fuel Consumption: 0.5 fuel/sec',
    ]);
    expect(outcome.parseFailures).toBe(1);
    expect(outcome.readingsAccepted).toBe(2);
    expect(onParseFailure).toHaveBeenCalledWith('not telemetry');
  });

  it('skips blank lines and tolerates CRLF endings', async () => {
    const { sink, lines } = captureSink();
    const { connection } = fakeConnection([
      'X1\n   \n2024-01-01 00:00:00,100\r\n\n2024-01-01 00:00:04,98\r\n',
    ]);

    await handleSession(connection, sink);

    expect(lines()).toEqual([
      'Connected client, airplane ID: X1',
      'Airplane X1 | 2024-01-01 00:00:04 Fuel Remaining: 98 | Current Consumption: 0.5 fuel/sec',
      'Flight for airplane X1 ended. Average Fuel Consumption: 0.5 fuel/sec',
    ]);
  });

  it('drops an unterminated final record', async () => {
    const { sink, lines } = captureSink();
    const { connection } = fakeConnection(['X1\n2024-01-01 00:00:00,100\n2024-01-01 00:00:10,90']);

    const outcome = await handleSession(connection, sink);

    expect(lines()).toEqual([
      'Connected client, airplane ID: X1',
      'Flight for airplane X1 ended. Average Fuel Consumption: 0 fuel/sec',
    ]);
    expect(outcome.readingsAccepted).toBe(1);
  });

  it('finalizes with the readings so far when the read fails', async () => {
    const { sink, lines } = captureSink();
    const { connection, state } = fakeConnection([
      'X1\n2024-01-01 00:00:00,100\n2024-01-01 00:00:10,90\n',
      new Error('ECONNRESET'),
    ]);

    const outcome = await handleSession(connection, sink);

    expect(lines()).toEqual([
      'Connected client, airplane ID: X1',
      'Airplane X1 | 2024-01-01 00:00:10 Fuel Remaining: 90 | Current Consumption: 1 fuel/sec',
      'Flight for airplane X1 ended. Average Fuel Consumption: 1 fuel/sec',
    ]);
    expect(outcome.status).toBe('completed');
    expect(outcome.transportError).toBe('Read failed: ECONNRESET');
    expect(state.destroyed).toBe(true);
  });

  it('propagates a failing hook instead of treating it as a read error', async () => {
    const { sink, lines } = captureSink();
    const { connection, state } = fakeConnection([
      'X1\n2024-01-01 00:00:00,100\n2024-01-01 00:00:10,95\n',
    ]);
    const onReading = vi.fn(() => {
      throw new Error('hook bug');
    });

    await expect(handleSession(connection, sink, { onReading })).rejects.toThrow('hook bug');

    expect(onReading).toHaveBeenCalledTimes(1);
    expect(lines()).toEqual(['Connected client, airplane ID: X1']);
    expect(console.error).not.toHaveBeenCalled();
    expect(state.destroyed).toBe(true);
  });

  it('writes only whole lines when sessions run concurrently', async () => {
    const { sink, writes, lines } = captureSink();
    const sessionFor = (id: string) => fakeConnection([
      `${id}\n`,
      '2024-01-01 00:00:00,100\n2024-01-01 00:00:',
      '10,95\n',
      '2024-01-01 00:00:20,88\n',
    ]).connection;

    await Promise.all([handleSession(sessionFor('A1'), sink), handleSession(sessionFor('B2'), sink)]);

    expect(writes).toHaveLength(8);
    for (const w of writes) {
      expect(w.endsWith('\n')).toBe(true);
      expect(w.indexOf('\n')).toBe(w.length - 1);
    }
    for (const id of ['A1', 'B2']) {
      expect(lines().filter(l => l.includes(` ${id}`))).toEqual([
        `Connected client, airplane ID: ${id}`,
        `Airplane ${id} | 2024-01-01 00:00:10 Fuel Remaining: 95 | Current Consumption: 0.5 fuel/sec`,
        `Airplane ${id} | 2024-01-01 00:00:20 Fuel Remaining: 88 | Current Consumption: 0.7 fuel/sec`,
        `Flight for airplane ${id} ended. Average Fuel Consumption: 0.6 fuel/sec`,
      ]);
    }
  });
});
