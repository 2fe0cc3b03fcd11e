import { ConfigError } from './errors.js';

export const DEFAULT_TELEMETRY_PORT = 27000;
export const DEFAULT_TELEMETRY_HOST = '0.0.0.0';

export interface ServerConfig {
  telemetryPort: number;
  telemetryHost: string;
  /** null when the status API is disabled */
  statusPort: number | null;
}

function parsePort(name: string, raw: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(port) || port > 65535) {
    throw new ConfigError(`${name} must be a port number between 0 and 65535, got "${raw}"`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const telemetryPortName = env.TELEMETRY_PORT ? 'TELEMETRY_PORT' : 'PORT';
  const rawTelemetryPort = env[telemetryPortName];
  const rawStatusPort = env.STATUS_PORT;

  return {
    telemetryPort: rawTelemetryPort ? parsePort(telemetryPortName, rawTelemetryPort) : DEFAULT_TELEMETRY_PORT,
    telemetryHost: env.TELEMETRY_HOST || DEFAULT_TELEMETRY_HOST,
    statusPort: rawStatusPort ? parsePort('STATUS_PORT', rawStatusPort) : null,
  };
}
