import type { ConsumptionEvent, SessionSummary } from '../../../shared/types.js';
import { formatTimestamp } from '../telemetry/record-parser.js';

const SIGNIFICANT_DIGITS = 6;

const stripZeros = (digits: string) => (digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits);

/**
 * printf-style %g: six significant digits, trailing zeros dropped, and
 * exponent notation below 1e-4 or from 1e6 up (0.5, 4564.47, 1.23457e+06).
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return '0';

  const [mantissa, exp] = value.toExponential(SIGNIFICANT_DIGITS - 1).split('e');
  const exponent = Number(exp);
  if (exponent < -4 || exponent >= SIGNIFICANT_DIGITS) {
    const sign = exponent < 0 ? '-' : '+';
    return `${stripZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return stripZeros(value.toFixed(SIGNIFICANT_DIGITS - 1 - exponent));
}

export function connectedMessage(airplaneId: string): string {
  return `Connected client, airplane ID: ${airplaneId}`;
}

export function consumptionMessage(event: ConsumptionEvent): string {
  return `Airplane ${event.sessionId} | ${formatTimestamp(event.timestamp)}`
    + ` Fuel Remaining: ${formatNumber(event.fuelRemaining)}`
    + ` | Current Consumption: ${formatNumber(event.instantaneousRate)} fuel/sec`;
}

export function parseFailureMessage(raw: string): string {
  return `Failed to parse telemetry data: ${raw}`;
}

export function summaryMessage(summary: SessionSummary): string {
  return `Flight for airplane ${summary.sessionId} ended.`
    + ` Average Fuel Consumption: ${formatNumber(summary.averageRate)} fuel/sec`;
}
