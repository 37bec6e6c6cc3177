import { InvalidFormatError } from '../errors/ArchiveErrors.js';
import type { RetentionPeriod } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Months and years are fixed-length approximations
const UNIT_DAYS: Record<string, number> = {
  D: 1,
  W: 7,
  M: 30,
  Y: 365,
};

const EXPRESSION = /^\s*(\d+)([DWMY])\s*$/i;

// Date covers 1e8 days either side of the epoch; beyond this a cutoff taken
// from any present-day clock is an Invalid Date
const MAX_DAYS = 100_000_000;

/**
 * Parse a retention expression such as "30D", "2W", "6M" or "1Y"
 */
export function parseTimeRange(expression: string): RetentionPeriod {
  const match = EXPRESSION.exec(expression);
  if (!match) {
    throw new InvalidFormatError(
      expression,
      `Invalid time range format: '${expression}'. ` +
        'Use formats like: 30D (days), 6M (months), 1Y (years), 2W (weeks)'
    );
  }

  const amount = Number.parseInt(match[1], 10);
  const unit = match[2].toUpperCase();
  const days = amount * UNIT_DAYS[unit];

  if (days > MAX_DAYS) {
    throw new InvalidFormatError(
      expression,
      `Time range '${expression}' is too large: at most ${MAX_DAYS} days can be represented`
    );
  }

  return {
    expression: `${amount}${unit}`,
    days,
  };
}

/**
 * The instant `period` before `now`
 */
export function cutoffFrom(period: RetentionPeriod, now: Date = new Date()): Date {
  const cutoff = new Date(now.getTime() - period.days * DAY_MS);
  if (Number.isNaN(cutoff.getTime())) {
    throw new InvalidFormatError(period.expression, `Time range '${period.expression}' reaches before the earliest date`);
  }
  return cutoff;
}

/**
 * Start of the UTC calendar day containing `cutoff`. IMAP BEFORE compares
 * dates only, so this is the value actually sent to the server.
 */
export function cutoffDay(cutoff: Date): Date {
  return new Date(Date.UTC(cutoff.getUTCFullYear(), cutoff.getUTCMonth(), cutoff.getUTCDate()));
}

export function formatCutoffDate(cutoff: Date): string {
  return cutoffDay(cutoff).toISOString().slice(0, 10);
}

/**
 * Human-readable description of a retention filter
 */
export function describeFilter(cutoff?: Date): string {
  return cutoff ? `older than ${formatCutoffDate(cutoff)}` : 'all messages';
}
