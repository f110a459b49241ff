/**
 * PeriodGenerator
 *
 * Splits a date range into in-sample/out-of-sample periods and slides forward.
 *
 * Pattern (in=60, out=20, step=20 over 100 days):
 *   [d0 .. d59] → [d60 .. d79]
 *   [d20 .. d79] → [d80 .. d99]
 *
 * Rules:
 * - In-sample ends the day before out-of-sample starts (no gap, no leakage)
 * - A trailing window shorter than the out-of-sample length is dropped
 * - Pure: same inputs, same sequence
 */

import { DateTime } from 'luxon';
import type { DateRange, Period } from '@paramlab/core';
import { InvalidArgumentError, logger } from '@paramlab/utils';
import type { WindowConfig } from './types.js';

const ISO_DAY = 'yyyy-MM-dd';

function parseDay(iso: string, field: string): DateTime {
  const day = DateTime.fromISO(iso, { zone: 'utc' });
  if (!day.isValid) {
    throw new InvalidArgumentError(`${field} is not a valid ISO date: '${iso}'`, { [field]: iso });
  }
  return day.startOf('day');
}

function formatDay(day: DateTime): string {
  return day.toFormat(ISO_DAY);
}

/**
 * Inclusive day count of a range
 */
export function daysInRange(range: DateRange): number {
  const start = parseDay(range.start, 'start');
  const end = parseDay(range.end, 'end');
  return Math.round(end.diff(start, 'days').days) + 1;
}

/**
 * Generate walk-forward periods from configuration
 */
export function generatePeriods(range: DateRange, config: WindowConfig): Period[] {
  const step = config.stepDays ?? config.outOfSampleDays;
  for (const [key, value] of Object.entries({
    inSampleDays: config.inSampleDays,
    outOfSampleDays: config.outOfSampleDays,
    stepDays: step,
  })) {
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidArgumentError(`${key} must be a positive integer, got ${value}`, { [key]: value });
    }
  }

  const start = parseDay(range.start, 'start');
  const totalDays = daysInRange(range);
  if (totalDays < 1) {
    throw new InvalidArgumentError(`Date range ends before it starts: ${range.start} > ${range.end}`, {
      range,
    });
  }

  const periods: Period[] = [];
  for (
    let offset = 0;
    offset + config.inSampleDays + config.outOfSampleDays <= totalDays;
    offset += step
  ) {
    const inStart = start.plus({ days: offset });
    const outStart = inStart.plus({ days: config.inSampleDays });

    periods.push({
      index: periods.length,
      inSample: {
        start: formatDay(inStart),
        end: formatDay(outStart.minus({ days: 1 })),
      },
      outOfSample: {
        start: formatDay(outStart),
        end: formatDay(outStart.plus({ days: config.outOfSampleDays - 1 })),
      },
    });
  }

  logger.debug('Generated walk-forward periods', {
    totalPeriods: periods.length,
    inSampleDays: config.inSampleDays,
    outOfSampleDays: config.outOfSampleDays,
    step,
    totalDays,
  });

  return periods;
}

/**
 * Validate period boundaries against the data range
 */
export function validatePeriod(
  period: Period,
  range: DateRange
): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  if (period.inSample.start < range.start) {
    errors.push(`In-sample start (${period.inSample.start}) is before data start (${range.start})`);
  }

  if (period.outOfSample.end > range.end) {
    errors.push(`Out-of-sample end (${period.outOfSample.end}) is after data end (${range.end})`);
  }

  if (period.inSample.start > period.inSample.end) {
    errors.push(`In-sample start (${period.inSample.start}) must not be after its end (${period.inSample.end})`);
  }

  if (period.outOfSample.start > period.outOfSample.end) {
    errors.push(
      `Out-of-sample start (${period.outOfSample.start}) must not be after its end (${period.outOfSample.end})`
    );
  }

  if (period.inSample.end >= period.outOfSample.start) {
    errors.push(
      `In-sample end (${period.inSample.end}) must be before out-of-sample start (${period.outOfSample.start}) - no leakage allowed`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
