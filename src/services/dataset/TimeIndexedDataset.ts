/**
 * Time-indexed datasets
 *
 * The resolver only needs an inclusive date-range selector. TimeSeries is a
 * small in-memory implementation for callers without their own dataset type.
 */

import { InvalidArgumentError } from '../../types/errors.js';

/**
 * Anything that can return the subset of itself between two ISO dates
 * (`YYYY-MM-DD`), inclusive on both ends.
 */
export interface TimeIndexedDataset<TSubset> {
  selectRange(startDate: string, endDate: string): TSubset;
}

export interface TimePoint<V> {
  time: Date;
  value: V;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function assertIsoDate(field: string, value: string): void {
  if (!ISO_DATE.test(value)) {
    throw new InvalidArgumentError(field, value, 'an ISO date (YYYY-MM-DD)');
  }
}

/** UTC calendar date of a point, comparable as a string with ISO dates */
function calendarDate(time: Date): string {
  return time.toISOString().slice(0, 10);
}

/**
 * Ordered in-memory series. Points are compared by their UTC calendar date,
 * so any point on the end date is part of the selection.
 */
export class TimeSeries<V> implements TimeIndexedDataset<TimeSeries<V>> {
  readonly points: readonly TimePoint<V>[];

  /**
   * @throws InvalidArgumentError when a point's time is not a valid date
   */
  constructor(points: Iterable<TimePoint<V>>) {
    const collected = [...points];
    for (const point of collected) {
      if (Number.isNaN(point.time.getTime())) {
        throw new InvalidArgumentError('time', String(point.time), 'a valid date');
      }
    }
    this.points = collected.sort((a, b) => a.time.getTime() - b.time.getTime());
  }

  static fromEntries<V>(entries: Iterable<readonly [Date | string, V]>): TimeSeries<V> {
    const points: TimePoint<V>[] = [];
    for (const [time, value] of entries) {
      points.push({ time: typeof time === 'string' ? new Date(time) : time, value });
    }
    return new TimeSeries(points);
  }

  get length(): number {
    return this.points.length;
  }

  values(): V[] {
    return this.points.map((point) => point.value);
  }

  selectRange(startDate: string, endDate: string): TimeSeries<V> {
    assertIsoDate('startDate', startDate);
    assertIsoDate('endDate', endDate);
    return new TimeSeries(
      this.points.filter((point) => {
        const date = calendarDate(point.time);
        return date >= startDate && date <= endDate;
      })
    );
  }
}
