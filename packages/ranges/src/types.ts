/**
 * Type definitions for range columns and their inputs.
 */

import type { TimeUnit } from '@steprange/core';
import type { Duration } from './duration.js';

/**
 * Sort order recorded on a column. Range columns are always ascending, and
 * nothing re-checks it.
 */
export type SortedFlag = 'ascending';

/**
 * A column of instants stored as 64-bit epoch values.
 */
export interface DatetimeColumn {
	kind: 'datetime';
	name: string;
	values: BigInt64Array;
	unit: TimeUnit;
	/** Zone the values were generated in, or null for naive (UTC) values. */
	timezone: string | null;
	sorted: SortedFlag;
}

/**
 * A column of times of day as nanoseconds since midnight.
 */
export interface TimeColumn {
	kind: 'time';
	name: string;
	values: BigInt64Array;
	sorted: SortedFlag;
}

/**
 * A Date (its UTC reading) or a naive ISO date-time such as
 * `2021-01-31`, `2021-01-31T08:30` or `2021-01-31 08:30:00.123456789`.
 */
export type DateTimeInput = Date | string;

export interface TimeOfDay {
	hour: number;
	minute: number;
	second: number;
	nanosecond: number;
}

/**
 * `HH:mm[:ss[.fffffffff]]` or a partial TimeOfDay with at least the hour.
 */
export type TimeOfDayInput = string | (Pick<TimeOfDay, 'hour'> & Partial<TimeOfDay>);

/**
 * A Duration or interval text accepted by `Duration.parse`.
 */
export type IntervalInput = Duration | string;
