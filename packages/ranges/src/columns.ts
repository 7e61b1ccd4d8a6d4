/**
 * Column builders: convert calendar-typed endpoints to epoch values, generate
 * the range, and tag the result with its unit, zone and sort order.
 */

import { getYear } from 'date-fns';
import { toDate } from 'date-fns-tz';
import { UTCDate } from '@date-fns/utc';
import { z } from 'zod';
import {
	ArithmeticOverflowError,
	InvalidInputError,
	NS_PER_HOUR,
	NS_PER_MINUTE,
	NS_PER_MS,
	NS_PER_SECOND,
	convertUnit,
	floorDiv,
	isInI64Range,
	type ClosedWindow,
	type TimeUnit,
} from '@steprange/core';
import { Duration } from './duration.js';
import { datetimeRangeValues, type RangeOptions } from './range.js';
import type { DateTimeInput, DatetimeColumn, IntervalInput, TimeColumn, TimeOfDay, TimeOfDayInput } from './types.js';

// ============================================================================
// Endpoint Conversion
// ============================================================================

const NAIVE_DATETIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;
const TIME_OF_DAY = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

const TimeOfDaySchema = z.object({
	hour: z.number().int().min(0).max(23),
	minute: z.number().int().min(0).max(59).default(0),
	second: z.number().int().min(0).max(59).default(0),
	nanosecond: z.number().int().min(0).max(999_999_999).default(0),
});

/**
 * Nanoseconds from a fractional-seconds digit string (`"5"` is 500ms).
 */
function fractionToNanos(digits: string | undefined): bigint {
	return digits ? BigInt(digits.padEnd(9, '0')) : 0n;
}

function toIntervalDuration(interval: IntervalInput): Duration {
	return typeof interval === 'string' ? Duration.parse(interval) : interval;
}

/**
 * Nanoseconds since the epoch for a Date or a naive ISO date-time read as UTC.
 */
function toEpochNanos(input: DateTimeInput): bigint {
	if (input instanceof Date) {
		const ms = input.getTime();
		if (Number.isNaN(ms)) {
			throw new InvalidInputError('Invalid Date');
		}
		return BigInt(ms) * NS_PER_MS;
	}

	const match = NAIVE_DATETIME.exec(input);
	if (!match) {
		throw new InvalidInputError(`Invalid date-time "${input}": expected YYYY-MM-DD[THH:mm[:ss[.fffffffff]]]`, {
			value: input,
		});
	}

	const [, day, clock = '00:00', seconds = '00', fraction] = match;
	const parsed = toDate(`${day}T${clock}:${seconds}`, { timeZone: 'UTC' });
	const ms = parsed.getTime();
	if (Number.isNaN(ms)) {
		throw new InvalidInputError(`Invalid date-time "${input}"`, { value: input });
	}

	return BigInt(ms) * NS_PER_MS + fractionToNanos(fraction);
}

/**
 * Epoch value of `input` in `unit`. Digits finer than the unit are floored.
 */
export function toEpochValue(input: DateTimeInput, unit: TimeUnit): bigint {
	const nanos = toEpochNanos(input);
	if (unit === 'ns' && !isInI64Range(nanos)) {
		throw new ArithmeticOverflowError('date-time is outside the nanosecond timestamp range', {
			value: input instanceof Date ? input.toISOString() : input,
		});
	}
	return convertUnit(nanos, 'ns', unit);
}

/**
 * Coarse year check: true for date-times in the years 1386 to 2554 (UTC),
 * roughly 584 years either side of 1970.
 */
export function inNanosecondsWindow(input: DateTimeInput): boolean {
	const ms = floorDiv(toEpochNanos(input), NS_PER_MS);
	const year = getYear(new UTCDate(Number(ms)));
	return !(year > 2554 || year < 1386);
}

function parseTimeOfDay(input: TimeOfDayInput): TimeOfDay {
	let candidate: unknown = input;

	if (typeof input === 'string') {
		const match = TIME_OF_DAY.exec(input);
		if (!match) {
			throw new InvalidInputError(`Invalid time of day "${input}": expected HH:mm[:ss[.fffffffff]]`, {
				value: input,
			});
		}
		candidate = {
			hour: Number(match[1]),
			minute: Number(match[2]),
			second: match[3] === undefined ? 0 : Number(match[3]),
			nanosecond: Number(fractionToNanos(match[4])),
		};
	}

	const result = TimeOfDaySchema.safeParse(candidate);
	if (!result.success) {
		const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
		throw new InvalidInputError(`Invalid time of day: ${detail}`);
	}
	return result.data;
}

/**
 * Nanoseconds since midnight.
 */
export function toTimeOfDayNanos(input: TimeOfDayInput): bigint {
	const { hour, minute, second, nanosecond } = parseTimeOfDay(input);
	return (
		BigInt(hour) * NS_PER_HOUR +
		BigInt(minute) * NS_PER_MINUTE +
		BigInt(second) * NS_PER_SECOND +
		BigInt(nanosecond)
	);
}

// ============================================================================
// Column Builders
// ============================================================================

/**
 * Build a datetime column from epoch values already expressed in `unit`.
 */
export function datetimeRangeFromEpoch(
	name: string,
	start: bigint,
	end: bigint,
	interval: IntervalInput,
	closed: ClosedWindow,
	unit: TimeUnit,
	options: RangeOptions = {},
): DatetimeColumn {
	const values = datetimeRangeValues(start, end, toIntervalDuration(interval), closed, unit, options);

	return {
		kind: 'datetime',
		name,
		values,
		unit,
		timezone: options.timezone ?? null,
		sorted: 'ascending',
	};
}

/**
 * Build a datetime column between two date-times.
 *
 * Endpoints are Dates or naive ISO strings, both read as UTC. Strings may
 * carry up to nine fractional digits.
 *
 * @example
 * ```typescript
 * const column = dateRange('ts', '2021-01-31', '2021-04-30', '1mo', 'both', 'ms');
 * // values: 2021-01-31, 2021-02-28, 2021-03-31, 2021-04-30 (as ms since epoch)
 * ```
 */
export function dateRange(
	name: string,
	start: DateTimeInput,
	end: DateTimeInput,
	interval: IntervalInput,
	closed: ClosedWindow,
	unit: TimeUnit,
	options: RangeOptions = {},
): DatetimeColumn {
	return datetimeRangeFromEpoch(
		name,
		toEpochValue(start, unit),
		toEpochValue(end, unit),
		interval,
		closed,
		unit,
		options,
	);
}

/**
 * Build a time-of-day column from nanoseconds since midnight.
 */
export function timeRangeFromNanos(
	name: string,
	start: bigint,
	end: bigint,
	interval: IntervalInput,
	closed: ClosedWindow,
): TimeColumn {
	const values = datetimeRangeValues(start, end, toIntervalDuration(interval), closed, 'ns');

	return {
		kind: 'time',
		name,
		values,
		sorted: 'ascending',
	};
}

/**
 * Build a time-of-day column between two times.
 */
export function timeRange(
	name: string,
	start: TimeOfDayInput,
	end: TimeOfDayInput,
	interval: IntervalInput,
	closed: ClosedWindow,
): TimeColumn {
	return timeRangeFromNanos(name, toTimeOfDayNanos(start), toTimeOfDayNanos(end), interval, closed);
}
