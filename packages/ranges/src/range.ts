/**
 * Range generation: the ordered epoch values between two instants.
 */

import {
	ArithmeticOverflowError,
	InvalidIntervalError,
	createLogger,
	getConfig,
	includesEnd,
	includesStart,
	isInI64Range,
	nanosPerUnit,
	type ClosedWindow,
	type TimeUnit,
} from '@steprange/core';
import { TimestampBuffer } from './buffer.js';
import type { Duration } from './duration.js';
import { applyOffset } from './offset.js';
import { dateFnsTimezoneResolver, type TimezoneResolver } from './timezone.js';

const logger = createLogger('ranges');

/**
 * Options for range generation.
 */
export interface RangeOptions {
	/** IANA zone the calendar components are resolved in. Null means UTC wall clock. */
	timezone?: string | null;
	/** Offset lookup used when `timezone` is set. */
	resolver?: TimezoneResolver;
}

function checkEndpoint(value: bigint, name: string, unit: TimeUnit): void {
	if (!isInI64Range(value)) {
		throw new ArithmeticOverflowError(`\`${name}\` does not fit in a 64-bit ${unit} timestamp`, {
			[name]: value.toString(),
			unit,
		});
	}
}

/**
 * Arithmetic progression for intervals without calendar components.
 * The output size is known up front.
 */
function fixedRange(start: bigint, end: bigint, interval: Duration, closed: ClosedWindow, unit: TimeUnit): BigInt64Array {
	const step = interval.fixedIn(unit);
	if (step === 0n) {
		throw new InvalidIntervalError(`\`interval\` ${interval.toString()} is shorter than one ${unit} tick`, {
			interval: interval.toString(),
			unit,
		});
	}
	if (interval.nanoseconds % nanosPerUnit(unit) !== 0n) {
		throw new InvalidIntervalError(`\`interval\` ${interval.toString()} is not a whole number of ${unit} ticks`, {
			interval: interval.toString(),
			unit,
		});
	}

	const first = includesStart(closed) ? start : start + step;
	if (first > end) {
		return new BigInt64Array(0);
	}

	let count = (end - first) / step + 1n;
	if (!includesEnd(closed) && first + (count - 1n) * step === end) {
		count -= 1n;
	}

	const values = new BigInt64Array(Number(count));
	for (let i = 0; i < values.length; i++) {
		values[i] = first + BigInt(i) * step;
	}
	return values;
}

/**
 * Step through the calendar one interval at a time, each step measured from
 * `start` so month-end clamping does not accumulate.
 */
function calendarRange(
	start: bigint,
	end: bigint,
	interval: Duration,
	closed: ClosedWindow,
	unit: TimeUnit,
	timezone: string | null,
	resolver: TimezoneResolver,
): BigInt64Array {
	const estimate = (end - start) / interval.approximateIn(unit) + 1n;
	const cap = BigInt(getConfig().maxPreallocation);
	const buffer = new TimestampBuffer(Number(estimate < cap ? estimate : cap));

	const inRange = includesEnd(closed) ? (t: bigint) => t <= end : (t: bigint) => t < end;

	let i = includesStart(closed) ? 0 : 1;
	let t = applyOffset(start, interval, i, unit, timezone, resolver);
	while (inRange(t)) {
		buffer.push(t);
		i += 1;
		t = applyOffset(start, interval, i, unit, timezone, resolver);
	}

	if (buffer.reallocations > 0) {
		logger.debug('calendar range outgrew its size estimate', () => ({
			estimate: estimate.toString(),
			size: buffer.size,
			reallocations: buffer.reallocations,
		}));
	}

	return buffer.toArray();
}

/**
 * Generate the epoch values from `start` to `end` spaced by `interval`.
 *
 * Intervals with only a fixed component take an arithmetic fast path.
 * Intervals with weeks, months or days are resolved step by step against the
 * calendar (and `options.timezone`, when given), so consecutive values need
 * not be evenly spaced in absolute time.
 *
 * @returns Strictly ascending values; empty when `start > end`
 * @throws InvalidIntervalError when `interval` is zero or negative, or a fixed
 *   interval is not a whole number of `unit` ticks
 *
 * @example
 * ```typescript
 * datetimeRangeValues(0n, 10n, Duration.parse('2ns'), 'both', 'ns');
 * // BigInt64Array [0n, 2n, 4n, 6n, 8n, 10n]
 * ```
 */
export function datetimeRangeValues(
	start: bigint,
	end: bigint,
	interval: Duration,
	closed: ClosedWindow,
	unit: TimeUnit,
	options: RangeOptions = {},
): BigInt64Array {
	checkEndpoint(start, 'start', unit);
	checkEndpoint(end, 'end', unit);

	if (start > end) {
		return new BigInt64Array(0);
	}

	if (interval.negative || interval.isZero()) {
		throw new InvalidIntervalError('`interval` must be positive', { interval: interval.toString() });
	}

	const timezone = options.timezone ?? null;
	const fixed = interval.isFixed();

	logger.debug('generating range', () => ({
		path: fixed ? 'fixed' : 'calendar',
		interval: interval.toString(),
		closed,
		unit,
		timezone,
	}));

	if (fixed) {
		return fixedRange(start, end, interval, closed, unit);
	}

	return calendarRange(start, end, interval, closed, unit, timezone, options.resolver ?? dateFnsTimezoneResolver);
}
