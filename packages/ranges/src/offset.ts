/**
 * Offset application: `start + interval * step`, calendar- and zone-aware.
 */

import { addDays, addMonths, addWeeks } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import {
	ArithmeticOverflowError,
	floorDiv,
	isInI64Range,
	nanosToUnit,
	unitsPerMillisecond,
	type TimeUnit,
} from '@steprange/core';
import type { Duration } from './duration.js';
import { dateFnsTimezoneResolver, fromWallClock, toWallClock, type TimezoneResolver } from './timezone.js';

/** Largest magnitude a Date can hold, in milliseconds. */
const MAX_DATE_MS = 8_640_000_000_000_000n;

function toDateMs(ms: bigint): number {
	if (ms > MAX_DATE_MS || ms < -MAX_DATE_MS) {
		throw new ArithmeticOverflowError('instant is outside the supported calendar range', {
			milliseconds: ms.toString(),
		});
	}
	return Number(ms);
}

function shiftWallClock(wallMs: number, interval: Duration): number {
	const sign = interval.negative ? -1 : 1;

	let local = new UTCDate(wallMs);
	if (interval.months) local = addMonths(local, sign * interval.months);
	if (interval.weeks) local = addWeeks(local, sign * interval.weeks);
	if (interval.days) local = addDays(local, sign * interval.days);

	const shifted = local.getTime();
	if (Number.isNaN(shifted)) {
		throw new ArithmeticOverflowError(`adding ${interval.toString()} leaves the supported calendar range`, {
			interval: interval.toString(),
		});
	}
	return shifted;
}

/**
 * Apply the calendar components of `interval` to an epoch value.
 * Sub-millisecond ticks ride along unchanged.
 */
function addCalendar(
	value: bigint,
	interval: Duration,
	unit: TimeUnit,
	timezone: string | null,
	resolver: TimezoneResolver,
): bigint {
	const perMs = unitsPerMillisecond(unit);
	const ms = floorDiv(value, perMs);
	const remainder = value - ms * perMs;
	const instantMs = toDateMs(ms);

	let shiftedMs: number;
	if (timezone) {
		const wall = toWallClock(instantMs, timezone, resolver);
		shiftedMs = fromWallClock(shiftWallClock(wall, interval), timezone, resolver);
	} else {
		shiftedMs = shiftWallClock(instantMs, interval);
	}

	return BigInt(shiftedMs) * perMs + remainder;
}

/**
 * Compute `start + interval * step` in `unit`.
 *
 * Months, then weeks, then days are added to the wall clock of `start`
 * (UTC when `timezone` is null), and the fixed component is added last.
 * Month addition clamps to the end of the target month, so stepping
 * 2021-01-31 by one month gives 2021-02-28 and by two gives 2021-03-31.
 *
 * @throws ArithmeticOverflowError when the scaled interval or the result is out of range
 * @throws TimezoneResolutionError when the zone is unknown or a local time is ambiguous or missing
 */
export function applyOffset(
	start: bigint,
	interval: Duration,
	step: number,
	unit: TimeUnit,
	timezone: string | null = null,
	resolver: TimezoneResolver = dateFnsTimezoneResolver,
): bigint {
	const scaled = interval.times(step);

	let result = start;
	if (!scaled.isFixed()) {
		result = addCalendar(result, scaled, unit, timezone, resolver);
	}

	const fixed = nanosToUnit(scaled.nanoseconds, unit);
	result += scaled.negative ? -fixed : fixed;

	if (!isInI64Range(result)) {
		throw new ArithmeticOverflowError(`offset by ${scaled.toString()} overflows a 64-bit ${unit} timestamp`, {
			start: start.toString(),
			interval: interval.toString(),
			step,
			unit,
		});
	}

	return result;
}
