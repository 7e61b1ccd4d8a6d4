/**
 * Time zone resolution and wall-clock conversion.
 *
 * Wall-clock values are millisecond counts whose UTC reading is the local
 * date and time in a zone, e.g. 2021-03-14T01:30 in New York is stored as
 * Date.UTC(2021, 2, 14, 1, 30).
 */

import { getTimezoneOffset } from 'date-fns-tz';
import { TimezoneResolutionError } from '@steprange/core';

/**
 * Capability for looking up a zone's UTC offset at an instant.
 */
export interface TimezoneResolver {
	/**
	 * Milliseconds to add to the UTC instant to get the local reading in
	 * `timezone` (positive east of Greenwich).
	 */
	offsetAt(instantMs: number, timezone: string): number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Resolver backed by the IANA database through date-fns-tz.
 */
export const dateFnsTimezoneResolver: TimezoneResolver = {
	offsetAt(instantMs: number, timezone: string): number {
		const offset = getTimezoneOffset(timezone, new Date(instantMs));
		if (Number.isNaN(offset)) {
			throw new TimezoneResolutionError(`Unknown time zone "${timezone}"`, timezone);
		}
		return offset;
	},
};

/**
 * Resolver for a zone with a constant offset. Useful as a deterministic stand-in.
 */
export function fixedOffsetResolver(offsetMs: number): TimezoneResolver {
	return {
		offsetAt: () => offsetMs,
	};
}

/**
 * Local reading of a UTC instant in `timezone`.
 */
export function toWallClock(instantMs: number, timezone: string, resolver: TimezoneResolver): number {
	return instantMs + resolver.offsetAt(instantMs, timezone);
}

/**
 * The UTC instant whose local reading in `timezone` is `wallMs`.
 *
 * Tries the offsets in force a day either side; each one that maps back to
 * itself is a valid reading. No valid reading means the local time falls in a
 * gap, two mean it falls in an overlap. Both are errors.
 */
export function fromWallClock(wallMs: number, timezone: string, resolver: TimezoneResolver): number {
	const offsets = new Set([
		resolver.offsetAt(wallMs - DAY_MS, timezone),
		resolver.offsetAt(wallMs + DAY_MS, timezone),
	]);

	const candidates: number[] = [];
	for (const offset of offsets) {
		const instant = wallMs - offset;
		if (resolver.offsetAt(instant, timezone) === offset) {
			candidates.push(instant);
		}
	}

	const local = new Date(wallMs).toISOString().replace('Z', '');

	if (candidates.length === 0) {
		throw new TimezoneResolutionError(`Local time ${local} does not exist in time zone "${timezone}"`, timezone, {
			localTime: local,
			reason: 'non-existent',
		});
	}

	if (candidates.length > 1) {
		throw new TimezoneResolutionError(`Local time ${local} is ambiguous in time zone "${timezone}"`, timezone, {
			localTime: local,
			reason: 'ambiguous',
		});
	}

	return candidates[0];
}
