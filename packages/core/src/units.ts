/**
 * Time units, closed windows, and the integer scales that go with them.
 * Epoch values are bigint counts of a TimeUnit since 1970-01-01T00:00:00Z.
 */

/**
 * Granularity of an epoch integer.
 */
export type TimeUnit = 'ns' | 'us' | 'ms';

/**
 * Which boundary instants of a bounded range are part of the output.
 */
export type ClosedWindow = 'both' | 'left' | 'right' | 'none';

// ============================================================================
// Constants
// ============================================================================

export const NS_PER_US = 1_000n;
export const NS_PER_MS = 1_000_000n;
export const NS_PER_SECOND = 1_000_000_000n;
export const NS_PER_MINUTE = 60n * NS_PER_SECOND;
export const NS_PER_HOUR = 60n * NS_PER_MINUTE;
export const NS_PER_DAY = 24n * NS_PER_HOUR;
export const NS_PER_WEEK = 7n * NS_PER_DAY;

/** Bounds of a signed 64-bit integer, the storage type of every epoch value. */
export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

export const CLOSED_WINDOWS: readonly ClosedWindow[] = ['both', 'left', 'right', 'none'];

// ============================================================================
// Unit Scaling
// ============================================================================

export function assertNever(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}

/**
 * Number of nanoseconds in one tick of the unit.
 */
export function nanosPerUnit(unit: TimeUnit): bigint {
	switch (unit) {
		case 'ns':
			return 1n;
		case 'us':
			return NS_PER_US;
		case 'ms':
			return NS_PER_MS;
		default:
			return assertNever(unit);
	}
}

/**
 * Number of ticks of the unit in one millisecond.
 */
export function unitsPerMillisecond(unit: TimeUnit): bigint {
	return NS_PER_MS / nanosPerUnit(unit);
}

/**
 * Convert a nanosecond count to the unit, truncating toward zero.
 */
export function nanosToUnit(nanos: bigint, unit: TimeUnit): bigint {
	return nanos / nanosPerUnit(unit);
}

/**
 * Integer division rounding toward negative infinity.
 */
export function floorDiv(value: bigint, divisor: bigint): bigint {
	const quotient = value / divisor;
	if (value % divisor !== 0n && (value < 0n) !== (divisor < 0n)) {
		return quotient - 1n;
	}
	return quotient;
}

/**
 * Re-express an epoch value in another unit. Going to a coarser unit floors,
 * so instants before the epoch land on the tick at or before them.
 */
export function convertUnit(value: bigint, from: TimeUnit, to: TimeUnit): bigint {
	const fromNanos = nanosPerUnit(from);
	const toNanos = nanosPerUnit(to);
	if (fromNanos >= toNanos) {
		return value * (fromNanos / toNanos);
	}
	return floorDiv(value, toNanos / fromNanos);
}

export function isInI64Range(value: bigint): boolean {
	return value >= I64_MIN && value <= I64_MAX;
}

// ============================================================================
// Closed Windows
// ============================================================================

export function includesStart(closed: ClosedWindow): boolean {
	switch (closed) {
		case 'both':
		case 'left':
			return true;
		case 'right':
		case 'none':
			return false;
		default:
			return assertNever(closed);
	}
}

export function includesEnd(closed: ClosedWindow): boolean {
	switch (closed) {
		case 'both':
		case 'right':
			return true;
		case 'left':
		case 'none':
			return false;
		default:
			return assertNever(closed);
	}
}
