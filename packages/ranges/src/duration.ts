/**
 * Interval values combining calendar components with a fixed sub-day part.
 */

import {
	ArithmeticOverflowError,
	I64_MAX,
	InvalidInputError,
	NS_PER_DAY,
	NS_PER_HOUR,
	NS_PER_MINUTE,
	NS_PER_MS,
	NS_PER_SECOND,
	NS_PER_US,
	NS_PER_WEEK,
	nanosPerUnit,
	nanosToUnit,
	type TimeUnit,
} from '@steprange/core';

/**
 * Component magnitudes of a Duration. The sign lives in `negative`.
 */
export interface DurationParts {
	weeks?: number;
	months?: number;
	days?: number;
	nanoseconds?: bigint;
	negative?: boolean;
}

// Longest suffixes first so `ms` and `mo` win over `m`
const TOKEN = /(\d+)(ns|us|µs|ms|mo|s|m|h|d|w|q|y)/y;

const FIXED_UNITS: Record<string, bigint> = {
	ns: 1n,
	us: NS_PER_US,
	µs: NS_PER_US,
	ms: NS_PER_MS,
	s: NS_PER_SECOND,
	m: NS_PER_MINUTE,
	h: NS_PER_HOUR,
};

const MONTH_UNITS: Record<string, bigint> = {
	mo: 1n,
	q: 3n,
	y: 12n,
};

const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

function checkedCount(value: bigint, component: string): number {
	if (value > SAFE_MAX) {
		throw new ArithmeticOverflowError(`${component} component overflows`, {
			component,
			value: value.toString(),
		});
	}
	return Number(value);
}

function checkedNanos(value: bigint): bigint {
	if (value > I64_MAX) {
		throw new ArithmeticOverflowError('nanoseconds component overflows', {
			component: 'nanoseconds',
			value: value.toString(),
		});
	}
	return value;
}

function validMagnitude(value: number, component: string): number {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new InvalidInputError(`${component} must be a non-negative integer, got ${value}`, {
			component,
		});
	}
	return value;
}

/**
 * An immutable interval. Weeks, months and days are resolved against a
 * calendar when applied; nanoseconds are a fixed length of time.
 *
 * @example
 * ```typescript
 * Duration.parse('1mo15d');  // months: 1, days: 15
 * Duration.parse('90m');     // nanoseconds: 5_400_000_000_000n
 * Duration.of({ weeks: 2 });
 * ```
 */
export class Duration {
	readonly weeks: number;
	readonly months: number;
	readonly days: number;
	readonly nanoseconds: bigint;
	readonly negative: boolean;

	private constructor(weeks: number, months: number, days: number, nanoseconds: bigint, negative: boolean) {
		this.weeks = weeks;
		this.months = months;
		this.days = days;
		this.nanoseconds = nanoseconds;
		this.negative = negative;
	}

	static of(parts: DurationParts): Duration {
		const nanoseconds = parts.nanoseconds ?? 0n;
		if (nanoseconds < 0n) {
			throw new InvalidInputError('nanoseconds must be non-negative; use `negative` for the sign', {
				component: 'nanoseconds',
			});
		}
		return new Duration(
			validMagnitude(parts.weeks ?? 0, 'weeks'),
			validMagnitude(parts.months ?? 0, 'months'),
			validMagnitude(parts.days ?? 0, 'days'),
			checkedNanos(nanoseconds),
			parts.negative ?? false,
		);
	}

	/**
	 * Parse interval text such as `1d`, `2w3d`, `1h30m`, `1y`, `-1mo`.
	 *
	 * Units: ns, us (µs), ms, s, m (minute), h, d, w, mo, q (quarter), y (year).
	 */
	static parse(text: string): Duration {
		let index = 0;
		let negative = false;
		if (text.startsWith('-')) {
			negative = true;
			index = 1;
		}

		let weeks = 0n;
		let months = 0n;
		let days = 0n;
		let nanoseconds = 0n;
		let tokens = 0;

		while (index < text.length) {
			TOKEN.lastIndex = index;
			const match = TOKEN.exec(text);
			if (!match) {
				throw new InvalidInputError(`Invalid interval "${text}" at position ${index}`, { interval: text });
			}
			const amount = BigInt(match[1]);
			const unit = match[2];

			if (unit in FIXED_UNITS) {
				nanoseconds += amount * FIXED_UNITS[unit];
			} else if (unit in MONTH_UNITS) {
				months += amount * MONTH_UNITS[unit];
			} else if (unit === 'w') {
				weeks += amount;
			} else {
				days += amount;
			}

			tokens += 1;
			index = TOKEN.lastIndex;
		}

		if (tokens === 0) {
			throw new InvalidInputError(`Invalid interval "${text}": expected <integer><unit>`, { interval: text });
		}

		return new Duration(
			checkedCount(weeks, 'weeks'),
			checkedCount(months, 'months'),
			checkedCount(days, 'days'),
			checkedNanos(nanoseconds),
			negative,
		);
	}

	isZero(): boolean {
		return this.weeks === 0 && this.months === 0 && this.days === 0 && this.nanoseconds === 0n;
	}

	/**
	 * True when the interval has no calendar components and so has the same
	 * length wherever it is applied.
	 */
	isFixed(): boolean {
		return this.weeks === 0 && this.months === 0 && this.days === 0;
	}

	/**
	 * Scale every component by `step`. A negative step flips the sign.
	 */
	times(step: number): Duration {
		if (!Number.isSafeInteger(step)) {
			throw new InvalidInputError(`step must be an integer, got ${step}`);
		}
		let factor = BigInt(step);
		let negative = this.negative;
		if (factor < 0n) {
			negative = !negative;
			factor = -factor;
		}

		return new Duration(
			checkedCount(BigInt(this.weeks) * factor, 'weeks'),
			checkedCount(BigInt(this.months) * factor, 'months'),
			checkedCount(BigInt(this.days) * factor, 'days'),
			checkedNanos(this.nanoseconds * factor),
			negative,
		);
	}

	/**
	 * The fixed component expressed in `unit`, truncated toward zero.
	 */
	fixedIn(unit: TimeUnit): bigint {
		return nanosToUnit(this.nanoseconds, unit);
	}

	/**
	 * Rough length in `unit`, counting a month as 28 days. Only good for
	 * sizing buffers.
	 */
	approximateIn(unit: TimeUnit): bigint {
		const nanos =
			BigInt(this.months) * 28n * NS_PER_DAY +
			BigInt(this.weeks) * NS_PER_WEEK +
			BigInt(this.days) * NS_PER_DAY +
			this.nanoseconds;
		return nanos / nanosPerUnit(unit);
	}

	toString(): string {
		if (this.isZero()) {
			return '0ns';
		}

		let text = this.negative ? '-' : '';
		if (this.months) text += `${this.months}mo`;
		if (this.weeks) text += `${this.weeks}w`;
		if (this.days) text += `${this.days}d`;

		let rest = this.nanoseconds;
		const fixed: [bigint, string][] = [
			[NS_PER_HOUR, 'h'],
			[NS_PER_MINUTE, 'm'],
			[NS_PER_SECOND, 's'],
			[NS_PER_MS, 'ms'],
			[NS_PER_US, 'us'],
			[1n, 'ns'],
		];
		for (const [size, suffix] of fixed) {
			const count = rest / size;
			if (count > 0n) {
				text += `${count}${suffix}`;
				rest -= count * size;
			}
		}

		return text;
	}
}
