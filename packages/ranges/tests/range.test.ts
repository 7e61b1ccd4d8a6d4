import { describe, expect, test } from 'vitest';
import {
	ArithmeticOverflowError,
	CLOSED_WINDOWS,
	I64_MAX,
	InvalidIntervalError,
	TimezoneResolutionError,
	convertUnit,
	type ClosedWindow,
} from '@steprange/core';
import { Duration } from '../src/duration.js';
import { datetimeRangeValues } from '../src/range.js';
import { fixedOffsetResolver } from '../src/timezone.js';

const ms = (iso: string) => BigInt(Date.parse(iso));
const values = (array: BigInt64Array) => Array.from(array);
const isStrictlyAscending = (array: BigInt64Array) => array.every((v, i) => i === 0 || v > array[i - 1]);

describe('datetimeRangeValues', () => {
	describe('fixed intervals', () => {
		const twoNs = Duration.parse('2ns');

		test.each([
			['both', [0n, 2n, 4n, 6n, 8n, 10n]],
			['left', [0n, 2n, 4n, 6n, 8n]],
			['right', [2n, 4n, 6n, 8n, 10n]],
			['none', [2n, 4n, 6n, 8n]],
		] as const)('closed=%s', (closed, expected) => {
			expect(values(datetimeRangeValues(0n, 10n, twoNs, closed, 'ns'))).toEqual(expected);
		});

		test('end that is not on a step', () => {
			expect(values(datetimeRangeValues(0n, 9n, twoNs, 'both', 'ns'))).toEqual([0n, 2n, 4n, 6n, 8n]);
			expect(values(datetimeRangeValues(0n, 9n, twoNs, 'left', 'ns'))).toEqual([0n, 2n, 4n, 6n, 8n]);
			expect(values(datetimeRangeValues(0n, 9n, twoNs, 'none', 'ns'))).toEqual([2n, 4n, 6n, 8n]);
		});

		test('start equal to end', () => {
			expect(values(datetimeRangeValues(5n, 5n, twoNs, 'both', 'ns'))).toEqual([5n]);
			expect(values(datetimeRangeValues(5n, 5n, twoNs, 'left', 'ns'))).toEqual([]);
			expect(values(datetimeRangeValues(5n, 5n, twoNs, 'right', 'ns'))).toEqual([]);
			expect(values(datetimeRangeValues(5n, 5n, twoNs, 'none', 'ns'))).toEqual([]);
		});

		test('interval longer than the range', () => {
			expect(values(datetimeRangeValues(0n, 10n, Duration.parse('20ns'), 'both', 'ns'))).toEqual([0n]);
			expect(values(datetimeRangeValues(0n, 10n, Duration.parse('20ns'), 'right', 'ns'))).toEqual([]);
		});

		test('negative epoch values', () => {
			expect(values(datetimeRangeValues(-6n, 0n, Duration.parse('3ns'), 'both', 'ns'))).toEqual([-6n, -3n, 0n]);
		});

		test('counts differ by the boundaries when the range is a whole number of steps', () => {
			const cases: [bigint, bigint, string][] = [
				[0n, 10n, '2ns'],
				[-30n, 30n, '5ns'],
				[100n, 1_000n, '300ns'],
				[7n, 8n, '1ns'],
			];

			for (const [start, end, text] of cases) {
				const interval = Duration.parse(text);
				const count = (closed: ClosedWindow) => datetimeRangeValues(start, end, interval, closed, 'ns').length;

				expect(count('both')).toBe(count('left') + 1);
				expect(count('both')).toBe(count('right') + 1);
				expect(count('both')).toBe(count('none') + 2);
			}
		});

		test('steps in the target unit', () => {
			const start = ms('2021-01-01T00:00:00Z');
			const end = ms('2021-01-01T00:00:03Z');

			expect(values(datetimeRangeValues(start, end, Duration.parse('1s'), 'both', 'ms'))).toEqual([
				start,
				start + 1_000n,
				start + 2_000n,
				start + 3_000n,
			]);
		});

		test('the same range agrees across units', () => {
			const interval = Duration.parse('90m');
			const startMs = ms('2021-01-01T00:00:00Z');
			const endMs = ms('2021-01-01T06:00:00Z');

			const inMs = values(datetimeRangeValues(startMs, endMs, interval, 'both', 'ms'));
			const inUs = values(
				datetimeRangeValues(convertUnit(startMs, 'ms', 'us'), convertUnit(endMs, 'ms', 'us'), interval, 'both', 'us'),
			);
			const inNs = values(
				datetimeRangeValues(convertUnit(startMs, 'ms', 'ns'), convertUnit(endMs, 'ms', 'ns'), interval, 'both', 'ns'),
			);

			expect(inMs).toHaveLength(5);
			expect(inUs.map((v) => convertUnit(v, 'us', 'ms'))).toEqual(inMs);
			expect(inNs.map((v) => convertUnit(v, 'ns', 'ms'))).toEqual(inMs);
		});

		test('an interval finer than the unit is rejected', () => {
			expect(() => datetimeRangeValues(0n, 10n, Duration.parse('500ns'), 'both', 'us')).toThrow(InvalidIntervalError);
			expect(() => datetimeRangeValues(0n, 10n, Duration.parse('999us'), 'both', 'ms')).toThrow(InvalidIntervalError);
		});

		test('a fixed interval must be a whole number of unit ticks', () => {
			const interval = Duration.parse('1500ns');

			expect(() => datetimeRangeValues(0n, 3n, interval, 'both', 'us')).toThrow(InvalidIntervalError);
			expect(() => datetimeRangeValues(0n, 3n, Duration.parse('1ms1us'), 'both', 'ms')).toThrow(
				'is not a whole number of ms ticks',
			);
			expect(values(datetimeRangeValues(0n, 3_000n, interval, 'both', 'ns'))).toEqual([0n, 1_500n, 3_000n]);
			expect(values(datetimeRangeValues(0n, 3_000n, Duration.parse('1500us'), 'both', 'us'))).toEqual([0n, 1_500n, 3_000n]);
		});

		test('ranges ending at the 64-bit limit', () => {
			expect(values(datetimeRangeValues(I64_MAX - 4n, I64_MAX, twoNs, 'both', 'ns'))).toEqual([
				I64_MAX - 4n,
				I64_MAX - 2n,
				I64_MAX,
			]);
		});
	});

	describe('calendar intervals', () => {
		test('month steps clamp to the end of the month', () => {
			const result = datetimeRangeValues(
				ms('2021-01-31T00:00:00Z'),
				ms('2021-04-30T00:00:00Z'),
				Duration.parse('1mo'),
				'both',
				'ms',
			);

			expect(values(result)).toEqual([
				ms('2021-01-31T00:00:00Z'),
				ms('2021-02-28T00:00:00Z'),
				ms('2021-03-31T00:00:00Z'),
				ms('2021-04-30T00:00:00Z'),
			]);
		});

		test.each([
			['both', ['2021-01-01', '2021-01-02', '2021-01-03', '2021-01-04']],
			['left', ['2021-01-01', '2021-01-02', '2021-01-03']],
			['right', ['2021-01-02', '2021-01-03', '2021-01-04']],
			['none', ['2021-01-02', '2021-01-03']],
		] as const)('closed=%s', (closed, expected) => {
			const result = datetimeRangeValues(
				ms('2021-01-01T00:00:00Z'),
				ms('2021-01-04T00:00:00Z'),
				Duration.parse('1d'),
				closed,
				'ms',
			);

			expect(values(result)).toEqual(expected.map((day) => ms(`${day}T00:00:00Z`)));
		});

		test('weeks in microseconds', () => {
			const start = ms('2021-01-04T00:00:00Z') * 1_000n;
			const end = ms('2021-01-25T00:00:00Z') * 1_000n;
			const result = datetimeRangeValues(start, end, Duration.parse('1w'), 'left', 'us');

			expect(values(result)).toEqual([
				start,
				ms('2021-01-11T00:00:00Z') * 1_000n,
				ms('2021-01-18T00:00:00Z') * 1_000n,
			]);
		});

		test('mixed calendar and fixed components', () => {
			const result = datetimeRangeValues(
				ms('2021-01-01T00:00:00Z'),
				ms('2021-01-03T00:00:00Z'),
				Duration.parse('1d12h'),
				'both',
				'ms',
			);

			expect(values(result)).toEqual([ms('2021-01-01T00:00:00Z'), ms('2021-01-02T12:00:00Z')]);
		});

		test('daily steps follow local time across a DST change', () => {
			const result = datetimeRangeValues(
				ms('2021-03-13T12:00:00Z'),
				ms('2021-03-15T12:00:00Z'),
				Duration.parse('1d'),
				'both',
				'ms',
				{ timezone: 'America/New_York' },
			);

			expect(values(result)).toEqual([
				ms('2021-03-13T12:00:00Z'),
				ms('2021-03-14T11:00:00Z'),
				ms('2021-03-15T11:00:00Z'),
			]);
		});

		test('uses the injected resolver', () => {
			const result = datetimeRangeValues(
				ms('2021-01-30T23:00:00Z'),
				ms('2021-04-30T00:00:00Z'),
				Duration.parse('1mo'),
				'both',
				'ms',
				{ timezone: 'Fake/Plus1', resolver: fixedOffsetResolver(60 * 60 * 1000) },
			);

			expect(values(result)).toEqual([
				ms('2021-01-30T23:00:00Z'),
				ms('2021-02-27T23:00:00Z'),
				ms('2021-03-30T23:00:00Z'),
				ms('2021-04-29T23:00:00Z'),
			]);
		});

		test('long monthly run', () => {
			const result = datetimeRangeValues(
				ms('2000-01-01T00:00:00Z'),
				ms('2020-01-01T00:00:00Z'),
				Duration.parse('1mo'),
				'both',
				'ms',
			);

			expect(result).toHaveLength(241);
			expect(result[240]).toBe(ms('2020-01-01T00:00:00Z'));
			expect(isStrictlyAscending(result)).toBe(true);
		});

		test('timezone errors abort the range', () => {
			expect(() =>
				datetimeRangeValues(
					ms('2021-03-13T07:30:00Z'),
					ms('2021-03-20T07:30:00Z'),
					Duration.parse('1d'),
					'both',
					'ms',
					{ timezone: 'America/New_York' },
				),
			).toThrow(TimezoneResolutionError);
		});
	});

	describe('validation', () => {
		test.each(CLOSED_WINDOWS)('start after end is empty (closed=%s)', (closed) => {
			expect(datetimeRangeValues(10n, 0n, Duration.parse('1ns'), closed, 'ns')).toHaveLength(0);
			expect(datetimeRangeValues(10n, 0n, Duration.parse('1mo'), closed, 'ms')).toHaveLength(0);
			expect(datetimeRangeValues(10n, 0n, Duration.parse('0ns'), closed, 'ns')).toHaveLength(0);
		});

		test.each(CLOSED_WINDOWS)('zero and negative intervals fail (closed=%s)', (closed) => {
			expect(() => datetimeRangeValues(0n, 10n, Duration.parse('0ns'), closed, 'ns')).toThrow(InvalidIntervalError);
			expect(() => datetimeRangeValues(0n, 10n, Duration.parse('-1ns'), closed, 'ns')).toThrow(
				'`interval` must be positive',
			);
			expect(() => datetimeRangeValues(0n, 10n, Duration.parse('-1mo'), closed, 'ms')).toThrow(InvalidIntervalError);
		});

		test('endpoints beyond 64 bits', () => {
			expect(() => datetimeRangeValues(0n, I64_MAX + 1n, Duration.parse('1ns'), 'both', 'ns')).toThrow(
				ArithmeticOverflowError,
			);
		});
	});

	test('repeated calls give identical results', () => {
		const args = [ms('2021-01-31T00:00:00Z'), ms('2021-12-31T00:00:00Z'), Duration.parse('1mo'), 'both', 'ms'] as const;

		expect(values(datetimeRangeValues(...args))).toEqual(values(datetimeRangeValues(...args)));
	});

	test('results are strictly ascending', () => {
		for (const text of ['1ns', '7ns', '1d', '1w', '1mo', '1q', '1mo3d5h']) {
			for (const closed of CLOSED_WINDOWS) {
				const unit = text.endsWith('ns') ? 'ns' : 'ms';
				const start = unit === 'ns' ? 0n : ms('2020-01-31T00:00:00Z');
				const end = unit === 'ns' ? 100n : ms('2022-06-30T00:00:00Z');

				expect(isStrictlyAscending(datetimeRangeValues(start, end, Duration.parse(text), closed, unit))).toBe(true);
			}
		}
	});
});
