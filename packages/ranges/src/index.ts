/**
 * steprange ranges
 *
 * Generates ordered timestamp sequences between two instants, stepped by a
 * fixed or calendar-aware interval, for use as temporal column values.
 *
 * @packageDocumentation
 */

// Interval values
export { Duration, type DurationParts } from './duration.js';
// Time zone resolution
export {
	dateFnsTimezoneResolver,
	fixedOffsetResolver,
	fromWallClock,
	toWallClock,
	type TimezoneResolver,
} from './timezone.js';
// Offset application
export { applyOffset } from './offset.js';
// Range generation
export { datetimeRangeValues, type RangeOptions } from './range.js';
export { TimestampBuffer } from './buffer.js';
// Column builders
export {
	dateRange,
	datetimeRangeFromEpoch,
	inNanosecondsWindow,
	timeRange,
	timeRangeFromNanos,
	toEpochValue,
	toTimeOfDayNanos,
} from './columns.js';

// All types
export type {
	DateTimeInput,
	DatetimeColumn,
	IntervalInput,
	SortedFlag,
	TimeColumn,
	TimeOfDay,
	TimeOfDayInput,
} from './types.js';

export type { ClosedWindow, TimeUnit } from '@steprange/core';
