/**
 * steprange core
 *
 * Shared primitives for steprange packages: time units, closed windows,
 * the error taxonomy, configuration and logging.
 */

export type { ClosedWindow, TimeUnit } from './units.js';
export {
	CLOSED_WINDOWS,
	I64_MAX,
	I64_MIN,
	NS_PER_DAY,
	NS_PER_HOUR,
	NS_PER_MINUTE,
	NS_PER_MS,
	NS_PER_SECOND,
	NS_PER_US,
	NS_PER_WEEK,
	assertNever,
	convertUnit,
	floorDiv,
	includesEnd,
	includesStart,
	isInI64Range,
	nanosPerUnit,
	nanosToUnit,
	unitsPerMillisecond,
} from './units.js';

export type { ComputeErrorCode, ErrorContext } from './errors.js';
export {
	ArithmeticOverflowError,
	ComputeError,
	InvalidInputError,
	InvalidIntervalError,
	TimezoneResolutionError,
	isComputeError,
} from './errors.js';

export type { LogLevel, RangeConfig } from './config.js';
export { LOG_LEVELS, getConfig, loadConfig } from './config.js';

export type { LogContext } from './logger.js';
export { Logger, createLogger } from './logger.js';
