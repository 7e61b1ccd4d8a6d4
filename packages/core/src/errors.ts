/**
 * Error taxonomy for range computation.
 *
 * Every failure surfaces as a subclass of ComputeError so callers can catch
 * the whole family or a single kind. Context values are kept JSON-safe
 * (bigints are stored as strings) so errors can go straight into a log line.
 */

export type ComputeErrorCode =
	| 'INVALID_INTERVAL'
	| 'ARITHMETIC_OVERFLOW'
	| 'TIMEZONE_RESOLUTION'
	| 'INVALID_INPUT';

export type ErrorContext = Record<string, string | number | boolean | null>;

/**
 * Base class for all range computation errors.
 */
export class ComputeError extends Error {
	public readonly code: ComputeErrorCode;
	public readonly context?: ErrorContext;

	constructor(message: string, code: ComputeErrorCode, context?: ErrorContext) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.context = context;

		Error.captureStackTrace(this, new.target);
	}

	/**
	 * Convert error to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		};
	}
}

/**
 * The interval is zero, negative, or too fine for the requested unit.
 */
export class InvalidIntervalError extends ComputeError {
	constructor(message: string, context?: ErrorContext) {
		super(message, 'INVALID_INTERVAL', context);
	}
}

/**
 * A scaled interval or a resulting instant left the representable range.
 */
export class ArithmeticOverflowError extends ComputeError {
	constructor(message: string, context?: ErrorContext) {
		super(message, 'ARITHMETIC_OVERFLOW', context);
	}
}

/**
 * A time zone could not be resolved, or a local time is ambiguous or does
 * not exist under the zone's rules.
 */
export class TimezoneResolutionError extends ComputeError {
	public readonly timezone: string;

	constructor(message: string, timezone: string, context?: ErrorContext) {
		super(message, 'TIMEZONE_RESOLUTION', { timezone, ...context });
		this.timezone = timezone;
	}
}

/**
 * Malformed caller input: interval text, endpoint values, configuration.
 */
export class InvalidInputError extends ComputeError {
	constructor(message: string, context?: ErrorContext) {
		super(message, 'INVALID_INPUT', context);
	}
}

export function isComputeError(error: unknown): error is ComputeError {
	return error instanceof ComputeError;
}
