/**
 * Environment-driven configuration.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ConfigSchema = z.object({
	logLevel: z.enum(LOG_LEVELS).default('warn'),
	/** Upper bound on the number of slots reserved up front for a calendar range. */
	maxPreallocation: z.coerce.number().int().positive().default(65_536),
});

export type RangeConfig = z.infer<typeof ConfigSchema>;

/**
 * Read configuration from environment variables.
 *
 * - `STEPRANGE_LOG_LEVEL` — error | warn | info | debug (default warn)
 * - `STEPRANGE_MAX_PREALLOCATION` — positive integer (default 65536)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RangeConfig {
	const result = ConfigSchema.safeParse({
		logLevel: env.STEPRANGE_LOG_LEVEL || undefined,
		maxPreallocation: env.STEPRANGE_MAX_PREALLOCATION || undefined,
	});

	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new InvalidInputError(`Invalid configuration: ${detail}`);
	}

	return result.data;
}

let cached: RangeConfig | undefined;

/**
 * Configuration for the current process, read once on first use.
 */
export function getConfig(): RangeConfig {
	cached ??= loadConfig();
	return cached;
}
