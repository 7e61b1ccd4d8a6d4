/**
 * Structured logging on top of winston, with package namespacing and
 * per-logger context.
 */

import winston from 'winston';
import { getConfig } from './config.js';

export type LogContext = Record<string, unknown>;

const structuredFormat = winston.format.combine(
	winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
	winston.format.errors({ stack: true }),
	winston.format.json(),
);

// Human-readable output outside production
const consoleFormat = winston.format.combine(
	winston.format.colorize(),
	winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
		return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr}`;
	}),
);

const winstonLogger = winston.createLogger({
	level: getConfig().logLevel,
	format: structuredFormat,
	defaultMeta: { service: 'steprange' },
	transports: [
		new winston.transports.Console({
			format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
		}),
	],
	exitOnError: false,
});

/**
 * Logger bound to a namespace and an optional persistent context.
 */
export class Logger {
	private readonly namespace: string;
	private readonly context: LogContext;

	constructor(namespace: string, context: LogContext = {}) {
		this.namespace = namespace;
		this.context = context;
	}

	getNamespace(): string {
		return this.namespace;
	}

	private mergeContext(additionalContext?: LogContext): LogContext {
		return {
			namespace: this.namespace,
			...this.context,
			...additionalContext,
		};
	}

	/**
	 * A context thunk is only called when debug is enabled.
	 */
	debug(message: string, context?: LogContext | (() => LogContext)): void {
		if (!winstonLogger.isLevelEnabled('debug')) {
			return;
		}
		const resolved = typeof context === 'function' ? context() : context;
		winstonLogger.debug(message, this.mergeContext(resolved));
	}

	isDebugEnabled(): boolean {
		return winstonLogger.isLevelEnabled('debug');
	}

	/**
	 * Create a child logger with persistent context
	 */
	child(context: LogContext): Logger {
		return new Logger(this.namespace, { ...this.context, ...context });
	}
}

/**
 * Create a logger for a package or module.
 */
export function createLogger(namespace: string): Logger {
	return new Logger(namespace);
}
