/**
 * Structured JSON logging for flow pipelines.
 *
 * Components receive `logger?.child({ component })` and fall back to `noopLogger`,
 * so an app without a configured logger stays silent.
 */

/**
 * 'silent' disables all logging
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export type LogContext = Record<string, unknown>

/**
 * Receives one serialized log line. Defaults to console.error for errors and console.log otherwise.
 */
export type LogWriter = (level: Exclude<LogLevel, 'silent'>, line: string) => void

export interface Logger {
	error(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	debug(message: string, context?: LogContext): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: LogContext): Logger

	/**
	 * Whether a message at this level would be written. Lets hot paths skip building context.
	 */
	isEnabled(level: Exclude<LogLevel, 'silent'>): boolean
}

const consoleWriter: LogWriter = (level, line) => {
	if (level === 'error') {
		console.error(line)
	} else {
		console.log(line)
	}
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: LogContext,
		private readonly write: LogWriter
	) {}

	isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
		return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level]
	}

	private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
		if (!this.isEnabled(level)) {
			return
		}

		const entry = {
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...serializeContext(context),
		}

		this.write(level, JSON.stringify(entry))
	}

	error(message: string, context?: LogContext): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext }, this.write)
	}
}

/**
 * Errors and infinite watermarks do not survive JSON.stringify, so render them first.
 */
function serializeContext(context: LogContext | undefined): LogContext | undefined {
	if (!context) {
		return context
	}
	const out: LogContext = {}
	for (const [key, value] of Object.entries(context)) {
		if (value instanceof Error) {
			out[key] = { name: value.name, message: value.message }
		} else if (typeof value === 'number' && !Number.isFinite(value)) {
			out[key] = String(value)
		} else {
			out[key] = value
		}
	}
	return out
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}

	isEnabled(): boolean {
		return false
	}
}

/**
 * Create a JSON logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { applicationId: 'orders' })
 * logger.info('Pipeline started', { sources: 2 })
 * // {"level":"info","message":"Pipeline started","timestamp":"...","applicationId":"orders","sources":2}
 * ```
 */
export function createLogger(
	level: LogLevel = 'info',
	defaultContext: LogContext = {},
	write: LogWriter = consoleWriter
): Logger {
	return new JsonLogger(level, defaultContext, write)
}

export const noopLogger: Logger = new NoopLogger()
