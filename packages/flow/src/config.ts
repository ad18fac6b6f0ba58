import { z } from 'zod'
import { ConfigError } from '@/errors.js'
import { LOG_LEVELS, type Logger, type LogLevel } from '@/logger.js'
import type { StateStoreProvider } from '@/state.js'
import { TIME_ZONE_OFFSET_PATTERN, WATERMARK_STRATEGY_KINDS } from '@/watermark.js'
import type { WindowDuration } from '@/window.js'

export interface FlowConfig {
	applicationId: string
	/**
	 * Instances of every keyed operator (windows, joins). Records are partitioned
	 * across them by key. Default: 1
	 */
	parallelism?: number
	/**
	 * Creates a JSON console logger at this level when no `logger` is given.
	 * Without either, the app does not log.
	 */
	logLevel?: LogLevel
	logger?: Logger
	/** Backing for window and join state. Default: in-memory */
	stateStoreProvider?: StateStoreProvider
}

export const windowDurationSchema = z.union([
	z.number().int().positive(),
	z.custom<Exclude<WindowDuration, number>>(value => typeof value === 'string' && /^[1-9]\d*(ms|s|m|h|d)$/.test(value), {
		message: 'expected a positive <n>ms, <n>s, <n>m, <n>h or <n>d',
	}),
])

export const timeZoneOffsetSchema = z.string().regex(TIME_ZONE_OFFSET_PATTERN, 'expected ±HH:mm')

export const watermarkStrategyKindSchema = z.enum(WATERMARK_STRATEGY_KINDS)

export const logLevelSchema = z.enum(LOG_LEVELS)

/**
 * Validates the serializable part of FlowConfig.
 */
export const flowConfigSchema = z.object({
	applicationId: z.string().min(1),
	parallelism: z.number().int().min(1).default(1),
	logLevel: logLevelSchema.optional(),
})

export type ResolvedFlowConfig = z.output<typeof flowConfigSchema> &
	Pick<FlowConfig, 'logger' | 'stateStoreProvider'>

export function resolveFlowConfig(config: FlowConfig): ResolvedFlowConfig {
	const parsed = parseConfig(flowConfigSchema, config, 'Invalid flow configuration')
	return { ...parsed, logger: config.logger, stateStoreProvider: config.stateStoreProvider }
}

/**
 * Parse `input` with `schema`, converting validation issues into a ConfigError.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, message = 'Invalid configuration'): z.output<S> {
	const result = schema.safeParse(input)
	if (!result.success) {
		throw new ConfigError(
			message,
			result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
		)
	}
	return result.data
}
