import { z } from 'zod'
import {
	logLevelSchema,
	parseConfig,
	timeZoneOffsetSchema,
	watermarkStrategyKindSchema,
	windowDurationSchema,
} from '@windflow/flow'

export const ordersJobConfigSchema = z.object({
	applicationId: z.string().min(1).default('orders-job'),
	parallelism: z.coerce.number().int().min(1).default(4),
	orderCount: z.coerce.number().int().min(0).default(50),
	seed: z.coerce.number().int().default(1),
	/** Window of the per-type order count */
	windowLength: windowDurationSchema.default('1s'),
	/** Window of the re-aggregated join output */
	summaryWindowLength: windowDurationSchema.default('10000d'),
	/** UTC offset order times are written in */
	timeZoneOffset: timeZoneOffsetSchema.default('+08:00'),
	watermarkStrategy: watermarkStrategyKindSchema.default('no-delay'),
	logLevel: logLevelSchema.default('warn'),
})

export type OrdersJobConfig = z.output<typeof ordersJobConfigSchema>

/**
 * Read the job configuration from `ORDERS_*` variables and `LOG_LEVEL`.
 */
export function loadOrdersJobConfig(env: NodeJS.ProcessEnv = process.env): OrdersJobConfig {
	return parseConfig(
		ordersJobConfigSchema,
		{
			applicationId: env.ORDERS_APPLICATION_ID,
			parallelism: env.ORDERS_PARALLELISM,
			orderCount: env.ORDERS_COUNT,
			seed: env.ORDERS_SEED,
			windowLength: env.ORDERS_WINDOW_LENGTH,
			summaryWindowLength: env.ORDERS_SUMMARY_WINDOW_LENGTH,
			timeZoneOffset: env.ORDERS_TIME_ZONE_OFFSET,
			watermarkStrategy: env.ORDERS_WATERMARK_STRATEGY,
			logLevel: env.LOG_LEVEL,
		},
		'Invalid orders job configuration'
	)
}
