import {
	countAggregate,
	epochMillis,
	TumblingWindows,
	WatermarkStrategy,
	windowResult,
	type FlowApp,
	type Sink,
	type Source,
	type WindowResult,
} from '@windflow/flow'
import type { OrdersJobConfig } from './config.js'
import type { Order, TypeCountWithPrice, TypeStat } from './types.js'

export type OrdersTopologyConfig = Pick<
	OrdersJobConfig,
	'windowLength' | 'summaryWindowLength' | 'timeZoneOffset' | 'watermarkStrategy'
>

export interface OrdersTopologySources {
	orders: Source<Order>
	typeStats: Source<TypeStat>
}

export interface OrdersTopologySinks {
	/** Every joined (type, count, average price) row */
	joined: Sink<TypeCountWithPrice>
	/** Number of joined rows per type over the summary window */
	summary: Sink<WindowResult<number, number>>
}

/**
 * Builds the order statistics topology.
 *
 * 1. Count orders per type in tumbling windows of event time
 * 2. Join each count with the type's average price
 * 3. Send joined rows to one sink, and their count per type to another
 */
export function buildTopology(
	app: FlowApp,
	config: OrdersTopologyConfig,
	sources: OrdersTopologySources,
	sinks: OrdersTopologySinks
): void {
	// ============================================
	// Orders: count per type and window
	// ============================================
	const orderCounts = app
		.source(sources.orders)
		.assignTimestamps(
			WatermarkStrategy.fromKind<Order>(config.watermarkStrategy, order =>
				epochMillis(order.orderTime, config.timeZoneOffset)
			),
			{ name: 'order-timestamps' }
		)
		.keyBy(order => order.type)
		.window(TumblingWindows.of(config.windowLength), { name: 'order-counts' })
		.aggregate(countAggregate<Order>(), windowResult<number, number>())

	// ============================================
	// Type stats: no event time, all at t=0
	// ============================================
	const typeStats = app
		.source(sources.typeStats)
		.assignTimestamps(WatermarkStrategy.constantZero<TypeStat>(), { name: 'type-stat-timestamps' })
		.keyBy(stat => stat.type)

	const joined = orderCounts.keyBy(count => count.key).join(
		typeStats,
		(count, stat): TypeCountWithPrice => ({ type: count.key, theCount: count.value, avgPrice: stat.avgPrice }),
		{ name: 'order-stat-join' }
	)

	joined.sink(sinks.joined)

	// ============================================
	// Summary: joined rows per type, one window for the whole run
	// ============================================
	joined
		.assignTimestamps(WatermarkStrategy.constantZero<TypeCountWithPrice>(), { name: 'joined-timestamps' })
		.keyBy(row => row.type)
		.window(TumblingWindows.of(config.summaryWindowLength), { name: 'joined-counts' })
		.count()
		.sink(sinks.summary)
}
