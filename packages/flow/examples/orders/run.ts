/**
 * Order Statistics - Main Entry Point
 *
 * Run with: npm run example:orders
 *
 * Configuration comes from ORDERS_* environment variables (see config.ts).
 * Prints one `Sink-1:` line per joined row and one `Sink-2:` line per order type.
 */

import { consoleSink, flow } from '@windflow/flow'
import { loadOrdersJobConfig } from './config.js'
import { orderSource, typeStatSource } from './sources.js'
import { buildTopology } from './topology.js'

async function main(): Promise<void> {
	const config = loadOrdersJobConfig()

	const app = flow({
		applicationId: config.applicationId,
		parallelism: config.parallelism,
		logLevel: config.logLevel,
	})

	buildTopology(
		app,
		config,
		{
			orders: orderSource(config.orderCount, { seed: config.seed, timeZoneOffset: config.timeZoneOffset }),
			typeStats: typeStatSource(),
		},
		{
			joined: consoleSink('Sink-1'),
			summary: consoleSink('Sink-2'),
		}
	)

	process.on('SIGINT', () => {
		console.log('Shutting down...')
		app.close().catch(err => {
			console.error('Failed to stop:', err)
			process.exitCode = 1
		})
	})

	const result = await app.run()
	console.log(`Finished with state ${result.state}`)
}

main().catch(err => {
	console.error('Fatal error:', err)
	process.exit(1)
})
