export type MetricName =
	| 'recordsIn'
	| 'recordsOut'
	| 'lateRecordsDropped'
	| 'windowsFired'
	| 'watermarksRejected'
	| 'joinMatches'
	| 'unmatchedEvents'
	| 'sinkFailures'
	| 'recordsDiscarded'

export interface Counter {
	inc(by?: number): void
	readonly value: number
}

class SimpleCounter implements Counter {
	private count = 0

	inc(by = 1): void {
		this.count += by
	}

	get value(): number {
		return this.count
	}
}

/**
 * Operator name -> metric name -> value, summed over every parallel instance.
 */
export type MetricsSnapshot = Record<string, Partial<Record<MetricName, number>>>

/**
 * Counters keyed by operator. Parallel instances of one operator share its counters.
 */
export class MetricsRegistry {
	private readonly counters = new Map<string, Map<MetricName, SimpleCounter>>()

	counter(operator: string, name: MetricName): Counter {
		let byName = this.counters.get(operator)
		if (!byName) {
			byName = new Map()
			this.counters.set(operator, byName)
		}
		let counter = byName.get(name)
		if (!counter) {
			counter = new SimpleCounter()
			byName.set(name, counter)
		}
		return counter
	}

	get(operator: string, name: MetricName): number {
		return this.counters.get(operator)?.get(name)?.value ?? 0
	}

	snapshot(): MetricsSnapshot {
		const snapshot: MetricsSnapshot = {}
		for (const [operator, byName] of this.counters) {
			const values: Partial<Record<MetricName, number>> = {}
			for (const [name, counter] of byName) {
				values[name] = counter.value
			}
			snapshot[operator] = values
		}
		return snapshot
	}
}
