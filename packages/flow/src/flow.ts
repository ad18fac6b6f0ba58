import { countAggregate, reduceAggregate, windowResult } from '@/aggregate.js'
import type { AggregateFunction, Collector, WindowFunction, WindowResult } from '@/aggregate.js'
import { json as jsonCodec, type Codec } from '@/codec.js'
import { resolveFlowConfig, type FlowConfig, type ResolvedFlowConfig } from '@/config.js'
import {
	PendingWindowsError,
	PipelineError,
	SinkFailureError,
	SourceError,
	TopologyError,
} from '@/errors.js'
import { KeyedJoinState, type JoinEvent, type Joiner, type JoinStateEntry } from '@/join.js'
import { createLogger, noopLogger, type Logger } from '@/logger.js'
import { MetricsRegistry, type Counter, type MetricsSnapshot } from '@/metrics.js'
import { partitionFor } from '@/partitioner.js'
import type { Sink } from '@/sink.js'
import { ABORTED, untilAborted, type Source } from '@/source.js'
import type { StateStoreProvider, WindowStore } from '@/state.js'
import { InMemoryStateStoreProvider } from '@/state/memory.js'
import { checkTimestamp, WatermarkTracker, type WatermarkGenerator, type WatermarkStrategy } from '@/watermark.js'
import type { TimeWindow, TumblingWindows } from '@/window.js'

export type StreamState = 'CREATED' | 'RUNNING' | 'COMPLETED' | 'ERROR' | 'STOPPED'

export interface StreamRecord<V> {
	readonly value: V
	/** Event time in epoch ms; undefined until the stream passes a timestamp assignment */
	readonly timestamp: number | undefined
}

export interface Named {
	/** Operator name used in logs and metrics. Must be unique within the app. */
	name?: string
}

export interface Grouped<K> extends Named {
	/** Serializes keys for partitioning and state. Default: JSON */
	key?: Codec<K>
}

export interface WindowOptions<V> extends Named {
	/**
	 * Called for each record that arrives after its window was already fired.
	 * The record is dropped either way.
	 */
	onLateRecord?: (value: V, window: TimeWindow, watermark: number) => void
}

export interface PipelineResult {
	readonly state: 'COMPLETED' | 'STOPPED'
	readonly metrics: MetricsSnapshot
}

export interface FlowApp {
	readonly applicationId: string
	source<V>(source: Source<V>, options?: Named): DataStream<V>

	/**
	 * Build the physical graph and run until every source finished.
	 *
	 * Resolves with `COMPLETED` once all windows are flushed, or with `STOPPED` when
	 * `close()` interrupted the run. Rejects with `PipelineError` when a sink failed,
	 * `PendingWindowsError` when windows were left unfired, and with the first
	 * source or processing error otherwise.
	 */
	run(): Promise<PipelineResult>

	/**
	 * Abort all sources and wait for the run to settle. Unfired windows are discarded.
	 */
	close(): Promise<void>
	state(): StreamState
	metrics(): MetricsSnapshot
	getLastError(): Error | null
}

export interface DataStream<V> {
	map<V2>(fn: (value: V) => V2, options?: Named): DataStream<V2>
	filter(fn: (value: V) => boolean, options?: Named): DataStream<V>
	flatMap<V2>(fn: (value: V) => Iterable<V2>, options?: Named): DataStream<V2>
	peek(fn: (value: V) => void, options?: Named): DataStream<V>
	merge(other: DataStream<V>, options?: Named): DataStream<V>

	/**
	 * Stamp every record with event time and generate watermarks from it.
	 * Watermarks arriving from upstream are replaced, end-of-stream still passes.
	 */
	assignTimestamps(strategy: WatermarkStrategy<V>, options?: Named): DataStream<V>
	keyBy<K>(fn: (value: V) => K, options?: Grouped<K>): KeyedStream<K, V>
	sink(sink: Sink<V>, options?: Named): void
}

export interface KeyedStream<K, V> {
	window(windows: TumblingWindows, options?: WindowOptions<V>): WindowedStream<K, V>

	/**
	 * Inner join on key. Each side keeps its latest value per key; every arrival that
	 * finds a value on the other side emits exactly one `joiner(left, right, key)`.
	 * Both sides are partitioned with this stream's key codec; a right stream keyed with a
	 * different explicit codec is rejected with a TopologyError.
	 */
	join<V2, VR>(other: KeyedStream<K, V2>, joiner: Joiner<K, V, V2, VR>, options?: Named): DataStream<VR>
}

export interface WindowedStream<K, V> {
	aggregate<A, R, OUT>(fn: AggregateFunction<V, A, R>, windowFn: WindowFunction<K, R, OUT>): DataStream<OUT>
	count(): DataStream<WindowResult<K, number>>
	reduce(reducer: (aggregate: V, value: V) => V): DataStream<WindowResult<K, V>>
}

// ============================================================================
// Runtime
// ============================================================================

type RuntimeContext = {
	readonly logger: Logger
	readonly metrics: MetricsRegistry
	readonly stateStoreProvider: StateStoreProvider
	readonly parallelism: number
	readonly sinkFailures: SinkFailureError[]
}

interface Output<T> {
	emitRecord(record: StreamRecord<T>): Promise<void>
	emitWatermark(watermark: number): Promise<void>
	emitEnd(): Promise<void>
}

interface InputPort<T> {
	/** Register one upstream instance; returns its channel */
	addChannel(): number
	processRecord(channel: number, record: StreamRecord<T>): Promise<void>
	processWatermark(channel: number, watermark: number): Promise<void>
	processEnd(channel: number): Promise<void>
}

interface OutputPort<T> {
	addOutput(output: Output<T>): void
}

class ChannelOutput<T> implements Output<T> {
	constructor(
		private readonly target: InputPort<T>,
		private readonly channel: number
	) {}

	emitRecord(record: StreamRecord<T>): Promise<void> {
		return this.target.processRecord(this.channel, record)
	}

	emitWatermark(watermark: number): Promise<void> {
		return this.target.processWatermark(this.channel, watermark)
	}

	emitEnd(): Promise<void> {
		return this.target.processEnd(this.channel)
	}
}

/**
 * Sends each record to one target; watermarks and end-of-stream go to every target.
 */
class ExchangeOutput<T> implements Output<T> {
	constructor(
		private readonly targets: readonly ChannelOutput<T>[],
		private readonly select: (record: StreamRecord<T>) => number
	) {}

	async emitRecord(record: StreamRecord<T>): Promise<void> {
		const index = this.select(record)
		const target = this.targets[index]
		if (!target) {
			throw new Error(`No downstream instance ${index} (of ${this.targets.length})`)
		}
		await target.emitRecord(record)
	}

	async emitWatermark(watermark: number): Promise<void> {
		for (const target of this.targets) {
			await target.emitWatermark(watermark)
		}
	}

	async emitEnd(): Promise<void> {
		for (const target of this.targets) {
			await target.emitEnd()
		}
	}
}

type InputChannel = {
	readonly tracker: WatermarkTracker
	ended: boolean
}

abstract class Operator<IN, OUT> implements InputPort<IN>, OutputPort<OUT> {
	protected readonly logger: Logger
	/** Minimum over the watermarks of all open input channels */
	protected watermark = -Infinity
	private readonly channels: InputChannel[] = []
	private readonly outputs: Output<OUT>[] = []
	private readonly recordsIn: Counter
	private readonly recordsOut: Counter
	private readonly watermarksRejected: Counter
	private queue: Promise<void> = Promise.resolve()
	private finished = false

	constructor(
		readonly name: string,
		readonly instance: number,
		protected readonly context: RuntimeContext
	) {
		this.logger = context.logger.child({ operator: name, instance })
		this.recordsIn = context.metrics.counter(name, 'recordsIn')
		this.recordsOut = context.metrics.counter(name, 'recordsOut')
		this.watermarksRejected = context.metrics.counter(name, 'watermarksRejected')
	}

	addChannel(): number {
		this.channels.push({ tracker: new WatermarkTracker(this.logger, this.watermarksRejected), ended: false })
		return this.channels.length - 1
	}

	addOutput(output: Output<OUT>): void {
		this.outputs.push(output)
	}

	processRecord(_channel: number, record: StreamRecord<IN>): Promise<void> {
		return this.serialize(async () => {
			this.recordsIn.inc()
			await this.onRecord(record)
		})
	}

	processWatermark(channel: number, watermark: number): Promise<void> {
		return this.serialize(async () => {
			const input = this.channel(channel)
			if (input.ended || !input.tracker.advance(watermark)) {
				return
			}
			await this.advanceWatermark()
		})
	}

	processEnd(channel: number): Promise<void> {
		return this.serialize(async () => {
			const input = this.channel(channel)
			if (input.ended) {
				return
			}
			input.ended = true
			await this.advanceWatermark()
			if (!this.finished && this.channels.every(other => other.ended)) {
				this.finished = true
				await this.onEnd()
				for (const output of this.outputs) {
					await output.emitEnd()
				}
			}
		})
	}

	protected abstract onRecord(record: StreamRecord<IN>): Promise<void>

	protected async onWatermark(watermark: number): Promise<void> {
		await this.emitWatermark(watermark)
	}

	protected onEnd(): Promise<void> {
		return Promise.resolve()
	}

	protected async emit(record: StreamRecord<OUT>): Promise<void> {
		this.recordsOut.inc()
		for (const output of this.outputs) {
			await output.emitRecord(record)
		}
	}

	protected async emitWatermark(watermark: number): Promise<void> {
		for (const output of this.outputs) {
			await output.emitWatermark(watermark)
		}
	}

	private async advanceWatermark(): Promise<void> {
		let next = Infinity
		for (const input of this.channels) {
			if (!input.ended) {
				next = Math.min(next, input.tracker.current)
			}
		}
		if (next <= this.watermark) {
			return
		}
		this.watermark = next
		await this.onWatermark(next)
	}

	private channel(channel: number): InputChannel {
		const input = this.channels[channel]
		if (!input) {
			throw new Error(`Operator '${this.name}' has no input channel ${channel}`)
		}
		return input
	}

	/**
	 * Upstream instances call in concurrently; input is handled one element at a time.
	 */
	private serialize(task: () => Promise<void>): Promise<void> {
		const result = this.queue.then(task)
		// The caller observes failures through `result`; the queue moves on either way
		this.queue = result.then(
			() => undefined,
			() => undefined
		)
		return result
	}
}

class SourceRunner<T> implements OutputPort<T> {
	private readonly outputs: Output<T>[] = []
	private readonly logger: Logger
	private readonly recordsOut: Counter

	constructor(
		readonly name: string,
		private readonly source: Source<T>,
		context: RuntimeContext
	) {
		this.logger = context.logger.child({ operator: name, source: source.name })
		this.recordsOut = context.metrics.counter(name, 'recordsOut')
	}

	addOutput(output: Output<T>): void {
		this.outputs.push(output)
	}

	async run(signal: AbortSignal): Promise<void> {
		const iterator = this.source.read(signal)[Symbol.asyncIterator]()
		let exhausted = false
		let aborted = false
		try {
			for (;;) {
				let next: IteratorResult<T> | typeof ABORTED
				try {
					next = await untilAborted(iterator.next(), signal)
				} catch (error) {
					throw new SourceError(this.source.name, error)
				}
				if (next === ABORTED) {
					aborted = true
					break
				}
				if (next.done) {
					exhausted = true
					break
				}
				if (signal.aborted) {
					break
				}
				this.recordsOut.inc()
				const record: StreamRecord<T> = { value: next.value, timestamp: undefined }
				for (const output of this.outputs) {
					await output.emitRecord(record)
				}
			}
		} finally {
			if (aborted) {
				// The read is still pending, so return() only settles once the source gives up
				void iterator.return?.().catch((error: unknown) => {
					this.logger.debug('Source failed while stopping', { error })
				})
			} else if (!exhausted) {
				await iterator.return?.()
			}
		}

		if (signal.aborted) {
			return
		}
		if (this.source.boundedness === 'bounded') {
			this.logger.debug('Source exhausted, signalling end of stream')
			for (const output of this.outputs) {
				await output.emitEnd()
			}
		} else {
			this.logger.warn('Unbounded source stopped without end of stream')
		}
	}
}

type ProcessFunction<IN, OUT> = (value: IN, out: Collector<OUT>) => void

class ProcessOperator<IN, OUT> extends Operator<IN, OUT> {
	constructor(
		name: string,
		instance: number,
		context: RuntimeContext,
		private readonly fn: ProcessFunction<IN, OUT>
	) {
		super(name, instance, context)
	}

	protected async onRecord(record: StreamRecord<IN>): Promise<void> {
		const values: OUT[] = []
		this.fn(record.value, { collect: value => values.push(value) })
		for (const value of values) {
			await this.emit({ value, timestamp: record.timestamp })
		}
	}
}

class TimestampOperator<V> extends Operator<V, V> {
	private readonly generator: WatermarkGenerator<V>
	private readonly generated: WatermarkTracker

	constructor(
		name: string,
		instance: number,
		context: RuntimeContext,
		private readonly strategy: WatermarkStrategy<V>
	) {
		super(name, instance, context)
		this.generator = strategy.createGenerator()
		this.generated = new WatermarkTracker(this.logger, context.metrics.counter(name, 'watermarksRejected'))
	}

	protected async onRecord(record: StreamRecord<V>): Promise<void> {
		const timestamp = checkTimestamp(this.strategy.assigner(record.value, record.timestamp))
		await this.emit({ value: record.value, timestamp })
		const candidate = this.generator.onEvent(record.value, timestamp)
		if (candidate !== undefined && this.generated.advance(candidate)) {
			await this.emitWatermark(candidate)
		}
	}

	// Upstream watermarks are replaced by the generated ones
	protected override onWatermark(): Promise<void> {
		return Promise.resolve()
	}
}

type WindowDefinition<K, V, A, R, OUT> = {
	readonly keyOf: (value: V) => K
	readonly keyCodec: Codec<K>
	readonly windows: TumblingWindows
	readonly aggregate: AggregateFunction<V, A, R>
	readonly windowFunction: WindowFunction<K, R, OUT>
	readonly onLateRecord?: (value: V, window: TimeWindow, watermark: number) => void
}

/**
 * Keyed tumbling-window aggregation.
 *
 * A record whose window end is at or below the current watermark is late and
 * dropped. When the watermark passes a window end, every (key, window) with that end
 * is removed from the store and fired once, with timestamp `end - 1`, before the
 * watermark itself is forwarded.
 */
class WindowOperator<K, V, A, R, OUT> extends Operator<V, OUT> {
	private readonly store: WindowStore<K, A>
	private readonly lateRecords: Counter
	private readonly windowsFired: Counter

	constructor(
		name: string,
		instance: number,
		context: RuntimeContext,
		private readonly definition: WindowDefinition<K, V, A, R, OUT>
	) {
		super(name, instance, context)
		this.store = context.stateStoreProvider.createWindowStore<K, A>(`${name}-${instance}`, {
			keyCodec: definition.keyCodec,
		})
		this.lateRecords = context.metrics.counter(name, 'lateRecordsDropped')
		this.windowsFired = context.metrics.counter(name, 'windowsFired')
	}

	get pendingWindows(): number {
		return this.store.size
	}

	protected async onRecord(record: StreamRecord<V>): Promise<void> {
		if (record.timestamp === undefined) {
			throw new TopologyError(`Window operator '${this.name}' received a record without a timestamp`)
		}
		const window = this.definition.windows.assign(record.timestamp)
		if (window.end <= this.watermark) {
			this.lateRecords.inc()
			this.logger.debug('Dropped late record', {
				timestamp: record.timestamp,
				windowEnd: window.end,
				watermark: this.watermark,
			})
			this.definition.onLateRecord?.(record.value, window, this.watermark)
			return
		}
		const key = this.definition.keyOf(record.value)
		const accumulator = this.store.get(key, window) ?? this.definition.aggregate.createAccumulator()
		this.store.put(key, window, this.definition.aggregate.add(record.value, accumulator))
	}

	protected override async onWatermark(watermark: number): Promise<void> {
		for (const entry of this.store.takeExpired(watermark)) {
			this.windowsFired.inc()
			const results: OUT[] = []
			this.definition.windowFunction(entry.key, entry.window, [this.definition.aggregate.getResult(entry.value)], {
				collect: value => results.push(value),
			})
			if (this.logger.isEnabled('debug')) {
				this.logger.debug('Window fired', {
					windowStart: entry.window.start,
					windowEnd: entry.window.end,
					watermark,
					results: results.length,
				})
			}
			for (const value of results) {
				await this.emit({ value, timestamp: entry.window.end - 1 })
			}
		}
		await this.emitWatermark(watermark)
	}
}

class JoinOperator<K, L, R, VR> extends Operator<JoinEvent<K, L, R>, VR> {
	private readonly state: KeyedJoinState<K, L, R>
	private readonly matches: Counter
	private readonly unmatched: Counter

	constructor(
		name: string,
		instance: number,
		context: RuntimeContext,
		keyCodec: Codec<K>,
		private readonly joiner: Joiner<K, L, R, VR>
	) {
		super(name, instance, context)
		this.state = new KeyedJoinState(
			context.stateStoreProvider.createKeyValueStore<K, JoinStateEntry<L>>(`${name}-${instance}-left`, { keyCodec }),
			context.stateStoreProvider.createKeyValueStore<K, JoinStateEntry<R>>(`${name}-${instance}-right`, { keyCodec })
		)
		this.matches = context.metrics.counter(name, 'joinMatches')
		this.unmatched = context.metrics.counter(name, 'unmatchedEvents')
	}

	protected async onRecord(record: StreamRecord<JoinEvent<K, L, R>>): Promise<void> {
		const event = record.value
		const match = this.state.apply(event)
		if (!match) {
			this.unmatched.inc()
			this.logger.debug('No match for join key yet', { side: event.side, key: event.key })
			return
		}
		this.matches.inc()
		await this.emit({ value: this.joiner(match.left, match.right, match.key), timestamp: match.timestamp })
	}
}

/**
 * Input port of one join side: tags each value before it reaches the shared operator.
 */
class SideInput<T, E> implements InputPort<T> {
	constructor(
		private readonly target: InputPort<E>,
		private readonly tag: (value: T, timestamp: number | undefined) => E
	) {}

	addChannel(): number {
		return this.target.addChannel()
	}

	processRecord(channel: number, record: StreamRecord<T>): Promise<void> {
		return this.target.processRecord(channel, {
			value: this.tag(record.value, record.timestamp),
			timestamp: record.timestamp,
		})
	}

	processWatermark(channel: number, watermark: number): Promise<void> {
		return this.target.processWatermark(channel, watermark)
	}

	processEnd(channel: number): Promise<void> {
		return this.target.processEnd(channel)
	}
}

type SinkState = {
	failure: SinkFailureError | undefined
	openInstances: number
}

class SinkOperator<T> extends Operator<T, never> {
	private readonly failures: Counter
	private readonly discarded: Counter

	constructor(
		name: string,
		instance: number,
		context: RuntimeContext,
		private readonly sink: Sink<T>,
		private readonly shared: SinkState
	) {
		super(name, instance, context)
		this.failures = context.metrics.counter(name, 'sinkFailures')
		this.discarded = context.metrics.counter(name, 'recordsDiscarded')
	}

	protected async onRecord(record: StreamRecord<T>): Promise<void> {
		if (this.shared.failure) {
			this.discarded.inc()
			return
		}
		try {
			await this.sink.consume(record.value)
		} catch (error) {
			this.fail(error)
		}
	}

	protected override async onEnd(): Promise<void> {
		this.shared.openInstances--
		if (this.shared.openInstances > 0 || this.shared.failure || !this.sink.close) {
			return
		}
		try {
			await this.sink.close()
		} catch (error) {
			this.fail(error)
		}
	}

	private fail(cause: unknown): void {
		const failure = new SinkFailureError(this.sink.name, cause)
		this.shared.failure = failure
		this.failures.inc()
		this.context.sinkFailures.push(failure)
		this.logger.error('Sink failed, discarding the rest of its input', { code: failure.code, error: cause })
	}
}

// ============================================================================
// Logical graph
// ============================================================================

/**
 * How many instances a node runs with: sources run once, keyed nodes once per
 * configured partition, everything else as many as its widest input.
 */
type Distribution = 'source' | 'keyed' | 'inherit'

abstract class StreamNode<OUT> {
	readonly consumers: StreamNode<unknown>[] = []

	constructor(
		readonly name: string,
		readonly distribution: Distribution,
		readonly inputs: readonly StreamNode<unknown>[],
		readonly terminal = false
	) {
		for (const input of inputs) {
			input.consumers.push(this)
		}
	}

	abstract instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<OUT>[]
}

type PendingWindows = { readonly name: string; readonly pendingWindows: number }

/**
 * One run's operator instances and the edges between them.
 */
class PhysicalPlan {
	readonly sources: SourceRunner<unknown>[] = []
	readonly windows: PendingWindows[] = []
	private readonly ports = new Map<StreamNode<unknown>, readonly OutputPort<unknown>[]>()
	private readonly parallelisms = new Map<StreamNode<unknown>, number>()

	constructor(readonly context: RuntimeContext) {}

	parallelismOf(node: StreamNode<unknown>): number {
		const known = this.parallelisms.get(node)
		if (known !== undefined) {
			return known
		}
		let parallelism: number
		switch (node.distribution) {
			case 'source':
				parallelism = 1
				break
			case 'keyed':
				parallelism = this.context.parallelism
				break
			case 'inherit':
				parallelism = Math.max(1, ...node.inputs.map(input => this.parallelismOf(input)))
				break
		}
		this.parallelisms.set(node, parallelism)
		return parallelism
	}

	instantiate<T>(node: StreamNode<T>): readonly OutputPort<T>[] {
		const existing = this.ports.get(node)
		if (existing) {
			return existing
		}
		const ports = node.instantiate(this, this.parallelismOf(node))
		this.ports.set(node, ports)
		return ports
	}

	/**
	 * Wire every instance of `upstream` to `targets`.
	 *
	 * With `keyBytes` records are hash-partitioned by key. Otherwise instance i feeds
	 * target i when the counts match, and records are spread round-robin when they don't.
	 */
	connect<T>(upstream: StreamNode<T>, targets: readonly InputPort<T>[], keyBytes?: (value: T) => Buffer): void {
		const upstreamPorts = this.instantiate(upstream)
		if (!keyBytes && upstreamPorts.length === targets.length) {
			upstreamPorts.forEach((port, index) => {
				const target = targets[index]
				if (target) {
					port.addOutput(new ChannelOutput(target, target.addChannel()))
				}
			})
			return
		}
		for (const port of upstreamPorts) {
			const channels = targets.map(target => new ChannelOutput(target, target.addChannel()))
			if (keyBytes) {
				port.addOutput(
					new ExchangeOutput(channels, record => partitionFor(keyBytes(record.value), channels.length))
				)
			} else {
				let next = 0
				port.addOutput(new ExchangeOutput(channels, () => next++ % channels.length))
			}
		}
	}
}

function instances<T>(count: number, create: (instance: number) => T): T[] {
	return Array.from({ length: count }, (_, instance) => create(instance))
}

class SourceNode<T> extends StreamNode<T> {
	constructor(
		name: string,
		private readonly source: Source<T>
	) {
		super(name, 'source', [])
	}

	instantiate(plan: PhysicalPlan): readonly OutputPort<T>[] {
		const runner = new SourceRunner(this.name, this.source, plan.context)
		plan.sources.push(runner)
		return [runner]
	}
}

class ProcessNode<IN, OUT> extends StreamNode<OUT> {
	constructor(
		name: string,
		private readonly input: StreamNode<IN>,
		private readonly fn: ProcessFunction<IN, OUT>
	) {
		super(name, 'inherit', [input])
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<OUT>[] {
		const operators = instances(parallelism, i => new ProcessOperator(this.name, i, plan.context, this.fn))
		plan.connect(this.input, operators)
		return operators
	}
}

class UnionNode<T> extends StreamNode<T> {
	constructor(
		name: string,
		private readonly sources: readonly StreamNode<T>[]
	) {
		super(name, 'inherit', sources)
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<T>[] {
		const operators = instances(
			parallelism,
			i => new ProcessOperator<T, T>(this.name, i, plan.context, (value, out) => out.collect(value))
		)
		for (const source of this.sources) {
			plan.connect(source, operators)
		}
		return operators
	}
}

class TimestampNode<V> extends StreamNode<V> {
	constructor(
		name: string,
		private readonly input: StreamNode<V>,
		private readonly strategy: WatermarkStrategy<V>
	) {
		super(name, 'inherit', [input])
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<V>[] {
		const operators = instances(parallelism, i => new TimestampOperator(this.name, i, plan.context, this.strategy))
		plan.connect(this.input, operators)
		return operators
	}
}

class WindowNode<K, V, A, R, OUT> extends StreamNode<OUT> {
	constructor(
		name: string,
		private readonly input: StreamNode<V>,
		private readonly definition: WindowDefinition<K, V, A, R, OUT>
	) {
		super(name, 'keyed', [input])
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<OUT>[] {
		const operators = instances(parallelism, i => new WindowOperator(this.name, i, plan.context, this.definition))
		plan.windows.push(...operators)
		plan.connect(this.input, operators, value => this.definition.keyCodec.encode(this.definition.keyOf(value)))
		return operators
	}
}

type KeyedInput<K, V> = {
	readonly node: StreamNode<V>
	readonly keyOf: (value: V) => K
}

class JoinNode<K, L, R, VR> extends StreamNode<VR> {
	constructor(
		name: string,
		private readonly left: KeyedInput<K, L>,
		private readonly right: KeyedInput<K, R>,
		private readonly keyCodec: Codec<K>,
		private readonly joiner: Joiner<K, L, R, VR>
	) {
		super(name, 'keyed', [left.node, right.node])
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<VR>[] {
		const operators = instances(
			parallelism,
			i => new JoinOperator(this.name, i, plan.context, this.keyCodec, this.joiner)
		)
		const { left, right, keyCodec } = this
		plan.connect(
			left.node,
			operators.map(
				operator =>
					new SideInput<L, JoinEvent<K, L, R>>(operator, (value, timestamp) => ({
						side: 'left',
						key: left.keyOf(value),
						value,
						timestamp,
					}))
			),
			value => keyCodec.encode(left.keyOf(value))
		)
		plan.connect(
			right.node,
			operators.map(
				operator =>
					new SideInput<R, JoinEvent<K, L, R>>(operator, (value, timestamp) => ({
						side: 'right',
						key: right.keyOf(value),
						value,
						timestamp,
					}))
			),
			value => keyCodec.encode(right.keyOf(value))
		)
		return operators
	}
}

class SinkNode<T> extends StreamNode<never> {
	constructor(
		name: string,
		private readonly input: StreamNode<T>,
		private readonly sink: Sink<T>
	) {
		super(name, 'inherit', [input], true)
	}

	instantiate(plan: PhysicalPlan, parallelism: number): readonly OutputPort<never>[] {
		const shared: SinkState = { failure: undefined, openInstances: parallelism }
		const operators = instances(parallelism, i => new SinkOperator(this.name, i, plan.context, this.sink, shared))
		plan.connect(this.input, operators)
		return operators
	}
}

// ============================================================================
// Public API
// ============================================================================

class FlowAppImpl implements FlowApp {
	private readonly config: ResolvedFlowConfig
	private readonly logger: Logger
	private readonly nodes: StreamNode<unknown>[] = []
	private readonly names = new Set<string>()
	private readonly registry = new MetricsRegistry()
	private currentState: StreamState = 'CREATED'
	private lastError: Error | null = null
	private abortController: AbortController | null = null
	private running: Promise<PipelineResult> | null = null

	constructor(config: FlowConfig) {
		this.config = resolveFlowConfig(config)
		const context = { applicationId: this.config.applicationId }
		if (this.config.logger) {
			this.logger = this.config.logger.child(context)
		} else if (this.config.logLevel) {
			this.logger = createLogger(this.config.logLevel, context)
		} else {
			this.logger = noopLogger
		}
	}

	get applicationId(): string {
		return this.config.applicationId
	}

	source<V>(source: Source<V>, options?: Named): DataStream<V> {
		const node = this.register(new SourceNode(this.reserveName('source', options?.name ?? source.name), source))
		return new DataStreamImpl(this, node, false)
	}

	/**
	 * Claim a unique operator name. Fails once the app has started.
	 */
	reserveName(kind: string, name?: string): string {
		if (this.currentState !== 'CREATED') {
			throw new TopologyError(`Cannot add '${name ?? kind}' to app '${this.applicationId}' after it started`)
		}
		const resolved = name ?? `${kind}-${this.nodes.length}`
		if (this.names.has(resolved)) {
			throw new TopologyError(`Duplicate operator name '${resolved}'`)
		}
		this.names.add(resolved)
		return resolved
	}

	register<N extends StreamNode<unknown>>(node: N): N {
		this.nodes.push(node)
		return node
	}

	run(): Promise<PipelineResult> {
		if (this.currentState !== 'CREATED') {
			return Promise.reject(
				new TopologyError(`App '${this.applicationId}' cannot run from state ${this.currentState}`)
			)
		}
		this.running = this.execute()
		return this.running
	}

	private async execute(): Promise<PipelineResult> {
		this.validate()

		const controller = new AbortController()
		this.abortController = controller
		this.currentState = 'RUNNING'

		const stateStoreProvider = this.config.stateStoreProvider ?? new InMemoryStateStoreProvider()
		const context: RuntimeContext = {
			logger: this.logger,
			metrics: this.registry,
			stateStoreProvider,
			parallelism: this.config.parallelism,
			sinkFailures: [],
		}
		const plan = new PhysicalPlan(context)
		for (const node of this.nodes) {
			plan.instantiate(node)
		}

		this.logger.info('Pipeline started', {
			sources: plan.sources.length,
			operators: this.nodes.length,
			parallelism: this.config.parallelism,
		})

		try {
			await this.runSources(plan.sources, controller)

			if (controller.signal.aborted) {
				this.currentState = 'STOPPED'
				this.logger.info('Pipeline stopped')
				return { state: 'STOPPED', metrics: this.registry.snapshot() }
			}

			for (const window of plan.windows) {
				if (window.pendingWindows > 0) {
					throw new PendingWindowsError(window.name, window.pendingWindows)
				}
			}
			if (context.sinkFailures.length > 0) {
				throw new PipelineError(context.sinkFailures)
			}

			this.currentState = 'COMPLETED'
			this.logger.info('Pipeline completed')
			return { state: 'COMPLETED', metrics: this.registry.snapshot() }
		} catch (error) {
			this.currentState = 'ERROR'
			this.lastError = error instanceof Error ? error : new Error(String(error))
			this.logger.error('Pipeline failed', { error: this.lastError })
			throw this.lastError
		} finally {
			stateStoreProvider.close()
		}
	}

	/**
	 * Run every source to completion. The first failure aborts the others and is rethrown
	 * once all of them have stopped.
	 */
	private async runSources(sources: readonly SourceRunner<unknown>[], controller: AbortController): Promise<void> {
		let firstError: unknown
		let failed = false
		await Promise.all(
			sources.map(async source => {
				try {
					await source.run(controller.signal)
				} catch (error) {
					if (!failed) {
						failed = true
						firstError = error
						this.logger.error('Stopping all sources after failure', { source: source.name, error })
						controller.abort()
					}
				}
			})
		)
		if (failed) {
			throw firstError
		}
	}

	private validate(): void {
		if (!this.nodes.some(node => node.distribution === 'source')) {
			throw new TopologyError(`App '${this.applicationId}' has no sources`)
		}
		for (const node of this.nodes) {
			if (!node.terminal && node.consumers.length === 0) {
				throw new TopologyError(`Stream '${node.name}' is not connected to a sink`)
			}
		}
	}

	async close(): Promise<void> {
		switch (this.currentState) {
			case 'CREATED':
				this.currentState = 'STOPPED'
				return
			case 'RUNNING':
				this.abortController?.abort()
				// A failing run is reported to the caller of run()
				await this.running?.catch(() => undefined)
				return
			default:
				return
		}
	}

	state(): StreamState {
		return this.currentState
	}

	metrics(): MetricsSnapshot {
		return this.registry.snapshot()
	}

	getLastError(): Error | null {
		return this.lastError
	}
}

class DataStreamImpl<V> implements DataStream<V> {
	constructor(
		readonly app: FlowAppImpl,
		readonly node: StreamNode<V>,
		/** Whether records carry event time (a timestamp assignment happened upstream) */
		readonly timestamped: boolean
	) {}

	map<V2>(fn: (value: V) => V2, options?: Named): DataStream<V2> {
		return this.process<V2>('map', options, (value, out) => out.collect(fn(value)))
	}

	filter(fn: (value: V) => boolean, options?: Named): DataStream<V> {
		return this.process<V>('filter', options, (value, out) => {
			if (fn(value)) {
				out.collect(value)
			}
		})
	}

	flatMap<V2>(fn: (value: V) => Iterable<V2>, options?: Named): DataStream<V2> {
		return this.process<V2>('flatMap', options, (value, out) => {
			for (const next of fn(value)) {
				out.collect(next)
			}
		})
	}

	peek(fn: (value: V) => void, options?: Named): DataStream<V> {
		return this.process<V>('peek', options, (value, out) => {
			fn(value)
			out.collect(value)
		})
	}

	merge(other: DataStream<V>, options?: Named): DataStream<V> {
		const otherStream = this.sameApp(other)
		const name = this.app.reserveName('merge', options?.name)
		const node = this.app.register(new UnionNode<V>(name, [this.node, otherStream.node]))
		return new DataStreamImpl(this.app, node, this.timestamped && otherStream.timestamped)
	}

	assignTimestamps(strategy: WatermarkStrategy<V>, options?: Named): DataStream<V> {
		const name = this.app.reserveName('timestamps', options?.name)
		const node = this.app.register(new TimestampNode(name, this.node, strategy))
		return new DataStreamImpl(this.app, node, true)
	}

	keyBy<K>(fn: (value: V) => K, options?: Grouped<K>): KeyedStream<K, V> {
		return new KeyedStreamImpl(this, fn, options?.key ?? jsonCodec<K>(), options?.key !== undefined)
	}

	sink(sink: Sink<V>, options?: Named): void {
		const name = this.app.reserveName('sink', options?.name ?? sink.name)
		this.app.register(new SinkNode(name, this.node, sink))
	}

	private process<V2>(kind: string, options: Named | undefined, fn: ProcessFunction<V, V2>): DataStream<V2> {
		const name = this.app.reserveName(kind, options?.name)
		const node = this.app.register(new ProcessNode(name, this.node, fn))
		return new DataStreamImpl(this.app, node, this.timestamped)
	}

	private sameApp(other: DataStream<V>): DataStreamImpl<V> {
		if (!(other instanceof DataStreamImpl) || other.app !== this.app) {
			throw new TopologyError('Streams can only be combined within the same app')
		}
		return other as DataStreamImpl<V>
	}
}

class KeyedStreamImpl<K, V> implements KeyedStream<K, V> {
	constructor(
		readonly stream: DataStreamImpl<V>,
		readonly keyOf: (value: V) => K,
		readonly keyCodec: Codec<K>,
		readonly explicitKeyCodec: boolean
	) {}

	window(windows: TumblingWindows, options?: WindowOptions<V>): WindowedStream<K, V> {
		if (!this.stream.timestamped) {
			throw new TopologyError(
				`Stream '${this.stream.node.name}' has no event time; call assignTimestamps() before window()`
			)
		}
		return new WindowedStreamImpl(this, windows, options ?? {})
	}

	join<V2, VR>(other: KeyedStream<K, V2>, joiner: Joiner<K, V, V2, VR>, options?: Named): DataStream<VR> {
		if (!(other instanceof KeyedStreamImpl) || other.stream.app !== this.stream.app) {
			throw new TopologyError('Streams can only be joined within the same app')
		}
		const right = other as KeyedStreamImpl<K, V2>
		if (right.explicitKeyCodec && right.keyCodec !== this.keyCodec) {
			throw new TopologyError(
				`Join '${options?.name ?? 'join'}': the right stream was keyed with its own codec, ` +
					'but both sides are partitioned with the left stream\'s codec; key both sides with the same codec'
			)
		}
		const app = this.stream.app
		const name = app.reserveName('join', options?.name)
		const node = app.register(
			new JoinNode<K, V, V2, VR>(
				name,
				{ node: this.stream.node, keyOf: this.keyOf },
				{ node: right.stream.node, keyOf: right.keyOf },
				this.keyCodec,
				joiner
			)
		)
		return new DataStreamImpl(app, node, this.stream.timestamped && right.stream.timestamped)
	}
}

class WindowedStreamImpl<K, V> implements WindowedStream<K, V> {
	constructor(
		private readonly keyed: KeyedStreamImpl<K, V>,
		private readonly windows: TumblingWindows,
		private readonly options: WindowOptions<V>
	) {}

	aggregate<A, R, OUT>(fn: AggregateFunction<V, A, R>, windowFn: WindowFunction<K, R, OUT>): DataStream<OUT> {
		const { stream, keyOf, keyCodec } = this.keyed
		const name = stream.app.reserveName('window', this.options.name)
		const node = stream.app.register(
			new WindowNode<K, V, A, R, OUT>(name, stream.node, {
				keyOf,
				keyCodec,
				windows: this.windows,
				aggregate: fn,
				windowFunction: windowFn,
				onLateRecord: this.options.onLateRecord,
			})
		)
		return new DataStreamImpl(stream.app, node, true)
	}

	count(): DataStream<WindowResult<K, number>> {
		return this.aggregate(countAggregate<V>(), windowResult<K, number>())
	}

	reduce(reducer: (aggregate: V, value: V) => V): DataStream<WindowResult<K, V>> {
		return this.aggregate(reduceAggregate(reducer), windowResult<K, V>())
	}
}

/**
 * Create a flow application
 *
 * @example
 * ```typescript
 * const app = flow({ applicationId: 'orders', parallelism: 2 })
 *
 * app
 *   .source(fromIterable('orders', orders))
 *   .assignTimestamps(WatermarkStrategy.forTimestamps(order => order.at))
 *   .keyBy(order => order.type)
 *   .window(TumblingWindows.of('1s'))
 *   .count()
 *   .sink(consoleSink('counts'))
 *
 * const result = await app.run()
 * ```
 */
export function flow(config: FlowConfig): FlowApp {
	return new FlowAppImpl(config)
}
