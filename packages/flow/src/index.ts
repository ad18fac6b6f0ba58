export const flowVersion = '0.1.0'

// Core flow API
export { flow } from '@/flow.js'
export type {
	FlowApp,
	DataStream,
	KeyedStream,
	WindowedStream,
	StreamState,
	StreamRecord,
	PipelineResult,
	Named,
	Grouped,
	WindowOptions,
} from '@/flow.js'

// Configuration
export {
	flowConfigSchema,
	windowDurationSchema,
	timeZoneOffsetSchema,
	watermarkStrategyKindSchema,
	logLevelSchema,
	resolveFlowConfig,
	parseConfig,
} from '@/config.js'
export type { FlowConfig, ResolvedFlowConfig } from '@/config.js'

// Event time
export { TumblingWindows, parseWindowDuration } from '@/window.js'
export type { TimeWindow, WindowDuration } from '@/window.js'
export {
	WatermarkStrategy,
	WatermarkTracker,
	WATERMARK_STRATEGY_KINDS,
	epochMillis,
	formatLocalDateTime,
	timeZoneOffsetMillis,
	TIME_ZONE_OFFSET_PATTERN,
	checkTimestamp,
} from '@/watermark.js'
export type {
	TimestampAssigner,
	WatermarkExtractor,
	WatermarkGenerator,
	WatermarkStrategyKind,
} from '@/watermark.js'

// Aggregation and joins
export {
	countAggregate,
	sumAggregate,
	averageAggregate,
	reduceAggregate,
	windowResult,
} from '@/aggregate.js'
export type { AggregateFunction, Collector, WindowFunction, WindowResult } from '@/aggregate.js'
export { KeyedJoinState } from '@/join.js'
export type { JoinEvent, JoinMatch, JoinSide, Joiner, JoinStateEntry } from '@/join.js'

// Sources and sinks
export { fromIterable, fromAsyncIterable, generateSource, linesSource } from '@/source.js'
export type { Source, Boundedness } from '@/source.js'
export { callbackSink, consoleSink, linesSink, formatValue } from '@/sink.js'
export type { Sink } from '@/sink.js'

// Codecs
export { codec, string, json, buffer, number } from '@/codec.js'
export type { Codec } from '@/codec.js'

// State stores
export {
	inMemory,
	InMemoryStateStoreProvider,
	InMemoryKeyValueStore,
	InMemoryWindowStore,
} from '@/state/memory.js'
export type {
	StateStore,
	StateStoreOptions,
	StateStoreProvider,
	KeyValueStore,
	WindowStore,
	WindowedEntry,
} from '@/state.js'

// Observability
export { createLogger, noopLogger, LOG_LEVELS } from '@/logger.js'
export type { Logger, LogLevel, LogContext, LogWriter } from '@/logger.js'
export { MetricsRegistry } from '@/metrics.js'
export type { Counter, MetricName, MetricsSnapshot } from '@/metrics.js'
export { murmur2, partitionFor } from '@/partitioner.js'

// Errors
export {
	StreamError,
	OutOfOrderWatermarkError,
	SinkFailureError,
	SourceError,
	PendingWindowsError,
	PipelineError,
	ConfigError,
	TopologyError,
	InvalidTimestampError,
	InvalidWindowDurationError,
} from '@/errors.js'
export type { StreamErrorCode } from '@/errors.js'
