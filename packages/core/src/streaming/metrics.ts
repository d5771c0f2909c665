/**
 * Streaming Metrics
 *
 * USAGE:
 * ```typescript
 * Metric.increment(StreamingMetrics.connectionsTotal)
 * Metric.increment(StreamingMetrics.messagesTotal.pipe(
 *   Metric.tagged("message_type", "status")
 * ))
 * ```
 */

import { Metric } from "effect"

const connectionsActive = Metric.gauge("streaming_connections_active")
const connectionsTotal = Metric.counter("streaming_connections_total")
const messagesTotal = Metric.counter("streaming_messages_total")
const parseFailuresTotal = Metric.counter("streaming_parse_failures_total")

export const StreamingMetrics = {
	/**
	 * streaming_connections_active - open streaming connections
	 *
	 * Incremented when the transport hands back a body, decremented on release.
	 */
	connectionsActive,

	/** streaming_connections_total - connections opened since process start */
	connectionsTotal,

	/**
	 * streaming_messages_total - decoded messages
	 *
	 * Tag with message_type at call site. Raw fallbacks count as "raw".
	 */
	messagesTotal,

	/**
	 * streaming_parse_failures_total - lines that fell back to raw
	 *
	 * Tag with reason (syntax | unrecognized | schema).
	 */
	parseFailuresTotal,
} as const
