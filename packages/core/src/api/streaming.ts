/**
 * Streaming API - Promise-friendly wrapper
 *
 * For callers outside an Effect runtime. Effect users should compose
 * startStream / streamMessages from "@chirpstream/core/streaming" directly.
 *
 * @module api/streaming
 */

import { Layer, Stream } from "effect"
import {
	StreamingConfigLive,
	makeStreamingConfigLayer,
	type StreamingConfig,
	type StreamingConfigShape,
} from "../streaming/config.js"
import type { StreamingError } from "../streaming/errors.js"
import type { StreamingMessage } from "../streaming/messages.js"
import {
	emptyStreamingParameters,
	makeStreamingParameters,
	type StreamingParameterInput,
} from "../streaming/parameters.js"
import { startStream, toAsyncIterable, type StreamingRequirements } from "../streaming/stream.js"
import {
	StreamingTransportLive,
	makeFetchTransportLayer,
	type FetchTransportOptions,
	type StreamingTransport,
} from "../streaming/transport.js"
import type { StreamType } from "../streaming/types.js"

export interface StreamingOptions {
	/** Transport options (credentials, custom fetch, user agent) */
	transport?: FetchTransportOptions
	/** Config overrides; omitted means read from process.env */
	config?: Partial<StreamingConfigShape>
}

/**
 * Default layer: global fetch, config from process.env
 */
export const StreamingLive: Layer.Layer<StreamingTransport | StreamingConfig> = Layer.merge(
	StreamingTransportLive,
	StreamingConfigLive,
)

export function makeStreamingLayer(
	options: StreamingOptions = {},
): Layer.Layer<StreamingRequirements> {
	return Layer.merge(
		options.transport ? makeFetchTransportLayer(options.transport) : StreamingTransportLive,
		options.config ? makeStreamingConfigLayer(options.config) : StreamingConfigLive,
	)
}

/**
 * Stream of messages with its layer already provided
 */
function connectStream(
	streamType: StreamType,
	parameters?: StreamingParameterInput,
	options?: StreamingOptions,
): Stream.Stream<StreamingMessage, StreamingError> {
	return startStream(
		streamType,
		parameters ? makeStreamingParameters(parameters) : emptyStreamingParameters,
	).pipe(Stream.provideLayer(makeStreamingLayer(options)))
}

/**
 * Streaming API namespace
 */
export const streaming = {
	/**
	 * Connect without retry; provide nothing else
	 *
	 * @example
	 * ```typescript
	 * import { Effect, Stream } from "effect"
	 *
	 * await Effect.runPromise(
	 *   streaming.connect("filter", { track: ["cats"] }).pipe(
	 *     Stream.take(5),
	 *     Stream.runForEach((message) => Effect.log(message.type)),
	 *   ),
	 * )
	 * ```
	 */
	connect: connectStream,

	/**
	 * Async-iterate messages; breaking out of the loop closes the connection
	 *
	 * @example
	 * ```typescript
	 * for await (const message of streaming.iterate("sample")) {
	 *   if (message.type === "status") console.log(message.status.text)
	 * }
	 * ```
	 */
	iterate: (
		streamType: StreamType,
		parameters?: StreamingParameterInput,
		options?: StreamingOptions,
	): AsyncGenerator<StreamingMessage> =>
		toAsyncIterable(connectStream(streamType, parameters, options)),
}
