/**
 * Message dispatcher
 *
 * streamMessages = resolveEndpoint → openConnection → decodeLine, one line
 * per pull, in wire order.
 *
 * Failure policy:
 * - payload errors never leave this module; they become raw messages
 * - connection errors pass through untouched and end the stream
 *
 * No reconnect here. Callers that want one wrap the stream with
 * Stream.retry / Effect.retry themselves.
 */

import { Cause, Effect, Exit, Metric, Option, Scope, Stream } from "effect"
import { StreamingConfig } from "./config.js"
import { openConnection } from "./connection.js"
import { resolveEndpoint } from "./endpoint.js"
import type { StreamingError } from "./errors.js"
import type { StreamingMessage } from "./messages.js"
import { StreamingMetrics } from "./metrics.js"
import { emptyStreamingParameters, type StreamingParameters } from "./parameters.js"
import { decodeLine } from "./parse.js"
import type { StreamingTransport } from "./transport.js"
import type { StreamType } from "./types.js"

export type StreamingRequirements = StreamingTransport | StreamingConfig

/**
 * Record a decoded message: per-type counter, plus a warning and failure
 * counter for raw fallbacks
 */
function observeMessage(message: StreamingMessage): Effect.Effect<void> {
	const counted = Metric.increment(
		Metric.tagged(StreamingMetrics.messagesTotal, "message_type", message.type),
	)

	if (message.type !== "raw") {
		return counted
	}

	return counted.pipe(
		Effect.zipRight(
			Metric.increment(
				Metric.tagged(StreamingMetrics.parseFailuresTotal, "reason", message.error.reason),
			),
		),
		Effect.zipRight(
			Effect.logWarning("Undecodable streaming message").pipe(
				Effect.annotateLogs({ reason: message.error.reason, error: message.error.message }),
			),
		),
	)
}

/**
 * Decode a stream of raw lines into messages
 *
 * Exactly one message per line. Errors from the line stream pass through.
 */
export function decodeMessages<E, R>(
	lines: Stream.Stream<string, E, R>,
): Stream.Stream<StreamingMessage, E, R> {
	return lines.pipe(Stream.map(decodeLine), Stream.tap(observeMessage))
}

/**
 * Open a stream and decode its messages lazily
 *
 * The connection opens on first pull and closes when the stream ends,
 * fails, or the consumer stops.
 *
 * @example
 * ```typescript
 * const program = streamMessages("sample", emptyStreamingParameters).pipe(
 *   Stream.take(10),
 *   Stream.runForEach((message) => Effect.log(message.type)),
 * )
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(Layer.merge(StreamingTransportLive, StreamingConfigLive))),
 * )
 * ```
 */
export function streamMessages(
	streamType: StreamType,
	parameters: StreamingParameters,
): Stream.Stream<StreamingMessage, StreamingError, StreamingRequirements> {
	return Stream.unwrap(
		Effect.gen(function* () {
			const config = yield* StreamingConfig
			const endpoint = yield* resolveEndpoint(streamType, config)
			return decodeMessages(openConnection(endpoint.method, endpoint.url, parameters))
		}),
	)
}

/**
 * Caller-facing entry point. Parameters default to an empty set.
 */
export function startStream(
	streamType: StreamType,
	parameters: StreamingParameters = emptyStreamingParameters,
): Stream.Stream<StreamingMessage, StreamingError, StreamingRequirements> {
	return streamMessages(streamType, parameters)
}

/**
 * Expose an Effect stream as an async generator
 *
 * The stream runs in its own Scope, opened on the first next(). Leaving a
 * for-await loop early (break, return, throw) closes the scope and with it
 * the connection. Stream failures are thrown as the tagged error.
 *
 * @example
 * ```typescript
 * const messages = toAsyncIterable(
 *   startStream("sample").pipe(Stream.provideLayer(layer)),
 * )
 * for await (const message of messages) {
 *   if (message.type === "status") console.log(message.status.text)
 * }
 * ```
 */
export async function* toAsyncIterable<A, E>(stream: Stream.Stream<A, E>): AsyncGenerator<A> {
	const scope = await Effect.runPromise(Scope.make())

	try {
		const pull = await Effect.runPromise(Stream.toPull(stream).pipe(Scope.extend(scope)))

		while (true) {
			const exit = await Effect.runPromiseExit(pull)
			if (Exit.isSuccess(exit)) {
				yield* exit.value
				continue
			}

			// Pull fails with None at end of stream, Some(error) on failure
			const failure = Cause.failureOption(exit.cause)
			if (Option.isNone(failure)) {
				throw Cause.squash(exit.cause)
			}
			if (Option.isNone(failure.value)) {
				return
			}
			throw failure.value.value
		}
	} finally {
		await Effect.runPromise(Scope.close(scope, Exit.void))
	}
}
