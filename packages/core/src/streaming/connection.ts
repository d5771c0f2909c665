/**
 * Connection launcher
 *
 * Opens one long-lived request and exposes the body as a lazy stream of
 * non-empty lines. Nothing happens until the stream is pulled; the handle
 * lives in the stream's scope and is released exactly once when the stream
 * ends, fails or is interrupted.
 */

import { Effect, Metric, Stream } from "effect"
import { ConnectionError } from "./errors.js"
import { StreamingMetrics } from "./metrics.js"
import type { StreamingParameters } from "./parameters.js"
import { StreamingTransport } from "./transport.js"
import type { HttpMethod } from "./types.js"

function stripCarriageReturn(line: string): string {
	return line.endsWith("\r") ? line.slice(0, -1) : line
}

/**
 * Split decoded text into lines terminated by \n or \r\n
 *
 * The unterminated remainder is emitted only when the text ends cleanly.
 * If the source fails, the partial line is discarded with it.
 */
export function splitCompleteLines<E, R>(
	text: Stream.Stream<string, E, R>,
): Stream.Stream<string, E, R> {
	return Stream.suspend(() => {
		let pending = ""

		const complete = text.pipe(
			Stream.mapConcat((chunk) => {
				const parts = (pending + chunk).split("\n")
				pending = parts.pop() ?? ""
				return parts.map(stripCarriageReturn)
			}),
		)

		// concat only runs the tail after a successful end
		return Stream.concat(
			complete,
			Stream.suspend(() =>
				pending.length > 0 ? Stream.make(stripCarriageReturn(pending)) : Stream.empty,
			),
		)
	})
}

/**
 * Split a byte stream into non-empty text lines
 *
 * Keep-alive newlines and whitespace-only lines are dropped. Each line is
 * emitted as its own chunk so downstream work happens one line per pull.
 */
export function readLines(
	body: ReadableStream<Uint8Array>,
	url: string,
): Stream.Stream<string, ConnectionError> {
	return Stream.fromReadableStream(
		() => body,
		(cause) =>
			new ConnectionError({
				message: "Failed to read streaming response",
				url,
				cause,
			}),
	).pipe(
		Stream.decodeText(),
		splitCompleteLines,
		Stream.filter((line) => line.trim().length > 0),
		Stream.rechunk(1),
	)
}

export function openConnection(
	method: HttpMethod,
	url: string,
	parameters: StreamingParameters,
): Stream.Stream<string, ConnectionError, StreamingTransport> {
	return Stream.unwrapScoped(
		Effect.gen(function* () {
			const transport = yield* StreamingTransport
			const handle = yield* transport.sendStreamingRequest({ method, url, parameters })

			yield* Metric.increment(StreamingMetrics.connectionsTotal)
			yield* Metric.increment(StreamingMetrics.connectionsActive)
			yield* Effect.addFinalizer(() =>
				Metric.incrementBy(StreamingMetrics.connectionsActive, -1).pipe(
					Effect.zipRight(Effect.logDebug("Streaming connection closed")),
					Effect.annotateLogs({ method, url }),
				),
			)
			yield* Effect.logDebug("Streaming connection opened").pipe(
				Effect.annotateLogs({ method, url }),
			)

			return readLines(handle.body, url)
		}),
	)
}
