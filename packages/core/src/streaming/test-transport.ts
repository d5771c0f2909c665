/**
 * In-process transport for tests
 *
 * Serves a fixed list of body chunks from a ReadableStream and records
 * every request and release. Optionally errors the body after the last
 * chunk to simulate a dropped socket.
 *
 * @internal
 */

import { Effect, Layer } from "effect"
import type { ConnectionError } from "./errors.js"
import { StreamingTransport, makeConnectionHandle } from "./transport.js"
import type { StreamingRequest } from "./types.js"

export interface TestTransportOptions {
	/** Body chunks, delivered one per read */
	chunks?: ReadonlyArray<string>
	/** Error the body with this after the last chunk */
	failWith?: unknown
	/** Fail the connect step instead of returning a body */
	connectError?: ConnectionError
}

export interface TestTransport {
	readonly layer: Layer.Layer<StreamingTransport>
	readonly requests: ReadonlyArray<StreamingRequest>
	/** How many times a connection was released */
	closeCount(): number
	/** How many chunks the reader has pulled from the body */
	chunksRead(): number
}

export function makeTestTransport(options: TestTransportOptions = {}): TestTransport {
	const chunks = options.chunks ?? []
	const requests: StreamingRequest[] = []
	const encoder = new TextEncoder()
	let closes = 0
	let reads = 0

	const makeBody = () => {
		let index = 0
		return new ReadableStream<Uint8Array>(
			{
				pull(controller) {
					const chunk = chunks[index]
					if (chunk !== undefined) {
						index++
						reads++
						controller.enqueue(encoder.encode(chunk))
					} else if (options.failWith !== undefined) {
						controller.error(options.failWith)
					} else {
						controller.close()
					}
				},
			},
			{ highWaterMark: 0 },
		)
	}

	const layer = Layer.succeed(StreamingTransport, {
		sendStreamingRequest: (request) =>
			Effect.acquireRelease(
				Effect.suspend(() => {
					requests.push(request)
					if (options.connectError) {
						return Effect.fail(options.connectError)
					}
					return Effect.succeed(
						makeConnectionHandle(makeBody(), () => {
							closes++
						}),
					)
				}),
				(handle) => handle.close,
			),
	})

	return {
		layer,
		requests,
		closeCount: () => closes,
		chunksRead: () => reads,
	}
}
