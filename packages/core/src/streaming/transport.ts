/**
 * Streaming transport
 *
 * The only piece that talks to the network. Owns credential headers and
 * request encoding; the rest of the pipeline only sees a ConnectionHandle.
 *
 * Inject a custom fetch for tests with makeFetchTransportLayer({ fetch }).
 */

import { Context, Effect, Layer, type Scope } from "effect"
import { ConnectionError } from "./errors.js"
import { toSearchParams } from "./parameters.js"
import type { StreamingRequest } from "./types.js"

/**
 * An open response body plus its release action
 *
 * close is idempotent: release runs at most once no matter how often
 * close is evaluated.
 */
export interface ConnectionHandle {
	readonly body: ReadableStream<Uint8Array>
	readonly close: Effect.Effect<void>
}

export function makeConnectionHandle(
	body: ReadableStream<Uint8Array>,
	release: () => void,
): ConnectionHandle {
	let closed = false
	return {
		body,
		close: Effect.sync(() => {
			if (closed) return
			closed = true
			release()
		}),
	}
}

export interface StreamingTransportShape {
	/**
	 * Send one long-lived request. The handle is released when the
	 * surrounding scope closes.
	 */
	readonly sendStreamingRequest: (
		request: StreamingRequest,
	) => Effect.Effect<ConnectionHandle, ConnectionError, Scope.Scope>
}

export class StreamingTransport extends Context.Tag("StreamingTransport")<
	StreamingTransport,
	StreamingTransportShape
>() {}

export type AuthorizeFn = (
	request: StreamingRequest,
) => Readonly<Record<string, string>> | Promise<Readonly<Record<string, string>>>

export interface FetchTransportOptions {
	/** fetch implementation (default: global fetch) */
	readonly fetch?: typeof fetch
	/** Extra headers per request, e.g. an OAuth Authorization header */
	readonly authorize?: AuthorizeFn
	/** User-Agent header */
	readonly userAgent?: string
}

/**
 * Build the fetch Request pieces for a streaming request
 *
 * GET carries parameters in the query string, POST in a form body.
 */
export function encodeRequest(request: StreamingRequest): {
	url: string
	body: string | undefined
	headers: Record<string, string>
} {
	const query = toSearchParams(request.parameters).toString()

	if (request.method === "POST") {
		return {
			url: request.url,
			body: query,
			headers: { "Content-Type": "application/x-www-form-urlencoded" },
		}
	}

	return {
		url: query ? `${request.url}?${query}` : request.url,
		body: undefined,
		headers: {},
	}
}

function makeFetchTransport(options: FetchTransportOptions = {}): StreamingTransportShape {
	return {
		sendStreamingRequest: (request) =>
			Effect.acquireRelease(
				Effect.gen(function* () {
					const encoded = encodeRequest(request)
					const authorize = options.authorize
					const authHeaders = authorize
						? yield* Effect.tryPromise({
								try: async () => authorize(request),
								catch: (cause) =>
									new ConnectionError({
										message: "Failed to authorize streaming request",
										url: request.url,
										cause,
									}),
							})
						: {}

					const controller = new AbortController()
					const response = yield* Effect.tryPromise({
						try: () =>
							(options.fetch ?? fetch)(encoded.url, {
								method: request.method,
								headers: {
									...encoded.headers,
									...(options.userAgent ? { "User-Agent": options.userAgent } : {}),
									...authHeaders,
								},
								body: encoded.body,
								signal: controller.signal,
							}),
						catch: (cause) =>
							new ConnectionError({
								message: "Streaming connection failed",
								url: request.url,
								cause,
							}),
					})

					if (!response.ok) {
						controller.abort()
						return yield* new ConnectionError({
							message: `Streaming connection failed: ${response.status}`,
							url: request.url,
							status: response.status,
						})
					}

					if (!response.body) {
						controller.abort()
						return yield* new ConnectionError({
							message: "Streaming response has no body",
							url: request.url,
							status: response.status,
						})
					}

					return makeConnectionHandle(response.body, () => controller.abort())
				}),
				(handle) => handle.close,
			),
	}
}

/**
 * StreamingTransportLive - global fetch, no credentials
 */
export const StreamingTransportLive: Layer.Layer<StreamingTransport> = Layer.succeed(
	StreamingTransport,
	makeFetchTransport(),
)

/**
 * Fetch transport with options (credentials, custom fetch, user agent)
 */
export const makeFetchTransportLayer = (
	options: FetchTransportOptions,
): Layer.Layer<StreamingTransport> => Layer.succeed(StreamingTransport, makeFetchTransport(options))
