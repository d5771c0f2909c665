/**
 * Streaming errors
 *
 * Tagged errors so the error channel of every Effect/Stream says exactly
 * what can go wrong. Only ParsingError is recovered locally (see decodeLine).
 */

import { Data } from "effect"

/**
 * Unrecognized stream type. Raised before any connection attempt.
 */
export class InvalidStreamTypeError extends Data.TaggedError("InvalidStreamTypeError")<{
	readonly streamType: string
	readonly message: string
}> {}

/**
 * Transport failure while connecting or reading. Ends the stream.
 */
export class ConnectionError extends Data.TaggedError("ConnectionError")<{
	readonly message: string
	readonly url: string
	readonly status?: number
	readonly cause?: unknown
}> {}

export type ParsingErrorReason = "syntax" | "unrecognized" | "schema"

/**
 * A line that could not be decoded into a known message
 *
 * - syntax: not JSON, or not a JSON object
 * - unrecognized: valid object with no known top-level key
 * - schema: known key, payload does not match
 */
export class ParsingError extends Data.TaggedError("ParsingError")<{
	readonly reason: ParsingErrorReason
	readonly message: string
	readonly json: string
	readonly cause?: unknown
}> {}

export type StreamingError = InvalidStreamTypeError | ConnectionError
