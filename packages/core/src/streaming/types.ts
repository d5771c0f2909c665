/**
 * Streaming domain types
 *
 * Stream types, HTTP methods and the request shape handed to the transport.
 */

import { Schema as S } from "effect"
import type { StreamingParameters } from "./parameters.js"

/**
 * StreamType - which long-lived feed to open
 *
 * Schema form validates untrusted input (CLI args, config files).
 */
export const StreamType = S.Literal("user", "site", "filter", "sample", "firehose")
export type StreamType = S.Schema.Type<typeof StreamType>

export const STREAM_TYPES: ReadonlyArray<StreamType> = StreamType.literals

export function isStreamType(value: string): value is StreamType {
	return STREAM_TYPES.some((type) => type === value)
}

export type HttpMethod = "GET" | "POST"

/**
 * A fully resolved streaming request
 */
export interface StreamingRequest {
	readonly method: HttpMethod
	readonly url: string
	readonly parameters: StreamingParameters
}
