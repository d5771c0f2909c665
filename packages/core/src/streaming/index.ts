/**
 * @chirpstream/core/streaming
 *
 * Long-lived streaming connections: endpoint resolution, transport,
 * line reading and message decoding.
 */

export {
	StreamType,
	STREAM_TYPES,
	isStreamType,
	type HttpMethod,
	type StreamingRequest,
} from "./types.js"

export {
	InvalidStreamTypeError,
	ConnectionError,
	ParsingError,
	type ParsingErrorReason,
	type StreamingError,
} from "./errors.js"

export {
	makeStreamingParameters,
	emptyStreamingParameters,
	serializeParameterValue,
	toSearchParams,
	type StreamingParameters,
	type StreamingParameterValue,
	type StreamingParameterInput,
} from "./parameters.js"

export {
	StreamingConfig,
	StreamingConfigLive,
	defaultStreamingConfig,
	makeStreamingConfigLayer,
	streamingConfigFromEnv,
	type StreamingConfigShape,
} from "./config.js"

export { buildUrl, resolveEndpoint, STREAM_ENDPOINTS, type StreamEndpoint } from "./endpoint.js"

export {
	StreamingTransport,
	StreamingTransportLive,
	makeFetchTransportLayer,
	makeConnectionHandle,
	encodeRequest,
	type ConnectionHandle,
	type StreamingTransportShape,
	type FetchTransportOptions,
	type AuthorizeFn,
} from "./transport.js"

export { openConnection, readLines, splitCompleteLines } from "./connection.js"

// Message schemas (Effect Schema)
export {
	User as UserSchema,
	Status as StatusSchema,
	DirectMessage as DirectMessageSchema,
	DeleteNotice,
	ScrubGeoNotice,
	LimitNotice,
	StatusWithheldNotice,
	UserWithheldNotice,
	DisconnectNotice,
	StallWarning,
	StreamEvent,
	ControlNotice,
	makeRawJsonMessage,
	type StreamingMessage,
	type StreamingMessageType,
	type StatusMessage,
	type DirectMessageMessage,
	type DeleteMessage,
	type ScrubGeoMessage,
	type LimitMessage,
	type StatusWithheldMessage,
	type UserWithheldMessage,
	type DisconnectMessage,
	type WarningMessage,
	type FriendsMessage,
	type EventMessage,
	type EnvelopeMessage,
	type ControlMessage,
	type RawJsonMessage,
} from "./messages.js"

// Parsing utilities
export {
	parseStreamingMessage,
	parseStreamingMessageSync,
	decodeLine,
	quoteUnsafeIntegers,
} from "./parse.js"

export {
	streamMessages,
	startStream,
	decodeMessages,
	toAsyncIterable,
	type StreamingRequirements,
} from "./stream.js"

export { StreamingMetrics } from "./metrics.js"

export { makeTestTransport, type TestTransport, type TestTransportOptions } from "./test-transport.js"
