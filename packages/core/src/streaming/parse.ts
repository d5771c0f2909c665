/**
 * Streaming message parser
 *
 * Classifies one line by its top-level keys and decodes it with the
 * matching schema. Checked in order:
 *
 * 1. "text"                    → status
 * 2. "friends" / "friends_str" → friends
 * 3. "event"                   → event
 * 4. "for_user"                → envelope (inner message classified again)
 * 5. first key                 → delete, scrub_geo, limit, status_withheld,
 *                                user_withheld, disconnect, warning,
 *                                direct_message, control
 */

import { Either, Predicate, Schema } from "effect"
import type { ParseError } from "effect/ParseResult"
import { ParsingError } from "./errors.js"
import {
	ControlNotice,
	DeleteNotice,
	DirectMessage,
	DisconnectNotice,
	Envelope,
	FriendsList,
	LimitNotice,
	ScrubGeoNotice,
	StallWarning,
	Status,
	StatusWithheldNotice,
	StreamEvent,
	UserWithheldNotice,
	makeRawJsonMessage,
	type StreamingMessage,
} from "./messages.js"

type Decoded = Either.Either<StreamingMessage, ParsingError>

function decodeAs<A, I>(
	schema: Schema.Schema<A, I>,
	payload: unknown,
	json: string,
	build: (value: A) => StreamingMessage,
): Decoded {
	return Schema.decodeUnknownEither(schema)(payload).pipe(
		Either.mapLeft(
			(cause: ParseError) =>
				new ParsingError({
					reason: "schema",
					message: cause.message,
					json,
					cause,
				}),
		),
		Either.map(build),
	)
}

type KeyedDecoder = (payload: unknown, json: string) => Decoded

const KEYED_DECODERS: ReadonlyMap<string, KeyedDecoder> = new Map<string, KeyedDecoder>([
	[
		"delete",
		(payload, json) => decodeAs(DeleteNotice, payload, json, (deletion) => ({ type: "delete", deletion })),
	],
	[
		"scrub_geo",
		(payload, json) =>
			decodeAs(ScrubGeoNotice, payload, json, (scrubGeo) => ({ type: "scrub_geo", scrubGeo })),
	],
	[
		"limit",
		(payload, json) => decodeAs(LimitNotice, payload, json, (limit) => ({ type: "limit", limit })),
	],
	[
		"status_withheld",
		(payload, json) =>
			decodeAs(StatusWithheldNotice, payload, json, (withheld) => ({
				type: "status_withheld",
				withheld,
			})),
	],
	[
		"user_withheld",
		(payload, json) =>
			decodeAs(UserWithheldNotice, payload, json, (withheld) => ({
				type: "user_withheld",
				withheld,
			})),
	],
	[
		"disconnect",
		(payload, json) =>
			decodeAs(DisconnectNotice, payload, json, (disconnect) => ({ type: "disconnect", disconnect })),
	],
	[
		"warning",
		(payload, json) =>
			decodeAs(StallWarning, payload, json, (warning) => ({ type: "warning", warning })),
	],
	[
		"direct_message",
		(payload, json) =>
			decodeAs(DirectMessage, payload, json, (directMessage) => ({
				type: "direct_message",
				directMessage,
			})),
	],
	[
		"control",
		(payload, json) =>
			decodeAs(ControlNotice, payload, json, (control) => ({
				type: "control",
				controlUri: control.control_uri,
			})),
	],
])

function classify(value: unknown, json: string): Decoded {
	if (!Predicate.isRecord(value)) {
		return Either.left(
			new ParsingError({ reason: "syntax", message: "Expected a JSON object", json }),
		)
	}

	if ("text" in value) {
		return decodeAs(Status, value, json, (status) => ({ type: "status", status }))
	}

	if ("friends" in value || "friends_str" in value) {
		return decodeAs(FriendsList, value, json, (list) => ({
			type: "friends",
			friendIds: list.friends_str ?? list.friends ?? [],
		}))
	}

	if ("event" in value) {
		return decodeAs(StreamEvent, value, json, (event) => ({ type: "event", event }))
	}

	if ("for_user" in value) {
		return Schema.decodeUnknownEither(Envelope)(value).pipe(
			Either.mapLeft(
				(cause) => new ParsingError({ reason: "schema", message: cause.message, json, cause }),
			),
			Either.flatMap((envelope) =>
				Either.map(classify(envelope.message, json), (message) => ({
					type: "envelope" as const,
					forUser: envelope.for_user,
					message,
				})),
			),
		)
	}

	const key = Object.keys(value)[0]
	const decoder = key === undefined ? undefined : KEYED_DECODERS.get(key)
	if (key === undefined || decoder === undefined) {
		return Either.left(
			new ParsingError({
				reason: "unrecognized",
				message: `Unsupported streaming message: ${key ?? "(empty object)"}`,
				json,
			}),
		)
	}

	return decoder(value[key], json)
}

// A JSON string, or an integer literal of 16+ digits outside one
const STRING_OR_LONG_INTEGER = /"(?:[^"\\]|\\.)*"|(?<![\w.+-])-?\d{16,}(?![\d.eE])/g

/**
 * Quote integer literals that a double cannot hold exactly
 *
 * Ids past Number.MAX_SAFE_INTEGER would otherwise lose their last digits
 * in JSON.parse. Strings and safe integers are left as they are.
 */
export function quoteUnsafeIntegers(json: string): string {
	return json.replace(STRING_OR_LONG_INTEGER, (token) =>
		token.startsWith('"') || Number.isSafeInteger(Number(token)) ? token : `"${token}"`,
	)
}

/**
 * Parse one line into a StreamingMessage
 *
 * Returns Either.Right(message) on success, Either.Left(ParsingError) on failure.
 *
 * @example
 * ```typescript
 * const result = parseStreamingMessage('{"limit":{"track":12}}')
 * if (Either.isRight(result) && result.right.type === "limit") {
 *   result.right.limit.track // 12
 * }
 * ```
 */
export function parseStreamingMessage(json: string): Decoded {
	return Either.try({
		try: (): unknown => JSON.parse(quoteUnsafeIntegers(json)),
		catch: (cause) =>
			new ParsingError({
				reason: "syntax",
				message: cause instanceof Error ? cause.message : "Invalid JSON",
				json,
				cause,
			}),
	}).pipe(Either.flatMap((value) => classify(value, json)))
}

/**
 * Parse one line, throwing ParsingError on failure
 */
export function parseStreamingMessageSync(json: string): StreamingMessage {
	return Either.getOrThrowWith(parseStreamingMessage(json), (error) => error)
}

/**
 * Decode one line, never throwing
 *
 * Lines that fail to parse come back as a raw message carrying the
 * original text and the error.
 */
export function decodeLine(line: string): StreamingMessage {
	return Either.getOrElse(parseStreamingMessage(line), (error) => makeRawJsonMessage(line, error))
}
