/**
 * Streaming message schemas
 *
 * Parse at boundary, types flow everywhere.
 * Payload schemas only name the fields this library reads; anything
 * else on the wire is ignored on decode.
 *
 * Wire shapes are keyed, not tagged: a status is any object with "text",
 * a limit notice is { limit: {...} }, and so on. StreamingMessage adds the
 * `type` discriminant after classification (see parse.ts).
 */

import { Schema as S } from "effect"
import type { ParsingError } from "./errors.js"

// ============================================================================
// Payload Schemas
// ============================================================================

/** Numeric ids arrive as numbers; *_str variants as strings */
export const IdLike = S.Union(S.Number, S.String)

/**
 * Id exposed as a string
 *
 * Ids past 2^53 reach the schema already quoted by the parser, so they
 * keep every digit.
 */
export const IdString = S.transform(IdLike, S.String, {
	strict: true,
	decode: (id) => String(id),
	encode: (id) => id,
})

export class User extends S.Class<User>("User")({
	id_str: S.String,
	screen_name: S.String,
	name: S.optional(S.String),
}) {}

/**
 * Status - a post. Anything with a top-level "text" key.
 */
export class Status extends S.Class<Status>("Status")({
	text: S.String,
	id_str: S.optional(S.String),
	created_at: S.optional(S.String),
	lang: S.optional(S.String),
	user: S.optional(User),
}) {}

export class DirectMessage extends S.Class<DirectMessage>("DirectMessage")({
	id_str: S.String,
	text: S.String,
	sender_screen_name: S.optional(S.String),
	recipient_screen_name: S.optional(S.String),
}) {}

const DeletedItem = S.Struct({
	id_str: S.String,
	user_id_str: S.String,
})

export class DeleteNotice extends S.Class<DeleteNotice>("DeleteNotice")({
	status: S.optional(DeletedItem),
	direct_message: S.optional(DeletedItem),
}) {}

export class ScrubGeoNotice extends S.Class<ScrubGeoNotice>("ScrubGeoNotice")({
	user_id_str: S.String,
	up_to_status_id_str: S.String,
}) {}

/** Undelivered matching statuses since the connection opened */
export class LimitNotice extends S.Class<LimitNotice>("LimitNotice")({
	track: S.Number,
}) {}

export class StatusWithheldNotice extends S.Class<StatusWithheldNotice>("StatusWithheldNotice")({
	id: IdString,
	user_id: IdString,
	withheld_in_countries: S.Array(S.String),
}) {}

export class UserWithheldNotice extends S.Class<UserWithheldNotice>("UserWithheldNotice")({
	id: IdString,
	withheld_in_countries: S.Array(S.String),
}) {}

/** Server is about to close the connection */
export class DisconnectNotice extends S.Class<DisconnectNotice>("DisconnectNotice")({
	code: S.Number,
	reason: S.String,
	stream_name: S.optional(S.String),
}) {}

/** Stall warning (requires stall_warnings=true) */
export class StallWarning extends S.Class<StallWarning>("StallWarning")({
	code: S.String,
	message: S.String,
	percent_full: S.optional(S.Number),
}) {}

export const FriendsList = S.Struct({
	friends: S.optional(S.Array(IdString)),
	friends_str: S.optional(S.Array(S.String)),
})

/**
 * StreamEvent - favorites, follows, list changes...
 */
export class StreamEvent extends S.Class<StreamEvent>("StreamEvent")({
	event: S.String,
	created_at: S.optional(S.String),
	source: S.optional(User),
	target: S.optional(User),
	target_object: S.optional(S.Unknown),
}) {}

/** Site stream wrapper: a message addressed to one of the followed users */
export const Envelope = S.Struct({
	for_user: IdString,
	message: S.Unknown,
})

export class ControlNotice extends S.Class<ControlNotice>("ControlNotice")({
	control_uri: S.String,
}) {}

// ============================================================================
// Streaming Messages
// ============================================================================

export interface StatusMessage {
	readonly type: "status"
	readonly status: Status
}

export interface DirectMessageMessage {
	readonly type: "direct_message"
	readonly directMessage: DirectMessage
}

export interface DeleteMessage {
	readonly type: "delete"
	readonly deletion: DeleteNotice
}

export interface ScrubGeoMessage {
	readonly type: "scrub_geo"
	readonly scrubGeo: ScrubGeoNotice
}

export interface LimitMessage {
	readonly type: "limit"
	readonly limit: LimitNotice
}

export interface StatusWithheldMessage {
	readonly type: "status_withheld"
	readonly withheld: StatusWithheldNotice
}

export interface UserWithheldMessage {
	readonly type: "user_withheld"
	readonly withheld: UserWithheldNotice
}

export interface DisconnectMessage {
	readonly type: "disconnect"
	readonly disconnect: DisconnectNotice
}

export interface WarningMessage {
	readonly type: "warning"
	readonly warning: StallWarning
}

export interface FriendsMessage {
	readonly type: "friends"
	readonly friendIds: ReadonlyArray<string>
}

export interface EventMessage {
	readonly type: "event"
	readonly event: StreamEvent
}

export interface EnvelopeMessage {
	readonly type: "envelope"
	readonly forUser: string
	readonly message: StreamingMessage
}

export interface ControlMessage {
	readonly type: "control"
	readonly controlUri: string
}

/**
 * RawJsonMessage - fallback for lines that failed to decode
 *
 * json is the line exactly as received.
 */
export interface RawJsonMessage {
	readonly type: "raw"
	readonly json: string
	readonly error: ParsingError
}

export type StreamingMessage =
	| StatusMessage
	| DirectMessageMessage
	| DeleteMessage
	| ScrubGeoMessage
	| LimitMessage
	| StatusWithheldMessage
	| UserWithheldMessage
	| DisconnectMessage
	| WarningMessage
	| FriendsMessage
	| EventMessage
	| EnvelopeMessage
	| ControlMessage
	| RawJsonMessage

export type StreamingMessageType = StreamingMessage["type"]

export function makeRawJsonMessage(json: string, error: ParsingError): RawJsonMessage {
	return { type: "raw", json, error }
}
