/**
 * Message formatter
 *
 * One line per streaming message for terminal output
 */

import chalk from "chalk"
import type { StreamingMessage } from "@chirpstream/core"

/**
 * Collapse newlines so every message stays on one line
 */
export function singleLine(text: string): string {
	return text.replace(/\s*\r?\n\s*/g, " ").trim()
}

/**
 * Truncate with an ellipsis
 *
 * @param max - Maximum length including the ellipsis
 */
export function truncate(text: string, max: number): string {
	if (text.length <= max) return text
	return `${text.slice(0, Math.max(0, max - 1))}…`
}

function label(type: string): string {
	return chalk.dim(`[${type}]`)
}

/**
 * Format a streaming message as a single terminal line
 */
export function formatMessage(message: StreamingMessage): string {
	switch (message.type) {
		case "status": {
			const author = message.status.user
				? chalk.cyan(`@${message.status.user.screen_name}`)
				: chalk.dim("@?")
			return `${author} ${singleLine(message.status.text)}`
		}
		case "direct_message": {
			const sender = message.directMessage.sender_screen_name ?? "?"
			return `${label("dm")} ${chalk.magenta(`@${sender}`)} ${singleLine(message.directMessage.text)}`
		}
		case "delete": {
			const item = message.deletion.status ?? message.deletion.direct_message
			return `${label("delete")} ${item ? `${item.id_str} by ${item.user_id_str}` : "?"}`
		}
		case "scrub_geo":
			return `${label("scrub_geo")} user ${message.scrubGeo.user_id_str} up to ${message.scrubGeo.up_to_status_id_str}`
		case "limit":
			return chalk.yellow(`${label("limit")} ${message.limit.track} undelivered`)
		case "status_withheld":
			return `${label("withheld")} status ${message.withheld.id} in ${message.withheld.withheld_in_countries.join(",")}`
		case "user_withheld":
			return `${label("withheld")} user ${message.withheld.id} in ${message.withheld.withheld_in_countries.join(",")}`
		case "disconnect":
			return chalk.red(
				`${label("disconnect")} ${message.disconnect.code} ${message.disconnect.reason}`,
			)
		case "warning": {
			const percent =
				message.warning.percent_full === undefined ? "" : ` (${message.warning.percent_full}%)`
			return chalk.yellow(`${label("warning")} ${message.warning.code}${percent}`)
		}
		case "friends":
			return `${label("friends")} ${message.friendIds.length} ids`
		case "event": {
			const source = message.event.source ? `@${message.event.source.screen_name}` : "?"
			const target = message.event.target ? ` → @${message.event.target.screen_name}` : ""
			return `${label("event")} ${chalk.green(message.event.event)} ${source}${target}`
		}
		case "envelope":
			return `${chalk.dim(`for ${message.forUser}`)} ${formatMessage(message.message)}`
		case "control":
			return `${label("control")} ${message.controlUri}`
		case "raw":
			return chalk.red(
				`${label("raw")} ${message.error.reason}: ${truncate(singleLine(message.json), 80)}`,
			)
	}
}

/**
 * JSON shape for --json output
 *
 * Raw messages carry the error reason and message instead of the error object.
 */
export function toJsonRecord(message: StreamingMessage): unknown {
	switch (message.type) {
		case "raw":
			return {
				type: "raw",
				json: message.json,
				error: { reason: message.error.reason, message: message.error.message },
			}
		case "envelope":
			return { type: "envelope", forUser: message.forUser, message: toJsonRecord(message.message) }
		default:
			return message
	}
}
