/**
 * Tail command - print messages from a streaming endpoint as they arrive
 *
 * Usage:
 *   chirp tail sample                    # Public sample
 *   chirp tail filter --track cats,dogs  # Filtered statuses
 *   chirp tail user --limit 20 --json    # 20 messages as JSON lines
 */

import { Either, Schema } from "effect"
import {
	StreamType,
	makeStreamingParameters,
	streaming,
	streamingConfigFromEnv,
	type FetchTransportOptions,
	type StreamingError,
	type StreamingParameters,
} from "@chirpstream/core"
import type { CommandContext } from "./index.js"
import { writeError, writeLine } from "../output.js"
import { formatMessage, toJsonRecord } from "../formatters/message-formatter.js"

export interface TailOptions {
	streamType?: string
	track?: string[]
	follow?: string[]
	locations?: string[]
	stallWarnings?: boolean
	with?: string
	limit?: number
	json?: boolean
	help?: boolean
}

export interface TailDependencies {
	/** fetch implementation (default: global fetch) */
	fetch?: typeof fetch
}

function splitList(value: string | undefined): string[] {
	if (!value) return []
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0)
}

/**
 * Parse command-line arguments into options
 */
export function parseArgs(args: string[]): TailOptions {
	const options: TailOptions = {}

	for (let i = 0; i < args.length; i++) {
		const arg = args[i]
		switch (arg) {
			case "--track":
				options.track = splitList(args[++i])
				break
			case "--follow":
				options.follow = splitList(args[++i])
				break
			case "--locations":
				options.locations = splitList(args[++i])
				break
			case "--stall-warnings":
				options.stallWarnings = true
				break
			case "--with":
				options.with = args[++i]
				break
			case "--limit": {
				const limitValue = args[i + 1]
				const limit = limitValue ? Number(limitValue) : Number.NaN
				options.limit = Number.isInteger(limit) && limit > 0 ? limit : undefined
				i++ // Skip the value
				break
			}
			case "--json":
				options.json = true
				break
			case "--help":
			case "-h":
				options.help = true
				break
			default:
				if (arg !== undefined && !arg.startsWith("-") && options.streamType === undefined) {
					options.streamType = arg
				}
		}
	}

	return options
}

/**
 * Map CLI options onto request parameters, in wire order
 */
export function buildParameters(options: TailOptions): StreamingParameters {
	return makeStreamingParameters([
		["track", options.track?.length ? options.track : undefined],
		["follow", options.follow?.length ? options.follow : undefined],
		["locations", options.locations?.length ? options.locations : undefined],
		["stall_warnings", options.stallWarnings],
		["with", options.with],
	])
}

/**
 * Credentials come from the environment; signing is done elsewhere
 */
export function transportOptionsFromEnv(
	env: Readonly<Record<string, string | undefined>>,
	dependencies: TailDependencies = {},
): FetchTransportOptions {
	const authorization = env.CHIRPSTREAM_AUTHORIZATION
	return {
		fetch: dependencies.fetch,
		userAgent: "chirp-cli",
		authorize: authorization ? () => ({ Authorization: authorization }) : undefined,
	}
}

function describeError(error: unknown): Record<string, unknown> {
	if (isStreamingError(error)) {
		return error._tag === "ConnectionError"
			? { url: error.url, status: error.status, error: error.message }
			: { streamType: error.streamType }
	}
	return { error: error instanceof Error ? error.message : String(error) }
}

function isStreamingError(error: unknown): error is StreamingError {
	return (
		error instanceof Error &&
		"_tag" in error &&
		(error._tag === "ConnectionError" || error._tag === "InvalidStreamTypeError")
	)
}

/**
 * Show command help
 */
function showHelp(): void {
	console.log(`
Print messages from a streaming endpoint as they arrive.

Usage:
  chirp tail <type> [options]

Types:
  user, site, filter, sample, firehose

Options:
  --track a,b          Phrases to track (filter)
  --follow 1,2         User ids to follow (filter, site)
  --locations w,s,e,n  Bounding boxes (filter)
  --stall-warnings     Ask for stall warnings
  --with user          user | followings (user, site)
  --limit N            Stop after N messages
  --json               One JSON document per line
  --help, -h           Show this message

Environment:
  CHIRPSTREAM_AUTHORIZATION   Sent as the Authorization header
  CHIRPSTREAM_STREAM_URL      Override the public stream base URL
  CHIRPSTREAM_USER_STREAM_URL Override the user stream base URL
  CHIRPSTREAM_SITE_STREAM_URL Override the site stream base URL
  CHIRPSTREAM_API_VERSION     Override the API version (default 1.1)

Examples:
  chirp tail sample --limit 10
  chirp tail filter --track cats,dogs --stall-warnings
  chirp tail user --with followings --json
`)
}

/**
 * Run the tail command
 */
export async function run(context: CommandContext, dependencies: TailDependencies = {}): Promise<void> {
	const options = parseArgs(context.args)

	if (options.help) {
		showHelp()
		return
	}

	const streamType = Schema.decodeUnknownEither(StreamType)(options.streamType)
	if (Either.isLeft(streamType)) {
		writeError(`Unknown stream type: ${options.streamType ?? "(none)"}`, {
			expected: "user, site, filter, sample, firehose",
		})
		process.exitCode = 1
		return
	}

	const env = context.env ?? process.env
	const output = options.json ? { mode: "json" as const } : context.output
	let count = 0

	try {
		for await (const message of streaming.iterate(streamType.right, buildParameters(options), {
			transport: transportOptionsFromEnv(env, dependencies),
			config: streamingConfigFromEnv(env),
		})) {
			writeLine(output, formatMessage(message), toJsonRecord(message))
			count++
			if (options.limit !== undefined && count >= options.limit) break
		}
	} catch (error) {
		writeError("Stream failed", describeError(error))
		process.exitCode = 1
	}
}

export const description = "Print messages from a streaming endpoint"
