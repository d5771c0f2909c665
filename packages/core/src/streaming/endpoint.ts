/**
 * Endpoint resolution
 *
 * Static table from stream type to HTTP method, base URL family and path.
 * Filter is the only POST; everything else is a GET.
 */

import { Effect } from "effect"
import type { StreamingConfigShape } from "./config.js"
import { InvalidStreamTypeError } from "./errors.js"
import { isStreamType, type HttpMethod, type StreamType } from "./types.js"

type BaseUrlKey = "userStreamUrl" | "siteStreamUrl" | "streamUrl"

interface EndpointEntry {
	readonly method: HttpMethod
	readonly base: BaseUrlKey
	readonly path: string
}

export const STREAM_ENDPOINTS: Readonly<Record<StreamType, EndpointEntry>> = {
	user: { method: "GET", base: "userStreamUrl", path: "user.json" },
	site: { method: "GET", base: "siteStreamUrl", path: "site.json" },
	filter: { method: "POST", base: "streamUrl", path: "statuses/filter.json" },
	sample: { method: "GET", base: "streamUrl", path: "statuses/sample.json" },
	firehose: { method: "GET", base: "streamUrl", path: "statuses/firehose.json" },
}

export interface StreamEndpoint {
	readonly method: HttpMethod
	readonly url: string
}

/**
 * Join a base URL and a resource path
 *
 * Trailing slashes on the base are dropped. When includeVersion is set the
 * API version segment goes between base and path.
 *
 * @example
 * ```typescript
 * buildUrl("https://stream.twitter.com/", true, "statuses/sample.json", "1.1")
 * // => "https://stream.twitter.com/1.1/statuses/sample.json"
 * ```
 */
export function buildUrl(
	baseUrl: string,
	includeVersion: boolean,
	resourcePath: string,
	apiVersion: string,
): string {
	let url = baseUrl.replace(/\/+$/, "")
	if (includeVersion) {
		url += `/${apiVersion}`
	}
	return `${url}/${resourcePath}`
}

/**
 * Resolve the URL and method for a stream type
 *
 * Accepts any string so corrupted or forward-dated input fails with
 * InvalidStreamTypeError instead of an undefined lookup.
 */
export function resolveEndpoint(
	streamType: string,
	config: StreamingConfigShape,
): Effect.Effect<StreamEndpoint, InvalidStreamTypeError> {
	if (!isStreamType(streamType)) {
		return Effect.fail(
			new InvalidStreamTypeError({
				streamType,
				message: `Invalid stream type: ${streamType}`,
			}),
		)
	}

	const entry = STREAM_ENDPOINTS[streamType]
	return Effect.succeed({
		method: entry.method,
		url: buildUrl(config[entry.base], true, entry.path, config.apiVersion),
	})
}
