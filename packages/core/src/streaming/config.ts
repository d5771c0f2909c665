/**
 * Streaming configuration
 *
 * Base URLs per stream family plus the API version segment.
 * Provided through a Context tag so tests and the CLI can swap it.
 */

import { Context, Layer } from "effect"

export interface StreamingConfigShape {
	/** Base for the user stream */
	readonly userStreamUrl: string
	/** Base for the site stream */
	readonly siteStreamUrl: string
	/** Base shared by filter, sample and firehose */
	readonly streamUrl: string
	/** Version segment inserted after the base (e.g. "1.1") */
	readonly apiVersion: string
}

export const defaultStreamingConfig: StreamingConfigShape = {
	userStreamUrl: "https://userstream.twitter.com",
	siteStreamUrl: "https://sitestream.twitter.com",
	streamUrl: "https://stream.twitter.com",
	apiVersion: "1.1",
}

export class StreamingConfig extends Context.Tag("StreamingConfig")<
	StreamingConfig,
	StreamingConfigShape
>() {}

/**
 * Read configuration from environment variables, falling back to defaults
 */
export function streamingConfigFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): StreamingConfigShape {
	return {
		userStreamUrl: env.CHIRPSTREAM_USER_STREAM_URL || defaultStreamingConfig.userStreamUrl,
		siteStreamUrl: env.CHIRPSTREAM_SITE_STREAM_URL || defaultStreamingConfig.siteStreamUrl,
		streamUrl: env.CHIRPSTREAM_STREAM_URL || defaultStreamingConfig.streamUrl,
		apiVersion: env.CHIRPSTREAM_API_VERSION || defaultStreamingConfig.apiVersion,
	}
}

/**
 * Layer with explicit overrides on top of the defaults
 */
export const makeStreamingConfigLayer = (
	overrides: Partial<StreamingConfigShape> = {},
): Layer.Layer<StreamingConfig> =>
	Layer.succeed(StreamingConfig, { ...defaultStreamingConfig, ...overrides })

/**
 * StreamingConfigLive - configuration from process.env
 */
export const StreamingConfigLive: Layer.Layer<StreamingConfig> = Layer.sync(StreamingConfig, () =>
	streamingConfigFromEnv(),
)
