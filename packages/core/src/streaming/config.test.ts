/**
 * Streaming config tests
 */

import { describe, it, expect } from "vitest"
import { Effect } from "effect"
import {
	StreamingConfig,
	defaultStreamingConfig,
	makeStreamingConfigLayer,
	streamingConfigFromEnv,
} from "./config.js"

describe("streamingConfigFromEnv", () => {
	it("falls back to defaults", () => {
		expect(streamingConfigFromEnv({})).toEqual(defaultStreamingConfig)
	})

	it("reads overrides from the environment", () => {
		const config = streamingConfigFromEnv({
			CHIRPSTREAM_STREAM_URL: "http://127.0.0.1:8080",
			CHIRPSTREAM_API_VERSION: "2",
		})

		expect(config.streamUrl).toBe("http://127.0.0.1:8080")
		expect(config.apiVersion).toBe("2")
		expect(config.userStreamUrl).toBe(defaultStreamingConfig.userStreamUrl)
	})

	it("ignores empty values", () => {
		expect(streamingConfigFromEnv({ CHIRPSTREAM_SITE_STREAM_URL: "" }).siteStreamUrl).toBe(
			"https://sitestream.twitter.com",
		)
	})
})

describe("makeStreamingConfigLayer", () => {
	it("merges overrides over defaults", () => {
		const config = Effect.runSync(
			StreamingConfig.pipe(Effect.provide(makeStreamingConfigLayer({ apiVersion: "9" }))),
		)

		expect(config).toEqual({ ...defaultStreamingConfig, apiVersion: "9" })
	})
})
