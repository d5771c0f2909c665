/**
 * Endpoint resolution tests
 */

import { describe, it, expect } from "vitest"
import { Effect, Either } from "effect"
import { buildUrl, resolveEndpoint } from "./endpoint.js"
import { defaultStreamingConfig } from "./config.js"
import { STREAM_TYPES } from "./types.js"

const resolve = (streamType: string) =>
	Effect.runSync(Effect.either(resolveEndpoint(streamType, defaultStreamingConfig)))

describe("buildUrl", () => {
	it("inserts the version segment", () => {
		expect(buildUrl("https://stream.example.com", true, "statuses/sample.json", "1.1")).toBe(
			"https://stream.example.com/1.1/statuses/sample.json",
		)
	})

	it("drops trailing slashes on the base", () => {
		expect(buildUrl("https://stream.example.com//", true, "user.json", "2")).toBe(
			"https://stream.example.com/2/user.json",
		)
	})

	it("omits the version when not requested", () => {
		expect(buildUrl("https://stream.example.com/", false, "site.json", "1.1")).toBe(
			"https://stream.example.com/site.json",
		)
	})
})

describe("resolveEndpoint", () => {
	it.each([
		["user", "GET", "https://userstream.twitter.com/1.1/user.json"],
		["site", "GET", "https://sitestream.twitter.com/1.1/site.json"],
		["filter", "POST", "https://stream.twitter.com/1.1/statuses/filter.json"],
		["sample", "GET", "https://stream.twitter.com/1.1/statuses/sample.json"],
		["firehose", "GET", "https://stream.twitter.com/1.1/statuses/firehose.json"],
	])("maps %s to %s %s", (streamType, method, url) => {
		const result = resolve(streamType)

		expect(Either.isRight(result)).toBe(true)
		if (Either.isRight(result)) {
			expect(result.right).toEqual({ method, url })
		}
	})

	it("covers every stream type", () => {
		for (const streamType of STREAM_TYPES) {
			expect(Either.isRight(resolve(streamType))).toBe(true)
		}
	})

	it("uses the configured base for each family", () => {
		const config = {
			...defaultStreamingConfig,
			userStreamUrl: "https://user.test/",
			streamUrl: "https://public.test",
		}

		const user = Effect.runSync(resolveEndpoint("user", config))
		const filter = Effect.runSync(resolveEndpoint("filter", config))

		expect(user.url).toBe("https://user.test/1.1/user.json")
		expect(filter.url).toBe("https://public.test/1.1/statuses/filter.json")
	})

	it("fails with InvalidStreamTypeError for unknown types", () => {
		const result = resolve("retweets")

		expect(Either.isLeft(result)).toBe(true)
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("InvalidStreamTypeError")
			expect(result.left.streamType).toBe("retweets")
			expect(result.left.message).toBe("Invalid stream type: retweets")
		}
	})

	it("does not treat prototype keys as stream types", () => {
		expect(Either.isLeft(resolve("toString"))).toBe(true)
	})
})
