/**
 * Streaming parameter tests
 */

import { describe, it, expect } from "vitest"
import {
	emptyStreamingParameters,
	makeStreamingParameters,
	serializeParameterValue,
	toSearchParams,
} from "./parameters.js"

describe("makeStreamingParameters", () => {
	it("keeps record insertion order", () => {
		const params = makeStreamingParameters({ track: "cats", follow: [1, 2], stall_warnings: true })

		expect(params.map(([name]) => name)).toEqual(["track", "follow", "stall_warnings"])
	})

	it("accepts entries and skips null and undefined values", () => {
		const params = makeStreamingParameters([
			["track", "cats"],
			["with", undefined],
			["locations", null],
		])

		expect(params).toEqual([["track", "cats"]])
	})

	it("is frozen", () => {
		const params = makeStreamingParameters({ track: "cats" })

		expect(Object.isFrozen(params)).toBe(true)
	})

	it("defaults to an empty set", () => {
		expect(makeStreamingParameters()).toEqual([])
		expect(emptyStreamingParameters).toEqual([])
	})
})

describe("serializeParameterValue", () => {
	it("serializes booleans in lower case", () => {
		expect(serializeParameterValue(true)).toBe("true")
		expect(serializeParameterValue(false)).toBe("false")
	})

	it("joins collections with commas", () => {
		expect(serializeParameterValue(["cats", "dogs"])).toBe("cats,dogs")
		expect(serializeParameterValue([12, 34])).toBe("12,34")
	})

	it("passes strings and numbers through", () => {
		expect(serializeParameterValue("-122.75,36.8")).toBe("-122.75,36.8")
		expect(serializeParameterValue(42)).toBe("42")
	})
})

describe("toSearchParams", () => {
	it("form-encodes every entry in order", () => {
		const params = makeStreamingParameters({
			track: ["hello world", "#tag"],
			stall_warnings: true,
		})

		expect(toSearchParams(params).toString()).toBe(
			"track=hello+world%2C%23tag&stall_warnings=true",
		)
	})
})
