/**
 * Tests for the message formatter
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest"
import chalk from "chalk"
import { decodeLine } from "@chirpstream/core"
import { formatMessage, singleLine, toJsonRecord, truncate } from "./message-formatter.js"

// Plain text unless a test asks for color
beforeAll(() => {
	chalk.level = 0
})

afterAll(() => {
	chalk.level = 0
})

describe("singleLine", () => {
	test("collapses line breaks and surrounding space", () => {
		expect(singleLine("one\n  two\r\nthree ")).toBe("one two three")
	})
})

describe("truncate", () => {
	test("keeps short text", () => {
		expect(truncate("short", 10)).toBe("short")
	})

	test("cuts long text with an ellipsis", () => {
		expect(truncate("abcdefghij", 5)).toBe("abcd…")
	})
})

describe("formatMessage", () => {
	test.each([
		['{"text":"hello\\nworld","user":{"id_str":"1","screen_name":"alice"}}', "@alice hello world"],
		['{"text":"hi"}', "@? hi"],
		['{"direct_message":{"id_str":"3","text":"psst","sender_screen_name":"carol"}}', "[dm] @carol psst"],
		['{"delete":{"status":{"id_str":"9","user_id_str":"8"}}}', "[delete] 9 by 8"],
		['{"scrub_geo":{"user_id_str":"4","up_to_status_id_str":"40"}}', "[scrub_geo] user 4 up to 40"],
		['{"limit":{"track":42}}', "[limit] 42 undelivered"],
		[
			'{"status_withheld":{"id":1,"user_id":2,"withheld_in_countries":["DE","FR"]}}',
			"[withheld] status 1 in DE,FR",
		],
		['{"user_withheld":{"id":2,"withheld_in_countries":["TR"]}}', "[withheld] user 2 in TR"],
		['{"disconnect":{"code":4,"reason":"duplicate stream"}}', "[disconnect] 4 duplicate stream"],
		[
			'{"warning":{"code":"FALLING_BEHIND","message":"queue filling","percent_full":60}}',
			"[warning] FALLING_BEHIND (60%)",
		],
		['{"warning":{"code":"FALLING_BEHIND","message":"queue filling"}}', "[warning] FALLING_BEHIND"],
		['{"friends":[1,2,3]}', "[friends] 3 ids"],
		[
			'{"event":"favorite","source":{"id_str":"1","screen_name":"alice"},"target":{"id_str":"2","screen_name":"bob"}}',
			"[event] favorite @alice → @bob",
		],
		['{"event":"user_update"}', "[event] user_update ?"],
		['{"for_user":"77","message":{"text":"hey"}}', "for 77 @? hey"],
		['{"control":{"control_uri":"/1.1/site/c/abc"}}', "[control] /1.1/site/c/abc"],
		["not json", "[raw] syntax: not json"],
		['{"mystery":1}', '[raw] unrecognized: {"mystery":1}'],
	])("formats %s", (line, expected) => {
		expect(formatMessage(decodeLine(line))).toBe(expected)
	})

	test("truncates long raw lines", () => {
		const line = "x".repeat(100)
		expect(formatMessage(decodeLine(line))).toBe(`[raw] syntax: ${"x".repeat(79)}…`)
	})

	test("colors raw lines red", () => {
		chalk.level = 3
		try {
			expect(formatMessage(decodeLine("nope"))).toBe(
				chalk.red(`${chalk.dim("[raw]")} syntax: nope`),
			)
		} finally {
			chalk.level = 0
		}
	})
})

describe("toJsonRecord", () => {
	test("keeps decoded payloads", () => {
		expect(JSON.parse(JSON.stringify(toJsonRecord(decodeLine('{"limit":{"track":7}}'))))).toEqual({
			type: "limit",
			limit: { track: 7 },
		})
	})

	test("replaces the error object on raw messages", () => {
		expect(toJsonRecord(decodeLine('{"mystery":1}'))).toEqual({
			type: "raw",
			json: '{"mystery":1}',
			error: { reason: "unrecognized", message: "Unsupported streaming message: mystery" },
		})
	})

	test("unwraps nested envelope messages", () => {
		expect(toJsonRecord(decodeLine('{"for_user":5,"message":{"oops":true}}'))).toMatchObject({
			type: "raw",
			error: { reason: "unrecognized" },
		})
		expect(
			JSON.parse(JSON.stringify(toJsonRecord(decodeLine('{"for_user":5,"message":{"text":"a"}}')))),
		).toEqual({ type: "envelope", forUser: "5", message: { type: "status", status: { text: "a" } } })
	})
})
