/**
 * streaming namespace tests
 */

import { describe, it, expect, vi } from "vitest"
import { Chunk, Effect, Stream } from "effect"
import { streaming } from "./streaming.js"

function fetchReturning(body: string) {
	return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
		new Response(body, { status: 200 }),
	)
}

describe("streaming.connect", () => {
	it("serializes parameters and decodes messages", async () => {
		const fetchFn = fetchReturning('{"text":"hello"}\n{"limit":{"track":3}}\n')

		const messages = await Effect.runPromise(
			Stream.runCollect(
				streaming.connect(
					"filter",
					{ track: ["cats"], stall_warnings: true },
					{ transport: { fetch: fetchFn }, config: { streamUrl: "https://stream.test/" } },
				),
			),
		)

		expect(Chunk.toArray(messages).map((message) => message.type)).toEqual(["status", "limit"])
		const [input, init] = fetchFn.mock.calls[0] ?? []
		expect(input).toBe("https://stream.test/1.1/statuses/filter.json")
		expect(init?.body).toBe("track=cats&stall_warnings=true")
	})

	it("uses configured user stream bases", async () => {
		const fetchFn = fetchReturning("")

		await Effect.runPromise(
			Stream.runDrain(
				streaming.connect("user", undefined, {
					transport: { fetch: fetchFn },
					config: { userStreamUrl: "https://user.stream.test", apiVersion: "2" },
				}),
			),
		)

		expect(fetchFn.mock.calls[0]?.[0]).toBe("https://user.stream.test/2/user.json")
	})
})

describe("streaming.iterate", () => {
	it("stops reading when the loop breaks", async () => {
		let signal: { readonly aborted: boolean } | undefined
		const fetchFn = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
			signal = init?.signal ?? undefined
			return new Response('{"text":"one"}\n{"text":"two"}\n', { status: 200 })
		})
		const seen: string[] = []

		for await (const message of streaming.iterate("sample", {}, { transport: { fetch: fetchFn } })) {
			if (message.type === "status") seen.push(message.status.text)
			break
		}

		expect(seen).toEqual(["one"])
		expect(signal?.aborted).toBe(true)
	})
})
