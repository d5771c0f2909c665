/**
 * Streaming parameters
 *
 * Ordered name/value pairs, fixed once built. Serialized per entry:
 * booleans as "true"/"false", arrays comma-joined, numbers as decimals.
 *
 * Note: filter streams need at least one of track, follow or locations.
 * That is checked by the server, not here.
 */

export type StreamingParameterValue = string | number | boolean | ReadonlyArray<string | number>

export type StreamingParameters = ReadonlyArray<readonly [string, StreamingParameterValue]>

export type StreamingParameterInput =
	| Readonly<Record<string, StreamingParameterValue | null | undefined>>
	| Iterable<readonly [string, StreamingParameterValue | null | undefined]>

function isEntryIterable(
	input: StreamingParameterInput,
): input is Iterable<readonly [string, StreamingParameterValue | null | undefined]> {
	return Symbol.iterator in input
}

/**
 * Build StreamingParameters from a record or from entries
 *
 * @example
 * ```typescript
 * makeStreamingParameters({ track: ["cats", "dogs"], stall_warnings: true })
 * makeStreamingParameters([["follow", [12, 34]]])
 * ```
 */
export function makeStreamingParameters(input: StreamingParameterInput = {}): StreamingParameters {
	const source = isEntryIterable(input) ? Array.from(input) : Object.entries(input)
	const entries: Array<readonly [string, StreamingParameterValue]> = []

	for (const [name, value] of source) {
		if (value === undefined || value === null) continue
		entries.push(Object.freeze([name, value] as const))
	}

	return Object.freeze(entries)
}

export const emptyStreamingParameters: StreamingParameters = makeStreamingParameters()

/**
 * Serialize a single parameter value
 */
export function serializeParameterValue(value: StreamingParameterValue): string {
	if (typeof value === "boolean") return value ? "true" : "false"
	if (typeof value === "number") return String(value)
	if (typeof value === "string") return value
	return value.map(String).join(",")
}

/**
 * Encode parameters as application/x-www-form-urlencoded, preserving order
 */
export function toSearchParams(parameters: StreamingParameters): URLSearchParams {
	const params = new URLSearchParams()
	for (const [name, value] of parameters) {
		params.append(name, serializeParameterValue(value))
	}
	return params
}
