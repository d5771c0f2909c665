/**
 * @chirpstream/core
 *
 * Typed client for long-lived streaming endpoints.
 *
 * ```typescript
 * import { streaming } from "@chirpstream/core"
 *
 * for await (const message of streaming.iterate("filter", { track: ["cats"] })) {
 *   console.log(message.type)
 * }
 * ```
 */

export * from "./streaming/index.js"
export { streaming, StreamingLive, makeStreamingLayer, type StreamingOptions } from "./api/streaming.js"
