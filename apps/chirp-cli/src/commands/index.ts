/**
 * Command registry
 */

import type { OutputConfig } from "../output.js"
import * as tail from "./tail.js"

export interface CommandContext {
	args: string[]
	output: OutputConfig
	/** Environment for credentials and endpoint overrides (default process.env) */
	env?: Readonly<Record<string, string | undefined>>
}

export interface Command {
	run: (context: CommandContext) => Promise<void>
	description: string
}

export const commands: Record<string, Command> = {
	tail,
}
