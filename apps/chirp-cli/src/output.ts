/**
 * Output helpers
 *
 * Pretty mode writes colored lines for humans; json mode writes one JSON
 * document per line for pipes and agents. Errors always go to stderr.
 */

import chalk from "chalk"

export type OutputMode = "pretty" | "json"

export interface OutputConfig {
	mode: OutputMode
}

/**
 * Write one record in the selected mode
 */
export function writeLine(output: OutputConfig, pretty: string, data: unknown): void {
	if (output.mode === "json") {
		console.log(JSON.stringify(data))
		return
	}
	console.log(pretty)
}

/**
 * Write an error with optional details to stderr
 */
export function writeError(message: string, details?: Record<string, unknown>): void {
	console.error(chalk.red(`✗ ${message}`))
	if (!details) return
	for (const [key, value] of Object.entries(details)) {
		if (value === undefined) continue
		console.error(chalk.dim(`  ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`))
	}
}
