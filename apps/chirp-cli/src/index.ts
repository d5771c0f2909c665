#!/usr/bin/env tsx
/**
 * chirp - terminal client for streaming endpoints
 *
 * Usage:
 *   chirp <command> [options]
 *   chirp tail sample --limit 10
 */

import chalk from "chalk"
import { commands } from "./commands/index.js"
import { writeError } from "./output.js"

function showUsage(): void {
	console.log(`
${chalk.bold("chirp")} - tail streaming endpoints

Usage:
  chirp <command> [options]

Commands:
${Object.entries(commands)
	.map(([name, command]) => `  ${name.padEnd(12)} ${command.description}`)
	.join("\n")}

Run "chirp <command> --help" for command options.
`)
}

async function main(argv: string[]): Promise<void> {
	const [name, ...args] = argv

	if (!name || name === "--help" || name === "-h") {
		showUsage()
		return
	}

	const command = Object.hasOwn(commands, name) ? commands[name] : undefined
	if (!command) {
		writeError(`Unknown command: ${name}`)
		showUsage()
		process.exitCode = 1
		return
	}

	await command.run({ args, output: { mode: "pretty" } })
}

main(process.argv.slice(2)).catch((error: unknown) => {
	writeError("Unexpected error", {
		error: error instanceof Error ? error.message : String(error),
	})
	process.exitCode = 1
})
