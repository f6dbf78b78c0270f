/**
 * Terminal output helpers with consistent styling
 *
 * Every message is mirrored to pino at debug level so log files keep the
 * same trail as the terminal.
 */

import chalk from "chalk"
import { log } from "./logger.js"

function print(message: string): void {
	log.cli.debug(message)
	console.log(message)
}

export const ui = {
	/** Success message with checkmark */
	success(text: string): void {
		print(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		log.cli.debug(text)
		console.error(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		print(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		print(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			print(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(version: string, input: string, output: string): void {
		console.log(chalk.bold("DAT → Playlist") + ` v${version}`)
		console.log(`Catalog: ${chalk.cyan(input)}`)
		console.log(`Output: ${chalk.cyan(output)}`)
		console.log()
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},
}
