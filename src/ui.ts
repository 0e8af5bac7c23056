/**
 * Terminal output helpers with consistent styling
 *
 * Progress-aware: while a transfer bar is on screen, all output goes through
 * progressSafeLog() so lines land above the bar instead of tearing it.
 */

import chalk from "chalk"
import { progressSafeLog } from "./progress.js"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		progressSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Error message with X mark */
	error(text: string): void {
		progressSafeLog(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		progressSafeLog(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		progressSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Note for a file given up on while the run carries on */
	note(text: string): void {
		progressSafeLog(chalk.magenta("!") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			progressSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(version: string, target: string, catalog: string, filter?: string): void {
		console.log(chalk.bold("shelfsync") + ` v${version}`)
		console.log(`Target: ${chalk.cyan(target)}`)
		console.log(`Catalog: ${chalk.cyan(catalog)}`)
		if (filter) {
			console.log(`Filter: ${chalk.cyan(filter)}`)
		}
		console.log()
	},

	/** Dry run warning banner */
	dryRunBanner(): void {
		console.log(chalk.yellow.bold("═══ DRY RUN MODE ═══"))
		console.log("No files will be downloaded. Showing what would happen.")
		console.log()
	},

	/** List of failed items for the summary */
	failureSection(title: string, items: string[]): void {
		if (items.length === 0) return
		console.log(chalk.red(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ✗ ${item}`)
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All downloads completed successfully!"))
		} else {
			console.log(
				chalk.yellow.bold("⚠ Some downloads failed. See above for details."),
			)
		}
		console.log()
	},
}
