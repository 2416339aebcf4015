/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: while a progress spinner is active, output goes through
 * spinnerSafeLog() to avoid overwriting the spinner line.
 */

import chalk from "chalk"
import { spinnerSafeLog } from "./progress.js"
import type { RunStats } from "./core/stats.js"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(
		version: string,
		libraryRoot: string,
		outputDirectory: string,
		missingOnly: boolean,
	): void {
		console.log(chalk.bold("cheevo-scan") + ` v${version}`)
		console.log(`Library: ${chalk.cyan(libraryRoot)}`)
		console.log(`Report:  ${chalk.cyan(outputDirectory)}`)
		if (missingOnly) {
			console.log(`Filter:  ${chalk.cyan("unmatched ROMs only")}`)
		}
		console.log()
	},

	/** Per-system table plus totals */
	summary(stats: RunStats): void {
		console.log()
		for (const system of stats.systems) {
			const failures =
				system.hashFailures > 0
					? chalk.red(`, ${system.hashFailures} hash failures`)
					: ""
			console.log(
				`  ${chalk.bold(system.system)}: ${chalk.green(`${system.matched} matched`)}, ${chalk.yellow(`${system.unmatched} unmatched`)} of ${system.total}${failures}`,
			)
		}
		console.log()
		const { totals } = stats
		const line = `${totals.matched}/${totals.total} ROMs have a RetroAchievements-compatible hash`
		console.log(
			totals.unmatched === 0 ? chalk.green.bold(line) : chalk.yellow.bold(line),
		)
		console.log()
	},
}
