/**
 * Spinner-based progress for the hashing loop
 *
 * Only one spinner is ever active because ROMs are processed one at a time.
 */

import ora, { type Ora } from "ora"
import { log } from "./logger.js"

// Global spinner reference for spinner-safe logging
let activeSpinner: Ora | null = null

/**
 * Print a line without tearing the active spinner, if any.
 */
export function spinnerSafeLog(message: string): void {
	// Also log to pino for structured logging
	log.cli.debug(message)

	if (activeSpinner) {
		const text = activeSpinner.text
		activeSpinner.stop()
		console.log(message)
		activeSpinner.start(text)
	} else {
		console.log(message)
	}
}

export function formatProgress(
	label: string,
	current: number,
	total: number,
): string {
	const pct = total > 0 ? Math.floor((current / total) * 100) : 100
	return `${label}: ${current}/${total} (${pct}%)`
}

export interface ProgressTracker {
	start(label: string, total: number): void
	update(current: number): void
	finish(summary: string, ok: boolean): void
	stop(): void
}

/**
 * Create a progress tracker; quiet mode returns a no-op implementation
 */
export function createProgressTracker(quiet: boolean): ProgressTracker {
	if (quiet) {
		return {
			start: () => {},
			update: () => {},
			finish: () => {},
			stop: () => {},
		}
	}

	let label = ""
	let total = 0

	return {
		start(nextLabel, nextTotal) {
			label = nextLabel
			total = nextTotal
			activeSpinner = ora(formatProgress(label, 0, total)).start()
		},
		update(current) {
			if (activeSpinner) {
				activeSpinner.text = formatProgress(label, current, total)
			}
		},
		finish(summary, ok) {
			if (!activeSpinner) return
			if (ok) activeSpinner.succeed(summary)
			else activeSpinner.warn(summary)
			activeSpinner = null
		},
		stop() {
			activeSpinner?.stop()
			activeSpinner = null
		},
	}
}
