/**
 * Per-system and overall counts for the end-of-run summary
 */

import type { MatchResult } from "../types.js"

export interface SystemStats {
	system: string
	total: number
	matched: number
	unmatched: number
	/** Unmatched because the tool produced no usable hash */
	hashFailures: number
}

export interface RunStats {
	systems: SystemStats[]
	totals: Omit<SystemStats, "system">
}

export function summarizeResults(results: readonly MatchResult[]): RunStats {
	const bySystem = new Map<string, SystemStats>()
	const totals = { total: 0, matched: 0, unmatched: 0, hashFailures: 0 }

	for (const result of results) {
		let stats = bySystem.get(result.system)
		if (!stats) {
			stats = {
				system: result.system,
				total: 0,
				matched: 0,
				unmatched: 0,
				hashFailures: 0,
			}
			bySystem.set(result.system, stats)
		}

		const hashFailed = !result.matchFound && result.reason === "hash-failed"
		for (const bucket of [stats, totals]) {
			bucket.total++
			if (result.matchFound) bucket.matched++
			else bucket.unmatched++
			if (hashFailed) bucket.hashFailures++
		}
	}

	return { systems: [...bySystem.values()], totals }
}
