/**
 * CSV report output
 */

import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { stringify } from "csv-stringify/sync"
import { log } from "./logger.js"
import type { MatchResult } from "./types.js"

export const REPORT_FILENAME = "RA_HashMapReport.csv"

export const REPORT_COLUMNS = [
	"MatchFound",
	"System",
	"RomName",
	"Hash",
	"Path",
	"RATitle",
	"RAID",
	"CheevoCount",
] as const

/** Cells in REPORT_COLUMNS order; unmatched rows leave the RA cells empty */
export function toReportRow(result: MatchResult): string[] {
	return [
		result.matchFound ? "true" : "false",
		result.system,
		result.romName,
		result.hash,
		result.path,
		result.title ?? "",
		result.gameId === null ? "" : String(result.gameId),
		result.achievementCount === null ? "" : String(result.achievementCount),
	]
}

/** Keep only ROMs without a RetroAchievements match */
export function filterMissing(results: readonly MatchResult[]): MatchResult[] {
	return results.filter(result => !result.matchFound)
}

export function formatReport(results: readonly MatchResult[]): string {
	return stringify([[...REPORT_COLUMNS], ...results.map(toReportRow)])
}

/**
 * Write the report into outputDirectory (created if needed) and return its path
 */
export async function writeReport(
	results: readonly MatchResult[],
	outputDirectory: string,
): Promise<string> {
	await mkdir(outputDirectory, { recursive: true })
	const reportPath = join(outputDirectory, REPORT_FILENAME)
	await writeFile(reportPath, formatReport(results), "utf8")
	log.report.info({ reportPath, rows: results.length }, "report written")
	return reportPath
}
