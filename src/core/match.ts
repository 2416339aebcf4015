/**
 * Match engine: one ROM in, one frozen MatchResult out
 */

import type { HashOutcome, Hasher } from "../hasher.js"
import { log } from "../logger.js"
import type {
	CatalogEntry,
	LocalRom,
	MatchedResult,
	MatchResult,
	UnmatchedReason,
	UnmatchedResult,
} from "../types.js"

/** Everything matchOne needs to know about where the ROM sits in the run */
export interface MatchContext {
	/** RetroAchievements console id handed to the hashing tool */
	platformId: number
	/** Canonical platform name written to the report */
	system: string
	/** Zero-based position of the ROM within its platform folder */
	index: number
	/** Number of files in the platform folder */
	total: number
}

export interface MatchHooks {
	onHashError?: (
		rom: LocalRom,
		outcome: Extract<HashOutcome, { ok: false }>,
	) => void
	/** Called when more than one game lists the same hash */
	onMultiMatch?: (rom: LocalRom, hash: string, entries: CatalogEntry[]) => void
}

export function unmatchedResult(
	rom: LocalRom,
	system: string,
	hash: string,
	reason: UnmatchedReason,
): UnmatchedResult {
	return Object.freeze({
		matchFound: false,
		reason,
		system,
		romName: rom.filename,
		hash,
		path: rom.path,
		title: null,
		gameId: null,
		achievementCount: null,
	})
}

export function matchedResult(
	rom: LocalRom,
	system: string,
	hash: string,
	entry: CatalogEntry,
): MatchedResult {
	return Object.freeze({
		matchFound: true,
		system,
		romName: rom.filename,
		hash,
		path: rom.path,
		title: entry.title,
		gameId: entry.id,
		achievementCount: entry.numAchievements,
	})
}

/**
 * Catalog entries whose hash list contains the hash, in catalog order.
 * Membership is exact: no substring or case folding.
 */
export function findCatalogMatches(
	hash: string,
	catalog: readonly CatalogEntry[],
): CatalogEntry[] {
	return catalog.filter(entry => entry.hashes.includes(hash))
}

/**
 * Hash one ROM and look it up in its platform's catalog.
 *
 * If several games claim the same hash, the first one in catalog order wins.
 */
export async function matchOne(
	context: MatchContext,
	rom: LocalRom,
	catalog: readonly CatalogEntry[],
	hasher: Hasher,
	hooks: MatchHooks = {},
): Promise<MatchResult> {
	const position = `${context.index + 1}/${context.total}`
	log.pipeline.trace({ rom: rom.filename, position }, "hashing")

	const outcome = await hasher.hash(context.platformId, rom.path)

	if (!outcome.ok) {
		hooks.onHashError?.(rom, outcome)
		return unmatchedResult(rom, context.system, outcome.output, "hash-failed")
	}

	const matches = findCatalogMatches(outcome.hash, catalog)
	const [first] = matches
	if (!first) {
		log.pipeline.debug(
			{ rom: rom.filename, hash: outcome.hash, system: context.system, position },
			"no catalog entry for hash",
		)
		return unmatchedResult(rom, context.system, outcome.hash, "no-match")
	}

	if (matches.length > 1) {
		log.pipeline.warn(
			{
				rom: rom.filename,
				hash: outcome.hash,
				gameIds: matches.map(m => m.id),
			},
			"hash listed by several games, using the first",
		)
		hooks.onMultiMatch?.(rom, outcome.hash, matches)
	}

	return matchedResult(rom, context.system, outcome.hash, first)
}
