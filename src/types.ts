/**
 * Shared domain types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Local side
// ─────────────────────────────────────────────────────────────────────────────

/** One row of the platform mapping table */
export interface PlatformDefinition {
	/** Canonical name, identical to the RetroAchievements console name */
	name: string
	/** Extra folder names (expected lower-case) that map to this platform */
	aliases: string[]
	/** Folder name that maps here verbatim, ahead of every other rule */
	override?: string | undefined
}

/** A library subfolder that resolved to a known platform */
export interface PlatformFolder {
	system: string
	folderName: string
	path: string
}

export interface LocalRom {
	filename: string
	/** Absolute path handed to the hashing tool */
	path: string
	system: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Remote side
// ─────────────────────────────────────────────────────────────────────────────

export interface RemotePlatform {
	id: number
	name: string
	active: boolean
	isGameSystem: boolean
}

/** A game on RetroAchievements together with every hash it accepts */
export interface CatalogEntry {
	id: number
	title: string
	consoleId: number
	consoleName: string
	numAchievements: number
	hashes: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

interface MatchResultBase {
	system: string
	romName: string
	/** Hash as produced by the tool; raw output when it was ill-shaped */
	hash: string
	path: string
}

export interface MatchedResult extends MatchResultBase {
	matchFound: true
	title: string
	gameId: number
	achievementCount: number
}

/**
 * Why a ROM has no match:
 * - `no-match`: hashed, but no game lists the hash
 * - `hash-failed`: the tool produced no usable hash
 * - `inactive-platform`: never hashed, the console is not on RetroAchievements
 */
export type UnmatchedReason = "no-match" | "hash-failed" | "inactive-platform"

export interface UnmatchedResult extends MatchResultBase {
	matchFound: false
	reason: UnmatchedReason
	title: null
	gameId: null
	achievementCount: null
}

export type MatchResult = MatchedResult | UnmatchedResult
