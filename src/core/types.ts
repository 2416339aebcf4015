/**
 * Events emitted by the pipeline generator
 *
 * The CLI subscribes to these for progress output; runHashMap() collects
 * the `rom` events into the report.
 */

import type { MatchResult, PlatformFolder } from "../types.js"

export type PipelineEvent =
	| PlatformsResolvedEvent
	| PlatformSkippedEvent
	| PlatformMissingEvent
	| PlatformStartEvent
	| CatalogEvent
	| RomEvent
	| HashErrorEvent
	| MultiMatchEvent
	| PlatformCompleteEvent

/** Emitted once after library folders are mapped to platforms */
export interface PlatformsResolvedEvent {
	type: "platforms-resolved"
	platforms: PlatformFolder[]
	unresolved: string[]
}

/** Emitted for a platform folder with no files; nothing is fetched */
export interface PlatformSkippedEvent {
	type: "platform-skipped"
	system: string
	folderName: string
}

/**
 * Emitted when a resolved platform is not an active RetroAchievements
 * console. Its ROMs are still reported, all unmatched.
 */
export interface PlatformMissingEvent {
	type: "platform-missing"
	system: string
	folderName: string
	total: number
}

export interface PlatformStartEvent {
	type: "platform-start"
	system: string
	folderName: string
	platformId: number | null
	total: number
}

/** Emitted after a platform's game list is available */
export interface CatalogEvent {
	type: "catalog"
	system: string
	platformId: number
	games: number
	cached: boolean
}

/** Emitted once per ROM, in report order */
export interface RomEvent {
	type: "rom"
	system: string
	index: number
	total: number
	result: MatchResult
}

export interface HashErrorEvent {
	type: "hash-error"
	system: string
	romName: string
	path: string
	output: string
	error: string
}

export interface MultiMatchEvent {
	type: "multi-match"
	system: string
	romName: string
	hash: string
	gameIds: number[]
}

export interface PlatformCompleteEvent {
	type: "platform-complete"
	system: string
	total: number
	matched: number
}
