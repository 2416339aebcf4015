/**
 * Core hash-map pipeline
 *
 * Async generator over the whole run: resolve library folders, fetch the
 * active console list, then per platform fetch the game list and hash every
 * ROM in order. Everything is sequential; one request or one hashing tool
 * invocation is in flight at a time.
 *
 * Usage:
 * ```ts
 * for await (const event of runPipeline(options)) {
 *   if (event.type === "rom") results.push(event.result)
 * }
 * ```
 */

import type { Config } from "../config.js"
import { PipelineError } from "../errors.js"
import type { Hasher } from "../hasher.js"
import { listRomFiles, resolveLibrary } from "../library.js"
import { log } from "../logger.js"
import type { CatalogEntry, RemotePlatform } from "../types.js"
import type { CatalogSource } from "./catalog/api.js"
import { matchOne, unmatchedResult } from "./match.js"
import type { PipelineEvent } from "./types.js"

export interface PipelineOptions {
	config: Pick<
		Config,
		"libraryRoot" | "apiKey" | "platforms" | "caseInsensitiveAliases"
	>
	catalog: CatalogSource
	hasher: Hasher
}

export async function* runPipeline(
	options: PipelineOptions,
): AsyncGenerator<PipelineEvent> {
	const { config, catalog, hasher } = options

	const layout = resolveLibrary(config.libraryRoot, config.platforms, {
		caseInsensitiveAliases: config.caseInsensitiveAliases,
	})
	for (const folderName of layout.unresolved) {
		log.pipeline.debug({ folderName }, "folder matches no platform, skipping")
	}
	if (layout.resolved.length === 0) {
		throw new PipelineError(
			`No folder in ${config.libraryRoot} matches a known platform`,
		)
	}

	yield {
		type: "platforms-resolved",
		platforms: layout.resolved,
		unresolved: layout.unresolved,
	}

	const work = layout.resolved.map(folder => ({
		folder,
		roms: listRomFiles(folder),
	}))

	let remoteByName = new Map<string, RemotePlatform>()
	if (work.some(w => w.roms.length > 0)) {
		const remote = await catalog.listActivePlatforms(config.apiKey)
		remoteByName = new Map(remote.map(p => [p.name, p]))
	}

	// Two folders can resolve to the same platform; fetch its games once.
	const catalogs = new Map<number, CatalogEntry[]>()

	for (const { folder, roms } of work) {
		const { system, folderName } = folder
		const total = roms.length

		if (total === 0) {
			log.pipeline.debug({ system, folderName }, "empty platform folder")
			yield { type: "platform-skipped", system, folderName }
			continue
		}

		const remote = remoteByName.get(system)

		yield {
			type: "platform-start",
			system,
			folderName,
			platformId: remote?.id ?? null,
			total,
		}

		if (!remote) {
			log.pipeline.warn(
				{ system, folderName },
				"platform is not an active RetroAchievements console",
			)
			yield { type: "platform-missing", system, folderName, total }
			for (const [index, rom] of roms.entries()) {
				yield {
					type: "rom",
					system,
					index,
					total,
					result: unmatchedResult(rom, system, "", "inactive-platform"),
				}
			}
			yield { type: "platform-complete", system, total, matched: 0 }
			continue
		}

		let games = catalogs.get(remote.id)
		const cached = games !== undefined
		if (!games) {
			games = await catalog.listCatalog(config.apiKey, remote.id)
			catalogs.set(remote.id, games)
		}
		yield {
			type: "catalog",
			system,
			platformId: remote.id,
			games: games.length,
			cached,
		}

		let matched = 0
		for (const [index, rom] of roms.entries()) {
			const sideEvents: PipelineEvent[] = []
			const result = await matchOne(
				{ platformId: remote.id, system, index, total },
				rom,
				games,
				hasher,
				{
					onHashError: (failed, outcome) => {
						sideEvents.push({
							type: "hash-error",
							system,
							romName: failed.filename,
							path: failed.path,
							output: outcome.output,
							error: outcome.error,
						})
					},
					onMultiMatch: (ambiguous, hash, entries) => {
						sideEvents.push({
							type: "multi-match",
							system,
							romName: ambiguous.filename,
							hash,
							gameIds: entries.map(e => e.id),
						})
					},
				},
			)
			yield* sideEvents

			if (result.matchFound) matched++
			yield { type: "rom", system, index, total, result }
		}

		log.pipeline.info({ system, total, matched }, "platform complete")
		yield { type: "platform-complete", system, total, matched }
	}
}
