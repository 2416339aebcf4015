/**
 * Full run: validate, drive the pipeline, filter, write the report
 */

import { existsSync, mkdirSync, statSync } from "node:fs"
import type { Dispatcher } from "undici"
import type { Config } from "./config.js"
import { CatalogClient, type CatalogSource } from "./core/catalog/api.js"
import { runPipeline } from "./core/pipeline.js"
import { summarizeResults, type RunStats } from "./core/stats.js"
import type { PipelineEvent } from "./core/types.js"
import { CatalogError, ConfigError, errorMessage } from "./errors.js"
import { ExternalHasher, type Hasher } from "./hasher.js"
import { log } from "./logger.js"
import { filterMissing, writeReport } from "./report.js"
import { ensureHasher } from "./setup.js"
import type { MatchResult } from "./types.js"

export interface HashMapDependencies {
	catalog?: CatalogSource
	hasher?: Hasher
	/** undici dispatcher for the API client and the tool download */
	dispatcher?: Dispatcher
}

export interface HashMapRunOptions {
	onEvent?: (event: PipelineEvent) => void
	onHasherDownload?: (url: string) => void
}

export interface HashMapRun {
	/** Every ROM, in platform then file order */
	results: MatchResult[]
	/** What went into the report after the missing-only filter */
	reported: MatchResult[]
	stats: RunStats
	reportPath: string
}

export function validateLibraryRoot(libraryRoot: string): void {
	if (!existsSync(libraryRoot)) {
		throw new ConfigError(`Library path does not exist: ${libraryRoot}`)
	}
	if (!statSync(libraryRoot).isDirectory()) {
		throw new ConfigError(`Library path is not a directory: ${libraryRoot}`)
	}
}

/**
 * Library root must be an existing directory; the output directory must
 * exist or be creatable.
 */
export function validatePaths(
	config: Pick<Config, "libraryRoot" | "outputDirectory">,
): void {
	validateLibraryRoot(config.libraryRoot)
	try {
		mkdirSync(config.outputDirectory, { recursive: true })
	} catch (err) {
		throw new ConfigError(
			`Cannot create output directory ${config.outputDirectory}: ${errorMessage(err)}`,
			{ cause: err },
		)
	}
}

/**
 * Check the API key, failing the run the same way for a rejected key and an
 * unreachable server.
 */
export async function validateApiKey(
	catalog: CatalogSource,
	apiKey: string,
): Promise<void> {
	if (!(await catalog.validateCredential(apiKey))) {
		throw new CatalogError(
			"RetroAchievements did not accept the API key (or could not be reached)",
		)
	}
}

export async function runHashMap(
	config: Config,
	deps: HashMapDependencies = {},
	options: HashMapRunOptions = {},
): Promise<HashMapRun> {
	validatePaths(config)

	const hasher =
		deps.hasher ??
		new ExternalHasher(
			await ensureHasher(config, {
				...(deps.dispatcher ? { dispatcher: deps.dispatcher } : {}),
				...(options.onHasherDownload
					? { onDownload: options.onHasherDownload }
					: {}),
			}),
		)

	const catalog =
		deps.catalog ??
		new CatalogClient({
			baseUrl: config.apiBaseUrl,
			...(deps.dispatcher ? { dispatcher: deps.dispatcher } : {}),
		})

	await validateApiKey(catalog, config.apiKey)

	const results: MatchResult[] = []
	for await (const event of runPipeline({ config, catalog, hasher })) {
		options.onEvent?.(event)
		if (event.type === "rom") {
			results.push(event.result)
		}
	}

	const reported = config.missingOnly ? filterMissing(results) : results
	const reportPath = await writeReport(reported, config.outputDirectory)
	const stats = summarizeResults(results)

	log.pipeline.info(
		{ ...stats.totals, reported: reported.length, reportPath },
		"run complete",
	)

	return { results, reported, stats, reportPath }
}
