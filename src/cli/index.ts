#!/usr/bin/env node
/**
 * cheevo-scan CLI
 * Reports which ROMs in a per-platform library have a RetroAchievements hash
 */

import { Command } from "commander"
import { loadConfig, type Config, type ConfigOverrides } from "../config.js"
import { CatalogClient } from "../core/catalog/api.js"
import type { PipelineEvent } from "../core/types.js"
import { FatalError, PipelineError, errorMessage } from "../errors.js"
import {
	runHashMap,
	validateApiKey,
	validateLibraryRoot,
} from "../hashmap.js"
import { resolveLibrary } from "../library.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { createProgressTracker, type ProgressTracker } from "../progress.js"
import { ui } from "../ui.js"

const VERSION = "1.0.0"

interface CommonOptions {
	config?: string
	library?: string
	apiKey?: string
	quiet: boolean
	verbose: boolean
	logFile?: string
}

interface RunOptions extends CommonOptions {
	output?: string
	hasher?: string
	missingOnly?: boolean
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Failed to flush logs: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

function setupLogging(options: CommonOptions): void {
	configureLogging({ logFilePath: options.logFile, verbose: options.verbose })
}

function readConfig(options: RunOptions): Config {
	const overrides: ConfigOverrides = {
		libraryRoot: options.library,
		outputDirectory: options.output,
		hasherPath: options.hasher,
		apiKey: options.apiKey,
		missingOnly: options.missingOnly,
	}
	return loadConfig({ path: options.config, overrides })
}

/**
 * Run an action, turning thrown errors into a message and exit code 1
 */
async function guarded(
	action: () => Promise<void>,
	progress?: ProgressTracker,
): Promise<void> {
	try {
		await action()
	} catch (err) {
		progress?.stop()
		ui.error(errorMessage(err))
		if (err instanceof FatalError) {
			log.cli.fatal({ error: err.name }, err.message)
			await exitWithCode(err.exitCode)
		} else {
			log.cli.fatal({ err }, "unexpected failure")
			await exitWithCode(1)
		}
	}
}

function createEventHandler(
	options: CommonOptions,
	progress: ProgressTracker,
): (event: PipelineEvent) => void {
	const { quiet, verbose } = options

	return event => {
		switch (event.type) {
			case "platforms-resolved": {
				if (!quiet) {
					ui.info(
						`Found ${event.platforms.length} platform folder(s): ${event.platforms
							.map(p => p.system)
							.join(", ")}`,
					)
				}
				for (const folderName of event.unresolved) {
					ui.debug(`Skipping ${folderName}: no matching platform`, verbose)
				}
				break
			}
			case "platform-skipped": {
				ui.debug(`${event.system}: folder is empty, skipped`, verbose)
				break
			}
			case "platform-start": {
				progress.start(event.system, event.total)
				break
			}
			case "platform-missing": {
				ui.warn(
					`${event.system} is not an active RetroAchievements console; ${event.total} ROM(s) reported without a match`,
				)
				break
			}
			case "catalog": {
				ui.debug(
					`${event.system}: ${event.games} games in catalog${event.cached ? " (already fetched)" : ""}`,
					verbose,
				)
				break
			}
			case "hash-error": {
				ui.error(`${event.system}: could not hash ${event.path}: ${event.error}`)
				break
			}
			case "multi-match": {
				ui.warn(
					`${event.system}: ${event.romName} hash ${event.hash} is listed by games ${event.gameIds.join(", ")}; using ${event.gameIds[0] ?? "the first"}`,
				)
				break
			}
			case "rom": {
				progress.update(event.index + 1)
				if (!quiet && verbose) {
					const { result } = event
					ui.debug(
						result.matchFound
							? `${result.romName} → ${result.title} (${result.gameId})`
							: `${result.romName} → no match`,
						verbose,
					)
				}
				break
			}
			case "platform-complete": {
				progress.finish(
					`${event.system}: ${event.matched}/${event.total} matched`,
					event.matched === event.total,
				)
				break
			}
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

function addCommonOptions(command: Command): Command {
	return command
		.option("-c, --config <path>", "Config file (default: .cheevoscanrc.json in cwd or home)")
		.option("-l, --library <path>", "Library root with one folder per platform")
		.option("--api-key <key>", "RetroAchievements web API key")
		.option("-q, --quiet", "Minimal output", false)
		.option("--verbose", "Debug output", false)
		.option("--log-file <path>", "Write structured logs to a file")
}

const program = new Command()

// Options after a subcommand belong to that subcommand.
program.enablePositionalOptions()

addCommonOptions(program)
	.name("cheevo-scan")
	.version(VERSION)
	.description(
		"Match a local ROM library against RetroAchievements hashes and write a CSV report",
	)
	.option("-o, --output <dir>", "Directory for RA_HashMapReport.csv")
	.option("--hasher <path>", "Path to the RAHasher executable")
	.option("--missing-only", "Only report ROMs without a match")
	.action(async (options: RunOptions) => {
		setupLogging(options)
		const progress = createProgressTracker(options.quiet)

		await guarded(async () => {
			const config = readConfig(options)
			if (!options.quiet) {
				ui.banner(
					VERSION,
					config.libraryRoot,
					config.outputDirectory,
					config.missingOnly,
				)
			}

			const run = await runHashMap(
				config,
				{},
				{
					onEvent: createEventHandler(options, progress),
					onHasherDownload: url => {
						if (!options.quiet) ui.info(`Downloading hashing tool from ${url}`)
					},
				},
			)

			if (!options.quiet) {
				ui.header("Summary")
				ui.summary(run.stats)
			}
			ui.success(`Report written to ${run.reportPath} (${run.reported.length} rows)`)
		}, progress)
	})

addCommonOptions(
	program
		.command("platforms")
		.description("Show how each library folder maps to a platform (no network)"),
).action(async (options: CommonOptions) => {
	setupLogging(options)
	await guarded(async () => {
		const config = readConfig(options)
		validateLibraryRoot(config.libraryRoot)
		const layout = resolveLibrary(config.libraryRoot, config.platforms, {
			caseInsensitiveAliases: config.caseInsensitiveAliases,
		})

		ui.header("Platform folders")
		for (const folder of layout.resolved) {
			ui.success(`${folder.folderName} → ${folder.system}`)
		}
		for (const folderName of layout.unresolved) {
			ui.warn(`${folderName} → unresolved (skipped)`)
		}
		if (layout.resolved.length === 0) {
			throw new PipelineError(
				`No folder in ${config.libraryRoot} matches a known platform`,
			)
		}
	})
})

addCommonOptions(
	program
		.command("check-key")
		.description("Verify the RetroAchievements API key"),
).action(async (options: CommonOptions) => {
	setupLogging(options)
	await guarded(async () => {
		const config = readConfig(options)
		await validateApiKey(
			new CatalogClient({ baseUrl: config.apiBaseUrl }),
			config.apiKey,
		)
		ui.success("API key accepted")
	})
})

await program.parseAsync(process.argv)
