/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join, resolve } from "node:path"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"
import { PlatformTableSchema, loadPlatformTable } from "./platforms.js"

export const DEFAULT_API_BASE_URL = "https://retroachievements.org/API"

/** Environment variable consulted when the config file has no apiKey */
export const API_KEY_ENV = "RA_API_KEY"

const ConfigSchema = z.object({
	libraryRoot: z.string().min(1, "libraryRoot is required"),
	outputDirectory: z.string().min(1, "outputDirectory is required"),
	missingOnly: z.boolean().default(false),
	apiKey: z.string().trim().min(1, "apiKey must not be empty"),
	hasherPath: z.string().min(1, "hasherPath is required"),
	/** Zip archive containing the hashing tool, fetched once when it is missing */
	hasherDownloadUrl: z.string().url().optional(),
	apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
	caseInsensitiveAliases: z.boolean().default(false),
	platforms: PlatformTableSchema.default(() => loadPlatformTable()),
})

export type Config = z.infer<typeof ConfigSchema>

/** Values supplied on the command line; undefined entries are ignored */
export interface ConfigOverrides {
	libraryRoot?: string | undefined
	outputDirectory?: string | undefined
	missingOnly?: boolean | undefined
	apiKey?: string | undefined
	hasherPath?: string | undefined
}

export const CONFIG_FILENAMES = [".cheevoscanrc.json", ".cheevoscanrc"]

/**
 * Candidate config locations: current directory first, then home directory
 */
export function configSearchPaths(cwd: string = process.cwd()): string[] {
	return [
		...CONFIG_FILENAMES.map(name => join(cwd, name)),
		...CONFIG_FILENAMES.map(name => join(homedir(), name)),
	]
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => {
			const path = issue.path.join(".")
			return path ? `${path}: ${issue.message}` : issue.message
		})
		.join("; ")
}

/**
 * Validate a raw config object. Relative paths are resolved against baseDir.
 */
export function parseConfig(
	raw: unknown,
	baseDir: string,
	env: NodeJS.ProcessEnv = process.env,
): Config {
	const input =
		raw !== null && typeof raw === "object" && !Array.isArray(raw)
			? { ...raw }
			: raw

	if (
		input !== null &&
		typeof input === "object" &&
		!("apiKey" in input) &&
		env[API_KEY_ENV]
	) {
		Object.assign(input, { apiKey: env[API_KEY_ENV] })
	}

	const result = ConfigSchema.safeParse(input)
	if (!result.success) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`)
	}

	const config = result.data
	return {
		...config,
		libraryRoot: resolve(baseDir, config.libraryRoot),
		outputDirectory: resolve(baseDir, config.outputDirectory),
		hasherPath: resolve(baseDir, config.hasherPath),
	}
}

/**
 * Load configuration from an explicit path or the first .cheevoscanrc found.
 * Command-line overrides win over file values.
 */
export function loadConfig(
	options: {
		path?: string | undefined
		overrides?: ConfigOverrides
		cwd?: string
		env?: NodeJS.ProcessEnv
	} = {},
): Config {
	const cwd = options.cwd ?? process.cwd()
	const candidates = options.path
		? [resolve(cwd, options.path)]
		: configSearchPaths(cwd)
	const configPath = candidates.find(path => existsSync(path))

	if (!configPath) {
		throw new ConfigError(
			`Configuration file not found. Looked in: ${candidates.join(", ")}`,
		)
	}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(configPath, "utf-8")) as unknown
	} catch (err) {
		throw new ConfigError(
			`Could not read configuration ${configPath}: ${errorMessage(err)}`,
			{ cause: err },
		)
	}

	const merged =
		raw !== null && typeof raw === "object" && !Array.isArray(raw)
			? { ...raw, ...definedOverrides(options.overrides ?? {}, cwd) }
			: raw

	return parseConfig(merged, dirname(configPath), options.env)
}

// Paths given on the command line are relative to where the user ran it,
// not to the config file, so resolve them up front.
function definedOverrides(
	overrides: ConfigOverrides,
	cwd: string,
): Record<string, string | boolean> {
	const out: Record<string, string | boolean> = {}
	if (overrides.libraryRoot !== undefined)
		out["libraryRoot"] = resolve(cwd, overrides.libraryRoot)
	if (overrides.outputDirectory !== undefined)
		out["outputDirectory"] = resolve(cwd, overrides.outputDirectory)
	if (overrides.hasherPath !== undefined)
		out["hasherPath"] = resolve(cwd, overrides.hasherPath)
	if (overrides.missingOnly !== undefined)
		out["missingOnly"] = overrides.missingOnly
	if (overrides.apiKey !== undefined) out["apiKey"] = overrides.apiKey
	return out
}
