/**
 * Folder name → RetroAchievements platform resolution
 *
 * Rules are tried in order and the first hit wins:
 *   1. override token, compared verbatim
 *   2. case-insensitive canonical name
 *   3. slug: folder without whitespace vs. name with spaces as hyphens
 *   4. alias list (input lower-cased, alias side taken as configured)
 */

import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { z } from "zod"
import type { PlatformDefinition } from "./types.js"

export const PlatformDefinitionSchema = z.object({
	name: z.string().trim().min(1),
	aliases: z.array(z.string()).default([]),
	override: z.string().min(1).optional(),
})

export const PlatformTableSchema = z
	.array(PlatformDefinitionSchema)
	.superRefine((platforms, ctx) => {
		const seen = new Set<string>()
		platforms.forEach((platform, index) => {
			if (seen.has(platform.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [index, "name"],
					message: `Duplicate platform name "${platform.name}"`,
				})
			}
			seen.add(platform.name)
		})
	})

/** Bundled mapping table, used when the configuration brings none */
export const DEFAULT_PLATFORMS_PATH = fileURLToPath(
	new URL("../data/platforms.json", import.meta.url),
)

export function loadPlatformTable(
	path: string = DEFAULT_PLATFORMS_PATH,
): PlatformDefinition[] {
	const raw = JSON.parse(readFileSync(path, "utf8")) as unknown
	return PlatformTableSchema.parse(raw)
}

export interface ResolveOptions {
	/** Lower-case the alias side as well (default: aliases compared as written) */
	caseInsensitiveAliases?: boolean
}

/**
 * Canonical name in slug form: lower-case, each space replaced by a hyphen.
 * Slashes survive, so "Genesis/Mega Drive" becomes "genesis/mega-drive".
 */
export function toPlatformSlug(name: string): string {
	return name.toLowerCase().replace(/ /g, "-")
}

/**
 * Resolve a library folder name to a canonical platform name.
 * Returns null when no rule matches.
 */
export function resolvePlatform(
	folderName: string,
	platforms: readonly PlatformDefinition[],
	options: ResolveOptions = {},
): string | null {
	const byOverride = platforms.find(
		p => p.override !== undefined && p.override === folderName,
	)
	if (byOverride) return byOverride.name

	const lowered = folderName.toLowerCase()

	const byName = platforms.find(p => p.name.toLowerCase() === lowered)
	if (byName) return byName.name

	const slug = lowered.replace(/\s+/g, "")
	const bySlug = platforms.find(p => toPlatformSlug(p.name) === slug)
	if (bySlug) return bySlug.name

	const foldAlias = options.caseInsensitiveAliases === true
	const byAlias = platforms.find(p =>
		p.aliases.some(
			alias => (foldAlias ? alias.toLowerCase() : alias) === lowered,
		),
	)
	return byAlias?.name ?? null
}
