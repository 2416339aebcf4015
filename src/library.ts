/**
 * Library discovery: platform folders under the library root and the ROM
 * files inside them. Listings are sorted so repeated runs see the same order.
 */

import { readdirSync, statSync } from "node:fs"
import { join } from "node:path"
import { resolvePlatform, type ResolveOptions } from "./platforms.js"
import type { LocalRom, PlatformDefinition, PlatformFolder } from "./types.js"

function byName(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

function isKind(path: string, kind: "file" | "directory"): boolean {
	try {
		const stat = statSync(path)
		return kind === "file" ? stat.isFile() : stat.isDirectory()
	} catch {
		// Dangling symlink or a file removed mid-scan
		return false
	}
}

/** Immediate subdirectories of the library root */
export function listSubdirectories(root: string): string[] {
	return readdirSync(root)
		.filter(name => isKind(join(root, name), "directory"))
		.sort(byName)
}

/** Regular files directly inside a platform folder (no recursion) */
export function listRomFiles(folder: PlatformFolder): LocalRom[] {
	return readdirSync(folder.path)
		.filter(name => isKind(join(folder.path, name), "file"))
		.sort(byName)
		.map(filename => ({
			filename,
			path: join(folder.path, filename),
			system: folder.system,
		}))
}

export interface LibraryLayout {
	resolved: PlatformFolder[]
	/** Folder names no platform rule matched */
	unresolved: string[]
}

export function resolveLibrary(
	root: string,
	platforms: readonly PlatformDefinition[],
	options: ResolveOptions = {},
): LibraryLayout {
	const resolved: PlatformFolder[] = []
	const unresolved: string[] = []

	for (const folderName of listSubdirectories(root)) {
		const system = resolvePlatform(folderName, platforms, options)
		if (system === null) {
			unresolved.push(folderName)
			continue
		}
		resolved.push({ system, folderName, path: join(root, folderName) })
	}

	return { resolved, unresolved }
}
