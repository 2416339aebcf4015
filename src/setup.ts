/**
 * Hashing tool acquisition
 *
 * If the configured hasher binary is missing and a download URL is
 * configured, fetch the zip once, pull the binary out next to hasherPath and
 * mark it executable. Runs during validation, before any matching starts.
 */

import { chmodSync, existsSync, unlinkSync } from "node:fs"
import { basename, dirname, join } from "node:path"
import type { Dispatcher } from "undici"
import type { Config } from "./config.js"
import { downloadFile } from "./download.js"
import { SetupError } from "./errors.js"
import { extractFile } from "./extract.js"
import { log } from "./logger.js"

export interface EnsureHasherOptions {
	dispatcher?: Dispatcher
	onDownload?: (url: string) => void
}

/**
 * Return the path of a usable hashing tool, downloading it if necessary.
 * Throws SetupError when the tool is missing and cannot be acquired.
 */
export async function ensureHasher(
	config: Pick<Config, "hasherPath" | "hasherDownloadUrl">,
	options: EnsureHasherOptions = {},
): Promise<string> {
	const { hasherPath, hasherDownloadUrl } = config

	if (existsSync(hasherPath)) {
		return hasherPath
	}

	if (!hasherDownloadUrl) {
		throw new SetupError(
			`Hashing tool not found: ${hasherPath}. Install RAHasher there or set hasherDownloadUrl.`,
		)
	}

	options.onDownload?.(hasherDownloadUrl)
	log.setup.info({ url: hasherDownloadUrl, hasherPath }, "downloading hashing tool")

	const archivePath = join(dirname(hasherPath), `${basename(hasherPath)}.download.zip`)
	const download = await downloadFile(
		hasherDownloadUrl,
		archivePath,
		options.dispatcher ? { dispatcher: options.dispatcher } : {},
	)
	if (!download.success) {
		throw new SetupError(
			`Could not download hashing tool from ${hasherDownloadUrl}: ${download.error ?? "unknown error"}`,
		)
	}

	try {
		const extracted = await extractFile(archivePath, basename(hasherPath), hasherPath)
		if (!extracted.success) {
			throw new SetupError(
				`Could not extract hashing tool: ${extracted.error ?? "unknown error"}`,
			)
		}
		chmodSync(hasherPath, 0o755)
		log.setup.info({ entry: extracted.entryName, hasherPath }, "hashing tool installed")
	} finally {
		if (existsSync(archivePath)) unlinkSync(archivePath)
	}

	return hasherPath
}
