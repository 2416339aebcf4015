/**
 * Single-file HTTP download used to fetch the hashing tool archive
 *
 * - Streams to disk through a .part file
 * - Verifies Content-Length when the server sends one
 * - Atomic rename on completion
 */

import {
	createWriteStream,
	existsSync,
	renameSync,
	statSync,
	unlinkSync,
} from "node:fs"
import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { fetch as undiciFetch, type Dispatcher } from "undici"
import { errorMessage } from "./errors.js"

const USER_AGENT = "cheevo-scan/1.0.0"

export interface DownloadOptions {
	/** Alternate undici dispatcher (tests pass a MockAgent) */
	dispatcher?: Dispatcher
}

export interface DownloadResult {
	success: boolean
	bytesDownloaded: number
	error?: string
}

function getPartPath(destPath: string): string {
	return `${destPath}.part`
}

function cleanupPartFile(partPath: string): void {
	if (existsSync(partPath)) {
		unlinkSync(partPath)
	}
}

/**
 * Download url to destPath. Never throws; failures come back in the result.
 */
export async function downloadFile(
	url: string,
	destPath: string,
	options: DownloadOptions = {},
): Promise<DownloadResult> {
	const partPath = getPartPath(destPath)

	try {
		await mkdir(dirname(destPath), { recursive: true })

		const response = await undiciFetch(url, {
			headers: { "User-Agent": USER_AGENT },
			...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
		})

		if (!response.ok) {
			await response.body?.cancel()
			return {
				success: false,
				bytesDownloaded: 0,
				error: `HTTP ${response.status}: ${response.statusText}`,
			}
		}

		if (!response.body) {
			return { success: false, bytesDownloaded: 0, error: "No response body" }
		}

		const contentLength = response.headers.get("Content-Length")
		const expectedSize = contentLength ? parseInt(contentLength, 10) : undefined

		await pipeline(Readable.fromWeb(response.body), createWriteStream(partPath))

		const size = statSync(partPath).size
		if (size === 0) {
			cleanupPartFile(partPath)
			return { success: false, bytesDownloaded: 0, error: "Downloaded file is empty" }
		}
		if (expectedSize !== undefined && size !== expectedSize) {
			cleanupPartFile(partPath)
			return {
				success: false,
				bytesDownloaded: size,
				error: `Size mismatch: expected ${expectedSize}, got ${size}`,
			}
		}

		if (existsSync(destPath)) {
			unlinkSync(destPath)
		}
		renameSync(partPath, destPath)

		return { success: true, bytesDownloaded: size }
	} catch (err) {
		cleanupPartFile(partPath)
		return { success: false, bytesDownloaded: 0, error: errorMessage(err) }
	}
}
