/**
 * Streaming ZIP extraction using yauzl
 *
 * Pulls a single named file out of an archive. Writes to a .part file then
 * atomically renames.
 */

import { createWriteStream, existsSync, renameSync, unlinkSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { basename, dirname } from "node:path"
import { pipeline } from "node:stream/promises"
import yauzl from "yauzl"
import { errorMessage } from "./errors.js"

export interface ExtractResult {
	success: boolean
	/** Archive path of the entry that was extracted */
	entryName?: string
	error?: string
}

/**
 * Promisified yauzl.open
 */
function openZip(path: string): Promise<yauzl.ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(path, { lazyEntries: true, autoClose: false }, (err, zipFile) => {
			if (err) reject(err)
			else if (!zipFile) reject(new Error("Failed to open zip file"))
			else resolve(zipFile)
		})
	})
}

/**
 * Get readable stream for a zip entry
 */
function openReadStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<NodeJS.ReadableStream> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(entry, (err, stream) => {
			if (err) reject(err)
			else if (!stream) reject(new Error("Failed to open read stream"))
			else resolve(stream)
		})
	})
}

/**
 * Find the first entry whose file name (ignoring folders inside the archive)
 * equals fileName, case-insensitively.
 */
function findEntry(
	zipFile: yauzl.ZipFile,
	fileName: string,
): Promise<yauzl.Entry | null> {
	const wanted = fileName.toLowerCase()
	return new Promise((resolve, reject) => {
		let found = false
		zipFile.on("error", reject)
		zipFile.on("end", () => {
			if (!found) resolve(null)
		})
		zipFile.on("entry", (entry: yauzl.Entry) => {
			const isDirectory = entry.fileName.endsWith("/")
			if (!isDirectory && basename(entry.fileName).toLowerCase() === wanted) {
				found = true
				resolve(entry)
				return
			}
			zipFile.readEntry()
		})
		zipFile.readEntry()
	})
}

/**
 * Extract the entry named fileName from archivePath to destPath
 */
export async function extractFile(
	archivePath: string,
	fileName: string,
	destPath: string,
): Promise<ExtractResult> {
	let zipFile: yauzl.ZipFile | null = null
	const partPath = `${destPath}.part.${process.pid}`

	try {
		zipFile = await openZip(archivePath)
		const entry = await findEntry(zipFile, fileName)
		if (!entry) {
			return { success: false, error: `${fileName} not found in ${archivePath}` }
		}

		await mkdir(dirname(destPath), { recursive: true })
		const readStream = await openReadStream(zipFile, entry)
		await pipeline(readStream, createWriteStream(partPath))

		if (existsSync(destPath)) {
			unlinkSync(destPath)
		}
		renameSync(partPath, destPath)

		return { success: true, entryName: entry.fileName }
	} catch (err) {
		if (existsSync(partPath)) unlinkSync(partPath)
		return { success: false, error: errorMessage(err) }
	} finally {
		zipFile?.close()
	}
}
