/**
 * Unit tests for single-file archive extraction
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { extractFile } from "../../src/extract.js"
import { buildZip } from "../helpers/index.js"

describe("extractFile", () => {
	let tempDir: string
	let zipPath: string

	beforeAll(async () => {
		tempDir = mkdtempSync(join(tmpdir(), "cheevo-scan-extract-"))
		zipPath = join(tempDir, "tool.zip")
		writeFileSync(
			zipPath,
			await buildZip({
				"RAHasher/readme.txt": "Documentation",
				"RAHasher/bin/rahasher": "tool binary",
			}),
		)
	})

	afterAll(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	it("finds the entry by file name in any folder, ignoring case", async () => {
		const dest = join(tempDir, "out-1", "RAHasher")

		const result = await extractFile(zipPath, "RAHasher", dest)

		expect(result).toEqual({ success: true, entryName: "RAHasher/bin/rahasher" })
		expect(readFileSync(dest, "utf8")).toBe("tool binary")
	})

	it("leaves no partial file behind", async () => {
		const outDir = join(tempDir, "out-2")

		await extractFile(zipPath, "readme.txt", join(outDir, "readme.txt"))

		expect(readdirSync(outDir)).toEqual(["readme.txt"])
	})

	it("reports a missing entry", async () => {
		const dest = join(tempDir, "out-3", "RAHasher.exe")

		const result = await extractFile(zipPath, "RAHasher.exe", dest)

		expect(result).toEqual({
			success: false,
			error: `RAHasher.exe not found in ${zipPath}`,
		})
		expect(existsSync(dest)).toBe(false)
	})

	it("reports an unreadable archive", async () => {
		const badZip = join(tempDir, "bad.zip")
		writeFileSync(badZip, "not a zip")

		const result = await extractFile(badZip, "RAHasher", join(tempDir, "out-4", "RAHasher"))

		expect(result.success).toBe(false)
		expect(result.error).toBeDefined()
	})
})
