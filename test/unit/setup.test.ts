/**
 * Unit tests for hashing tool acquisition
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { MockAgent } from "undici"
import { SetupError } from "../../src/errors.js"
import { ensureHasher } from "../../src/setup.js"
import { buildZip, withTempDir } from "../helpers/index.js"

const ORIGIN = "https://tools.test"
const DOWNLOAD_URL = `${ORIGIN}/RAHasher.zip`

describe("ensureHasher", () => {
	let agent: MockAgent

	beforeEach(() => {
		agent = new MockAgent()
		agent.disableNetConnect()
	})

	afterEach(async () => {
		await agent.close()
	})

	it("returns an existing tool untouched", async () => {
		await withTempDir(async dir => {
			const hasherPath = join(dir, "RAHasher")
			writeFileSync(hasherPath, "#!/bin/sh\n")
			const onDownload = vi.fn()

			const path = await ensureHasher(
				{ hasherPath, hasherDownloadUrl: DOWNLOAD_URL },
				{ dispatcher: agent, onDownload },
			)

			expect(path).toBe(hasherPath)
			expect(onDownload).not.toHaveBeenCalled()
		})
	})

	it("fails when the tool is missing and no URL is configured", async () => {
		await withTempDir(async dir => {
			const hasherPath = join(dir, "RAHasher")

			const attempt = ensureHasher({ hasherPath })

			await expect(attempt).rejects.toBeInstanceOf(SetupError)
			await expect(ensureHasher({ hasherPath })).rejects.toThrow(
				`Hashing tool not found: ${hasherPath}`,
			)
		})
	})

	it("downloads and extracts the tool from a nested archive path", async () => {
		await withTempDir(async dir => {
			const hasherPath = join(dir, "tools", "RAHasher")
			const archive = await buildZip({
				"RAHasher-x64-Linux/README.txt": "readme",
				"RAHasher-x64-Linux/bin/RAHasher": "#!/bin/sh\necho tool\n",
			})
			agent
				.get(ORIGIN)
				.intercept({ path: "/RAHasher.zip", method: "GET" })
				.reply(200, archive)
			const onDownload = vi.fn()

			const path = await ensureHasher(
				{ hasherPath, hasherDownloadUrl: DOWNLOAD_URL },
				{ dispatcher: agent, onDownload },
			)

			expect(path).toBe(hasherPath)
			expect(onDownload).toHaveBeenCalledWith(DOWNLOAD_URL)
			expect(readFileSync(hasherPath, "utf8")).toBe("#!/bin/sh\necho tool\n")
			expect(readdirSync(dirname(hasherPath))).toEqual(["RAHasher"])
			expect(statSync(hasherPath).mode & 0o777).toBe(0o755)
		})
	})

	it("fails on an HTTP error", async () => {
		await withTempDir(async dir => {
			const hasherPath = join(dir, "RAHasher")
			agent
				.get(ORIGIN)
				.intercept({ path: "/RAHasher.zip", method: "GET" })
				.reply(404, "not found")

			await expect(
				ensureHasher({ hasherPath, hasherDownloadUrl: DOWNLOAD_URL }, { dispatcher: agent }),
			).rejects.toThrow(new RegExp(`^Could not download hashing tool from ${DOWNLOAD_URL}: HTTP 404`))
			expect(existsSync(hasherPath)).toBe(false)
		})
	})

	it("fails when the archive lacks the tool and removes the archive", async () => {
		await withTempDir(async dir => {
			const toolsDir = join(dir, "tools")
			mkdirSync(toolsDir)
			const hasherPath = join(toolsDir, "RAHasher")
			const archive = await buildZip({ "other/tool.exe": "nope" })
			agent
				.get(ORIGIN)
				.intercept({ path: "/RAHasher.zip", method: "GET" })
				.reply(200, archive)

			await expect(
				ensureHasher({ hasherPath, hasherDownloadUrl: DOWNLOAD_URL }, { dispatcher: agent }),
			).rejects.toThrow("Could not extract hashing tool: RAHasher not found in")
			expect(readdirSync(toolsDir)).toEqual([])
		})
	})

	it("fails on an archive that is not a zip", async () => {
		await withTempDir(async dir => {
			const hasherPath = join(dir, "RAHasher")
			agent
				.get(ORIGIN)
				.intercept({ path: "/RAHasher.zip", method: "GET" })
				.reply(200, "definitely not a zip file")

			const attempt = ensureHasher(
				{ hasherPath, hasherDownloadUrl: DOWNLOAD_URL },
				{ dispatcher: agent },
			)

			await expect(attempt).rejects.toBeInstanceOf(SetupError)
			expect(existsSync(hasherPath)).toBe(false)
		})
	})
})
