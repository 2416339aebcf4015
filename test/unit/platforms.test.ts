/**
 * Unit tests for folder name → platform resolution
 */

import { describe, it, expect } from "vitest"
import {
	PlatformTableSchema,
	loadPlatformTable,
	resolvePlatform,
	toPlatformSlug,
} from "../../src/platforms.js"
import type { PlatformDefinition } from "../../src/types.js"

const PLATFORMS: PlatformDefinition[] = [
	{ name: "SNES/Super Famicom", aliases: ["snes", "sfc"] },
	{ name: "Game Boy", aliases: ["GB"] },
	{ name: "Game Boy Advance", aliases: ["gba"] },
	{ name: "Genesis/Mega Drive", aliases: ["genesis"] },
	{ name: "Sega CD", aliases: [] },
	{ name: "Mega-CD", aliases: ["megacd"], override: "sega cd" },
]

describe("resolvePlatform", () => {
	// ─────────────────────────────────────────────────────────────────────────
	// Rule order
	// ─────────────────────────────────────────────────────────────────────────

	describe("override", () => {
		it("wins over an exact name match on another platform", () => {
			// "sega cd" is also Sega CD case-insensitively
			expect(resolvePlatform("sega cd", PLATFORMS)).toBe("Mega-CD")
		})

		it("is compared verbatim", () => {
			expect(resolvePlatform("Sega CD", PLATFORMS)).toBe("Sega CD")
			expect(resolvePlatform("SEGA CD", PLATFORMS)).toBe("Sega CD")
		})
	})

	describe("exact name", () => {
		it("ignores case", () => {
			expect(resolvePlatform("game boy", PLATFORMS)).toBe("Game Boy")
			expect(resolvePlatform("GAME BOY ADVANCE", PLATFORMS)).toBe(
				"Game Boy Advance",
			)
		})
	})

	describe("slug", () => {
		it("matches hyphenated folder names", () => {
			expect(resolvePlatform("game-boy-advance", PLATFORMS)).toBe(
				"Game Boy Advance",
			)
			expect(resolvePlatform("Game-Boy", PLATFORMS)).toBe("Game Boy")
		})

		it("drops whitespace from the folder name", () => {
			expect(resolvePlatform("game-boy -advance", PLATFORMS)).toBe(
				"Game Boy Advance",
			)
		})

		it("keeps slashes in the canonical name", () => {
			expect(resolvePlatform("snes/super-famicom", PLATFORMS)).toBe(
				"SNES/Super Famicom",
			)
			expect(resolvePlatform("genesis-megadrive", PLATFORMS)).toBeNull()
		})
	})

	describe("alias", () => {
		it("lower-cases the folder name", () => {
			expect(resolvePlatform("SFC", PLATFORMS)).toBe("SNES/Super Famicom")
			expect(resolvePlatform("snes", PLATFORMS)).toBe("SNES/Super Famicom")
		})

		it("compares against the alias exactly as configured", () => {
			// Game Boy's alias is "GB"; the lower-cased input never equals it
			expect(resolvePlatform("gb", PLATFORMS)).toBeNull()
			expect(resolvePlatform("GB", PLATFORMS)).toBeNull()
			expect(resolvePlatform("gba", PLATFORMS)).toBe("Game Boy Advance")
		})

		it("folds alias case when caseInsensitiveAliases is set", () => {
			expect(
				resolvePlatform("gb", PLATFORMS, { caseInsensitiveAliases: true }),
			).toBe("Game Boy")
		})
	})

	it("returns null for unknown folders", () => {
		expect(resolvePlatform("unknowndir", PLATFORMS)).toBeNull()
		expect(resolvePlatform("", PLATFORMS)).toBeNull()
	})

	it("is deterministic", () => {
		const names = ["snes", "gb", "sega cd", "game-boy-advance", "nope"]
		const first = names.map(n => resolvePlatform(n, PLATFORMS))
		for (let i = 0; i < 5; i++) {
			expect(names.map(n => resolvePlatform(n, PLATFORMS))).toEqual(first)
		}
	})
})

describe("toPlatformSlug", () => {
	it("lower-cases and hyphenates spaces only", () => {
		expect(toPlatformSlug("Genesis/Mega Drive")).toBe("genesis/mega-drive")
		expect(toPlatformSlug("PC Engine CD/TurboGrafx-CD")).toBe(
			"pc-engine-cd/turbografx-cd",
		)
	})
})

describe("PlatformTableSchema", () => {
	it("rejects duplicate names", () => {
		const result = PlatformTableSchema.safeParse([
			{ name: "Game Boy" },
			{ name: "Game Boy", aliases: ["gb"] },
		])
		expect(result.success).toBe(false)
	})

	it("defaults aliases to an empty list", () => {
		expect(PlatformTableSchema.parse([{ name: "Arduboy" }])).toEqual([
			{ name: "Arduboy", aliases: [] },
		])
	})
})

describe("bundled platform table", () => {
	const table = loadPlatformTable()

	it("has unique names", () => {
		const names = table.map(p => p.name)
		expect(new Set(names).size).toBe(names.length)
	})

	it("keeps aliases lower-case", () => {
		for (const platform of table) {
			for (const alias of platform.aliases) {
				expect(alias).toBe(alias.toLowerCase())
			}
		}
	})

	it("resolves common folder names", () => {
		expect(resolvePlatform("snes", table)).toBe("SNES/Super Famicom")
		expect(resolvePlatform("gb", table)).toBe("Game Boy")
		expect(resolvePlatform("Nintendo 64", table)).toBe("Nintendo 64")
		expect(resolvePlatform("game-boy-advance", table)).toBe("Game Boy Advance")
		expect(resolvePlatform("32X", table)).toBe("32X")
	})
})
