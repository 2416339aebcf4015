/**
 * Unit tests for the match engine
 */

import { describe, it, expect, vi } from "vitest"
import {
	findCatalogMatches,
	matchOne,
	type MatchContext,
} from "../../src/core/match.js"
import type { LocalRom } from "../../src/types.js"
import { fakeHasher, game, HASH_A, HASH_B, HASH_C } from "../helpers/index.js"

const SYSTEM = "SNES/Super Famicom"

const context: MatchContext = { platformId: 3, system: SYSTEM, index: 0, total: 1 }

function rom(filename: string): LocalRom {
	return { filename, path: `/roms/snes/${filename}`, system: SYSTEM }
}

describe("findCatalogMatches", () => {
	const catalog = [
		game(1, "First", [HASH_A]),
		game(2, "Second", [HASH_B, HASH_A]),
		game(3, "Third", [HASH_C]),
	]

	it("returns every entry listing the hash, in catalog order", () => {
		expect(findCatalogMatches(HASH_A, catalog).map(g => g.id)).toEqual([1, 2])
	})

	it("compares exactly", () => {
		expect(findCatalogMatches(HASH_A.toUpperCase(), catalog)).toEqual([])
		expect(findCatalogMatches(HASH_A.slice(0, 16), catalog)).toEqual([])
	})
})

describe("matchOne", () => {
	it("returns a matched result with catalog fields", async () => {
		const hasher = fakeHasher({ "game.sfc": HASH_A })
		const catalog = [game(123, "Example Game", [HASH_B, HASH_A], 40)]

		const result = await matchOne(context, rom("game.sfc"), catalog, hasher)

		expect(result).toEqual({
			matchFound: true,
			system: SYSTEM,
			romName: "game.sfc",
			hash: HASH_A,
			path: "/roms/snes/game.sfc",
			title: "Example Game",
			gameId: 123,
			achievementCount: 40,
		})
		expect(hasher.calls).toEqual([
			{ platformId: 3, filePath: "/roms/snes/game.sfc" },
		])
	})

	it("returns an unmatched result carrying the hash", async () => {
		const hasher = fakeHasher({ "hack.sfc": HASH_C })
		const catalog = [game(123, "Example Game", [HASH_A], 40)]

		const result = await matchOne(context, rom("hack.sfc"), catalog, hasher)

		expect(result).toEqual({
			matchFound: false,
			reason: "no-match",
			system: SYSTEM,
			romName: "hack.sfc",
			hash: HASH_C,
			path: "/roms/snes/hack.sfc",
			title: null,
			gameId: null,
			achievementCount: null,
		})
	})

	it("never matches ill-shaped output, even if the catalog lists it", async () => {
		const hasher = fakeHasher({ "broken.sfc": "0123456789\n" })
		const catalog = [game(9, "Odd Entry", ["0123456789"])]
		const onHashError = vi.fn()

		const result = await matchOne(context, rom("broken.sfc"), catalog, hasher, {
			onHashError,
		})

		expect(result).toMatchObject({
			matchFound: false,
			reason: "hash-failed",
			hash: "0123456789",
		})
		expect(onHashError).toHaveBeenCalledTimes(1)
		expect(onHashError).toHaveBeenCalledWith(rom("broken.sfc"), {
			ok: false,
			output: "0123456789",
			error: "expected a 32-character hash, got 10 characters",
		})
	})

	it("uses the first game when several list the hash", async () => {
		const hasher = fakeHasher({ "game.sfc": HASH_A })
		const catalog = [
			game(7, "Regional Release", [HASH_A], 12),
			game(8, "Other Release", [HASH_A], 30),
		]
		const onMultiMatch = vi.fn()

		const result = await matchOne(context, rom("game.sfc"), catalog, hasher, {
			onMultiMatch,
		})

		expect(result.matchFound).toBe(true)
		expect(result.gameId).toBe(7)
		expect(result.title).toBe("Regional Release")
		expect(onMultiMatch).toHaveBeenCalledWith(rom("game.sfc"), HASH_A, catalog)
	})

	it("does not call the hooks on a plain match", async () => {
		const hasher = fakeHasher({ "game.sfc": HASH_A })
		const onHashError = vi.fn()
		const onMultiMatch = vi.fn()

		await matchOne(context, rom("game.sfc"), [game(1, "Only", [HASH_A])], hasher, {
			onHashError,
			onMultiMatch,
		})

		expect(onHashError).not.toHaveBeenCalled()
		expect(onMultiMatch).not.toHaveBeenCalled()
	})

	it("freezes its results", async () => {
		const hasher = fakeHasher({ "game.sfc": HASH_A })
		const result = await matchOne(context, rom("game.sfc"), [], hasher)
		expect(Object.isFrozen(result)).toBe(true)
	})
})
