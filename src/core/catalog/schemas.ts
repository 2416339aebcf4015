/**
 * Response shapes of the RetroAchievements Web API endpoints we call
 */

import { z } from "zod"
import type { CatalogEntry, RemotePlatform } from "../../types.js"

const ConsoleSchema = z.object({
	ID: z.coerce.number().int(),
	Name: z.string(),
	// Older responses omit the flags; treat them as not active.
	Active: z.boolean().default(false),
	IsGameSystem: z.boolean().default(false),
})

export const ConsoleListSchema = z.array(ConsoleSchema)

// Hashes normally arrive as an array, but an object keyed by index has been
// seen on some consoles.
const HashListSchema = z
	.union([z.array(z.string()), z.record(z.string())])
	.default([])
	.transform(hashes => (Array.isArray(hashes) ? hashes : Object.values(hashes)))

const GameSchema = z.object({
	ID: z.coerce.number().int(),
	Title: z.string(),
	ConsoleID: z.coerce.number().int(),
	ConsoleName: z.string(),
	NumAchievements: z.coerce.number().int().default(0),
	Hashes: HashListSchema,
})

export const GameListSchema = z.array(GameSchema)

export function toRemotePlatform(
	raw: z.infer<typeof ConsoleSchema>,
): RemotePlatform {
	return {
		id: raw.ID,
		name: raw.Name,
		active: raw.Active,
		isGameSystem: raw.IsGameSystem,
	}
}

export function toCatalogEntry(raw: z.infer<typeof GameSchema>): CatalogEntry {
	return {
		id: raw.ID,
		title: raw.Title,
		consoleId: raw.ConsoleID,
		consoleName: raw.ConsoleName,
		numAchievements: raw.NumAchievements,
		hashes: raw.Hashes,
	}
}
