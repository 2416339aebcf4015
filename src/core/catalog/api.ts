/**
 * RetroAchievements Web API communication
 *
 * Every call authenticates with the web API key in the `y` query parameter.
 * There is no retry layer: a failed request is fatal for the run.
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from "undici"
import type { z } from "zod"
import { DEFAULT_API_BASE_URL } from "../../config.js"
import { CatalogError, errorMessage } from "../../errors.js"
import { log } from "../../logger.js"
import type { CatalogEntry, RemotePlatform } from "../../types.js"
import {
	ConsoleListSchema,
	GameListSchema,
	toCatalogEntry,
	toRemotePlatform,
} from "./schemas.js"

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const USER_AGENT = "cheevo-scan/1.0.0"

// Requests are strictly sequential, so one keep-alive connection is enough.
const RA_API_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	connections: 1,
	pipelining: 0,
})

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

/** The catalog operations the pipeline depends on */
export interface CatalogSource {
	validateCredential(apiKey: string): Promise<boolean>
	listActivePlatforms(apiKey: string): Promise<RemotePlatform[]>
	listCatalog(apiKey: string, platformId: number): Promise<CatalogEntry[]>
}

export interface CatalogClientOptions {
	baseUrl?: string
	/** Alternate undici dispatcher (tests pass a MockAgent) */
	dispatcher?: Dispatcher
}

export class CatalogClient implements CatalogSource {
	private readonly baseUrl: string
	private readonly dispatcher: Dispatcher

	constructor(options: CatalogClientOptions = {}) {
		this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "")
		this.dispatcher = options.dispatcher ?? RA_API_AGENT
	}

	/**
	 * Any non-empty successful response means the key works. A rejected key
	 * and an unreachable server both come back as false.
	 */
	async validateCredential(apiKey: string): Promise<boolean> {
		if (!apiKey.trim()) return false

		try {
			const response = await this.get("API_GetAchievementOfTheWeek.php", {
				y: apiKey,
			})
			const raw = await response.text()
			if (!response.ok) {
				log.catalog.warn(
					{ status: response.status },
					"credential check rejected",
				)
				return false
			}
			return raw.trim().length > 0
		} catch (err) {
			log.catalog.warn({ error: errorMessage(err) }, "credential check failed")
			return false
		}
	}

	/** Active game systems only; hubs and other non-game categories are dropped */
	async listActivePlatforms(apiKey: string): Promise<RemotePlatform[]> {
		const consoles = await this.getJson(
			"API_GetConsoleIDs.php",
			{ y: apiKey },
			ConsoleListSchema,
		)
		const platforms = consoles
			.map(toRemotePlatform)
			.filter(p => p.active && p.isGameSystem)
		log.catalog.debug(
			{ total: consoles.length, active: platforms.length },
			"fetched console list",
		)
		return platforms
	}

	/** Every game for one console, each with all of its accepted hashes */
	async listCatalog(
		apiKey: string,
		platformId: number,
	): Promise<CatalogEntry[]> {
		const games = await this.getJson(
			"API_GetGameList.php",
			{ y: apiKey, i: String(platformId), h: "1" },
			GameListSchema,
		)
		log.catalog.debug({ platformId, games: games.length }, "fetched game list")
		return games.map(toCatalogEntry)
	}

	private get(endpoint: string, params: Record<string, string>) {
		const query = new URLSearchParams(params)
		return undiciFetch(`${this.baseUrl}/${endpoint}?${query.toString()}`, {
			headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
			dispatcher: this.dispatcher,
		})
	}

	private async getJson<T extends z.ZodTypeAny>(
		endpoint: string,
		params: Record<string, string>,
		schema: T,
	): Promise<z.output<T>> {
		let raw: string
		try {
			const response = await this.get(endpoint, params)
			raw = await response.text()
			if (!response.ok) {
				throw new CatalogError(
					`${endpoint} failed with HTTP ${response.status}${raw ? `: ${raw.slice(0, 200)}` : ""}`,
				)
			}
		} catch (err) {
			if (err instanceof CatalogError) throw err
			throw new CatalogError(`${endpoint} request failed: ${errorMessage(err)}`, {
				cause: err,
			})
		}

		let data: unknown
		try {
			data = JSON.parse(raw)
		} catch (err) {
			log.catalog.warn({ endpoint, raw: raw.slice(0, 200) }, "invalid JSON")
			throw new CatalogError(`${endpoint} returned invalid JSON`, { cause: err })
		}

		const parsed = schema.safeParse(data)
		if (!parsed.success) {
			const issue = parsed.error.issues[0]
			const where = issue?.path.length ? ` at ${issue.path.join(".")}` : ""
			throw new CatalogError(
				`${endpoint} returned an unexpected shape${where}: ${issue?.message ?? "unknown"}`,
			)
		}
		return parsed.data
	}
}
