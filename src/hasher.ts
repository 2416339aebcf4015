/**
 * Adapter for the external RetroAchievements hashing tool (RAHasher)
 *
 * Invocation: `<tool> <consoleId> <absoluteFilePath>`, hash on stdout.
 * The exit code is ignored; the output shape is the only success test.
 */

import { spawn } from "node:child_process"
import { log } from "./logger.js"

/** RetroAchievements hashes are 32-character hex MD5 digests */
export const HASH_LENGTH = 32

export type HashOutcome =
	| { ok: true; hash: string }
	| { ok: false; output: string; error: string }

export interface Hasher {
	hash(platformId: number, filePath: string): Promise<HashOutcome>
}

/**
 * Validate captured tool output. Trailing whitespace (the newline the tool
 * prints) is dropped before the length check.
 */
export function checkHashOutput(stdout: string): HashOutcome {
	const output = stdout.trim()
	if (output.length === HASH_LENGTH) {
		return { ok: true, hash: output }
	}
	return {
		ok: false,
		output,
		error:
			output.length === 0
				? "hashing tool produced no output"
				: `expected a ${HASH_LENGTH}-character hash, got ${output.length} characters`,
	}
}

export class ExternalHasher implements Hasher {
	constructor(private readonly toolPath: string) {}

	async hash(platformId: number, filePath: string): Promise<HashOutcome> {
		const { stdout, spawnError } = await this.run([
			String(platformId),
			filePath,
		])
		const outcome = checkHashOutput(stdout)

		if (!outcome.ok) {
			log.hasher.error(
				{
					filePath,
					platformId,
					output: outcome.output,
					...(spawnError ? { spawnError } : {}),
				},
				`could not hash ${filePath}: ${outcome.error}`,
			)
		}
		return outcome
	}

	private run(args: string[]): Promise<{ stdout: string; spawnError?: string }> {
		return new Promise(resolve => {
			const chunks: Buffer[] = []
			let spawnError: string | undefined
			let settled = false

			const finish = () => {
				if (settled) return
				settled = true
				const stdout = Buffer.concat(chunks).toString("utf8")
				resolve(spawnError ? { stdout, spawnError } : { stdout })
			}

			const proc = spawn(this.toolPath, args, {
				stdio: ["ignore", "pipe", "ignore"],
				windowsHide: true,
			})

			proc.stdout.on("data", (chunk: Buffer) => chunks.push(chunk))

			proc.on("close", finish)
			proc.on("error", err => {
				spawnError = err.message
				finish()
			})
		})
	}
}
