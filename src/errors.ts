/**
 * Fatal error taxonomy
 *
 * Anything thrown as a FatalError aborts the run before a report is written.
 * Per-ROM problems (bad hasher output, no catalog match) never throw; they
 * end up as unmatched records instead.
 */

export class FatalError extends Error {
	/** Process exit code the CLI reports for this failure */
	readonly exitCode: number = 1

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Missing, unreadable, or invalid configuration */
export class ConfigError extends FatalError {}

/** Hashing tool missing and could not be acquired */
export class SetupError extends FatalError {}

/** RetroAchievements API rejected a request or returned garbage */
export class CatalogError extends FatalError {}

/** Library layout problems detected while running */
export class PipelineError extends FatalError {}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
