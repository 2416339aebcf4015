/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: Run aborted
 * - error: A ROM could not be hashed
 * - warn: Recoverable issue (ambiguous catalog match, inactive platform)
 * - info: Key milestones (default for production)
 * - debug: Detailed operation info (--verbose)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger(levelOverride?: string) {
	return isDev
		? pino({
				level: levelOverride ?? level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
						destination: 2,
					},
				},
			})
		: pino(
				{
					level: levelOverride ?? level,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// The CLI sets process.exitCode right after a fatal error; sync writes
	// keep the last lines from being dropped.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel =
		process.env["LOG_LEVEL_FILE"] ??
		(process.env["LOG_LEVEL"] || process.env["DEBUG"] ? level : "debug")
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

export interface ConfigureLoggingOptions {
	/** Write structured logs to this file instead of stderr */
	logFilePath?: string | undefined
	/** Raise console verbosity to debug (ignored when LOG_LEVEL is set) */
	verbose?: boolean
}

export function configureLogging(options: ConfigureLoggingOptions): void {
	if (options.logFilePath) {
		logger = createFileLogger(options.logFilePath)
		return
	}
	if (options.verbose && !process.env["LOG_LEVEL"]) {
		logger = createConsoleLogger("debug")
	}
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("hasher")
 * log.error({ filePath }, "unexpected hasher output")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get catalog() {
		return createLogger("catalog")
	},
	get hasher() {
		return createLogger("hasher")
	},
	get pipeline() {
		return createLogger("pipeline")
	},
	get setup() {
		return createLogger("setup")
	},
	get report() {
		return createLogger("report")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
