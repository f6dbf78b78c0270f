/**
 * Centralized logging with pino
 *
 * Pino carries structured logs; ui.ts carries the user-facing CLI output.
 *
 * Log levels:
 * - error: Run aborted
 * - warn: Recoverable issue (schema check failed, missing file in verify mode)
 * - info: Key milestones
 * - debug: Per-game details (--verbose)
 */

import pino, { type Logger } from "pino"

// Determine log level from environment or use sensible default
const envLevel =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for interactive terminals, raw JSON for pipes/CI
const isDev =
	Boolean(process.stderr.isTTY) && !process.env["CI"] && envLevel !== "silent"

export interface ConfigureLoggingOptions {
	/** Lower the level to debug unless LOG_LEVEL pins it */
	verbose: boolean
}

function createRootLogger(level: string): Logger {
	return isDev
		? pino({
				level,
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
					level,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createRootLogger(envLevel)

/** Reconfigure the root logger for a CLI run. */
export function configureLogging(options: ConfigureLoggingOptions): void {
	if (process.env["LOG_LEVEL"]) return
	const next = options.verbose ? "debug" : envLevel
	if (logger.level !== next) {
		logger.level = next
	}
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("dat")
 * log.debug({ games: 12 }, "parsed catalog")
 */
export function createLogger(module: string): Logger {
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
	get dat() {
		return createLogger("dat")
	},
	get regions() {
		return createLogger("regions")
	},
	get storage() {
		return createLogger("storage")
	},
	get playlist() {
		return createLogger("playlist")
	},
	get validate() {
		return createLogger("validate")
	},
	get convert() {
		return createLogger("convert")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
