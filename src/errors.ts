/**
 * Error taxonomy
 *
 * ParseError, ConfigError and OutputError abort a run; ValidationWarning is
 * collected and logged but never thrown out of the pipeline.
 */

export type ErrorCode =
	| "PARSE_ERROR"
	| "CONFIG_ERROR"
	| "IO_ERROR"
	| "VALIDATION_WARNING"

export class DatlplError extends Error {
	readonly code: ErrorCode

	constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "DatlplError"
		this.code = code
	}
}

/** Malformed or unexpected catalog structure */
export class ParseError extends DatlplError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "PARSE_ERROR", options)
		this.name = "ParseError"
	}
}

/** Invalid option combination or unreadable configuration input */
export class ConfigError extends DatlplError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "CONFIG_ERROR", options)
		this.name = "ConfigError"
	}
}

/** Output location could not be written */
export class OutputError extends DatlplError {
	readonly path: string

	constructor(message: string, path: string, options?: { cause?: unknown }) {
		super(message, "IO_ERROR", options)
		this.name = "OutputError"
		this.path = path
	}
}

/** Schema validation could not be completed or failed */
export class ValidationWarning extends DatlplError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "VALIDATION_WARNING", options)
		this.name = "ValidationWarning"
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
