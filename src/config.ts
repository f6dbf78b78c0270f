/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import {
	ARCHIVE_FORMATS,
	STORAGE_MODES,
	type ArchiveFormat,
	type StorageMode,
} from "./types.js"

const ConfigSchema = z.object({
	archiveFormat: z.enum(["none", ".zip", ".7z"]).default(".7z"),
	storageMode: z.enum(["non-merged", "split", "merged"]).default("merged"),
	entrySeparator: z.string().min(1).default("|"),
	mapWorld: z.boolean().default(false),
	networkValidation: z.boolean().default(false),
	validationTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = {
	archiveFormat: ".7z",
	storageMode: "merged",
	entrySeparator: "|",
	mapWorld: false,
	networkValidation: false,
	validationTimeoutMs: 10_000,
}

/**
 * Load configuration from .datlplrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(
	paths: string[] = [
		join(process.cwd(), ".datlplrc"),
		join(process.cwd(), ".datlplrc.json"),
		join(homedir(), ".datlplrc"),
		join(homedir(), ".datlplrc.json"),
	],
): Config {
	for (const path of paths) {
		if (!existsSync(path)) continue
		try {
			const raw = readFileSync(path, "utf-8")
			const parsed = JSON.parse(raw) as unknown
			return ConfigSchema.parse(parsed)
		} catch (err) {
			// Continue to next path if invalid
			log.cli.warn({ path, err: errorMessage(err) }, "ignoring invalid config")
		}
	}

	return DEFAULT_CONFIG
}

/**
 * Normalize an archive format flag.
 * Accepts "none"/"None", ".zip"/"zip" and ".7z"/"7z".
 */
export function parseArchiveFormat(value: string): ArchiveFormat {
	const lower = value.trim().toLowerCase()
	if (lower === "none") return "none"
	const dotted = lower.startsWith(".") ? lower : `.${lower}`
	const match = ARCHIVE_FORMATS.find(format => format === dotted)
	if (!match) {
		throw new ConfigError(
			`Unknown archive format "${value}" (expected one of: None, .zip, .7z)`,
		)
	}
	return match
}

/**
 * Normalize a storage mode flag.
 * Accepts "Non-merged", "nonmerged", "Split", "Merged" in any case.
 */
export function parseStorageMode(value: string): StorageMode {
	const lower = value.trim().toLowerCase()
	const normalized = lower === "nonmerged" ? "non-merged" : lower
	const match = STORAGE_MODES.find(mode => mode === normalized)
	if (!match) {
		throw new ConfigError(
			`Unknown storage mode "${value}" (expected one of: Non-merged, Split, Merged)`,
		)
	}
	return match
}

export { DEFAULT_CONFIG, ConfigSchema }
