/**
 * RetroArch playlist (.lpl) building and output
 */

import { mkdirSync, writeFileSync } from "node:fs"
import { dirname, extname } from "node:path"
import { ConfigError, OutputError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import { worldFallbackKey } from "./regions.js"
import {
	NO_REGION,
	type DatHeader,
	type OutputGroup,
	type Playlist,
	type PlaylistItem,
	type RegionKey,
	type RegionOptions,
	type ResolvedEntry,
	type WrittenPlaylist,
} from "./types.js"

export const PLAYLIST_VERSION = "1.5"
export const DETECT_CORE = "DETECT"
export const DEFAULT_DB_NAME = "playlist.lpl"
export const NO_REGION_LABEL = "No Region"

// ─────────────────────────────────────────────────────────────────────────────
// Grouping
// ─────────────────────────────────────────────────────────────────────────────

function addUnique(group: OutputGroup, entry: ResolvedEntry): void {
	if (group.entries.some(existing => existing.game.name === entry.game.name)) {
		return
	}
	group.entries.push(entry)
}

/**
 * Accumulate entries into output groups.
 *
 * Without region split there is exactly one group (key null). With region
 * split, groups appear in order of first appearance of their key, followed
 * by region map targets nobody claimed yet; World entries are added to every
 * one of them. The no-region group, when present, is always last.
 */
export function buildGroups(
	entries: readonly ResolvedEntry[],
	options: RegionOptions,
): OutputGroup[] {
	if (!options.regionSplit) {
		return [{ key: null, entries: [...entries] }]
	}

	const groups = new Map<string, OutputGroup>()
	const ensure = (key: string): OutputGroup => {
		let group = groups.get(key)
		if (!group) {
			group = { key, entries: [] }
			groups.set(key, group)
		}
		return group
	}

	for (const entry of entries) {
		for (const key of entry.regionKeys) {
			if (key !== NO_REGION) ensure(key)
		}
	}

	const hasWorld = entries.some(entry => entry.world)
	if (hasWorld) {
		const worldKey = worldFallbackKey(options)
		for (const value of Object.values(options.regionMap ?? {})) {
			if (value.length > 0 && value !== worldKey) ensure(value)
		}
		if (groups.size === 0) {
			log.playlist.debug(
				{ key: worldKey },
				"only World entries present, grouping them on their own",
			)
			ensure(worldKey)
		}
	}

	const noRegion: OutputGroup = { key: NO_REGION, entries: [] }
	for (const entry of entries) {
		for (const key of entry.regionKeys) {
			if (key === NO_REGION) {
				addUnique(noRegion, entry)
			} else {
				addUnique(ensure(key), entry)
			}
		}
		if (entry.world) {
			for (const group of groups.values()) {
				addUnique(group, entry)
			}
		}
	}

	const result = [...groups.values()]
	if (noRegion.entries.length > 0) result.push(noRegion)
	return result
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Playlist database name, derived from the catalog header description
 */
export function dbNameFor(header: DatHeader): string {
	return header.description ? `${header.description}.lpl` : DEFAULT_DB_NAME
}

export function formatCrc(crc: string | undefined): string {
	return crc ? `${crc.toUpperCase()}|crc` : "|crc"
}

export function toPlaylistItem(
	entry: ResolvedEntry,
	dbName: string,
): PlaylistItem {
	return {
		path: entry.path,
		label: entry.label,
		core_path: DETECT_CORE,
		core_name: DETECT_CORE,
		crc32: formatCrc(entry.crc32),
		db_name: dbName,
	}
}

export function buildPlaylist(
	entries: readonly ResolvedEntry[],
	dbName: string,
): Playlist {
	return {
		version: PLAYLIST_VERSION,
		default_core_path: "",
		default_core_name: "",
		label_display_mode: 0,
		right_thumbnail_mode: 0,
		left_thumbnail_mode: 0,
		thumbnail_match_mode: 0,
		sort_mode: 0,
		items: entries.map(entry => toPlaylistItem(entry, dbName)),
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// File Output
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Make a group key safe to use inside a file name
 */
export function sanitizeGroupKey(key: string): string {
	const cleaned = key
		// eslint-disable-next-line no-control-regex
		.replace(/[\\/:*?"<>|\u0000-\u001f]/g, "")
		.replace(/\s+/g, " ")
		.trim()
		.replace(/[. ]+$/, "")
	return cleaned || "Unknown"
}

/**
 * Output file for a group: "out.lpl" → "out (USA).lpl", "out (No Region).lpl"
 */
export function groupFileName(output: string, key: RegionKey | null): string {
	if (key === null) return output
	const ext = extname(output)
	const stem = ext ? output.slice(0, -ext.length) : output
	const label = key === NO_REGION ? NO_REGION_LABEL : sanitizeGroupKey(key)
	return `${stem} (${label})${ext}`
}

export function writePlaylist(path: string, playlist: Playlist): void {
	try {
		mkdirSync(dirname(path), { recursive: true })
		writeFileSync(path, JSON.stringify(playlist, null, 2) + "\n", "utf-8")
	} catch (err) {
		throw new OutputError(
			`Cannot write playlist ${path}: ${errorMessage(err)}`,
			path,
			{ cause: err },
		)
	}
	log.playlist.debug(
		{ path, items: playlist.items.length },
		"wrote playlist",
	)
}

/**
 * File name for every group, rejecting keys that land on the same file.
 * Names are compared case-insensitively.
 */
export function planGroupFiles(
	groups: readonly OutputGroup[],
	output: string,
): Array<{ group: OutputGroup; path: string }> {
	const claimed = new Map<string, RegionKey | null>()
	return groups.map(group => {
		const path = groupFileName(output, group.key)
		const folded = path.toLowerCase()
		const owner = claimed.get(folded)
		if (owner !== undefined) {
			throw new ConfigError(
				`Region groups "${groupLabel(owner)}" and "${groupLabel(group.key)}" would both be written to ${path}`,
			)
		}
		claimed.set(folded, group.key)
		return { group, path }
	})
}

/**
 * Write one playlist file per group.
 * Files are independent: a failure leaves previously written files in place.
 */
export function writePlaylists(
	groups: readonly OutputGroup[],
	options: { output: string; dbName: string },
): WrittenPlaylist[] {
	const written: WrittenPlaylist[] = []
	for (const { group, path } of planGroupFiles(groups, options.output)) {
		writePlaylist(path, buildPlaylist(group.entries, options.dbName))
		written.push({ path, key: group.key, items: group.entries.length })
	}
	return written
}

/**
 * Human-readable group label for logs and summaries
 */
export function groupLabel(key: RegionKey | null): string {
	if (key === null) return "all"
	return key === NO_REGION ? NO_REGION_LABEL : key
}
