/**
 * Shared type definitions for datlpl
 */

// ─────────────────────────────────────────────────────────────────────────────
// Storage Settings
// ─────────────────────────────────────────────────────────────────────────────

export type ArchiveFormat = "none" | ".zip" | ".7z"

/**
 * ROM set storage conventions
 * - non-merged: every set is self-contained
 * - split: clones only hold the files that differ from their parent
 * - merged: clones live inside their parent's archive
 */
export type StorageMode = "non-merged" | "split" | "merged"

export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ["none", ".zip", ".7z"]
export const STORAGE_MODES: readonly StorageMode[] = [
	"non-merged",
	"split",
	"merged",
]

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface FileRecord {
	/** Relative file name as declared by the catalog */
	name: string
	size?: number | undefined
	crc?: string | undefined
	md5?: string | undefined
	sha1?: string | undefined
}

export interface GameRecord {
	name: string
	/** Region tags from the first region annotation of the name (e.g. USA, Europe) */
	regions: string[]
	files: FileRecord[]
	id?: string | undefined
	/** Parent set name */
	cloneOf?: string | undefined
	/** Parent set id */
	cloneOfId?: string | undefined
	description?: string | undefined
}

export interface DatHeader {
	name?: string | undefined
	description?: string | undefined
	version?: string | undefined
}

export interface ParsedDat {
	header: DatHeader
	games: GameRecord[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution & Output
// ─────────────────────────────────────────────────────────────────────────────

/** Group key used for games without any region annotation */
export const NO_REGION = Symbol("no-region")

export type RegionKey = string | typeof NO_REGION

export type RegionMap = Readonly<Record<string, string>>

export interface StorageTarget {
	/** File that has to exist on disk (archive or loose file) */
	filePath: string
	/** Member name inside the archive, when archived */
	entryName?: string | undefined
	/** Value written to the playlist (bare path or archive|entry) */
	playlistPath: string
}

export interface ResolvedEntry {
	label: string
	path: string
	crc32?: string | undefined
	/** Group keys; empty when region split is disabled */
	regionKeys: RegionKey[]
	/** True when the game carries a World annotation handled across groups */
	world: boolean
	game: GameRecord
}

export interface OutputGroup {
	key: RegionKey | null
	entries: ResolvedEntry[]
}

export interface PlaylistItem {
	path: string
	label: string
	core_path: string
	core_name: string
	crc32: string
	db_name: string
}

export interface Playlist {
	version: string
	default_core_path: string
	default_core_name: string
	label_display_mode: number
	right_thumbnail_mode: number
	left_thumbnail_mode: number
	thumbnail_match_mode: number
	sort_mode: number
	items: PlaylistItem[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface StorageOptions {
	root: string
	archiveFormat: ArchiveFormat
	storageMode: StorageMode
	/** Separator between archive path and member name */
	entrySeparator: string
}

export interface RegionOptions {
	regionSplit: boolean
	regionMap?: RegionMap | undefined
	/** Treat World as an ordinary region instead of joining every group */
	mapWorld: boolean
}

export interface ConvertOptions extends StorageOptions, RegionOptions {
	/** Catalog file path */
	input: string
	/** Output playlist path (used as the stem in region split mode) */
	output: string
	/** Region map file, loaded when regionMap is not given directly */
	mapFile?: string | undefined
	verify: boolean
	networkValidation: boolean
	validationTimeoutMs?: number | undefined
}

export interface WrittenPlaylist {
	path: string
	key: RegionKey | null
	items: number
}

export interface ConvertResult {
	games: number
	written: WrittenPlaylist[]
	/** Games without any file entry */
	skipped: string[]
	/** Targets missing on disk (verify mode only) */
	missing: string[]
	warnings: string[]
}
