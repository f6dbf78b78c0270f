/**
 * Storage path resolution
 *
 * Builds the on-disk location of a game's primary file from the catalog's
 * relative file name. No filesystem access happens here; checking that the
 * target exists is left to the caller (see convert.ts --verify).
 *
 *   root=/roms, rom="sub/Game.sfc"
 *   none → /roms/sub/Game.sfc
 *   .7z  → /roms/sub/Game.7z|Game.sfc
 *
 * In merged mode a clone lives in its parent's archive (or, for loose files,
 * beside the parent's primary file).
 */

import { basename, dirname, extname, join } from "node:path"
import { log } from "./logger.js"
import type {
	FileRecord,
	GameRecord,
	StorageOptions,
	StorageTarget,
} from "./types.js"

export interface CatalogIndex {
	byId: Map<string, GameRecord>
	byName: Map<string, GameRecord>
}

export function indexCatalog(games: readonly GameRecord[]): CatalogIndex {
	const byId = new Map<string, GameRecord>()
	const byName = new Map<string, GameRecord>()
	for (const game of games) {
		if (game.id && !byId.has(game.id)) byId.set(game.id, game)
		if (!byName.has(game.name)) byName.set(game.name, game)
	}
	return { byId, byName }
}

/** Catalog names may use either slash style */
function toRelativePath(name: string): string {
	return name.replace(/\\/g, "/").replace(/^\/+/, "")
}

/**
 * Swap (or append) the extension of a path
 */
export function replaceExtension(path: string, extension: string): string {
	const ext = extname(path)
	return ext ? path.slice(0, -ext.length) + extension : path + extension
}

function parentOf(game: GameRecord, index: CatalogIndex): GameRecord | undefined {
	if (game.cloneOfId) {
		const byId = index.byId.get(game.cloneOfId)
		if (byId) return byId
	}
	if (game.cloneOf) {
		return index.byName.get(game.cloneOf)
	}
	return undefined
}

/**
 * Follow the clone chain to the top-level parent that owns the merged set.
 * Returns undefined for parents, unknown parents, and parents without files.
 */
export function findMergeParent(
	game: GameRecord,
	index: CatalogIndex,
): GameRecord | undefined {
	const seen = new Set<GameRecord>([game])
	let current = game
	let parent = parentOf(current, index)
	while (parent && !seen.has(parent)) {
		seen.add(parent)
		current = parent
		parent = parentOf(current, index)
	}
	if (current === game || current.files.length === 0) return undefined
	return current
}

/**
 * Resolve the storage target for a game's primary file.
 * Returns null when the game has no file entries.
 */
export function resolveStoragePath(
	game: GameRecord,
	index: CatalogIndex,
	options: StorageOptions,
): StorageTarget | null {
	const file: FileRecord | undefined = game.files[0]
	if (!file) return null

	const relative = toRelativePath(file.name)
	const owner =
		options.storageMode === "merged" ? findMergeParent(game, index) : undefined
	const ownerFile = owner?.files[0]
	const ownerRelative = ownerFile ? toRelativePath(ownerFile.name) : relative

	if (options.archiveFormat === "none") {
		// Loose files of a merged clone sit next to the parent's primary file
		const filePath = owner
			? join(options.root, dirname(ownerRelative), basename(relative))
			: join(options.root, relative)
		return { filePath, playlistPath: filePath }
	}

	const filePath = replaceExtension(
		join(options.root, ownerRelative),
		options.archiveFormat,
	)
	const entryName = basename(relative)
	if (owner) {
		log.storage.trace(
			{ game: game.name, parent: owner.name },
			"clone resolved into parent archive",
		)
	}
	return {
		filePath,
		entryName,
		playlistPath: `${filePath}${options.entrySeparator}${entryName}`,
	}
}
