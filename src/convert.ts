/**
 * DAT → playlist conversion pipeline
 *
 * validate options → load region map → read + parse catalog → validate
 * against its schema → resolve + classify each game → group → write one file
 * per group
 */

import { existsSync } from "node:fs"
import { datFromDocument, parseXmlDocument, readCatalog } from "./dat.js"
import { ConfigError } from "./errors.js"
import { log } from "./logger.js"
import { buildGroups, dbNameFor, groupLabel, writePlaylists } from "./playlist.js"
import { classifyRegions, loadRegionMap } from "./regions.js"
import { indexCatalog, resolveStoragePath } from "./storage.js"
import type {
	ConvertOptions,
	ConvertResult,
	GameRecord,
	RegionOptions,
	ResolvedEntry,
	StorageOptions,
} from "./types.js"
import { validateCatalogDocument } from "./validate.js"

/**
 * Reject option combinations before any work starts
 */
export function checkOptions(options: ConvertOptions): void {
	if (!options.input) {
		throw new ConfigError("No input catalog given")
	}
	if (!options.root) {
		throw new ConfigError("--input-path is required")
	}
	if (!options.output) {
		throw new ConfigError("Output path must not be empty")
	}
	if (!options.entrySeparator) {
		throw new ConfigError("Entry separator must not be empty")
	}
	if ((options.mapFile || options.regionMap) && !options.regionSplit) {
		throw new ConfigError("--map requires --region-split (-r)")
	}
}

/**
 * Resolve every game into a playlist entry.
 * Games without files are reported in `skipped`; in verify mode games whose
 * target is not on disk are reported in `missing`.
 */
export function resolveEntries(
	games: readonly GameRecord[],
	options: StorageOptions & RegionOptions & { verify: boolean },
): { entries: ResolvedEntry[]; skipped: string[]; missing: string[] } {
	const index = indexCatalog(games)
	const entries: ResolvedEntry[] = []
	const skipped: string[] = []
	const missing: string[] = []

	for (const game of games) {
		const target = resolveStoragePath(game, index, options)
		if (!target) {
			log.convert.debug({ game: game.name }, "no file entries, skipping")
			skipped.push(game.name)
			continue
		}

		if (options.verify && !existsSync(target.filePath)) {
			log.convert.warn(
				{ game: game.name, path: target.filePath },
				"file not found",
			)
			missing.push(target.filePath)
			continue
		}

		const { keys, world } = classifyRegions(game, options)
		entries.push({
			label: game.name,
			path: target.playlistPath,
			crc32: game.files[0]?.crc,
			regionKeys: keys,
			world,
			game,
		})
	}

	return { entries, skipped, missing }
}

export async function convertDat(
	options: ConvertOptions,
): Promise<ConvertResult> {
	checkOptions(options)

	const regionMap =
		options.regionMap ??
		(options.mapFile ? loadRegionMap(options.mapFile) : undefined)

	// checked and parsed once, shared by validation and extraction
	const document = parseXmlDocument(readCatalog(options.input))

	const validation = await validateCatalogDocument(document, {
		networkValidation: options.networkValidation,
		timeoutMs: options.validationTimeoutMs,
	})

	const { header, games } = datFromDocument(document)
	log.convert.info(
		{ games: games.length, input: options.input },
		"catalog loaded",
	)

	const { entries, skipped, missing } = resolveEntries(games, {
		...options,
		regionMap,
	})

	const groups = buildGroups(entries, {
		regionSplit: options.regionSplit,
		regionMap,
		mapWorld: options.mapWorld,
	})
	for (const group of groups) {
		log.convert.debug(
			{ group: groupLabel(group.key), items: group.entries.length },
			"built group",
		)
	}

	const written = writePlaylists(groups, {
		output: options.output,
		dbName: dbNameFor(header),
	})
	log.convert.info({ files: written.length }, "playlists written")

	return {
		games: games.length,
		written,
		skipped,
		missing,
		warnings: validation.warnings.map(warning => warning.message),
	}
}
