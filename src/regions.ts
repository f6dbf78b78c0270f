/**
 * Region classification for playlist splitting.
 *
 * A game's region tags come from the first parenthetical annotation of its
 * name that looks like a region list, e.g. "Foo (USA, Europe) (Rev 1)" →
 * ["USA", "Europe"]. Annotations containing digits or other punctuation
 * ("Rev 1", "v1.1") are skipped.
 */

import { readFileSync } from "node:fs"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import {
	NO_REGION,
	type GameRecord,
	type RegionKey,
	type RegionMap,
	type RegionOptions,
} from "./types.js"

const REGION_ANNOTATION = /\(([A-Za-z .-]+(?:,[A-Za-z .-]+)*)\)/

export const WORLD_TOKEN = "World"

const RegionMapSchema = z.record(z.string(), z.string())

export interface RegionClassification {
	/** Group keys the game belongs to on its own */
	keys: RegionKey[]
	/** Game joins every region group of the run */
	world: boolean
}

/**
 * Extract region tags from a title.
 * Returns an empty list when no region annotation exists.
 */
export function extractRegions(title: string): string[] {
	const match = REGION_ANNOTATION.exec(title)
	if (!match?.[1]) return []
	return match[1]
		.split(",")
		.map(region => region.trim())
		.filter(region => region.length > 0)
}

export function isWorldToken(token: string): boolean {
	return token.toLowerCase() === WORLD_TOKEN.toLowerCase()
}

/**
 * Look up a raw token in the region map; unmapped tokens pass through.
 */
export function mapRegion(token: string, regionMap?: RegionMap): string {
	if (regionMap && Object.hasOwn(regionMap, token)) {
		const mapped = regionMap[token]
		if (mapped !== undefined) return mapped
	}
	return token
}

/**
 * Classify a game into region group keys.
 *
 * World tokens (unless mapWorld is set) do not form a group; the game is
 * flagged so the playlist builder adds it to every region group instead.
 * Tokens mapped to an empty string are dropped.
 */
export function classifyRegions(
	game: GameRecord,
	options: RegionOptions,
): RegionClassification {
	if (!options.regionSplit) {
		return { keys: [], world: false }
	}
	if (game.regions.length === 0) {
		return { keys: [NO_REGION], world: false }
	}

	let world = false
	const keys: RegionKey[] = []
	for (const token of game.regions) {
		if (!options.mapWorld && isWorldToken(token)) {
			world = true
			continue
		}
		const key = mapRegion(token, options.regionMap)
		if (key.length > 0 && !keys.includes(key)) {
			keys.push(key)
		}
	}

	return { keys, world }
}

/**
 * Group key used for World games when a run has no other region group.
 */
export function worldFallbackKey(options: RegionOptions): string {
	return mapRegion(WORLD_TOKEN, options.regionMap) || WORLD_TOKEN
}

/**
 * Load a JSON region map ({ "USA": "NA", "Europe": "EU" })
 */
export function loadRegionMap(path: string): RegionMap {
	let raw: string
	try {
		raw = readFileSync(path, "utf-8")
	} catch (err) {
		throw new ConfigError(
			`Failed to load mapping file ${path}: ${errorMessage(err)}`,
			{ cause: err },
		)
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (err) {
		throw new ConfigError(
			`Mapping file ${path} is not valid JSON: ${errorMessage(err)}`,
			{ cause: err },
		)
	}

	const result = RegionMapSchema.safeParse(parsed)
	if (!result.success) {
		const issue = result.error.issues[0]
		const where = issue?.path.length ? ` at "${issue.path.join(".")}"` : ""
		throw new ConfigError(
			`Mapping file ${path} must map region names to strings${where}`,
		)
	}

	log.regions.debug(
		{ path, entries: Object.keys(result.data).length },
		"loaded region map",
	)
	return Object.freeze({ ...result.data })
}
