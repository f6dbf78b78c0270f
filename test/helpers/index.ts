/**
 * Test utilities for datlpl
 */

import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import type { GameRecord } from "../../src/types.js"
import { extractRegions } from "../../src/regions.js"

/**
 * Create a temporary directory for test isolation.
 * Returns cleanup function.
 */
export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "datlpl-test-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

export interface DatGameSpec {
	name: string
	roms?: Array<{ name: string; crc?: string; size?: number }>
	id?: string
	cloneOf?: string
	cloneOfId?: string
}

function escapeXml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
}

/**
 * Build a small Logiqx-style DAT document
 */
export function buildDat(
	games: DatGameSpec[],
	options: { description?: string; schemaLocation?: string } = {},
): string {
	const lines: string[] = ['<?xml version="1.0"?>']
	lines.push(
		options.schemaLocation
			? `<datafile xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:schemaLocation="${escapeXml(options.schemaLocation)}">`
			: "<datafile>",
	)
	if (options.description) {
		lines.push("\t<header>")
		lines.push("\t\t<name>Test System</name>")
		lines.push(`\t\t<description>${escapeXml(options.description)}</description>`)
		lines.push("\t</header>")
	}
	for (const game of games) {
		const attrs = [`name="${escapeXml(game.name)}"`]
		if (game.id) attrs.push(`id="${game.id}"`)
		if (game.cloneOf) attrs.push(`cloneof="${escapeXml(game.cloneOf)}"`)
		if (game.cloneOfId) attrs.push(`cloneofid="${game.cloneOfId}"`)
		lines.push(`\t<game ${attrs.join(" ")}>`)
		for (const rom of game.roms ?? []) {
			const romAttrs = [`name="${escapeXml(rom.name)}"`]
			if (rom.size !== undefined) romAttrs.push(`size="${rom.size}"`)
			if (rom.crc) romAttrs.push(`crc="${rom.crc}"`)
			lines.push(`\t\t<rom ${romAttrs.join(" ")}/>`)
		}
		lines.push("\t</game>")
	}
	lines.push("</datafile>")
	return lines.join("\n")
}

/**
 * GameRecord with a single file named after the game
 */
export function makeGame(
	name: string,
	overrides: Partial<GameRecord> = {},
): GameRecord {
	return {
		name,
		regions: extractRegions(name),
		files: [{ name: `${name}.sfc` }],
		...overrides,
	}
}
