/**
 * DAT catalog parsing
 *
 * Reads Logiqx-style datafiles:
 *
 *   <datafile>
 *     <header><description>Nintendo - SNES (20240101)</description></header>
 *     <game name="Foo (USA)" id="0001">
 *       <rom name="Foo (USA).sfc" size="524288" crc="1a2b3c4d"/>
 *     </game>
 *   </datafile>
 *
 * MAME-derived catalogs use <machine> instead of <game>; both are accepted.
 * Files are decoded with the encoding their XML declaration names (UTF-8 when
 * there is none).
 */

import { readFileSync } from "node:fs"
import { XMLParser, XMLValidator } from "fast-xml-parser"
import iconv from "iconv-lite"
import { ParseError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import { extractRegions } from "./regions.js"
import type { DatHeader, FileRecord, GameRecord, ParsedDat } from "./types.js"

const GAME_TAGS = ["game", "machine"] as const

const ARRAY_PATHS = new Set([
	"datafile.game",
	"datafile.machine",
	"datafile.game.rom",
	"datafile.machine.rom",
])

const xmlParser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "@_",
	allowBooleanAttributes: true,
	trimValues: true,
	parseTagValue: false,
	parseAttributeValue: false,
	// numeric character references (&#233; &#xE9;)
	htmlEntities: true,
	isArray: (_name, jpath) => ARRAY_PATHS.has(String(jpath)),
})

export type XmlNode = Record<string, unknown>

export function isNode(value: unknown): value is XmlNode {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function toArray(value: unknown): unknown[] {
	if (Array.isArray(value)) return value
	if (value === undefined || value === null) return []
	return [value]
}

function attr(node: XmlNode, name: string): string | undefined {
	const value = node[`@_${name}`]
	return typeof value === "string" && value.length > 0 ? value : undefined
}

function text(value: unknown): string | undefined {
	if (typeof value === "string") return value || undefined
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value)
	}
	if (Array.isArray(value)) return text(value[0])
	if (isNode(value)) return text(value["#text"])
	return undefined
}

function parseSize(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined
	const size = Number.parseInt(raw, 10)
	return Number.isFinite(size) && size >= 0 ? size : undefined
}

function parseHeader(raw: unknown): DatHeader {
	if (!isNode(raw)) return {}
	return {
		name: text(raw["name"]),
		description: text(raw["description"]),
		version: text(raw["version"]),
	}
}

function parseFile(raw: unknown, gameName: string, index: number): FileRecord {
	if (!isNode(raw)) {
		throw new ParseError(`Game "${gameName}": <rom> #${index + 1} is empty`)
	}
	const name = attr(raw, "name")
	if (!name) {
		throw new ParseError(
			`Game "${gameName}": <rom> #${index + 1} has no name attribute`,
		)
	}
	return {
		name,
		size: parseSize(attr(raw, "size")),
		crc: attr(raw, "crc"),
		md5: attr(raw, "md5"),
		sha1: attr(raw, "sha1"),
	}
}

function parseGame(raw: unknown, tag: string, index: number): GameRecord {
	if (!isNode(raw)) {
		throw new ParseError(`<${tag}> #${index + 1} has no attributes`)
	}
	const name = attr(raw, "name")
	if (!name) {
		throw new ParseError(`<${tag}> #${index + 1} has no name attribute`)
	}
	const files = toArray(raw["rom"]).map((rom, i) => parseFile(rom, name, i))
	return {
		name,
		regions: extractRegions(name),
		files,
		id: attr(raw, "id"),
		cloneOf: attr(raw, "cloneof"),
		cloneOfId: attr(raw, "cloneofid"),
		description: text(raw["description"]),
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

const DECLARED_ENCODING = /^[^<]*<\?xml[^>]*?\sencoding\s*=\s*["']([^"']+)["']/

/**
 * Encoding named by the byte order mark or the XML declaration
 */
export function detectEncoding(bytes: Buffer): string {
	if (bytes[0] === 0xff && bytes[1] === 0xfe) return "utf-16le"
	if (bytes[0] === 0xfe && bytes[1] === 0xff) return "utf-16be"
	const head = bytes.subarray(0, 512).toString("latin1")
	return DECLARED_ENCODING.exec(head)?.[1]?.toLowerCase() ?? "utf-8"
}

/**
 * Decode raw catalog bytes to text
 */
export function decodeCatalog(bytes: Buffer, source = "catalog"): string {
	const encoding = detectEncoding(bytes)
	if (!iconv.encodingExists(encoding)) {
		throw new ParseError(`${source} declares unsupported encoding "${encoding}"`)
	}
	return iconv.decode(bytes, encoding)
}

/**
 * Read a catalog file and decode it
 */
export function readCatalog(path: string): string {
	let bytes: Buffer
	try {
		bytes = readFileSync(path)
	} catch (err) {
		throw new ParseError(`Cannot read catalog ${path}: ${errorMessage(err)}`, {
			cause: err,
		})
	}
	return decodeCatalog(bytes, `Catalog ${path}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Throw a ParseError unless the document is well-formed XML
 */
export function assertWellFormed(xml: string, source = "catalog"): void {
	const check = XMLValidator.validate(xml)
	if (check !== true) {
		const { msg, line, col } = check.err
		throw new ParseError(
			`${source} is not well-formed (line ${line}, column ${col}): ${msg}`,
		)
	}
}

/**
 * Check well-formedness once and parse into an object tree
 */
export function parseXmlDocument(xml: string, source = "catalog"): XmlNode {
	assertWellFormed(xml, source)

	let document: unknown
	try {
		document = xmlParser.parse(xml)
	} catch (err) {
		throw new ParseError(`Failed to parse XML: ${errorMessage(err)}`, {
			cause: err,
		})
	}
	return isNode(document) ? document : {}
}

/**
 * Extract the header and games from a parsed catalog.
 * Games keep document order within each element type; in a file that mixes
 * both, every <game> entry is listed before every <machine> entry.
 */
export function datFromDocument(document: XmlNode): ParsedDat {
	if (!("datafile" in document)) {
		throw new ParseError("Invalid DAT: missing <datafile> root element")
	}

	// <datafile/> with no children parses to an empty string
	const datafile = document["datafile"]
	const root: XmlNode = isNode(datafile) ? datafile : {}
	const header = parseHeader(root["header"])

	const games: GameRecord[] = []
	for (const tag of GAME_TAGS) {
		for (const raw of toArray(root[tag])) {
			games.push(parseGame(raw, tag, games.length))
		}
	}

	if (games.length === 0) {
		log.dat.warn("catalog contains no <game> or <machine> entries")
	}
	log.dat.debug(
		{ games: games.length, description: header.description },
		"parsed catalog",
	)

	return { header, games }
}

/**
 * Parse a DAT document held in memory
 */
export function parseDat(xml: string): ParsedDat {
	return datFromDocument(parseXmlDocument(xml))
}

/**
 * Read and parse a DAT file from disk
 */
export function readDat(path: string): ParsedDat {
	return parseDat(readCatalog(path))
}
