/**
 * Catalog validation
 *
 * Well-formedness is always checked. When the root element points at an XML
 * schema (xsi:schemaLocation / xsi:noNamespaceSchemaLocation) and network
 * validation is enabled, the schema is fetched once (no retry) and the
 * catalog's element names are checked against the elements it declares.
 * Schema problems only ever produce warnings.
 */

import { fetch as undiciFetch } from "undici"
import {
	isNode,
	parseXmlDocument,
	readCatalog,
	type XmlNode,
} from "./dat.js"
import { ParseError, ValidationWarning, errorMessage } from "./errors.js"
import { log } from "./logger.js"

const USER_AGENT = "datlpl/1.0.0"
const DEFAULT_TIMEOUT_MS = 10_000

export interface ValidateOptions {
	/** Allow fetching the referenced schema */
	networkValidation: boolean
	timeoutMs?: number | undefined
}

export interface ValidationResult {
	/** Schema fetched and compared */
	schemaChecked: boolean
	schemaUrl?: string | undefined
	warnings: ValidationWarning[]
}

function childNodes(value: unknown): XmlNode[] {
	if (Array.isArray(value)) return value.filter(isNode)
	return isNode(value) ? [value] : []
}

function isElementKey(key: string): boolean {
	return !key.startsWith("@_") && !key.startsWith("?") && key !== "#text"
}

/**
 * Collect every element name used below (and including) the given keys
 */
function collectElementNames(node: XmlNode, names: Set<string>): void {
	for (const [key, value] of Object.entries(node)) {
		if (!isElementKey(key)) continue
		names.add(key)
		for (const child of childNodes(value)) {
			collectElementNames(child, names)
		}
	}
}

/**
 * Collect the names of all <xs:element name="…"> declarations of a schema
 */
function collectDeclaredElements(node: XmlNode, declared: Set<string>): void {
	for (const [key, value] of Object.entries(node)) {
		if (!isElementKey(key)) continue
		const local = key.includes(":") ? key.slice(key.indexOf(":") + 1) : key
		for (const child of childNodes(value)) {
			if (local === "element") {
				const name = child["@_name"]
				if (typeof name === "string") declared.add(name)
			}
			collectDeclaredElements(child, declared)
		}
	}
}

/**
 * Find the schema URL referenced by the document's root element
 */
export function findSchemaUrl(document: XmlNode): string | undefined {
	for (const [key, value] of Object.entries(document)) {
		if (!isElementKey(key) || !isNode(value)) continue
		for (const [attrName, attrValue] of Object.entries(value)) {
			if (typeof attrValue !== "string") continue
			if (attrName.endsWith(":noNamespaceSchemaLocation")) {
				return attrValue.trim() || undefined
			}
			if (attrName.endsWith(":schemaLocation")) {
				// "namespace url" pairs; the first pair is the root's schema
				const parts = attrValue.trim().split(/\s+/)
				if (parts.length >= 2) return parts[1]
			}
		}
		return undefined
	}
	return undefined
}

async function fetchSchema(url: string, timeoutMs: number): Promise<string> {
	const response = await undiciFetch(url, {
		headers: { "User-Agent": USER_AGENT },
		signal: AbortSignal.timeout(timeoutMs),
	})
	if (!response.ok) {
		throw new Error(`HTTP ${response.status}`)
	}
	return response.text()
}

/**
 * Validate an already parsed catalog against the schema it references
 */
export async function validateCatalogDocument(
	document: XmlNode,
	options: ValidateOptions,
): Promise<ValidationResult> {
	const schemaUrl = findSchemaUrl(document)

	if (!schemaUrl) {
		log.validate.debug("no schema referenced, only checked well-formedness")
		return { schemaChecked: false, warnings: [] }
	}

	if (!options.networkValidation) {
		const warning = new ValidationWarning(
			`Schema ${schemaUrl} not checked (network validation disabled)`,
		)
		log.validate.warn({ schemaUrl }, warning.message)
		return { schemaChecked: false, schemaUrl, warnings: [warning] }
	}

	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
	log.validate.debug({ schemaUrl, timeoutMs }, "fetching schema")

	let schemaXml: string
	try {
		schemaXml = await fetchSchema(schemaUrl, timeoutMs)
	} catch (err) {
		const warning = new ValidationWarning(
			`Failed to fetch schema ${schemaUrl}: ${errorMessage(err)}`,
			{ cause: err },
		)
		log.validate.warn({ schemaUrl }, warning.message)
		return { schemaChecked: false, schemaUrl, warnings: [warning] }
	}

	let schemaDoc: XmlNode
	try {
		schemaDoc = parseXmlDocument(schemaXml, "schema")
	} catch (err) {
		if (!(err instanceof ParseError)) throw err
		const warning = new ValidationWarning(
			`Schema ${schemaUrl} is not well-formed XML`,
			{ cause: err },
		)
		log.validate.warn({ schemaUrl }, warning.message)
		return { schemaChecked: false, schemaUrl, warnings: [warning] }
	}

	const declared = new Set<string>()
	collectDeclaredElements(schemaDoc, declared)

	if (declared.size === 0) {
		const warning = new ValidationWarning(
			`Schema ${schemaUrl} declares no elements`,
		)
		log.validate.warn({ schemaUrl }, warning.message)
		return { schemaChecked: false, schemaUrl, warnings: [warning] }
	}

	const used = new Set<string>()
	collectElementNames(document, used)
	const undeclared = [...used].filter(name => !declared.has(name)).sort()

	if (undeclared.length > 0) {
		const warning = new ValidationWarning(
			`Catalog does not match schema ${schemaUrl}: undeclared element(s) ${undeclared.join(", ")}`,
		)
		log.validate.warn({ schemaUrl, undeclared }, warning.message)
		return { schemaChecked: true, schemaUrl, warnings: [warning] }
	}

	log.validate.debug({ schemaUrl }, "catalog matches schema")
	return { schemaChecked: true, schemaUrl, warnings: [] }
}

/**
 * Validate catalog XML held in memory
 */
export async function validateCatalogXml(
	xml: string,
	options: ValidateOptions,
): Promise<ValidationResult> {
	return validateCatalogDocument(parseXmlDocument(xml), options)
}

/**
 * Validate a catalog file
 */
export async function validateCatalog(
	path: string,
	options: ValidateOptions,
): Promise<ValidationResult> {
	return validateCatalogXml(readCatalog(path), options)
}
