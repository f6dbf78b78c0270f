/**
 * Unit tests for catalog validation
 *
 * The schema fetch is mocked; no test touches the network.
 */

import { describe, it, expect, vi, beforeEach } from "vitest"
import { fetch, Response } from "undici"
import { ParseError, ValidationWarning } from "../../src/errors.js"
import { writeFileSync } from "node:fs"
import { join } from "node:path"
import {
	findSchemaUrl,
	validateCatalog,
	validateCatalogXml,
} from "../../src/validate.js"
import { buildDat, withTempDir } from "../helpers/index.js"

vi.mock("undici", async importOriginal => {
	const actual = await importOriginal<typeof import("undici")>()
	return { ...actual, fetch: vi.fn() }
})

const fetchMock = vi.mocked(fetch)

const SCHEMA_URL = "https://example.invalid/datafile.xsd"

const SCHEMA = `<?xml version="1.0"?>
<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
	<xs:element name="datafile">
		<xs:complexType>
			<xs:sequence>
				<xs:element name="header">
					<xs:complexType>
						<xs:sequence>
							<xs:element name="name" type="xs:string"/>
							<xs:element name="description" type="xs:string"/>
						</xs:sequence>
					</xs:complexType>
				</xs:element>
				<xs:element name="game" maxOccurs="unbounded">
					<xs:complexType>
						<xs:sequence>
							<xs:element name="rom" maxOccurs="unbounded"/>
						</xs:sequence>
					</xs:complexType>
				</xs:element>
			</xs:sequence>
		</xs:complexType>
	</xs:element>
</xs:schema>`

const CATALOG = buildDat(
	[{ name: "Foo (USA)", roms: [{ name: "Foo (USA).sfc" }] }],
	{
		description: "Test Catalog",
		schemaLocation: `http://example.invalid/ns ${SCHEMA_URL}`,
	},
)

describe("findSchemaUrl", () => {
	it("reads the second part of xsi:schemaLocation", () => {
		expect(
			findSchemaUrl({
				datafile: { "@_xsi:schemaLocation": "urn:ns https://x.invalid/a.xsd" },
			}),
		).toBe("https://x.invalid/a.xsd")
	})

	it("reads xsi:noNamespaceSchemaLocation", () => {
		expect(
			findSchemaUrl({
				"?xml": { "@_version": "1.0" },
				datafile: { "@_xsi:noNamespaceSchemaLocation": "datafile.xsd" },
			}),
		).toBe("datafile.xsd")
	})

	it("returns undefined without a schema reference", () => {
		expect(findSchemaUrl({ datafile: { game: [] } })).toBeUndefined()
	})
})

describe("validateCatalogXml", () => {
	beforeEach(() => {
		fetchMock.mockReset()
	})

	it("only checks well-formedness without a schema reference", async () => {
		const xml = buildDat([{ name: "Foo", roms: [{ name: "Foo.sfc" }] }])

		const result = await validateCatalogXml(xml, { networkValidation: true })

		expect(result).toEqual({ schemaChecked: false, warnings: [] })
		expect(fetchMock).not.toHaveBeenCalled()
	})

	it("rejects malformed catalogs", async () => {
		await expect(
			validateCatalogXml("<datafile><game></datafile>", {
				networkValidation: false,
			}),
		).rejects.toBeInstanceOf(ParseError)
	})

	it("skips the schema with a warning when network access is disabled", async () => {
		const result = await validateCatalogXml(CATALOG, { networkValidation: false })

		expect(fetchMock).not.toHaveBeenCalled()
		expect(result.schemaChecked).toBe(false)
		expect(result.schemaUrl).toBe(SCHEMA_URL)
		expect(result.warnings.map(w => w.message)).toEqual([
			`Schema ${SCHEMA_URL} not checked (network validation disabled)`,
		])
	})

	it("accepts catalogs whose elements the schema declares", async () => {
		fetchMock.mockResolvedValue(new Response(SCHEMA, { status: 200 }))

		const result = await validateCatalogXml(CATALOG, { networkValidation: true })

		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect(fetchMock.mock.calls[0]?.[0]).toBe(SCHEMA_URL)
		expect(result).toEqual({
			schemaChecked: true,
			schemaUrl: SCHEMA_URL,
			warnings: [],
		})
	})

	it("warns about undeclared elements", async () => {
		fetchMock.mockResolvedValue(new Response(SCHEMA, { status: 200 }))
		const xml = CATALOG.replace(
			"<header>",
			"<header>\n\t\t<author>Someone</author>",
		)

		const result = await validateCatalogXml(xml, { networkValidation: true })

		expect(result.schemaChecked).toBe(true)
		expect(result.warnings).toHaveLength(1)
		expect(result.warnings[0]).toBeInstanceOf(ValidationWarning)
		expect(result.warnings[0]?.message).toBe(
			`Catalog does not match schema ${SCHEMA_URL}: undeclared element(s) author`,
		)
	})

	it("warns instead of failing when the fetch fails", async () => {
		fetchMock.mockRejectedValue(new Error("connect ETIMEDOUT"))

		const result = await validateCatalogXml(CATALOG, { networkValidation: true })

		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect(result.schemaChecked).toBe(false)
		expect(result.warnings[0]?.message).toBe(
			`Failed to fetch schema ${SCHEMA_URL}: connect ETIMEDOUT`,
		)
	})

	it("warns on HTTP errors", async () => {
		fetchMock.mockResolvedValue(new Response("gone", { status: 404 }))

		const result = await validateCatalogXml(CATALOG, { networkValidation: true })

		expect(result.warnings[0]?.message).toBe(
			`Failed to fetch schema ${SCHEMA_URL}: HTTP 404`,
		)
	})

	it("warns when the schema is not XML", async () => {
		fetchMock.mockResolvedValue(
			new Response("<html><body>", { status: 200 }),
		)

		const result = await validateCatalogXml(CATALOG, { networkValidation: true })

		expect(result.warnings[0]?.message).toBe(
			`Schema ${SCHEMA_URL} is not well-formed XML`,
		)
	})

	it("warns when the schema declares nothing", async () => {
		fetchMock.mockResolvedValue(
			new Response('<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema"/>', {
				status: 200,
			}),
		)

		const result = await validateCatalogXml(CATALOG, { networkValidation: true })

		expect(result.warnings[0]?.message).toBe(
			`Schema ${SCHEMA_URL} declares no elements`,
		)
	})
})

describe("validateCatalog", () => {
	it("validates a catalog file", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "catalog.dat")
			writeFileSync(path, CATALOG)

			const result = await validateCatalog(path, { networkValidation: false })

			expect(result.schemaUrl).toBe(SCHEMA_URL)
			expect(result.schemaChecked).toBe(false)
		})
	})

	it("raises ParseError for unreadable files", async () => {
		await withTempDir(async dir => {
			await expect(
				validateCatalog(join(dir, "absent.dat"), { networkValidation: false }),
			).rejects.toBeInstanceOf(ParseError)
		})
	})
})
