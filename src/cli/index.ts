#!/usr/bin/env node
/**
 * datlpl CLI - DAT catalog → RetroArch playlist converter
 */

import { Command } from "commander"
import { loadConfig, parseArchiveFormat, parseStorageMode } from "../config.js"
import { convertDat } from "../convert.js"
import { DatlplError, errorMessage } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { groupLabel } from "../playlist.js"
import type { ConvertOptions } from "../types.js"
import { ui } from "../ui.js"

const VERSION = "1.0.0"

interface CliOptions {
	inputPath: string
	archiveFormat?: string
	storageMode?: string
	output: string
	regionSplit: boolean
	map?: string
	mapWorld?: boolean
	entrySeparator?: string
	verify: boolean
	verbose: boolean
	quiet: boolean
	enableNetworkValidation?: boolean
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Failed to flush logs: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

async function run(input: string, options: CliOptions): Promise<void> {
	const { verbose, quiet } = options
	configureLogging({ verbose })

	const config = loadConfig()

	try {
		const convertOptions: ConvertOptions = {
			input,
			root: options.inputPath,
			archiveFormat: options.archiveFormat
				? parseArchiveFormat(options.archiveFormat)
				: config.archiveFormat,
			storageMode: options.storageMode
				? parseStorageMode(options.storageMode)
				: config.storageMode,
			entrySeparator: options.entrySeparator ?? config.entrySeparator,
			output: options.output,
			regionSplit: options.regionSplit,
			mapFile: options.map,
			mapWorld: options.mapWorld ?? config.mapWorld,
			verify: options.verify,
			networkValidation:
				options.enableNetworkValidation ?? config.networkValidation,
			validationTimeoutMs: config.validationTimeoutMs,
		}

		if (!quiet) ui.banner(VERSION, input, options.output)
		ui.debug(
			`archive=${convertOptions.archiveFormat} storage=${convertOptions.storageMode} split=${convertOptions.regionSplit}`,
			verbose,
		)

		const result = await convertDat(convertOptions)

		for (const warning of result.warnings) {
			ui.warn(warning)
		}

		if (!quiet) {
			ui.info(`${result.games} games read from catalog`)
			for (const file of result.written) {
				ui.success(
					`${file.path} (${groupLabel(file.key)}): ${file.items} items`,
				)
			}
			if (verbose) {
				ui.summarySection("Skipped (no files)", result.skipped, "red")
			} else if (result.skipped.length > 0) {
				ui.warn(`${result.skipped.length} games without files skipped`)
			}
			ui.summarySection("Missing on disk", result.missing, "red")
		}
	} catch (err) {
		if (err instanceof DatlplError) {
			log.cli.error({ code: err.code, err }, err.message)
			ui.error(err.message)
		} else {
			log.cli.error({ err }, "unexpected failure")
			ui.error(`Unexpected error: ${errorMessage(err)}`)
		}
		await exitWithCode(1)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("datlpl")
	.version(VERSION)
	.description("Convert a DAT catalog into RetroArch playlist (.lpl) files")
	.argument("<input>", "Input DAT XML file")
	.requiredOption(
		"--input-path <dir>",
		"Root path of the ROM storage (written into playlist paths)",
	)
	.option(
		"--archive-format <format>",
		"Archive format for ROMs: None, .zip, .7z (default: .7z)",
	)
	.option(
		"-s, --storage-mode <mode>",
		"ROM storage mode: Non-merged, Split, Merged (default: Merged)",
	)
	.option("-o, --output <file>", "Output LPL file", "output.lpl")
	.option("-r, --region-split", "Produce separate output files by region", false)
	.option(
		"--map <file>",
		"JSON file mapping country/region to output value (requires -r)",
	)
	.option(
		"--map-world",
		"Treat World as a regular region instead of adding it to every region file",
	)
	.option(
		"--entry-separator <sep>",
		"Separator between archive path and file name (default: |)",
	)
	.option("--verify", "Skip games whose files are missing on disk", false)
	.option("-v, --verbose", "Enable verbose output", false)
	.option("-q, --quiet", "Minimal output", false)
	.option(
		"--enable-network-validation",
		"Allow network access for XML schema validation",
	)
	.action(run)

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

await program.parseAsync()
