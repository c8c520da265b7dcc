/**
 * mil CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (with support for flags and options)
 * - Loading programs from `.mil` source or JSON documents
 * - Loading batch transaction fixtures
 * - Rendering per-transaction results
 */

import { readFile } from "node:fs/promises";
import type { BatchEntry } from "./batch.js";
import { MilError, attempt, fail, type Result } from "./errors.js";
import { formatStack } from "./format.js";
import { parseProgram } from "./parser/syntax.js";
import type { Program } from "./types.js";
import { validateFixtures, validateProgram } from "./validator.js";
import type { TransactionFixture } from "./zod-schemas.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	help: boolean;
	out: string;
	batch?: string;
	maxInstructions?: number;
}

/** Where the compiled binary is written unless --out says otherwise. */
export const DEFAULT_OUT_PATH = "script.mvm";

export const USAGE = `Usage: mil <program.mil | program.json> [options]

Options:
  --batch <file>             Run the covenant against each transaction in a JSON fixture file
  --out <file>               Write the compiled binary here (default: ${DEFAULT_OUT_PATH})
  --max-instructions <n>     Refuse programs with more than n instructions
  -v, --verbose              Print every pipeline stage and trace execution
  -h, --help                 Show this message`;

//==============================================================================
// Argument Parsing
//==============================================================================

function consumeNextArg(args: string[], i: number): string | undefined {
	const nextArg = args[i + 1];
	if (nextArg !== undefined && !nextArg.startsWith("-")) return nextArg;
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

function processValueOption(options: Options, arg: string, nextVal: string): void {
	if (arg === "--batch") options.batch = nextVal;
	else if (arg === "--out") options.out = nextVal;
	else if (arg === "--max-instructions") {
		const n = Number(nextVal);
		if (Number.isInteger(n) && n >= 0) options.maxInstructions = n;
	}
}

const VALUE_OPTIONS = new Set(["--batch", "--out", "--max-instructions"]);

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 * @returns Object with the input path and parsed options
 */
export function parseArgs(args: string[]): { path: string | null; options: Options } {
	const options: Options = { verbose: false, help: false, out: DEFAULT_OUT_PATH };
	let path: string | null = null;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		if (processFlag(options, arg)) continue;
		if (VALUE_OPTIONS.has(arg)) {
			const nextVal = consumeNextArg(args, i);
			if (nextVal !== undefined) {
				processValueOption(options, arg, nextVal);
				i++;
			}
			continue;
		}
		if (!arg.startsWith("-")) path = arg;
	}

	return { path, options };
}

//==============================================================================
// File Loading
//==============================================================================

/**
 * Read a text file, or null if it doesn't exist or can't be read.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch {
		return null;
	}
}

function parseJson(text: string): Result<unknown> {
	try {
		const parsed: unknown = JSON.parse(text);
		return { success: true, value: parsed };
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return fail(MilError.validation([{ path: "$", message }]));
	}
}

/**
 * Turn file contents into a program: JSON documents are validated against
 * the program schema, anything else is read as surface source.
 */
export function loadProgram(filePath: string, text: string): Result<Program> {
	if (!filePath.endsWith(".json")) {
		return attempt(() => parseProgram(text));
	}
	const json = parseJson(text);
	if (!json.success) return json;
	const result = validateProgram(json.value);
	if (!result.valid || result.value === undefined) {
		return fail(MilError.validation(result.errors));
	}
	return { success: true, value: result.value };
}

export function loadFixtures(text: string): Result<TransactionFixture[]> {
	const json = parseJson(text);
	if (!json.success) return json;
	const result = validateFixtures(json.value);
	if (!result.valid || result.value === undefined) {
		return fail(MilError.validation(result.errors));
	}
	return { success: true, value: result.value };
}

//==============================================================================
// Reporting
//==============================================================================

/** One line per transaction: verdict, then final stack or fault. */
export function formatBatchEntry(entry: BatchEntry): string {
	const verdict = entry.authorized ? "authorized" : "denied";
	if (entry.result.kind === "halted") {
		return `${entry.label}: ${verdict} (halted after ${entry.result.steps} steps) stack ${formatStack(entry.result.stack)}`;
	}
	const { fault, pc } = entry.result;
	return `${entry.label}: ${verdict} (failed at ${pc}) ${fault.code}: ${fault.message}`;
}
