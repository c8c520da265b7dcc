#!/usr/bin/env node
// SPDX-License-Identifier: MIT
// mil Command Line
// Usage: tsx src/cli.ts <program.mil | program.json> [--batch fixtures.json] [--out script.mvm] [-v]

import { generateKeyPairSync, sign } from "node:crypto";
import { writeFile } from "node:fs/promises";
import { type LabeledTransaction, runBatch } from "./batch.js";
import {
	USAGE,
	type Options,
	formatBatchEntry,
	loadFixtures,
	loadProgram,
	parseArgs,
	readTextFile,
} from "./cli-utils.js";
import { type CompiledCovenant, compile } from "./compiler.js";
import type { MilError } from "./errors.js";
import { formatDisassembly, toHex } from "./format.js";
import { digest } from "./vm/crypto.js";

function report(error: MilError): void {
	console.error(`[mil] ${error.stage} failed: ${error.code}: ${error.message}`);
}

/**
 * A transaction signed by a throwaway Ed25519 key, for trying a covenant
 * without writing fixtures.
 */
function dummyTransaction(): LabeledTransaction {
	const { privateKey } = generateKeyPairSync("ed25519");
	const hash = digest(new TextEncoder().encode("mil dummy transaction"));
	const signature = Uint8Array.from(sign(null, hash, privateKey));
	return { label: "dummy", hash, signatures: [signature] };
}

async function transactionsFor(options: Options): Promise<LabeledTransaction[] | null> {
	if (options.batch === undefined) return [dummyTransaction()];
	const text = await readTextFile(options.batch);
	if (text === null) {
		console.error(`[mil] Cannot read fixture file: ${options.batch}`);
		return null;
	}
	const fixtures = loadFixtures(text);
	if (!fixtures.success) {
		report(fixtures.error);
		return null;
	}
	return fixtures.value;
}

function printSummary(covenant: CompiledCovenant): void {
	console.log(`Binary (${covenant.bytecode.length} bytes): 0x${toHex(covenant.bytecode)}`);
	console.log(`Covenant hash: 0x${toHex(covenant.covenantHash)}`);
	console.log("Disassembly:");
	console.log(formatDisassembly(covenant.instructions));
}

async function main(argv: string[]): Promise<number> {
	const { path, options } = parseArgs(argv);
	if (options.help) {
		console.log(USAGE);
		return 0;
	}
	if (path === null) {
		console.error(USAGE);
		return 1;
	}

	const source = await readTextFile(path);
	if (source === null) {
		console.error(`[mil] Cannot read program: ${path}`);
		return 1;
	}
	const program = loadProgram(path, source);
	if (!program.success) {
		report(program.error);
		return 1;
	}

	const limits = options.maxInstructions === undefined ? {} : { maxInstructions: options.maxInstructions };
	const compiled = compile(program.value, { trace: options.verbose, ...limits });
	if (!compiled.success) {
		report(compiled.error);
		return 1;
	}
	const covenant = compiled.value;
	await writeFile(options.out, covenant.bytecode);
	console.log(`Wrote ${options.out}`);
	printSummary(covenant);

	const transactions = await transactionsFor(options);
	if (transactions === null) return 1;

	const batch = runBatch(covenant.bytecode, transactions, { trace: options.verbose, ...limits });
	if (!batch.success) {
		report(batch.error);
		return 1;
	}
	for (const entry of batch.value) {
		console.log(formatBatchEntry(entry));
	}
	return batch.value.some((entry) => entry.result.kind === "failed") ? 1 : 0;
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(e: unknown) => {
		console.error(e);
		process.exitCode = 1;
	},
);
