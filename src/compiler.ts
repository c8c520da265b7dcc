// SPDX-License-Identifier: MIT
// mil Compiler Pipeline
// parse -> expand -> lower -> flatten -> encode, keeping every intermediate form

import { disassemble } from "./bytecode/decode.js";
import { encodeInstructions } from "./bytecode/encode.js";
import { countInstructions, flatten } from "./bytecode/flatten.js";
import { MilError, attempt, fail, ok, withStage, type Result } from "./errors.js";
import { type ExpandOptions, expandProgram } from "./expansion.js";
import { formatDisassembly, formatTree, toHex } from "./format.js";
import { MemoryMap } from "./lower/memory-map.js";
import { parseProgram } from "./parser/syntax.js";
import type { Instruction, MelExpr, Program, UnrolledExpr } from "./types.js";
import { covenantHash } from "./vm/crypto.js";

//==============================================================================
// Types
//==============================================================================

export interface CompileOptions extends ExpandOptions {
	/** Host ceiling on the number of instructions; larger programs are refused. */
	maxInstructions?: number;
	/** Print every intermediate form as it is produced. */
	trace?: boolean;
}

export interface CompiledCovenant {
	program: Program;
	unrolled: UnrolledExpr;
	lowered: MelExpr;
	instructions: Instruction[];
	instructionCount: number;
	bytecode: Uint8Array;
	/** sha256 of the bytecode; the covenant's identity. */
	covenantHash: Uint8Array;
	/** Heap slots the program uses, reserved slots included. */
	heapSize: number;
}

export interface LoadOptions {
	maxInstructions?: number;
}

//==============================================================================
// Pipeline
//==============================================================================

function log(trace: boolean | undefined, title: string, body: string): void {
	if (!trace) return;
	console.log(`[mil:compile] ${title}\n${body}\n`);
}

function checkSize(count: number, limit: number | undefined): void {
	if (limit !== undefined && count > limit) {
		throw MilError.programTooLarge(count, limit);
	}
}

function runPipeline(load: () => Program, options: CompileOptions): CompiledCovenant {
	const { trace } = options;
	const program = withStage("parse", () => {
		const p = load();
		log(trace, "Ast", formatTree(p));
		return p;
	});

	const unrolled = withStage("expand", () => {
		const u = expandProgram(program, options);
		log(trace, "Expanded", formatTree(u));
		return u;
	});

	const memory = new MemoryMap();
	const lowered = withStage("lower", () => {
		const l = memory.toMelExpr(unrolled);
		log(trace, "Lowered", formatTree(l));
		return l;
	});

	const { instructions, instructionCount } = withStage("encode", () => {
		const count = countInstructions(lowered);
		checkSize(count, options.maxInstructions);
		return { instructions: flatten(lowered), instructionCount: count };
	});
	log(trace, "Instructions", formatDisassembly(instructions));

	const bytecode = encodeInstructions(instructions);
	log(trace, "Binary", "0x" + toHex(bytecode));

	return {
		program,
		unrolled,
		lowered,
		instructions,
		instructionCount,
		bytecode,
		covenantHash: covenantHash(bytecode),
		heapSize: memory.size,
	};
}

/**
 * Compile a parsed program. Never throws a MilError: faults from any stage,
 * call stack exhaustion on very deep programs included, come back as a
 * failed Result.
 */
export function compile(program: Program, options: CompileOptions = {}): Result<CompiledCovenant> {
	return attempt(() => runPipeline(() => program, options));
}

/** Parse and compile surface source text. */
export function compileSource(source: string, options: CompileOptions = {}): Result<CompiledCovenant> {
	return attempt(() => runPipeline(() => parseProgram(source), options));
}

/**
 * Decode a binary program for execution, refusing programs over the host's
 * instruction ceiling.
 */
export function loadCovenant(bytecode: Uint8Array, options: LoadOptions = {}): Result<Instruction[]> {
	const decoded = disassemble(bytecode);
	if (!decoded.success) return decoded;
	const limit = options.maxInstructions;
	if (limit !== undefined && decoded.value.length > limit) {
		return fail(MilError.programTooLarge(decoded.value.length, limit));
	}
	return ok(decoded.value);
}
