// SPDX-License-Identifier: MIT
// mil Virtual Machine
// Executes a decoded instruction sequence against a transaction context

import { MilError } from "../errors.js";
import { formatInstruction, formatStack } from "../format.js";
import type { HeapPos, Instruction, Value } from "../types.js";
import { intVal, isInt } from "../types.js";
import { type ExecutionEnv, initialHeap } from "./context.js";
import { OperandStack, applyBuiltIn, applyHash, applySigEok } from "./operations.js";

//==============================================================================
// Types
//==============================================================================

export interface ExecuteOptions {
	/** Log every executed instruction with the stack it runs against. */
	trace?: boolean;
}

export type ExecutionResult =
	| {
		kind: "halted";
		stack: Value[];
		heap: ReadonlyMap<HeapPos, Value>;
		steps: number;
	}
	| {
		kind: "failed";
		fault: MilError;
		pc: number;
		steps: number;
	};

/** A range of instructions being run, `remaining` more times including this one. */
interface Frame {
	readonly start: number;
	readonly end: number;
	remaining: number;
}

interface Machine {
	readonly program: readonly Instruction[];
	readonly stack: OperandStack;
	readonly heap: Map<HeapPos, Value>;
	/** Open frames, innermost last. Loop bodies nest here, not on the JS call stack. */
	readonly frames: Frame[];
	readonly trace: boolean;
	pc: number;
	steps: number;
}

//==============================================================================
// Control Flow
//==============================================================================

/**
 * Target of a relative jump: `offset` instructions past the one following
 * the jump. Landing exactly on the frame's end finishes the frame.
 */
function jumpTarget(pc: number, offset: number, end: number): number {
	const target = pc + 1 + offset;
	if (target > end) {
		throw MilError.malformedProgram(`jump from ${pc} to ${target} leaves the program`);
	}
	return target;
}

function isZero(v: Value): boolean {
	return isInt(v) && v.value === 0n;
}

/** Open a frame over the loop body and continue at its first instruction. */
function enterLoop(m: Machine, pc: number, ins: { count: number; length: number }, end: number): number {
	const bodyStart = pc + 1;
	const bodyEnd = bodyStart + ins.length;
	if (bodyEnd > end) {
		throw MilError.malformedProgram(`loop body at ${pc} runs past the end of the program`);
	}
	if (ins.count === 0 || ins.length === 0) return bodyEnd;
	m.frames.push({ start: bodyStart, end: bodyEnd, remaining: ins.count });
	return bodyStart;
}

/** Execute one instruction and return the next program counter. */
function step(m: Machine, ins: Instruction, pc: number, end: number): number {
	switch (ins.op) {
	case "jmp":
		return jumpTarget(pc, ins.offset, end);
	case "bez":
		return isZero(m.stack.pop()) ? jumpTarget(pc, ins.offset, end) : pc + 1;
	case "bnz":
		return isZero(m.stack.pop()) ? pc + 1 : jumpTarget(pc, ins.offset, end);
	case "loop":
		return enterLoop(m, pc, ins, end);
	case "load":
		m.stack.push(m.heap.get(ins.slot) ?? intVal(0));
		return pc + 1;
	case "store":
		m.heap.set(ins.slot, m.stack.pop());
		return pc + 1;
	case "pushi":
		m.stack.push(intVal(ins.value));
		return pc + 1;
	case "pushb":
		m.stack.push({ kind: "bytes", value: ins.value });
		return pc + 1;
	case "hash":
		applyHash(ins.param, m.stack);
		return pc + 1;
	case "sigeok":
		applySigEok(ins.param, m.stack);
		return pc + 1;
	default:
		applyBuiltIn(ins.op, m.stack);
		return pc + 1;
	}
}

/**
 * Run until the outermost frame is done. Reaching a frame's end repeats it
 * while it has iterations left, then resumes the enclosing frame just past it.
 */
function run(m: Machine): void {
	let pc = 0;
	for (;;) {
		const frame = m.frames[m.frames.length - 1];
		if (frame === undefined) return;
		if (pc >= frame.end) {
			frame.remaining--;
			if (frame.remaining > 0) {
				pc = frame.start;
			} else {
				m.frames.pop();
				pc = frame.end;
			}
			continue;
		}
		const ins = m.program[pc];
		if (ins === undefined) {
			throw MilError.malformedProgram(`no instruction at ${pc}`);
		}
		m.pc = pc;
		m.steps++;
		if (m.trace) {
			console.log(`[mil:vm] ${String(pc).padStart(4, " ")}  ${formatInstruction(ins).padEnd(24, " ")} ${formatStack(m.stack.values)}`);
		}
		pc = step(m, ins, pc, frame.end);
	}
}

//==============================================================================
// Main Execution Function
//==============================================================================

/**
 * Run a program to completion.
 *
 * Starts with an empty stack and a heap holding only the reserved context
 * slots. Ends `halted` after the last instruction, or `failed` on the first
 * fault; the stack and heap of a failed run are discarded.
 */
export function execute(
	program: readonly Instruction[],
	env: ExecutionEnv,
	options?: ExecuteOptions,
): ExecutionResult {
	const m: Machine = {
		program,
		stack: new OperandStack(),
		heap: initialHeap(env),
		frames: [{ start: 0, end: program.length, remaining: 1 }],
		trace: options?.trace ?? false,
		pc: 0,
		steps: 0,
	};
	try {
		run(m);
	} catch (e) {
		if (e instanceof MilError) {
			return { kind: "failed", fault: e, pc: m.pc, steps: m.steps };
		}
		throw e;
	}
	return { kind: "halted", stack: m.stack.values, heap: m.heap, steps: m.steps };
}

/**
 * The covenant's verdict: the run halted with a nonzero integer on top of
 * the stack.
 */
export function isAuthorized(result: ExecutionResult): boolean {
	if (result.kind !== "halted") return false;
	const top = result.stack[result.stack.length - 1];
	return top !== undefined && isInt(top) && top.value !== 0n;
}
