// SPDX-License-Identifier: MIT
// Worst-case execution cost of a decoded program. Jump offsets and loop
// counts are fixed in the bytecode, so the bound needs no execution.

import type { Instruction } from "../types.js";

/**
 * Upper bound on the number of instructions a run can execute: every
 * instruction once, loop bodies once per iteration. Returns undefined when a
 * loop body runs past the end of the program.
 */
export function staticCost(instructions: readonly Instruction[]): bigint | undefined {
	return costOf(instructions, 0, instructions.length);
}

function costOf(instructions: readonly Instruction[], start: number, end: number): bigint | undefined {
	let total = 0n;
	let pc = start;
	while (pc < end) {
		const ins = instructions[pc];
		if (ins === undefined) return undefined;
		total += 1n;
		if (ins.op === "loop") {
			const bodyEnd = pc + 1 + ins.length;
			if (bodyEnd > end) return undefined;
			const body = costOf(instructions, pc + 1, bodyEnd);
			if (body === undefined) return undefined;
			total += BigInt(ins.count) * body;
			pc = bodyEnd;
		} else {
			pc++;
		}
	}
	return total;
}
