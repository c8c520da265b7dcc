// SPDX-License-Identifier: MIT
// mil Static Cost - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { staticCost } from "../src/bytecode/cost.js";
import { flatten } from "../src/bytecode/flatten.js";
import { lower } from "../src/lower/memory-map.js";
import { expandProgram } from "../src/expansion.js";
import { parseProgram } from "../src/parser/syntax.js";
import { createEnv } from "../src/vm/context.js";
import { execute } from "../src/vm/machine.js";

describe("staticCost", () => {
	it("is the instruction count of a straight-line program", () => {
		assert.equal(staticCost([{ op: "pushi", value: 1n }, { op: "pushi", value: 2n }, { op: "add" }]), 3n);
		assert.equal(staticCost([]), 0n);
	});

	it("charges a loop body once per iteration", () => {
		assert.equal(staticCost([
			{ op: "pushi", value: 0n },
			{ op: "loop", count: 10, length: 2 },
			{ op: "pushi", value: 1n },
			{ op: "add" },
		]), 22n);
	});

	it("multiplies through nested loops", () => {
		assert.equal(staticCost([
			{ op: "loop", count: 2, length: 2 },
			{ op: "loop", count: 3, length: 1 },
			{ op: "pushi", value: 1n },
		]), 9n);
	});

	it("is undefined when a loop body runs past the end", () => {
		assert.equal(staticCost([{ op: "loop", count: 1, length: 5 }, { op: "add" }]), undefined);
	});

	it("bounds the steps of an actual run", () => {
		const source = "(let ((acc 0)) (loop 5 (if (% acc 2) (set! acc (+ acc 1)) (set! acc (+ acc 3)))) acc)";
		const instructions = flatten(lower(expandProgram(parseProgram(source))));
		const cost = staticCost(instructions);
		const result = execute(instructions, createEnv({ hash: new Uint8Array(32), signatures: [] }, new Uint8Array()));
		assert.equal(result.kind, "halted");
		assert.ok(cost !== undefined && BigInt(result.steps) <= cost);
	});
});
