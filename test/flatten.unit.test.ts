// SPDX-License-Identifier: MIT
// mil Instruction Emission - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { encode } from "../src/bytecode/encode.js";
import { countInstructions, flatten } from "../src/bytecode/flatten.js";
import { disassemble } from "../src/bytecode/decode.js";
import { bytesVal, intVal, type MelExpr } from "../src/types.js";

const push = (n: number): MelExpr => ({ kind: "value", value: intVal(n) });

const samples: [string, MelExpr][] = [
	["literal", push(1)],
	["byte literal", { kind: "value", value: bytesVal([1, 2, 3]) }],
	["operator", { kind: "builtin", builtin: { op: "add", args: [push(1), push(2)] } }],
	["nullary operator", { kind: "builtin", builtin: { op: "vempty", args: [] } }],
	["sequence", {
		kind: "seq",
		exprs: [push(0), { kind: "jump", op: "bez", offset: 2 }, push(1), { kind: "jump", op: "jmp", offset: 1 }, push(2)],
	}],
	["loop", { kind: "loop", count: 4, length: 2, body: { kind: "seq", exprs: [{ kind: "load", slot: 3 }, { kind: "store", slot: 4 }] } }],
	["nested loop", { kind: "loop", count: 2, length: 2, body: { kind: "loop", count: 3, length: 1, body: push(1) } }],
	["hash", { kind: "hash", param: 0, body: { kind: "load", slot: 0 } }],
	["sigeok", { kind: "sigeok", param: 0, message: { kind: "load", slot: 0 }, key: push(1), signature: { kind: "load", slot: 2 } }],
	["empty sequence", { kind: "seq", exprs: [] }],
];

describe("flatten", () => {
	it("operators follow their operands", () => {
		assert.deepStrictEqual(flatten({ kind: "builtin", builtin: { op: "sub", args: [push(5), push(3)] } }), [
			{ op: "pushi", value: 5n },
			{ op: "pushi", value: 3n },
			{ op: "sub" },
		]);
	});

	it("a loop header precedes its body and carries the body length", () => {
		const body: MelExpr = { kind: "builtin", builtin: { op: "add", args: [push(1), push(2)] } };
		assert.deepStrictEqual(flatten({ kind: "loop", count: 3, length: 3, body }), [
			{ op: "loop", count: 3, length: 3 },
			{ op: "pushi", value: 1n },
			{ op: "pushi", value: 2n },
			{ op: "add" },
		]);
	});

	it("sigeok follows message, key and signature", () => {
		const ops = flatten({
			kind: "sigeok",
			param: 0,
			message: { kind: "load", slot: 0 },
			key: push(1),
			signature: { kind: "load", slot: 2 },
		}).map((ins) => ins.op);
		assert.deepStrictEqual(ops, ["load", "pushi", "load", "sigeok"]);
	});

	it("sequences are spliced flat", () => {
		const ins = flatten({ kind: "seq", exprs: [{ kind: "seq", exprs: [push(1)] }, { kind: "seq", exprs: [push(2)] }] });
		assert.deepStrictEqual(ins, [{ op: "pushi", value: 1n }, { op: "pushi", value: 2n }]);
	});
});

describe("countInstructions", () => {
	for (const [name, expr] of samples) {
		it(`${name}: count equals the number of emitted and decoded instructions`, () => {
			const count = countInstructions(expr);
			assert.equal(count, flatten(expr).length);
			const decoded = disassemble(encode(expr));
			assert.ok(decoded.success);
			assert.equal(decoded.value.length, count);
		});
	}

	it("counts a nested loop's inner header", () => {
		assert.equal(countInstructions({ kind: "loop", count: 2, length: 2, body: { kind: "loop", count: 3, length: 1, body: push(1) } }), 3);
	});
});
