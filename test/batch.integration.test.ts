// SPDX-License-Identifier: MIT
// mil Batch Execution - Integration Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";

import { type LabeledTransaction, runBatch } from "../src/batch.js";
import { loadFixtures } from "../src/cli-utils.js";
import { encodeInstructions } from "../src/bytecode/encode.js";
import { compileSource } from "../src/compiler.js";
import { type Instruction, intVal } from "../src/types.js";

function bytecodeOf(source: string): Uint8Array {
	const result = compileSource(source);
	if (!result.success) return assert.fail(result.error.message);
	return result.value.bytecode;
}

// Authorizes while the first signature is at most 128 bytes; divides by zero when there is none
const SIGNATURE_LENGTH = bytecodeOf("(/ 128 (vlen tx-sig))");

const tx = (signatureLength: number, label?: string): LabeledTransaction => ({
	hash: Uint8Array.from([1, 2, 3]),
	signatures: signatureLength > 0 ? [new Uint8Array(signatureLength)] : [],
	...(label === undefined ? {} : { label }),
});

describe("runBatch", () => {
	it("runs the program once per transaction", () => {
		const result = runBatch(SIGNATURE_LENGTH, [tx(64), tx(128), tx(200)]);
		assert.ok(result.success);
		assert.deepStrictEqual(result.value.map((e) => e.authorized), [true, true, false]);
		assert.deepStrictEqual(result.value.map((e) => e.label), ["tx#0", "tx#1", "tx#2"]);
	});

	it("keeps fixture labels", () => {
		const result = runBatch(SIGNATURE_LENGTH, [tx(64, "good")]);
		assert.ok(result.success);
		assert.equal(result.value[0]?.label, "good");
	});

	it("a fault in one run does not affect the others", () => {
		const result = runBatch(SIGNATURE_LENGTH, [tx(0, "unsigned"), tx(64, "signed")]);
		assert.ok(result.success);
		const [unsigned, signed] = result.value;
		assert.equal(unsigned?.result.kind, "failed");
		assert.equal(unsigned?.authorized, false);
		assert.ok(signed?.result.kind === "halted");
		assert.deepStrictEqual(signed.result.stack, [intVal(2)]);
	});

	it("every run starts from a fresh heap", () => {
		const counter = bytecodeOf("(let ((n 0)) (set! n (+ n 1)) n)");
		const result = runBatch(counter, [tx(0), tx(0)]);
		assert.ok(result.success);
		for (const entry of result.value) {
			assert.ok(entry.result.kind === "halted");
			assert.deepStrictEqual(entry.result.stack, [intVal(1)]);
		}
	});

	it("deeply nested loops complete in every run", () => {
		const depth = 20_000;
		const program: Instruction[] = Array.from(
			{ length: depth },
			(_, i): Instruction => ({ op: "loop", count: 1, length: depth - i }),
		);
		program.push({ op: "pushi", value: 1n });
		const result = runBatch(encodeInstructions(program), [tx(64), tx(64)]);
		assert.ok(result.success);
		assert.deepStrictEqual(result.value.map((e) => e.authorized), [true, true]);
	});

	it("fails as a whole when the program does not load", () => {
		const result = runBatch(Uint8Array.from([0xff]), [tx(64)]);
		assert.ok(!result.success);
		assert.equal(result.error.code, "UnknownOpcode");
	});

	it("honours the instruction ceiling", () => {
		const result = runBatch(SIGNATURE_LENGTH, [tx(64)], { maxInstructions: 2 });
		assert.ok(!result.success);
		assert.equal(result.error.code, "ProgramTooLarge");
	});

	it("runs the example fixtures", async () => {
		const text = await readFile(new URL("../examples/counter.fixtures.json", import.meta.url), "utf-8");
		const fixtures = loadFixtures(text);
		assert.ok(fixtures.success);
		const result = runBatch(SIGNATURE_LENGTH, fixtures.value);
		assert.ok(result.success);
		assert.deepStrictEqual(
			result.value.map((e) => [e.label, e.result.kind]),
			[["unsigned", "failed"], ["placeholder-signature", "halted"]],
		);
	});
});
