// SPDX-License-Identifier: MIT
// mil Batch Execution
// Runs one compiled covenant against many transactions, each in its own machine

import { loadCovenant, type LoadOptions } from "./compiler.js";
import type { Result } from "./errors.js";
import { ok } from "./errors.js";
import { type Transaction, createEnv } from "./vm/context.js";
import { type ExecuteOptions, type ExecutionResult, execute, isAuthorized } from "./vm/machine.js";

export interface LabeledTransaction extends Transaction {
	label?: string | undefined;
}

export interface BatchEntry {
	label: string;
	result: ExecutionResult;
	authorized: boolean;
}

export type BatchOptions = LoadOptions & ExecuteOptions;

/**
 * Execute `bytecode` once per transaction. A fault in one run is reported in
 * that entry and does not affect the others; only a program that fails to
 * load fails the whole batch.
 */
export function runBatch(
	bytecode: Uint8Array,
	transactions: readonly LabeledTransaction[],
	options: BatchOptions = {},
): Result<BatchEntry[]> {
	const loaded = loadCovenant(bytecode, options);
	if (!loaded.success) return loaded;

	const entries = transactions.map((tx, i): BatchEntry => {
		const result = execute(loaded.value, createEnv(tx, bytecode), options);
		return {
			label: tx.label ?? `tx#${i}`,
			result,
			authorized: isAuthorized(result),
		};
	});
	return ok(entries);
}
