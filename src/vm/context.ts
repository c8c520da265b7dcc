// SPDX-License-Identifier: MIT
// mil Transaction Context
// The read-only view of a spending transaction that a covenant runs against

import {
	COVENANT_HASH_SLOT,
	TX_HASH_SLOT,
	TX_SIGNATURE_SLOT,
} from "../reserved.js";
import type { HeapPos, Value } from "../types.js";
import { bytesVal } from "../types.js";
import { covenantHash } from "./crypto.js";

export interface Transaction {
	/** Identifier of the spending transaction; the message its signatures cover. */
	hash: Uint8Array;
	signatures: Uint8Array[];
}

export interface ExecutionEnv {
	readonly tx: Transaction;
	/** Hash of the covenant's own bytecode. */
	readonly covenantHash: Uint8Array;
}

export function createEnv(tx: Transaction, bytecode: Uint8Array): ExecutionEnv {
	return { tx, covenantHash: covenantHash(bytecode) };
}

/**
 * Heap contents before the first instruction: the reserved slots filled from
 * the context. Every other slot reads as integer 0.
 */
export function initialHeap(env: ExecutionEnv): Map<HeapPos, Value> {
	return new Map<HeapPos, Value>([
		[TX_HASH_SLOT, bytesVal(env.tx.hash)],
		[COVENANT_HASH_SLOT, bytesVal(env.covenantHash)],
		[TX_SIGNATURE_SLOT, bytesVal(env.tx.signatures[0] ?? new Uint8Array())],
	]);
}
