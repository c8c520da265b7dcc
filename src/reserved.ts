// SPDX-License-Identifier: MIT
// Names bound in every scope, backed by heap slots the machine fills from the
// transaction context before the first instruction runs.

import type { HeapPos, VarId } from "./types.js";

export interface ReservedBinding {
	name: string;
	id: VarId;
	slot: HeapPos;
}

export const RESERVED_BINDINGS: readonly ReservedBinding[] = [
	{ name: "tx-hash", id: 0, slot: 0 },
	{ name: "cov-hash", id: 1, slot: 1 },
	{ name: "tx-sig", id: 2, slot: 2 },
];

export const TX_HASH_SLOT = 0;
export const COVENANT_HASH_SLOT = 1;
export const TX_SIGNATURE_SLOT = 2;

/** First identifier the expander may mint, and first slot the allocator may hand out. */
export const FIRST_FREE_ID: VarId = RESERVED_BINDINGS.length;
export const FIRST_FREE_SLOT: HeapPos = RESERVED_BINDINGS.length;
