// SPDX-License-Identifier: MIT
// mil Machine Cryptography
// Digests and signature checks behind the hash and sigeok instructions

import { createHash, createPublicKey, verify, type Hash } from "node:crypto";

/** Width of a full digest in bytes. */
export const DIGEST_LENGTH = 32;

/** Signature scheme selected by sigeok parameter 0. */
export const SCHEME_ED25519 = 0;

const ED25519_KEY_LENGTH = 32;
const ED25519_SIGNATURE_LENGTH = 64;

// DER SubjectPublicKeyInfo header for a raw 32-byte Ed25519 key
const ED25519_SPKI_PREFIX = Uint8Array.from([
	0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65, 0x70, 0x03, 0x21, 0x00,
]);

/**
 * sha256 of `data`, truncated to `length` bytes when 0 < length < 32.
 */
export function digest(data: Uint8Array, length = 0): Uint8Array {
	const hash: Hash = createHash("sha256");
	hash.update(data);
	const full = Uint8Array.from(hash.digest());
	return length > 0 && length < DIGEST_LENGTH ? full.slice(0, length) : full;
}

/**
 * Content hash of a compiled program. This is the covenant's identity and the
 * value of the `cov-hash` slot.
 */
export function covenantHash(bytecode: Uint8Array): Uint8Array {
	return digest(bytecode);
}

/**
 * Verify an Ed25519 signature over `message`. A key or signature that is not
 * well formed is a failed verification, not an error.
 */
export function verifyEd25519(
	message: Uint8Array,
	publicKey: Uint8Array,
	signature: Uint8Array,
): boolean {
	if (publicKey.length !== ED25519_KEY_LENGTH || signature.length !== ED25519_SIGNATURE_LENGTH) {
		return false;
	}
	try {
		const key = createPublicKey({
			key: Buffer.concat([ED25519_SPKI_PREFIX, publicKey]),
			format: "der",
			type: "spki",
		});
		return verify(null, message, key, signature);
	} catch {
		// OpenSSL rejects keys that do not decode to a curve point
		return false;
	}
}
