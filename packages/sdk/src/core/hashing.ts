/**
 * Hash primitives for hashlocks.
 *
 * All commitments are SHA-256 digests, exchanged as lowercase hex.
 */

import { sha256 } from "@noble/hashes/sha2";
import {
	bytesEqual,
	bytesToHex,
	concatBytes,
	hexToBytes,
	isHex,
	stringToBytes,
} from "../utils/encoding.js";

/** Length of a hashlock digest in bytes */
export const DIGEST_LENGTH = 32;

/** The all-zero digest, never a valid hashlock */
export const ZERO_DIGEST = "00".repeat(DIGEST_LENGTH);

/**
 * SHA-256 of arbitrary bytes, as lowercase hex.
 */
export function sha256Hex(data: Uint8Array): string {
	return bytesToHex(sha256(data));
}

/**
 * Hashlock for a secret preimage.
 */
export function hashSecret(secret: Uint8Array): string {
	return sha256Hex(secret);
}

/**
 * Parse a digest given as hex (optionally `0x`-prefixed) or raw bytes.
 *
 * @returns the digest as lowercase hex, or undefined when it is not exactly
 * 32 bytes of well-formed input
 */
export function parseDigest(value: string | Uint8Array): string | undefined {
	if (typeof value !== "string") {
		return value.length === DIGEST_LENGTH ? bytesToHex(value) : undefined;
	}
	if (!isHex(value)) return undefined;
	const bytes = hexToBytes(value);
	return bytes.length === DIGEST_LENGTH ? bytesToHex(bytes) : undefined;
}

export function isZeroDigest(digestHex: string): boolean {
	return digestHex === ZERO_DIGEST;
}

/**
 * Check a secret against a stored hashlock.
 */
export function verifySecret(secret: Uint8Array, digestHex: string): boolean {
	return bytesEqual(sha256(secret), hexToBytes(digestHex));
}

/**
 * Storage key for the (orderId, owner) pair.
 *
 * A NUL separator keeps ("ab", "c") and ("a", "bc") apart.
 */
export function deriveEscrowKey(orderId: string, owner: string): string {
	return sha256Hex(
		concatBytes(
			stringToBytes(orderId),
			new Uint8Array([0]),
			stringToBytes(owner),
		),
	);
}
