/**
 * Byte encoding helpers. Hex is the wire format for secrets and digests.
 */

import { hex, utf8 } from "@scure/base";

const HEX_BODY = /^(?:[0-9a-fA-F]{2})*$/;

function without0x(value: string): string {
	return value.startsWith("0x") || value.startsWith("0X")
		? value.slice(2)
		: value;
}

/** Lowercase hex, no prefix. */
export function bytesToHex(bytes: Uint8Array): string {
	return hex.encode(bytes);
}

/**
 * Decodes hex, with or without a `0x` prefix, in either case.
 * Throws on odd length or non-hex characters.
 */
export function hexToBytes(value: string): Uint8Array {
	return hex.decode(without0x(value).toLowerCase());
}

export function isHex(value: string): boolean {
	return HEX_BODY.test(without0x(value));
}

export function stringToBytes(text: string): Uint8Array {
	return utf8.decode(text);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
	const out = new Uint8Array(parts.reduce((n, part) => n + part.length, 0));
	parts.reduce((offset, part) => {
		out.set(part, offset);
		return offset + part.length;
	}, 0);
	return out;
}

/**
 * Equality in time independent of where the arrays first differ.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	let diff = 0;
	for (let i = 0; i < a.length; i++) {
		diff |= a[i] ^ b[i];
	}
	return diff === 0;
}
