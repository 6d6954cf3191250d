/**
 * Hex helpers for presenting and entering raw payloads
 */

import { HexParseError } from "./errors";

/**
 * Uppercase byte pairs separated by single spaces, e.g. "DE AD BE EF"
 */
export function formatHex(bytes: Uint8Array): string {
	return Array.from(bytes, (byte) => byte.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}

/**
 * Parse hex digits into bytes. Whitespace between digits is ignored.
 */
export function parseHex(text: string): Uint8Array {
	const digits = text.replace(/\s+/g, "");
	if (!/^[0-9a-fA-F]*$/.test(digits)) {
		throw new HexParseError(`invalid hex digit in "${text}"`, text);
	}
	if (digits.length % 2 !== 0) {
		throw new HexParseError(`odd number of hex digits in "${text}"`, text);
	}
	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}
