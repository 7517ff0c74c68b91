/**
 * LZ4AK: the Arknights variant of the LZ4 block format.
 *
 * Identical to LZ4 except that each token carries the literal length in its low
 * nibble and the match length in its high nibble, and match offsets are stored
 * big-endian. The stream is rewritten into plain LZ4 and handed to the stock
 * block decoder.
 */

import { CodecError } from "../errors.js";
import { hexdump } from "../logger.js";
import { settle } from "./compression.js";
import { lz4 } from "./lz4.js";
import type { DecompressContext } from "./types.js";

const MIN_MATCH = 4;
const RUN_MASK = 0x0f;

/** Swaps the two nibbles of a byte. */
export function transposeNibbles(byte: number): number {
	return ((byte & 0x0f) << 4) | ((byte >> 4) & 0x0f);
}

/**
 * LZ4 length continuation: sums bytes until one is not 0xFF (that byte is
 * included). Stops silently at the end of the buffer.
 */
export function readExtraLength(data: Uint8Array, cursor: number): { length: number; cursor: number } {
	let length = 0;
	while (cursor < data.length) {
		const b = data[cursor++];
		length += b;
		if (b !== 0xff) break;
	}
	return { length, cursor };
}

/**
 * Rewrites an LZ4AK stream into LZ4 block layout. Returns a new buffer; `src` is
 * never modified. `op` tracks the output size the final decoder will produce so
 * that trailing bytes after the last literal run are left alone.
 */
export function rewriteLz4ak(src: Uint8Array, decompressedSize: number): Buffer {
	const data = Buffer.from(src);
	const size = data.length;
	let ip = 0;
	let op = 0;

	while (ip < size) {
		const token = data[ip];
		const literalNibble = token & 0x0f;
		const matchNibble = (token >> 4) & 0x0f;
		data[ip] = transposeNibbles(token);
		ip++;

		let literalLength = literalNibble;
		if (literalNibble === RUN_MASK) {
			const extra = readExtraLength(data, ip);
			literalLength += extra.length;
			ip = extra.cursor;
		}

		ip += literalLength;
		op += literalLength;
		if (op >= decompressedSize) break;

		// truncated: leave the rest for the decoder to reject or accept
		if (ip + 2 > size) break;

		const b0 = data[ip];
		data[ip] = data[ip + 1];
		data[ip + 1] = b0;
		ip += 2;

		let matchLength = matchNibble;
		if (matchNibble === RUN_MASK) {
			const extra = readExtraLength(data, ip);
			matchLength += extra.length;
			ip = extra.cursor;
		}
		op += matchLength + MIN_MATCH;
	}

	return data;
}

export function decompressLz4ak(src: Uint8Array, decompressedSize: number, context: DecompressContext): Buffer {
	if (src.length === 0) return Buffer.alloc(0);
	context.logger.debug(() => `LZ4AK input (${src.length} bytes):\n${hexdump(src)}`);

	const fixed = rewriteLz4ak(src, decompressedSize);
	const dest = Buffer.alloc(decompressedSize);
	const result = lz4.decodeBlock(fixed, dest);
	if (result < 0) {
		throw new CodecError("LZ4AK_BAD_DATA", `LZ4AK decompression failed with code: ${result}`, {
			context: { compressedSize: String(src.length), decompressedSize: String(decompressedSize) }
		});
	}
	return settle("LZ4AK", dest.subarray(0, result), decompressedSize, context);
}
