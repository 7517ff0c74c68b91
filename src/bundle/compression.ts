/**
 * Block decompression for UnityFS bundles
 * Supports LZMA, LZ4/LZ4HC, LZHAM (via a pluggable backend) and Arknights LZ4AK
 */

import { lzma } from "@napi-rs/lzma";
import { BundleError, CodecError } from "../errors.js";
import { lz4 } from "./lz4.js";
import { decompressLz4ak } from "./lz4ak.js";
import { CompressionType, isCompressionType } from "./types.js";
import type { DecompressContext } from "./types.js";

const LZMA_PROPS_SIZE = 5;
/** lc < 9, lp < 5, pb < 5 packed as (pb * 5 + lp) * 9 + lc */
const LZMA_MAX_PROPS_BYTE = 9 * 5 * 5;
const LZHAM_DICT_SIZE_LOG2 = 29;

function reportShort(codec: string, expected: number, actual: number, context: DecompressContext): void {
	context.logger.warn(`${codec} expected ${expected} bytes, got ${actual}`);
	context.warnings?.push({ kind: "size-mismatch", codec, expected, actual });
}

/** Trims or accepts `out` against the declared size, warning on any difference. */
export function settle(codec: string, out: Buffer, decompressedSize: number, context: DecompressContext): Buffer {
	if (out.length === decompressedSize) return out;
	reportShort(codec, decompressedSize, out.length, context);
	return out.length > decompressedSize ? out.subarray(0, decompressedSize) : out;
}

export function decompressLzma(src: Buffer, decompressedSize: number, context: DecompressContext): Buffer {
	if (src.length < LZMA_PROPS_SIZE) {
		throw new CodecError("LZMA_BAD_DATA", `Invalid LZMA data: ${src.length} bytes is shorter than the properties header`);
	}
	const props = src.subarray(0, LZMA_PROPS_SIZE);
	if (props[0] >= LZMA_MAX_PROPS_BYTE) {
		throw new CodecError("LZMA_BAD_DATA", `Invalid LZMA properties byte 0x${props[0].toString(16)}`);
	}

	// .lzma "alone" header: properties, then the uncompressed size as u64 LE
	const sizeField = Buffer.alloc(8);
	sizeField.writeBigUInt64LE(BigInt(decompressedSize), 0);
	const stream = Buffer.concat([props, sizeField, src.subarray(LZMA_PROPS_SIZE)]);

	let out: Buffer;
	try {
		out = lzma.decompressSync(stream);
	} catch (err) {
		throw new CodecError("LZMA_BAD_DATA", "LZMA decompression failed", {
			cause: err,
			context: { compressedSize: String(src.length), decompressedSize: String(decompressedSize) }
		});
	}
	return settle("LZMA", out, decompressedSize, context);
}

export function decompressLZ4(src: Buffer, decompressedSize: number, context: DecompressContext): Buffer {
	const output = Buffer.alloc(decompressedSize);
	const result = lz4.decodeBlock(src, output);
	if (result < 0) {
		throw new CodecError("LZ4_BAD_DATA", `LZ4 decompression failed: ${result}`, {
			context: { compressedSize: String(src.length), decompressedSize: String(decompressedSize) }
		});
	}
	return settle("LZ4", output.subarray(0, result), decompressedSize, context);
}

export function decompressLzham(src: Buffer, decompressedSize: number, context: DecompressContext): Buffer {
	if (!context.lzham) {
		throw new CodecError("BACKEND_UNAVAILABLE", "LZHAM decompression requires a backend; use --game arknights for LZ4AK bundles");
	}
	let raw: Uint8Array;
	try {
		raw = context.lzham(src, decompressedSize, { dictSizeLog2: LZHAM_DICT_SIZE_LOG2 });
	} catch (err) {
		if (err instanceof BundleError) throw err;
		throw new CodecError("LZHAM_BAD_DATA", `LZHAM decompression failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
	}
	return settle("LZHAM", Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength), decompressedSize, context);
}

/**
 * Decompresses one block (or the block table) to its declared size.
 * `type` is the raw 6-bit id; ids outside the known set are rejected.
 */
export function decompressBlock(type: number, src: Buffer, decompressedSize: number, context: DecompressContext): Buffer {
	if (!isCompressionType(type)) {
		throw new CodecError("UNSUPPORTED_COMPRESSION", `Unknown compression type: ${type}`, { context: { type: String(type) } });
	}
	switch (type) {
		case CompressionType.None:
			return Buffer.from(src);
		case CompressionType.Lzma:
			return decompressLzma(src, decompressedSize, context);
		case CompressionType.Lz4:
		case CompressionType.Lz4hc:
			return decompressLZ4(src, decompressedSize, context);
		case CompressionType.Lzham:
			return context.game === "arknights" ? decompressLz4ak(src, decompressedSize, context) : decompressLzham(src, decompressedSize, context);
	}
}

export interface CompressLZ4Options {
	/** Use the HC encoder when the native binding provides it */
	highCompression?: boolean;
}

/** LZ4 block made of a single literal run, for input the encoder declines. */
function literalBlock(data: Buffer): Buffer {
	const run = data.length;
	const extra: number[] = [];
	if (run >= 15) {
		let rest = run - 15;
		for (; rest >= 255; rest -= 255) extra.push(255);
		extra.push(rest);
	}
	return Buffer.concat([Buffer.from([Math.min(run, 15) << 4, ...extra]), data]);
}

export function compressLZ4(data: Buffer, options?: CompressLZ4Options): Buffer {
	const out = Buffer.alloc(lz4.encodeBound(data.length));
	const written = options?.highCompression && lz4.encodeBlockHC ? lz4.encodeBlockHC(data, out) : lz4.encodeBlock(data, out);
	if (written < 0) {
		throw new CodecError("LZ4_BAD_DATA", `LZ4 compression failed: ${written}`);
	}
	// 0: incompressible (or empty) input
	return written === 0 ? literalBlock(data) : out.subarray(0, written);
}
