import { lzma } from "@napi-rs/lzma";
import { vi } from "vitest";
import { compressLZ4 } from "../compression.js";
import { buildBlockTable, serializeBundle } from "../packer.js";
import { CompressionType } from "../types.js";
import type { DecompressContext, GameMode, NodeInfo } from "../types.js";

export const TEXT_A = Buffer.from("The quick brown fox jumps over the lazy dog. ".repeat(20));
export const TEXT_B = Buffer.from("Lorem ipsum dolor sit amet, ".repeat(20));

export const UNITY_VERSION = "5.x.x";
export const UNITY_REVISION = "2019.4.34f1";

export function spyLogger() {
	return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
}

export function testContext(game: GameMode = "std", extra?: Partial<DecompressContext>): DecompressContext {
	return { game, logger: spyLogger(), warnings: [], ...extra };
}

/**
 * Converts a plain LZ4 block into the LZ4AK layout: token nibbles swapped and
 * match offsets big-endian.
 */
export function toLz4ak(block: Buffer): Buffer {
	const out = Buffer.from(block);
	let ip = 0;
	while (ip < out.length) {
		const token = out[ip];
		out[ip] = ((token & 0x0f) << 4) | (token >> 4);
		ip++;

		let literals = token >> 4;
		if (literals === 15) {
			let b: number;
			do {
				b = out[ip++];
				literals += b;
			} while (b === 255);
		}
		ip += literals;
		if (ip >= out.length) break;

		const lo = out[ip];
		out[ip] = out[ip + 1];
		out[ip + 1] = lo;
		ip += 2;

		if ((token & 0x0f) === 15) {
			let b: number;
			do {
				b = out[ip++];
			} while (b === 255);
		}
	}
	return out;
}

/** LZMA as bundles store it: the 5 property bytes, then the stream without a size field. */
export function toBundleLzma(data: Buffer): Buffer {
	const alone = lzma.compressSync(data);
	return Buffer.concat([alone.subarray(0, 5), alone.subarray(13)]);
}

/** Stores `data` the way a bundle would for the given block codec. */
export function encodeAs(type: CompressionType, data: Buffer): Buffer {
	switch (type) {
		case CompressionType.None:
			return data;
		case CompressionType.Lzma:
			return toBundleLzma(data);
		case CompressionType.Lz4:
			return compressLZ4(data);
		case CompressionType.Lz4hc:
			return compressLZ4(data, { highCompression: true });
		case CompressionType.Lzham:
			return toLz4ak(compressLZ4(data));
	}
}

export interface TestBundleOptions {
	version?: number;
	tableType?: CompressionType;
	extraFlags?: number;
	blocks: { data: Buffer; type: CompressionType }[];
	nodes: NodeInfo[];
}

export function buildTestBundle(options: TestBundleOptions): Buffer {
	const { version = 6, tableType = CompressionType.Lz4, extraFlags = 0, blocks, nodes } = options;
	const stored = blocks.map((b) => encodeAs(b.type, b.data));
	const infos = blocks.map((b, i) => ({ uncompressedSize: b.data.length, compressedSize: stored[i].length, flags: b.type }));
	const table = buildBlockTable(infos, nodes);

	return serializeBundle({
		version,
		unityVersion: UNITY_VERSION,
		unityRevision: UNITY_REVISION,
		flags: tableType | extraFlags,
		blocksInfo: encodeAs(tableType, table),
		uncompressedBlocksInfoSize: table.length,
		data: stored
	});
}
