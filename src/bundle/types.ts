/**
 * UnityFS bundle types
 * All multi-byte integers in the container are big-endian.
 */

import type { Logger } from "../logger.js";

export const UNITYFS_SIGNATURE = "UnityFS";

export enum CompressionType {
	None = 0,
	Lzma = 1,
	Lz4 = 2,
	Lz4hc = 3,
	Lzham = 4
}

export const FLAG_COMPRESSION_MASK = 0x3f;
export const FLAG_BLOCKS_AND_DIR_COMBINED = 0x40;
export const FLAG_BLOCK_INFO_AT_END = 0x80;
export const FLAG_BLOCK_INFO_NEEDS_ALIGNMENT = 0x200;

/** Size of the reserved (hash) prefix of the block table. */
export const BLOCK_TABLE_RESERVED_SIZE = 16;

/** `arknights` stores LZHAM-flagged blocks as LZ4AK. */
export type GameMode = "std" | "arknights";

export const GAME_MODES: readonly GameMode[] = ["std", "arknights"];

export function isGameMode(value: string): value is GameMode {
	return GAME_MODES.some((mode) => mode === value);
}

export function isCompressionType(value: number): value is CompressionType {
	return value >= CompressionType.None && value <= CompressionType.Lzham;
}

/** Raw 6-bit compression id from a header or block flag field. */
export function getCompressionId(flags: number): number {
	return flags & FLAG_COMPRESSION_MASK;
}

export function compressionName(id: number): string {
	return isCompressionType(id) ? CompressionType[id] : `Unknown(${id})`;
}

export interface BundleHeader {
	signature: string;
	version: number;
	unityVersion: string;
	unityRevision: string;
	size: bigint;
	compressedBlocksInfoSize: number;
	uncompressedBlocksInfoSize: number;
	flags: number;
}

export interface BlockInfo {
	uncompressedSize: number;
	compressedSize: number;
	flags: number;
}

/** A file inside the concatenated, decompressed block stream. */
export interface NodeInfo {
	offset: bigint;
	size: bigint;
	/** Opaque, copied through unchanged */
	status: number;
	/** One char per byte (latin1) */
	path: string;
}

export interface SizeMismatchWarning {
	kind: "size-mismatch";
	codec: string;
	expected: number;
	actual: number;
}

export interface LzhamDecompressParams {
	dictSizeLog2: number;
}

/**
 * LZHAM decoder for `std` bundles. Returns the decompressed bytes, which may be
 * shorter than `decompressedSize`; throws on failure.
 */
export type LzhamBackend = (src: Buffer, decompressedSize: number, params: LzhamDecompressParams) => Uint8Array;

export interface DecompressContext {
	game: GameMode;
	logger: Logger;
	lzham?: LzhamBackend;
	/** Receives every size mismatch that was tolerated */
	warnings?: SizeMismatchWarning[];
}
