/**
 * UnityFS bundle unpacker
 *
 * Rewrites asset bundles whose blocks are LZMA, LZ4/LZ4HC, LZHAM or Arknights
 * LZ4AK compressed into a bundle holding a single uncompressed block.
 *
 * @example
 * ```ts
 * import { unpackBundle, readBundle } from 'unityfs-unpack';
 *
 * // Only read the file table
 * const { nodes } = readBundle(readFileSync('char_002_amiya.ab'));
 * console.log(nodes.map(n => n.path));
 *
 * // Decompress
 * const { output } = unpackBundle(readFileSync('char_002_amiya.ab'), { game: 'arknights' });
 * ```
 */

export { unpackBundle, unpackBundleFile, readBundle, readHeader, readBlockTable, defaultOutputPath } from "./bundle/unpacker.js";
export type { UnpackOptions, UnpackResult, ParsedBundle } from "./bundle/unpacker.js";
export { writeBundle, serializeBundle, buildBlockTable, headerSize } from "./bundle/packer.js";
export type { BundleLayout } from "./bundle/packer.js";
export { decompressBlock, decompressLZ4, decompressLzma, decompressLzham, compressLZ4 } from "./bundle/compression.js";
export { decompressLz4ak, rewriteLz4ak, readExtraLength, transposeNibbles } from "./bundle/lz4ak.js";
export { BundleReader, BundleWriter } from "./bundle/cursor.js";
export {
	CompressionType,
	UNITYFS_SIGNATURE,
	FLAG_COMPRESSION_MASK,
	FLAG_BLOCKS_AND_DIR_COMBINED,
	FLAG_BLOCK_INFO_AT_END,
	FLAG_BLOCK_INFO_NEEDS_ALIGNMENT,
	getCompressionId,
	compressionName,
	isGameMode
} from "./bundle/types.js";
export type { BundleHeader, BlockInfo, NodeInfo, GameMode, LzhamBackend, SizeMismatchWarning, DecompressContext } from "./bundle/types.js";
export { BundleError, FormatError, BoundsError, CodecError } from "./errors.js";
export type { BundleErrorCode } from "./errors.js";
export { consoleLogger, silentLogger } from "./logger.js";
export type { LogMessage, Logger } from "./logger.js";
