/**
 * UnityFS writer – serializes a header, block table and block data.
 * `writeBundle` is the unpack output path: one uncompressed block holding the
 * whole payload, table directly after the header.
 */

import { FormatError } from "../errors.js";
import { BundleWriter, alignUp } from "./cursor.js";
import { BLOCK_TABLE_RESERVED_SIZE, FLAG_BLOCKS_AND_DIR_COMBINED, FLAG_BLOCK_INFO_NEEDS_ALIGNMENT, UNITYFS_SIGNATURE } from "./types.js";
import type { BlockInfo, BundleHeader, NodeInfo } from "./types.js";

const U32_MAX = 0xffffffff;
/** size (8) + compressed table size (4) + uncompressed table size (4) + flags (4) */
const HEADER_TAIL_SIZE = 20;

export function buildBlockTable(blocks: readonly BlockInfo[], nodes: readonly NodeInfo[]): Buffer {
	const w = new BundleWriter();
	w.writeBytes(Buffer.alloc(BLOCK_TABLE_RESERVED_SIZE, 0));

	w.writeU32(blocks.length);
	for (const b of blocks) {
		w.writeU32(b.uncompressedSize);
		w.writeU32(b.compressedSize);
		w.writeU16(b.flags);
	}

	w.writeU32(nodes.length);
	for (const n of nodes) {
		w.writeI64(n.offset);
		w.writeI64(n.size);
		w.writeU32(n.status);
		w.writeCString(n.path);
	}
	return w.toBuffer();
}

export interface BundleLayout {
	version: number;
	unityVersion: string;
	unityRevision: string;
	flags: number;
	/** Block table as stored, possibly compressed */
	blocksInfo: Buffer;
	uncompressedBlocksInfoSize: number;
	/** Block payloads as stored, in table order */
	data: readonly Buffer[];
}

/** Header size once the fixed fields are written, padded for version 7+. */
export function headerSize(version: number, unityVersion: string, unityRevision: string): number {
	const strings = [UNITYFS_SIGNATURE, unityVersion, unityRevision].reduce((sum, s) => sum + Buffer.byteLength(s, "latin1") + 1, 0);
	const size = strings + 4 + HEADER_TAIL_SIZE;
	return version >= 7 ? alignUp(size, 16) : size;
}

export function serializeBundle(layout: BundleLayout): Buffer {
	const { version, flags, blocksInfo, data } = layout;
	const alignBlocks = (flags & FLAG_BLOCK_INFO_NEEDS_ALIGNMENT) !== 0;

	const tableEnd = headerSize(version, layout.unityVersion, layout.unityRevision) + blocksInfo.length;
	const dataStart = alignBlocks ? alignUp(tableEnd, 16) : tableEnd;
	const totalSize = data.reduce((sum, chunk) => sum + chunk.length, dataStart);

	const w = new BundleWriter();
	w.writeCString(UNITYFS_SIGNATURE);
	w.writeU32(version);
	w.writeCString(layout.unityVersion);
	w.writeCString(layout.unityRevision);
	w.writeI64(BigInt(totalSize));
	w.writeU32(blocksInfo.length);
	w.writeU32(layout.uncompressedBlocksInfoSize);
	w.writeU32(flags);
	if (version >= 7) w.align(16);

	w.writeBytes(blocksInfo);
	if (alignBlocks) w.align(16);
	for (const chunk of data) w.writeBytes(chunk);
	return w.toBuffer();
}

/**
 * Writes `payload` as a single uncompressed block. Header strings and version
 * come from `header`; its sizes and flags are recomputed.
 */
export function writeBundle(header: BundleHeader, nodes: readonly NodeInfo[], payload: Buffer): Buffer {
	if (payload.length > U32_MAX) {
		throw new FormatError("PAYLOAD_TOO_LARGE", `Payload of ${payload.length} bytes does not fit a single block`);
	}
	const block: BlockInfo = { uncompressedSize: payload.length, compressedSize: payload.length, flags: 0 };
	const table = buildBlockTable([block], nodes);

	return serializeBundle({
		version: header.version,
		unityVersion: header.unityVersion,
		unityRevision: header.unityRevision,
		flags: FLAG_BLOCKS_AND_DIR_COMBINED,
		blocksInfo: table,
		uncompressedBlocksInfoSize: table.length,
		data: [payload]
	});
}
