/**
 * UnityFS bundle unpacker
 * Reads the header and block table, decompresses every block and rewrites the
 * bundle with one uncompressed block. The file table is copied verbatim.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, extname, join, resolve } from "node:path";
import { BoundsError, FormatError } from "../errors.js";
import { consoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { decompressBlock } from "./compression.js";
import { BundleReader } from "./cursor.js";
import { writeBundle } from "./packer.js";
import {
	BLOCK_TABLE_RESERVED_SIZE,
	FLAG_BLOCK_INFO_AT_END,
	FLAG_BLOCK_INFO_NEEDS_ALIGNMENT,
	UNITYFS_SIGNATURE,
	compressionName,
	getCompressionId
} from "./types.js";
import type { BlockInfo, BundleHeader, DecompressContext, GameMode, LzhamBackend, NodeInfo, SizeMismatchWarning } from "./types.js";

export interface UnpackOptions {
	/** Default `std` */
	game?: GameMode;
	logger?: Logger;
	lzham?: LzhamBackend;
	/** Called after each block is decompressed */
	onBlock?: (index: number, count: number, block: BlockInfo, decompressedLength: number) => void;
}

export interface ParsedBundle {
	header: BundleHeader;
	blocks: BlockInfo[];
	nodes: NodeInfo[];
	/** Offset of the first block's data */
	dataOffset: number;
}

export interface UnpackResult {
	output: Buffer;
	bundle: ParsedBundle;
	/** Size of the concatenated, decompressed payload */
	payloadSize: number;
	warnings: SizeMismatchWarning[];
}

export function readHeader(reader: BundleReader): BundleHeader {
	let signature: string;
	try {
		signature = reader.readCString();
	} catch (err) {
		if (err instanceof BoundsError) {
			throw new FormatError("BAD_SIGNATURE", `Only ${UNITYFS_SIGNATURE} format supported: no signature found`, { cause: err });
		}
		throw err;
	}
	if (signature !== UNITYFS_SIGNATURE) {
		throw new FormatError("BAD_SIGNATURE", `Only ${UNITYFS_SIGNATURE} format supported, got "${signature}"`, { context: { signature } });
	}

	const version = reader.readU32();
	const unityVersion = reader.readCString();
	const unityRevision = reader.readCString();
	const size = reader.readI64();
	const compressedBlocksInfoSize = reader.readU32();
	const uncompressedBlocksInfoSize = reader.readU32();
	const flags = reader.readU32();
	if (version >= 7) reader.align(16);

	return { signature, version, unityVersion, unityRevision, size, compressedBlocksInfoSize, uncompressedBlocksInfoSize, flags };
}

/** Parses a decompressed block table. */
export function readBlockTable(table: Buffer): { blocks: BlockInfo[]; nodes: NodeInfo[] } {
	const r = new BundleReader(table);
	try {
		r.readSpan(BLOCK_TABLE_RESERVED_SIZE);

		const blocks: BlockInfo[] = [];
		const blockCount = r.readU32();
		for (let i = 0; i < blockCount; i++) {
			blocks.push({ uncompressedSize: r.readU32(), compressedSize: r.readU32(), flags: r.readU16() });
		}

		const nodes: NodeInfo[] = [];
		const nodeCount = r.readU32();
		for (let i = 0; i < nodeCount; i++) {
			nodes.push({ offset: r.readI64(), size: r.readI64(), status: r.readU32(), path: r.readCString() });
		}
		return { blocks, nodes };
	} catch (err) {
		if (err instanceof BoundsError) {
			throw new FormatError("BAD_BLOCK_TABLE", `Block table truncated at offset ${err.position}`, { cause: err });
		}
		throw err;
	}
}

function makeContext(options: UnpackOptions | undefined, warnings: SizeMismatchWarning[]): DecompressContext {
	return {
		game: options?.game ?? "std",
		logger: options?.logger ?? consoleLogger,
		lzham: options?.lzham,
		warnings
	};
}

function parse(reader: BundleReader, context: DecompressContext): ParsedBundle {
	const header = readHeader(reader);
	const { logger } = context;
	logger.debug(
		`${header.signature} v${header.version} ${header.unityVersion} (${header.unityRevision}), ` +
			`flags 0x${header.flags.toString(16)}, table ${compressionName(getCompressionId(header.flags))}`
	);
	if (header.flags & FLAG_BLOCK_INFO_AT_END) {
		logger.warn("Block table is flagged as stored at the end of the file; reading it inline");
	}

	const rawTable = reader.readSpan(header.compressedBlocksInfoSize);
	// the table itself never uses the game-specific codec
	const table = decompressBlock(getCompressionId(header.flags), rawTable, header.uncompressedBlocksInfoSize, { ...context, game: "std" });
	const { blocks, nodes } = readBlockTable(table);

	if (header.flags & FLAG_BLOCK_INFO_NEEDS_ALIGNMENT) reader.align(16);
	return { header, blocks, nodes, dataOffset: reader.tell() };
}

/** Header, block table and file table, without decompressing any block. */
export function readBundle(data: Buffer, options?: Pick<UnpackOptions, "logger">): ParsedBundle {
	return parse(new BundleReader(data), makeContext(options, []));
}

export function unpackBundle(data: Buffer, options?: UnpackOptions): UnpackResult {
	const warnings: SizeMismatchWarning[] = [];
	const context = makeContext(options, warnings);
	const reader = new BundleReader(data);
	const bundle = parse(reader, context);
	const { blocks } = bundle;

	context.logger.debug(`Decompressing ${blocks.length} blocks (${context.game})`);
	const chunks: Buffer[] = [];
	for (let i = 0; i < blocks.length; i++) {
		const block = blocks[i];
		const compressed = reader.readSpan(block.compressedSize);
		const raw = decompressBlock(getCompressionId(block.flags), compressed, block.uncompressedSize, context);
		chunks.push(raw);
		options?.onBlock?.(i, blocks.length, block, raw.length);
	}

	const payload = Buffer.concat(chunks);
	const output = writeBundle(bundle.header, bundle.nodes, payload);
	return { output, bundle, payloadSize: payload.length, warnings };
}

/** `<dir>/<stem>_unpacked<ext>` */
export function defaultOutputPath(inputPath: string): string {
	const ext = extname(inputPath);
	return join(dirname(inputPath), `${basename(inputPath, ext)}_unpacked${ext}`);
}

/**
 * Unpacks a bundle on disk. Without `outputPath` the result goes next to the
 * input; when both paths are the same the input is replaced via a `.tmp` file.
 */
export function unpackBundleFile(inputPath: string, outputPath?: string, options?: UnpackOptions): { outputPath: string; result: UnpackResult } {
	if (!existsSync(inputPath)) {
		throw new Error(`Input file not found: ${inputPath}`);
	}
	const target = outputPath ?? defaultOutputPath(inputPath);
	const result = unpackBundle(readFileSync(inputPath), options);

	if (resolve(target) !== resolve(inputPath)) {
		writeFileSync(target, result.output);
		return { outputPath: target, result };
	}

	const temp = `${target}.tmp`;
	try {
		writeFileSync(temp, result.output);
		renameSync(temp, target);
	} finally {
		rmSync(temp, { force: true });
	}
	return { outputPath: target, result };
}
