#!/usr/bin/env node
/**
 * CLI for UnityFS bundles
 * Usage:
 *   unpack [--game std|arknights] <input.ab> [output.ab]
 *   info <input.ab>
 */

import { existsSync, readFileSync } from "node:fs";
import { readBundle, unpackBundleFile } from "./bundle/unpacker.js";
import { compressionName, getCompressionId, isGameMode } from "./bundle/types.js";
import type { GameMode } from "./bundle/types.js";
import { consoleLogger, silentLogger } from "./logger.js";

const HELP = `
UnityFS bundle unpacker - rewrites compressed bundles as one uncompressed block

Usage:
  unpack [--game std|arknights] <input.ab> [output.ab]   - decompress every block
  info <input.ab>                                        - print header, blocks and files

Options:
  --game std|arknights   LZHAM-flagged blocks are LZ4AK in Arknights bundles (default: std)
                         In std mode LZHAM blocks need a decoder backend, which only the
                         library API accepts (UnpackOptions.lzham); the CLI fails on them.
  --quiet                only print errors

Without an output path the result is written to <name>_unpacked.<ext>.
If the output path equals the input, the input is replaced.

Examples:
  node dist/cli.js unpack --game arknights char_002_amiya.ab
  node dist/cli.js unpack level0.bundle level0_raw.bundle
  node dist/cli.js info level0.bundle
`;

function takeOption(args: string[], name: string): string | undefined {
	const idx = args.indexOf(name);
	if (idx < 0) return undefined;
	const value = args[idx + 1];
	if (value === undefined) throw new Error(`Missing value for ${name}`);
	args.splice(idx, 2);
	return value;
}

function takeFlag(args: string[], name: string): boolean {
	const idx = args.indexOf(name);
	if (idx < 0) return false;
	args.splice(idx, 1);
	return true;
}

const args = process.argv.slice(2);
const command = args.shift();

if (!command || args.includes("--help") || args.includes("-h") || command === "help") {
	console.log(HELP);
	process.exit(command ? 0 : 1);
}

try {
	const quiet = takeFlag(args, "--quiet");
	const gameArg = takeOption(args, "--game") ?? "std";
	if (!isGameMode(gameArg)) {
		throw new Error(`Unknown game mode: ${gameArg}`);
	}
	const game: GameMode = gameArg;
	const [inputPath, outputPath] = args;
	if (!inputPath) {
		throw new Error("Missing input file");
	}
	const logger = quiet ? silentLogger : consoleLogger;

	if (command === "unpack") {
		const { outputPath: written, result } = unpackBundleFile(inputPath, outputPath, {
			game,
			logger,
			onBlock: (i, count, block, length) => {
				if (!quiet) process.stdout.write(`\rBlock ${i + 1}/${count} (${block.compressedSize} -> ${length})`);
			}
		});
		if (!quiet) process.stdout.write("\n");
		logger.info(`Success. ${result.bundle.blocks.length} blocks -> ${result.payloadSize} bytes, output written to ${written}`);
		if (result.warnings.length > 0) {
			logger.warn(`${result.warnings.length} block(s) decompressed short of their declared size`);
		}
	} else if (command === "info") {
		if (!existsSync(inputPath)) {
			throw new Error(`Input file not found: ${inputPath}`);
		}
		const { header, blocks, nodes, dataOffset } = readBundle(readFileSync(inputPath), { logger });
		console.log(`${header.signature} v${header.version}  ${header.unityVersion} (${header.unityRevision})`);
		console.log(`Size: ${header.size}  Flags: 0x${header.flags.toString(16)}  Table: ${compressionName(getCompressionId(header.flags))}`);
		console.log(`Table: ${header.compressedBlocksInfoSize} -> ${header.uncompressedBlocksInfoSize} bytes, data at ${dataOffset}`);
		console.log(`Blocks (${blocks.length}):`);
		blocks.forEach((b, i) => console.log(`  ${i}: ${compressionName(getCompressionId(b.flags))} ${b.compressedSize} -> ${b.uncompressedSize}`));
		console.log(`Files (${nodes.length}):`);
		// strings hold raw bytes; show them as UTF-8
		nodes.forEach((n) => console.log(`  - ${Buffer.from(n.path, "latin1").toString("utf8")}  offset ${n.offset}  size ${n.size}  status ${n.status}`));
	} else {
		throw new Error(`Unknown command: ${command}`);
	}
} catch (err) {
	console.error("Error:", err instanceof Error ? err.message : err);
	process.exit(1);
}
