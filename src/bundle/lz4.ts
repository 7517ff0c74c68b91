import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

/** The block-level surface of the `lz4` package (native binding or its JS fallback). */
interface Lz4Binding {
	decodeBlock(input: Buffer, output: Buffer, startIdx?: number, endIdx?: number): number;
	encodeBlock(input: Buffer, output: Buffer, startIdx?: number, endIdx?: number): number;
	encodeBlockHC?: (input: Buffer, output: Buffer, compressionLevel?: number) => number;
	encodeBound(inputSize: number): number;
}

export const lz4: Lz4Binding = require("lz4");
