/**
 * Error taxonomy for bundle conversion.
 * Every failure is terminal for the conversion it occurs in; nothing is retried.
 */

/** Stable error codes. */
export type BundleErrorCode =
	| "BAD_SIGNATURE"
	| "BAD_BLOCK_TABLE"
	| "PAYLOAD_TOO_LARGE"
	| "OUT_OF_BOUNDS"
	| "UNSUPPORTED_COMPRESSION"
	| "LZMA_BAD_DATA"
	| "LZ4_BAD_DATA"
	| "LZ4AK_BAD_DATA"
	| "LZHAM_BAD_DATA"
	| "BACKEND_UNAVAILABLE";

export interface BundleErrorOptions {
	context?: Record<string, string>;
	cause?: unknown;
}

export class BundleError extends Error {
	readonly code: BundleErrorCode;
	readonly context: Record<string, string>;

	constructor(code: BundleErrorCode, message: string, options?: BundleErrorOptions) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = "BundleError";
		this.code = code;
		this.context = options?.context ?? {};
	}
}

/** Bad signature or malformed block table. */
export class FormatError extends BundleError {
	constructor(code: "BAD_SIGNATURE" | "BAD_BLOCK_TABLE" | "PAYLOAD_TOO_LARGE", message: string, options?: BundleErrorOptions) {
		super(code, message, options);
		this.name = "FormatError";
	}
}

/** Cursor read or write past the end of its buffer. */
export class BoundsError extends BundleError {
	readonly position: number;
	readonly requested: number;

	constructor(position: number, requested: number, length: number) {
		super("OUT_OF_BOUNDS", `buffer overflow: pos ${position} + n ${requested} > size ${length}`, {
			context: { position: String(position), requested: String(requested), length: String(length) }
		});
		this.name = "BoundsError";
		this.position = position;
		this.requested = requested;
	}
}

export type CodecErrorCode = "UNSUPPORTED_COMPRESSION" | "LZMA_BAD_DATA" | "LZ4_BAD_DATA" | "LZ4AK_BAD_DATA" | "LZHAM_BAD_DATA" | "BACKEND_UNAVAILABLE";

/** The underlying decompressor rejected a block, or no decompressor exists for it. */
export class CodecError extends BundleError {
	constructor(code: CodecErrorCode, message: string, options?: BundleErrorOptions) {
		super(code, message, options);
		this.name = "CodecError";
	}
}
