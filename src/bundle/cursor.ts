/**
 * Big-endian read/write cursors for the UnityFS container.
 */

import { BoundsError } from "../errors.js";

const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;
const U64_MAX = 0xffffffffffffffffn;
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

export class BundleReader {
	private readonly buffer: Buffer;
	private offset = 0;

	constructor(buffer: Buffer) {
		this.buffer = buffer;
	}

	get length(): number {
		return this.buffer.length;
	}

	public tell(): number {
		return this.offset;
	}

	public seek(position: number): void {
		if (position < 0 || position > this.buffer.length) {
			throw new BoundsError(position, 0, this.buffer.length);
		}
		this.offset = position;
	}

	public remaining(): number {
		return this.buffer.length - this.offset;
	}

	private ensure(n: number): void {
		if (n < 0 || this.offset + n > this.buffer.length) {
			throw new BoundsError(this.offset, n, this.buffer.length);
		}
	}

	public readU8(): number {
		this.ensure(1);
		return this.buffer.readUInt8(this.offset++);
	}

	public readU16(): number {
		this.ensure(2);
		const v = this.buffer.readUInt16BE(this.offset);
		this.offset += 2;
		return v;
	}

	public readU32(): number {
		this.ensure(4);
		const v = this.buffer.readUInt32BE(this.offset);
		this.offset += 4;
		return v;
	}

	public readI32(): number {
		this.ensure(4);
		const v = this.buffer.readInt32BE(this.offset);
		this.offset += 4;
		return v;
	}

	public readU64(): bigint {
		this.ensure(8);
		const v = this.buffer.readBigUInt64BE(this.offset);
		this.offset += 8;
		return v;
	}

	public readI64(): bigint {
		this.ensure(8);
		const v = this.buffer.readBigInt64BE(this.offset);
		this.offset += 8;
		return v;
	}

	/**
	 * Reads through the terminating zero byte. Each byte maps to one char (latin1)
	 * so that paths survive a write unchanged. The cursor stays put if there is none.
	 */
	public readCString(): string {
		const end = this.buffer.indexOf(0, this.offset);
		if (end < 0) {
			throw new BoundsError(this.offset, this.remaining() + 1, this.buffer.length);
		}
		const s = this.buffer.toString("latin1", this.offset, end);
		this.offset = end + 1;
		return s;
	}

	/** Owned copy of the next `n` bytes. */
	public readBytes(n: number): Buffer {
		return Buffer.from(this.readSpan(n));
	}

	/** View of the next `n` bytes, sharing memory with the source buffer. */
	public readSpan(n: number): Buffer {
		const span = this.peekSpan(n);
		this.offset += n;
		return span;
	}

	public peekSpan(n: number): Buffer {
		this.ensure(n);
		return this.buffer.subarray(this.offset, this.offset + n);
	}

	/** Skips to the next multiple of `alignment`, stopping at the end of the buffer. */
	public align(alignment: number): void {
		const rem = this.offset % alignment;
		if (rem !== 0) {
			this.offset = Math.min(this.offset + alignment - rem, this.buffer.length);
		}
	}
}

export class BundleWriter {
	private readonly chunks: Buffer[] = [];
	private offset = 0;

	public tell(): number {
		return this.offset;
	}

	private push(chunk: Buffer): void {
		this.chunks.push(chunk);
		this.offset += chunk.length;
	}

	private checkRange(value: number, max: number, bytes: number): void {
		if (!Number.isInteger(value) || value < 0 || value > max) {
			throw new BoundsError(this.offset, bytes, this.offset);
		}
	}

	public writeU8(value: number): void {
		this.checkRange(value, 0xff, 1);
		this.push(Buffer.from([value]));
	}

	public writeU16(value: number): void {
		this.checkRange(value, U16_MAX, 2);
		const b = Buffer.alloc(2);
		b.writeUInt16BE(value, 0);
		this.push(b);
	}

	public writeU32(value: number): void {
		this.checkRange(value, U32_MAX, 4);
		const b = Buffer.alloc(4);
		b.writeUInt32BE(value, 0);
		this.push(b);
	}

	public writeI32(value: number): void {
		if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
			throw new BoundsError(this.offset, 4, this.offset);
		}
		const b = Buffer.alloc(4);
		b.writeInt32BE(value, 0);
		this.push(b);
	}

	public writeU64(value: bigint): void {
		if (value < 0n || value > U64_MAX) {
			throw new BoundsError(this.offset, 8, this.offset);
		}
		const b = Buffer.alloc(8);
		b.writeBigUInt64BE(value, 0);
		this.push(b);
	}

	public writeI64(value: bigint): void {
		if (value < I64_MIN || value > I64_MAX) {
			throw new BoundsError(this.offset, 8, this.offset);
		}
		const b = Buffer.alloc(8);
		b.writeBigInt64BE(value, 0);
		this.push(b);
	}

	/** Inverse of `readCString`: one byte per char. */
	public writeCString(value: string): void {
		const enc = Buffer.from(value, "latin1");
		this.push(Buffer.concat([enc, Buffer.from([0])]));
	}

	public writeBytes(data: Uint8Array): void {
		this.push(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
	}

	/** Zero-fills up to the next multiple of `alignment`. */
	public align(alignment: number): void {
		const pad = (alignment - (this.offset % alignment)) % alignment;
		if (pad > 0) this.push(Buffer.alloc(pad, 0));
	}

	public toBuffer(): Buffer {
		return Buffer.concat(this.chunks, this.offset);
	}
}

/** Rounds `value` up to a multiple of `alignment`. */
export function alignUp(value: number, alignment: number): number {
	return Math.ceil(value / alignment) * alignment;
}
