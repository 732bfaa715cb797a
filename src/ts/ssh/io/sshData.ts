//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { BigInt } from './bigInt';
import { KeyExchangeFailureReason, SshKeyExchangeError } from '../errors';

function readPastEnd(): SshKeyExchangeError {
	return new SshKeyExchangeError(
		'Attempted to read past end of buffer.',
		KeyExchangeFailureReason.protocolViolation,
	);
}

/**
 * Reads SSH wire data types (RFC 4251 section 5) from a buffer.
 *
 * Any malformed or truncated field is reported as a protocol violation.
 */
export class SshDataReader {
	public position: number = 0;

	public constructor(public readonly buffer: Buffer) {}

	public get available(): number {
		return this.buffer.length - this.position;
	}

	public read(length: number): Buffer {
		if (this.available < length) {
			throw readPastEnd();
		}

		const data = this.buffer.slice(this.position, this.position + length);
		this.position += length;
		return data;
	}

	public readByte(): number {
		if (this.available === 0) {
			throw readPastEnd();
		}

		const value = this.buffer[this.position];
		this.position++;
		return value;
	}

	public readBinary(): Buffer {
		const length = this.readUInt32();
		return this.read(length);
	}

	public readString(encoding: BufferEncoding = 'ascii'): string {
		const bytes = this.readBinary();
		return bytes.toString(encoding);
	}

	public readUInt32(): number {
		if (this.available < 4) {
			throw readPastEnd();
		}

		// Big-endian encoding
		const value0 = this.buffer[this.position + 0];
		const value1 = this.buffer[this.position + 1];
		const value2 = this.buffer[this.position + 2];
		const value3 = this.buffer[this.position + 3];
		this.position += 4;

		const value = ((value0 << 24) | (value1 << 16) | (value2 << 8) | value3) >>> 0;
		return value;
	}

	/**
	 * Reads an `mpint`. The encoding must be minimal: zero is the empty string, and a
	 * leading 0x00 or 0xff byte is only allowed when it carries the sign.
	 */
	public readBigInt(): BigInt {
		const data = this.readBinary();

		if (data.length === 0) {
			return BigInt.zero;
		}

		const superfluousZero = data[0] === 0 && (data.length === 1 || (data[1] & 0x80) === 0);
		const superfluousOnes = data[0] === 0xff && data.length > 1 && (data[1] & 0x80) !== 0;
		if (superfluousZero || superfluousOnes) {
			throw new SshKeyExchangeError(
				'Invalid mpint encoding: superfluous leading byte.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		return BigInt.fromBytes(data);
	}

	/**
	 * Throws if any bytes remain unread.
	 */
	public expectEnd(context: string): void {
		if (this.available !== 0) {
			throw new SshKeyExchangeError(
				`${context} has ${this.available} unexpected trailing bytes.`,
				KeyExchangeFailureReason.protocolViolation,
			);
		}
	}
}

/**
 * Writes SSH wire data types to a growable buffer.
 */
export class SshDataWriter {
	public position: number = 0;

	public constructor(private buffer: Buffer) {}

	public write(data: Buffer) {
		this.ensureCapacity(this.position + data.length);

		data.copy(this.buffer, this.position);
		this.position += data.length;
	}

	public writeByte(value: number): void {
		this.ensureCapacity(this.position + 1);

		this.buffer[this.position] = value;
		this.position++;
	}

	public writeBinary(data: Buffer): void {
		this.ensureCapacity(this.position + 4 + data.length);
		this.writeUInt32(data.length);
		data.copy(this.buffer, this.position);
		this.position += data.length;
	}

	public writeString(value: string, encoding: BufferEncoding = 'ascii'): void {
		this.writeBinary(Buffer.from(value, encoding));
	}

	public writeUInt32(value: number): void {
		this.ensureCapacity(this.position + 4);

		// Big-endian encoding
		this.buffer[this.position + 0] = value >>> 24;
		this.buffer[this.position + 1] = value >>> 16;
		this.buffer[this.position + 2] = value >>> 8;
		this.buffer[this.position + 3] = value >>> 0;
		this.position += 4;
	}

	public writeBigInt(value: BigInt): void {
		const data = value.toBytes();
		if (data.length === 1 && data[0] === 0) {
			this.writeUInt32(0);
		} else {
			this.writeBinary(data);
		}
	}

	private ensureCapacity(capacity: number): void {
		if (this.buffer.length < capacity) {
			let newLength = Math.max(512, this.buffer.length * 2);
			while (newLength < capacity) newLength *= 2;

			const newBuffer = Buffer.alloc(newLength);
			this.buffer.copy(newBuffer, 0, 0, this.position);
			this.buffer = newBuffer;
		}
	}

	public toBuffer(): Buffer {
		return this.buffer.slice(0, this.position);
	}
}

function makeCrcTable(): number[] {
	const table: number[] = [];
	for (let n = 0; n < 256; n++) {
		let c = n;
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
		}
		table[n] = c;
	}
	return table;
}

let crcTable: number[] | undefined;

function crc32(data: Buffer): string {
	if (!crcTable) {
		crcTable = makeCrcTable();
	}

	let crc = 0 ^ -1;

	for (let i = 0; i < data.length; i++) {
		crc = (crc >>> 8) ^ crcTable[(crc ^ data[i]) & 0xff];
	}

	const result = (crc ^ -1) >>> 0;
	return result.toString(16).padStart(8, '0').toUpperCase();
}

/**
 * Formats a byte buffer using the same format as OpenSSH,
 * useful for debugging and comparison in logs.
 */
export function formatBuffer(data: Buffer, name?: string, formatData?: boolean): string {
	let s = `${name === undefined ? 'Buffer' : name}[${data.length}] (${crc32(data)})\n`;

	if (formatData === false) {
		return s;
	}

	const max = Math.min(2048, data.length);

	for (let lineOffset = 0; lineOffset < max; lineOffset += 16) {
		s += lineOffset.toString().padStart(4, '0') + ':';

		for (let i = lineOffset; i < lineOffset + 16; i++) {
			s += i < max ? ' ' + data.slice(i, i + 1).toString('hex') : '   ';
		}

		s += '  ';
		for (let i = lineOffset; i < lineOffset + 16; i++) {
			if (i < max) {
				const c = data[i];
				s += c > 32 && c <= 127 ? String.fromCharCode(c) : '.';
			} else {
				s += ' ';
			}
		}

		s += '\n';
	}

	if (max < data.length) {
		s += '...\n';
	}

	return s;
}
