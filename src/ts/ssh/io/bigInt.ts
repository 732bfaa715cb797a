//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { formatBuffer } from './sshData';

/**
 * Represents a large signed integer as a byte buffer, in the same two's-complement
 * big-endian form that SSH uses for the `mpint` data type.
 */
export class BigInt {
	public static readonly zero = new BigInt(Buffer.alloc(1));

	/**
	 * Creates a new BigInt instance from a buffer of signed bytes.
	 *
	 * The first (high) bit of the first (high) byte is the sign bit. Therefore if the
	 * highest byte of an unsigned integer is greater than 127, the bytes must include
	 * a leading zero byte to prevent interpretation as a negative value.
	 */
	public constructor(private readonly buffer: Buffer) {
		if (buffer.length === 0) {
			throw new Error('BigInt buffer length must be greater than zero.');
		}
	}

	/**
	 * Gets a value that indicates the sign of the big integer:
	 * 1 for positive, 0 for zero, -1 for negative.
	 */
	public get sign(): number {
		const highByte = this.buffer[0];
		if (highByte === 0) {
			return this.buffer.length > 1 ? 1 : 0;
		} else {
			return (highByte & 0x80) === 0 ? 1 : -1;
		}
	}

	/**
	 * Gets the number of significant bits of a non-negative integer.
	 */
	public get bitLength(): number {
		if (this.sign < 0) {
			throw new TypeError('Bit length of a negative BigInt is not defined.');
		}

		const bytes = this.toBytes({ unsigned: true });
		let bits = (bytes.length - 1) * 8;
		for (let highByte = bytes[0]; highByte !== 0; highByte >>= 1) {
			bits++;
		}

		return bits;
	}

	public static fromInt32(value: number): BigInt {
		const bytes = Buffer.alloc(4);
		bytes.writeInt32BE(value);
		return BigInt.fromBytes(bytes);
	}

	/**
	 * Creates a new BigInt instance from a byte buffer.
	 * @param bytes Source byte buffer.
	 * @param options.unsigned True if the bytes should be interpreted as unsigned. If false,
	 * the high bit of the high byte is the sign bit. The default is false.
	 */
	public static fromBytes(
		bytes: Buffer,
		options?: {
			unsigned?: boolean;
		},
	): BigInt {
		if (!Buffer.isBuffer(bytes)) {
			throw new TypeError('Buffer expected.');
		} else if (bytes.length === 0) {
			throw new Error('BigInt buffer length must be greater than zero.');
		}

		options = options ?? {};

		const highBit = (bytes[0] & 0x80) !== 0;
		const prependZeroCount = options.unsigned && highBit ? 1 : 0;
		let skipZeroCount = 0;

		// Skip non-significant zeroes (or sign-extension ones) at the big end.
		for (let i = 0; i < bytes.length - 1 && bytes[i] === 0; i++) {
			if ((bytes[i + 1] & 0x80) === 0) {
				skipZeroCount++;
			}
		}
		if (!options.unsigned) {
			for (let i = 0; i < bytes.length - 1 && bytes[i] === 0xff; i++) {
				if ((bytes[i + 1] & 0x80) !== 0) {
					skipZeroCount++;
				}
			}
		}

		const newBytes = Buffer.alloc(bytes.length + prependZeroCount - skipZeroCount);
		bytes.copy(newBytes, prependZeroCount, skipZeroCount, bytes.length);

		return new BigInt(newBytes);
	}

	/**
	 * Converts a BigInt instance to a byte buffer.
	 *
	 * @param options.unsigned True if the returned bytes will be interprted as unsigned.
	 * If false, a positive integer may have a leading zero to prevent it from being
	 * interpreted as negative.
	 * @param options.length Desired length of the resulting buffer. The value will be zero-
	 * padded to fill the length. Only applies when `options.unsigned` is true.
	 */
	public toBytes(options?: { unsigned?: boolean; length?: number }): Buffer {
		options = options ?? {};

		let bytes = this.buffer;
		if (options.unsigned) {
			if (this.sign < 0) {
				throw new TypeError('Cannot format a negative BigInt as unsigned.');
			} else if (bytes[0] === 0 && bytes.length > 1) {
				bytes = bytes.slice(1, bytes.length);
			}

			if (options.length !== undefined) {
				if (bytes.length > options.length) {
					throw new Error(
						`BigInt (${bytes.length} bytes) is too large for length ${options.length}.`,
					);
				} else if (bytes.length < options.length) {
					const padded = Buffer.alloc(options.length);
					bytes.copy(padded, options.length - bytes.length);
					return padded;
				}
			}
		}

		const newBytes = Buffer.alloc(bytes.length);
		bytes.copy(newBytes, 0, 0, bytes.length);
		return newBytes;
	}

	/**
	 * Compares two integers, returning a negative number, zero, or a positive number when
	 * this value is less than, equal to, or greater than the other value.
	 *
	 * Both values must be in minimal form, as produced by `fromBytes()` or read from the wire.
	 */
	public compareTo(other: BigInt): number {
		const sign = this.sign;
		const otherSign = other.sign;
		if (sign !== otherSign) {
			return sign < otherSign ? -1 : 1;
		}

		if (this.buffer.length !== other.buffer.length) {
			const longer = this.buffer.length > other.buffer.length ? 1 : -1;
			return sign < 0 ? -longer : longer;
		}

		// Same sign and length: two's-complement bytes sort the same as the values.
		return this.buffer.compare(other.buffer);
	}

	public equals(other: BigInt): boolean {
		return other instanceof BigInt && this.buffer.equals(other.buffer);
	}

	public toString(name?: string): string {
		return formatBuffer(this.buffer, name ?? 'BigInt');
	}
}
