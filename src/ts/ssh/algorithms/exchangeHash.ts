//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { BigInt } from '../io/bigInt';
import { SshDataWriter } from '../io/sshData';
import type { HashAlgorithm } from './hashAlgorithm';

/**
 * Append-only log of the group exchange values that go into the exchange hash,
 * in the order they were sent or received.
 */
export class KeyExchangeTranscript {
	private readonly writer = new SshDataWriter(Buffer.alloc(1024));

	public get length(): number {
		return this.writer.position;
	}

	public append(data: Buffer): void {
		this.writer.write(data);
	}

	/** Appends a value in `mpint` form. */
	public appendBigInt(value: BigInt): void {
		this.writer.writeBigInt(value);
	}

	/** Gets a copy of the bytes appended so far. */
	public toBuffer(): Buffer {
		return Buffer.from(this.writer.toBuffer());
	}
}

export interface ExchangeHashInput {
	readonly clientVersion: string;
	readonly serverVersion: string;
	readonly clientKexInitPayload: Buffer;
	readonly serverKexInitPayload: Buffer;
	readonly hostKey: Buffer;
	readonly transcript: Buffer;
	readonly sharedSecret: BigInt;
}

/**
 * Computes the exchange hash H. Version strings and payloads are always ordered client
 * first, regardless of which side computes the hash.
 */
export function computeExchangeHash(hashAlgorithm: HashAlgorithm, input: ExchangeHashInput): Buffer {
	const writer = new SshDataWriter(Buffer.alloc(2048));
	writer.writeString(input.clientVersion, 'utf8');
	writer.writeString(input.serverVersion, 'utf8');
	writer.writeBinary(input.clientKexInitPayload);
	writer.writeBinary(input.serverKexInitPayload);
	writer.writeBinary(input.hostKey);
	writer.write(input.transcript);
	writer.writeBigInt(input.sharedSecret);

	return hashAlgorithm.hash(writer.toBuffer());
}

/**
 * Encodes the shared secret K as a length-prefixed `mpint`, the form used when
 * deriving session keys.
 */
export function encodeSharedSecret(sharedSecret: BigInt): Buffer {
	const writer = new SshDataWriter(Buffer.alloc(sharedSecret.toBytes().length + 4));
	writer.writeBigInt(sharedSecret);
	return writer.toBuffer();
}
