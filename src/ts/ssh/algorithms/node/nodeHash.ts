//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { HashAlgorithm } from '../hashAlgorithm';
import { KeyExchangeFailureReason, SshKeyExchangeError } from '../../errors';

export class NodeHash extends HashAlgorithm {
	public static readonly sha1 = new NodeHash('SHA1');
	public static readonly sha256 = new NodeHash('SHA2-256');
	public static readonly sha384 = new NodeHash('SHA2-384');
	public static readonly sha512 = new NodeHash('SHA2-512');

	private readonly nodeAlgorithmName: string;

	public constructor(name: string) {
		super(name, NodeHash.getHashDigestLength(name));
		this.nodeAlgorithmName = NodeHash.getNodeHashAlgorithmName(name);
	}

	public hash(data: Buffer): Buffer {
		try {
			const hash = crypto.createHash(this.nodeAlgorithmName);
			hash.update(data);
			return hash.digest();
		} catch (e) {
			if (!(e instanceof Error)) throw e;
			throw new SshKeyExchangeError(
				`${this.name} hash failed: ${e.message}`,
				KeyExchangeFailureReason.cryptoFailure,
				e,
			);
		}
	}

	public static getHashDigestLength(hashAlgorithmName: string): number {
		if (hashAlgorithmName === 'SHA2-512') return 512 / 8;
		if (hashAlgorithmName === 'SHA2-384') return 384 / 8;
		if (hashAlgorithmName === 'SHA2-256') return 256 / 8;
		if (hashAlgorithmName === 'SHA1') return 160 / 8;
		throw new Error(`Unsupported hash algorithm: ${hashAlgorithmName}`);
	}

	public static getNodeHashAlgorithmName(hashAlgorithmName: string): string {
		if (hashAlgorithmName === 'SHA2-512') return 'sha512';
		if (hashAlgorithmName === 'SHA2-384') return 'sha384';
		if (hashAlgorithmName === 'SHA2-256') return 'sha256';
		if (hashAlgorithmName === 'SHA1') return 'sha1';
		throw new Error(`Unsupported hash algorithm: ${hashAlgorithmName}`);
	}
}
