//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { PublicKeyAlgorithm, SshHostKey } from '../publicKeyAlgorithm';
import { SshDataReader, SshDataWriter } from '../../io/sshData';
import { BigInt } from '../../io/bigInt';
import { NodeHash } from './nodeHash';

// Note this is exposed as an inner-class property below: `NodeRsa.HostKey`.
// TypeScript requires that the class definition comes first.
class NodeRsaHostKey implements SshHostKey {
	private static readonly defaultKeySize = 2048;

	/* @internal */
	public publicKey?: crypto.KeyObject;
	/* @internal */
	public privateKey?: crypto.KeyObject;

	/* @internal */
	public constructor(private readonly algorithm: NodeRsa) {}

	public get hasPublicKey() {
		return !!this.publicKey;
	}
	public get hasPrivateKey() {
		return !!this.privateKey;
	}

	public get keyAlgorithmName(): string {
		return NodeRsa.keyAlgorithmName;
	}

	public get algorithmName(): string {
		return this.algorithm.name;
	}

	public generate(keySizeInBits?: number): void {
		const { publicKey, privateKey } = crypto.generateKeyPairSync('rsa', {
			modulusLength: keySizeInBits ?? NodeRsaHostKey.defaultKeySize,
		});
		this.publicKey = publicKey;
		this.privateKey = privateKey;
	}

	public decodePublicKey(keyBytes: Buffer): void {
		// Read public key in SSH format.
		const reader = new SshDataReader(keyBytes);
		const algorithmName = reader.readString('ascii');
		if (algorithmName !== this.keyAlgorithmName) {
			throw new Error(`Invalid RSA key algorithm: ${algorithmName}`);
		}

		const exponent = reader.readBigInt();
		const modulus = reader.readBigInt();
		reader.expectEnd('RSA public key');

		this.publicKey = crypto.createPublicKey({
			key: {
				kty: 'RSA',
				n: modulus.toBytes({ unsigned: true }).toString('base64url'),
				e: exponent.toBytes({ unsigned: true }).toString('base64url'),
			},
			format: 'jwk',
		});
		this.privateKey = undefined;
	}

	public encodePublicKey(): Buffer {
		if (!this.publicKey) {
			throw new Error('Public key not set.');
		}

		const jwk = this.publicKey.export({ format: 'jwk' });
		if (!jwk.n || !jwk.e) {
			throw new Error('RSA public key parameters are missing.');
		}

		// Write public key in SSH format.
		const keyWriter = new SshDataWriter(Buffer.alloc(512));
		keyWriter.writeString(this.keyAlgorithmName, 'ascii');
		keyWriter.writeBigInt(BigInt.fromBytes(Buffer.from(jwk.e, 'base64url'), { unsigned: true }));
		keyWriter.writeBigInt(BigInt.fromBytes(Buffer.from(jwk.n, 'base64url'), { unsigned: true }));
		return keyWriter.toBuffer();
	}

	public sign(data: Buffer): Buffer {
		if (!this.privateKey) {
			throw new Error('Private key not set.');
		}

		const signature = crypto.sign(this.algorithm.nodeHashAlgorithmName, data, this.privateKey);
		return this.algorithm.createSignatureData(signature);
	}

	public verify(data: Buffer, signatureData: Buffer): boolean {
		if (!this.publicKey) {
			throw new Error('Public key not set.');
		}

		const signature = this.algorithm.readSignatureData(signatureData);
		return crypto.verify(this.algorithm.nodeHashAlgorithmName, data, this.publicKey, signature);
	}

	public dispose(): void {
		this.publicKey = undefined;
		this.privateKey = undefined;
	}
}

export class NodeRsa extends PublicKeyAlgorithm {
	public static readonly keyAlgorithmName = 'ssh-rsa';

	public static readonly rsaWithSha256 = 'rsa-sha2-256';
	public static readonly rsaWithSha512 = 'rsa-sha2-512';

	public constructor(name: string, hashAlgorithmName: string) {
		super(name, NodeRsa.keyAlgorithmName, hashAlgorithmName);
	}

	/* @internal */
	public get nodeHashAlgorithmName(): string {
		return NodeHash.getNodeHashAlgorithmName(this.hashAlgorithmName);
	}

	public createHostKey(): SshHostKey {
		return new NodeRsaHostKey(this);
	}

	public generateHostKey(keySizeInBits?: number): SshHostKey {
		const rsaKey = new NodeRsaHostKey(this);
		rsaKey.generate(keySizeInBits);
		return rsaKey;
	}

	public static readonly HostKey = NodeRsaHostKey;
}
