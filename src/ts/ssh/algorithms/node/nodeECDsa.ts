//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { PublicKeyAlgorithm, SshHostKey } from '../publicKeyAlgorithm';
import { ECCurve, curves } from '../ecdsaCurves';
import { BigInt } from '../../io/bigInt';
import { SshDataReader, SshDataWriter } from '../../io/sshData';
import { NodeHash } from './nodeHash';

class NodeECDsaHostKey implements SshHostKey {
	/* @internal */
	public publicKey?: crypto.KeyObject;

	/* @internal */
	public privateKey?: crypto.KeyObject;

	/* @internal */
	public constructor(private readonly algorithm: NodeECDsa) {}

	public get hasPublicKey() {
		return !!this.publicKey;
	}
	public get hasPrivateKey() {
		return !!this.privateKey;
	}

	public get keyAlgorithmName() {
		return this.algorithm.keyAlgorithmName;
	}

	public get algorithmName() {
		return this.algorithm.name;
	}

	private get curve(): ECCurve {
		return this.algorithm.curve;
	}

	private get keySizeInBytes(): number {
		return Math.ceil(this.curve.keySize / 8);
	}

	public generate(): void {
		const { publicKey, privateKey } = crypto.generateKeyPairSync('ec', {
			namedCurve: this.curve.shortName,
		});
		this.publicKey = publicKey;
		this.privateKey = privateKey;
	}

	public decodePublicKey(keyBytes: Buffer): void {
		// Read public key in SSH format.
		const reader = new SshDataReader(keyBytes);
		const algorithmName = reader.readString('ascii');
		if (algorithmName !== this.keyAlgorithmName) {
			throw new Error(`Invalid ECDSA key algorithm: ${algorithmName}`);
		}

		const curveName = reader.readString('ascii');
		if (curveName !== this.curve.name) {
			throw new Error(`Invalid ECDSA curve: ${curveName}`);
		}

		const xy = reader.readBinary();
		reader.expectEnd('ECDSA public key');

		const keySizeInBytes = this.keySizeInBytes;
		if (xy.length !== 1 + 2 * keySizeInBytes || xy[0] !== 4) {
			throw new Error('Only uncompressed ECDSA public keys are supported.');
		}

		this.publicKey = crypto.createPublicKey({
			key: {
				kty: 'EC',
				crv: this.curve.shortName,
				x: xy.slice(1, 1 + keySizeInBytes).toString('base64url'),
				y: xy.slice(1 + keySizeInBytes).toString('base64url'),
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
		if (!jwk.x || !jwk.y) {
			throw new Error('ECDSA public key parameters are missing.');
		}

		const keySizeInBytes = this.keySizeInBytes;
		const x = BigInt.fromBytes(Buffer.from(jwk.x, 'base64url'), { unsigned: true });
		const y = BigInt.fromBytes(Buffer.from(jwk.y, 'base64url'), { unsigned: true });
		const xBytes = x.toBytes({ unsigned: true, length: keySizeInBytes });
		const yBytes = y.toBytes({ unsigned: true, length: keySizeInBytes });

		// Write public key in SSH format.
		const keyWriter = new SshDataWriter(Buffer.alloc(256));
		keyWriter.writeString(this.keyAlgorithmName, 'ascii');
		keyWriter.writeString(this.curve.name, 'ascii');
		keyWriter.writeUInt32(1 + xBytes.length + yBytes.length);
		keyWriter.writeByte(4); // Indicates uncompressed curve format
		keyWriter.write(xBytes);
		keyWriter.write(yBytes);
		return keyWriter.toBuffer();
	}

	public sign(data: Buffer): Buffer {
		if (!this.privateKey) {
			throw new Error('Private key not set.');
		}

		const signature = crypto.sign(this.algorithm.nodeHashAlgorithmName, data, {
			key: this.privateKey,
			dsaEncoding: 'ieee-p1363',
		});

		// Reformat the fixed-length r || s pair as the two mpints required by SSH.
		const keySizeInBytes = this.keySizeInBytes;
		const r = BigInt.fromBytes(signature.slice(0, keySizeInBytes), { unsigned: true });
		const s = BigInt.fromBytes(signature.slice(keySizeInBytes), { unsigned: true });
		const signatureWriter = new SshDataWriter(Buffer.alloc(2 * (keySizeInBytes + 5)));
		signatureWriter.writeBigInt(r);
		signatureWriter.writeBigInt(s);

		return this.algorithm.createSignatureData(signatureWriter.toBuffer());
	}

	public verify(data: Buffer, signatureData: Buffer): boolean {
		if (!this.publicKey) {
			throw new Error('Public key not set.');
		}

		const signatureReader = new SshDataReader(this.algorithm.readSignatureData(signatureData));
		const r = signatureReader.readBigInt();
		const s = signatureReader.readBigInt();
		signatureReader.expectEnd('ECDSA signature');
		if (r.sign <= 0 || s.sign <= 0) {
			return false;
		}

		// Reformat the signature integers as the fixed-length form node expects.
		const keySizeInBytes = this.keySizeInBytes;
		const signature = Buffer.concat([
			r.toBytes({ unsigned: true, length: keySizeInBytes }),
			s.toBytes({ unsigned: true, length: keySizeInBytes }),
		]);

		return crypto.verify(
			this.algorithm.nodeHashAlgorithmName,
			data,
			{ key: this.publicKey, dsaEncoding: 'ieee-p1363' },
			signature,
		);
	}

	public dispose(): void {
		this.publicKey = undefined;
		this.privateKey = undefined;
	}
}

export class NodeECDsa extends PublicKeyAlgorithm {
	public static readonly ecdsaSha2Nistp256 = 'ecdsa-sha2-nistp256';
	public static readonly ecdsaSha2Nistp384 = 'ecdsa-sha2-nistp384';
	public static readonly ecdsaSha2Nistp521 = 'ecdsa-sha2-nistp521';

	public readonly curve: ECCurve;

	public constructor(name: string) {
		const curveName = name.split('-')[2];
		const curve = curves.find((c) => c.name === curveName);
		if (!curve) {
			throw new Error('Invalid or unsupported ECDSA algorithm: ' + name);
		}

		super(
			name,
			name, // The key algorithm name is the same (unlike RSA).
			curve.hashAlgorithmName,
		);
		this.curve = curve;
	}

	/* @internal */
	public get nodeHashAlgorithmName(): string {
		return NodeHash.getNodeHashAlgorithmName(this.hashAlgorithmName);
	}

	public createHostKey(): SshHostKey {
		return new NodeECDsaHostKey(this);
	}

	public generateHostKey(): SshHostKey {
		const ecdsaKey = new NodeECDsaHostKey(this);
		ecdsaKey.generate();
		return ecdsaKey;
	}

	public static readonly HostKey = NodeECDsaHostKey;
}
