//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import type { Disposable } from 'vscode-jsonrpc';
import { SshDataWriter, SshDataReader } from '../io/sshData';
import type { SshAlgorithm } from './sshAlgorithm';

export abstract class PublicKeyAlgorithm implements SshAlgorithm {
	protected constructor(
		public readonly name: string,
		public readonly keyAlgorithmName: string,
		public readonly hashAlgorithmName: string,
	) {}

	/**
	 * Creates a host key object with no key set, ready to load a public key received
	 * from the server via `decodePublicKey()`.
	 */
	public abstract createHostKey(): SshHostKey;

	public abstract generateHostKey(keySizeInBits?: number): SshHostKey;

	/**
	 * Unwraps a signature blob: `string algorithm-name || string signature`.
	 */
	public readSignatureData(signatureData: Buffer): Buffer {
		const reader = new SshDataReader(signatureData);
		const algorithmName = reader.readString('ascii');
		if (algorithmName !== this.name) {
			throw new Error(
				'Mismatched public key algorithm: ' +
					`got '${algorithmName}', expected '${this.name}'.`,
			);
		}

		const signature = reader.readBinary();
		reader.expectEnd('Signature data');
		return signature;
	}

	public createSignatureData(signature: Buffer): Buffer {
		const writer = new SshDataWriter(Buffer.alloc(this.name.length + signature.length + 20));
		writer.writeString(this.name, 'ascii');
		writer.writeBinary(signature);
		return writer.toBuffer();
	}
}

/**
 * The host key of the server: it signs the exchange hash on the server and verifies that
 * signature on the client.
 */
export interface SshHostKey extends Disposable {
	/** Name of the key format, for example `ssh-rsa`. */
	readonly keyAlgorithmName: string;

	/** Name of the signature algorithm, for example `rsa-sha2-256`. */
	readonly algorithmName: string;

	readonly hasPublicKey: boolean;
	readonly hasPrivateKey: boolean;

	/** Gets the public key blob in SSH wire format. */
	encodePublicKey(): Buffer;

	/** Loads a public key blob in SSH wire format; throws if the blob is not valid. */
	decodePublicKey(keyBytes: Buffer): void;

	/** Signs data, returning a signature blob in SSH wire format. */
	sign(data: Buffer): Buffer;

	/** Verifies a signature blob in SSH wire format. */
	verify(data: Buffer, signature: Buffer): boolean;
}
