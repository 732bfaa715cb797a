//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as crypto from 'crypto';
import { Disposable } from 'vscode-jsonrpc';
import { BigInt } from '../../io/bigInt';
import { DhGroup, isValidPublicValue } from '../dhGroups';
import { KeyExchangeFailureReason, ObjectDisposedError, SshKeyExchangeError } from '../../errors';

function wrapCryptoError<T>(operation: string, action: () => T): T {
	try {
		return action();
	} catch (e) {
		if (!(e instanceof Error)) throw e;
		throw new SshKeyExchangeError(
			`${operation} failed: ${e.message}`,
			KeyExchangeFailureReason.cryptoFailure,
			e,
		);
	}
}

/**
 * A Diffie-Hellman keypair for one handshake, in the given group.
 */
export class NodeDiffieHellmanKeyPair implements Disposable {
	private dh?: crypto.DiffieHellman;
	private publicValue?: BigInt;
	private disposed: boolean = false;

	public constructor(public readonly group: DhGroup) {}

	public get hasKeys(): boolean {
		return !!this.publicValue;
	}

	/**
	 * Generates the keypair on first call.
	 * @returns The public value.
	 */
	public generate(): BigInt {
		if (this.disposed) throw new ObjectDisposedError(this);

		if (!this.publicValue) {
			const dh = wrapCryptoError('DH parameter setup', () =>
				crypto.createDiffieHellman(
					this.group.prime.toBytes({ unsigned: true }),
					this.group.generator.toBytes({ unsigned: true }),
				),
			);
			const publicKey = wrapCryptoError('DH key generation', () => dh.generateKeys());

			this.dh = dh;
			this.publicValue = BigInt.fromBytes(publicKey, { unsigned: true });
		}

		return this.publicValue;
	}

	/**
	 * Combines the local private value with the peer's public value.
	 * @returns The shared secret K.
	 */
	public computeSharedSecret(peerPublicValue: BigInt): BigInt {
		if (this.disposed) throw new ObjectDisposedError(this);

		const dh = this.dh;
		if (!dh) {
			throw new SshKeyExchangeError(
				'DH keypair has not been generated.',
				KeyExchangeFailureReason.cryptoFailure,
			);
		}

		if (!isValidPublicValue(peerPublicValue, this.group.prime)) {
			throw new SshKeyExchangeError(
				'Peer DH public value is out of range.',
				KeyExchangeFailureReason.cryptoFailure,
			);
		}

		const secret = wrapCryptoError('DH shared secret computation', () =>
			dh.computeSecret(peerPublicValue.toBytes({ unsigned: true })),
		);
		return BigInt.fromBytes(secret, { unsigned: true });
	}

	public dispose(): void {
		this.dh = undefined;
		this.publicValue = undefined;
		this.disposed = true;
	}
}
