//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import {
	SshAlgorithm,
	SshAlgorithms,
	KeyExchangeAlgorithm,
	KeyExchangeAlgorithmRegistry,
	PublicKeyAlgorithm,
} from './algorithms/sshAlgorithms';
import { DhGroupExchangeAlgorithm } from './algorithms/dhGroupExchange';
import { DhGroupSource, WellKnownGroupSource } from './algorithms/dhGroups';
import { Trace, noTrace } from './trace';

/**
 * Specifies the sets of algorithms and other configuration for an SSH session.
 *
 * Each collection of algorithms is in order of preference. Choosing among them is left to
 * the transport's algorithm negotiation; the configuration only holds what is enabled.
 */
export class SshSessionConfiguration implements KeyExchangeAlgorithmRegistry {
	public constructor() {
		DhGroupExchangeAlgorithm.addAlgorithms(this);

		this.publicKeyAlgorithms.push(SshAlgorithms.publicKey.rsaWithSha512);
		this.publicKeyAlgorithms.push(SshAlgorithms.publicKey.rsaWithSha256);
		this.publicKeyAlgorithms.push(SshAlgorithms.publicKey.ecdsaSha2Nistp384);
		this.publicKeyAlgorithms.push(SshAlgorithms.publicKey.ecdsaSha2Nistp256);
	}

	/**
	 * Gets the collection of algorithms that are enabled for key exchange.
	 */
	public readonly keyExchangeAlgorithms: KeyExchangeAlgorithm[] = [];

	/**
	 * Gets the collection of algorithms that are enabled for server (host) keys.
	 */
	public readonly publicKeyAlgorithms: PublicKeyAlgorithm[] = [];

	/**
	 * Gets or sets the source of Diffie-Hellman groups that a server offers in a group
	 * exchange. The default uses the RFC 3526 groups, generating a group only when none of
	 * them fits the client's request.
	 *
	 * `InsecureTestGroupSource` makes handshakes fast and repeatable for tests, but must
	 * not be used in production.
	 */
	public dhGroupSource: DhGroupSource = new WellKnownGroupSource();

	/**
	 * Gets or sets a function that handles trace events of sessions using this configuration.
	 */
	public trace: Trace = noTrace;

	/**
	 * Adds a key exchange algorithm to the end of the preference list.
	 */
	public addAlgorithm(algorithm: KeyExchangeAlgorithm): void {
		if (this.keyExchangeAlgorithms.some((a) => a.name === algorithm.name)) {
			throw new Error(`Duplicate key exchange algorithm: ${algorithm.name}`);
		}

		this.keyExchangeAlgorithms.push(algorithm);
	}

	public getKeyExchangeAlgorithm(name: string): KeyExchangeAlgorithm {
		return this.getAlgorithm(name, this.keyExchangeAlgorithms);
	}

	public getPublicKeyAlgorithm(name: string): PublicKeyAlgorithm {
		return this.getAlgorithm(name, this.publicKeyAlgorithms);
	}

	private getAlgorithm<T extends SshAlgorithm>(name: string, collection: T[]): T {
		const algorithm = collection.find((a) => a.name === name);
		if (!algorithm) {
			throw new Error('Algorithm not found: ' + name);
		}

		return algorithm;
	}
}
