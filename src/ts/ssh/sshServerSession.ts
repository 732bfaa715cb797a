//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { SshSession } from './sshSession';
import { SshSessionConfiguration } from './sshSessionConfiguration';
import type { SshHostKey } from './algorithms/publicKeyAlgorithm';

/**
 * The server side of an SSH session. The server selects the group for each key exchange
 * and signs the exchange hash with its host key.
 */
export class SshServerSession extends SshSession {
	public constructor(config: SshSessionConfiguration, hostKey?: SshHostKey) {
		super(config, false);

		if (hostKey) {
			this.setHostKey(hostKey);
		}
	}

	/**
	 * Sets the key the server signs with. The key must have a private key, and its
	 * algorithm must be enabled in the session configuration.
	 */
	public setHostKey(hostKey: SshHostKey): void {
		if (!hostKey.hasPrivateKey) {
			throw new Error('Server host key must include a private key.');
		}

		this.hostKeyAlgorithm = this.config.getPublicKeyAlgorithm(hostKey.algorithmName);
		this.hostKey = hostKey;
	}
}
