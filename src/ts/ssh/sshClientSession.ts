//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { SshSession } from './sshSession';
import { SshSessionConfiguration } from './sshSessionConfiguration';

/**
 * The client side of an SSH session. The client starts each key exchange and verifies
 * the server's host key signature.
 */
export class SshClientSession extends SshSession {
	public constructor(config: SshSessionConfiguration) {
		super(config, true);
	}

	/**
	 * Selects the host key algorithm the client expects the server to use, by name.
	 */
	public setHostKeyAlgorithm(name: string): void {
		this.hostKeyAlgorithm = this.config.getPublicKeyAlgorithm(name);
	}
}
