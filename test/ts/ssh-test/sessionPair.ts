//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { Disposable } from 'vscode-jsonrpc';
import {
	InsecureTestGroupSource,
	KeyExchange,
	SshClientSession,
	SshHostKey,
	SshServerSession,
	SshSessionConfiguration,
	SshVersionInfo,
	Trace,
} from '../../../src/ts/ssh';
import { MockTransport } from './mockTransport';
import { testTrace } from './trace';

export const clientVersion = 'SSH-2.0-TestClient_1.2';
export const clientKexInitPayload = Buffer.from('14636c69656e742d6b6578696e6974', 'hex');
export const serverKexInitPayload = Buffer.from('14736572766572', 'hex');

export function parseVersion(versionString: string): SshVersionInfo {
	const version = SshVersionInfo.tryParse(versionString);
	if (!version) {
		throw new Error(`Invalid test version: ${versionString}`);
	}

	return version;
}

export function createSessionConfig(trace: Trace = testTrace): SshSessionConfiguration {
	const config = new SshSessionConfiguration();

	// Use the fixed group when testing, to avoid group generation.
	config.dhGroupSource = new InsecureTestGroupSource();
	config.trace = trace;
	return config;
}

/**
 * A client and server session that have exchanged versions and algorithm negotiation
 * payloads, ready for key exchange.
 */
export class SessionPair implements Disposable {
	public readonly clientSession: SshClientSession;
	public readonly serverSession: SshServerSession;
	public clientTransport = new MockTransport();
	public serverTransport = new MockTransport();

	public constructor(
		hostKey: SshHostKey,
		serverConfig: SshSessionConfiguration = createSessionConfig(),
		clientConfig: SshSessionConfiguration = createSessionConfig(),
	) {
		this.clientSession = new SshClientSession(clientConfig);
		this.serverSession = new SshServerSession(serverConfig, hostKey);

		this.clientSession.localVersion = parseVersion(clientVersion);
		this.clientSession.remoteVersion = this.serverSession.localVersion.toString();
		this.serverSession.remoteVersion = this.clientSession.localVersion.toString();

		this.clientSession.localKexInitPayload = clientKexInitPayload;
		this.clientSession.remoteKexInitPayload = serverKexInitPayload;
		this.serverSession.localKexInitPayload = serverKexInitPayload;
		this.serverSession.remoteKexInitPayload = clientKexInitPayload;

		this.clientSession.setHostKeyAlgorithm(hostKey.algorithmName);
	}

	/**
	 * Creates a new client and server key exchange, with new transports.
	 */
	public createKeyExchanges(algorithmName: string): [KeyExchange, KeyExchange] {
		this.clientTransport = new MockTransport();
		this.serverTransport = new MockTransport();
		return [
			this.clientSession.createKeyExchange(algorithmName, this.clientTransport),
			this.serverSession.createKeyExchange(algorithmName, this.serverTransport),
		];
	}

	/**
	 * Runs a complete key exchange, passing each produced packet to the other side.
	 */
	public runKeyExchange(algorithmName: string): [KeyExchange, KeyExchange] {
		const [clientKex, serverKex] = this.createKeyExchanges(algorithmName);

		clientKex.init(); // Request
		serverKex.input(this.clientTransport.take()); // Group
		clientKex.input(this.serverTransport.take()); // Init
		serverKex.input(this.clientTransport.take()); // Reply
		clientKex.input(this.serverTransport.take());

		return [clientKex, serverKex];
	}

	public dispose(): void {
		this.clientSession.dispose();
		this.serverSession.dispose();
	}
}
