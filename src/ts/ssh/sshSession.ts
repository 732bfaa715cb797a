//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { Disposable, Emitter } from 'vscode-jsonrpc';
import { Trace } from './trace';
import { SshSessionConfiguration } from './sshSessionConfiguration';
import { SshVersionInfo } from './sshVersionInfo';
import type { KeyExchange, KeyExchangeTransport } from './algorithms/keyExchangeAlgorithm';
import type { PublicKeyAlgorithm, SshHostKey } from './algorithms/publicKeyAlgorithm';
import { SshKeyExchangeCompletedEventArgs } from './events/sshKeyExchangeCompletedEventArgs';
import { KeyExchangeFailureReason, ObjectDisposedError, SshKeyExchangeError } from './errors';

/**
 * Values produced by a successful key exchange.
 */
export interface KeyExchangeResult {
	readonly algorithmName: string;
	readonly exchangeHash: Buffer;

	/** The shared secret K, as a length-prefixed `mpint`. */
	readonly sharedSecret: Buffer;

	/** The server host key whose signature was verified, or the server's own key. */
	readonly hostKey: SshHostKey;
}

/**
 * Base class for an SSH server or client connection. Holds the values exchanged before
 * key exchange (versions, algorithm negotiation payloads, host key) and the values a
 * key exchange produces.
 */
export abstract class SshSession implements Disposable {
	public localVersion: SshVersionInfo = SshVersionInfo.getLocalVersion();

	/**
	 * Identification string received from the other side, without the trailing CR LF.
	 * It is parsed and checked when a key exchange needs it.
	 */
	public remoteVersion: string | null = null;

	/** Payload of the key exchange init message sent by this side. */
	public localKexInitPayload: Buffer | null = null;

	/** Payload of the key exchange init message received from the other side. */
	public remoteKexInitPayload: Buffer | null = null;

	/**
	 * Gets or sets the negotiated host key algorithm. A client uses it to read the key
	 * that the server sends during key exchange.
	 */
	public hostKeyAlgorithm: PublicKeyAlgorithm | null = null;

	/**
	 * On a server, the key used to sign exchange hashes. On a client, the server key that
	 * was verified during the most recent key exchange.
	 */
	public hostKey: SshHostKey | null = null;

	private exchangeHashValue: Buffer | null = null;
	private sharedSecretValue: Buffer | null = null;
	private sessionIdValue: Buffer | null = null;
	private disposed: boolean = false;

	private readonly keyExchangeCompletedEmitter = new Emitter<SshKeyExchangeCompletedEventArgs>();

	/**
	 * Event that is raised after each successful key exchange, once the session has the
	 * new exchange hash and shared secret.
	 */
	public readonly onKeyExchangeCompleted = this.keyExchangeCompletedEmitter.event;

	protected constructor(
		public readonly config: SshSessionConfiguration,
		public readonly isClientSession: boolean,
	) {
		if (!config) throw new TypeError('Session configuration is required.');
	}

	public get trace(): Trace {
		return this.config.trace;
	}

	/** Exchange hash H of the most recent key exchange. */
	public get exchangeHash(): Buffer | null {
		return this.exchangeHashValue;
	}

	/** Shared secret K of the most recent key exchange, as a length-prefixed `mpint`. */
	public get sharedSecret(): Buffer | null {
		return this.sharedSecretValue;
	}

	/**
	 * Exchange hash of the first key exchange. It does not change when the session rekeys.
	 */
	public get sessionId(): Buffer | null {
		return this.sessionIdValue;
	}

	public get clientVersion(): string {
		return (this.isClientSession ? this.localVersion : this.getRemoteVersion()).toString();
	}

	public get serverVersion(): string {
		return (this.isClientSession ? this.getRemoteVersion() : this.localVersion).toString();
	}

	public get clientKexInitPayload(): Buffer {
		return this.isClientSession ? this.getLocalKexInitPayload() : this.getRemoteKexInitPayload();
	}

	public get serverKexInitPayload(): Buffer {
		return this.isClientSession ? this.getRemoteKexInitPayload() : this.getLocalKexInitPayload();
	}

	/**
	 * Creates the key exchange for one handshake, using an algorithm enabled in the session
	 * configuration.
	 */
	public createKeyExchange(algorithmName: string, transport: KeyExchangeTransport): KeyExchange {
		if (this.disposed) throw new ObjectDisposedError(this);

		const algorithm = this.config.getKeyExchangeAlgorithm(algorithmName);
		return algorithm.createKeyExchange(this, transport);
	}

	/* @internal */
	public commitKeyExchange(result: KeyExchangeResult): void {
		if (this.disposed) throw new ObjectDisposedError(this);

		const isInitialExchange = !this.sessionIdValue;
		this.exchangeHashValue = result.exchangeHash;
		this.sharedSecretValue = result.sharedSecret;
		if (isInitialExchange) {
			this.sessionIdValue = Buffer.from(result.exchangeHash);
		}

		this.hostKey = result.hostKey;

		this.keyExchangeCompletedEmitter.fire(
			new SshKeyExchangeCompletedEventArgs(
				result.algorithmName,
				result.exchangeHash,
				isInitialExchange,
			),
		);
	}

	private getRemoteVersion(): SshVersionInfo {
		if (!this.remoteVersion) {
			throw new SshKeyExchangeError(
				'Remote version was not received.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		const version = SshVersionInfo.tryParse(this.remoteVersion);
		if (!version) {
			throw new SshKeyExchangeError(
				`Invalid remote version string: ${JSON.stringify(this.remoteVersion)}`,
				KeyExchangeFailureReason.protocolViolation,
			);
		} else if (!version.isProtocolVersion2) {
			throw new SshKeyExchangeError(
				`Unsupported remote protocol version: ${version.protocolVersion}`,
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		return version;
	}

	private getLocalKexInitPayload(): Buffer {
		if (!this.localKexInitPayload) {
			throw new SshKeyExchangeError(
				'Key exchange init message was not sent.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		return this.localKexInitPayload;
	}

	private getRemoteKexInitPayload(): Buffer {
		if (!this.remoteKexInitPayload) {
			throw new SshKeyExchangeError(
				'Key exchange init message was not received.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		return this.remoteKexInitPayload;
	}

	public dispose(): void {
		if (this.disposed) return;
		this.disposed = true;

		this.keyExchangeCompletedEmitter.dispose();
		this.exchangeHashValue = null;
		this.sharedSecretValue?.fill(0);
		this.sharedSecretValue = null;
	}
}
