//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import type { Disposable } from 'vscode-jsonrpc';
import type { SshAlgorithm } from './sshAlgorithm';
import type { HashAlgorithm } from './hashAlgorithm';
import type { SshSession } from '../sshSession';

/**
 * Transport stages the key exchange can signal to the packet layer.
 */
export enum SshTransportStage {
	/** Key exchange finished; the session may derive keys and switch to them. */
	algorithmNegotiated = 'algorithm-negotiated',
}

/**
 * The packet layer beneath a key exchange. Framing, padding and MACs are its concern;
 * the key exchange only hands it complete message payloads.
 */
export interface KeyExchangeTransport {
	/** Sends one message payload (message type byte followed by the message fields). */
	produce(packet: Buffer): void;

	/** Signals that the session has moved to a new transport stage. */
	flush(stage: SshTransportStage): void;
}

/**
 * Receives key exchange algorithms; the session later creates one key exchange per
 * connection from the algorithm selected during negotiation.
 */
export interface KeyExchangeAlgorithmRegistry {
	addAlgorithm(algorithm: KeyExchangeAlgorithm): void;
}

/**
 * A registered key exchange algorithm. Instances are stateless templates; each handshake
 * gets its own `KeyExchange` from `createKeyExchange()`.
 */
export abstract class KeyExchangeAlgorithm implements SshAlgorithm {
	protected constructor(
		public readonly name: string,
		public readonly hashAlgorithm: HashAlgorithm,
	) {}

	public get hashDigestLength(): number {
		return this.hashAlgorithm.digestLength;
	}

	public abstract createKeyExchange(
		session: SshSession,
		transport: KeyExchangeTransport,
	): KeyExchange;
}

/**
 * State of a single key exchange handshake on one connection.
 *
 * `init()` and `input()` run synchronously to completion. Any failure throws an
 * `SshKeyExchangeError` and leaves the exchange in a terminal failed state.
 */
export interface KeyExchange extends Disposable {
	readonly algorithmName: string;
	readonly isComplete: boolean;

	/** Sends the first message of the exchange. Only valid on the client. */
	init(): void;

	/** Handles one received message payload. */
	input(payload: Buffer): void;
}
