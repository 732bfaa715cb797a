//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import {
	KeyExchange,
	KeyExchangeAlgorithm,
	KeyExchangeAlgorithmRegistry,
	KeyExchangeTransport,
	SshTransportStage,
} from './keyExchangeAlgorithm';
import type { HashAlgorithm } from './hashAlgorithm';
import type { SshHostKey } from './publicKeyAlgorithm';
import { NodeHash } from './node/nodeHash';
import { NodeDiffieHellmanKeyPair } from './node/nodeKeyExchange';
import {
	DhGroupRequest,
	dhGroupMaxBits,
	dhGroupMinBits,
	selectDhGroup,
	validateGroup,
} from './dhGroups';
import { KeyExchangeTranscript, computeExchangeHash, encodeSharedSecret } from './exchangeHash';
import { BigInt } from '../io/bigInt';
import { formatBuffer } from '../io/sshData';
import { SshMessage } from '../messages/sshMessage';
import {
	DhGroupExchangeGroupMessage,
	DhGroupExchangeInitMessage,
	DhGroupExchangeReplyMessage,
	DhGroupExchangeRequestMessage,
} from '../messages/kexMessages';
import { KeyExchangeFailureReason, ObjectDisposedError, SshKeyExchangeError } from '../errors';
import { SshTraceEventIds, Trace, TraceLevel } from '../trace';
import type { SshSession } from '../sshSession';

/**
 * Diffie-Hellman group exchange (RFC 4419), using the given hash for the exchange hash.
 */
export class DhGroupExchangeAlgorithm extends KeyExchangeAlgorithm {
	public static readonly dhGroupExchangeSha256 = 'diffie-hellman-group-exchange-sha256';
	public static readonly dhGroupExchangeSha1 = 'diffie-hellman-group-exchange-sha1';

	public static readonly withSha256 = new DhGroupExchangeAlgorithm(
		DhGroupExchangeAlgorithm.dhGroupExchangeSha256,
		NodeHash.sha256,
	);
	public static readonly withSha1 = new DhGroupExchangeAlgorithm(
		DhGroupExchangeAlgorithm.dhGroupExchangeSha1,
		NodeHash.sha1,
	);

	public constructor(name: string, hashAlgorithm: HashAlgorithm) {
		super(name, hashAlgorithm);
	}

	public createKeyExchange(session: SshSession, transport: KeyExchangeTransport): KeyExchange {
		return new DhGroupExchange(this, session, transport);
	}

	/**
	 * Adds the SHA-256 and SHA-1 variants, in that order of preference. Every registry gets
	 * the same two template instances.
	 */
	public static addAlgorithms(registry: KeyExchangeAlgorithmRegistry): void {
		registry.addAlgorithm(DhGroupExchangeAlgorithm.withSha256);
		registry.addAlgorithm(DhGroupExchangeAlgorithm.withSha1);
	}
}

export enum DhGroupExchangePhase {
	initial = 'initial',
	awaitingGroup = 'awaiting-group',
	awaitingReply = 'awaiting-reply',
	awaitingInit = 'awaiting-init',
	complete = 'complete',
	failed = 'failed',
}

/**
 * One group exchange handshake on one session. Rekeying creates a new instance.
 *
 * Client: `init()` sends the request, then `input()` handles the group and the reply.
 * Server: `input()` handles the request and the init message.
 */
export class DhGroupExchange implements KeyExchange {
	private phaseValue = DhGroupExchangePhase.initial;
	private transcriptValue?: KeyExchangeTranscript = new KeyExchangeTranscript();
	private request?: DhGroupRequest;
	private keyPair?: NodeDiffieHellmanKeyPair;
	private sharedSecret?: BigInt;
	private disposed: boolean = false;

	public constructor(
		private readonly algorithm: DhGroupExchangeAlgorithm,
		private readonly session: SshSession,
		private readonly transport: KeyExchangeTransport,
	) {}

	public get algorithmName(): string {
		return this.algorithm.name;
	}

	public get phase(): DhGroupExchangePhase {
		return this.phaseValue;
	}

	public get isComplete(): boolean {
		return this.phaseValue === DhGroupExchangePhase.complete;
	}

	private get trace(): Trace {
		return this.session.trace;
	}

	private get transcript(): KeyExchangeTranscript {
		if (!this.transcriptValue) throw new ObjectDisposedError(this);
		return this.transcriptValue;
	}

	public init(): void {
		this.run(() => {
			if (!this.session.isClientSession) {
				throw new SshKeyExchangeError(
					'Only the client can start a group exchange.',
					KeyExchangeFailureReason.protocolViolation,
				);
			}

			this.expectPhase(DhGroupExchangePhase.initial, 'init');

			const request = new DhGroupExchangeRequestMessage();
			request.minimumBits = dhGroupMinBits;
			request.preferredBits = dhGroupMinBits;
			request.maximumBits = dhGroupMaxBits;
			this.request = {
				minimumBits: request.minimumBits,
				preferredBits: request.preferredBits,
				maximumBits: request.maximumBits,
			};

			this.transcript.append(request.body);
			this.phaseValue = DhGroupExchangePhase.awaitingGroup;
			this.send(request);
		});
	}

	public input(payload: Buffer): void {
		this.run(() => {
			if (payload.length === 0) {
				throw new SshKeyExchangeError(
					'Empty key exchange message.',
					KeyExchangeFailureReason.protocolViolation,
				);
			}

			const message = SshMessage.create(payload);
			if (message) {
				this.trace(
					TraceLevel.Verbose,
					SshTraceEventIds.receivingMessage,
					`Receiving ${message}`,
				);
			}

			if (message instanceof DhGroupExchangeRequestMessage) {
				this.handleRequestMessage(message);
			} else if (message instanceof DhGroupExchangeGroupMessage) {
				this.handleGroupMessage(message);
			} else if (message instanceof DhGroupExchangeInitMessage) {
				this.handleInitMessage(message);
			} else if (message instanceof DhGroupExchangeReplyMessage) {
				this.handleReplyMessage(message);
			} else {
				throw new SshKeyExchangeError(
					`Unexpected message type ${payload[0]} during group exchange.`,
					KeyExchangeFailureReason.unexpectedMessage,
				);
			}
		});
	}

	private handleRequestMessage(message: DhGroupExchangeRequestMessage): void {
		this.expectRole(false, message);
		this.expectPhase(DhGroupExchangePhase.initial, message);

		const group = selectDhGroup(
			this.session.config.dhGroupSource,
			{
				minimumBits: message.minimumBits,
				preferredBits: message.preferredBits,
				maximumBits: message.maximumBits,
			},
			this.trace,
		);
		this.keyPair = new NodeDiffieHellmanKeyPair(group);

		const groupMessage = new DhGroupExchangeGroupMessage();
		groupMessage.prime = group.prime;
		groupMessage.generator = group.generator;

		this.transcript.append(message.body);
		this.transcript.append(groupMessage.body);
		this.phaseValue = DhGroupExchangePhase.awaitingInit;
		this.send(groupMessage);
	}

	private handleGroupMessage(message: DhGroupExchangeGroupMessage): void {
		this.expectRole(true, message);
		this.expectPhase(DhGroupExchangePhase.awaitingGroup, message);

		const request = this.request;
		if (!request) {
			throw new SshKeyExchangeError(
				'Group exchange request was not sent.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		const group = { prime: message.prime, generator: message.generator };
		validateGroup(group, request);

		this.transcript.append(message.body);
		this.keyPair = new NodeDiffieHellmanKeyPair(group);

		const initMessage = new DhGroupExchangeInitMessage();
		initMessage.e = this.keyPair.generate();

		this.transcript.append(initMessage.body);
		this.phaseValue = DhGroupExchangePhase.awaitingReply;
		this.send(initMessage);
	}

	private handleInitMessage(message: DhGroupExchangeInitMessage): void {
		this.expectRole(false, message);
		this.expectPhase(DhGroupExchangePhase.awaitingInit, message);

		const keyPair = this.keyPair;
		if (!keyPair) {
			throw new SshKeyExchangeError(
				'Group parameters were not selected.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		const hostKey = this.session.hostKey;
		if (!hostKey?.hasPrivateKey) {
			throw new SshKeyExchangeError(
				'Server host key is not available for signing.',
				KeyExchangeFailureReason.cryptoFailure,
			);
		}

		this.transcript.append(message.body);
		const f = keyPair.generate();
		this.transcript.appendBigInt(f);

		let hostKeyBlob: Buffer;
		let signature: Buffer;
		let exchangeHash: Buffer;
		try {
			hostKeyBlob = hostKey.encodePublicKey();
			exchangeHash = this.finish(message.e, hostKeyBlob);
			signature = hostKey.sign(exchangeHash);
		} catch (e) {
			if (!(e instanceof Error) || e instanceof SshKeyExchangeError) throw e;
			throw new SshKeyExchangeError(
				`Failed to sign the exchange hash: ${e.message}`,
				KeyExchangeFailureReason.cryptoFailure,
				e,
			);
		}

		const reply = new DhGroupExchangeReplyMessage();
		reply.hostKey = hostKeyBlob;
		reply.f = f;
		reply.signature = signature;
		this.send(reply);

		this.complete(exchangeHash, hostKey);
	}

	private handleReplyMessage(message: DhGroupExchangeReplyMessage): void {
		this.expectRole(true, message);
		this.expectPhase(DhGroupExchangePhase.awaitingReply, message);

		const publicKeyAlgorithm = this.session.hostKeyAlgorithm;
		if (!publicKeyAlgorithm) {
			throw new SshKeyExchangeError(
				'No host key algorithm was negotiated.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		// Load the server's public key bytes into a key instance.
		const hostKey = publicKeyAlgorithm.createHostKey();
		try {
			hostKey.decodePublicKey(message.hostKey);
		} catch (e) {
			hostKey.dispose();
			if (!(e instanceof Error)) throw e;
			this.trace(
				TraceLevel.Verbose,
				SshTraceEventIds.serverAuthenticationFailed,
				`Invalid server host key.\n${formatBuffer(message.hostKey, 'HostKey')}`,
			);
			throw new SshKeyExchangeError(
				`Invalid server host key: ${e.message}`,
				KeyExchangeFailureReason.protocolViolation,
				e,
			);
		}

		this.transcript.appendBigInt(message.f);
		const exchangeHash = this.finish(message.f, message.hostKey);

		let verified: boolean;
		try {
			verified = hostKey.verify(exchangeHash, message.signature);
		} catch (e) {
			hostKey.dispose();
			if (!(e instanceof Error)) throw e;
			this.trace(
				TraceLevel.Error,
				SshTraceEventIds.serverAuthenticationFailed,
				`Server public key verification error: ${e.message}`,
				e,
			);
			throw new SshKeyExchangeError(
				`Server public key verification failed: ${e.message}`,
				KeyExchangeFailureReason.signatureInvalid,
				e,
			);
		}

		if (verified) {
			this.trace(
				TraceLevel.Verbose,
				SshTraceEventIds.sessionAuthenticated,
				'Server public key verification succeeded.',
			);
		} else {
			hostKey.dispose();
			this.trace(
				TraceLevel.Warning,
				SshTraceEventIds.serverAuthenticationFailed,
				'Server public key verification failed.',
			);
			throw new SshKeyExchangeError(
				'Server public key verification failed.',
				KeyExchangeFailureReason.signatureInvalid,
			);
		}

		this.complete(exchangeHash, hostKey);
	}

	/**
	 * Computes the shared secret from the peer's public value, then the exchange hash
	 * over the transcript. Does not modify the session.
	 */
	private finish(peerPublicValue: BigInt, hostKeyBlob: Buffer): Buffer {
		const keyPair = this.keyPair;
		if (!keyPair) {
			throw new SshKeyExchangeError(
				'DH keypair is not available.',
				KeyExchangeFailureReason.cryptoFailure,
			);
		} else if (this.sharedSecret) {
			throw new SshKeyExchangeError(
				'Shared secret was already computed.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		const sharedSecret = keyPair.computeSharedSecret(peerPublicValue);
		this.sharedSecret = sharedSecret;

		const session = this.session;
		return computeExchangeHash(this.algorithm.hashAlgorithm, {
			clientVersion: session.clientVersion,
			serverVersion: session.serverVersion,
			clientKexInitPayload: session.clientKexInitPayload,
			serverKexInitPayload: session.serverKexInitPayload,
			hostKey: hostKeyBlob,
			transcript: this.transcript.toBuffer(),
			sharedSecret,
		});
	}

	private complete(exchangeHash: Buffer, hostKey: SshHostKey): void {
		const sharedSecret = this.sharedSecret;
		if (!sharedSecret) {
			throw new SshKeyExchangeError(
				'Shared secret was not computed.',
				KeyExchangeFailureReason.cryptoFailure,
			);
		}

		this.session.commitKeyExchange({
			algorithmName: this.algorithmName,
			exchangeHash,
			sharedSecret: encodeSharedSecret(sharedSecret),
			hostKey,
		});
		this.phaseValue = DhGroupExchangePhase.complete;
		this.releaseKeyPair();

		this.trace(
			TraceLevel.Info,
			SshTraceEventIds.keyExchangeCompleted,
			`${this.algorithmName} key exchange completed.`,
		);

		this.transport.flush(SshTransportStage.algorithmNegotiated);
	}

	private expectRole(isClient: boolean, message: SshMessage): void {
		if (this.session.isClientSession !== isClient) {
			throw new SshKeyExchangeError(
				`${message} is not valid on the ${this.session.isClientSession ? 'client' : 'server'}.`,
				KeyExchangeFailureReason.protocolViolation,
			);
		}
	}

	private expectPhase(phase: DhGroupExchangePhase, step: SshMessage | string): void {
		if (this.phaseValue !== phase) {
			throw new SshKeyExchangeError(
				`${step} is not valid in group exchange phase '${this.phaseValue}'.`,
				KeyExchangeFailureReason.protocolViolation,
			);
		}
	}

	private send(message: SshMessage): void {
		this.trace(TraceLevel.Verbose, SshTraceEventIds.sendingMessage, `Sending ${message}`);
		this.transport.produce(message.toBuffer());
	}

	/**
	 * Runs one step of the exchange. Any error ends an unfinished exchange in the failed
	 * phase. A completed exchange stays complete.
	 */
	private run(step: () => void): void {
		if (this.disposed) throw new ObjectDisposedError(this);

		try {
			step();
		} catch (e) {
			if (this.phaseValue !== DhGroupExchangePhase.complete) {
				this.phaseValue = DhGroupExchangePhase.failed;
			}

			this.releaseKeyPair();
			if (!(e instanceof Error)) throw e;

			if (e instanceof SshKeyExchangeError) {
				const isUnexpected = e.reason === KeyExchangeFailureReason.unexpectedMessage;
				this.trace(
					isUnexpected ? TraceLevel.Warning : TraceLevel.Error,
					isUnexpected
						? SshTraceEventIds.unexpectedMessage
						: SshTraceEventIds.keyExchangeFailed,
					`${this.algorithmName} key exchange failed (${e.reason}): ${e.message}`,
					e,
				);
			} else {
				this.trace(
					TraceLevel.Error,
					SshTraceEventIds.unknownError,
					`${this.algorithmName} key exchange error: ${e.message}`,
					e,
				);
			}

			throw e;
		}
	}

	private releaseKeyPair(): void {
		this.keyPair?.dispose();
		this.keyPair = undefined;
	}

	public dispose(): void {
		if (this.disposed) return;
		this.disposed = true;
		this.releaseKeyPair();
		this.transcriptValue = undefined;
		this.sharedSecret = undefined;
	}
}
