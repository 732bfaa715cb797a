//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Disposable } from 'vscode-jsonrpc';

/**
 * Reason codes sent with an SSH disconnect message (RFC 4253 section 11.1).
 */
export enum SshDisconnectReason {
	none = 0,
	hostNotAllowedToConnect = 1,
	protocolError = 2,
	keyExchangeFailed = 3,
	reserved = 4,
	macError = 5,
	compressionError = 6,
	serviceNotAvailable = 7,
	protocolVersionNotSupported = 8,
	hostKeyNotVerifiable = 9,
	connectionLost = 10,
	byApplication = 11,
	tooManyConnections = 12,
	authCancelledByUser = 13,
	noMoreAuthMethodsAvailable = 14,
	illegalUserName = 15,
}

/**
 * Classifies a failed key exchange. Every failure is terminal for the handshake attempt;
 * the caller is expected to close or reset the connection.
 */
export enum KeyExchangeFailureReason {
	/** Message received by the wrong role or in the wrong phase, or a malformed field. */
	protocolViolation = 'protocol-violation',

	/** The requested group size range is empty after clamping. */
	rangeInvalid = 'range-invalid',

	/** Key generation, shared secret computation, or hashing failed. */
	cryptoFailure = 'crypto-failure',

	/** The host key signature over the exchange hash did not verify. */
	signatureInvalid = 'signature-invalid',

	/** The message tag is not one of the group exchange messages. */
	unexpectedMessage = 'unexpected-message',
}

export class SshKeyExchangeError extends Error {
	public constructor(
		message: string,
		public readonly reason: KeyExchangeFailureReason,
		public readonly innerError?: Error,
	) {
		super(message);
	}

	/**
	 * Gets the reason code the session layer should send when it disconnects
	 * because of this error.
	 */
	public get disconnectReason(): SshDisconnectReason {
		switch (this.reason) {
			case KeyExchangeFailureReason.signatureInvalid:
				return SshDisconnectReason.hostKeyNotVerifiable;
			case KeyExchangeFailureReason.rangeInvalid:
			case KeyExchangeFailureReason.cryptoFailure:
				return SshDisconnectReason.keyExchangeFailed;
			default:
				return SshDisconnectReason.protocolError;
		}
	}
}

export class ObjectDisposedError extends Error {
	// eslint-disable-next-line @typescript-eslint/ban-types
	public constructor(objectOrMessage?: Disposable | Function | string) {
		let message: string;

		if (typeof objectOrMessage === 'string') {
			message = objectOrMessage;
		} else if (typeof objectOrMessage === 'function') {
			// Constructor function (class name).
			message = objectOrMessage.name + ' disposed.';
		} else {
			message = (objectOrMessage?.constructor?.name ?? 'Object') + ' disposed.';
		}

		super(message);
	}
}
