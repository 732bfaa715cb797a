//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { SshDataReader, SshDataWriter } from '../io/sshData';
import { KeyExchangeFailureReason, SshKeyExchangeError } from '../errors';

export interface SshMessageConstructor<T extends SshMessage = SshMessage> {
	new (): T;
}

export abstract class SshMessage {
	public get messageType(): number {
		return 0;
	}

	protected rawBytes?: Buffer;

	public toBuffer(): Buffer {
		const writer = new SshDataWriter(Buffer.alloc(16));
		this.write(writer);
		return writer.toBuffer();
	}

	/**
	 * Gets the serialized message without the leading message type byte.
	 */
	public get body(): Buffer {
		return this.toBuffer().slice(1);
	}

	public read(reader: SshDataReader): void {
		this.rawBytes = reader.buffer;

		const number = reader.readByte();
		if (number !== this.messageType) {
			throw new SshKeyExchangeError(
				`Message type ${number} is not valid for ${this}.`,
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		this.onRead(reader);
		reader.expectEnd(this.toString());
	}

	public write(writer: SshDataWriter): void {
		if (this.rawBytes) {
			// Received messages are rewritten without re-serialization, so that the bytes
			// added to the key exchange transcript are exactly the bytes that were received.
			writer.write(this.rawBytes);
		} else {
			writer.writeByte(this.messageType);

			this.onWrite(writer);
		}
	}

	protected onRead(_reader: SshDataReader): void {
		throw new Error('Not supported.');
	}

	protected onWrite(_writer: SshDataWriter): void {
		throw new Error('Not supported.');
	}

	public toString() {
		return this.constructor.name;
	}

	public static readonly index = new Map<number, SshMessageConstructor>();

	/**
	 * Parses a message payload, or returns null if the message type is not registered.
	 */
	public static create(data: Buffer): SshMessage | null {
		if (data.length === 0) {
			throw new SshKeyExchangeError(
				'Empty message payload.',
				KeyExchangeFailureReason.protocolViolation,
			);
		}

		const messageClass = SshMessage.index.get(data[0]);
		if (messageClass) {
			const message = new messageClass();
			message.read(new SshDataReader(data));
			return message;
		} else {
			return null;
		}
	}
}
