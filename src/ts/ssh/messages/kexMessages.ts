//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import { SshMessage } from './sshMessage';
import { SshDataWriter, SshDataReader } from '../io/sshData';
import { BigInt } from '../io/bigInt';

export class KeyExchangeMessage extends SshMessage {}

/**
 * Message numbers of the Diffie-Hellman group exchange (RFC 4419).
 */
export enum DhGroupExchangeMessageType {
	group = 31,
	init = 32,
	reply = 33,
	request = 34,
}

/** SSH_MSG_KEX_DH_GEX_REQUEST, sent by the client. */
export class DhGroupExchangeRequestMessage extends KeyExchangeMessage {
	public get messageType(): number {
		return DhGroupExchangeMessageType.request;
	}

	public minimumBits: number = 0;
	public preferredBits: number = 0;
	public maximumBits: number = 0;

	protected onRead(reader: SshDataReader): void {
		this.minimumBits = reader.readUInt32();
		this.preferredBits = reader.readUInt32();
		this.maximumBits = reader.readUInt32();
	}

	protected onWrite(writer: SshDataWriter): void {
		writer.writeUInt32(this.minimumBits);
		writer.writeUInt32(this.preferredBits);
		writer.writeUInt32(this.maximumBits);
	}
}

/** SSH_MSG_KEX_DH_GEX_GROUP, sent by the server. */
export class DhGroupExchangeGroupMessage extends KeyExchangeMessage {
	public get messageType(): number {
		return DhGroupExchangeMessageType.group;
	}

	public prime: BigInt = BigInt.zero;
	public generator: BigInt = BigInt.zero;

	protected onRead(reader: SshDataReader): void {
		this.prime = reader.readBigInt();
		this.generator = reader.readBigInt();
	}

	protected onWrite(writer: SshDataWriter): void {
		writer.writeBigInt(this.prime);
		writer.writeBigInt(this.generator);
	}
}

/** SSH_MSG_KEX_DH_GEX_INIT, sent by the client. */
export class DhGroupExchangeInitMessage extends KeyExchangeMessage {
	public get messageType(): number {
		return DhGroupExchangeMessageType.init;
	}

	public e: BigInt = BigInt.zero;

	protected onRead(reader: SshDataReader): void {
		this.e = reader.readBigInt();
	}

	protected onWrite(writer: SshDataWriter): void {
		writer.writeBigInt(this.e);
	}
}

/** SSH_MSG_KEX_DH_GEX_REPLY, sent by the server. */
export class DhGroupExchangeReplyMessage extends KeyExchangeMessage {
	public get messageType(): number {
		return DhGroupExchangeMessageType.reply;
	}

	public hostKey: Buffer = Buffer.alloc(0);
	public f: BigInt = BigInt.zero;
	public signature: Buffer = Buffer.alloc(0);

	protected onRead(reader: SshDataReader): void {
		this.hostKey = reader.readBinary();
		this.f = reader.readBigInt();
		this.signature = reader.readBinary();
	}

	protected onWrite(writer: SshDataWriter): void {
		writer.writeBinary(this.hostKey);
		writer.writeBigInt(this.f);
		writer.writeBinary(this.signature);
	}
}

SshMessage.index.set(DhGroupExchangeMessageType.request, DhGroupExchangeRequestMessage);
SshMessage.index.set(DhGroupExchangeMessageType.group, DhGroupExchangeGroupMessage);
SshMessage.index.set(DhGroupExchangeMessageType.init, DhGroupExchangeInitMessage);
SshMessage.index.set(DhGroupExchangeMessageType.reply, DhGroupExchangeReplyMessage);
