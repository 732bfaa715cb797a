//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as assert from 'assert';
import * as crypto from 'crypto';
import { suite, test, slow, timeout, params } from '@testdeck/mocha';
import {
	BigInt,
	DhGroupExchange,
	DhGroupExchangeAlgorithm,
	DhGroupExchangeGroupMessage,
	DhGroupExchangeInitMessage,
	DhGroupExchangePhase,
	DhGroupExchangeReplyMessage,
	InsecureTestGroupSource,
	KeyExchange,
	KeyExchangeFailureReason,
	ObjectDisposedError,
	SshAlgorithms,
	SshDataWriter,
	SshDisconnectReason,
	SshHostKey,
	SshKeyExchangeCompletedEventArgs,
	SshKeyExchangeError,
	SshMessage,
	SshSessionConfiguration,
	SshTraceEventIds,
	SshTransportStage,
	TraceLevel,
	algorithmNames,
} from '../../../src/ts/ssh';
import {
	SessionPair,
	clientKexInitPayload,
	clientVersion,
	createSessionConfig,
	parseVersion,
	serverKexInitPayload,
} from './sessionPair';
import { createTraceRecorder, testTrace } from './trace';

const sha256Name = DhGroupExchangeAlgorithm.dhGroupExchangeSha256;

function hasReason(reason: KeyExchangeFailureReason): (e: unknown) => boolean {
	return (e: unknown) => e instanceof SshKeyExchangeError && e.reason === reason;
}

function lengthPrefixed(data: Buffer): Buffer {
	const length = Buffer.alloc(4);
	length.writeUInt32BE(data.length);
	return Buffer.concat([length, data]);
}

function createGroupPacket(prime: BigInt, generator: BigInt): Buffer {
	const message = new DhGroupExchangeGroupMessage();
	message.prime = prime;
	message.generator = generator;
	return message.toBuffer();
}

function createInitPacket(e: BigInt): Buffer {
	const message = new DhGroupExchangeInitMessage();
	message.e = e;
	return message.toBuffer();
}

function getPhase(kex: KeyExchange): DhGroupExchangePhase {
	if (!(kex instanceof DhGroupExchange)) {
		throw new Error('Group exchange expected.');
	}

	return kex.phase;
}

@suite
@slow(1000)
@timeout(20000)
export class KeyExchangeTests {
	private static rsaKey: SshHostKey;
	private static ecdsaKey: SshHostKey;

	public static before() {
		KeyExchangeTests.rsaKey = SshAlgorithms.publicKey.rsaWithSha256.generateHostKey();
		KeyExchangeTests.ecdsaKey = SshAlgorithms.publicKey.ecdsaSha2Nistp256.generateHostKey();
	}

	public static after() {
		KeyExchangeTests.rsaKey.dispose();
		KeyExchangeTests.ecdsaKey.dispose();
	}

	@test
	@params({ kexAlg: 'diffie-hellman-group-exchange-sha256', digestLength: 32 })
	@params({ kexAlg: 'diffie-hellman-group-exchange-sha1', digestLength: 20 })
	@params.naming((p) => `keyExchange(${p.kexAlg})`)
	public keyExchange({ kexAlg, digestLength }: { kexAlg: string; digestLength: number }) {
		const [trace, events] = createTraceRecorder();
		const pair = new SessionPair(KeyExchangeTests.rsaKey, createSessionConfig(trace));
		const [clientKex, serverKex] = pair.runKeyExchange(kexAlg);
		const { clientSession, serverSession } = pair;

		assert.ok(clientKex.isComplete);
		assert.ok(serverKex.isComplete);
		assert.equal(clientKex.algorithmName, kexAlg);

		const exchangeHash = clientSession.exchangeHash;
		assert.ok(exchangeHash);
		assert.equal(exchangeHash.length, digestLength);
		assert.ok(serverSession.exchangeHash?.equals(exchangeHash), 'server exchange hash');
		assert.ok(clientSession.sessionId?.equals(exchangeHash), 'client session ID');
		assert.ok(serverSession.sessionId?.equals(exchangeHash), 'server session ID');

		const sharedSecret = clientSession.sharedSecret;
		assert.ok(sharedSecret);
		assert.ok(serverSession.sharedSecret?.equals(sharedSecret), 'shared secret');

		assert.deepStrictEqual(pair.clientTransport.stages, [SshTransportStage.algorithmNegotiated]);
		assert.deepStrictEqual(pair.serverTransport.stages, [SshTransportStage.algorithmNegotiated]);
		assert.equal(pair.clientTransport.packets.length, 0);
		assert.equal(pair.serverTransport.packets.length, 0);

		assert.ok(clientSession.hostKey?.encodePublicKey().equals(KeyExchangeTests.rsaKey.encodePublicKey()));
		assert.ok(!clientSession.hostKey?.hasPrivateKey);

		const serverEvents = events.map((e) => e.eventId);
		assert.ok(serverEvents.includes(SshTraceEventIds.insecureGroupSelected));
		assert.ok(
			events.some(
				(e) => e.eventId === SshTraceEventIds.keyExchangeCompleted && e.level === TraceLevel.Info,
			),
		);

		pair.dispose();
	}

	@test
	public messageSequence() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const { clientSession, serverSession } = pair;
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		const requestPacket = pair.clientTransport.take();
		assert.equal(requestPacket.toString('hex'), '22' + '00000400' + '00000400' + '00002000');

		serverKex.input(requestPacket);
		const groupPacket = pair.serverTransport.take();
		const group = SshMessage.create(groupPacket);
		assert.ok(group instanceof DhGroupExchangeGroupMessage);
		assert.equal(group.prime.bitLength, 1024);
		assert.ok(group.generator.equals(BigInt.fromInt32(2)));

		clientKex.input(groupPacket);
		const initPacket = pair.clientTransport.take();
		const init = SshMessage.create(initPacket);
		assert.ok(init instanceof DhGroupExchangeInitMessage);
		assert.equal(init.e.sign, 1);

		serverKex.input(initPacket);
		assert.ok(serverSession.exchangeHash, 'server commits after sending the reply');
		assert.equal(clientSession.exchangeHash, null);

		const replyPacket = pair.serverTransport.take();
		const reply = SshMessage.create(replyPacket);
		assert.ok(reply instanceof DhGroupExchangeReplyMessage);
		assert.ok(reply.hostKey.equals(KeyExchangeTests.rsaKey.encodePublicKey()));

		clientKex.input(replyPacket);

		// Recompute the exchange hash from what was sent on the wire.
		const fWriter = new SshDataWriter(Buffer.alloc(0));
		fWriter.writeBigInt(reply.f);
		const transcript = Buffer.concat([
			requestPacket.slice(1),
			groupPacket.slice(1),
			initPacket.slice(1),
			fWriter.toBuffer(),
		]);

		const sharedSecret = clientSession.sharedSecret;
		assert.ok(sharedSecret);
		const expectedHash = crypto
			.createHash('sha256')
			.update(
				Buffer.concat([
					lengthPrefixed(Buffer.from(clientVersion)),
					lengthPrefixed(Buffer.from(serverSession.localVersion.toString())),
					lengthPrefixed(clientKexInitPayload),
					lengthPrefixed(serverKexInitPayload),
					lengthPrefixed(reply.hostKey),
					transcript,
					sharedSecret,
				]),
			)
			.digest();

		assert.equal(clientSession.exchangeHash?.toString('hex'), expectedHash.toString('hex'));
		assert.equal(serverSession.exchangeHash?.toString('hex'), expectedHash.toString('hex'));
		assert.ok(KeyExchangeTests.rsaKey.verify(expectedHash, reply.signature));

		pair.dispose();
	}

	@test
	public ecdsaHostKey() {
		const pair = new SessionPair(KeyExchangeTests.ecdsaKey);
		const [clientKex, serverKex] = pair.runKeyExchange(sha256Name);

		assert.ok(clientKex.isComplete);
		assert.ok(serverKex.isComplete);
		assert.ok(pair.clientSession.exchangeHash);
		assert.ok(pair.serverSession.exchangeHash?.equals(pair.clientSession.exchangeHash));
		assert.equal(pair.clientSession.hostKey?.algorithmName, 'ecdsa-sha2-nistp256');

		pair.dispose();
	}

	@test
	@slow(5000)
	public wellKnownGroupByDefault() {
		const serverConfig = new SshSessionConfiguration();
		serverConfig.trace = testTrace;
		const pair = new SessionPair(KeyExchangeTests.rsaKey, serverConfig);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());
		const groupPacket = pair.serverTransport.take();
		const group = SshMessage.create(groupPacket);
		assert.ok(group instanceof DhGroupExchangeGroupMessage);
		assert.equal(group.prime.bitLength, 2048);

		clientKex.input(groupPacket);
		serverKex.input(pair.clientTransport.take());
		clientKex.input(pair.serverTransport.take());
		assert.ok(clientKex.isComplete);
		assert.ok(pair.clientSession.exchangeHash);
		assert.ok(pair.serverSession.exchangeHash?.equals(pair.clientSession.exchangeHash));

		pair.dispose();
	}

	@test
	public rekeyKeepsSessionId() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const { clientSession, serverSession } = pair;
		const completed: SshKeyExchangeCompletedEventArgs[] = [];
		clientSession.onKeyExchangeCompleted((e) => completed.push(e));

		pair.runKeyExchange(sha256Name);
		assert.ok(clientSession.exchangeHash);
		const firstHash = Buffer.from(clientSession.exchangeHash);

		const [clientKex, serverKex] = pair.runKeyExchange(sha256Name);
		assert.ok(clientKex.isComplete);
		assert.ok(serverKex.isComplete);

		const secondHash = clientSession.exchangeHash;
		assert.ok(secondHash);
		assert.ok(!secondHash.equals(firstHash), 'rekey produces a new exchange hash');
		assert.ok(serverSession.exchangeHash?.equals(secondHash));
		assert.ok(clientSession.sessionId?.equals(firstHash), 'client session ID unchanged');
		assert.ok(serverSession.sessionId?.equals(firstHash), 'server session ID unchanged');

		assert.deepStrictEqual(
			completed.map((e) => e.isInitialExchange),
			[true, false],
		);
		assert.equal(completed[1].algorithmName, sha256Name);

		pair.dispose();
	}

	@test
	public serverRejectsGroup() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [, serverKex] = pair.createKeyExchanges(sha256Name);
		const group = InsecureTestGroupSource.group;

		assert.throws(
			() => serverKex.input(createGroupPacket(group.prime, group.generator)),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(getPhase(serverKex), DhGroupExchangePhase.failed);
		assert.equal(pair.serverTransport.packets.length, 0);
	}

	@test
	public clientRejectsRequest() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		const requestPacket = pair.clientTransport.take();
		assert.throws(
			() => clientKex.input(requestPacket),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(getPhase(clientKex), DhGroupExchangePhase.failed);
	}

	@test
	public clientRejectsInit() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		assert.throws(
			() => clientKex.input(createInitPacket(BigInt.fromInt32(5))),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
	}

	@test
	public serverRejectsInit() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [, serverKex] = pair.createKeyExchanges(sha256Name);

		assert.throws(
			() => serverKex.init(),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
	}

	@test
	public initTwice() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		assert.throws(() => clientKex.init(), hasReason(KeyExchangeFailureReason.protocolViolation));
		assert.equal(pair.clientTransport.packets.length, 1);
	}

	@test
	@params({ tag: 0 })
	@params({ tag: 20 })
	@params({ tag: 30 })
	@params({ tag: 35 })
	@params({ tag: 255 })
	@params.naming((p) => `unknownMessage(${p.tag})`)
	public unknownMessage({ tag }: { tag: number }) {
		const [trace, events] = createTraceRecorder();
		const pair = new SessionPair(
			KeyExchangeTests.rsaKey,
			createSessionConfig(),
			createSessionConfig(trace),
		);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		assert.throws(
			() => clientKex.input(Buffer.from([tag, 0, 0, 0, 0])),
			hasReason(KeyExchangeFailureReason.unexpectedMessage),
		);
		assert.equal(events[events.length - 1].eventId, SshTraceEventIds.unexpectedMessage);

		// A failed exchange rejects everything after.
		const group = InsecureTestGroupSource.group;
		assert.throws(
			() => clientKex.input(createGroupPacket(group.prime, group.generator)),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(pair.clientTransport.packets.length, 1);
	}

	@test
	public emptyMessage() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [, serverKex] = pair.createKeyExchanges(sha256Name);
		assert.throws(
			() => serverKex.input(Buffer.alloc(0)),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
	}

	@test
	public initBeforeRequest() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [, serverKex] = pair.createKeyExchanges(sha256Name);

		assert.throws(
			() => serverKex.input(createInitPacket(BigInt.fromInt32(5))),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(getPhase(serverKex), DhGroupExchangePhase.failed);
		assert.equal(pair.serverTransport.packets.length, 0);
		assert.equal(pair.serverSession.exchangeHash, null);
	}

	@test
	public replyBeforeGroup() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		const reply = new DhGroupExchangeReplyMessage();
		reply.hostKey = KeyExchangeTests.rsaKey.encodePublicKey();
		reply.f = BigInt.fromInt32(2);
		reply.signature = Buffer.from('signature');

		clientKex.init();
		assert.throws(
			() => clientKex.input(reply.toBuffer()),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(pair.clientSession.exchangeHash, null);
		assert.equal(pair.clientSession.sessionId, null);
	}

	@test
	public duplicateGroup() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());
		const groupPacket = pair.serverTransport.take();
		clientKex.input(groupPacket);
		assert.equal(getPhase(clientKex), DhGroupExchangePhase.awaitingReply);

		assert.throws(
			() => clientKex.input(groupPacket),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(getPhase(clientKex), DhGroupExchangePhase.failed);
	}

	@test
	@params({ offset: 0 })
	@params({ offset: 5 })
	@params({ offset: 20 })
	@params({ offset: 100 })
	@params({ offset: -1 })
	@params.naming((p) => `signatureTamper(${p.offset})`)
	public signatureTamper({ offset }: { offset: number }) {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const { clientSession } = pair;
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());
		clientKex.input(pair.serverTransport.take());
		serverKex.input(pair.clientTransport.take());
		const replyPacket = pair.serverTransport.take();

		const reply = SshMessage.create(replyPacket);
		assert.ok(reply instanceof DhGroupExchangeReplyMessage);
		const signatureStart = replyPacket.length - reply.signature.length;
		const index = offset >= 0 ? signatureStart + offset : replyPacket.length + offset;

		const tampered = Buffer.from(replyPacket);
		tampered[index] ^= 0x01;

		assert.throws(
			() => clientKex.input(tampered),
			(e: unknown) =>
				e instanceof SshKeyExchangeError &&
				e.reason === KeyExchangeFailureReason.signatureInvalid &&
				e.disconnectReason === SshDisconnectReason.hostKeyNotVerifiable,
		);

		assert.ok(!clientKex.isComplete);
		assert.equal(getPhase(clientKex), DhGroupExchangePhase.failed);
		assert.equal(clientSession.exchangeHash, null);
		assert.equal(clientSession.sharedSecret, null);
		assert.equal(clientSession.sessionId, null);
		assert.equal(clientSession.hostKey, null);
		assert.deepStrictEqual(pair.clientTransport.stages, []);

		pair.dispose();
	}

	@test
	public invalidHostKeyBlob() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());
		clientKex.input(pair.serverTransport.take());
		serverKex.input(pair.clientTransport.take());
		const replyPacket = Buffer.from(pair.serverTransport.take());

		// Type byte, blob length, key type length, then the key type name.
		assert.equal(replyPacket.slice(9, 16).toString(), 'ssh-rsa');
		replyPacket[9] = 'x'.charCodeAt(0);

		assert.throws(
			() => clientKex.input(replyPacket),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(pair.clientSession.exchangeHash, null);
	}

	@test
	public serverRejectsInvalidPublicValue() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());

		assert.throws(
			() => serverKex.input(createInitPacket(BigInt.fromInt32(1))),
			(e: unknown) =>
				e instanceof SshKeyExchangeError &&
				e.reason === KeyExchangeFailureReason.cryptoFailure &&
				e.disconnectReason === SshDisconnectReason.keyExchangeFailed,
		);
		assert.equal(pair.serverSession.exchangeHash, null);
		assert.equal(pair.serverSession.sessionId, null);
		assert.equal(pair.serverTransport.packets.length, 1);
		assert.deepStrictEqual(pair.serverTransport.stages, []);
	}

	@test
	public clientRejectsSmallGroup() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		// An odd 512-bit value.
		const prime = BigInt.fromBytes(
			Buffer.concat([Buffer.from([0xc0]), Buffer.alloc(62), Buffer.from([0x01])]),
			{ unsigned: true },
		);

		clientKex.init();
		assert.throws(
			() => clientKex.input(createGroupPacket(prime, BigInt.fromInt32(2))),
			hasReason(KeyExchangeFailureReason.rangeInvalid),
		);
		assert.equal(pair.clientTransport.packets.length, 1);
	}

	@test
	public clientRejectsBadGenerator() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		assert.throws(
			() =>
				clientKex.input(
					createGroupPacket(InsecureTestGroupSource.group.prime, BigInt.fromInt32(1)),
				),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
	}

	@test
	public serverRejectsEmptyRange() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [, serverKex] = pair.createKeyExchanges(sha256Name);

		// min 4096 > max 2048
		assert.throws(
			() => serverKex.input(Buffer.from('22' + '00001000' + '00001000' + '00000800', 'hex')),
			hasReason(KeyExchangeFailureReason.rangeInvalid),
		);
		assert.equal(pair.serverTransport.packets.length, 0);
	}

	@test
	public completedExchangeRejectsMessages() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.init();
		serverKex.input(pair.clientTransport.take());
		clientKex.input(pair.serverTransport.take());
		const initPacket = pair.clientTransport.take();
		serverKex.input(initPacket);
		const replyPacket = pair.serverTransport.take();
		clientKex.input(replyPacket);

		const exchangeHash = pair.serverSession.exchangeHash;
		assert.ok(exchangeHash);

		assert.throws(
			() => serverKex.input(initPacket),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.throws(
			() => clientKex.input(replyPacket),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.throws(() => clientKex.init(), hasReason(KeyExchangeFailureReason.protocolViolation));
		assert.throws(
			() => clientKex.input(Buffer.from([20])),
			hasReason(KeyExchangeFailureReason.unexpectedMessage),
		);

		assert.ok(serverKex.isComplete);
		assert.ok(clientKex.isComplete);
		assert.equal(getPhase(serverKex), DhGroupExchangePhase.complete);
		assert.equal(getPhase(clientKex), DhGroupExchangePhase.complete);
		assert.strictEqual(pair.serverSession.exchangeHash, exchangeHash);
		assert.equal(pair.serverTransport.packets.length, 0);
		assert.deepStrictEqual(pair.serverTransport.stages, [SshTransportStage.algorithmNegotiated]);

		pair.dispose();
	}

	@test
	@params({ remoteVersion: 'SSH-1.5-OldClient_1.0' })
	@params({ remoteVersion: 'OpenSSH_9.0' })
	@params({ remoteVersion: 'SSH-2.0-TestClient_1.2\r' })
	@params({ remoteVersion: 'SSH-2.0-' + 'x'.repeat(250) })
	@params.naming((p) => `invalidRemoteVersion(${JSON.stringify(p.remoteVersion).substring(0, 40)})`)
	public invalidRemoteVersion({ remoteVersion }: { remoteVersion: string }) {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		pair.serverSession.remoteVersion = remoteVersion;

		assert.throws(
			() => pair.runKeyExchange(sha256Name),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(pair.serverSession.exchangeHash, null);
		assert.equal(pair.serverSession.sessionId, null);
		assert.equal(pair.serverTransport.packets.length, 0);
		assert.deepStrictEqual(pair.serverTransport.stages, []);
	}

	@test
	public legacyCompatibleRemoteVersion() {
		const legacyVersion = 'SSH-1.99-LegacyClient_3.2';
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		pair.clientSession.localVersion = parseVersion(legacyVersion);
		pair.serverSession.remoteVersion = legacyVersion;

		const [clientKex, serverKex] = pair.runKeyExchange(sha256Name);
		assert.ok(clientKex.isComplete);
		assert.ok(serverKex.isComplete);
		assert.equal(pair.serverSession.clientVersion, legacyVersion);

		const exchangeHash = pair.clientSession.exchangeHash;
		assert.ok(exchangeHash);
		assert.ok(pair.serverSession.exchangeHash?.equals(exchangeHash));

		pair.dispose();
	}

	@test
	public missingRemoteVersion() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		pair.clientSession.remoteVersion = null;

		assert.throws(
			() => pair.runKeyExchange(sha256Name),
			hasReason(KeyExchangeFailureReason.protocolViolation),
		);
		assert.equal(pair.clientSession.exchangeHash, null);
	}

	@test
	public disposedExchange() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		const [clientKex, serverKex] = pair.createKeyExchanges(sha256Name);

		clientKex.dispose();
		assert.throws(() => clientKex.init(), ObjectDisposedError);

		serverKex.dispose();
		assert.throws(() => serverKex.input(Buffer.from([34])), ObjectDisposedError);
	}

	@test
	public defaultAlgorithms() {
		const config = new SshSessionConfiguration();
		assert.deepStrictEqual(algorithmNames(config.keyExchangeAlgorithms), [
			'diffie-hellman-group-exchange-sha256',
			'diffie-hellman-group-exchange-sha1',
		]);
		assert.equal(config.getKeyExchangeAlgorithm(sha256Name).hashDigestLength, 32);

		// The catalog templates are the registered ones.
		assert.strictEqual(config.keyExchangeAlgorithms[0], SshAlgorithms.keyExchange.dhGroupExchangeSha256);
		assert.strictEqual(config.keyExchangeAlgorithms[1], SshAlgorithms.keyExchange.dhGroupExchangeSha1);
		assert.strictEqual(
			SshAlgorithms.keyExchange.dhGroupExchangeSha256.hashAlgorithm,
			SshAlgorithms.hash.sha256,
		);
		assert.strictEqual(
			new SshSessionConfiguration().getKeyExchangeAlgorithm(sha256Name),
			config.getKeyExchangeAlgorithm(sha256Name),
		);

		assert.throws(() => config.addAlgorithm(SshAlgorithms.keyExchange.dhGroupExchangeSha1));
		assert.throws(() => config.getKeyExchangeAlgorithm('diffie-hellman-group14-sha256'));
	}

	@test
	public unknownAlgorithm() {
		const pair = new SessionPair(KeyExchangeTests.rsaKey);
		assert.throws(
			() => pair.serverSession.createKeyExchange('ecdh-sha2-nistp256', pair.serverTransport),
			/Algorithm not found/,
		);
	}
}
