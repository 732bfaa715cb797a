//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

export { SshSessionConfiguration } from './sshSessionConfiguration';
export { SshVersionInfo } from './sshVersionInfo';
export { SshSession } from './sshSession';
export type { KeyExchangeResult } from './sshSession';
export { SshClientSession } from './sshClientSession';
export { SshServerSession } from './sshServerSession';

export { SshKeyExchangeCompletedEventArgs } from './events/sshKeyExchangeCompletedEventArgs';

export { SshMessage } from './messages/sshMessage';
export type { SshMessageConstructor } from './messages/sshMessage';
export {
	KeyExchangeMessage,
	DhGroupExchangeMessageType,
	DhGroupExchangeRequestMessage,
	DhGroupExchangeGroupMessage,
	DhGroupExchangeInitMessage,
	DhGroupExchangeReplyMessage,
} from './messages/kexMessages';

export {
	SshAlgorithms,
	KeyExchangeAlgorithm,
	PublicKeyAlgorithm,
	HashAlgorithm,
	SshTransportStage,
	algorithmNames,
} from './algorithms/sshAlgorithms';
export type {
	SshAlgorithm,
	KeyExchange,
	KeyExchangeTransport,
	KeyExchangeAlgorithmRegistry,
	SshHostKey,
} from './algorithms/sshAlgorithms';
export {
	DhGroupExchangeAlgorithm,
	DhGroupExchange,
	DhGroupExchangePhase,
} from './algorithms/dhGroupExchange';
export {
	dhGroupMinBits,
	dhGroupMaxBits,
	clampGroupRequest,
	selectDhGroup,
	validateGroup,
	InsecureTestGroupSource,
	GeneratedGroupSource,
	WellKnownGroupSource,
} from './algorithms/dhGroups';
export type { DhGroup, DhGroupRequest, DhGroupSource } from './algorithms/dhGroups';
export {
	KeyExchangeTranscript,
	computeExchangeHash,
	encodeSharedSecret,
} from './algorithms/exchangeHash';
export type { ExchangeHashInput } from './algorithms/exchangeHash';
export { NodeDiffieHellmanKeyPair } from './algorithms/node/nodeKeyExchange';
export { NodeHash } from './algorithms/node/nodeHash';
export { NodeRsa } from './algorithms/node/nodeRsa';
export { NodeECDsa } from './algorithms/node/nodeECDsa';
export { curves } from './algorithms/ecdsaCurves';
export type { ECCurve } from './algorithms/ecdsaCurves';

export { BigInt } from './io/bigInt';
export { SshDataReader, SshDataWriter, formatBuffer } from './io/sshData';

export {
	SshDisconnectReason,
	KeyExchangeFailureReason,
	SshKeyExchangeError,
	ObjectDisposedError,
} from './errors';
export { TraceLevel, SshTraceEventIds, noTrace } from './trace';
export type { Trace } from './trace';
