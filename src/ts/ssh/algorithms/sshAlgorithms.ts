//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import type { SshAlgorithm } from './sshAlgorithm';
import {
	KeyExchangeAlgorithm,
	KeyExchangeAlgorithmRegistry,
	KeyExchangeTransport,
	SshTransportStage,
} from './keyExchangeAlgorithm';
import type { KeyExchange } from './keyExchangeAlgorithm';
import { PublicKeyAlgorithm } from './publicKeyAlgorithm';
import type { SshHostKey } from './publicKeyAlgorithm';
import { HashAlgorithm } from './hashAlgorithm';
import { NodeHash } from './node/nodeHash';
import { NodeRsa } from './node/nodeRsa';
import { NodeECDsa } from './node/nodeECDsa';
import { DhGroupExchangeAlgorithm } from './dhGroupExchange';

export type { SshAlgorithm, KeyExchange, KeyExchangeTransport, KeyExchangeAlgorithmRegistry, SshHostKey };
export { KeyExchangeAlgorithm, PublicKeyAlgorithm, HashAlgorithm, SshTransportStage };

const hash = {
	sha1: NodeHash.sha1,
	sha256: NodeHash.sha256,
	sha384: NodeHash.sha384,
	sha512: NodeHash.sha512,
};

const keyExchange = {
	dhGroupExchangeSha256: DhGroupExchangeAlgorithm.withSha256,
	dhGroupExchangeSha1: DhGroupExchangeAlgorithm.withSha1,
};

const publicKey = {
	rsaWithSha256: new NodeRsa(NodeRsa.rsaWithSha256, 'SHA2-256'),
	rsaWithSha512: new NodeRsa(NodeRsa.rsaWithSha512, 'SHA2-512'),
	ecdsaSha2Nistp256: new NodeECDsa(NodeECDsa.ecdsaSha2Nistp256),
	ecdsaSha2Nistp384: new NodeECDsa(NodeECDsa.ecdsaSha2Nistp384),
	ecdsaSha2Nistp521: new NodeECDsa(NodeECDsa.ecdsaSha2Nistp521),
};

export class SshAlgorithms {
	public static readonly hash = hash;
	public static readonly keyExchange = keyExchange;
	public static readonly publicKey = publicKey;
}

export function algorithmNames<T extends SshAlgorithm>(list: T[]): string[] {
	return list.map((a) => a.name);
}
