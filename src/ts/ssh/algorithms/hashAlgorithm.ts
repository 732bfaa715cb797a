//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';
import type { SshAlgorithm } from './sshAlgorithm';

/**
 * A stateless hash primitive, used to compute key exchange hashes.
 */
export abstract class HashAlgorithm implements SshAlgorithm {
	protected constructor(
		public readonly name: string,
		public readonly digestLength: number,
	) {}

	public abstract hash(data: Buffer): Buffer;
}
