//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import { Buffer } from 'buffer';

export class SshKeyExchangeCompletedEventArgs {
	public constructor(
		public readonly algorithmName: string,
		public readonly exchangeHash: Buffer,

		/** True if this exchange established the session ID; false for a rekey. */
		public readonly isInitialExchange: boolean,
	) {}

	public toString() {
		return `${this.algorithmName}${this.isInitialExchange ? '' : ' (rekey)'}`;
	}
}
