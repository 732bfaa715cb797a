//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

export interface ECCurve {
	/** Curve name as used by JSON web keys. */
	shortName: string;

	/** Curve name as used in SSH algorithm names and key blobs. */
	name: string;

	keySize: number;

	hashAlgorithmName: string;
}

/**
 * List of EC curves supported by the SSH ECDSA algorithm (RFC 5656).
 */
export const curves: ECCurve[] = [
	{
		shortName: 'P-256',
		name: 'nistp256',
		keySize: 256,
		hashAlgorithmName: 'SHA2-256',
	},
	{
		shortName: 'P-384',
		name: 'nistp384',
		keySize: 384,
		hashAlgorithmName: 'SHA2-384',
	},
	{
		shortName: 'P-521',
		name: 'nistp521',
		keySize: 521,
		hashAlgorithmName: 'SHA2-512',
	},
];
