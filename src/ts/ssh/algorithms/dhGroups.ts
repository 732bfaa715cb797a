//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { BigInt } from '../io/bigInt';
import { KeyExchangeFailureReason, SshKeyExchangeError } from '../errors';
import { SshTraceEventIds, Trace, TraceLevel } from '../trace';

export const dhGroupMinBits = 1024;
export const dhGroupMaxBits = 8192;

/**
 * Diffie-Hellman group parameters: a safe prime modulus and a generator.
 */
export interface DhGroup {
	readonly prime: BigInt;
	readonly generator: BigInt;
}

/**
 * Group size range requested by the client, in bits.
 */
export interface DhGroupRequest {
	readonly minimumBits: number;
	readonly preferredBits: number;
	readonly maximumBits: number;
}

/**
 * Supplies group parameters for a (clamped) group request. Which source a server uses is
 * a configuration choice; the messages on the wire are the same for all sources.
 */
export interface DhGroupSource {
	readonly name: string;
	selectGroup(request: DhGroupRequest, trace: Trace): DhGroup;
}

const one = BigInt.fromInt32(1);
const two = BigInt.fromInt32(2);

/**
 * Limits a requested range to the supported group sizes.
 * @returns The clamped request, where min <= preferred <= max.
 * @throws SshKeyExchangeError if the range is empty after clamping.
 */
export function clampGroupRequest(request: DhGroupRequest): DhGroupRequest {
	const minimumBits = Math.max(request.minimumBits, dhGroupMinBits);
	const maximumBits = Math.min(request.maximumBits, dhGroupMaxBits);
	if (minimumBits > maximumBits) {
		throw new SshKeyExchangeError(
			`Invalid DH group size range: min ${request.minimumBits}, max ${request.maximumBits}.`,
			KeyExchangeFailureReason.rangeInvalid,
		);
	}

	const preferredBits = Math.min(Math.max(request.preferredBits, minimumBits), maximumBits);
	return { minimumBits, preferredBits, maximumBits };
}

/**
 * Clamps the request and gets a group from the source, checking that the group size
 * is within the clamped range.
 */
export function selectDhGroup(
	source: DhGroupSource,
	request: DhGroupRequest,
	trace: Trace,
): DhGroup {
	const clampedRequest = clampGroupRequest(request);
	const group = source.selectGroup(clampedRequest, trace);

	const bits = group.prime.bitLength;
	if (bits < clampedRequest.minimumBits || bits > clampedRequest.maximumBits) {
		throw new SshKeyExchangeError(
			`DH group source '${source.name}' has no ${bits}-bit group within ` +
				`[${clampedRequest.minimumBits}, ${clampedRequest.maximumBits}].`,
			KeyExchangeFailureReason.rangeInvalid,
		);
	}

	trace(
		TraceLevel.Info,
		SshTraceEventIds.groupSelected,
		`Selected ${bits}-bit DH group from ${source.name} for request ` +
			`(${request.minimumBits}, ${request.preferredBits}, ${request.maximumBits}).`,
	);
	return group;
}

/**
 * Gets p - 1 for an odd p, by clearing the low bit.
 */
export function oddPrimeMinusOne(prime: BigInt): BigInt {
	const bytes = prime.toBytes();
	bytes[bytes.length - 1] &= 0xfe;
	return BigInt.fromBytes(bytes);
}

function isOdd(value: BigInt): boolean {
	const bytes = value.toBytes();
	return (bytes[bytes.length - 1] & 1) === 1;
}

/**
 * Checks group parameters received from a server against the range the client asked for.
 */
export function validateGroup(group: DhGroup, request: DhGroupRequest): void {
	const { prime, generator } = group;
	if (prime.sign <= 0 || !isOdd(prime)) {
		throw new SshKeyExchangeError(
			'DH group prime must be a positive odd integer.',
			KeyExchangeFailureReason.protocolViolation,
		);
	}

	if (generator.compareTo(two) < 0 || generator.compareTo(oddPrimeMinusOne(prime)) >= 0) {
		throw new SshKeyExchangeError(
			'DH group generator is out of range.',
			KeyExchangeFailureReason.protocolViolation,
		);
	}

	const clampedRequest = clampGroupRequest(request);
	const bits = prime.bitLength;
	if (bits < clampedRequest.minimumBits || bits > clampedRequest.maximumBits) {
		throw new SshKeyExchangeError(
			`DH group size ${bits} is outside the requested range ` +
				`[${clampedRequest.minimumBits}, ${clampedRequest.maximumBits}].`,
			KeyExchangeFailureReason.rangeInvalid,
		);
	}
}

/**
 * Checks that a peer's public value y satisfies 1 < y < p - 1.
 */
export function isValidPublicValue(value: BigInt, prime: BigInt): boolean {
	return value.compareTo(one) > 0 && value.compareTo(oddPrimeMinusOne(prime)) < 0;
}

const testPrimeHex =
	'00e31dfe85599bcb5c2bbecf201f5f49f1ea31077da926cb31039d82332fed67a3' +
	'a9b1c9e6346cd7b51a0a9411a7d926ff0e8d72c17b539a13787e1638747cb2dc60' +
	'2c8ce831f8d97baca671ee610c1aa42f472fe222bd01e525b695da3ff703f40ed6' +
	'8cbb691dcbd1e260dbf50b8598e617be294ea79011acbca53e05fee95693';

/**
 * A fixed, compiled-in 1024-bit group with generator 2.
 *
 * Every server using this source shares one small group. Use it only for tests and for
 * reproducing handshakes; it is never selected by default.
 */
export class InsecureTestGroupSource implements DhGroupSource {
	public static readonly group: DhGroup = {
		prime: BigInt.fromBytes(Buffer.from(testPrimeHex, 'hex')),
		generator: two,
	};

	public readonly name = 'insecure-test-group';

	public selectGroup(request: DhGroupRequest, trace: Trace): DhGroup {
		trace(
			TraceLevel.Warning,
			SshTraceEventIds.insecureGroupSelected,
			'Using the fixed insecure test DH group. Do not use this configuration in production.',
		);
		return InsecureTestGroupSource.group;
	}
}

/**
 * Generates a new safe prime of the preferred size for every request, with generator 2.
 * Generation is CPU-bound and can take seconds for large groups.
 */
export class GeneratedGroupSource implements DhGroupSource {
	public readonly name = 'generated';

	public selectGroup(request: DhGroupRequest, trace: Trace): DhGroup {
		trace(
			TraceLevel.Verbose,
			SshTraceEventIds.groupGenerating,
			`Generating ${request.preferredBits}-bit DH group parameters.`,
		);

		let dh: crypto.DiffieHellman;
		try {
			dh = crypto.createDiffieHellman(request.preferredBits, 2);
		} catch (e) {
			if (!(e instanceof Error)) throw e;
			throw new SshKeyExchangeError(
				`DH group generation failed: ${e.message}`,
				KeyExchangeFailureReason.cryptoFailure,
				e,
			);
		}

		return {
			prime: BigInt.fromBytes(dh.getPrime(), { unsigned: true }),
			generator: BigInt.fromBytes(dh.getGenerator(), { unsigned: true }),
		};
	}
}

/**
 * Node names of the RFC 3526 MODP groups, in increasing size.
 */
const wellKnownGroupNames = ['modp14', 'modp15', 'modp16', 'modp17', 'modp18'];

/**
 * Selects one of the RFC 3526 MODP groups (2048 to 8192 bits): the smallest group at least
 * as large as the preferred size, otherwise the largest group within the range. Falls back
 * to generating a group when no well-known group fits the range.
 */
export class WellKnownGroupSource implements DhGroupSource {
	public readonly name = 'well-known';

	private groups?: DhGroup[];

	public constructor(
		private readonly fallback: DhGroupSource = new GeneratedGroupSource(),
	) {}

	public selectGroup(request: DhGroupRequest, trace: Trace): DhGroup {
		const inRange = this.getGroups().filter((group) => {
			const bits = group.prime.bitLength;
			return bits >= request.minimumBits && bits <= request.maximumBits;
		});

		const preferred = inRange.find((group) => group.prime.bitLength >= request.preferredBits);
		const group = preferred ?? inRange[inRange.length - 1];
		if (group) {
			return group;
		}

		return this.fallback.selectGroup(request, trace);
	}

	private getGroups(): DhGroup[] {
		if (!this.groups) {
			this.groups = wellKnownGroupNames.map((name) => {
				const dh = crypto.getDiffieHellman(name);
				return {
					prime: BigInt.fromBytes(dh.getPrime(), { unsigned: true }),
					generator: BigInt.fromBytes(dh.getGenerator(), { unsigned: true }),
				};
			});
		}

		return this.groups;
	}
}
