//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

import * as packageJson from '../../../package.json';
const packageName = packageJson.name.replace(/^@\w+\//, ''); // Strip scope from name.
const packageVersion = packageJson.version;

/** Longest identification line allowed by RFC 4253 section 4.2, without the CR LF. */
const maxVersionStringLength = 253;

// SSH-protoversion-softwareversion [SP comments]
const versionPattern = /^SSH-(\d+\.\d+)-([\x21-\x7e]+)(?: ([\x20-\x7e]*))?$/;

/**
 * An SSH identification string, as exchanged before key exchange and hashed into the
 * exchange hash.
 */
export class SshVersionInfo {
	/**
	 * Parses an identification string (without the trailing CR LF).
	 *
	 * The software version is split at its last underscore into a name and a dotted numeric
	 * version; underscores in the name read as spaces. Characters after the numeric part of
	 * the version are ignored.
	 *
	 * @returns The parsed version, or null if the string is not an SSH identification string.
	 */
	public static tryParse(versionString: string): SshVersionInfo | null {
		if (versionString.length > maxVersionStringLength) {
			return null;
		}

		const match = versionPattern.exec(versionString);
		if (!match) {
			return null;
		}

		const protocolVersion = match[1];
		const softwareVersion = match[2];
		const comments = match[3] ?? null;

		const separatorIndex = softwareVersion.lastIndexOf('_');
		if (separatorIndex < 0) {
			return new SshVersionInfo(versionString, protocolVersion, softwareVersion, null, comments);
		}

		const name = softwareVersion.substring(0, separatorIndex).replace(/_/g, ' ');
		const numericVersion = /^\d+(\.\d+)*/.exec(softwareVersion.substring(separatorIndex + 1));
		return new SshVersionInfo(
			versionString,
			protocolVersion,
			name,
			numericVersion ? numericVersion[0] : null,
			comments,
		);
	}

	/**
	 * Gets the version info for this library.
	 */
	public static getLocalVersion(): SshVersionInfo {
		const protocolVersion = '2.0';
		return new SshVersionInfo(
			`SSH-${protocolVersion}-${packageName}_${packageVersion}`,
			protocolVersion,
			packageName,
			packageVersion,
			null,
		);
	}

	private constructor(
		private readonly versionString: string,
		/** Gets the SSH protocol version, for example "2.0". */
		public readonly protocolVersion: string,
		/** Gets the name of the SSH application or library. */
		public readonly name: string,
		/** Gets the numeric version of the SSH application or library, if it has one. */
		public readonly version: string | null,
		/** Gets the free-form text after the software version, if any. */
		public readonly comments: string | null,
	) {}

	/**
	 * Gets a value indicating whether the peer speaks SSH 2. Servers that also accept
	 * SSH 1 clients announce protocol version 1.99 (RFC 4253 section 5.1).
	 */
	public get isProtocolVersion2(): boolean {
		return this.protocolVersion === '2.0' || this.protocolVersion === '1.99';
	}

	/** Gets the identification string exactly as received or sent. */
	public toString(): string {
		return this.versionString;
	}
}
