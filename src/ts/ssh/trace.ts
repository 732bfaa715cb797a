//
//  Copyright (c) Microsoft Corporation. All rights reserved.
//

/**
 * SSH trace event level.
 */
export enum TraceLevel {
	Error = 'error',
	Warning = 'warning',
	Info = 'info',
	Verbose = 'verbose',
}

/**
 * Signature for a function that handles SSH trace events.
 *
 * @param level The level of message being traced: error, warning, info, or verbose.
 * @param eventId An integer that identifies the type of event, normally one of the
 * values from `SshTraceEventIds`.
 * @param msg A description of the event (non-localized).
 * @param err Optional `Error` object associated with the event, often included with
 * warning or error events.
 */
export type Trace = (level: TraceLevel, eventId: number, msg: string, err?: Error) => void;

/** A trace handler that discards all events. */
export const noTrace: Trace = () => {};

const baseEventId = 9000;

export class SshTraceEventIds {
	// Error / Warning events

	public static readonly unknownError = baseEventId + 0;
	public static readonly keyExchangeFailed = baseEventId + 30;
	public static readonly unexpectedMessage = baseEventId + 31;
	public static readonly serverAuthenticationFailed = baseEventId + 32;
	public static readonly insecureGroupSelected = baseEventId + 33;

	// Info / Verbose events

	public static readonly sendingMessage = baseEventId + 101;
	public static readonly receivingMessage = baseEventId + 102;
	public static readonly groupSelected = baseEventId + 171;
	public static readonly groupGenerating = baseEventId + 172;
	public static readonly keyExchangeCompleted = baseEventId + 173;
	public static readonly sessionAuthenticated = baseEventId + 174;
}
