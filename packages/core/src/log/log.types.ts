/**
 * Log Types
 *
 * Every non-silent condition a connection or server runs into becomes a
 * timestamped entry the driver polls for.
 */

import type { ErrorInfo } from "../errors";
import { describeError } from "../errors";
import type { DataPacket } from "../packet/data-packet";

// =============================================================================
// Log Kinds
// =============================================================================

export type LogKind =
	| { readonly type: "connect"; readonly address: string }
	| { readonly type: "disconnect"; readonly address: string }
	| { readonly type: "received-packet"; readonly packet: DataPacket }
	| { readonly type: "sent-packet"; readonly packet: DataPacket }
	| { readonly type: "connect-error"; readonly error: ErrorInfo }
	| { readonly type: "connect-timed-out"; readonly address: string; readonly timeout: number }
	| { readonly type: "fatal-read-error"; readonly error: ErrorInfo }
	| { readonly type: "fatal-write-error"; readonly error: ErrorInfo }
	| { readonly type: "bind-error"; readonly error: ErrorInfo }
	| { readonly type: "server-started"; readonly address: string }
	| { readonly type: "server-stopped" };

export type LogKindType = LogKind["type"];

export interface LogEntry {
	readonly kind: LogKind;
	readonly timestamp: Date;
}

// =============================================================================
// Factories
// =============================================================================

export function createLogEntry(kind: LogKind, timestamp: Date = new Date()): LogEntry {
	return Object.freeze({ kind, timestamp });
}

export const logEntry = {
	connect: (address: string) => createLogEntry({ type: "connect", address }),
	disconnect: (address: string) => createLogEntry({ type: "disconnect", address }),
	receivedPacket: (packet: DataPacket) => createLogEntry({ type: "received-packet", packet }),
	sentPacket: (packet: DataPacket) => createLogEntry({ type: "sent-packet", packet }),
	connectError: (error: unknown) => createLogEntry({ type: "connect-error", error: describeError(error) }),
	connectTimedOut: (address: string, timeout: number) =>
		createLogEntry({ type: "connect-timed-out", address, timeout }),
	fatalReadError: (error: unknown) => createLogEntry({ type: "fatal-read-error", error: describeError(error) }),
	fatalWriteError: (error: unknown) => createLogEntry({ type: "fatal-write-error", error: describeError(error) }),
	bindError: (error: unknown) => createLogEntry({ type: "bind-error", error: describeError(error) }),
	serverStarted: (address: string) => createLogEntry({ type: "server-started", address }),
	serverStopped: () => createLogEntry({ type: "server-stopped" }),
};

/**
 * Narrow a log entry list to one kind
 */
export function entriesOfType<T extends LogKindType>(
	entries: readonly LogEntry[],
	type: T,
): Extract<LogKind, { type: T }>[] {
	const result: Extract<LogKind, { type: T }>[] = [];
	for (const entry of entries) {
		if (isKind(entry.kind, type)) result.push(entry.kind);
	}
	return result;
}

function isKind<T extends LogKindType>(kind: LogKind, type: T): kind is Extract<LogKind, { type: T }> {
	return kind.type === type;
}
