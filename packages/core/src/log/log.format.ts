/**
 * Log Formatting
 *
 * One-line, human-readable rendering of log entries.
 */

import { formatHex } from "../hex";
import type { LogEntry, LogKind } from "./log.types";

export function describeLogKind(kind: LogKind): string {
	switch (kind.type) {
		case "connect":
			return `Connected: ${kind.address}`;
		case "disconnect":
			return `Disconnected: ${kind.address}`;
		case "received-packet":
			return `Received from ${kind.packet.origin} (${kind.packet.length} bytes): ${formatHex(kind.packet.payload)}`;
		case "sent-packet":
			return `Sent (${kind.packet.length} bytes): ${formatHex(kind.packet.payload)}`;
		case "connect-error":
			return `Connect error: ${kind.error.message}`;
		case "connect-timed-out":
			return `Connect to ${kind.address} timed out after ${kind.timeout}ms`;
		case "fatal-read-error":
			return `Read error: ${kind.error.message}`;
		case "fatal-write-error":
			return `Write error: ${kind.error.message}`;
		case "bind-error":
			return `Bind error: ${kind.error.message}`;
		case "server-started":
			return `Server listening on ${kind.address}`;
		case "server-stopped":
			return "Server stopped";
	}
}

/**
 * "[HH:MM:SS.mmm] description", local time
 */
export function formatLogEntry(entry: LogEntry): string {
	const t = entry.timestamp;
	const pad = (value: number, width = 2) => String(value).padStart(width, "0");
	const time = `${pad(t.getHours())}:${pad(t.getMinutes())}:${pad(t.getSeconds())}.${pad(t.getMilliseconds(), 3)}`;
	return `[${time}] ${describeLogKind(entry.kind)}`;
}
