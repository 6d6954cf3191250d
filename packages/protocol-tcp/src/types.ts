/**
 * TCP Types
 *
 * Option and configuration types for connections and servers.
 */

import type net from "node:net";
import type { LogEntry, LogSink, Logger, ShutdownListener } from "rawtap";

// =============================================================================
// Connection
// =============================================================================

/**
 * Opens the client socket. Defaults to `net.connect`.
 */
export type SocketFactory = (target: { host: string; port: number }) => net.Socket;

export interface ConnectionOptions {
	connectTimeout?: number; // Client connect bound in ms
	readChunkSize?: number; // Max bytes per received packet
	readTimeout?: number; // End a session whose peer stays silent this long (0 = never)
	logCapacity?: number; // Log bus bound
	sendCapacity?: number; // Outbound queue bound
	logger?: Logger; // Diagnostic logger
	createSocket?: SocketFactory;
}

export type ConnectionConfig = Required<ConnectionOptions>;

export interface StartClientOptions {
	connectTimeout?: number;
}

export interface AdoptOptions {
	/** Second sink that also receives the Disconnect entry */
	parentSink?: LogSink;
	/** Observed only: once set, the connection raises its own shutdown */
	externalShutdown?: ShutdownListener;
}

// =============================================================================
// Server
// =============================================================================

export interface ServerOptions {
	host?: string; // Bind address
	logCapacity?: number;
	logger?: Logger;
	connection?: Omit<ConnectionOptions, "logger" | "createSocket">; // Options for accepted connections
}

export type ServerConfig = Required<Omit<ServerOptions, "connection">> & {
	connection: Omit<ConnectionOptions, "logger" | "createSocket">;
};

export interface StartServerOptions {
	host?: string;
}

export interface ServerLogs {
	logs: readonly LogEntry[];
	/** History length before this drain; `logs.slice(priorLength)` is what is new */
	priorLength: number;
}
