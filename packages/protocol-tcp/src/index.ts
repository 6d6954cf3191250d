/**
 * TCP for rawtap
 *
 * Raw-byte TCP client and server with polled state and logs. No framing:
 * payloads go out exactly as given and arrive as read from the socket.
 *
 * @example
 * ```typescript
 * import { NetState, formatLogEntry } from 'rawtap';
 * import { TcpServer, TcpConnection } from '@rawtap/protocol-tcp';
 *
 * const server = new TcpServer();
 * server.start(9000);
 *
 * const client = new TcpConnection();
 * client.startClient('127.0.0.1:9000');
 *
 * setInterval(() => {
 *   if (client.netState() === NetState.Active) {
 *     client.sendData(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
 *   }
 *   const { logs, priorLength } = server.drainLogs();
 *   for (const entry of logs.slice(priorLength)) console.log(formatLogEntry(entry));
 * }, 100);
 * ```
 */

export { TcpConnection } from "./tcp.connection";
export { TcpServer } from "./tcp.server";
export { ConnectionRegistry, type SyncOnly } from "./tcp.registry";
export { SocketReader, isTransientError, type ReadResult } from "./tcp.reader";
export { runManagedSession, type SessionContext } from "./tcp.session";
export { dial } from "./tcp.dial";
export * from "./address";
export * from "./config";

export type {
	AdoptOptions,
	ConnectionConfig,
	ConnectionOptions,
	ServerConfig,
	ServerLogs,
	ServerOptions,
	SocketFactory,
	StartClientOptions,
	StartServerOptions,
} from "./types";
