/**
 * TCP Server
 *
 * Owns a listening socket, the accept loop, the address-keyed registry of
 * accepted connections and an aggregate log. Every accepted socket becomes a
 * {@link TcpConnection} that reports its Disconnect to the server's log too
 * and stops when the server does.
 *
 * Shutdown is cooperative: the server stops listening and goes Inactive
 * without waiting for its connections, which wind down on their own once
 * they observe the server's signal.
 */

import net from "node:net";
import {
	AsyncQueue,
	ContractViolationError,
	type LogEntry,
	LogBuffer,
	type Logger,
	NetState,
	NetStateCell,
	type NetStateListener,
	ShutdownSignal,
	logEntry,
} from "rawtap";
import { formatAddress, peerAddress } from "./address";
import { resolveServerConfig } from "./config";
import { TcpConnection } from "./tcp.connection";
import { ConnectionRegistry, type SyncOnly } from "./tcp.registry";
import type { ServerConfig, ServerLogs, ServerOptions, StartServerOptions } from "./types";

export class TcpServer {
	private readonly config: ServerConfig;
	private readonly logger: Logger;
	private readonly state: NetStateCell;
	private readonly logs: LogBuffer;
	private readonly shutdownSignal = new ShutdownSignal();
	private readonly registry = new ConnectionRegistry<TcpConnection>();

	private _port?: number;
	private wasActive = false;
	private task?: Promise<void>;

	constructor(options: ServerOptions = {}) {
		this.config = resolveServerConfig(options);
		this.logger = this.config.logger;
		this.state = new NetStateCell(NetState.Inactive, this.logger);
		this.logs = new LogBuffer(this.config.logCapacity);
	}

	/** Requested port until bound, then the bound port */
	get port(): number | undefined {
		return this._port;
	}

	netState(): NetState {
		return this.state.load();
	}

	onStateChange(listener: NetStateListener): () => void {
		return this.state.onChange(listener);
	}

	/**
	 * Bind and accept in the background. Moves to Establishing before
	 * returning; the outcome shows up as ServerStarted or BindError.
	 *
	 * @throws ContractViolationError if the server is not Inactive, or has
	 * already been running
	 */
	start(port: number, options: StartServerOptions = {}): void {
		if (this.state.load() !== NetState.Inactive) {
			throw new ContractViolationError(`cannot start while the server is ${this.state.load()}`, "start");
		}
		if (this.wasActive) {
			throw new ContractViolationError("cannot start: a server is not reusable after it stopped", "start");
		}
		const host = options.host ?? this.config.host;

		this._port = port;
		this.state.store(NetState.Establishing);
		this.task = this.run(host, port).catch((err) => {
			this.logger.error(`Server task on port ${port} failed`, err);
			this.state.store(NetState.Inactive);
		});
	}

	/**
	 * Stop accepting. Returns immediately; repeated calls coalesce.
	 */
	shutdown(): void {
		this.shutdownSignal.fire();
	}

	/**
	 * Server log history plus how long it was before this call
	 */
	drainLogs(): ServerLogs {
		const priorLength = this.logs.length;
		return { logs: this.logs.update(), priorLength };
	}

	/**
	 * Log history of one accepted connection
	 */
	drainLogsFor(address: string): readonly LogEntry[] | undefined {
		return this.withConnection(address, (connection) => connection?.drainLogs());
	}

	/**
	 * Scoped read access to one registered connection. `op` runs
	 * synchronously and must not return a promise.
	 */
	withConnection<T>(address: string, op: (connection: TcpConnection | undefined) => T, ...guard: SyncOnly<T>): T {
		return this.registry.read((entries) => op(entries.get(address)), ...guard);
	}

	/**
	 * Scoped exclusive access to one registered connection
	 */
	withConnectionMut<T>(address: string, op: (connection: TcpConnection | undefined) => T, ...guard: SyncOnly<T>): T {
		return this.registry.write((entries) => op(entries.get(address)), ...guard);
	}

	connectionAddresses(): string[] {
		return this.registry.keys();
	}

	/**
	 * Forget an Inactive connection. Returns false if it is unknown or still
	 * running.
	 */
	removeConnection(address: string): boolean {
		return this.registry.write((entries) => {
			const connection = entries.get(address);
			if (!connection || connection.netState() !== NetState.Inactive) return false;
			return entries.delete(address);
		});
	}

	/**
	 * Resolves when the accept loop has finished
	 */
	settled(): Promise<void> {
		return this.task ?? Promise.resolve();
	}

	private async run(host: string, port: number): Promise<void> {
		const accepted = new AsyncQueue<net.Socket>();
		const server = net.createServer((socket) => {
			socket.on("error", this.onPendingError);
			if (!accepted.push(socket)) socket.destroy();
		});

		try {
			await listen(server, host, port);
		} catch (err) {
			this.logger.info(`Failed to bind ${formatAddress(host, port)}`);
			await this.logs.bus.send(logEntry.bindError(err));
			this.shutdownSignal.reset();
			this.state.store(NetState.Inactive);
			return;
		}

		server.on("error", (err) => this.logger.error(`Listener on ${formatAddress(host, port)} failed`, err));
		const bound = server.address();
		if (bound && typeof bound === "object") this._port = bound.port;
		const address = formatAddress(host, this._port ?? port);

		this.wasActive = true;
		this.state.store(NetState.Active);
		await this.logs.bus.send(logEntry.serverStarted(address));
		this.logger.info(`Listening on ${address}`);

		const listener = this.shutdownSignal.subscribe();
		const stopWatch = listener.whenSet().then((fired) => {
			if (!fired) return;
			for (const socket of accepted.close()) socket.destroy();
		});

		for (;;) {
			const socket = await accepted.shift();
			if (!socket) break;
			await this.accept(socket);
		}

		listener.close();
		await stopWatch;
		server.close((err) => {
			if (err) this.logger.warn(`Closing listener on ${address} failed: ${err.message}`);
		});

		this.state.store(NetState.Inactive);
		await this.logs.bus.send(logEntry.serverStopped());
		this.logger.info(`Stopped listening on ${address}`);
	}

	private readonly onPendingError = (err: Error) => {
		this.logger.debug(`Accepted socket failed before its session started: ${err.message}`);
	};

	private async accept(socket: net.Socket): Promise<void> {
		socket.off("error", this.onPendingError);
		const address = peerAddress(socket);
		if (!address || socket.destroyed) {
			// peer went away before we got to it
			socket.destroy();
			return;
		}

		const connection = new TcpConnection({ ...this.config.connection, logger: this.logger });
		connection.adopt(socket, address, {
			parentSink: this.logs.bus,
			externalShutdown: this.shutdownSignal.subscribe(),
		});
		this.registry.write((entries) => {
			if (entries.has(address)) this.logger.warn(`Replacing registry entry for ${address}`);
			entries.set(address, connection);
		});
		await this.logs.bus.send(logEntry.connect(address));
	}
}

function listen(server: net.Server, host: string, port: number): Promise<void> {
	return new Promise((resolve, reject) => {
		const onError = (err: Error) => {
			server.off("listening", onListening);
			reject(err);
		};
		const onListening = () => {
			server.off("error", onError);
			resolve();
		};
		server.once("error", onError);
		server.once("listening", onListening);
		server.listen(port, host);
	});
}
