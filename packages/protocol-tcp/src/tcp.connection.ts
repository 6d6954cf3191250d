/**
 * TCP Connection
 *
 * Owns one socket's lifecycle: connect (client mode) or adopt (accepted by a
 * server), the managed session, the send queue, shutdown and logging.
 *
 * The driver never awaits anything on a connection. It starts it, polls
 * `netState()` and `drainLogs()` on each tick, pushes bytes with `sendData()`
 * and calls `shutdown()`.
 *
 * @example
 * ```typescript
 * const connection = new TcpConnection();
 * connection.startClient("127.0.0.1:9000");
 *
 * // on each tick
 * if (connection.netState() === NetState.Active) {
 *   connection.sendData(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
 * }
 * for (const entry of connection.drainLogs()) render(entry);
 * ```
 */

import type net from "node:net";
import {
	Broadcast,
	type BroadcastReceiver,
	ContractViolationError,
	DataPacket,
	LogBuffer,
	type LogEntry,
	type LogSink,
	type Logger,
	NetState,
	NetStateCell,
	type NetStateListener,
	ShutdownSignal,
	TimeoutError,
	logEntry,
} from "rawtap";
import { localAddress } from "./address";
import { resolveConnectionConfig } from "./config";
import { dial } from "./tcp.dial";
import { SocketReader } from "./tcp.reader";
import { runManagedSession } from "./tcp.session";
import type { AdoptOptions, ConnectionConfig, ConnectionOptions, StartClientOptions } from "./types";

export class TcpConnection {
	private readonly config: ConnectionConfig;
	private readonly logger: Logger;
	private readonly state: NetStateCell;
	private readonly logs: LogBuffer;
	private readonly shutdownSignal = new ShutdownSignal();
	private readonly outbound: Broadcast<DataPacket>;

	private _address?: string;
	private _localAddress?: string;
	private sessionStarted = false;
	private task?: Promise<void>;

	constructor(options: ConnectionOptions = {}) {
		this.config = resolveConnectionConfig(options);
		this.logger = this.config.logger;
		this.state = new NetStateCell(NetState.Inactive, this.logger);
		this.logs = new LogBuffer(this.config.logCapacity);
		this.outbound = new Broadcast(this.config.sendCapacity);
	}

	/** Peer address, assigned at start */
	get address(): string | undefined {
		return this._address;
	}

	/** This side's address once the session is up */
	get localAddress(): string | undefined {
		return this._localAddress;
	}

	netState(): NetState {
		return this.state.load();
	}

	onStateChange(listener: NetStateListener): () => void {
		return this.state.onChange(listener);
	}

	/**
	 * Connect to `address` in the background.
	 *
	 * Moves to Establishing before returning. The outcome shows up as state
	 * and log entries: Connect, ConnectError or ConnectTimedOut.
	 *
	 * @throws ContractViolationError if the connection is not Inactive, or
	 * already ran a session
	 */
	startClient(address: string, options: StartClientOptions = {}): void {
		this.assertStartable("startClient");
		const timeout = options.connectTimeout ?? this.config.connectTimeout;

		this._address = address;
		this.state.store(NetState.Establishing);
		this.task = this.runClient(address, timeout).catch((err) => this.crashed(err));
	}

	/**
	 * Take over a socket that is already connected (accepted by a server)
	 *
	 * @throws ContractViolationError if the connection is not Inactive, or
	 * already ran a session
	 */
	adopt(socket: net.Socket, address: string, options: AdoptOptions = {}): void {
		this.assertStartable("adopt");

		this._address = address;
		this._localAddress = localAddress(socket);
		this.sessionStarted = true;
		const reader = new SocketReader(socket, this.config.readChunkSize, this.config.readTimeout);
		const outbound = this.outbound.subscribe();
		this.state.store(NetState.Active);
		this.task = this.runSession(socket, reader, address, outbound, options).catch((err) => this.crashed(err));
	}

	/**
	 * Queue bytes for the writer. The SentPacket entry is appended straight
	 * to the history.
	 *
	 * @throws SendError when no session is receiving, including while the
	 * connection is still establishing
	 */
	sendData(payload: Uint8Array): void {
		const packet = DataPacket.local(payload);
		this.outbound.send(packet);
		this.logs.push(logEntry.sentPacket(packet));
	}

	/**
	 * Ask the session to stop. Returns immediately; completion shows as
	 * Inactive plus a Disconnect entry. Repeated calls coalesce.
	 */
	shutdown(): void {
		this.shutdownSignal.fire();
	}

	/**
	 * Full log history, including entries produced since the last call
	 */
	drainLogs(): readonly LogEntry[] {
		return this.logs.update();
	}

	/**
	 * Resolves when the background task (if any) has finished
	 */
	settled(): Promise<void> {
		return this.task ?? Promise.resolve();
	}

	private assertStartable(operation: string): void {
		if (this.state.load() !== NetState.Inactive) {
			throw new ContractViolationError(
				`cannot ${operation} while the connection is ${this.state.load()}`,
				operation,
			);
		}
		if (this.sessionStarted) {
			throw new ContractViolationError(`cannot ${operation}: a connection is not reusable after its session ended`, operation);
		}
	}

	private async runClient(address: string, timeout: number): Promise<void> {
		let socket: net.Socket;
		try {
			socket = await dial(address, timeout, this.config.createSocket);
		} catch (err) {
			if (err instanceof TimeoutError) {
				this.logger.info(`Connecting to ${address} timed out after ${timeout}ms`);
				await this.logs.bus.send(logEntry.connectTimedOut(address, timeout));
			} else {
				this.logger.info(`Failed to establish connection to ${address}`);
				await this.logs.bus.send(logEntry.connectError(err));
			}
			// a shutdown requested while establishing must not stop the next attempt
			this.shutdownSignal.reset();
			this.state.store(NetState.Inactive);
			return;
		}

		this._localAddress = localAddress(socket);
		this.sessionStarted = true;
		const reader = new SocketReader(socket, this.config.readChunkSize, this.config.readTimeout);
		const outbound = this.outbound.subscribe();
		this.state.store(NetState.Active);
		await this.runSession(socket, reader, address, outbound, {});
	}

	private async runSession(
		socket: net.Socket,
		reader: SocketReader,
		address: string,
		outbound: BroadcastReceiver<DataPacket>,
		options: AdoptOptions,
	): Promise<void> {
		await this.logs.bus.send(logEntry.connect(address));
		this.logger.info(`Connected to ${address}`);

		await runManagedSession({
			socket,
			reader,
			address,
			outbound,
			shutdown: this.shutdownSignal,
			externalShutdown: options.externalShutdown,
			sink: this.logs.bus,
			logger: this.logger,
			readTimeout: this.config.readTimeout,
		});

		this.shutdownSignal.reset();
		this.state.store(NetState.Inactive);
		await this.logDisconnect(address, options.parentSink);
		this.logger.info(`Disconnected from ${address}`);
	}

	private async logDisconnect(address: string, parentSink?: LogSink): Promise<void> {
		const entry = logEntry.disconnect(address);
		await this.logs.bus.send(entry);
		if (parentSink) await parentSink.send(entry);
	}

	/**
	 * Last resort for a bug in the background task: keep the state machine
	 * consistent and report it
	 */
	private crashed(err: unknown): void {
		this.logger.error(`Connection task for ${this._address ?? "<unassigned>"} failed`, err);
		this.state.store(NetState.Inactive);
	}
}
