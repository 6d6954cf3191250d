/**
 * Managed Session
 *
 * The paired reader/writer loops over one established socket. Both loops
 * run until the connection's shutdown signal is raised; either loop raises
 * it when it can no longer continue (peer closed, fatal I/O error). An
 * external signal, when present, is only observed: seeing it set raises the
 * local signal, so teardown always goes through the same path.
 */

import type net from "node:net";
import {
	type BroadcastReceiver,
	type LogSink,
	type Logger,
	type ShutdownListener,
	type ShutdownSignal,
	DataPacket,
	TimeoutError,
	logEntry,
} from "rawtap";
import { isTransientError, type SocketReader } from "./tcp.reader";

export interface SessionContext {
	socket: net.Socket;
	reader: SocketReader;
	/** Peer address, used as the origin of received packets */
	address: string;
	outbound: BroadcastReceiver<DataPacket>;
	shutdown: ShutdownSignal;
	externalShutdown?: ShutdownListener;
	sink: LogSink;
	logger: Logger;
	readTimeout: number;
}

/**
 * Run both loops to completion, then close the socket
 */
export async function runManagedSession(ctx: SessionContext): Promise<void> {
	const local = ctx.shutdown.subscribe();
	const stopWatch = local.whenSet().then((fired) => {
		if (!fired) return;
		ctx.reader.interrupt();
		ctx.outbound.close();
		// settles a write stuck behind a peer that stopped reading
		ctx.socket.destroy();
	});
	const cascade = ctx.externalShutdown?.whenSet().then((fired) => {
		if (!fired) return;
		ctx.logger.debug(`Parent shutdown observed by ${ctx.address}`);
		ctx.shutdown.fire();
	});

	await Promise.all([readLoop(ctx), writeLoop(ctx)]);

	local.close();
	ctx.externalShutdown?.close();
	await Promise.all([stopWatch, cascade]);

	ctx.socket.destroy();
	ctx.reader.detach();
}

async function readLoop(ctx: SessionContext): Promise<void> {
	for (;;) {
		const result = await ctx.reader.read();
		switch (result.type) {
			case "data":
				await ctx.sink.send(logEntry.receivedPacket(new DataPacket(ctx.address, result.bytes)));
				break;
			case "eof":
				ctx.logger.debug(`Peer ${ctx.address} closed the connection`);
				ctx.shutdown.fire();
				return;
			case "interrupted":
				return;
			case "timeout":
				await fail(ctx, new TimeoutError(`no data from ${ctx.address} for ${ctx.readTimeout}ms`, ctx.readTimeout));
				return;
			case "error":
				if (isTransientError(result.error)) {
					ctx.logger.debug(`Retrying read from ${ctx.address} after ${result.error.message}`);
					break;
				}
				await fail(ctx, result.error);
				return;
		}
	}
}

async function fail(ctx: SessionContext, error: Error): Promise<void> {
	// the session is already ending; the socket error is a consequence of that
	if (ctx.shutdown.isSet) return;
	ctx.shutdown.fire();
	ctx.logger.warn(`Read from ${ctx.address} failed: ${error.message}`);
	await ctx.sink.send(logEntry.fatalReadError(error));
}

async function writeLoop(ctx: SessionContext): Promise<void> {
	for (;;) {
		const packet = await ctx.outbound.recv();
		if (packet === undefined) return;

		const lagged = ctx.outbound.takeLagged();
		if (lagged > 0) {
			ctx.logger.warn(`Send queue for ${ctx.address} overflowed, ${lagged} payload(s) dropped`);
		}

		try {
			await writeAll(ctx.socket, packet.payload);
		} catch (err) {
			if (ctx.shutdown.isSet) return;
			ctx.shutdown.fire();
			const error = err instanceof Error ? err : new Error(String(err));
			ctx.logger.warn(`Write to ${ctx.address} failed: ${error.message}`);
			await ctx.sink.send(logEntry.fatalWriteError(error));
			return;
		}
	}
}

/**
 * Write the whole payload and wait until it is flushed to the kernel
 */
function writeAll(socket: net.Socket, payload: Uint8Array): Promise<void> {
	return new Promise((resolve, reject) => {
		if (socket.destroyed) return reject(new Error("socket not connected"));
		const onClose = () => reject(new Error("socket closed before the write completed"));
		socket.once("close", onClose);
		socket.write(payload, (err?: Error | null) => {
			socket.off("close", onClose);
			if (err) return reject(err);
			resolve();
		});
	});
}
