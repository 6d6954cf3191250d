/**
 * Timed client connect
 */

import type net from "node:net";
import { TimeoutError } from "rawtap";
import { parseAddress } from "./address";
import type { SocketFactory } from "./types";

/**
 * Open a socket to `address`, rejecting with {@link TimeoutError} if the
 * handshake does not finish within `timeout` ms. The socket is destroyed on
 * any failure.
 */
export function dial(address: string, timeout: number, createSocket: SocketFactory): Promise<net.Socket> {
	return new Promise((resolve, reject) => {
		const target = parseAddress(address);
		const socket = createSocket(target);

		const cleanup = () => {
			clearTimeout(timer);
			socket.off("connect", onConnect);
			socket.off("error", onError);
		};
		const onConnect = () => {
			cleanup();
			resolve(socket);
		};
		const onError = (err: Error) => {
			cleanup();
			socket.destroy();
			reject(err);
		};
		const timer = setTimeout(() => {
			cleanup();
			socket.destroy();
			reject(new TimeoutError(`connect to ${address} timed out after ${timeout}ms`, timeout));
		}, timeout);

		socket.once("connect", onConnect);
		socket.once("error", onError);
	});
}
