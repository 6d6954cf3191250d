/**
 * Address helpers
 *
 * Addresses are `host:port` strings, with IPv6 hosts in brackets:
 * `127.0.0.1:9000`, `localhost:80`, `[::1]:9000`.
 */

import net from "node:net";
import { AddressParseError } from "rawtap";

export interface HostPort {
	host: string;
	port: number;
}

export function parseAddress(address: string): HostPort {
	const trimmed = address.trim();
	const match = /^\[([^\]]+)\]:(\d+)$/.exec(trimmed) ?? /^([^:\s[\]]+):(\d+)$/.exec(trimmed);
	if (!match) {
		throw new AddressParseError(`invalid address: "${address}"`, address);
	}
	const [, host, portText] = match;
	const port = Number(portText);
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new AddressParseError(`port out of range in "${address}"`, address);
	}
	return { host, port };
}

export function formatAddress(host: string, port: number): string {
	return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Remote end of a socket, or undefined once it is gone
 */
export function peerAddress(socket: net.Socket): string | undefined {
	const { remoteAddress, remotePort } = socket;
	if (!remoteAddress || remotePort === undefined) return undefined;
	return formatAddress(remoteAddress, remotePort);
}

export function localAddress(socket: net.Socket): string | undefined {
	const { localAddress: host, localPort: port } = socket;
	if (!host || port === undefined) return undefined;
	return formatAddress(host, port);
}
