/**
 * Configuration
 *
 * Defaults and resolution of connection and server options.
 */

import net from "node:net";
import { DEFAULT_CHANNEL_CAPACITY, getDefaultLogger } from "rawtap";
import type { ConnectionConfig, ConnectionOptions, ServerConfig, ServerOptions } from "./types";

export const DEFAULT_CONNECT_TIMEOUT = 8_000;
export const DEFAULT_READ_CHUNK_SIZE = 2048;
export const DEFAULT_BIND_HOST = "127.0.0.1";

export function resolveConnectionConfig(options: ConnectionOptions = {}): ConnectionConfig {
	const config: ConnectionConfig = {
		connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
		readChunkSize: options.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE,
		readTimeout: options.readTimeout ?? 0,
		logCapacity: options.logCapacity ?? DEFAULT_CHANNEL_CAPACITY,
		sendCapacity: options.sendCapacity ?? DEFAULT_CHANNEL_CAPACITY,
		logger: options.logger ?? getDefaultLogger(),
		createSocket: options.createSocket ?? ((target) => net.connect(target)),
	};
	assertPositiveInteger("connectTimeout", config.connectTimeout);
	assertPositiveInteger("readChunkSize", config.readChunkSize);
	assertPositiveInteger("logCapacity", config.logCapacity);
	assertPositiveInteger("sendCapacity", config.sendCapacity);
	if (!Number.isInteger(config.readTimeout) || config.readTimeout < 0) {
		throw new RangeError(`readTimeout must be a non-negative integer, got ${config.readTimeout}`);
	}
	return config;
}

export function resolveServerConfig(options: ServerOptions = {}): ServerConfig {
	const config: ServerConfig = {
		host: options.host ?? DEFAULT_BIND_HOST,
		logCapacity: options.logCapacity ?? DEFAULT_CHANNEL_CAPACITY,
		logger: options.logger ?? getDefaultLogger(),
		connection: options.connection ?? {},
	};
	assertPositiveInteger("logCapacity", config.logCapacity);
	return config;
}

export function assertPositiveInteger(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new RangeError(`${name} must be a positive integer, got ${value}`);
	}
}
