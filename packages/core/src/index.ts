/**
 * rawtap Core
 *
 * Primitives binding background network tasks to a synchronous, polling
 * driver: connectivity state, payload packets, the log bus, the shutdown
 * signal and the outbound broadcast queue.
 *
 * Sockets live in `@rawtap/protocol-tcp`.
 *
 * @example
 * ```typescript
 * import { LogBuffer, ShutdownSignal, logEntry, formatLogEntry } from 'rawtap';
 *
 * const logs = new LogBuffer();
 * const shutdown = new ShutdownSignal();
 * const listener = shutdown.subscribe();
 *
 * void listener.whenSet().then(() => logs.bus.send(logEntry.serverStopped()));
 * shutdown.fire();
 *
 * // later, on each tick:
 * for (const entry of logs.update()) console.log(formatLogEntry(entry));
 * ```
 */

export * from "./constants";
export * from "./errors";
export * from "./hex";
export * from "./logger";
export * from "./log/log.types";
export * from "./log/log-bus";
export * from "./log/log.format";
export * from "./packet/data-packet";
export * from "./state/net-state";
export * from "./sync/async-queue";
export * from "./sync/broadcast";
export * from "./sync/shutdown-signal";
