/**
 * Log Bus Tests
 */

import { describe, expect, it } from "vitest";
import { LogBuffer, LogBus, logEntry } from "rawtap";

describe("LogBus", () => {
	it("should deliver entries in arrival order", async () => {
		const bus = new LogBus();
		await bus.send(logEntry.connect("a:1"));
		await bus.send(logEntry.disconnect("a:1"));

		expect(bus.drain().map((entry) => entry.kind.type)).toEqual(["connect", "disconnect"]);
		expect(bus.size).toBe(0);
	});

	it("should refuse trySend when full", () => {
		const bus = new LogBus(2);

		expect(bus.trySend(logEntry.serverStopped())).toBe(true);
		expect(bus.trySend(logEntry.serverStopped())).toBe(true);
		expect(bus.trySend(logEntry.serverStopped())).toBe(false);
		expect(bus.size).toBe(2);
	});

	it("should hold a sender back until the consumer makes room", async () => {
		const bus = new LogBus(1);
		await bus.send(logEntry.connect("first:1"));

		let delivered = false;
		const pending = bus.send(logEntry.connect("second:2")).then(() => {
			delivered = true;
		});
		await Promise.resolve();
		expect(delivered).toBe(false);

		expect(bus.tryReceive()?.kind).toEqual({ type: "connect", address: "first:1" });
		await pending;

		expect(delivered).toBe(true);
		expect(bus.tryReceive()?.kind).toEqual({ type: "connect", address: "second:2" });
	});

	it("should return undefined from tryReceive when empty", () => {
		expect(new LogBus().tryReceive()).toBeUndefined();
	});

	it("should reject a non-positive capacity", () => {
		expect(() => new LogBus(0)).toThrow(RangeError);
	});
});

describe("LogBuffer", () => {
	it("should accumulate bus entries across updates", async () => {
		const buffer = new LogBuffer();
		await buffer.bus.send(logEntry.connect("a:1"));
		expect(buffer.update()).toHaveLength(1);

		await buffer.bus.send(logEntry.disconnect("a:1"));
		const logs = buffer.update();

		expect(logs.map((entry) => entry.kind.type)).toEqual(["connect", "disconnect"]);
		expect(buffer.length).toBe(2);
	});

	it("should append pushed entries without going through the bus", () => {
		const buffer = new LogBuffer(1);
		buffer.bus.trySend(logEntry.connect("a:1"));

		buffer.push(logEntry.serverStopped());

		expect(buffer.bus.size).toBe(1);
		expect(buffer.update().map((entry) => entry.kind.type)).toEqual(["server-stopped", "connect"]);
	});

	it("should return snapshots that later updates do not modify", async () => {
		const buffer = new LogBuffer();
		const before = buffer.update();

		await buffer.bus.send(logEntry.serverStopped());
		buffer.update();

		expect(before).toHaveLength(0);
	});
});
