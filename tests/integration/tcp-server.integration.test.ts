/**
 * TCP Server Integration Tests
 *
 * A TcpServer on an ephemeral port driven by TcpConnection clients.
 */

import { afterEach, describe, expect, it } from "vitest";
import { ContractViolationError, NetState, entriesOfType, formatHex, silentLogger } from "rawtap";
import { TcpConnection, TcpServer } from "@rawtap/protocol-tcp";
import { waitFor, waitForState } from "../helpers/test-helpers";

describe("TcpServer", () => {
	const servers: TcpServer[] = [];
	const clients: TcpConnection[] = [];

	const createServer = () => {
		const server = new TcpServer({ logger: silentLogger });
		servers.push(server);
		return server;
	};

	const startServer = async () => {
		const server = createServer();
		server.start(0);
		await waitForState(server, NetState.Active);
		const port = server.port;
		if (port === undefined) throw new Error("server has no port");
		return { server, port };
	};

	const connectClient = async (port: number) => {
		const client = new TcpConnection({ logger: silentLogger });
		clients.push(client);
		client.startClient(`127.0.0.1:${port}`);
		await waitForState(client, NetState.Active);
		const address = client.localAddress;
		if (address === undefined) throw new Error("client has no local address");
		return { client, address };
	};

	afterEach(async () => {
		for (const client of clients.splice(0)) {
			client.shutdown();
			await client.settled();
		}
		for (const server of servers.splice(0)) {
			server.shutdown();
			await server.settled();
		}
	});

	describe("start", () => {
		it("should bind, go active and log the listening address", async () => {
			const server = createServer();

			server.start(0);
			expect(server.netState()).toBe(NetState.Establishing);
			await waitForState(server, NetState.Active);

			expect(server.port).toBeGreaterThan(0);
			const { logs, priorLength } = server.drainLogs();
			expect(priorLength).toBe(0);
			expect(logs.map((entry) => entry.kind)).toEqual([
				{ type: "server-started", address: `127.0.0.1:${server.port}` },
			]);
		});

		it("should refuse to start while running", async () => {
			const { server } = await startServer();

			expect(() => server.start(0)).toThrow(ContractViolationError);
		});

		it("should refuse to start again after stopping", async () => {
			const { server } = await startServer();
			server.shutdown();
			await waitForState(server, NetState.Inactive);

			expect(() => server.start(0)).toThrow("cannot start: a server is not reusable after it stopped");
		});

		it("should log a bind error when the port is taken", async () => {
			const { port } = await startServer();
			const second = createServer();

			second.start(port);
			await waitForState(second, NetState.Inactive);

			const errors = entriesOfType(second.drainLogs().logs, "bind-error");
			expect(errors).toHaveLength(1);
			expect(errors[0].error.code).toBe("EADDRINUSE");
		});
	});

	describe("accepting", () => {
		it("should register each client under its address", async () => {
			const { server, port } = await startServer();

			const addresses: string[] = [];
			for (let i = 0; i < 3; i++) {
				const { address } = await connectClient(port);
				addresses.push(address);
			}
			await waitFor(() => server.connectionAddresses().length === 3);

			expect(server.connectionAddresses().sort()).toEqual(addresses.sort());
			const connects = entriesOfType(server.drainLogs().logs, "connect");
			expect(connects.map((kind) => kind.address).sort()).toEqual(addresses.sort());
		});

		it("should log bytes a client sends on the accepted connection", async () => {
			const { server, port } = await startServer();
			const { client, address } = await connectClient(port);
			await waitFor(() => server.connectionAddresses().includes(address));

			client.sendData(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));

			const received = () => entriesOfType(server.drainLogsFor(address) ?? [], "received-packet");
			await waitFor(() => received().length > 0);
			const [kind] = received();
			expect(kind.packet.origin).toBe(address);
			expect(formatHex(kind.packet.payload)).toBe("DE AD BE EF");
		});

		it("should send to a client through scoped access", async () => {
			const { server, port } = await startServer();
			const { client, address } = await connectClient(port);
			await waitFor(() => server.connectionAddresses().includes(address));

			server.withConnectionMut(address, (connection) => connection?.sendData(new Uint8Array([7, 8])));

			const received = () => entriesOfType(client.drainLogs(), "received-packet");
			await waitFor(() => received().length > 0);
			expect(received()[0].packet.payload).toEqual(new Uint8Array([7, 8]));
		});

		it("should give undefined for an unknown address", async () => {
			const { server } = await startServer();

			expect(server.withConnection("10.0.0.1:1", (connection) => connection)).toBeUndefined();
			expect(server.drainLogsFor("10.0.0.1:1")).toBeUndefined();
		});
	});

	describe("drainLogs", () => {
		it("should report the history length before each call", async () => {
			const { server, port } = await startServer();
			expect(server.drainLogs().logs).toHaveLength(1);

			const { address } = await connectClient(port);
			await waitFor(() => server.drainLogs().logs.length === 2);

			const { logs, priorLength } = server.drainLogs();
			expect(priorLength).toBe(2);
			expect(logs[1].kind).toEqual({ type: "connect", address });
		});
	});

	describe("removeConnection", () => {
		it("should keep running connections and drop finished ones", async () => {
			const { server, port } = await startServer();
			const { client, address } = await connectClient(port);
			await waitFor(() => server.connectionAddresses().includes(address));

			expect(server.removeConnection(address)).toBe(false);
			expect(server.removeConnection("10.0.0.1:1")).toBe(false);

			client.shutdown();
			await waitFor(() => server.withConnection(address, (connection) => connection?.netState()) === NetState.Inactive);

			expect(server.removeConnection(address)).toBe(true);
			expect(server.connectionAddresses()).toEqual([]);
		});
	});

	describe("shutdown", () => {
		it("should stop listening and wind down every connection", async () => {
			const { server, port } = await startServer();
			const connected = [await connectClient(port), await connectClient(port)];
			await waitFor(() => server.connectionAddresses().length === 2);

			server.shutdown();
			await waitForState(server, NetState.Inactive);
			await waitFor(() =>
				server.connectionAddresses().every(
					(address) => server.withConnection(address, (connection) => connection?.netState()) === NetState.Inactive,
				),
			);
			for (const { client } of connected) await waitForState(client, NetState.Inactive);

			const logs = server.drainLogs().logs;
			expect(entriesOfType(logs, "server-stopped")).toHaveLength(1);
			await waitFor(() => entriesOfType(server.drainLogs().logs, "disconnect").length === 2);
			const disconnects = entriesOfType(server.drainLogs().logs, "disconnect").map((kind) => kind.address);
			expect(disconnects.sort()).toEqual(connected.map(({ address }) => address).sort());
		});

		it("should coalesce repeated calls", async () => {
			const { server } = await startServer();

			server.shutdown();
			server.shutdown();
			await waitForState(server, NetState.Inactive);
			server.shutdown();

			expect(entriesOfType(server.drainLogs().logs, "server-stopped")).toHaveLength(1);
		});
	});
});
