/**
 * Data Packet Tests
 */

import { describe, expect, it } from "vitest";
import { DataPacket } from "rawtap";

describe("DataPacket", () => {
	it("should keep origin and payload", () => {
		const packet = new DataPacket("127.0.0.1:9000", new Uint8Array([1, 2, 3]));

		expect(packet.origin).toBe("127.0.0.1:9000");
		expect(packet.payload).toEqual(new Uint8Array([1, 2, 3]));
		expect(packet.length).toBe(3);
		expect(packet.isLocal).toBe(false);
	});

	it("should mark locally sent packets with an empty origin", () => {
		const packet = DataPacket.local(new Uint8Array([0xff]));

		expect(packet.origin).toBe("");
		expect(packet.isLocal).toBe(true);
	});

	it("should not change when the source buffer changes", () => {
		const source = new Uint8Array([1, 2, 3]);
		const packet = new DataPacket("", source);

		source[0] = 9;

		expect(packet.payload).toEqual(new Uint8Array([1, 2, 3]));
	});

	it("should hand out copies of the payload", () => {
		const packet = new DataPacket("", new Uint8Array([1, 2, 3]));

		const first = packet.payload;
		first[0] = 9;

		expect(packet.payload).toEqual(new Uint8Array([1, 2, 3]));
	});

	it("should be frozen", () => {
		const packet = new DataPacket("a:1", new Uint8Array([1]));
		expect(Object.isFrozen(packet)).toBe(true);
	});
});
