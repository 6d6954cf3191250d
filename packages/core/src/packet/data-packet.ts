/**
 * An origin tag plus a byte payload.
 *
 * `origin` is the peer address the bytes came from; an empty origin marks a
 * packet sent from this side. The payload is copied on the way in and on the
 * way out, so a packet never changes after construction.
 */
export class DataPacket {
	readonly origin: string;
	private readonly bytes: Uint8Array;

	constructor(origin: string, payload: Uint8Array) {
		this.origin = origin;
		this.bytes = Uint8Array.from(payload);
		Object.freeze(this);
	}

	/** Packet for bytes sent from this side */
	static local(payload: Uint8Array): DataPacket {
		return new DataPacket("", payload);
	}

	get payload(): Uint8Array {
		return this.bytes.slice();
	}

	get length(): number {
		return this.bytes.length;
	}

	get isLocal(): boolean {
		return this.origin === "";
	}
}
