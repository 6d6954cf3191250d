/**
 * Socket Reader
 *
 * Pull-style reads over a paused socket: each `read()` yields at most
 * `chunkSize` bytes, end-of-stream, an error, or "interrupted" once
 * `interrupt()` is called. A read never outlives an interrupt, so a silent
 * peer cannot hold a session open after shutdown.
 */

import type net from "node:net";

export type ReadResult =
	| { type: "data"; bytes: Uint8Array }
	| { type: "eof" }
	| { type: "error"; error: Error }
	| { type: "timeout" }
	| { type: "interrupted" };

const TRANSIENT_ERROR_CODES = new Set(["EINTR", "EAGAIN", "EWOULDBLOCK"]);

/**
 * Errors worth retrying the read for
 */
export function isTransientError(error: Error): boolean {
	return "code" in error && typeof error.code === "string" && TRANSIENT_ERROR_CODES.has(error.code);
}

export class SocketReader {
	private buffered?: Buffer;
	private ended = false;
	private failures: Error[] = [];
	private interrupted = false;
	private wake?: () => void;

	private readonly onActivity = () => {
		this.wake?.();
	};
	private readonly onEnd = () => {
		this.ended = true;
		this.wake?.();
	};
	private readonly onError = (err: Error) => {
		this.failures.push(err);
		this.wake?.();
	};

	constructor(
		private readonly socket: net.Socket,
		private readonly chunkSize: number,
		private readonly timeout = 0,
	) {
		this.ended = socket.readableEnded || socket.destroyed;
		socket.on("readable", this.onActivity);
		socket.on("end", this.onEnd);
		socket.on("close", this.onEnd);
		socket.on("error", this.onError);
	}

	async read(): Promise<ReadResult> {
		for (;;) {
			if (this.interrupted) return { type: "interrupted" };

			const failure = this.failures.shift();
			if (failure) return { type: "error", error: failure };

			if (this.buffered) return { type: "data", bytes: this.takeChunk(this.buffered) };

			const chunk: unknown = this.socket.read();
			if (Buffer.isBuffer(chunk) && chunk.length > 0) {
				this.buffered = chunk;
				continue;
			}

			if (this.ended) return { type: "eof" };

			if (!(await this.waitForActivity())) return { type: "timeout" };
		}
	}

	/**
	 * Make the pending and all later reads resolve as interrupted
	 */
	interrupt(): void {
		this.interrupted = true;
		this.wake?.();
	}

	/**
	 * Remove socket listeners. Call after the socket is destroyed.
	 */
	detach(): void {
		this.socket.off("readable", this.onActivity);
		this.socket.off("end", this.onEnd);
		this.socket.off("close", this.onEnd);
		this.socket.off("error", this.onError);
	}

	private takeChunk(buffer: Buffer): Uint8Array {
		if (buffer.length <= this.chunkSize) {
			this.buffered = undefined;
			return buffer;
		}
		this.buffered = buffer.subarray(this.chunkSize);
		return buffer.subarray(0, this.chunkSize);
	}

	private waitForActivity(): Promise<boolean> {
		return new Promise((resolve) => {
			const timer =
				this.timeout > 0
					? setTimeout(() => {
							this.wake = undefined;
							resolve(false);
						}, this.timeout)
					: undefined;
			this.wake = () => {
				clearTimeout(timer);
				this.wake = undefined;
				resolve(true);
			};
		});
	}
}
