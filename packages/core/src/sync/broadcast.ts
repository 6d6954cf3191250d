/**
 * Broadcast Channel
 *
 * Bounded multi-subscriber queue for outbound payloads. Every receiver gets
 * its own copy of the stream; a receiver that falls more than `capacity`
 * values behind loses the oldest ones and can read how many via `takeLagged`.
 */

import { DEFAULT_CHANNEL_CAPACITY } from "../constants";
import { SendError } from "../errors";
import { AsyncQueue } from "./async-queue";

export class Broadcast<T> {
	readonly capacity: number;
	private queues = new Set<AsyncQueue<T>>();

	constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`broadcast capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	get receiverCount(): number {
		return this.queues.size;
	}

	/**
	 * Publish to every receiver. Throws {@link SendError} when nobody is
	 * subscribed. Returns the number of receivers reached.
	 */
	send(value: T): number {
		if (this.queues.size === 0) throw new SendError();
		for (const queue of this.queues) {
			queue.push(value);
		}
		return this.queues.size;
	}

	subscribe(): BroadcastReceiver<T> {
		const queue = new AsyncQueue<T>(this.capacity);
		this.queues.add(queue);
		return new BroadcastReceiver(queue, () => {
			this.queues.delete(queue);
		});
	}
}

export class BroadcastReceiver<T> {
	constructor(
		private readonly queue: AsyncQueue<T>,
		private readonly detach: () => void,
	) {}

	get closed(): boolean {
		return this.queue.closed;
	}

	/**
	 * Next value, or undefined once the receiver is closed
	 */
	recv(): Promise<T | undefined> {
		return this.queue.shift();
	}

	takeLagged(): number {
		return this.queue.takeDropped();
	}

	/**
	 * Unsubscribe. Values not yet received are discarded.
	 */
	close(): void {
		if (this.queue.closed) return;
		this.detach();
		this.queue.close();
	}
}
