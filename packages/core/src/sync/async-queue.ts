/**
 * Async Queue
 *
 * Single-consumer FIFO whose `shift()` waits for the next item. When a
 * capacity is given, pushing into a full queue drops the oldest item.
 */

import { ContractViolationError } from "../errors";

export class AsyncQueue<T> {
	readonly capacity: number;
	private items: T[] = [];
	private waiter?: (item: T | undefined) => void;
	private _closed = false;
	private dropped = 0;

	constructor(capacity: number = Number.POSITIVE_INFINITY) {
		this.capacity = capacity;
	}

	get closed(): boolean {
		return this._closed;
	}

	get size(): number {
		return this.items.length;
	}

	/**
	 * Returns false if the queue is closed and the item was not taken
	 */
	push(item: T): boolean {
		if (this._closed) return false;
		const waiter = this.waiter;
		if (waiter) {
			this.waiter = undefined;
			waiter(item);
			return true;
		}
		if (this.items.length >= this.capacity) {
			this.items.shift();
			this.dropped++;
		}
		this.items.push(item);
		return true;
	}

	/**
	 * Next item, or undefined once the queue is closed
	 */
	shift(): Promise<T | undefined> {
		if (this.items.length > 0) return Promise.resolve(this.items.shift());
		if (this._closed) return Promise.resolve(undefined);
		if (this.waiter) {
			return Promise.reject(new ContractViolationError("queue already has a pending consumer", "shift"));
		}
		return new Promise((resolve) => {
			this.waiter = resolve;
		});
	}

	/**
	 * Number of items dropped for capacity since the last call
	 */
	takeDropped(): number {
		const dropped = this.dropped;
		this.dropped = 0;
		return dropped;
	}

	/**
	 * Close the queue, release a pending consumer and return undelivered items
	 */
	close(): T[] {
		if (this._closed) return [];
		this._closed = true;
		const rest = this.items;
		this.items = [];
		const waiter = this.waiter;
		this.waiter = undefined;
		waiter?.(undefined);
		return rest;
	}
}
