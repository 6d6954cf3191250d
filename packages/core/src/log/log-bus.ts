/**
 * Log Bus
 *
 * Bounded multi-producer queue between background network tasks and the
 * single consumer that polls it. Producers waiting on a full bus resume as
 * the consumer drains.
 */

import { DEFAULT_CHANNEL_CAPACITY } from "../constants";
import type { LogEntry } from "./log.types";

/**
 * Anything a task can hand a log entry to
 */
export interface LogSink {
	send(entry: LogEntry): Promise<void>;
}

export class LogBus implements LogSink {
	readonly capacity: number;
	private queue: LogEntry[] = [];
	private blockedSenders: (() => void)[] = [];

	constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`log bus capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	get size(): number {
		return this.queue.length;
	}

	/**
	 * Enqueue without waiting. Returns false when the bus is full.
	 */
	trySend(entry: LogEntry): boolean {
		if (this.queue.length >= this.capacity) return false;
		this.queue.push(entry);
		return true;
	}

	async send(entry: LogEntry): Promise<void> {
		while (this.queue.length >= this.capacity) {
			await new Promise<void>((resolve) => this.blockedSenders.push(resolve));
		}
		this.queue.push(entry);
	}

	tryReceive(): LogEntry | undefined {
		const entry = this.queue.shift();
		if (entry) this.release(1);
		return entry;
	}

	/**
	 * Take everything queued so far, oldest first
	 */
	drain(): LogEntry[] {
		const entries = this.queue;
		this.queue = [];
		this.release(entries.length);
		return entries;
	}

	private release(slots: number): void {
		const woken = this.blockedSenders.splice(0, slots);
		for (const wake of woken) wake();
	}
}

/**
 * Privately owned log: a bus fed by background tasks plus the accumulated,
 * append-only history the owner reads.
 */
export class LogBuffer {
	readonly bus: LogBus;
	private entries: LogEntry[] = [];

	constructor(capacity?: number) {
		this.bus = new LogBus(capacity);
	}

	get length(): number {
		return this.entries.length;
	}

	/**
	 * Append directly, bypassing the bus
	 */
	push(entry: LogEntry): void {
		this.entries.push(entry);
	}

	/**
	 * Move pending bus entries into the history and return a snapshot of it
	 */
	update(): readonly LogEntry[] {
		for (const entry of this.bus.drain()) {
			this.entries.push(entry);
		}
		return this.entries.slice();
	}
}
