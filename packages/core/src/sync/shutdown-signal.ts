/**
 * Shutdown Signal
 *
 * Single-slot, level-triggered cancellation flag: a latest value plus change
 * notification. Firing is never consumed, so a listener that subscribes or
 * looks late still sees "stop". Any number of listeners may observe one
 * signal independently.
 */

export class ShutdownSignal {
	private value = false;
	private _version = 0;
	private waiters = new Set<() => void>();

	get isSet(): boolean {
		return this.value;
	}

	/** Bumped on every value change */
	get version(): number {
		return this._version;
	}

	/**
	 * Raise the flag. Repeated calls coalesce.
	 */
	fire(): void {
		this.set(true);
	}

	reset(): void {
		this.set(false);
	}

	subscribe(): ShutdownListener {
		return new ShutdownListener(this, (wake) => {
			this.waiters.add(wake);
			return () => this.waiters.delete(wake);
		});
	}

	private set(value: boolean): void {
		if (this.value === value) return;
		this.value = value;
		this._version++;
		const waiters = [...this.waiters];
		this.waiters.clear();
		for (const wake of waiters) wake();
	}
}

type WaitRegistration = (wake: () => void) => () => void;

/**
 * One observer of a {@link ShutdownSignal}. Closing a listener releases any
 * pending wait on it.
 */
export class ShutdownListener {
	private seenVersion: number;
	private closed = false;
	private pending = new Set<() => void>();

	constructor(
		private readonly signal: ShutdownSignal,
		private readonly register: WaitRegistration,
	) {
		this.seenVersion = signal.version;
	}

	get isSet(): boolean {
		return this.signal.isSet;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Whether the value changed since this listener last observed it
	 */
	hasChanged(): boolean {
		return this.signal.version !== this.seenVersion;
	}

	/**
	 * Resolve with true on the next value change (immediately if one is
	 * unseen), or false once the listener is closed.
	 */
	async changed(): Promise<boolean> {
		if (this.closed) return false;
		if (!this.hasChanged()) {
			await new Promise<void>((resolve) => {
				let unregister = (): void => {};
				const wake = () => {
					this.pending.delete(wake);
					unregister();
					resolve();
				};
				this.pending.add(wake);
				unregister = this.register(wake);
			});
			if (this.closed) return false;
		}
		this.seenVersion = this.signal.version;
		return true;
	}

	/**
	 * Resolve with true once the signal is set (immediately if it already
	 * is), or false once the listener is closed.
	 */
	async whenSet(): Promise<boolean> {
		while (!this.signal.isSet) {
			if (!(await this.changed())) return false;
		}
		return !this.closed;
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		const pending = [...this.pending];
		for (const wake of pending) wake();
	}
}
