/**
 * Connection Registry
 *
 * Address-keyed map guarded like a read/write lock. Access goes only through
 * short synchronous sections: any number of nested reads, or one write with
 * nothing else open. A section must not suspend, so an operation that
 * returns a promise is rejected by the type checker (via the `_guard` rest
 * parameter) and, failing that, at run time.
 */

import { ContractViolationError } from "rawtap";

/**
 * Resolves to an impossible extra argument when `T` is thenable
 */
export type SyncOnly<T> = [T] extends [never] ? [] : [T] extends [PromiseLike<unknown>] ? [never] : [];

export class ConnectionRegistry<C> {
	private entries = new Map<string, C>();
	private readers = 0;
	private writing = false;

	read<T>(op: (entries: ReadonlyMap<string, C>) => T, ..._guard: SyncOnly<T>): T {
		if (this.writing) {
			throw new ContractViolationError("registry read inside a write section", "read");
		}
		this.readers++;
		try {
			return assertSync(op(this.entries), "read");
		} finally {
			this.readers--;
		}
	}

	write<T>(op: (entries: Map<string, C>) => T, ..._guard: SyncOnly<T>): T {
		if (this.writing || this.readers > 0) {
			throw new ContractViolationError("registry write while another section is open", "write");
		}
		this.writing = true;
		try {
			return assertSync(op(this.entries), "write");
		} finally {
			this.writing = false;
		}
	}

	get size(): number {
		return this.read((entries) => entries.size);
	}

	keys(): string[] {
		return this.read((entries) => [...entries.keys()]);
	}

	values(): C[] {
		return this.read((entries) => [...entries.values()]);
	}
}

function assertSync<T>(result: T, operation: string): T {
	if (isThenable(result)) {
		throw new ContractViolationError("registry sections must not suspend", operation);
	}
	return result;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}
