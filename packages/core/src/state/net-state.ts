/**
 * Net State
 *
 * Tri-state connectivity flag shared between an owner handle and the
 * background task that drives its socket. Only the task moves it forward;
 * the owner reads it to gate operations and for display.
 */

import { type Logger, silentLogger } from "../logger";

export const NetState = {
	Inactive: "inactive",
	Establishing: "establishing",
	Active: "active",
} as const;

export type NetState = (typeof NetState)[keyof typeof NetState];

export type NetStateListener = (state: NetState, previous: NetState) => void;

export class NetStateCell {
	private value: NetState;
	private listeners = new Set<NetStateListener>();

	constructor(
		initial: NetState = NetState.Inactive,
		private readonly logger: Logger = silentLogger,
	) {
		this.value = initial;
	}

	load(): NetState {
		return this.value;
	}

	store(state: NetState): void {
		const previous = this.value;
		if (previous === state) return;
		this.value = state;
		for (const listener of this.listeners) {
			try {
				listener(state, previous);
			} catch (err) {
				// a listener must not break the task that moved the state
				this.logger.error(`State listener failed on ${previous} -> ${state}`, err);
			}
		}
	}

	/**
	 * Observe transitions. Returns an unsubscribe function.
	 */
	onChange(listener: NetStateListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}
