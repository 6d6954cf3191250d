/**
 * Error Types
 *
 * Runtime network failures never surface as exceptions: they become log
 * entries. The classes below cover the cases that are reported to the
 * caller directly.
 */

/**
 * A caller broke an operation's precondition, e.g. starting a connection
 * that is not inactive. Signals a programming error, not a runtime condition.
 */
export class ContractViolationError extends Error {
	constructor(
		message: string,
		public readonly operation: string,
	) {
		super(message);
		this.name = "ContractViolationError";
	}
}

/**
 * Outbound payload could not be queued because no session is receiving
 */
export class SendError extends Error {
	constructor(message = "no active session is receiving") {
		super(message);
		this.name = "SendError";
	}
}

/**
 * Timeout error
 */
export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeout: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export class AddressParseError extends Error {
	constructor(
		message: string,
		public readonly address: string,
	) {
		super(message);
		this.name = "AddressParseError";
	}
}

export class HexParseError extends Error {
	constructor(
		message: string,
		public readonly input: string,
	) {
		super(message);
		this.name = "HexParseError";
	}
}

/**
 * Serializable snapshot of an error, as stored in log entries
 */
export interface ErrorInfo {
	name: string;
	message: string;
	code?: string;
}

/**
 * Capture name, message and errno code (when present) of a thrown value
 */
export function describeError(error: unknown): ErrorInfo {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return code === undefined
			? { name: error.name, message: error.message }
			: { name: error.name, message: error.message, code };
	}
	return { name: "Error", message: String(error) };
}
