export class InsufficientDataError extends Error {
	constructor(
		readonly indicator: string,
		readonly required: number,
		readonly available: number,
	) {
		super(
			`Not enough candles to calculate ${indicator}: need ${required}, have ${available}`,
		);
		this.name = "InsufficientDataError";
	}
}

export class PersistenceError extends Error {
	constructor(
		readonly filePath: string,
		cause: unknown,
	) {
		super(`Failed to persist ${filePath}: ${String(cause)}`, { cause });
		this.name = "PersistenceError";
	}
}

export class LedgerError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "LedgerError";
	}
}
