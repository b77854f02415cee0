/** Base class of every error raised by this package */
export class SheetTablesError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SheetTablesError";
	}
}

/** Detection configuration failed validation */
export class ConfigError extends SheetTablesError {
	constructor(
		message: string,
		public readonly issues: string[],
	) {
		super(message);
		this.name = "ConfigError";
	}
}

/** An A1-style cell or range reference could not be parsed */
export class InvalidReferenceError extends SheetTablesError {
	constructor(public readonly reference: string) {
		super(`invalid cell reference '${reference}'`);
		this.name = "InvalidReferenceError";
	}
}

export class SheetNotFoundError extends SheetTablesError {
	constructor(public readonly sheetName: string) {
		super(`sheet '${sheetName}' not found`);
		this.name = "SheetNotFoundError";
	}
}

export class NamedRangeNotFoundError extends SheetTablesError {
	constructor(public readonly rangeName: string) {
		super(`named range '${rangeName}' not found`);
		this.name = "NamedRangeNotFoundError";
	}
}

/** A boundary has no cells left after being clamped to the grid */
export class InvalidBoundaryError extends SheetTablesError {
	constructor(message: string) {
		super(message);
		this.name = "InvalidBoundaryError";
	}
}

/** A column transform would give two columns the same name */
export class DuplicateColumnError extends SheetTablesError {
	constructor(public readonly column: string) {
		super(`column '${column}' would appear more than once`);
		this.name = "DuplicateColumnError";
	}
}

export type FileLoadReason = "not_found" | "empty" | "invalid_format" | "unreadable";

const FILE_LOAD_MESSAGES: Record<FileLoadReason, string> = {
	not_found: "file not found",
	empty: "file is empty",
	invalid_format: "invalid file format: only .xlsx files are supported",
	unreadable: "cannot open file",
};

export class FileLoadError extends SheetTablesError {
	constructor(
		public readonly filePath: string,
		public readonly reason: FileLoadReason,
		options?: { cause?: unknown },
	) {
		super(`${FILE_LOAD_MESSAGES[reason]}: ${filePath}`, options);
		this.name = "FileLoadError";
	}
}

/** Failure while reading or analyzing one sheet; the original error is the cause */
export class SheetProcessingError extends SheetTablesError {
	constructor(
		public readonly sheetName: string,
		public readonly sheetIndex: number,
		cause: unknown,
	) {
		super(`failed to process sheet '${sheetName}' (index ${sheetIndex}): ${describeError(cause)}`, { cause });
		this.name = "SheetProcessingError";
	}
}

function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
