/**
 * Semantic type of a grid cell.
 * - "empty": no value
 * - "string": text
 * - "number": numeric value
 * - "boolean": TRUE/FALSE
 * - "date": date or date-time
 * - "formula": formula cell; the value holds the cached result as text
 */
export type CellType = "empty" | "string" | "number" | "boolean" | "date" | "formula";

/** Parsed cell value, keyed by its cell type */
export type CellValue =
	| { type: "empty" }
	| { type: "string"; value: string }
	| { type: "number"; value: number }
	| { type: "boolean"; value: boolean }
	| { type: "date"; value: Date }
	| { type: "formula"; value: string };

/** Merged region a cell belongs to (zero-based, inclusive) */
export interface MergeRange {
	startRow: number;
	startCol: number;
	endRow: number;
	endCol: number;
	/** True only for the top-left cell of the region */
	isOrigin: boolean;
}

/** A single cell of a sheet grid */
export interface Cell {
	/** Parsed value */
	readonly value: CellValue;
	/** Text as displayed by the spreadsheet */
	readonly rawText: string;
	/** Zero-based row index in the grid */
	readonly row: number;
	/** Zero-based column index in the grid */
	readonly col: number;
	/** True if the cell is part of a merged region */
	readonly isMerged: boolean;
	/** Merged region this cell belongs to, or null */
	readonly mergeRange: MergeRange | null;
	/** Formula text without the leading "=", or null */
	readonly formula: string | null;
	/** Comment/note text, or null */
	readonly comment: string | null;
	/** Hyperlink target, or null */
	readonly hyperlink: string | null;
}

/** Row-major cell grid of one sheet. Rows may differ in length. */
export type CellGrid = Cell[][];

/** Rectangular region of a grid believed to hold one table (zero-based, inclusive) */
export interface TableBoundary {
	startRow: number;
	endRow: number;
	startCol: number;
	endCol: number;
}

/** A data row with cells mapped to headers */
export interface Row {
	/** Zero-based position among the table's data rows */
	index: number;
	/** Grid row the data came from */
	sourceRow: number;
	/** Cells keyed by header name */
	values: ReadonlyMap<string, Cell>;
	/** Cells in header order */
	cells: readonly Cell[];
}

/** A table detected within a sheet */
export interface Table {
	name: string;
	/** Unique, normalized column names */
	headers: readonly string[];
	rows: readonly Row[];
	/** Grid row holding the headers */
	headerRow: number;
	startRow: number;
	endRow: number;
	startCol: number;
	endCol: number;
}

/** A sheet and the tables found on it */
export interface Sheet {
	name: string;
	/** Zero-based position of the sheet in the workbook */
	index: number;
	tables: Table[];
}

/** Root of the document tree produced by one read */
export interface Workbook {
	filePath: string;
	sheets: Sheet[];
}

/** Scope of names defined at workbook level */
export const GLOBAL_SCOPE = "Workbook";

/** Defined name (named range) of a workbook */
export interface NamedRange {
	/** Name identifier (e.g. "SalesData") */
	name: string;
	/** Reference formula (e.g. "Sheet1!$A$1:$B$10") */
	refersTo: string;
	/** Sheet name, or {@link GLOBAL_SCOPE} for global names */
	scope: string;
}

/** Per-column statistics computed from a table's data rows */
export interface ColumnStats {
	name: string;
	/** Zero-based column position in the table */
	index: number;
	/** Dominant non-empty cell type */
	inferredType: CellType;
	totalCount: number;
	emptyCount: number;
	stringCount: number;
	numberCount: number;
	dateCount: number;
	booleanCount: number;
	formulaCount: number;
	uniqueCount: number;
	/** Up to five distinct raw values, in order of appearance */
	sampleValues: string[];
	/** Share of non-empty cells that have the inferred type (0 when the column is empty) */
	consistency: number;
	/** True when consistency reaches the configured column consistency threshold */
	isConsistent: boolean;
	/** Numeric summary, present only when the column holds numbers */
	numeric: { min: number; max: number; sum: number; avg: number } | null;
}

/** A change in one cell between two versions of a row */
export interface CellDiff {
	column: string;
	oldValue: string;
	newValue: string;
}

/** A row present in both tables whose values differ */
export interface RowDiff {
	keyValue: string;
	oldRow: Row;
	newRow: Row;
	changes: CellDiff[];
}

/** Differences between two tables matched on a key column */
export interface DiffResult {
	keyColumn: string;
	addedRows: Row[];
	removedRows: Row[];
	modifiedRows: RowDiff[];
}
