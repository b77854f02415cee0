import type { Cell, CellGrid, CellValue } from "../types.js";
import { formatDateText, isValidDate, parseDateText } from "../utils/date.js";

/** Formula cell input: formula text (without "=") and its cached result */
export interface FormulaInput {
	formula: string;
	result?: string | number | boolean | null;
}

/** Plain value accepted when building a grid by hand */
export type CellInput = string | number | boolean | Date | FormulaInput | null | undefined;

/** Optional per-cell annotations */
export interface CellExtras {
	comment?: string | null;
	hyperlink?: string | null;
}

export function emptyCell(row: number, col: number): Cell {
	return {
		value: { type: "empty" },
		rawText: "",
		row,
		col,
		isMerged: false,
		mergeRange: null,
		formula: null,
		comment: null,
		hyperlink: null,
	};
}

/** Text of a scalar as a spreadsheet would display it */
export function scalarText(v: string | number | boolean | Date | null | undefined): string {
	if (v == null) {
		return "";
	}
	if (typeof v === "boolean") {
		return v ? "TRUE" : "FALSE";
	}
	if (v instanceof Date) {
		return formatDateText(v);
	}
	return String(v);
}

/**
 * Parse display text into a cell value.
 *
 * Empty text is an empty cell and date-looking text is a date;
 * anything else stays a string.
 */
export function valueFromText(text: string): CellValue {
	if (text === "") {
		return { type: "empty" };
	}
	const date = parseDateText(text);
	if (date) {
		return { type: "date", value: date };
	}
	return { type: "string", value: text };
}

function valueFromInput(input: CellInput): { value: CellValue; rawText: string; formula: string | null } {
	if (input == null) {
		return { value: { type: "empty" }, rawText: "", formula: null };
	}
	if (typeof input === "string") {
		return { value: valueFromText(input), rawText: input, formula: null };
	}
	if (typeof input === "number") {
		return { value: { type: "number", value: input }, rawText: scalarText(input), formula: null };
	}
	if (typeof input === "boolean") {
		return { value: { type: "boolean", value: input }, rawText: scalarText(input), formula: null };
	}
	if (input instanceof Date) {
		if (!isValidDate(input)) {
			return { value: { type: "empty" }, rawText: "", formula: null };
		}
		return { value: { type: "date", value: input }, rawText: scalarText(input), formula: null };
	}
	const text = scalarText(input.result);
	return { value: { type: "formula", value: text }, rawText: text, formula: input.formula };
}

/** Create a cell at the given position from a plain value */
export function createCell(row: number, col: number, input: CellInput, extras: CellExtras = {}): Cell {
	const { value, rawText, formula } = valueFromInput(input);
	return {
		...emptyCell(row, col),
		value,
		rawText,
		formula,
		comment: extras.comment ?? null,
		hyperlink: extras.hyperlink ?? null,
	};
}

/**
 * Build a grid from rows of plain values.
 *
 * Rows keep their own lengths unless `rectangular` is set, in which case
 * every row is padded with empty cells to the longest row.
 */
export function buildGrid(rows: readonly (readonly CellInput[])[], options: { rectangular?: boolean } = {}): CellGrid {
	const width = options.rectangular ? Math.max(0, ...rows.map((r) => r.length)) : 0;
	return rows.map((values, r) => {
		const row = values.map((v, c) => createCell(r, c, v));
		for (let c = row.length; c < width; ++c) {
			row.push(emptyCell(r, c));
		}
		return row;
	});
}

/** True for cells with no value or no display text */
export function isEmptyCell(cell: Cell): boolean {
	return cell.value.type === "empty" || cell.rawText === "";
}

/**
 * Cell content as a string: string values as-is, other values as their
 * display text, and "" for empty cells.
 */
export function cellText(cell: Cell): string {
	switch (cell.value.type) {
		case "empty":
			return "";
		case "string":
			return cell.value.value;
		case "number":
		case "boolean":
		case "date":
		case "formula":
			return cell.rawText;
	}
}

export function isMergeOrigin(cell: Cell): boolean {
	return cell.mergeRange !== null && cell.mergeRange.isOrigin;
}

/** Bounds-checked cell access for possibly jagged grids */
export function cellAt(grid: CellGrid, row: number, col: number): Cell | undefined {
	if (row < 0 || row >= grid.length || col < 0) {
		return undefined;
	}
	const cells = grid[row];
	return cells !== undefined && col < cells.length ? cells[col] : undefined;
}

/** Length of the longest grid row */
export function gridWidth(grid: CellGrid): number {
	let width = 0;
	for (const row of grid) {
		if (row.length > width) {
			width = row.length;
		}
	}
	return width;
}

/** Copy the row arrays of a grid; the cells themselves are shared */
export function cloneGrid(grid: CellGrid): CellGrid {
	return grid.map((row) => row.slice());
}
