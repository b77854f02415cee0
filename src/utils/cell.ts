import { InvalidReferenceError } from "../errors.js";

/** Zero-based cell address */
export interface CellAddress {
	row: number;
	col: number;
}

/** Range between two zero-based cell addresses (inclusive) */
export interface CellRange {
	start: CellAddress;
	end: CellAddress;
}

const CELL_REFERENCE = /^\$?([A-Za-z]{1,3})\$?(\d+)$/;

/**
 * Decode a row string (1-based) to a zero-based row index.
 * @param rowstr - Row string, possibly with a "$" absolute marker (e.g. "5" or "$5")
 */
export function decodeRow(rowstr: string): number {
	return parseInt(rowstr.replace(/^\$/, ""), 10) - 1;
}

/** Encode a zero-based row index to a 1-based row string */
export function encodeRow(row: number): string {
	return "" + (row + 1);
}

/**
 * Decode a column label (e.g. "A", "AA") to a zero-based column index.
 *
 * Treats column letters as a base-26 number where A=1, B=2, ..., Z=26.
 */
export function decodeCol(colstr: string): number {
	const c = colstr.replace(/^\$/, "").toUpperCase();
	let d = 0;
	for (let i = 0; i < c.length; ++i) {
		// 'A' is charCode 65; subtract 64 so A=1, B=2, ..., Z=26
		d = 26 * d + c.charCodeAt(i) - 64;
	}
	return d - 1;
}

/**
 * Encode a zero-based column index to a column label (A, B, ..., Z, AA, AB, ...).
 *
 * Uses bijective base-26 numeration: col 0 = "A", col 25 = "Z", col 26 = "AA".
 *
 * @throws Error if col is negative
 */
export function encodeCol(col: number): string {
	if (col < 0) {
		throw new Error("invalid column " + col);
	}
	let result = "";
	for (++col; col; col = Math.floor((col - 1) / 26)) {
		result = String.fromCharCode(((col - 1) % 26) + 65) + result;
	}
	return result;
}

/**
 * Decode an A1-style cell reference ("B3", "$B$3") to a zero-based address.
 *
 * @throws InvalidReferenceError if the reference is not a single cell in A1 notation
 */
export function decodeCell(ref: string): CellAddress {
	const match = CELL_REFERENCE.exec(ref.trim());
	if (!match) {
		throw new InvalidReferenceError(ref);
	}
	const [, letters = "", digits = ""] = match;
	const row = decodeRow(digits);
	if (row < 0) {
		throw new InvalidReferenceError(ref);
	}
	return { row, col: decodeCol(letters) };
}

/** Encode a zero-based address to an A1-style reference (e.g. "A1" for {row:0, col:0}) */
export function encodeCell(cell: CellAddress): string {
	return encodeCol(cell.col) + encodeRow(cell.row);
}

/**
 * Decode a range string ("A1:B2") to start and end addresses.
 *
 * A single cell reference yields a range whose start equals its end.
 * Corners are returned as written; they are not reordered.
 *
 * @throws InvalidReferenceError if either corner cannot be parsed
 */
export function decodeRange(range: string): CellRange {
	const idx = range.indexOf(":");
	if (idx === -1) {
		const cell = decodeCell(range);
		return { start: cell, end: { ...cell } };
	}
	return { start: decodeCell(range.slice(0, idx)), end: decodeCell(range.slice(idx + 1)) };
}

/** Encode a range to "A1:B2" notation, collapsing single-cell ranges to "A1" */
export function encodeRange(range: CellRange): string {
	const s = encodeCell(range.start);
	const e = encodeCell(range.end);
	return s === e ? s : s + ":" + e;
}

/**
 * Split a sheet-qualified reference ("Sheet1!$A$1:$B$10", "'My Sheet'!A1:B2")
 * into its sheet name and range part.
 *
 * Quoted sheet names are unquoted and doubled quotes ('') collapse to one.
 * Returns null when the reference carries no sheet name.
 */
export function splitSheetReference(ref: string): { sheetName: string; range: string } | null {
	const idx = ref.lastIndexOf("!");
	if (idx <= 0) {
		return null;
	}
	let sheetName = ref.slice(0, idx).replace(/^=/, "");
	if (sheetName.length >= 2 && sheetName.startsWith("'") && sheetName.endsWith("'")) {
		sheetName = sheetName.slice(1, -1).replace(/''/g, "'");
	}
	return { sheetName, range: ref.slice(idx + 1) };
}

/**
 * Quote a sheet name for use in a reference (e.g. "'Sheet 1'!A1").
 *
 * Wraps the name in single quotes if it contains characters outside
 * word characters, CJK unified ideographs, or Japanese Hiragana/Katakana.
 *
 * @throws Error if the sheet name is empty
 */
export function quoteSheetName(sname: string): string {
	if (!sname) {
		throw new Error("empty sheet name");
	}
	if (/[^\w\u4E00-\u9FFF\u3040-\u30FF]/.test(sname)) {
		return "'" + sname.replace(/'/g, "''") + "'";
	}
	return sname;
}
