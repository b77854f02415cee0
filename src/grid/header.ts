import type { Cell, CellGrid, TableBoundary } from "../types.js";
import { DEFAULT_CONFIG, type DetectionConfig } from "../config.js";
import { cellAt, cellText, isEmptyCell, isMergeOrigin } from "./cells.js";

/** Prefix of names generated for columns without a header */
export const PLACEHOLDER_PREFIX = "Column_";

/** Rows at the top of a boundary considered as header candidates */
const HEADER_CANDIDATE_ROWS = 6;

/** Upper bound on the height of a multi-row header band */
const MAX_HEADER_ROWS = 3;

/** Substrings commonly found in column titles */
const COMMON_HEADER_TOKENS = [
	"id",
	"name",
	"date",
	"time",
	"type",
	"status",
	"email",
	"phone",
	"address",
	"city",
	"state",
	"country",
	"zip",
	"code",
	"description",
	"price",
	"amount",
	"quantity",
	"total",
	"number",
	"count",
	"value",
	"first",
	"last",
	"created",
	"updated",
	"modified",
	"title",
	"category",
] as const;

// Score weights
const DENSITY_WEIGHT = 40;
const STRING_RATIO_WEIGHT = 30;
const MORE_TEXT_THAN_NEXT_BONUS = 20;
const PATTERN_BONUS = 2;
const MERGE_ORIGIN_BONUS = 5;

/** Header band of a table: first and last grid row, inclusive */
export interface HeaderBand {
	start: number;
	end: number;
}

/** Name generated for a column without a usable header (1-based) */
export function placeholderName(col: number): string {
	return PLACEHOLDER_PREFIX + (col + 1);
}

function isPlaceholder(header: string): boolean {
	return header === "" || header.startsWith(PLACEHOLDER_PREFIX);
}

/**
 * Hands out unique header names within one header row.
 *
 * Names compare case-insensitively; the n-th occurrence of a name becomes
 * `name_n`, skipping any suffix that is already taken.
 */
class HeaderNamer {
	private readonly occurrences = new Map<string, number>();
	private readonly taken = new Set<string>();

	next(text: string, col: number): string {
		const base = text.trim() || placeholderName(col);
		const key = base.toLowerCase();
		let n = (this.occurrences.get(key) ?? 0) + 1;
		let name = n === 1 ? base : `${base}_${n}`;
		while (this.taken.has(name.toLowerCase())) {
			n++;
			name = `${base}_${n}`;
		}
		this.occurrences.set(key, n);
		this.taken.add(name.toLowerCase());
		return name;
	}
}

/**
 * Finds the header row of a table and turns it into column names.
 *
 * Each candidate row is scored on how full it is, how textual it is, whether it
 * holds more text than the row below, how many cells look like typical column
 * titles, and how many merged regions start in it.
 */
export class HeaderDetector {
	constructor(private readonly config: DetectionConfig = DEFAULT_CONFIG) {}

	/**
	 * Pick the most header-like row among the first rows of a boundary.
	 *
	 * Ties keep the topmost row. Returns the boundary's start row when no row
	 * scores above zero or the boundary starts below the grid.
	 */
	detectHeaderRow(grid: CellGrid, boundary: TableBoundary): number {
		let bestRow = boundary.startRow;
		let bestScore = 0;
		if (boundary.startRow >= grid.length) {
			return bestRow;
		}
		const last = Math.min(boundary.startRow + HEADER_CANDIDATE_ROWS - 1, boundary.endRow);
		for (let row = boundary.startRow; row <= last; ++row) {
			const score = this.scoreAsHeader(grid, row, boundary);
			if (score > bestScore) {
				bestScore = score;
				bestRow = row;
			}
		}
		return bestRow;
	}

	/** Header likelihood of one row; 0 for rows outside the grid */
	scoreAsHeader(grid: CellGrid, row: number, boundary: TableBoundary): number {
		const cells = rowCells(grid, row, boundary);
		if (cells.length === 0) {
			return 0;
		}

		const nonEmpty = cells.filter((c) => !isEmptyCell(c));
		const strings = nonEmpty.filter((c) => c.value.type === "string").length;

		let score = (nonEmpty.length / cells.length) * DENSITY_WEIGHT;
		if (nonEmpty.length > 0) {
			score += (strings / nonEmpty.length) * STRING_RATIO_WEIGHT;
		}

		if (row + 1 <= boundary.endRow && row + 1 < grid.length) {
			const nextStrings = rowCells(grid, row + 1, boundary).filter((c) => c.value.type === "string").length;
			if (strings > nextStrings) {
				score += MORE_TEXT_THAN_NEXT_BONUS;
			}
		}

		for (const cell of nonEmpty) {
			const text = cellText(cell).trim().toLowerCase();
			if (COMMON_HEADER_TOKENS.some((token) => text.includes(token))) {
				score += PATTERN_BONUS;
			}
		}

		score += cells.filter((c) => c.isMerged && isMergeOrigin(c)).length * MERGE_ORIGIN_BONUS;
		return score;
	}

	/**
	 * Read column names from a header row.
	 *
	 * Names are trimmed, empty ones become `Column_<n>` (1-based grid column),
	 * and repeats get a `_<n>` suffix so every name is unique.
	 */
	extractHeaders(grid: CellGrid, headerRow: number, boundary: TableBoundary): string[] {
		const namer = new HeaderNamer();
		return rowCells(grid, headerRow, boundary).map((cell) => namer.next(cellText(cell), cell.col));
	}

	/**
	 * Check that headers look usable: at least `minColumns` of them, and at
	 * least half neither empty nor generated placeholders.
	 */
	validateHeaders(headers: readonly string[]): boolean {
		if (headers.length === 0 || headers.length < this.config.minColumns) {
			return false;
		}
		const meaningful = headers.filter((h) => !isPlaceholder(h)).length;
		return meaningful / headers.length >= 0.5;
	}

	/**
	 * Find a multi-row header band starting at the boundary's first row.
	 *
	 * The band grows to the lowest end row of any merged region anchored in the
	 * first row, is capped at three rows and never leaves the boundary.
	 */
	detectHeaderRows(grid: CellGrid, boundary: TableBoundary): HeaderBand {
		const start = boundary.startRow;
		let end = start;
		for (const cell of rowCells(grid, start, boundary)) {
			if (cell.mergeRange && cell.mergeRange.startRow === start && cell.mergeRange.endRow > end) {
				end = cell.mergeRange.endRow;
			}
		}
		end = Math.min(end, start + MAX_HEADER_ROWS - 1, boundary.endRow);
		return { start, end: Math.max(start, end) };
	}

	/**
	 * Extract one list of normalized names per row of a header band.
	 *
	 * A cell continuing a merged region that starts in the same row repeats the
	 * region's label instead of receiving a de-duplicated name.
	 */
	extractHierarchicalHeaders(grid: CellGrid, band: HeaderBand, boundary: TableBoundary): string[][] {
		const levels: string[][] = [];
		for (let row = band.start; row <= band.end; ++row) {
			const namer = new HeaderNamer();
			const names: string[] = [];
			const cells = rowCells(grid, row, boundary);
			cells.forEach((cell, i) => {
				const range = cell.mergeRange;
				const previous = names[i - 1];
				if (range && !range.isOrigin && range.startRow === row && range.startCol < cell.col && previous !== undefined) {
					names.push(previous);
					return;
				}
				names.push(namer.next(cellText(cell), cell.col));
			});
			levels.push(names);
		}
		return levels;
	}

	/**
	 * Combine header levels into one name per column.
	 *
	 * Each column joins its non-placeholder labels from top to bottom with
	 * `separator`, dropping a label equal to the one just before it (a vertical
	 * merge carried into the next level). Columns without labels get `Column_<n>`.
	 */
	flattenHierarchicalHeaders(levels: readonly (readonly string[])[], separator = " > "): string[] {
		const width = Math.max(0, ...levels.map((l) => l.length));
		const result: string[] = [];
		for (let col = 0; col < width; ++col) {
			const parts: string[] = [];
			for (const level of levels) {
				const header = level[col];
				if (header === undefined || isPlaceholder(header)) {
					continue;
				}
				if (parts[parts.length - 1] !== header) {
					parts.push(header);
				}
			}
			result.push(parts.length > 0 ? parts.join(separator) : placeholderName(col));
		}
		return result;
	}
}

/** Cells of one grid row within the boundary's columns, stopping at the row's end */
function rowCells(grid: CellGrid, row: number, boundary: TableBoundary): Cell[] {
	const cells: Cell[] = [];
	for (let col = boundary.startCol; col <= boundary.endCol; ++col) {
		const cell = cellAt(grid, row, col);
		if (cell === undefined) {
			break;
		}
		cells.push(cell);
	}
	return cells;
}
