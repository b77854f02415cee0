import { GLOBAL_SCOPE, type NamedRange, type Table, type TableBoundary } from "../types.js";
import type { SpreadsheetSource } from "../source/types.js";
import { resolveConfig, type DetectionConfig, type DetectionConfigInput } from "../config.js";
import { InvalidBoundaryError, InvalidReferenceError, NamedRangeNotFoundError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { HeaderDetector } from "../grid/header.js";
import { MergeProcessor } from "../grid/merge.js";
import { RowParser } from "../grid/parser.js";
import { gridWidth } from "../grid/cells.js";
import { decodeRange, encodeCell, splitSheetReference } from "../utils/cell.js";
import { loadSheetGrid } from "./sheet.js";

/** Parsed form of a sheet-qualified range such as `'My Sheet'!$A$1:$C$10` */
export interface RangeReference {
	sheetName: string;
	/** Top-left cell in A1 notation, without `$` markers */
	startCell: string;
	/** Bottom-right cell in A1 notation, without `$` markers */
	endCell: string;
	boundary: TableBoundary;
}

/**
 * Parse a sheet-qualified range reference.
 *
 * A single cell is read as a one-cell range.
 *
 * @throws InvalidReferenceError if the sheet name is missing or a corner cannot be parsed
 */
export function parseRangeReference(refersTo: string): RangeReference {
	const parts = splitSheetReference(refersTo.trim());
	if (parts === null || parts.sheetName === "") {
		throw new InvalidReferenceError(refersTo);
	}
	const { start, end } = decodeRange(parts.range);
	return {
		sheetName: parts.sheetName,
		startCell: encodeCell(start),
		endCell: encodeCell(end),
		boundary: { startRow: start.row, startCol: start.col, endRow: end.row, endCol: end.col },
	};
}

export function getNamedRangeByName(ranges: readonly NamedRange[], name: string): NamedRange | undefined {
	return ranges.find((r) => r.name === name);
}

export function getNamedRangesByScope(ranges: readonly NamedRange[], scope: string): NamedRange[] {
	return ranges.filter((r) => r.scope === scope);
}

export function getGlobalNamedRanges(ranges: readonly NamedRange[]): NamedRange[] {
	return getNamedRangesByScope(ranges, GLOBAL_SCOPE);
}

export interface NamedRangeReaderOptions {
	config?: DetectionConfigInput;
	logger?: Logger;
}

/** Reads the defined names of a workbook and turns a named range into a table */
export class NamedRangeReader {
	readonly config: DetectionConfig;
	private readonly logger: Logger;
	private readonly headers: HeaderDetector;
	private readonly parser: RowParser;
	private readonly merges: MergeProcessor;

	constructor(options: NamedRangeReaderOptions = {}) {
		this.config = resolveConfig(options.config);
		this.logger = options.logger ?? createLogger();
		this.headers = new HeaderDetector(this.config);
		this.parser = new RowParser();
		this.merges = new MergeProcessor(this.config);
	}

	getNamedRanges(source: SpreadsheetSource): NamedRange[] {
		return source.getDefinedNames();
	}

	/**
	 * Read the cells a defined name refers to as a table named after the range.
	 *
	 * The range is clamped to the sheet's grid before header detection.
	 *
	 * @throws NamedRangeNotFoundError if no defined name matches
	 * @throws InvalidReferenceError if the name does not refer to a sheet range
	 * @throws InvalidBoundaryError if nothing of the range lies inside the grid
	 */
	async readRange(source: SpreadsheetSource, rangeName: string): Promise<Table> {
		const range = getNamedRangeByName(source.getDefinedNames(), rangeName);
		if (range === undefined) {
			throw new NamedRangeNotFoundError(rangeName);
		}
		const { sheetName, boundary } = parseRangeReference(range.refersTo);
		const grid = await loadSheetGrid(source.openReader(), sheetName, this.merges);

		const clamped: TableBoundary = {
			...boundary,
			endRow: Math.min(boundary.endRow, grid.length - 1),
			endCol: Math.min(boundary.endCol, gridWidth(grid) - 1),
		};
		if (clamped.startRow > clamped.endRow || clamped.startCol > clamped.endCol) {
			throw new InvalidBoundaryError(`range '${rangeName}' (${range.refersTo}) lies outside sheet '${sheetName}'`);
		}

		const headerRow = this.headers.detectHeaderRow(grid, clamped);
		const headers = this.headers.extractHeaders(grid, headerRow, clamped);
		const table = this.parser.parseTable(grid, clamped, headers, headerRow, rangeName);
		this.logger.debug({ range: rangeName, sheet: sheetName, boundary: clamped, rows: table.rows.length }, "named range read");
		return table;
	}
}
