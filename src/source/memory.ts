import type { CellGrid, NamedRange } from "../types.js";
import type { RawMergeRegion, SheetReader, SpreadsheetSource } from "./types.js";
import { SheetNotFoundError } from "../errors.js";
import { buildGrid, cellAt, type CellInput } from "../grid/cells.js";
import { decodeCell } from "../utils/cell.js";

/** Plain description of one sheet */
export interface MemorySheet {
	name: string;
	/** Rows of cell values; shorter rows are padded with empty cells */
	rows: CellInput[][];
	/** Merged regions in A1 notation (e.g. "A1:C1") */
	merges?: string[];
	/** Comment text keyed by A1 reference */
	comments?: Record<string, string>;
	/** Hyperlink target keyed by A1 reference */
	hyperlinks?: Record<string, string>;
}

export interface MemoryWorkbook {
	filePath?: string;
	sheets: MemorySheet[];
	definedNames?: NamedRange[];
}

/** Annotate cells in place from an A1-keyed record, ignoring cells outside the grid */
function annotate(grid: CellGrid, entries: Record<string, string>, field: "comment" | "hyperlink"): void {
	for (const [ref, text] of Object.entries(entries)) {
		const { row, col } = decodeCell(ref);
		const cells = grid[row];
		const cell = cellAt(grid, row, col);
		if (cells !== undefined && cell !== undefined) {
			cells[col] = { ...cell, [field]: text };
		}
	}
}

class MemorySheetReader implements SheetReader {
	constructor(private readonly sheets: ReadonlyMap<string, MemorySheet>) {}

	private sheet(name: string): MemorySheet {
		const sheet = this.sheets.get(name);
		if (sheet === undefined) {
			throw new SheetNotFoundError(name);
		}
		return sheet;
	}

	private buildSheetGrid(sheet: MemorySheet): CellGrid {
		const grid = buildGrid(sheet.rows, { rectangular: true });
		annotate(grid, sheet.comments ?? {}, "comment");
		annotate(grid, sheet.hyperlinks ?? {}, "hyperlink");
		return grid;
	}

	async readSheetGrid(sheetName: string): Promise<CellGrid> {
		return this.buildSheetGrid(this.sheet(sheetName));
	}

	async getMergeRegions(sheetName: string): Promise<RawMergeRegion[]> {
		const sheet = this.sheet(sheetName);
		const grid = this.buildSheetGrid(sheet);
		return (sheet.merges ?? []).map((ref) => {
			const [startCell = "", endCell = startCell] = ref.split(":");
			const origin = decodeCell(startCell);
			return { startCell, endCell, value: cellAt(grid, origin.row, origin.col)?.rawText ?? "" };
		});
	}
}

/**
 * Workbook held in memory as plain values.
 *
 * Every read builds a fresh grid, so applying merges to one read never
 * affects another.
 */
export class MemorySource implements SpreadsheetSource {
	readonly filePath: string;
	private readonly sheets: Map<string, MemorySheet>;
	private readonly order: string[];
	private readonly definedNames: NamedRange[];

	constructor(workbook: MemoryWorkbook) {
		this.filePath = workbook.filePath ?? "";
		this.order = workbook.sheets.map((s) => s.name);
		this.sheets = new Map(workbook.sheets.map((s) => [s.name, s]));
		this.definedNames = workbook.definedNames ?? [];
	}

	getSheetNames(): string[] {
		return this.order.slice();
	}

	getDefinedNames(): NamedRange[] {
		return this.definedNames.map((n) => ({ ...n }));
	}

	openReader(): SheetReader {
		return new MemorySheetReader(this.sheets);
	}
}
