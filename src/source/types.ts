import type { CellGrid, NamedRange } from "../types.js";
import type { RawMergeRegion } from "../grid/merge.js";

export type { RawMergeRegion };

/**
 * Handle for reading sheet contents.
 *
 * A handle may keep per-read state, so concurrent sheet reads must each use
 * their own handle from {@link SpreadsheetSource.openReader}.
 */
export interface SheetReader {
	/**
	 * Read a sheet as a rectangular grid with cell types, formulas, comments
	 * and hyperlinks filled in; merge metadata is not applied.
	 *
	 * @throws SheetNotFoundError for an unknown sheet
	 */
	readSheetGrid(sheetName: string): Promise<CellGrid>;
	/**
	 * Merged regions of a sheet as corner pairs with their display value.
	 *
	 * @throws SheetNotFoundError for an unknown sheet
	 */
	getMergeRegions(sheetName: string): Promise<RawMergeRegion[]>;
}

/** Spreadsheet access layer: a loaded workbook the engine reads sheets from */
export interface SpreadsheetSource {
	/** Path the workbook was loaded from ("" for in-memory workbooks) */
	readonly filePath: string;
	/** Sheet names in workbook order */
	getSheetNames(): string[];
	/** Defined names of the workbook */
	getDefinedNames(): NamedRange[];
	/** Open a fresh reading handle */
	openReader(): SheetReader;
}
