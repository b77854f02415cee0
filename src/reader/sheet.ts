import type { CellGrid } from "../types.js";
import type { SheetReader } from "../source/types.js";
import type { MergeProcessor } from "../grid/merge.js";

/**
 * Read a sheet grid and apply its merged regions.
 *
 * Merge regions are only fetched when the processor would act on them.
 *
 * @throws SheetNotFoundError for an unknown sheet
 * @throws InvalidReferenceError for an unparsable merge corner
 */
export async function loadSheetGrid(reader: SheetReader, sheetName: string, merges: MergeProcessor): Promise<CellGrid> {
	const grid = await reader.readSheetGrid(sheetName);
	if (merges.enabled) {
		merges.apply(grid, merges.parse(await reader.getMergeRegions(sheetName)));
	}
	return grid;
}
