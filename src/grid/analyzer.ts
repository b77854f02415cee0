import type { CellGrid, TableBoundary } from "../types.js";
import { DEFAULT_CONFIG, type DetectionConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { cellAt, gridWidth, isEmptyCell } from "./cells.js";

/** Rows sampled below the seed row when deciding whether a column holds data */
const COLUMN_SAMPLE_ROWS = 10;

/** Same-shaped mask of cells already claimed by a candidate region */
type VisitedMask = boolean[][];

export function boundariesOverlap(a: TableBoundary, b: TableBoundary): boolean {
	return !(a.endRow < b.startRow || b.endRow < a.startRow || a.endCol < b.startCol || b.endCol < a.startCol);
}

export function unionBoundaries(a: TableBoundary, b: TableBoundary): TableBoundary {
	return {
		startRow: Math.min(a.startRow, b.startRow),
		endRow: Math.max(a.endRow, b.endRow),
		startCol: Math.min(a.startCol, b.startCol),
		endCol: Math.max(a.endCol, b.endCol),
	};
}

/**
 * Detects rectangular table regions in a sheet grid.
 *
 * Seeds are taken in row-major order from cells no earlier region has claimed.
 * From each seed the region grows left over contiguous values, right over
 * sampled columns (one empty column may be bridged), and down while rows hold
 * data (up to `maxEmptyRows` empty rows may be bridged), then widens to
 * contain every merged region it touches.
 */
export class TableAnalyzer {
	constructor(
		private readonly config: DetectionConfig = DEFAULT_CONFIG,
		private readonly logger?: Logger,
	) {}

	/** Find all table regions, in the order their seed cells were met */
	detectTables(grid: CellGrid): TableBoundary[] {
		if (grid.length === 0) {
			return [];
		}
		const visited: VisitedMask = grid.map((row) => new Array<boolean>(row.length).fill(false));
		const tables: TableBoundary[] = [];

		for (let row = 0; row < grid.length; ++row) {
			const cells = grid[row] ?? [];
			for (let col = 0; col < cells.length; ++col) {
				const cell = cells[col];
				if (visited[row]?.[col] || cell === undefined || isEmptyCell(cell)) {
					continue;
				}
				const boundary = this.expand(grid, row, col, visited);
				if (boundary && this.isValidTable(boundary)) {
					tables.push(boundary);
				}
			}
		}
		return tables;
	}

	/**
	 * Grow a region from a seed cell and mark it as visited.
	 *
	 * @returns The region, or null when widening it for merges would reach into
	 * a region that was already claimed
	 */
	private expand(grid: CellGrid, startRow: number, startCol: number, visited: VisitedMask): TableBoundary | null {
		const maxRows = grid.length;
		const maxCols = gridWidth(grid);

		let leftCol = startCol;
		for (let col = startCol - 1; col >= 0; --col) {
			const cell = cellAt(grid, startRow, col);
			if (cell === undefined || isEmptyCell(cell) || isVisited(visited, startRow, col)) {
				break;
			}
			leftCol = col;
		}

		let rightCol = startCol;
		let consecutiveEmpty = 0;
		for (let col = startCol + 1; col < maxCols; ++col) {
			let hasData = false;
			let claimed = false;
			for (let row = startRow; row < Math.min(startRow + COLUMN_SAMPLE_ROWS, maxRows); ++row) {
				if (isVisited(visited, row, col)) {
					claimed = true;
					break;
				}
				const cell = cellAt(grid, row, col);
				if (cell !== undefined && !isEmptyCell(cell)) {
					hasData = true;
				}
			}
			if (claimed) {
				break;
			}
			if (hasData) {
				rightCol = col;
				consecutiveEmpty = 0;
			} else if (++consecutiveEmpty > 1) {
				break;
			}
		}

		let endRow = startRow;
		let emptyRows = 0;
		for (let row = startRow + 1; row < maxRows; ++row) {
			let rowHasData = false;
			let claimed = false;
			for (let col = leftCol; col <= rightCol; ++col) {
				if (isVisited(visited, row, col)) {
					claimed = true;
					break;
				}
				const cell = cellAt(grid, row, col);
				if (cell !== undefined && !isEmptyCell(cell)) {
					rowHasData = true;
				}
			}
			if (claimed) {
				break;
			}
			if (rowHasData) {
				endRow = row;
				emptyRows = 0;
			} else if (++emptyRows > this.config.maxEmptyRows) {
				break;
			}
		}

		const boundary = expandForMerges(grid, { startRow, endRow, startCol: leftCol, endCol: rightCol });
		const overlapsClaimed = anyVisited(visited, boundary);

		for (let row = boundary.startRow; row <= boundary.endRow && row < visited.length; ++row) {
			const mask = visited[row] ?? [];
			for (let col = boundary.startCol; col <= boundary.endCol && col < mask.length; ++col) {
				mask[col] = true;
			}
		}

		if (overlapsClaimed) {
			this.logger?.debug({ boundary }, "discarding region that overlaps an earlier table");
			return null;
		}
		return boundary;
	}

	/** A region is a table when it spans at least `minRows` rows and `minColumns` columns */
	isValidTable(boundary: TableBoundary): boolean {
		const rows = boundary.endRow - boundary.startRow + 1;
		const cols = boundary.endCol - boundary.startCol + 1;
		return rows >= this.config.minRows && cols >= this.config.minColumns;
	}

	/**
	 * Find regions of high cell density with a sliding square window.
	 *
	 * Every window whose non-empty ratio reaches `headerDensity` is a candidate;
	 * overlapping candidates are then unioned until no two results overlap.
	 * Windows that do not fit in the grid, and sizes below 1, yield nothing.
	 */
	findDenseRegions(grid: CellGrid, windowSize: number): TableBoundary[] {
		if (grid.length === 0 || windowSize < 1) {
			return [];
		}
		const maxRows = grid.length;
		const maxCols = gridWidth(grid);
		const regions: TableBoundary[] = [];

		for (let startRow = 0; startRow <= maxRows - windowSize; ++startRow) {
			for (let startCol = 0; startCol <= maxCols - windowSize; ++startCol) {
				const density = windowDensity(grid, startRow, startCol, windowSize);
				if (density >= this.config.headerDensity) {
					regions.push({
						startRow,
						endRow: startRow + windowSize - 1,
						startCol,
						endCol: startCol + windowSize - 1,
					});
				}
			}
		}
		return mergeOverlappingRegions(regions);
	}
}

function isVisited(visited: VisitedMask, row: number, col: number): boolean {
	return visited[row]?.[col] === true;
}

function anyVisited(visited: VisitedMask, b: TableBoundary): boolean {
	for (let row = b.startRow; row <= b.endRow && row < visited.length; ++row) {
		const mask = visited[row] ?? [];
		for (let col = b.startCol; col <= b.endCol && col < mask.length; ++col) {
			if (mask[col]) {
				return true;
			}
		}
	}
	return false;
}

/** Widen a region until it fully contains every merged region one of its cells belongs to */
function expandForMerges(grid: CellGrid, boundary: TableBoundary): TableBoundary {
	let current = boundary;
	let changed = true;
	// A widened region can touch new merges, so repeat until stable
	while (changed) {
		changed = false;
		let next = current;
		for (let row = current.startRow; row <= current.endRow; ++row) {
			for (let col = current.startCol; col <= current.endCol; ++col) {
				const range = cellAt(grid, row, col)?.mergeRange;
				if (range) {
					next = unionBoundaries(next, range);
				}
			}
		}
		if (
			next.startRow !== current.startRow ||
			next.endRow !== current.endRow ||
			next.startCol !== current.startCol ||
			next.endCol !== current.endCol
		) {
			current = next;
			changed = true;
		}
	}
	return current;
}

/** Ratio of non-empty cells among the cells present in a square window */
function windowDensity(grid: CellGrid, startRow: number, startCol: number, size: number): number {
	let total = 0;
	let nonEmpty = 0;
	for (let row = startRow; row < startRow + size && row < grid.length; ++row) {
		for (let col = startCol; col < startCol + size; ++col) {
			const cell = cellAt(grid, row, col);
			if (cell === undefined) {
				break;
			}
			total++;
			if (!isEmptyCell(cell)) {
				nonEmpty++;
			}
		}
	}
	return total === 0 ? 0 : nonEmpty / total;
}

/** Union overlapping regions (shared edges count) until no pair overlaps */
export function mergeOverlappingRegions(regions: readonly TableBoundary[]): TableBoundary[] {
	let merged = regions.slice();
	let changed = true;
	while (changed && merged.length > 1) {
		changed = false;
		const next: TableBoundary[] = [];
		for (const region of merged) {
			const hit = next.findIndex((m) => boundariesOverlap(m, region));
			if (hit === -1) {
				next.push(region);
			} else {
				next[hit] = unionBoundaries(next[hit] ?? region, region);
				changed = true;
			}
		}
		merged = next;
	}
	return merged;
}
