import type { CellGrid, CellValue } from "../types.js";
import { DEFAULT_CONFIG, type DetectionConfig } from "../config.js";
import { decodeCell } from "../utils/cell.js";
import { cellAt } from "./cells.js";

/** Merge region as reported by the spreadsheet access layer */
export interface RawMergeRegion {
	/** Top-left corner in A1 notation (e.g. "A1") */
	startCell: string;
	/** Bottom-right corner in A1 notation (e.g. "C1") */
	endCell: string;
	/** Display value of the merged region */
	value: string;
}

/** Merge region with zero-based, inclusive coordinates */
export interface MergeRegion {
	startRow: number;
	startCol: number;
	endRow: number;
	endCol: number;
	value: string;
}

/**
 * Turns raw merge descriptors into coordinates and stamps merge
 * information onto grid cells.
 */
export class MergeProcessor {
	constructor(private readonly config: DetectionConfig = DEFAULT_CONFIG) {}

	/** False when the configuration neither expands nor tracks merges */
	get enabled(): boolean {
		return this.config.expandMergedCells || this.config.trackMergeMetadata;
	}

	/**
	 * Convert raw merge descriptors to zero-based regions.
	 *
	 * Single-cell "merges" are dropped. Corners given in reverse order are normalized.
	 *
	 * @throws InvalidReferenceError if a corner reference cannot be parsed
	 */
	parse(merges: readonly RawMergeRegion[]): MergeRegion[] {
		const result: MergeRegion[] = [];
		for (const m of merges) {
			const a = decodeCell(m.startCell);
			const b = decodeCell(m.endCell);
			if (a.row === b.row && a.col === b.col) {
				continue;
			}
			result.push({
				startRow: Math.min(a.row, b.row),
				startCol: Math.min(a.col, b.col),
				endRow: Math.max(a.row, b.row),
				endCol: Math.max(a.col, b.col),
				value: m.value,
			});
		}
		return result;
	}

	/**
	 * Apply merge regions to a grid in place.
	 *
	 * With `expandMergedCells`, every cell of a region takes the origin's value
	 * and the region's display text. With `trackMergeMetadata`, every cell gets
	 * `isMerged` and a `mergeRange` whose `isOrigin` marks the top-left cell.
	 * Region cells outside the grid are skipped.
	 */
	apply(grid: CellGrid, merges: readonly MergeRegion[]): void {
		if (!this.enabled) {
			return;
		}
		for (const merge of merges) {
			this.applyOne(grid, merge);
		}
	}

	private applyOne(grid: CellGrid, merge: MergeRegion): void {
		const origin = cellAt(grid, merge.startRow, merge.startCol);
		const fallback: CellValue = merge.value === "" ? { type: "empty" } : { type: "string", value: merge.value };
		const originValue = origin ? origin.value : fallback;

		for (let row = Math.max(0, merge.startRow); row <= merge.endRow && row < grid.length; ++row) {
			const cells = grid[row];
			if (cells === undefined) {
				continue;
			}
			for (let col = Math.max(0, merge.startCol); col <= merge.endCol && col < cells.length; ++col) {
				const cell = cells[col];
				if (cell === undefined) {
					continue;
				}
				const isOrigin = row === merge.startRow && col === merge.startCol;
				let next = cell;
				if (this.config.expandMergedCells) {
					next = { ...next, rawText: merge.value, value: originValue };
				}
				if (this.config.trackMergeMetadata) {
					next = {
						...next,
						isMerged: true,
						mergeRange: {
							startRow: merge.startRow,
							startCol: merge.startCol,
							endRow: merge.endRow,
							endCol: merge.endCol,
							isOrigin,
						},
					};
				}
				cells[col] = next;
			}
		}
	}
}

function positionKey(row: number, col: number): string {
	return row + ":" + col;
}

/** Index every covered position of the given regions for constant-time lookup */
export function buildMergeMap(merges: readonly MergeRegion[]): Map<string, MergeRegion> {
	const map = new Map<string, MergeRegion>();
	for (const merge of merges) {
		for (let row = merge.startRow; row <= merge.endRow; ++row) {
			for (let col = merge.startCol; col <= merge.endCol; ++col) {
				map.set(positionKey(row, col), merge);
			}
		}
	}
	return map;
}

/** Region covering the given position in a map built by {@link buildMergeMap} */
export function lookupMerge(map: ReadonlyMap<string, MergeRegion>, row: number, col: number): MergeRegion | undefined {
	return map.get(positionKey(row, col));
}

/** First region containing the given position, found by linear scan */
export function findMergeAt(merges: readonly MergeRegion[], row: number, col: number): MergeRegion | undefined {
	return merges.find((m) => row >= m.startRow && row <= m.endRow && col >= m.startCol && col <= m.endCol);
}
