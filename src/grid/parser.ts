import type { Cell, CellGrid, Row, Table, TableBoundary } from "../types.js";
import { cellAt, emptyCell, isEmptyCell } from "./cells.js";

/**
 * Materializes table rows below a header row.
 *
 * Each data row maps every header to the cell in the matching boundary column.
 * Columns missing from a short row read as empty cells, and rows whose cells
 * are all empty are dropped.
 */
export class RowParser {
	parseRows(grid: CellGrid, headers: readonly string[], headerRow: number, boundary: TableBoundary): Row[] {
		const rows: Row[] = [];
		const last = Math.min(boundary.endRow, grid.length - 1);
		for (let sourceRow = headerRow + 1; sourceRow <= last; ++sourceRow) {
			const cells: Cell[] = headers.map((_, i) => {
				const col = boundary.startCol + i;
				return cellAt(grid, sourceRow, col) ?? emptyCell(sourceRow, col);
			});
			if (cells.every(isEmptyCell)) {
				continue;
			}
			const values = new Map<string, Cell>();
			headers.forEach((header, i) => {
				const cell = cells[i];
				if (cell !== undefined) {
					values.set(header, cell);
				}
			});
			rows.push({ index: rows.length, sourceRow, values, cells });
		}
		return rows;
	}

	parseTable(
		grid: CellGrid,
		boundary: TableBoundary,
		headers: readonly string[],
		headerRow: number,
		name: string,
	): Table {
		return {
			name,
			headers: headers.slice(),
			rows: this.parseRows(grid, headers, headerRow, boundary),
			headerRow,
			startRow: boundary.startRow,
			endRow: boundary.endRow,
			startCol: boundary.startCol,
			endCol: boundary.endCol,
		};
	}
}

export function getRowCell(row: Row, header: string): Cell | undefined {
	return row.values.get(header);
}

export function filterRows(rows: readonly Row[], predicate: (row: Row) => boolean): Row[] {
	return rows.filter((row) => predicate(row));
}

export function mapRows<T>(rows: readonly Row[], mapper: (row: Row) => T): T[] {
	return rows.map((row) => mapper(row));
}

/** Cells of one column across rows; rows without the column are skipped */
export function getColumnValues(rows: readonly Row[], header: string): Cell[] {
	const values: Cell[] = [];
	for (const row of rows) {
		const cell = row.values.get(header);
		if (cell !== undefined) {
			values.push(cell);
		}
	}
	return values;
}
