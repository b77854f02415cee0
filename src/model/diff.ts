import type { CellDiff, DiffResult, Row, Table } from "../types.js";

function indexByKey(table: Table, keyColumn: string): Map<string, Row> {
	const map = new Map<string, Row>();
	for (const row of table.rows) {
		const cell = row.values.get(keyColumn);
		if (cell !== undefined) {
			map.set(cell.rawText, row);
		}
	}
	return map;
}

function compareRows(oldRow: Row, newRow: Row, headers: readonly string[], keyColumn: string): CellDiff[] {
	const changes: CellDiff[] = [];
	for (const column of headers) {
		if (column === keyColumn) {
			continue;
		}
		const oldValue = oldRow.values.get(column)?.rawText ?? "";
		const newValue = newRow.values.get(column)?.rawText ?? "";
		if (oldValue !== newValue) {
			changes.push({ column, oldValue, newValue });
		}
	}
	return changes;
}

/**
 * Compare two versions of a table, matching rows on the raw text of `keyColumn`.
 *
 * Removed and modified rows follow the old table's order, added rows the new
 * table's. Values are compared over the old table's columns. When a key
 * repeats, the last row with that key is used.
 */
export function diffTables(oldTable: Table, newTable: Table, keyColumn: string): DiffResult {
	const oldRows = indexByKey(oldTable, keyColumn);
	const newRows = indexByKey(newTable, keyColumn);
	const result: DiffResult = { keyColumn, addedRows: [], removedRows: [], modifiedRows: [] };

	for (const [key, oldRow] of oldRows) {
		const newRow = newRows.get(key);
		if (newRow === undefined) {
			result.removedRows.push(oldRow);
			continue;
		}
		const changes = compareRows(oldRow, newRow, oldTable.headers, keyColumn);
		if (changes.length > 0) {
			result.modifiedRows.push({ keyValue: key, oldRow, newRow, changes });
		}
	}
	for (const [key, newRow] of newRows) {
		if (!oldRows.has(key)) {
			result.addedRows.push(newRow);
		}
	}
	return result;
}

export function hasChanges(diff: DiffResult): boolean {
	return diff.addedRows.length > 0 || diff.removedRows.length > 0 || diff.modifiedRows.length > 0;
}

export function totalChanges(diff: DiffResult): number {
	return diff.addedRows.length + diff.removedRows.length + diff.modifiedRows.length;
}
