import type { Cell, CellType, ColumnStats, Row, Table } from "../types.js";
import { DEFAULT_CONFIG, type DetectionConfig } from "../config.js";
import { DuplicateColumnError } from "../errors.js";
import { isEmptyCell } from "../grid/cells.js";

const MAX_SAMPLE_VALUES = 5;

function withRows(table: Table, rows: readonly Row[], headers: readonly string[] = table.headers): Table {
	return { ...table, headers: headers.slice(), rows: rows.slice() };
}

/** Row restricted to the given columns, in that order */
function projectRow(row: Row, columns: readonly string[]): Row {
	const values = new Map<string, Cell>();
	const cells: Cell[] = [];
	for (const column of columns) {
		const cell = row.values.get(column);
		if (cell !== undefined) {
			values.set(column, cell);
			cells.push(cell);
		}
	}
	return { ...row, values, cells };
}

/** New table holding only the rows that match the predicate */
export function filterTable(table: Table, predicate: (row: Row) => boolean): Table {
	return withRows(
		table,
		table.rows.filter((row) => predicate(row)),
	);
}

/** Known, distinct column names in the order given */
function knownColumns(table: Table, columns: readonly string[]): string[] {
	const known = new Set(table.headers);
	const ordered: string[] = [];
	for (const column of columns) {
		if (known.has(column) && !ordered.includes(column)) {
			ordered.push(column);
		}
	}
	return ordered;
}

/**
 * New table with only the given columns, in the order given.
 * Unknown and repeated names are ignored.
 */
export function selectColumns(table: Table, columns: readonly string[]): Table {
	const selected = knownColumns(table, columns);
	return withRows(
		table,
		table.rows.map((row) => projectRow(row, selected)),
		selected,
	);
}

/**
 * New table with columns in the given order.
 * Columns left out of the list are dropped; unknown names are ignored.
 */
export function reorderColumns(table: Table, columns: readonly string[]): Table {
	return selectColumns(table, columns);
}

/**
 * New table with columns renamed by `mapping` (old name to new name).
 *
 * @throws DuplicateColumnError if two columns would end up with the same name
 */
export function renameColumns(table: Table, mapping: Readonly<Record<string, string>>): Table {
	const rename = (h: string): string => (Object.hasOwn(mapping, h) ? (mapping[h] ?? h) : h);
	const headers = table.headers.map(rename);
	const seen = new Set<string>();
	for (const header of headers) {
		if (seen.has(header)) {
			throw new DuplicateColumnError(header);
		}
		seen.add(header);
	}
	const rows = table.rows.map((row) => {
		const values = new Map<string, Cell>();
		for (const [header, cell] of row.values) {
			values.set(rename(header), cell);
		}
		return { ...row, values, cells: row.cells.slice() };
	});
	return withRows(table, rows, headers);
}

function keyOf(row: Row, keyColumn: string): string | undefined {
	return row.values.get(keyColumn)?.rawText;
}

/** Rows repeating an earlier row's key (first occurrences excluded) */
export function findDuplicates(table: Table, keyColumn: string): Row[] {
	const seen = new Set<string>();
	const duplicates: Row[] = [];
	for (const row of table.rows) {
		const key = keyOf(row, keyColumn);
		if (key === undefined) {
			continue;
		}
		if (seen.has(key)) {
			duplicates.push(row);
		} else {
			seen.add(key);
		}
	}
	return duplicates;
}

/** New table keeping the first row of each key; rows without the key column are dropped */
export function deduplicate(table: Table, keyColumn: string): Table {
	const seen = new Set<string>();
	const rows = table.rows.filter((row) => {
		const key = keyOf(row, keyColumn);
		if (key === undefined || seen.has(key)) {
			return false;
		}
		seen.add(key);
		return true;
	});
	return withRows(table, rows);
}

export interface DuplicateGroup {
	keyValue: string;
	rows: Row[];
	count: number;
}

/** Groups of rows sharing a key, for keys seen more than once, in order of first occurrence */
export function findDuplicateGroups(table: Table, keyColumn: string): DuplicateGroup[] {
	const groups = new Map<string, Row[]>();
	for (const row of table.rows) {
		const key = keyOf(row, keyColumn);
		if (key === undefined) {
			continue;
		}
		const group = groups.get(key);
		if (group) {
			group.push(row);
		} else {
			groups.set(key, [row]);
		}
	}
	const result: DuplicateGroup[] = [];
	for (const [keyValue, rows] of groups) {
		if (rows.length > 1) {
			result.push({ keyValue, rows, count: rows.length });
		}
	}
	return result;
}

/**
 * Per-column statistics over a table's data rows.
 *
 * The inferred type is the most frequent non-empty type (ties go to string,
 * then number, date, boolean, formula). A column is consistent when that type
 * covers at least `columnConsistency` of its non-empty cells.
 */
export function analyzeColumns(table: Table, config: DetectionConfig = DEFAULT_CONFIG): ColumnStats[] {
	return table.headers.map((name, index) => {
		const counts: Record<Exclude<CellType, "empty">, number> = {
			string: 0,
			number: 0,
			date: 0,
			boolean: 0,
			formula: 0,
		};
		const unique = new Set<string>();
		const sampleValues: string[] = [];
		let emptyCount = 0;
		let min = Infinity;
		let max = -Infinity;
		let sum = 0;

		for (const row of table.rows) {
			const cell = row.values.get(name);
			if (cell === undefined || isEmptyCell(cell)) {
				emptyCount++;
				continue;
			}
			switch (cell.value.type) {
				case "empty":
					emptyCount++;
					continue;
				case "number":
					counts.number++;
					sum += cell.value.value;
					min = Math.min(min, cell.value.value);
					max = Math.max(max, cell.value.value);
					break;
				case "string":
				case "date":
				case "boolean":
				case "formula":
					counts[cell.value.type]++;
					break;
			}
			if (!unique.has(cell.rawText)) {
				unique.add(cell.rawText);
				if (sampleValues.length < MAX_SAMPLE_VALUES) {
					sampleValues.push(cell.rawText);
				}
			}
		}

		const nonEmpty = table.rows.length - emptyCount;
		let inferredType: CellType = "empty";
		let best = 0;
		for (const type of ["string", "number", "date", "boolean", "formula"] as const) {
			if (counts[type] > best) {
				best = counts[type];
				inferredType = type;
			}
		}
		const consistency = nonEmpty === 0 ? 0 : best / nonEmpty;

		return {
			name,
			index,
			inferredType,
			totalCount: table.rows.length,
			emptyCount,
			stringCount: counts.string,
			numberCount: counts.number,
			dateCount: counts.date,
			booleanCount: counts.boolean,
			formulaCount: counts.formula,
			uniqueCount: unique.size,
			sampleValues,
			consistency,
			isConsistent: nonEmpty > 0 && consistency >= config.columnConsistency,
			numeric: counts.number > 0 ? { min, max, sum, avg: sum / counts.number } : null,
		};
	});
}
