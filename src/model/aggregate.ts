import type { Cell, Row, Table } from "../types.js";
import { DuplicateColumnError } from "../errors.js";
import { createCell, emptyCell, isEmptyCell } from "../grid/cells.js";

export type AggregateOp = "sum" | "count" | "avg" | "min" | "max";

/** One aggregation over a column; the result column is `alias` or e.g. `Sum_Qty` */
export interface Aggregation {
	column: string;
	op: AggregateOp;
	alias?: string;
}

/** Rows sharing the same values in the grouping columns */
export interface TableGroup {
	/** Raw text of each grouping column, in grouping order */
	keyValues: string[];
	rows: Row[];
}

const OP_LABELS: Record<AggregateOp, string> = {
	sum: "Sum",
	count: "Count",
	avg: "Avg",
	min: "Min",
	max: "Max",
};

// Separates key parts; cannot occur in cell text read from a workbook
const KEY_SEPARATOR = "\u0000";

function aggregation(op: AggregateOp, column: string, alias?: string): Aggregation {
	return alias === undefined ? { column, op } : { column, op, alias };
}

export const sum = (column: string, alias?: string): Aggregation => aggregation("sum", column, alias);
export const count = (column: string, alias?: string): Aggregation => aggregation("count", column, alias);
export const avg = (column: string, alias?: string): Aggregation => aggregation("avg", column, alias);
export const min = (column: string, alias?: string): Aggregation => aggregation("min", column, alias);
export const max = (column: string, alias?: string): Aggregation => aggregation("max", column, alias);

/** Column name an aggregation's result is stored under */
export function aggregationName(agg: Aggregation): string {
	return agg.alias !== undefined && agg.alias !== "" ? agg.alias : `${OP_LABELS[agg.op]}_${agg.column}`;
}

/** Number text with at most six decimals and no trailing zeros */
export function formatAggregate(value: number): string {
	const text = value.toFixed(6);
	return text.includes(".") ? text.replace(/0+$/, "").replace(/\.$/, "") : text;
}

/**
 * Split a table's rows into groups by the raw text of `columns`.
 *
 * Groups come back sorted by key; rows keep their table order within a group.
 * A missing column counts as empty text.
 */
export function groupBy(table: Table, columns: readonly string[]): TableGroup[] {
	const groups = new Map<string, TableGroup>();
	for (const row of table.rows) {
		const keyValues = columns.map((column) => row.values.get(column)?.rawText ?? "");
		const key = keyValues.join(KEY_SEPARATOR);
		const group = groups.get(key);
		if (group) {
			group.rows.push(row);
		} else {
			groups.set(key, { keyValues, rows: [row] });
		}
	}
	return [...groups.keys()].sort().flatMap((key) => {
		const group = groups.get(key);
		return group ? [group] : [];
	});
}

function computeAggregate(agg: Aggregation, rows: readonly Row[]): number | null {
	const cells = rows.flatMap((row) => {
		const cell = row.values.get(agg.column);
		return cell === undefined ? [] : [cell];
	});
	const numbers = cells.flatMap((cell) => (cell.value.type === "number" ? [cell.value.value] : []));
	const total = numbers.reduce((a, b) => a + b, 0);
	switch (agg.op) {
		case "count":
			return cells.filter((cell) => !isEmptyCell(cell)).length;
		case "sum":
			return numbers.length > 0 ? total : null;
		case "avg":
			return numbers.length > 0 ? total / numbers.length : null;
		case "min":
			return numbers.length > 0 ? Math.min(...numbers) : null;
		case "max":
			return numbers.length > 0 ? Math.max(...numbers) : null;
	}
}

/**
 * Group a table by `groupColumns` and compute `aggregations` for each group.
 *
 * The result has the grouping columns followed by one column per aggregation,
 * and one row per group in key order. Grouping cells are taken from the
 * group's first row. Count counts non-empty cells; the other operations only
 * look at numeric cells and leave the result empty when a group has none.
 *
 * @throws DuplicateColumnError if two result columns would share a name
 */
export function aggregate(table: Table, groupColumns: readonly string[], aggregations: readonly Aggregation[]): Table {
	const headers = [...groupColumns, ...aggregations.map(aggregationName)];
	const seen = new Set<string>();
	for (const header of headers) {
		if (seen.has(header)) {
			throw new DuplicateColumnError(header);
		}
		seen.add(header);
	}

	const rows = groupBy(table, groupColumns).map((group, index): Row => {
		const [first] = group.rows;
		const values = new Map<string, Cell>();
		const cells: Cell[] = [];
		groupColumns.forEach((column, col) => {
			const cell = first?.values.get(column) ?? emptyCell(index, col);
			values.set(column, cell);
			cells.push(cell);
		});
		aggregations.forEach((agg, i) => {
			const col = groupColumns.length + i;
			const result = computeAggregate(agg, group.rows);
			const cell =
				result === null ? emptyCell(index, col) : { ...createCell(index, col, result), rawText: formatAggregate(result) };
			values.set(aggregationName(agg), cell);
			cells.push(cell);
		});
		return { index, sourceRow: first?.sourceRow ?? index, values, cells };
	});

	return { ...table, headers, rows };
}
