import { z } from "zod";
import type { Cell, Row, Table } from "../types.js";
import { ConfigError } from "../errors.js";
import { isEmptyCell } from "../grid/cells.js";
import { formatDateText } from "../utils/date.js";
import { selectColumns } from "./table.js";

const columnsShape = {
	/** Export only these columns, in this order; unknown names are ignored */
	columns: z.array(z.string()).optional(),
};

export const csvOptionsSchema = z
	.object({
		...columnsShape,
		includeHeaders: z.boolean().default(true),
		/** Text written for empty cells */
		nullValue: z.string().default(""),
		delimiter: z
			.string()
			.length(1)
			.refine((d) => d !== '"' && d !== "\r" && d !== "\n", "must not be a quote or line break")
			.default(","),
		/** End records with CRLF instead of LF */
		crlf: z.boolean().default(false),
		/** Quote every field, not only those that need it */
		quoteAll: z.boolean().default(false),
	})
	.strict();

export const jsonOptionsSchema = z
	.object({
		...columnsShape,
		/** Value written for empty cells; null when "" */
		nullValue: z.string().default(""),
		pretty: z.boolean().default(false),
		indent: z.string().default("  "),
		/** Emit the array of row objects without the wrapping object */
		arrayOnly: z.boolean().default(false),
	})
	.strict();

export const sqlOptionsSchema = z
	.object({
		...columnsShape,
		tableName: z.string().min(1).default("exported_table"),
		dialect: z.enum(["generic", "mysql", "postgresql", "sqlite"]).default("generic"),
		createTable: z.boolean().default(false),
		/** Emit DROP TABLE IF EXISTS first */
		dropTable: z.boolean().default(false),
		/** Rows per INSERT statement; 0 puts every row in one statement */
		batchSize: z.number().int().min(0).default(0),
	})
	.strict();

export type CsvOptions = z.input<typeof csvOptionsSchema>;
export type JsonOptions = z.input<typeof jsonOptionsSchema>;
export type SqlOptions = z.input<typeof sqlOptionsSchema>;
export type SqlDialect = z.output<typeof sqlOptionsSchema>["dialect"];

export type JsonCellValue = string | number | boolean | null;
export type JsonRow = Record<string, JsonCellValue>;

export interface JsonTable {
	name: string;
	headers: string[];
	rows: JsonRow[];
	count: number;
}

function parseOptions<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, input: unknown): Output {
	const result = schema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
		throw new ConfigError(`Export options validation failed:\n  ${issues.join("\n  ")}`, issues);
	}
	return result.data;
}

function exportView(table: Table, columns: readonly string[] | undefined): Table {
	return columns === undefined ? table : selectColumns(table, columns);
}

/** Date part of a date cell, e.g. `2024-03-01` */
function dateOnly(d: Date): string {
	return formatDateText(d).slice(0, 10);
}

/** Date and time of a date cell, e.g. `2024-03-01 00:00:00` */
function dateTime(d: Date): string {
	const iso = d.toISOString();
	return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

const qreg = /"/g;

function csvText(cell: Cell | undefined, nullValue: string): string {
	if (cell === undefined || isEmptyCell(cell)) {
		return nullValue;
	}
	switch (cell.value.type) {
		case "string":
			return cell.value.value;
		case "date":
			return dateOnly(cell.value.value);
		case "boolean":
			return cell.value.value ? "true" : "false";
		case "number":
		case "formula":
		case "empty":
			return cell.rawText;
	}
}

function csvField(text: string, delimiter: string, quoteAll: boolean): string {
	// Quote when the text holds the delimiter, a line break or a double quote
	if (quoteAll || text.includes(delimiter) || text.includes("\n") || text.includes("\r") || text.includes('"')) {
		return '"' + text.replace(qreg, '""') + '"';
	}
	return text;
}

/**
 * Convert a table to CSV text.
 *
 * Every record, the header record included, ends with the line terminator.
 * Dates are written as `YYYY-MM-DD`, booleans as `true`/`false`, and numbers
 * as their display text.
 *
 * @throws ConfigError when the options are invalid
 */
export function toCsv(table: Table, options: CsvOptions = {}): string {
	const opts = parseOptions(csvOptionsSchema, options);
	const view = exportView(table, opts.columns);
	const eol = opts.crlf ? "\r\n" : "\n";
	const field = (text: string): string => csvField(text, opts.delimiter, opts.quoteAll);

	const records: string[] = [];
	if (opts.includeHeaders) {
		records.push(view.headers.map(field).join(opts.delimiter));
	}
	for (const row of view.rows) {
		records.push(view.headers.map((h) => field(csvText(row.values.get(h), opts.nullValue))).join(opts.delimiter));
	}
	return records.map((r) => r + eol).join("");
}

/** Convert a table to tab-separated values */
export function toTsv(table: Table, options: Omit<CsvOptions, "delimiter"> = {}): string {
	return toCsv(table, { ...options, delimiter: "\t" });
}

function jsonValue(cell: Cell | undefined, nullValue: string): JsonCellValue {
	if (cell === undefined) {
		return null;
	}
	if (isEmptyCell(cell)) {
		return nullValue === "" ? null : nullValue;
	}
	switch (cell.value.type) {
		case "date":
			return cell.value.value.toISOString();
		case "string":
		case "number":
		case "boolean":
		case "formula":
			return cell.value.value;
		case "empty":
			return null;
	}
}

function jsonRow(row: Row, headers: readonly string[], nullValue: string): JsonRow {
	return Object.fromEntries(headers.map((h) => [h, jsonValue(row.values.get(h), nullValue)]));
}

/** Row objects of a table keyed by header, in header order */
export function toJsonRows(table: Table, options: JsonOptions = {}): JsonRow[] {
	const opts = parseOptions(jsonOptionsSchema, options);
	const view = exportView(table, opts.columns);
	return view.rows.map((row) => jsonRow(row, view.headers, opts.nullValue));
}

/**
 * Convert a table to JSON text: `{ name, headers, rows, count }`, or just the
 * row array with `arrayOnly`. Dates become ISO 8601 strings; formula cells
 * their cached result text.
 *
 * @throws ConfigError when the options are invalid
 */
export function toJson(table: Table, options: JsonOptions = {}): string {
	const opts = parseOptions(jsonOptionsSchema, options);
	const view = exportView(table, opts.columns);
	const rows = view.rows.map((row) => jsonRow(row, view.headers, opts.nullValue));
	const output: JsonTable | JsonRow[] = opts.arrayOnly
		? rows
		: { name: view.name, headers: view.headers.slice(), rows, count: rows.length };
	return opts.pretty ? JSON.stringify(output, null, opts.indent) : JSON.stringify(output);
}

type SqlType = "string" | "number" | "date" | "boolean";

const SQL_TYPES: Record<SqlDialect, Record<SqlType, string>> = {
	generic: { string: "TEXT", number: "REAL", date: "TEXT", boolean: "INTEGER" },
	sqlite: { string: "TEXT", number: "REAL", date: "TEXT", boolean: "INTEGER" },
	mysql: { string: "VARCHAR(255)", number: "DOUBLE", date: "DATETIME", boolean: "TINYINT(1)" },
	postgresql: { string: "TEXT", number: "NUMERIC", date: "TIMESTAMP", boolean: "BOOLEAN" },
};

/** Identifier with every non-word character replaced by `_`, quoted for the dialect */
export function sqlIdentifier(name: string, dialect: SqlDialect): string {
	const clean = name.replace(/\W/g, "_");
	return dialect === "mysql" ? "`" + clean + "`" : '"' + clean + '"';
}

function sqlString(text: string): string {
	return "'" + text.replace(/'/g, "''") + "'";
}

function sqlValue(cell: Cell | undefined, dialect: SqlDialect): string {
	if (cell === undefined || isEmptyCell(cell)) {
		return "NULL";
	}
	switch (cell.value.type) {
		case "date":
			return sqlString(dateTime(cell.value.value));
		case "number":
			return String(cell.value.value);
		case "boolean":
			if (dialect === "postgresql") {
				return cell.value.value ? "TRUE" : "FALSE";
			}
			return cell.value.value ? "1" : "0";
		case "string":
			return sqlString(cell.value.value);
		case "formula":
		case "empty":
			return sqlString(cell.rawText);
	}
}

/**
 * Column type from the non-empty cells of a column: any string makes it text,
 * then dates, then booleans (only without numbers), then numbers.
 * Columns with nothing to go on are text.
 */
function inferSqlType(table: Table, header: string): SqlType {
	const seen = new Set<string>();
	for (const row of table.rows) {
		const cell = row.values.get(header);
		if (cell !== undefined && !isEmptyCell(cell)) {
			seen.add(cell.value.type);
		}
	}
	if (seen.has("string")) {
		return "string";
	}
	if (seen.has("date")) {
		return "date";
	}
	if (seen.has("boolean") && !seen.has("number")) {
		return "boolean";
	}
	return seen.has("number") ? "number" : "string";
}

function buildInsert(rows: readonly Row[], headers: readonly string[], tableName: string, dialect: SqlDialect): string {
	const columnList = headers.map((h) => sqlIdentifier(h, dialect)).join(", ");
	const groups = rows.map((row) => "(" + headers.map((h) => sqlValue(row.values.get(h), dialect)).join(", ") + ")");
	return `INSERT INTO ${tableName} (${columnList}) VALUES\n${groups.join(",\n")};`;
}

/**
 * Convert a table to SQL: optional DROP TABLE and CREATE TABLE statements,
 * then INSERT statements of `batchSize` rows each.
 *
 * @throws ConfigError when the options are invalid
 */
export function toSql(table: Table, options: SqlOptions = {}): string {
	const opts = parseOptions(sqlOptionsSchema, options);
	const view = exportView(table, opts.columns);
	const tableName = sqlIdentifier(opts.tableName, opts.dialect);
	const parts: string[] = [];

	if (opts.dropTable) {
		parts.push(`DROP TABLE IF EXISTS ${tableName};\n\n`);
	}
	if (opts.createTable) {
		const columns = view.headers.map(
			(h) => `    ${sqlIdentifier(h, opts.dialect)} ${SQL_TYPES[opts.dialect][inferSqlType(view, h)]}`,
		);
		parts.push(`CREATE TABLE ${tableName} (\n${columns.join(",\n")}\n);\n\n`);
	}

	const size = opts.batchSize > 0 ? opts.batchSize : view.rows.length;
	const inserts: string[] = [];
	for (let i = 0; i < view.rows.length; i += size) {
		inserts.push(buildInsert(view.rows.slice(i, i + size), view.headers, tableName, opts.dialect));
	}
	parts.push(inserts.join("\n"));
	return parts.join("");
}
