import { describe, it, expect } from "vitest";
import {
	analyzeColumns,
	deduplicate,
	filterTable,
	findDuplicateGroups,
	findDuplicates,
	renameColumns,
	reorderColumns,
	selectColumns,
} from "./table.js";
import { RowParser } from "../grid/parser.js";
import { buildGrid, type CellInput } from "../grid/cells.js";
import { resolveConfig } from "../config.js";
import { DuplicateColumnError } from "../errors.js";
import type { Table } from "../types.js";

function makeTable(rows: CellInput[][]): Table {
	const grid = buildGrid(rows, { rectangular: true });
	const headers = (grid[0] ?? []).map((c) => c.rawText);
	const boundary = { startRow: 0, endRow: grid.length - 1, startCol: 0, endCol: headers.length - 1 };
	return new RowParser().parseTable(grid, boundary, headers, 0, "T");
}

const texts = (table: Table, column: string): (string | undefined)[] => table.rows.map((r) => r.values.get(column)?.rawText);

const people = makeTable([
	["ID", "Name", "City"],
	["1", "Ann", "Oslo"],
	["2", "Ben", "Rome"],
	["1", "Ann B", "Oslo"],
	["3", "Cy", "Rome"],
	["2", "Ben", "Lima"],
]);

describe("filterTable", () => {
	it("should keep matching rows and leave the source alone", () => {
		const romans = filterTable(people, (r) => r.values.get("City")?.rawText === "Rome");
		expect(texts(romans, "Name")).toEqual(["Ben", "Cy"]);
		expect(romans.headers).toEqual(["ID", "Name", "City"]);
		expect(people.rows).toHaveLength(5);
	});
});

describe("selectColumns", () => {
	it("should use the given column order and ignore unknown names", () => {
		const t = selectColumns(people, ["City", "ID", "Nope", "City"]);
		expect(t.headers).toEqual(["City", "ID"]);
		expect(t.rows[0]?.cells.map((c) => c.rawText)).toEqual(["Oslo", "1"]);
		expect(t.rows[0]?.values.has("Name")).toBe(false);
	});
});

describe("reorderColumns", () => {
	it("should use the given order and drop other columns", () => {
		const t = reorderColumns(people, ["City", "ID", "City", "Nope"]);
		expect(t.headers).toEqual(["City", "ID"]);
		expect(t.rows[1]?.cells.map((c) => c.rawText)).toEqual(["Rome", "2"]);
	});
});

describe("renameColumns", () => {
	it("should rename headers and row keys", () => {
		const t = renameColumns(people, { Name: "Person", Missing: "X" });
		expect(t.headers).toEqual(["ID", "Person", "City"]);
		expect(t.rows[0]?.values.get("Person")?.rawText).toBe("Ann");
		expect(t.rows[0]?.values.has("Name")).toBe(false);
		expect(people.headers).toEqual(["ID", "Name", "City"]);
	});

	it("should reject a rename onto an existing column", () => {
		const t = makeTable([["A", "B"], ["1", "2"]]);
		expect(() => renameColumns(t, { A: "B" })).toThrow(DuplicateColumnError);
		expect(() => renameColumns(t, { A: "B" })).toThrow("column 'B' would appear more than once");
	});

	it("should reject two columns renamed to the same name", () => {
		expect(() => renameColumns(people, { ID: "Key", City: "Key" })).toThrow(DuplicateColumnError);
	});

	it("should allow swapping two names", () => {
		const t = renameColumns(makeTable([["A", "B"], ["1", "2"]]), { A: "B", B: "A" });
		expect(t.headers).toEqual(["B", "A"]);
		expect(t.rows[0]?.values.get("B")?.rawText).toBe("1");
		expect(t.rows[0]?.values.get("A")?.rawText).toBe("2");
	});

	it("should not treat inherited properties as mappings", () => {
		const t = renameColumns(makeTable([["toString", "b"], ["1", "2"]]), {});
		expect(t.headers).toEqual(["toString", "b"]);
	});
});

describe("duplicates", () => {
	it("should list later occurrences of a key", () => {
		expect(findDuplicates(people, "ID").map((r) => r.sourceRow)).toEqual([3, 5]);
	});

	it("should keep the first row of each key", () => {
		expect(texts(deduplicate(people, "ID"), "Name")).toEqual(["Ann", "Ben", "Cy"]);
	});

	it("should drop every row when the key column is unknown", () => {
		expect(deduplicate(people, "Nope").rows).toEqual([]);
		expect(findDuplicates(people, "Nope")).toEqual([]);
	});

	it("should group rows sharing a key in order of first occurrence", () => {
		const groups = findDuplicateGroups(people, "City");
		expect(groups.map((g) => [g.keyValue, g.count])).toEqual([
			["Oslo", 2],
			["Rome", 2],
		]);
		expect(groups[1]?.rows.map((r) => r.sourceRow)).toEqual([2, 4]);
	});
});

describe("analyzeColumns", () => {
	const table = makeTable([
		["Qty", "Label", "When", "Mixed"],
		[3, "a", "2024-01-01", 1],
		[5, "b", "2024-01-02", "x"],
		[null, "a", "", "y"],
		[10, "c", "2024-01-04", true],
	]);
	const [qty, label, when, mixed] = analyzeColumns(table);

	it("should count numeric cells and summarize them", () => {
		expect(qty?.inferredType).toBe("number");
		expect(qty?.numberCount).toBe(3);
		expect(qty?.emptyCount).toBe(1);
		expect(qty?.totalCount).toBe(4);
		expect(qty?.numeric).toEqual({ min: 3, max: 10, sum: 18, avg: 6 });
		expect(qty?.consistency).toBe(1);
		expect(qty?.isConsistent).toBe(true);
	});

	it("should count unique values and sample them in order", () => {
		expect(label?.inferredType).toBe("string");
		expect(label?.uniqueCount).toBe(3);
		expect(label?.sampleValues).toEqual(["a", "b", "c"]);
		expect(label?.numeric).toBeNull();
	});

	it("should recognize date text", () => {
		expect(when?.inferredType).toBe("date");
		expect(when?.dateCount).toBe(3);
		expect(when?.emptyCount).toBe(1);
	});

	it("should mark mixed columns inconsistent", () => {
		expect(mixed?.inferredType).toBe("string");
		expect(mixed?.stringCount).toBe(2);
		expect(mixed?.numberCount).toBe(1);
		expect(mixed?.booleanCount).toBe(1);
		expect(mixed?.consistency).toBe(0.5);
		expect(mixed?.isConsistent).toBe(false);
	});

	it("should use the configured consistency threshold", () => {
		const loose = analyzeColumns(table, resolveConfig({ columnConsistency: 0.5 }));
		expect(loose[3]?.isConsistent).toBe(true);
	});

	it("should resolve ties toward strings", () => {
		const [tie] = analyzeColumns(makeTable([["T"], ["a"], [1]]));
		expect(tie?.inferredType).toBe("string");
	});

	it("should report empty columns", () => {
		const [blank] = analyzeColumns(makeTable([["E", "F"], ["", "x"]]));
		expect(blank?.inferredType).toBe("empty");
		expect(blank?.consistency).toBe(0);
		expect(blank?.isConsistent).toBe(false);
	});
});
