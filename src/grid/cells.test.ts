import { describe, it, expect } from "vitest";
import { buildGrid, cellAt, cellText, cloneGrid, createCell, emptyCell, gridWidth, isEmptyCell } from "./cells.js";

describe("createCell", () => {
	it("should type plain strings and keep them as raw text", () => {
		const cell = createCell(1, 2, "Widget");
		expect(cell.value).toEqual({ type: "string", value: "Widget" });
		expect(cell.rawText).toBe("Widget");
		expect(cell.row).toBe(1);
		expect(cell.col).toBe(2);
		expect(cell.isMerged).toBe(false);
		expect(cell.mergeRange).toBeNull();
	});

	it("should type date-looking strings as dates", () => {
		const cell = createCell(0, 0, "2024-05-06");
		expect(cell.value).toEqual({ type: "date", value: new Date(Date.UTC(2024, 4, 6)) });
		expect(cell.rawText).toBe("2024-05-06");
	});

	it("should type numbers, booleans and dates", () => {
		expect(createCell(0, 0, 12.5).value).toEqual({ type: "number", value: 12.5 });
		expect(createCell(0, 0, 12.5).rawText).toBe("12.5");
		expect(createCell(0, 0, true).rawText).toBe("TRUE");
		expect(createCell(0, 0, false).value).toEqual({ type: "boolean", value: false });
		expect(createCell(0, 0, new Date(Date.UTC(2020, 0, 1, 9, 0, 0))).rawText).toBe("2020-01-01 09:00:00");
	});

	it("should read an invalid date as an empty cell", () => {
		expect(createCell(2, 3, new Date(NaN))).toEqual(emptyCell(2, 3));
		expect(buildGrid([["a", new Date("not a date")]])[0]?.[1]?.value).toEqual({ type: "empty" });
	});

	it("should keep formula text and the cached result", () => {
		const cell = createCell(0, 0, { formula: "SUM(A1:A3)", result: 6 });
		expect(cell.value).toEqual({ type: "formula", value: "6" });
		expect(cell.rawText).toBe("6");
		expect(cell.formula).toBe("SUM(A1:A3)");
	});

	it("should treat null, undefined and empty text as empty", () => {
		expect(isEmptyCell(createCell(0, 0, null))).toBe(true);
		expect(isEmptyCell(createCell(0, 0, undefined))).toBe(true);
		expect(isEmptyCell(createCell(0, 0, ""))).toBe(true);
		expect(isEmptyCell(createCell(0, 0, 0))).toBe(false);
	});

	it("should attach comments and hyperlinks", () => {
		const cell = createCell(0, 0, "Docs", { comment: "see wiki", hyperlink: "https://example.com" });
		expect(cell.comment).toBe("see wiki");
		expect(cell.hyperlink).toBe("https://example.com");
	});
});

describe("buildGrid", () => {
	it("should keep jagged rows by default", () => {
		const grid = buildGrid([["a", "b", "c"], ["d"]]);
		expect(grid.map((r) => r.length)).toEqual([3, 1]);
	});

	it("should pad rows when rectangular", () => {
		const grid = buildGrid([["a", "b", "c"], ["d"]], { rectangular: true });
		expect(grid.map((r) => r.length)).toEqual([3, 3]);
		expect(grid[1]?.[2]).toEqual(emptyCell(1, 2));
	});
});

describe("grid access", () => {
	const grid = buildGrid([["a", "b"], ["c"]]);

	it("should return undefined outside the grid", () => {
		expect(cellAt(grid, -1, 0)).toBeUndefined();
		expect(cellAt(grid, 2, 0)).toBeUndefined();
		expect(cellAt(grid, 1, 1)).toBeUndefined();
		expect(cellAt(grid, 0, 1)?.rawText).toBe("b");
	});

	it("should measure the widest row", () => {
		expect(gridWidth(grid)).toBe(2);
		expect(gridWidth([])).toBe(0);
	});

	it("should copy row arrays", () => {
		const copy = cloneGrid(grid);
		copy[0]?.pop();
		expect(grid[0]).toHaveLength(2);
		expect(copy[1]?.[0]).toBe(grid[1]?.[0]);
	});
});

describe("cellText", () => {
	it("should return string values as-is and raw text for other types", () => {
		expect(cellText(createCell(0, 0, "x"))).toBe("x");
		expect(cellText(createCell(0, 0, 3))).toBe("3");
		expect(cellText(createCell(0, 0, null))).toBe("");
	});
});
