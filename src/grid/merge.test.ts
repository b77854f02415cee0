import { describe, it, expect } from "vitest";
import { MergeProcessor, buildMergeMap, findMergeAt, lookupMerge } from "./merge.js";
import { buildGrid } from "./cells.js";
import { resolveConfig } from "../config.js";
import { InvalidReferenceError } from "../errors.js";

describe("MergeProcessor.parse", () => {
	const processor = new MergeProcessor();

	it("should convert corners to zero-based regions", () => {
		expect(processor.parse([{ startCell: "A1", endCell: "C2", value: "Q1" }])).toEqual([
			{ startRow: 0, startCol: 0, endRow: 1, endCol: 2, value: "Q1" },
		]);
	});

	it("should drop single-cell merges", () => {
		expect(processor.parse([{ startCell: "B2", endCell: "B2", value: "x" }])).toEqual([]);
	});

	it("should normalize reversed corners", () => {
		expect(processor.parse([{ startCell: "C3", endCell: "A1", value: "" }])).toEqual([
			{ startRow: 0, startCol: 0, endRow: 2, endCol: 2, value: "" },
		]);
	});

	it("should fail on unparsable corners", () => {
		expect(() => processor.parse([{ startCell: "A1", endCell: "nope", value: "" }])).toThrow(InvalidReferenceError);
	});
});

describe("MergeProcessor.apply", () => {
	it("should spread a horizontal merge across its cells", () => {
		const grid = buildGrid([
			["Header", "", ""],
			["a", "b", "c"],
		]);
		const processor = new MergeProcessor();
		processor.apply(grid, processor.parse([{ startCell: "A1", endCell: "C1", value: "Header" }]));

		const top = grid[0] ?? [];
		expect(top.map((c) => c.rawText)).toEqual(["Header", "Header", "Header"]);
		expect(top.map((c) => c.isMerged)).toEqual([true, true, true]);
		expect(top.map((c) => c.mergeRange?.isOrigin)).toEqual([true, false, false]);
		expect(top[2]?.value).toEqual({ type: "string", value: "Header" });
		expect(top[1]?.mergeRange).toEqual({ startRow: 0, startCol: 0, endRow: 0, endCol: 2, isOrigin: false });
		expect(grid[1]?.every((c) => !c.isMerged)).toBe(true);
	});

	it("should copy the origin's typed value", () => {
		const grid = buildGrid([
			[42, ""],
			["", ""],
		]);
		const processor = new MergeProcessor();
		processor.apply(grid, processor.parse([{ startCell: "A1", endCell: "B2", value: "42" }]));
		expect(grid[1]?.[1]?.value).toEqual({ type: "number", value: 42 });
		expect(grid[1]?.[1]?.rawText).toBe("42");
	});

	it("should only track metadata when expansion is off", () => {
		const grid = buildGrid([["Group", ""]]);
		const processor = new MergeProcessor(resolveConfig({ expandMergedCells: false }));
		processor.apply(grid, processor.parse([{ startCell: "A1", endCell: "B1", value: "Group" }]));
		expect(grid[0]?.[1]?.rawText).toBe("");
		expect(grid[0]?.[1]?.isMerged).toBe(true);
	});

	it("should only expand values when tracking is off", () => {
		const grid = buildGrid([["Group", ""]]);
		const processor = new MergeProcessor(resolveConfig({ trackMergeMetadata: false }));
		processor.apply(grid, processor.parse([{ startCell: "A1", endCell: "B1", value: "Group" }]));
		expect(grid[0]?.[1]?.rawText).toBe("Group");
		expect(grid[0]?.[1]?.isMerged).toBe(false);
		expect(grid[0]?.[1]?.mergeRange).toBeNull();
	});

	it("should leave the grid untouched when both options are off", () => {
		const grid = buildGrid([["Group", ""]]);
		const before = grid[0]?.slice();
		const processor = new MergeProcessor(resolveConfig({ expandMergedCells: false, trackMergeMetadata: false }));
		expect(processor.enabled).toBe(false);
		processor.apply(grid, [{ startRow: 0, startCol: 0, endRow: 0, endCol: 1, value: "Group" }]);
		expect(grid[0]).toEqual(before);
	});

	it("should skip region cells outside the grid", () => {
		const grid = buildGrid([["a", "b"]]);
		const processor = new MergeProcessor();
		processor.apply(grid, [{ startRow: 0, startCol: 1, endRow: 3, endCol: 4, value: "b" }]);
		expect(grid).toHaveLength(1);
		expect(grid[0]).toHaveLength(2);
		expect(grid[0]?.[1]?.mergeRange?.isOrigin).toBe(true);
	});
});

describe("merge lookup", () => {
	const merges = [
		{ startRow: 0, startCol: 0, endRow: 0, endCol: 2, value: "A" },
		{ startRow: 2, startCol: 1, endRow: 3, endCol: 1, value: "B" },
	];

	it("should find the region covering a position", () => {
		const map = buildMergeMap(merges);
		expect(lookupMerge(map, 0, 2)?.value).toBe("A");
		expect(lookupMerge(map, 3, 1)?.value).toBe("B");
		expect(lookupMerge(map, 1, 1)).toBeUndefined();
		expect(findMergeAt(merges, 2, 1)?.value).toBe("B");
		expect(findMergeAt(merges, 2, 2)).toBeUndefined();
	});
});
