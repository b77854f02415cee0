import { describe, it, expect } from "vitest";
import {
	decodeCell,
	encodeCell,
	decodeRange,
	encodeRange,
	decodeCol,
	encodeCol,
	decodeRow,
	encodeRow,
	splitSheetReference,
	quoteSheetName,
} from "./cell.js";
import { InvalidReferenceError } from "../errors.js";

describe("decodeCol / encodeCol", () => {
	it("should decode single and multi-letter columns", () => {
		expect(decodeCol("A")).toBe(0);
		expect(decodeCol("Z")).toBe(25);
		expect(decodeCol("AA")).toBe(26);
		expect(decodeCol("BA")).toBe(52);
	});

	it("should strip the $ marker and ignore case", () => {
		expect(decodeCol("$C")).toBe(2);
		expect(decodeCol("ab")).toBe(27);
	});

	it("should encode column indexes", () => {
		expect(encodeCol(0)).toBe("A");
		expect(encodeCol(25)).toBe("Z");
		expect(encodeCol(26)).toBe("AA");
		expect(encodeCol(701)).toBe("ZZ");
		expect(encodeCol(702)).toBe("AAA");
	});

	it("should throw for negative column index", () => {
		expect(() => encodeCol(-1)).toThrow("invalid column -1");
	});
});

describe("decodeRow / encodeRow", () => {
	it("should convert between 1-based strings and 0-based indexes", () => {
		expect(decodeRow("1")).toBe(0);
		expect(decodeRow("$5")).toBe(4);
		expect(encodeRow(0)).toBe("1");
		expect(encodeRow(99)).toBe("100");
	});
});

describe("decodeCell / encodeCell", () => {
	it("should decode A1 references", () => {
		expect(decodeCell("A1")).toEqual({ row: 0, col: 0 });
		expect(decodeCell("B3")).toEqual({ row: 2, col: 1 });
		expect(decodeCell("AB12")).toEqual({ row: 11, col: 27 });
	});

	it("should accept absolute markers and surrounding whitespace", () => {
		expect(decodeCell("$C$4")).toEqual({ row: 3, col: 2 });
		expect(decodeCell(" d7 ")).toEqual({ row: 6, col: 3 });
	});

	it("should reject malformed references", () => {
		expect(() => decodeCell("")).toThrow(InvalidReferenceError);
		expect(() => decodeCell("A")).toThrow(InvalidReferenceError);
		expect(() => decodeCell("12")).toThrow(InvalidReferenceError);
		expect(() => decodeCell("A0")).toThrow(InvalidReferenceError);
		expect(() => decodeCell("A1:B2")).toThrow("invalid cell reference 'A1:B2'");
	});

	it("should carry the offending reference on the error", () => {
		try {
			decodeCell("??");
			expect.fail("decodeCell should have thrown");
		} catch (err) {
			expect(err).toBeInstanceOf(InvalidReferenceError);
			expect(err instanceof InvalidReferenceError && err.reference).toBe("??");
		}
	});

	it("should encode addresses", () => {
		expect(encodeCell({ row: 0, col: 0 })).toBe("A1");
		expect(encodeCell({ row: 2, col: 1 })).toBe("B3");
		expect(encodeCell({ row: 0, col: 26 })).toBe("AA1");
	});
});

describe("decodeRange / encodeRange", () => {
	it("should decode a range", () => {
		expect(decodeRange("A1:C5")).toEqual({ start: { row: 0, col: 0 }, end: { row: 4, col: 2 } });
	});

	it("should decode a single cell as a one-cell range", () => {
		expect(decodeRange("B2")).toEqual({ start: { row: 1, col: 1 }, end: { row: 1, col: 1 } });
	});

	it("should keep corners in the order written", () => {
		expect(decodeRange("C3:A1")).toEqual({ start: { row: 2, col: 2 }, end: { row: 0, col: 0 } });
	});

	it("should encode ranges and collapse single cells", () => {
		expect(encodeRange({ start: { row: 0, col: 0 }, end: { row: 4, col: 2 } })).toBe("A1:C5");
		expect(encodeRange({ start: { row: 0, col: 0 }, end: { row: 0, col: 0 } })).toBe("A1");
	});
});

describe("splitSheetReference", () => {
	it("should split plain sheet references", () => {
		expect(splitSheetReference("Sheet1!$A$1:$B$10")).toEqual({ sheetName: "Sheet1", range: "$A$1:$B$10" });
	});

	it("should unquote quoted sheet names", () => {
		expect(splitSheetReference("'My Sheet'!A1:B2")).toEqual({ sheetName: "My Sheet", range: "A1:B2" });
		expect(splitSheetReference("'Bob''s'!A1")).toEqual({ sheetName: "Bob's", range: "A1" });
	});

	it("should drop a leading formula marker", () => {
		expect(splitSheetReference("=Data!A1:C3")).toEqual({ sheetName: "Data", range: "A1:C3" });
	});

	it("should return null without a sheet name", () => {
		expect(splitSheetReference("A1:B2")).toBeNull();
		expect(splitSheetReference("!A1")).toBeNull();
	});
});

describe("quoteSheetName", () => {
	it("should leave simple names alone", () => {
		expect(quoteSheetName("Sheet1")).toBe("Sheet1");
	});

	it("should quote names with spaces or quotes", () => {
		expect(quoteSheetName("My Sheet")).toBe("'My Sheet'");
		expect(quoteSheetName("Bob's")).toBe("'Bob''s'");
	});

	it("should reject empty names", () => {
		expect(() => quoteSheetName("")).toThrow("empty sheet name");
	});

	it("should quote names that splitSheetReference reads back", () => {
		const ref = quoteSheetName("Q1 Sales") + "!A1:B2";
		expect(splitSheetReference(ref)).toEqual({ sheetName: "Q1 Sales", range: "A1:B2" });
	});
});
