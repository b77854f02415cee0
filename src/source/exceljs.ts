import { stat } from "node:fs/promises";
import { extname } from "node:path";
import ExcelJS from "exceljs";
import type { Cell as ExcelCell, Workbook as ExcelWorkbook, Worksheet } from "exceljs";
import { GLOBAL_SCOPE, type Cell, type CellGrid, type NamedRange } from "../types.js";
import type { RawMergeRegion, SheetReader, SpreadsheetSource } from "./types.js";
import { FileLoadError, SheetNotFoundError } from "../errors.js";
import { createCell, emptyCell, scalarText, type CellExtras, type CellInput } from "../grid/cells.js";

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !(v instanceof Date);
}

/** Text of a rich-text run list */
function richText(runs: unknown): string {
	if (!Array.isArray(runs)) {
		return "";
	}
	let text = "";
	for (const run of runs) {
		if (isRecord(run) && typeof run["text"] === "string") {
			text += run["text"];
		}
	}
	return text;
}

/** Display text of a formula's cached result */
function resultText(result: unknown): string {
	if (result instanceof Date || typeof result === "string" || typeof result === "number" || typeof result === "boolean") {
		return scalarText(result);
	}
	if (isRecord(result) && typeof result["error"] === "string") {
		return result["error"];
	}
	return "";
}

/** Convert an ExcelJS cell into grid input; the second element is a hyperlink target, if any */
function readInput(cell: ExcelCell): [CellInput, string | null] {
	const v: unknown = cell.value;
	if (v == null) {
		return [null, null];
	}
	if (v instanceof Date || typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
		return [v, null];
	}
	if (!isRecord(v)) {
		return [String(v), null];
	}
	if ("formula" in v || "sharedFormula" in v) {
		return [{ formula: cell.formula, result: resultText(v["result"]) }, null];
	}
	if ("richText" in v) {
		return [richText(v["richText"]), null];
	}
	if (typeof v["hyperlink"] === "string") {
		const text = v["text"];
		return [typeof text === "string" ? text : richText(isRecord(text) ? text["richText"] : undefined), v["hyperlink"]];
	}
	if (typeof v["error"] === "string") {
		return [v["error"], null];
	}
	return [String(v), null];
}

/** Note text of a cell: plain string notes or the concatenated runs of a rich note */
function readNote(cell: ExcelCell): string | null {
	const note: unknown = cell.note;
	if (typeof note === "string") {
		return note === "" ? null : note;
	}
	if (isRecord(note)) {
		const text = richText(note["texts"]);
		return text === "" ? null : text;
	}
	return null;
}

function isMergeFollower(cell: ExcelCell): boolean {
	return cell.isMerged && cell.master.address !== cell.address;
}

/** Strip an optional sheet prefix and absolute markers from a range like "Sheet1!$A$1:$C$1" */
function plainRange(range: string): string {
	const bang = range.lastIndexOf("!");
	return (bang >= 0 ? range.slice(bang + 1) : range).replace(/\$/g, "");
}

class ExcelJsSheetReader implements SheetReader {
	constructor(private readonly workbook: ExcelWorkbook) {}

	private worksheet(name: string): Worksheet {
		const ws: Worksheet | undefined = this.workbook.getWorksheet(name);
		if (ws === undefined) {
			throw new SheetNotFoundError(name);
		}
		return ws;
	}

	async readSheetGrid(sheetName: string): Promise<CellGrid> {
		const ws = this.worksheet(sheetName);
		const rowCount = ws.rowCount;
		const colCount = ws.columnCount;
		const grid: CellGrid = [];
		for (let r = 0; r < rowCount; ++r) {
			const row = ws.getRow(r + 1);
			const cells: Cell[] = [];
			for (let c = 0; c < colCount; ++c) {
				const cell = row.getCell(c + 1);
				if (isMergeFollower(cell)) {
					cells.push(emptyCell(r, c));
					continue;
				}
				const [input, hyperlink] = readInput(cell);
				const extras: CellExtras = { comment: readNote(cell), hyperlink };
				cells.push(createCell(r, c, input, extras));
			}
			grid.push(cells);
		}
		return grid;
	}

	async getMergeRegions(sheetName: string): Promise<RawMergeRegion[]> {
		const ws = this.worksheet(sheetName);
		const merges: RawMergeRegion[] = [];
		for (const range of ws.model.merges ?? []) {
			const [startCell = "", endCell = startCell] = plainRange(range).split(":");
			const [input] = readInput(ws.getCell(startCell));
			const value = createCell(0, 0, input).rawText;
			merges.push({ startCell, endCell, value });
		}
		return merges;
	}
}

/** Spreadsheet source backed by an ExcelJS workbook */
export class ExcelJsSource implements SpreadsheetSource {
	constructor(
		private readonly workbook: ExcelWorkbook,
		readonly filePath: string = "",
	) {}

	getSheetNames(): string[] {
		return this.workbook.worksheets.map((ws) => ws.name);
	}

	/**
	 * Defined names of the workbook. ExcelJS keeps no sheet scope for names,
	 * so every name is reported as workbook-global; a name spanning several
	 * areas is reported with its first area.
	 */
	getDefinedNames(): NamedRange[] {
		const names: NamedRange[] = [];
		for (const entry of this.workbook.definedNames.model) {
			const refersTo = entry.ranges[0];
			if (refersTo !== undefined) {
				names.push({ name: entry.name, refersTo, scope: GLOBAL_SCOPE });
			}
		}
		return names;
	}

	openReader(): SheetReader {
		return new ExcelJsSheetReader(this.workbook);
	}
}

/** Load an .xlsx buffer */
export async function loadWorkbookBuffer(buffer: ArrayBuffer, filePath = ""): Promise<ExcelJsSource> {
	const workbook = new ExcelJS.Workbook();
	try {
		await workbook.xlsx.load(buffer);
	} catch (err) {
		throw new FileLoadError(filePath, "unreadable", { cause: err });
	}
	return new ExcelJsSource(workbook, filePath);
}

/**
 * Load an .xlsx file from disk.
 *
 * @throws FileLoadError when the file is missing, empty, not an .xlsx file, or cannot be parsed
 */
export async function loadWorkbookFile(filePath: string): Promise<ExcelJsSource> {
	const stats = await stat(filePath).catch((err: unknown) => {
		throw new FileLoadError(filePath, "not_found", { cause: err });
	});
	if (!stats.isFile()) {
		throw new FileLoadError(filePath, "not_found");
	}
	if (stats.size === 0) {
		throw new FileLoadError(filePath, "empty");
	}
	if (extname(filePath).toLowerCase() !== ".xlsx") {
		throw new FileLoadError(filePath, "invalid_format");
	}

	const workbook = new ExcelJS.Workbook();
	try {
		await workbook.xlsx.readFile(filePath);
	} catch (err) {
		throw new FileLoadError(filePath, "unreadable", { cause: err });
	}
	return new ExcelJsSource(workbook, filePath);
}
