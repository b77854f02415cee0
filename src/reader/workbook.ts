import type { CellGrid, Sheet, Table, Workbook } from "../types.js";
import type { SheetReader, SpreadsheetSource } from "../source/types.js";
import { resolveConfig, type DetectionConfig, type DetectionConfigInput } from "../config.js";
import { SheetNotFoundError, SheetProcessingError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { TableAnalyzer } from "../grid/analyzer.js";
import { HeaderDetector } from "../grid/header.js";
import { MergeProcessor } from "../grid/merge.js";
import { RowParser } from "../grid/parser.js";
import { loadWorkbookFile } from "../source/exceljs.js";
import { loadSheetGrid } from "./sheet.js";

export interface WorkbookReaderOptions {
	/** Detection settings; omitted fields take their defaults */
	config?: DetectionConfigInput;
	logger?: Logger;
}

export interface ReadOptions {
	/** Process sheets concurrently, one reading handle per sheet */
	parallel?: boolean;
}

/**
 * Turns a spreadsheet source into a {@link Workbook} of detected tables.
 *
 * Sequential and parallel reads produce the same workbook: sheets keep their
 * workbook order and the first failing sheet (by index) fails the whole read.
 */
export class WorkbookReader {
	readonly config: DetectionConfig;
	private readonly logger: Logger;
	private readonly analyzer: TableAnalyzer;
	private readonly headers: HeaderDetector;
	private readonly parser: RowParser;
	private readonly merges: MergeProcessor;

	/** @throws ConfigError for invalid detection settings */
	constructor(options: WorkbookReaderOptions = {}) {
		this.config = resolveConfig(options.config);
		this.logger = options.logger ?? createLogger();
		this.analyzer = new TableAnalyzer(this.config, this.logger);
		this.headers = new HeaderDetector(this.config);
		this.parser = new RowParser();
		this.merges = new MergeProcessor(this.config);
	}

	/** Read every sheet of a source */
	async readWorkbook(source: SpreadsheetSource, options: ReadOptions = {}): Promise<Workbook> {
		const names = source.getSheetNames();
		const sheets =
			options.parallel && names.length > 1
				? await this.readParallel(source, names)
				: await this.readSequential(source, names);
		return { filePath: source.filePath, sheets };
	}

	/**
	 * Read one sheet by name.
	 *
	 * @throws SheetNotFoundError if the source has no such sheet
	 * @throws SheetProcessingError if reading or analyzing the sheet fails
	 */
	async readSheet(source: SpreadsheetSource, sheetName: string): Promise<Sheet> {
		const index = source.getSheetNames().indexOf(sheetName);
		if (index === -1) {
			throw new SheetNotFoundError(sheetName);
		}
		return this.processSheet(source.openReader(), sheetName, index);
	}

	/**
	 * Load an .xlsx file and read every sheet.
	 *
	 * @throws FileLoadError if the file cannot be loaded
	 */
	async readFile(filePath: string, options: ReadOptions = {}): Promise<Workbook> {
		return this.readWorkbook(await loadWorkbookFile(filePath), options);
	}

	/** Detect tables in a merge-aware grid, naming them `<sheet>_Table<n>` */
	extractTables(grid: CellGrid, sheetName: string): Table[] {
		if (grid.length === 0) {
			return [];
		}
		return this.analyzer.detectTables(grid).map((boundary, i) => {
			const headerRow = this.headers.detectHeaderRow(grid, boundary);
			const headers = this.headers.extractHeaders(grid, headerRow, boundary);
			const table = this.parser.parseTable(grid, boundary, headers, headerRow, `${sheetName}_Table${i + 1}`);
			this.logger.debug({ sheet: sheetName, table: table.name, boundary, headerRow, rows: table.rows.length }, "table extracted");
			return table;
		});
	}

	private async readSequential(source: SpreadsheetSource, names: readonly string[]): Promise<Sheet[]> {
		const reader = source.openReader();
		const sheets: Sheet[] = [];
		for (const [index, name] of names.entries()) {
			sheets.push(await this.processSheet(reader, name, index));
		}
		return sheets;
	}

	private async readParallel(source: SpreadsheetSource, names: readonly string[]): Promise<Sheet[]> {
		const outcomes = await Promise.allSettled(names.map((name, index) => this.processSheet(source.openReader(), name, index)));
		const sheets = new Array<Sheet>(outcomes.length);
		for (const [index, outcome] of outcomes.entries()) {
			if (outcome.status === "rejected") {
				throw outcome.reason;
			}
			sheets[index] = outcome.value;
		}
		return sheets;
	}

	private async processSheet(reader: SheetReader, name: string, index: number): Promise<Sheet> {
		try {
			const grid = await loadSheetGrid(reader, name, this.merges);
			const tables = this.extractTables(grid, name);
			this.logger.debug({ sheet: name, index, rows: grid.length, tables: tables.length }, "sheet processed");
			return { name, index, tables };
		} catch (err) {
			throw new SheetProcessingError(name, index, err);
		}
	}
}

export interface ReadWorkbookOptions extends WorkbookReaderOptions, ReadOptions {}

/** Read every sheet of a source with a one-off reader */
export async function readWorkbook(source: SpreadsheetSource, options: ReadWorkbookOptions = {}): Promise<Workbook> {
	return new WorkbookReader(options).readWorkbook(source, options);
}

/** Read one sheet of a source with a one-off reader */
export async function readSheet(source: SpreadsheetSource, sheetName: string, options: WorkbookReaderOptions = {}): Promise<Sheet> {
	return new WorkbookReader(options).readSheet(source, sheetName);
}

/** Load an .xlsx file and read every sheet with a one-off reader */
export async function readFile(filePath: string, options: ReadWorkbookOptions = {}): Promise<Workbook> {
	return new WorkbookReader(options).readFile(filePath, options);
}

/** First table with the given name across all sheets */
export function getTableByName(workbook: Workbook, name: string): Table | undefined {
	for (const sheet of workbook.sheets) {
		const table = sheet.tables.find((t) => t.name === name);
		if (table) {
			return table;
		}
	}
	return undefined;
}

/** All tables of a workbook in sheet order */
export function getAllTables(workbook: Workbook): Table[] {
	return workbook.sheets.flatMap((sheet) => sheet.tables);
}
