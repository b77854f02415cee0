// sheet-tables - table detection for spreadsheet grids
// Public API

// Types
export type {
	CellType,
	CellValue,
	MergeRange,
	Cell,
	CellGrid,
	TableBoundary,
	Row,
	Table,
	Sheet,
	Workbook,
	NamedRange,
	ColumnStats,
	CellDiff,
	RowDiff,
	DiffResult,
} from "./types.js";
export { GLOBAL_SCOPE } from "./types.js";

// Configuration, errors, logging
export { detectionConfigSchema, resolveConfig, DEFAULT_CONFIG } from "./config.js";
export type { DetectionConfig, DetectionConfigInput } from "./config.js";
export {
	SheetTablesError,
	ConfigError,
	InvalidReferenceError,
	SheetNotFoundError,
	NamedRangeNotFoundError,
	InvalidBoundaryError,
	DuplicateColumnError,
	FileLoadError,
	SheetProcessingError,
} from "./errors.js";
export type { FileLoadReason } from "./errors.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Reading
export {
	WorkbookReader,
	readWorkbook,
	readSheet,
	readFile,
	getTableByName,
	getAllTables,
} from "./reader/workbook.js";
export type { WorkbookReaderOptions, ReadOptions, ReadWorkbookOptions } from "./reader/workbook.js";
export {
	NamedRangeReader,
	parseRangeReference,
	getNamedRangeByName,
	getNamedRangesByScope,
	getGlobalNamedRanges,
} from "./reader/named-range.js";
export type { NamedRangeReaderOptions, RangeReference } from "./reader/named-range.js";
export { loadSheetGrid } from "./reader/sheet.js";

// Spreadsheet sources
export type { SpreadsheetSource, SheetReader } from "./source/types.js";
export { MemorySource } from "./source/memory.js";
export type { MemorySheet, MemoryWorkbook } from "./source/memory.js";
export { ExcelJsSource, loadWorkbookFile, loadWorkbookBuffer } from "./source/exceljs.js";

// Detection stages
export { MergeProcessor, buildMergeMap, lookupMerge, findMergeAt } from "./grid/merge.js";
export type { RawMergeRegion, MergeRegion } from "./grid/merge.js";
export { TableAnalyzer, boundariesOverlap, unionBoundaries, mergeOverlappingRegions } from "./grid/analyzer.js";
export { HeaderDetector, PLACEHOLDER_PREFIX, placeholderName } from "./grid/header.js";
export type { HeaderBand } from "./grid/header.js";
export { RowParser, getRowCell, filterRows, mapRows, getColumnValues } from "./grid/parser.js";
export {
	createCell,
	emptyCell,
	buildGrid,
	isEmptyCell,
	cellText,
	cellAt,
	gridWidth,
	cloneGrid,
	isMergeOrigin,
} from "./grid/cells.js";
export type { CellInput, FormulaInput, CellExtras } from "./grid/cells.js";

// Table transforms and statistics
export {
	filterTable,
	selectColumns,
	renameColumns,
	reorderColumns,
	findDuplicates,
	deduplicate,
	findDuplicateGroups,
	analyzeColumns,
} from "./model/table.js";
export type { DuplicateGroup } from "./model/table.js";
export { diffTables, hasChanges, totalChanges } from "./model/diff.js";
export { groupBy, aggregate, aggregationName, formatAggregate, sum, count, avg, min, max } from "./model/aggregate.js";
export type { AggregateOp, Aggregation, TableGroup } from "./model/aggregate.js";

// Export
export {
	toCsv,
	toTsv,
	toJson,
	toJsonRows,
	toSql,
	sqlIdentifier,
	csvOptionsSchema,
	jsonOptionsSchema,
	sqlOptionsSchema,
} from "./model/export.js";
export type { CsvOptions, JsonOptions, SqlOptions, SqlDialect, JsonCellValue, JsonRow, JsonTable } from "./model/export.js";

// Cell utilities
export {
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
} from "./utils/cell.js";
export type { CellAddress, CellRange } from "./utils/cell.js";
export { parseDateText, formatDateText } from "./utils/date.js";

// Version
export const version = "0.1.0";
