/**
 * Library entry point
 */

export * from "./domain/errors";
export * from "./domain/dates";
export * from "./domain/gradeScale";
export * from "./domain/exam";
export * from "./domain/studyModule";
export * from "./domain/semester";
export * from "./domain/program";
export * from "./domain/student";
export * from "./domain/programEditor";
export * from "./domain/analytics";
export * from "./domain/projection";
export * from "./domain/format";

export { serializeRecord, toSnapshot } from "./stores/recordSnapshot";
export type { StoredStudent } from "./stores/recordSnapshot";
export { loadRecord, parseRecord } from "./loaders/recordLoader";
export { RecordStore } from "./stores/recordStore";
export { CSV_COLUMNS, importExamsCsv, parseExamRow, readCsvRows } from "./loaders/csvImporter";
export type { CsvImportOptions, CsvImportResult, ParsedExamRow, RowOutcome } from "./loaders/csvImporter";
export { exportExamsCsv, writeExamsCsv } from "./services/csvExporter";
export { buildProgressReport } from "./services/progressReport";
export type { ProgressReport } from "./services/progressReport";
export { buildProgressWorkbook, writeProgressWorkbook } from "./services/progressWorkbook";
export { RecordContext } from "./services/recordContext";
export { StudyRecordService } from "./services/studyRecordService";
export { loadConfig } from "./config/config";
export type { AppConfig } from "./config/config";
