import Papa from "papaparse";
import { RowImportError, ValidationError } from "../domain/errors";
import { ExamRecord, ExamStatus, isExamStatus, validateExam } from "../domain/exam";
import { GradeScale } from "../domain/gradeScale";
import { Program, allModules, findSemester } from "../domain/program";
import { IdGenerator, addExam, addModule, addSemester } from "../domain/programEditor";
import { Student } from "../domain/student";
import { StudyModule, sameModuleName, validateModuleFields } from "../domain/studyModule";

/**
 * CSV Importer - best-effort import of exam records.
 *
 * Expected header: module,semester,grade,weight,date,status
 *
 * Each row is parsed column by column into a tagged outcome. Invalid rows are
 * collected as RowImportErrors and never stop the rest of the batch. A missing
 * column is a file-level problem and aborts the whole import.
 *
 * Rows are numbered by their line in the file, counting from the first line
 * after the header. Blank lines are skipped but still counted.
 *
 * Module policy: modules are matched by name (case-insensitive). A module that
 * does not exist yet is created in the row's semester with the configured
 * default credits; the semester is created too when needed. A row naming a
 * module that lives in another semester is rejected.
 */

export const CSV_COLUMNS = ["module", "semester", "grade", "weight", "date", "status"] as const;

export const IMPORTED_EXAM_KIND = "imported";

type RawRow = Record<string, string | undefined>;

export interface NumberedRow {
  row: number;
  raw: RawRow;
}

export interface ParsedExamRow {
  moduleName: string;
  semesterNumber: number;
  grade: number | null;
  weight: number;
  date: string;
  status: ExamStatus;
}

export type RowOutcome =
  | { ok: true; row: number; value: ParsedExamRow }
  | { ok: false; row: number; error: RowImportError };

export interface CsvImportOptions {
  defaultModuleCredits: number;
  newId?: IdGenerator;
}

export interface CsvImportResult {
  total: number;
  imported: number;
  errors: RowImportError[];
  createdModules: string[];
  createdSemesters: number[];
}

function parseNumberCell(value: string, row: number, column: string): number {
  const parsed = Number(value);
  if (value === "" || !Number.isFinite(parsed)) {
    throw new RowImportError(row, `"${value}" is not a number`, column);
  }
  return parsed;
}

/**
 * Parse and validate one data row against the program's grade scale
 */
export function parseExamRow(raw: RawRow, row: number, scale: GradeScale): RowOutcome {
  try {
    const moduleName = raw.module ?? "";
    if (moduleName === "") {
      throw new RowImportError(row, "module name is required", "module");
    }

    const semesterCell = raw.semester ?? "";
    if (!/^\d+$/.test(semesterCell) || Number(semesterCell) < 1) {
      throw new RowImportError(row, `"${semesterCell}" is not a semester number`, "semester");
    }

    const gradeCell = raw.grade ?? "";
    const grade = gradeCell === "" ? null : parseNumberCell(gradeCell, row, "grade");

    const weightCell = raw.weight ?? "";
    const weight = weightCell === "" ? 1 : parseNumberCell(weightCell, row, "weight");

    const statusCell = (raw.status ?? "").toLowerCase();
    let status: ExamStatus;
    if (statusCell === "") {
      status = grade === null ? "scheduled" : "completed";
    } else if (isExamStatus(statusCell)) {
      status = statusCell;
    } else {
      throw new RowImportError(row, `unknown status "${raw.status}"`, "status");
    }

    const candidate: ExamRecord = {
      id: "candidate",
      moduleId: "candidate",
      kind: IMPORTED_EXAM_KIND,
      description: "",
      date: raw.date ?? "",
      grade,
      weight,
      status,
      attempts: 1,
    };
    validateExam(candidate, scale);

    return {
      ok: true,
      row,
      value: { moduleName, semesterNumber: Number(semesterCell), grade, weight, date: candidate.date, status },
    };
  } catch (err) {
    if (err instanceof RowImportError) {
      return { ok: false, row, error: err };
    }
    if (err instanceof ValidationError) {
      return { ok: false, row, error: new RowImportError(row, err.message, err.field) };
    }
    throw err;
  }
}

function isBlankRow(raw: RawRow): boolean {
  return Object.values(raw).every((value) => value === undefined || value === "");
}

/**
 * Parse CSV text into numbered raw rows, checking the header
 */
export function readCsvRows(csvText: string): NumberedRow[] {
  const parsed = Papa.parse<RawRow>(csvText, {
    header: true,
    delimiter: ",",
    skipEmptyLines: false,
    transformHeader: (h) => h.trim().toLowerCase(),
    transform: (v) => v.trim(),
  });

  const headers = parsed.meta.fields ?? [];
  const missing = CSV_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length) {
    throw new ValidationError(`Missing columns: ${missing.join(", ")}`, "header");
  }
  return parsed.data
    .map((raw, index) => ({ row: index + 1, raw }))
    .filter(({ raw }) => !isBlankRow(raw));
}

function assertImportOptions(options: CsvImportOptions): void {
  if (!Number.isFinite(options.defaultModuleCredits) || options.defaultModuleCredits <= 0) {
    throw new ValidationError(
      `Default module credits must be positive, got ${options.defaultModuleCredits}`,
      "defaultModuleCredits"
    );
  }
}

/**
 * Import exam rows into the student's program
 */
export function importExamsCsv(
  student: Student,
  csvText: string,
  options: CsvImportOptions
): CsvImportResult {
  assertImportOptions(options);
  const program = student.program;
  const rows = readCsvRows(csvText);
  const result: CsvImportResult = {
    total: rows.length,
    imported: 0,
    errors: [],
    createdModules: [],
    createdSemesters: [],
  };

  for (const { raw, row } of rows) {
    const outcome = parseExamRow(raw, row, program.gradeScale);
    if (!outcome.ok) {
      result.errors.push(outcome.error);
      continue;
    }

    try {
      importRow(program, outcome.value, options, result);
      result.imported++;
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      result.errors.push(new RowImportError(row, err.message, err.field));
    }
  }

  return result;
}

/**
 * Add one parsed row to the program, creating its module and semester when
 * needed. Throws ValidationError before touching the program.
 */
function importRow(
  program: Program,
  value: ParsedExamRow,
  options: CsvImportOptions,
  result: CsvImportResult
): void {
  const existing = allModules(program).find(({ module }) => sameModuleName(module.name, value.moduleName));
  if (existing && existing.semester.number !== value.semesterNumber) {
    throw new ValidationError(
      `module "${existing.module.name}" belongs to semester ${existing.semester.number}`,
      "semester"
    );
  }

  let module: StudyModule;
  if (existing) {
    module = existing.module;
  } else {
    const moduleInput = { name: value.moduleName, credits: options.defaultModuleCredits };
    validateModuleFields(moduleInput);
    if (!findSemester(program, value.semesterNumber)) {
      addSemester(program, { number: value.semesterNumber });
      result.createdSemesters.push(value.semesterNumber);
    }
    module = addModule(program, value.semesterNumber, moduleInput, options.newId);
    result.createdModules.push(module.name);
  }

  addExam(
    program,
    module.id,
    {
      kind: IMPORTED_EXAM_KIND,
      date: value.date,
      grade: value.grade,
      weight: value.weight,
      status: value.status,
    },
    options.newId
  );
}
