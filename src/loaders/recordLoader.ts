import { MalformedStoreError, ValidationError } from "../domain/errors";
import { ExamRecord, isExamStatus, validateExam } from "../domain/exam";
import { GradeScale, validateGradeScale } from "../domain/gradeScale";
import { Program, validateProgramSettings } from "../domain/program";
import { Semester, isSemesterStatus, validateSemesterFields } from "../domain/semester";
import { Student, validateStudentIdentity } from "../domain/student";
import { StudyModule, validateModuleFields } from "../domain/studyModule";

/**
 * Record Loader - turns a stored record back into a validated Student graph.
 *
 * Inverse of serializeRecord(). The loader is all-or-nothing: the first
 * problem aborts with a MalformedStoreError naming the offending path
 * (e.g. "program.semesters[0].modules[1].credits"), and no partial graph
 * is ever returned.
 *
 * Every key of the stored format is required; unknown keys are rejected.
 */

const ROOT_PATH = "(root)";

const STUDENT_KEYS = [
  "id", "firstName", "lastName", "studentNumber", "email", "dateOfBirth", "enrolledOn", "focus", "program",
] as const;
const PROGRAM_KEYS = ["name", "totalCreditsRequired", "targetAverage", "gradeScale", "semesters"] as const;
const SCALE_KEYS = ["best", "worst", "passingGrade"] as const;
const SEMESTER_KEYS = [
  "number", "label", "startDate", "endDate", "recommendedCredits", "status", "modules",
] as const;
const MODULE_KEYS = ["id", "code", "name", "description", "credits", "exams"] as const;
const EXAM_KEYS = ["id", "kind", "description", "date", "grade", "weight", "status", "attempts"] as const;

// ============================================
// Path-aware readers
// ============================================

function child(path: string, key: string): string {
  return path === ROOT_PATH ? key : `${path}.${key}`;
}

function item(path: string, index: number): string {
  return `${path}[${index}]`;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check that `value` is an object with exactly the expected keys
 */
function readObject(value: unknown, path: string, keys: readonly string[]): Record<string, unknown> {
  if (!isJsonObject(value)) {
    throw new MalformedStoreError(path, `expected an object, got ${describeType(value)}`);
  }
  for (const key of keys) {
    if (!(key in value)) {
      throw new MalformedStoreError(child(path, key), "missing required field");
    }
  }
  for (const key of Object.keys(value)) {
    if (!keys.includes(key)) {
      throw new MalformedStoreError(child(path, key), "unknown field");
    }
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new MalformedStoreError(path, `expected a string, got ${describeType(value)}`);
  }
  return value;
}

function readId(value: unknown, path: string): string {
  const id = readString(value, path);
  if (id.trim() === "") {
    throw new MalformedStoreError(path, "id must not be empty");
  }
  return id;
}

function readNullableString(value: unknown, path: string): string | null {
  return value === null ? null : readString(value, path);
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedStoreError(path, `expected a number, got ${describeType(value)}`);
  }
  return value;
}

function readNullableNumber(value: unknown, path: string): number | null {
  return value === null ? null : readNumber(value, path);
}

function readArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedStoreError(path, `expected an array, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Run a domain validator, reporting its ValidationError at the stored path
 */
function checkInvariants(path: string, validate: () => void): void {
  try {
    validate();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new MalformedStoreError(err.field ? child(path, err.field) : path, err.message);
    }
    throw err;
  }
}

// ============================================
// Entity readers
// ============================================

function readExam(value: unknown, path: string, moduleId: string, scale: GradeScale): ExamRecord {
  const fields = readObject(value, path, EXAM_KEYS);
  const status = readString(fields.status, child(path, "status"));
  if (!isExamStatus(status)) {
    throw new MalformedStoreError(child(path, "status"), `unknown exam status "${status}"`);
  }

  const exam: ExamRecord = {
    id: readId(fields.id, child(path, "id")),
    moduleId,
    kind: readString(fields.kind, child(path, "kind")),
    description: readString(fields.description, child(path, "description")),
    date: readString(fields.date, child(path, "date")),
    grade: readNullableNumber(fields.grade, child(path, "grade")),
    weight: readNumber(fields.weight, child(path, "weight")),
    status,
    attempts: readNumber(fields.attempts, child(path, "attempts")),
  };
  checkInvariants(path, () => validateExam(exam, scale));
  return exam;
}

function readModule(value: unknown, path: string, scale: GradeScale): StudyModule {
  const fields = readObject(value, path, MODULE_KEYS);
  const id = readId(fields.id, child(path, "id"));

  const module: StudyModule = {
    id,
    code: readString(fields.code, child(path, "code")),
    name: readString(fields.name, child(path, "name")),
    description: readString(fields.description, child(path, "description")),
    credits: readNumber(fields.credits, child(path, "credits")),
    exams: [],
  };
  checkInvariants(path, () => validateModuleFields(module));

  const examsPath = child(path, "exams");
  module.exams = readArray(fields.exams, examsPath).map((exam, i) =>
    readExam(exam, item(examsPath, i), id, scale)
  );
  return module;
}

function readSemester(value: unknown, path: string, scale: GradeScale): Semester {
  const fields = readObject(value, path, SEMESTER_KEYS);
  const status = readString(fields.status, child(path, "status"));
  if (!isSemesterStatus(status)) {
    throw new MalformedStoreError(child(path, "status"), `unknown semester status "${status}"`);
  }

  const semester: Semester = {
    number: readNumber(fields.number, child(path, "number")),
    label: readString(fields.label, child(path, "label")),
    startDate: readNullableString(fields.startDate, child(path, "startDate")),
    endDate: readNullableString(fields.endDate, child(path, "endDate")),
    recommendedCredits: readNumber(fields.recommendedCredits, child(path, "recommendedCredits")),
    status,
    modules: [],
  };
  checkInvariants(path, () => validateSemesterFields(semester));

  const modulesPath = child(path, "modules");
  semester.modules = readArray(fields.modules, modulesPath).map((module, i) =>
    readModule(module, item(modulesPath, i), scale)
  );
  return semester;
}

function readGradeScale(value: unknown, path: string): GradeScale {
  const fields = readObject(value, path, SCALE_KEYS);
  const scale: GradeScale = {
    best: readNumber(fields.best, child(path, "best")),
    worst: readNumber(fields.worst, child(path, "worst")),
    passingGrade: readNumber(fields.passingGrade, child(path, "passingGrade")),
  };
  checkInvariants(path, () => validateGradeScale(scale));
  return scale;
}

/**
 * Ids, semester numbers and module names must be unique across the program
 */
function checkUniqueness(program: Program, path: string): void {
  const semesterNumbers = new Set<number>();
  const moduleIds = new Set<string>();
  const moduleNames = new Set<string>();
  const examIds = new Set<string>();
  let previousNumber = 0;

  program.semesters.forEach((semester, s) => {
    const semesterPath = item(child(path, "semesters"), s);
    if (semesterNumbers.has(semester.number)) {
      throw new MalformedStoreError(child(semesterPath, "number"), `duplicate semester number ${semester.number}`);
    }
    if (semester.number < previousNumber) {
      throw new MalformedStoreError(child(semesterPath, "number"), "semesters must be listed in ascending order");
    }
    semesterNumbers.add(semester.number);
    previousNumber = semester.number;

    semester.modules.forEach((module, m) => {
      const modulePath = item(child(semesterPath, "modules"), m);
      if (moduleIds.has(module.id)) {
        throw new MalformedStoreError(child(modulePath, "id"), `duplicate module id "${module.id}"`);
      }
      const name = module.name.trim().toLowerCase();
      if (moduleNames.has(name)) {
        throw new MalformedStoreError(child(modulePath, "name"), `duplicate module name "${module.name}"`);
      }
      moduleIds.add(module.id);
      moduleNames.add(name);

      module.exams.forEach((exam, e) => {
        if (examIds.has(exam.id)) {
          const examPath = item(child(modulePath, "exams"), e);
          throw new MalformedStoreError(child(examPath, "id"), `duplicate exam id "${exam.id}"`);
        }
        examIds.add(exam.id);
      });
    });
  });
}

function readProgram(value: unknown, path: string): Program {
  const fields = readObject(value, path, PROGRAM_KEYS);
  const gradeScale = readGradeScale(fields.gradeScale, child(path, "gradeScale"));

  const program: Program = {
    name: readString(fields.name, child(path, "name")),
    totalCreditsRequired: readNumber(fields.totalCreditsRequired, child(path, "totalCreditsRequired")),
    targetAverage: readNumber(fields.targetAverage, child(path, "targetAverage")),
    gradeScale,
    semesters: [],
  };
  checkInvariants(path, () => validateProgramSettings(program));

  const semestersPath = child(path, "semesters");
  program.semesters = readArray(fields.semesters, semestersPath).map((semester, i) =>
    readSemester(semester, item(semestersPath, i), gradeScale)
  );
  checkUniqueness(program, path);
  return program;
}

// ============================================
// Public API
// ============================================

/**
 * Validate already-parsed JSON data and build the Student graph from it
 */
export function loadRecord(data: unknown): Student {
  const fields = readObject(data, ROOT_PATH, STUDENT_KEYS);

  const identity = {
    firstName: readString(fields.firstName, "firstName"),
    lastName: readString(fields.lastName, "lastName"),
    studentNumber: readString(fields.studentNumber, "studentNumber"),
    email: readNullableString(fields.email, "email"),
    dateOfBirth: readNullableString(fields.dateOfBirth, "dateOfBirth"),
    enrolledOn: readNullableString(fields.enrolledOn, "enrolledOn"),
    focus: readNullableString(fields.focus, "focus"),
  };
  checkInvariants(ROOT_PATH, () => validateStudentIdentity(identity));

  return {
    id: readId(fields.id, "id"),
    ...identity,
    program: readProgram(fields.program, "program"),
  };
}

/**
 * Parse the text of a stored record
 */
export function parseRecord(json: string): Student {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedStoreError(ROOT_PATH, `invalid JSON: ${reason}`);
  }
  return loadRecord(data);
}
