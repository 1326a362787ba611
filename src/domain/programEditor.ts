/**
 * Program Editor
 *
 * Lifecycle operations on a program's containment tree. Each operation builds
 * the candidate entity, validates it in full and only then touches the graph,
 * so a failed call leaves the program exactly as it was.
 *
 * Removals cascade: removing a semester drops its modules and their exams,
 * removing a module drops its exams.
 */

import { randomUUID } from "crypto";
import { ValidationError } from "./errors";
import { CreateExamInput, DEFAULT_EXAM_KIND, ExamRecord, UpdateExamInput, createExam, validateExam } from "./exam";
import { validateGrade } from "./gradeScale";
import {
  Program,
  allModules,
  findSemester,
  getExam,
  getModule,
  getSemester,
  validateProgramSettings,
} from "./program";
import {
  CreateSemesterInput,
  DEFAULT_RECOMMENDED_CREDITS,
  Semester,
  UpdateSemesterInput,
  defaultSemesterLabel,
  validateSemesterFields,
} from "./semester";
import {
  CreateModuleInput,
  StudyModule,
  UpdateModuleInput,
  sameModuleName,
  validateModuleFields,
} from "./studyModule";

export type IdGenerator = () => string;

const defaultIdGenerator: IdGenerator = () => randomUUID();

// A field left out of a patch (or given as undefined) keeps its current value
function patched<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

// ============================================
// Program settings
// ============================================

export function setTargetAverage(program: Program, targetAverage: number): void {
  validateGrade(program.gradeScale, targetAverage, "targetAverage");
  program.targetAverage = targetAverage;
}

export function setTotalCreditsRequired(program: Program, totalCreditsRequired: number): void {
  validateProgramSettings({ ...program, totalCreditsRequired });
  program.totalCreditsRequired = totalCreditsRequired;
}

// ============================================
// Semesters
// ============================================

export function addSemester(program: Program, input: CreateSemesterInput): Semester {
  const semester: Semester = {
    number: input.number,
    label: input.label?.trim() || defaultSemesterLabel(input.number),
    startDate: input.startDate ?? null,
    endDate: input.endDate ?? null,
    recommendedCredits: input.recommendedCredits ?? DEFAULT_RECOMMENDED_CREDITS,
    status: input.status ?? "planned",
    modules: [],
  };
  validateSemesterFields(semester);

  if (findSemester(program, semester.number)) {
    throw new ValidationError(`Semester ${semester.number} already exists`, "number");
  }

  const insertAt = program.semesters.findIndex(s => s.number > semester.number);
  if (insertAt === -1) {
    program.semesters.push(semester);
  } else {
    program.semesters.splice(insertAt, 0, semester);
  }
  return semester;
}

export function updateSemester(program: Program, number: number, changes: UpdateSemesterInput): Semester {
  const semester = getSemester(program, number);
  const candidate = {
    number: semester.number,
    label: patched(changes.label, semester.label),
    startDate: patched(changes.startDate, semester.startDate),
    endDate: patched(changes.endDate, semester.endDate),
    recommendedCredits: patched(changes.recommendedCredits, semester.recommendedCredits),
    status: patched(changes.status, semester.status),
  };
  validateSemesterFields(candidate);
  candidate.label = candidate.label.trim() || defaultSemesterLabel(semester.number);

  semester.label = candidate.label;
  semester.startDate = candidate.startDate;
  semester.endDate = candidate.endDate;
  semester.recommendedCredits = candidate.recommendedCredits;
  semester.status = candidate.status;
  return semester;
}

export function removeSemester(program: Program, number: number): Semester {
  const semester = getSemester(program, number);
  program.semesters = program.semesters.filter(s => s !== semester);
  return semester;
}

// ============================================
// Modules
// ============================================

function assertModuleNameFree(program: Program, name: string, exceptId?: string): void {
  const clash = allModules(program).find(
    ({ module }) => module.id !== exceptId && sameModuleName(module.name, name)
  );
  if (clash) {
    throw new ValidationError(
      `A module named "${clash.module.name}" already exists in semester ${clash.semester.number}`,
      "name"
    );
  }
}

export function addModule(
  program: Program,
  semesterNumber: number,
  input: CreateModuleInput,
  newId: IdGenerator = defaultIdGenerator
): StudyModule {
  const semester = getSemester(program, semesterNumber);
  const module: StudyModule = {
    id: newId(),
    code: input.code?.trim() ?? "",
    name: input.name.trim(),
    description: input.description?.trim() ?? "",
    credits: input.credits,
    exams: [],
  };
  validateModuleFields(module);
  assertModuleNameFree(program, module.name);

  semester.modules.push(module);
  return module;
}

export function updateModule(program: Program, moduleId: string, changes: UpdateModuleInput): StudyModule {
  const { module } = getModule(program, moduleId);
  const candidate = {
    name: patched(changes.name, module.name),
    code: patched(changes.code, module.code),
    description: patched(changes.description, module.description),
    credits: patched(changes.credits, module.credits),
  };
  validateModuleFields(candidate);
  candidate.name = candidate.name.trim();
  assertModuleNameFree(program, candidate.name, module.id);

  module.name = candidate.name;
  module.code = candidate.code;
  module.description = candidate.description;
  module.credits = candidate.credits;
  return module;
}

export function removeModule(program: Program, moduleId: string): StudyModule {
  const { semester, module } = getModule(program, moduleId);
  semester.modules = semester.modules.filter(m => m !== module);
  return module;
}

// ============================================
// Exams
// ============================================

export function addExam(
  program: Program,
  moduleId: string,
  input: CreateExamInput,
  newId: IdGenerator = defaultIdGenerator
): ExamRecord {
  const { module } = getModule(program, moduleId);
  const exam = createExam(newId(), module.id, input, program.gradeScale);
  module.exams.push(exam);
  return exam;
}

export function updateExam(program: Program, examId: string, changes: UpdateExamInput): ExamRecord {
  const { exam } = getExam(program, examId);
  const candidate: ExamRecord = {
    id: exam.id,
    moduleId: exam.moduleId,
    kind: patched(changes.kind, exam.kind),
    description: patched(changes.description, exam.description),
    date: patched(changes.date, exam.date),
    grade: patched(changes.grade, exam.grade),
    weight: patched(changes.weight, exam.weight),
    status: patched(changes.status, exam.status),
    attempts: patched(changes.attempts, exam.attempts),
  };
  validateExam(candidate, program.gradeScale);
  candidate.kind = candidate.kind.trim() || DEFAULT_EXAM_KIND;

  Object.assign(exam, candidate);
  return exam;
}

/**
 * Enter the grade for an exam, marking it completed
 */
export function recordGrade(program: Program, examId: string, grade: number, date?: string): ExamRecord {
  const changes: UpdateExamInput = { grade, status: "completed" };
  if (date !== undefined) {
    changes.date = date;
  }
  return updateExam(program, examId, changes);
}

export function removeExam(program: Program, examId: string): ExamRecord {
  const { module, exam } = getExam(program, examId);
  module.exams = module.exams.filter(e => e !== exam);
  return exam;
}
