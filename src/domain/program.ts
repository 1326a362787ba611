/**
 * Program Domain Model
 *
 * The study program a student is enrolled in: credit requirement, target
 * average and grading scale, plus the ordered semesters.
 */

import { NotFoundError, ValidationError } from "./errors";
import { ExamRecord } from "./exam";
import { GradeScale, validateGrade, validateGradeScale } from "./gradeScale";
import { Semester } from "./semester";
import { StudyModule } from "./studyModule";

export interface Program {
  name: string;
  totalCreditsRequired: number;
  targetAverage: number;
  gradeScale: GradeScale;
  semesters: Semester[];
}

export interface CreateProgramInput {
  name: string;
  totalCreditsRequired: number;
  targetAverage: number;
  gradeScale: GradeScale;
}

/**
 * A module together with the semester that owns it
 */
export interface ModuleLocation {
  semester: Semester;
  module: StudyModule;
}

/**
 * An exam together with its owning module and semester
 */
export interface ExamLocation extends ModuleLocation {
  exam: ExamRecord;
}

export function validateProgramSettings(program: Omit<Program, "semesters">): void {
  if (program.name.trim() === "") {
    throw new ValidationError("Program name must not be empty", "name");
  }
  if (!Number.isFinite(program.totalCreditsRequired) || program.totalCreditsRequired <= 0) {
    throw new ValidationError(
      `Total credits required must be positive, got ${program.totalCreditsRequired}`,
      "totalCreditsRequired"
    );
  }
  validateGradeScale(program.gradeScale);
  validateGrade(program.gradeScale, program.targetAverage, "targetAverage");
}

export function createProgram(input: CreateProgramInput): Program {
  const program: Program = {
    name: input.name.trim(),
    totalCreditsRequired: input.totalCreditsRequired,
    targetAverage: input.targetAverage,
    gradeScale: { ...input.gradeScale },
    semesters: [],
  };
  validateProgramSettings(program);
  return program;
}

export function allModules(program: Program): ModuleLocation[] {
  return program.semesters.flatMap(semester =>
    semester.modules.map(module => ({ semester, module }))
  );
}

export function allExams(program: Program): ExamLocation[] {
  return allModules(program).flatMap(({ semester, module }) =>
    module.exams.map(exam => ({ semester, module, exam }))
  );
}

export function findSemester(program: Program, number: number): Semester | null {
  return program.semesters.find(s => s.number === number) || null;
}

export function getSemester(program: Program, number: number): Semester {
  const semester = findSemester(program, number);
  if (!semester) {
    throw new NotFoundError("semester", number);
  }
  return semester;
}

export function findModule(program: Program, moduleId: string): ModuleLocation | null {
  return allModules(program).find(({ module }) => module.id === moduleId) || null;
}

export function getModule(program: Program, moduleId: string): ModuleLocation {
  const location = findModule(program, moduleId);
  if (!location) {
    throw new NotFoundError("module", moduleId);
  }
  return location;
}

export function findExam(program: Program, examId: string): ExamLocation | null {
  return allExams(program).find(({ exam }) => exam.id === examId) || null;
}

export function getExam(program: Program, examId: string): ExamLocation {
  const location = findExam(program, examId);
  if (!location) {
    throw new NotFoundError("exam", examId);
  }
  return location;
}
