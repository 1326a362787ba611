/**
 * Study Module Domain Model
 *
 * A course unit worth a number of credits (ECTS), assessed by one or more exams.
 *
 * Completion rule: a module is completed once it has at least one exam and
 * every exam is completed AND graded. Only completed modules count toward the
 * program's credits, whether or not the grades are passing. Passing is
 * reported separately via ModuleStanding.
 */

import { ValidationError } from "./errors";
import { ExamRecord, isGradedExam } from "./exam";
import { GradeScale, isPassingGrade } from "./gradeScale";

export interface StudyModule {
  id: string;
  code: string;
  name: string;
  description: string;
  credits: number;
  exams: ExamRecord[];
}

export interface CreateModuleInput {
  name: string;
  credits: number;
  code?: string;
  description?: string;
}

export type UpdateModuleInput = Partial<Pick<StudyModule, "name" | "code" | "description" | "credits">>;

/**
 * - passed: completed, every grade passing
 * - failed: completed, at least one failing grade
 * - in_progress: at least one exam taken, module not completed
 * - open: nothing taken yet (or no exams at all)
 */
export type ModuleStanding = "passed" | "failed" | "in_progress" | "open";

export const MODULE_STANDINGS: readonly ModuleStanding[] = ["passed", "failed", "in_progress", "open"];

export function validateModuleFields(module: Pick<StudyModule, "name" | "credits">): void {
  if (typeof module.name !== "string" || module.name.trim() === "") {
    throw new ValidationError("Module name must not be empty", "name");
  }
  if (!Number.isFinite(module.credits) || module.credits <= 0) {
    throw new ValidationError(`Module credits must be positive, got ${module.credits}`, "credits");
  }
}

export function isModuleCompleted(module: StudyModule): boolean {
  return module.exams.length > 0 && module.exams.every(isGradedExam);
}

export function moduleStanding(module: StudyModule, scale: GradeScale): ModuleStanding {
  if (isModuleCompleted(module)) {
    const allPassing = module.exams.every(
      exam => exam.grade !== null && isPassingGrade(scale, exam.grade)
    );
    return allPassing ? "passed" : "failed";
  }
  if (module.exams.some(exam => exam.status === "completed")) {
    return "in_progress";
  }
  return "open";
}

export function sameModuleName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
