/**
 * Exam Record Domain Model
 *
 * A single assessment inside a module: a written exam, a term paper, an oral exam...
 *
 * Lifecycle:
 * - scheduled: planned, never carries a grade
 * - completed: taken; the grade may still be pending (null) until it is published
 *
 * Only completed exams with a grade ("graded" exams) enter any average.
 */

import { isIsoDate } from "./dates";
import { ValidationError } from "./errors";
import { GradeScale, validateGrade } from "./gradeScale";

export type ExamStatus = "scheduled" | "completed";

export const EXAM_STATUSES: readonly ExamStatus[] = ["scheduled", "completed"];

export interface ExamRecord {
  id: string;

  // Back-reference to the owning module, for display context only.
  // Not persisted: restored from containment when a record is loaded.
  moduleId: string;

  kind: string;
  description: string;
  date: string; // YYYY-MM-DD
  grade: number | null;
  weight: number;
  status: ExamStatus;
  attempts: number;
}

export type GradedExam = ExamRecord & { status: "completed"; grade: number };

/**
 * Input type for adding an exam to a module
 */
export interface CreateExamInput {
  kind?: string;
  description?: string;
  date: string;
  grade?: number | null;
  weight?: number;
  status?: ExamStatus;
  attempts?: number;
}

/**
 * Fields that may be edited on an existing exam
 */
export type UpdateExamInput = Partial<Omit<ExamRecord, "id" | "moduleId">>;

export const DEFAULT_EXAM_KIND = "exam";

export function isExamStatus(value: string): value is ExamStatus {
  return EXAM_STATUSES.some(status => status === value);
}

export function isGradedExam(exam: ExamRecord): exam is GradedExam {
  return exam.status === "completed" && exam.grade !== null;
}

/**
 * Pending exams are the ones a hypothetical grade can still be assumed for
 */
export function isPendingExam(exam: ExamRecord): boolean {
  return !isGradedExam(exam);
}

/**
 * Check every exam invariant. Throws ValidationError naming the first bad field.
 */
export function validateExam(exam: ExamRecord, scale: GradeScale): void {
  if (typeof exam.kind !== "string") {
    throw new ValidationError("Exam kind must be text", "kind");
  }
  if (typeof exam.description !== "string") {
    throw new ValidationError("Exam description must be text", "description");
  }
  if (!isIsoDate(exam.date)) {
    throw new ValidationError(`Invalid exam date "${exam.date}" (expected YYYY-MM-DD)`, "date");
  }
  if (!isExamStatus(exam.status)) {
    throw new ValidationError(`Unknown exam status "${exam.status}"`, "status");
  }
  if (!Number.isFinite(exam.weight) || exam.weight < 0) {
    throw new ValidationError(`Exam weight must be zero or positive, got ${exam.weight}`, "weight");
  }
  if (!Number.isInteger(exam.attempts) || exam.attempts < 1) {
    throw new ValidationError(`Exam attempts must be a positive integer, got ${exam.attempts}`, "attempts");
  }
  if (exam.grade !== null) {
    if (exam.status === "scheduled") {
      throw new ValidationError("A scheduled exam cannot carry a grade", "grade");
    }
    validateGrade(scale, exam.grade);
  }
}

/**
 * Build a validated exam record. Status defaults to "completed" when a grade is
 * given and to "scheduled" otherwise.
 */
export function createExam(
  id: string,
  moduleId: string,
  input: CreateExamInput,
  scale: GradeScale
): ExamRecord {
  const grade = input.grade ?? null;
  const exam: ExamRecord = {
    id,
    moduleId,
    kind: input.kind?.trim() || DEFAULT_EXAM_KIND,
    description: input.description?.trim() ?? "",
    date: input.date,
    grade,
    weight: input.weight ?? 1,
    status: input.status ?? (grade === null ? "scheduled" : "completed"),
    attempts: input.attempts ?? 1,
  };
  validateExam(exam, scale);
  return exam;
}
