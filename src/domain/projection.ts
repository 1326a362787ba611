/**
 * "What grade do I need" projections.
 *
 * Both functions work on a read-only view of the program: hypothetical grades
 * are combined with the real ones in memory and nothing is written back.
 */

import { WeightedGrade, gradedEntries, weightedAverage } from "./analytics";
import { ValidationError } from "./errors";
import { ExamRecord, isGradedExam, isPendingExam } from "./exam";
import { isBetterOrEqual, validateGrade } from "./gradeScale";
import { Program, allExams, getExam } from "./program";

export type RequiredGrade =
  | { status: "achievable"; grade: number }
  // Even the worst grade on every pending exam keeps the target
  | { status: "secured" }
  // Even the best grade misses the target
  | { status: "unreachable"; bestPossibleAverage: number }
  | { status: "no_pending_exams" };

// Drop floating-point noise, e.g. 2.6999999999999993 becomes 2.7
function roundGrade(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

function pendingExam(program: Program, examId: string): ExamRecord {
  const { exam } = getExam(program, examId);
  if (isGradedExam(exam)) {
    throw new ValidationError(`Exam ${examId} is already graded`, "examId");
  }
  return exam;
}

function currentEntries(program: Program): WeightedGrade[] {
  return gradedEntries(allExams(program).map(({ exam }) => exam));
}

/**
 * Overall average as if each listed pending exam had been completed with the
 * given grade. Returns null when there is still nothing to average.
 */
export function projectedAverage(
  program: Program,
  hypotheticalGrades: ReadonlyMap<string, number>
): number | null {
  const entries = currentEntries(program);

  for (const [examId, grade] of hypotheticalGrades) {
    const exam = pendingExam(program, examId);
    validateGrade(program.gradeScale, grade);
    entries.push({ grade, weight: exam.weight });
  }

  return weightedAverage(entries);
}

/**
 * The single grade needed on every considered pending exam for the overall
 * average to meet the program target. Considers all pending exams by default.
 */
export function requiredGrade(program: Program, examIds?: string[]): RequiredGrade {
  const scale = program.gradeScale;
  const pending = examIds
    ? examIds.map(id => pendingExam(program, id))
    : allExams(program).map(({ exam }) => exam).filter(isPendingExam);

  const pendingWeight = pending.reduce((sum, exam) => sum + (exam.weight > 0 ? exam.weight : 0), 0);
  if (pendingWeight === 0) {
    return { status: "no_pending_exams" };
  }

  let gradedSum = 0;
  let gradedWeight = 0;
  for (const { grade, weight } of currentEntries(program)) {
    if (weight > 0) {
      gradedSum += grade * weight;
      gradedWeight += weight;
    }
  }

  // Solve (gradedSum + g * pendingWeight) / (gradedWeight + pendingWeight) = target
  const needed = roundGrade(
    (program.targetAverage * (gradedWeight + pendingWeight) - gradedSum) / pendingWeight
  );

  if (isBetterOrEqual(scale, scale.worst, needed)) {
    return { status: "secured" };
  }
  if (!isBetterOrEqual(scale, scale.best, needed)) {
    return {
      status: "unreachable",
      bestPossibleAverage: (gradedSum + scale.best * pendingWeight) / (gradedWeight + pendingWeight),
    };
  }
  return { status: "achievable", grade: needed };
}
