import { daysBetween } from "./dates";
import { ExamRecord, isGradedExam } from "./exam";
import { formatGrade } from "./format";
import { isBetterOrEqual, isLowerBetter } from "./gradeScale";
import { ExamLocation, Program, allExams, allModules } from "./program";
import { Semester } from "./semester";
import { ModuleStanding, StudyModule, isModuleCompleted, moduleStanding } from "./studyModule";

/**
 * Aggregation engine for a student's academic record.
 *
 * Everything here is computed from the current graph on every call; nothing is
 * cached. "No data" is always reported as null, never as 0.
 */

export interface WeightedGrade {
  grade: number;
  weight: number;
}

export interface SemesterAverage {
  number: number;
  label: string;
  average: number | null;
}

export interface GradeCount {
  grade: string;
  count: number;
}

export type ModuleStandings = Record<ModuleStanding, StudyModule[]>;

/**
 * Weighted mean of grade × weight over entries with a positive weight.
 * Returns null when there is nothing to average.
 */
export function weightedAverage(entries: WeightedGrade[]): number | null {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const { grade, weight } of entries) {
    if (weight > 0) {
      weightedSum += grade * weight;
      totalWeight += weight;
    }
  }

  return totalWeight > 0 ? weightedSum / totalWeight : null;
}

export function gradedEntries(exams: ExamRecord[]): WeightedGrade[] {
  return exams.filter(isGradedExam).map(exam => ({ grade: exam.grade, weight: exam.weight }));
}

function semesterExams(semester: Semester): ExamRecord[] {
  return semester.modules.flatMap(module => module.exams);
}

export function overallAverage(program: Program): number | null {
  return weightedAverage(gradedEntries(allExams(program).map(({ exam }) => exam)));
}

export function semesterAverage(semester: Semester): number | null {
  return weightedAverage(gradedEntries(semesterExams(semester)));
}

export function moduleGrade(module: StudyModule): number | null {
  return weightedAverage(gradedEntries(module.exams));
}

export function semesterAverages(program: Program): SemesterAverage[] {
  return program.semesters.map(semester => ({
    number: semester.number,
    label: semester.label,
    average: semesterAverage(semester),
  }));
}

// ============================================
// Credits & progress
// ============================================

/**
 * Sum of credits over completed modules. May exceed the program requirement.
 */
export function creditsCompleted(program: Program): number {
  return allModules(program)
    .filter(({ module }) => isModuleCompleted(module))
    .reduce((sum, { module }) => sum + module.credits, 0);
}

/**
 * Completed credits as shown in progress reporting: never above the requirement
 */
export function reportedCredits(program: Program): number {
  return Math.min(creditsCompleted(program), program.totalCreditsRequired);
}

export function remainingCredits(program: Program): number {
  return Math.max(0, program.totalCreditsRequired - creditsCompleted(program));
}

export function progressRatio(program: Program): number {
  const ratio = creditsCompleted(program) / program.totalCreditsRequired;
  return Math.min(1, Math.max(0, ratio));
}

export function semesterCreditsCompleted(semester: Semester): number {
  return semester.modules
    .filter(isModuleCompleted)
    .reduce((sum, module) => sum + module.credits, 0);
}

export function semesterRemainingCredits(semester: Semester): number {
  return Math.max(0, semester.recommendedCredits - semesterCreditsCompleted(semester));
}

// ============================================
// Target
// ============================================

/**
 * Whether the overall average is at least as good as the target.
 * null means undetermined: there is no graded exam yet.
 */
export function onTarget(program: Program): boolean | null {
  const average = overallAverage(program);
  if (average === null) {
    return null;
  }
  return isBetterOrEqual(program.gradeScale, average, program.targetAverage);
}

// ============================================
// Distribution, standings, schedule
// ============================================

/**
 * Count graded exams per grade, ordered from best to worst grade
 */
export function gradeDistribution(program: Program): GradeCount[] {
  const counts = new Map<number, number>();
  for (const { exam } of allExams(program)) {
    if (isGradedExam(exam)) {
      counts.set(exam.grade, (counts.get(exam.grade) ?? 0) + 1);
    }
  }

  const direction = isLowerBetter(program.gradeScale) ? 1 : -1;
  return [...counts.entries()]
    .sort(([a], [b]) => (a - b) * direction)
    .map(([grade, count]) => ({ grade: formatGrade(grade), count }));
}

export function moduleStandings(program: Program): ModuleStandings {
  const standings: ModuleStandings = { passed: [], failed: [], in_progress: [], open: [] };
  for (const { module } of allModules(program)) {
    standings[moduleStanding(module, program.gradeScale)].push(module);
  }
  return standings;
}

/**
 * Scheduled exams dated from `today` up to `days` days ahead, soonest first
 */
export function upcomingExams(program: Program, today: string, days: number): ExamLocation[] {
  return allExams(program)
    .filter(({ exam }) => {
      if (exam.status !== "scheduled") return false;
      const offset = daysBetween(today, exam.date);
      return offset >= 0 && offset <= days;
    })
    .sort((a, b) => a.exam.date.localeCompare(b.exam.date));
}

