/**
 * Progress Report
 *
 * Collects the scalars and series the presentation layer draws: the ASCII
 * dashboard in the CLI and the exported progress workbook. Read-only; built
 * fresh from the current record on every call.
 */

import {
  GradeCount,
  SemesterAverage,
  creditsCompleted,
  gradeDistribution,
  moduleGrade,
  moduleStandings,
  onTarget,
  overallAverage,
  progressRatio,
  remainingCredits,
  reportedCredits,
  semesterAverages,
  semesterCreditsCompleted,
  upcomingExams,
} from "../domain/analytics";
import { ModuleStanding, moduleStanding } from "../domain/studyModule";
import { RequiredGrade, requiredGrade } from "../domain/projection";
import { Student, fullName } from "../domain/student";
import { SemesterStatus } from "../domain/semester";
import { ExamStatus } from "../domain/exam";

export interface SemesterSummary extends SemesterAverage {
  status: SemesterStatus;
  creditsCompleted: number;
  recommendedCredits: number;
  moduleCount: number;
}

export interface ModuleSummary {
  id: string;
  semester: number;
  code: string;
  name: string;
  credits: number;
  grade: number | null;
  standing: ModuleStanding;
}

export interface UpcomingExam {
  examId: string;
  moduleName: string;
  semester: number;
  kind: string;
  date: string;
  status: ExamStatus;
}

export interface ProgressReport {
  studentName: string;
  studentNumber: string;
  programName: string;
  generatedOn: string;

  overallAverage: number | null;
  targetAverage: number;
  onTarget: boolean | null;
  requiredGrade: RequiredGrade;

  // Raw completed credits may exceed the requirement; `credits` never does
  rawCreditsCompleted: number;
  credits: number;
  totalCreditsRequired: number;
  remainingCredits: number;
  progressRatio: number;

  semesters: SemesterSummary[];
  modules: ModuleSummary[];
  standingCounts: Record<ModuleStanding, number>;
  gradeDistribution: GradeCount[];
  upcomingExams: UpcomingExam[];
}

export function buildProgressReport(student: Student, today: string, upcomingDays = 30): ProgressReport {
  const program = student.program;
  const averages = semesterAverages(program);
  const standings = moduleStandings(program);

  const standingCounts: Record<ModuleStanding, number> = {
    passed: standings.passed.length,
    failed: standings.failed.length,
    in_progress: standings.in_progress.length,
    open: standings.open.length,
  };

  return {
    studentName: fullName(student),
    studentNumber: student.studentNumber,
    programName: program.name,
    generatedOn: today,

    overallAverage: overallAverage(program),
    targetAverage: program.targetAverage,
    onTarget: onTarget(program),
    requiredGrade: requiredGrade(program),

    rawCreditsCompleted: creditsCompleted(program),
    credits: reportedCredits(program),
    totalCreditsRequired: program.totalCreditsRequired,
    remainingCredits: remainingCredits(program),
    progressRatio: progressRatio(program),

    semesters: program.semesters.map((semester, i) => ({
      ...averages[i],
      status: semester.status,
      creditsCompleted: semesterCreditsCompleted(semester),
      recommendedCredits: semester.recommendedCredits,
      moduleCount: semester.modules.length,
    })),
    modules: program.semesters.flatMap(semester =>
      semester.modules.map(module => ({
        id: module.id,
        semester: semester.number,
        code: module.code,
        name: module.name,
        credits: module.credits,
        grade: moduleGrade(module),
        standing: moduleStanding(module, program.gradeScale),
      }))
    ),
    standingCounts,
    gradeDistribution: gradeDistribution(program),
    upcomingExams: upcomingExams(program, today, upcomingDays).map(({ semester, module, exam }) => ({
      examId: exam.id,
      moduleName: module.name,
      semester: semester.number,
      kind: exam.kind,
      date: exam.date,
      status: exam.status,
    })),
  };
}
