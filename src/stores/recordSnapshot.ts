import { ExamRecord } from "../domain/exam";
import { Program } from "../domain/program";
import { Semester } from "../domain/semester";
import { Student } from "../domain/student";
import { StudyModule } from "../domain/studyModule";

/**
 * Stored record format.
 *
 * The snapshot builders below list every field explicitly, in a fixed order,
 * so the same graph always serializes to byte-identical JSON. Absent optional
 * values are written as null; every key is always present.
 *
 * Exams are stored without their module back-reference: containment already
 * says which module they belong to.
 */

export type StoredExam = Omit<ExamRecord, "moduleId">;

export interface StoredModule extends Omit<StudyModule, "exams"> {
  exams: StoredExam[];
}

export interface StoredSemester extends Omit<Semester, "modules"> {
  modules: StoredModule[];
}

export interface StoredProgram extends Omit<Program, "semesters"> {
  semesters: StoredSemester[];
}

export interface StoredStudent extends Omit<Student, "program"> {
  program: StoredProgram;
}

function examSnapshot(exam: ExamRecord): StoredExam {
  return {
    id: exam.id,
    kind: exam.kind,
    description: exam.description,
    date: exam.date,
    grade: exam.grade,
    weight: exam.weight,
    status: exam.status,
    attempts: exam.attempts,
  };
}

function moduleSnapshot(module: StudyModule): StoredModule {
  return {
    id: module.id,
    code: module.code,
    name: module.name,
    description: module.description,
    credits: module.credits,
    exams: module.exams.map(examSnapshot),
  };
}

function semesterSnapshot(semester: Semester): StoredSemester {
  return {
    number: semester.number,
    label: semester.label,
    startDate: semester.startDate,
    endDate: semester.endDate,
    recommendedCredits: semester.recommendedCredits,
    status: semester.status,
    modules: semester.modules.map(moduleSnapshot),
  };
}

function programSnapshot(program: Program): StoredProgram {
  return {
    name: program.name,
    totalCreditsRequired: program.totalCreditsRequired,
    targetAverage: program.targetAverage,
    gradeScale: {
      best: program.gradeScale.best,
      worst: program.gradeScale.worst,
      passingGrade: program.gradeScale.passingGrade,
    },
    semesters: program.semesters.map(semesterSnapshot),
  };
}

export function toSnapshot(student: Student): StoredStudent {
  return {
    id: student.id,
    firstName: student.firstName,
    lastName: student.lastName,
    studentNumber: student.studentNumber,
    email: student.email,
    dateOfBirth: student.dateOfBirth,
    enrolledOn: student.enrolledOn,
    focus: student.focus,
    program: programSnapshot(student.program),
  };
}

export function serializeRecord(student: Student): string {
  return JSON.stringify(toSnapshot(student), null, 2) + "\n";
}
