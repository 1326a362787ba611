import { GERMAN_GRADE_SCALE, GradeScale } from "../domain/gradeScale";
import { CreateProgramInput } from "../domain/program";
import { IdGenerator } from "../domain/programEditor";
import { Student, createStudent } from "../domain/student";

/**
 * Shared builders for tests
 */

// 6 is best, 1 is worst, 4 passes
export const HIGHER_BETTER_SCALE: GradeScale = { best: 6, worst: 1, passingGrade: 4 };

/**
 * Deterministic ids: "id-1", "id-2", ...
 */
export function sequentialIds(prefix = "id"): IdGenerator {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function buildStudent(program: Partial<CreateProgramInput> = {}): Student {
  return createStudent("student-1", {
    firstName: "Test",
    lastName: "Student",
    studentNumber: "000001",
    program: {
      name: "Test Program",
      totalCreditsRequired: 180,
      targetAverage: 2.0,
      gradeScale: GERMAN_GRADE_SCALE,
      ...program,
    },
  });
}
