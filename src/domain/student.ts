/**
 * Student Domain Model
 *
 * Identity fields are inlined; a student owns exactly one program.
 * The whole record (student → program → semesters → modules → exams) is one
 * containment tree and is persisted as a single document.
 */

import { isIsoDate } from "./dates";
import { ValidationError } from "./errors";
import { CreateProgramInput, Program, createProgram } from "./program";

export interface Student {
  id: string;
  firstName: string;
  lastName: string;

  // Matriculation number
  studentNumber: string;

  email: string | null;
  dateOfBirth: string | null;
  enrolledOn: string | null;

  // Field of focus, e.g. "Data Science"
  focus: string | null;

  program: Program;
}

export type StudentIdentity = Omit<Student, "id" | "program">;

/**
 * Input type for starting a fresh record
 */
export interface CreateStudentInput {
  firstName: string;
  lastName: string;
  studentNumber?: string;
  email?: string | null;
  dateOfBirth?: string | null;
  enrolledOn?: string | null;
  focus?: string | null;
  program: CreateProgramInput;
}

export function fullName(student: Pick<Student, "firstName" | "lastName">): string {
  return `${student.firstName} ${student.lastName}`.trim();
}

export function validateStudentIdentity(identity: StudentIdentity): void {
  if (identity.firstName.trim() === "" && identity.lastName.trim() === "") {
    throw new ValidationError("A student needs a first or last name", "lastName");
  }
  if (identity.dateOfBirth !== null && !isIsoDate(identity.dateOfBirth)) {
    throw new ValidationError(`Invalid date of birth "${identity.dateOfBirth}"`, "dateOfBirth");
  }
  if (identity.enrolledOn !== null && !isIsoDate(identity.enrolledOn)) {
    throw new ValidationError(`Invalid enrolment date "${identity.enrolledOn}"`, "enrolledOn");
  }
}

export function createStudent(id: string, input: CreateStudentInput): Student {
  const identity: StudentIdentity = {
    firstName: input.firstName.trim(),
    lastName: input.lastName.trim(),
    studentNumber: input.studentNumber?.trim() ?? "",
    email: input.email?.trim() || null,
    dateOfBirth: input.dateOfBirth || null,
    enrolledOn: input.enrolledOn || null,
    focus: input.focus?.trim() || null,
  };
  validateStudentIdentity(identity);

  return { id, ...identity, program: createProgram(input.program) };
}
