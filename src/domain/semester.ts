/**
 * Semester Domain Model
 *
 * A numbered period of study. Numbers are unique within a program and the
 * program keeps its semesters ordered by number. Modules keep insertion order.
 */

import { isIsoDate } from "./dates";
import { ValidationError } from "./errors";
import { StudyModule } from "./studyModule";

export type SemesterStatus = "planned" | "active" | "completed";

export const SEMESTER_STATUSES: readonly SemesterStatus[] = ["planned", "active", "completed"];

export const DEFAULT_RECOMMENDED_CREDITS = 30;

export interface Semester {
  number: number;
  label: string;
  startDate: string | null;
  endDate: string | null;
  recommendedCredits: number;
  status: SemesterStatus;
  modules: StudyModule[];
}

export interface CreateSemesterInput {
  number: number;
  label?: string;
  startDate?: string | null;
  endDate?: string | null;
  recommendedCredits?: number;
  status?: SemesterStatus;
}

export type UpdateSemesterInput = Partial<Omit<Semester, "number" | "modules">>;

export function isSemesterStatus(value: string): value is SemesterStatus {
  return SEMESTER_STATUSES.some(status => status === value);
}

export function defaultSemesterLabel(number: number): string {
  return `Semester ${number}`;
}

export function validateSemesterFields(semester: Omit<Semester, "modules">): void {
  if (!Number.isInteger(semester.number) || semester.number < 1) {
    throw new ValidationError(`Semester number must be a positive integer, got ${semester.number}`, "number");
  }
  if (typeof semester.label !== "string") {
    throw new ValidationError("Semester label must be text", "label");
  }
  if (semester.startDate !== null && !isIsoDate(semester.startDate)) {
    throw new ValidationError(`Invalid start date "${semester.startDate}"`, "startDate");
  }
  if (semester.endDate !== null && !isIsoDate(semester.endDate)) {
    throw new ValidationError(`Invalid end date "${semester.endDate}"`, "endDate");
  }
  // ISO dates compare correctly as strings
  if (semester.startDate !== null && semester.endDate !== null && semester.startDate > semester.endDate) {
    throw new ValidationError("Semester end date lies before its start date", "endDate");
  }
  if (!Number.isFinite(semester.recommendedCredits) || semester.recommendedCredits < 0) {
    throw new ValidationError(
      `Recommended credits must be zero or positive, got ${semester.recommendedCredits}`,
      "recommendedCredits"
    );
  }
  if (!isSemesterStatus(semester.status)) {
    throw new ValidationError(`Unknown semester status "${semester.status}"`, "status");
  }
}
