import { ValidationError } from "./errors";

/**
 * Grade Scale
 *
 * A scale is the closed interval between its `best` and `worst` grade.
 * Direction is derived, never stored separately:
 * - best < worst: lower is better (e.g. German grades, 1.0 best, 5.0 worst)
 * - best > worst: higher is better (e.g. 6 best, 1 worst)
 *
 * Every grade and average comparison in the project goes through this module.
 */
export interface GradeScale {
  best: number;
  worst: number;
  // Worst grade that still counts as passed
  passingGrade: number;
}

export const GERMAN_GRADE_SCALE: GradeScale = Object.freeze({
  best: 1.0,
  worst: 5.0,
  passingGrade: 4.0,
});

export function isLowerBetter(scale: GradeScale): boolean {
  return scale.best < scale.worst;
}

export function isWithinScale(scale: GradeScale, grade: number): boolean {
  const low = Math.min(scale.best, scale.worst);
  const high = Math.max(scale.best, scale.worst);
  return Number.isFinite(grade) && grade >= low && grade <= high;
}

// Averages are sums of products; differences below this are rounding noise
export const GRADE_TOLERANCE = 1e-9;

/**
 * True when `grade` is at least as good as `reference` on this scale.
 * Values within GRADE_TOLERANCE of each other count as equal.
 */
export function isBetterOrEqual(scale: GradeScale, grade: number, reference: number): boolean {
  if (Math.abs(grade - reference) < GRADE_TOLERANCE) {
    return true;
  }
  return isLowerBetter(scale) ? grade < reference : grade > reference;
}

export function isPassingGrade(scale: GradeScale, grade: number): boolean {
  return isBetterOrEqual(scale, grade, scale.passingGrade);
}

export function validateGradeScale(scale: GradeScale): void {
  if (!Number.isFinite(scale.best)) {
    throw new ValidationError("Best grade must be a number", "best");
  }
  if (!Number.isFinite(scale.worst)) {
    throw new ValidationError("Worst grade must be a number", "worst");
  }
  if (scale.best === scale.worst) {
    throw new ValidationError("Best and worst grade must differ", "worst");
  }
  if (!isWithinScale(scale, scale.passingGrade)) {
    throw new ValidationError(
      `Passing grade ${scale.passingGrade} lies outside the scale ${describeScale(scale)}`,
      "passingGrade"
    );
  }
}

export function validateGrade(scale: GradeScale, grade: number, field = "grade"): void {
  if (!isWithinScale(scale, grade)) {
    throw new ValidationError(
      `Grade ${grade} lies outside the scale ${describeScale(scale)}`,
      field
    );
  }
}

/**
 * Human-readable scale, e.g. "1-5 (1 is best)"
 */
export function describeScale(scale: GradeScale): string {
  const low = Math.min(scale.best, scale.worst);
  const high = Math.max(scale.best, scale.worst);
  return `${low}-${high} (${scale.best} is best)`;
}
