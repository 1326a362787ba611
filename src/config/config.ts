import path from "path";
import { GradeScale } from "../domain/gradeScale";

export interface AppConfig {
  recordFile: string;
  exportDir: string;
  gradeScale: GradeScale;
  defaultTargetAverage: number;
  defaultTotalCredits: number;
  csvDefaultModuleCredits: number;
  upcomingExamDays: number;
}

type Env = Record<string, string | undefined>;

/**
 * Read a numeric setting, falling back when the variable is unset or blank.
 * A value that is present but not a number is a startup error.
 */
export function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name}: expected a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read a setting that must be greater than zero
 */
export function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive number, got "${env[name]}"`);
  }
  return value;
}

/**
 * Build the application config from an environment map.
 * Relative paths are resolved against the working directory.
 */
export function loadConfig(env: Env, cwd: string = process.cwd()): AppConfig {
  return Object.freeze({
    recordFile: path.resolve(cwd, env.RECORD_FILE || "data/record.json"),
    exportDir: path.resolve(cwd, env.EXPORT_DIR || "exports"),
    gradeScale: Object.freeze({
      best: readNumber(env, "GRADE_SCALE_BEST", 1.0),
      worst: readNumber(env, "GRADE_SCALE_WORST", 5.0),
      passingGrade: readNumber(env, "GRADE_SCALE_PASSING", 4.0),
    }),
    defaultTargetAverage: readNumber(env, "DEFAULT_TARGET_AVERAGE", 2.0),
    defaultTotalCredits: readPositiveNumber(env, "DEFAULT_TOTAL_CREDITS", 180),
    csvDefaultModuleCredits: readPositiveNumber(env, "CSV_DEFAULT_MODULE_CREDITS", 5),
    upcomingExamDays: readNumber(env, "UPCOMING_EXAM_DAYS", 30),
  });
}
