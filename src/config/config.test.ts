import path from "path";
import { loadConfig, readNumber, readPositiveNumber } from "./config";

describe("config", () => {
  const cwd = path.resolve("/srv/records");

  it("falls back to defaults", () => {
    expect(loadConfig({}, cwd)).toEqual({
      recordFile: path.join(cwd, "data", "record.json"),
      exportDir: path.join(cwd, "exports"),
      gradeScale: { best: 1, worst: 5, passingGrade: 4 },
      defaultTargetAverage: 2.0,
      defaultTotalCredits: 180,
      csvDefaultModuleCredits: 5,
      upcomingExamDays: 30,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        RECORD_FILE: "/var/lib/record.json",
        GRADE_SCALE_BEST: "6",
        GRADE_SCALE_WORST: "1",
        GRADE_SCALE_PASSING: "4",
        CSV_DEFAULT_MODULE_CREDITS: "7.5",
      },
      cwd
    );

    expect(config.recordFile).toBe(path.resolve("/var/lib/record.json"));
    expect(config.gradeScale).toEqual({ best: 6, worst: 1, passingGrade: 4 });
    expect(config.csvDefaultModuleCredits).toBe(7.5);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}, cwd))).toBe(true);
  });

  it("rejects credit settings that are not positive", () => {
    expect(() => loadConfig({ CSV_DEFAULT_MODULE_CREDITS: "0" }, cwd)).toThrow(
      'Invalid CSV_DEFAULT_MODULE_CREDITS: expected a positive number, got "0"'
    );
    expect(() => loadConfig({ DEFAULT_TOTAL_CREDITS: "-30" }, cwd)).toThrow(
      'Invalid DEFAULT_TOTAL_CREDITS: expected a positive number, got "-30"'
    );
  });

  describe("readPositiveNumber", () => {
    it("keeps the fallback when unset", () => {
      expect(readPositiveNumber({}, "DEFAULT_TOTAL_CREDITS", 180)).toBe(180);
    });
  });

  describe("readNumber", () => {
    it("treats blank values as unset", () => {
      expect(readNumber({ UPCOMING_EXAM_DAYS: "  " }, "UPCOMING_EXAM_DAYS", 30)).toBe(30);
    });

    it("names the variable holding a non-number", () => {
      expect(() => readNumber({ DEFAULT_TOTAL_CREDITS: "lots" }, "DEFAULT_TOTAL_CREDITS", 180)).toThrow(
        'Invalid DEFAULT_TOTAL_CREDITS: expected a number, got "lots"'
      );
    });
  });
});
