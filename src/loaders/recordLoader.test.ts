import { MalformedStoreError } from "../domain/errors";
import { addExam, addModule, addSemester, updateExam, updateModule, updateSemester } from "../domain/programEditor";
import { buildSampleRecord } from "../scripts/sampleRecord";
import { GERMAN_GRADE_SCALE } from "../domain/gradeScale";
import { buildStudent, sequentialIds } from "../testing/fixtures";
import { serializeRecord, toSnapshot } from "../stores/recordSnapshot";
import { loadRecord, parseRecord } from "./recordLoader";

describe("recordLoader", () => {
  const sample = () =>
    buildSampleRecord({
      gradeScale: GERMAN_GRADE_SCALE,
      targetAverage: 2.0,
      totalCreditsRequired: 180,
      today: "2024-05-01",
      newId: sequentialIds(),
    });

  const expectMalformed = (data: unknown, path: string, reason?: string) => {
    let caught: unknown;
    try {
      loadRecord(data);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedStoreError);
    expect(caught).toMatchObject(reason === undefined ? { path } : { path, reason });
  };

  describe("round trip", () => {
    it("restores the exact graph", () => {
      const student = sample();
      expect(loadRecord(JSON.parse(serializeRecord(student)))).toEqual(student);
    });

    it("loads a record after updates that leave fields undefined", () => {
      const student = buildStudent();
      const newId = sequentialIds();
      addSemester(student.program, { number: 1 });
      const module = addModule(student.program, 1, { name: "Algebra", credits: 5 }, newId);
      const exam = addExam(student.program, module.id, { date: "2024-07-15" }, newId);

      updateExam(student.program, exam.id, { kind: undefined });
      updateModule(student.program, module.id, { description: undefined });
      updateSemester(student.program, 1, { label: undefined });

      expect(parseRecord(serializeRecord(student))).toEqual(student);
    });

    it("restores exam back-references from containment", () => {
      const student = sample();
      const loaded = parseRecord(serializeRecord(student));

      for (const semester of loaded.program.semesters) {
        for (const module of semester.modules) {
          for (const exam of module.exams) {
            expect(exam.moduleId).toBe(module.id);
          }
        }
      }
    });

    it("loads an empty program", () => {
      const student = buildStudent();
      expect(parseRecord(serializeRecord(student))).toEqual(student);
    });
  });

  describe("malformed records", () => {
    it("rejects text that is not JSON", () => {
      let caught: unknown;
      try {
        parseRecord("{ not json");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MalformedStoreError);
      expect(caught).toMatchObject({ path: "(root)" });
      expect(caught instanceof MalformedStoreError && caught.reason.startsWith("invalid JSON")).toBe(true);
    });

    it("rejects a root that is not an object", () => {
      expectMalformed([], "(root)", "expected an object, got array");
    });

    it("names a missing field", () => {
      const data = toSnapshot(sample());
      Reflect.deleteProperty(data, "focus");
      expectMalformed(data, "focus", "missing required field");
    });

    it("names an unknown field", () => {
      const data = toSnapshot(sample());
      Object.assign(data.program.semesters[0], { color: "blue" });
      expectMalformed(data, "program.semesters[0].color", "unknown field");
    });

    it("names a field of the wrong type", () => {
      const data = toSnapshot(sample());
      Object.assign(data, { studentNumber: 42 });
      expectMalformed(data, "studentNumber", "expected a string, got number");
    });

    it("names negative module credits", () => {
      const data = toSnapshot(sample());
      data.program.semesters[0].modules[0].credits = -5;
      expectMalformed(data, "program.semesters[0].modules[0].credits", "Module credits must be positive, got -5");
    });

    it("names a grade outside the scale", () => {
      const data = toSnapshot(sample());
      data.program.semesters[0].modules[1].exams[0].grade = 9;
      expectMalformed(data, "program.semesters[0].modules[1].exams[0].grade");
    });

    it("names an unknown exam status", () => {
      const data = toSnapshot(sample());
      Object.assign(data.program.semesters[0].modules[0].exams[0], { status: "cancelled" });
      expectMalformed(data, "program.semesters[0].modules[0].exams[0].status", 'unknown exam status "cancelled"');
    });

    it("rejects a target average outside the scale", () => {
      const data = toSnapshot(sample());
      data.program.targetAverage = 0.5;
      expectMalformed(data, "program.targetAverage");
    });

    it("rejects duplicate exam ids", () => {
      const data = toSnapshot(sample());
      const first = data.program.semesters[0].modules[0].exams[0];
      data.program.semesters[0].modules[1].exams[0].id = first.id;
      expectMalformed(data, "program.semesters[0].modules[1].exams[0].id", `duplicate exam id "${first.id}"`);
    });

    it("rejects duplicate module names", () => {
      const data = toSnapshot(sample());
      data.program.semesters[1].modules[0].name = "module 1.1";
      expectMalformed(data, "program.semesters[1].modules[0].name", 'duplicate module name "module 1.1"');
    });

    it("rejects semesters out of order", () => {
      const data = toSnapshot(sample());
      data.program.semesters.reverse();
      expectMalformed(data, "program.semesters[1].number", "semesters must be listed in ascending order");
    });
  });
});
