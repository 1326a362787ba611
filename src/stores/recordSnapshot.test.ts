import { addExam, addModule, addSemester } from "../domain/programEditor";
import { buildStudent, sequentialIds } from "../testing/fixtures";
import { serializeRecord, toSnapshot } from "./recordSnapshot";

describe("recordSnapshot", () => {
  it("writes every key, in a fixed order, with null for absent values", () => {
    const expected = [
      "{",
      '  "id": "student-1",',
      '  "firstName": "Test",',
      '  "lastName": "Student",',
      '  "studentNumber": "000001",',
      '  "email": null,',
      '  "dateOfBirth": null,',
      '  "enrolledOn": null,',
      '  "focus": null,',
      '  "program": {',
      '    "name": "Test Program",',
      '    "totalCreditsRequired": 180,',
      '    "targetAverage": 2,',
      '    "gradeScale": {',
      '      "best": 1,',
      '      "worst": 5,',
      '      "passingGrade": 4',
      "    },",
      '    "semesters": []',
      "  }",
      "}",
      "",
    ].join("\n");

    expect(serializeRecord(buildStudent())).toBe(expected);
  });

  it("stores exams without their module back-reference", () => {
    const student = buildStudent();
    const newId = sequentialIds();
    addSemester(student.program, { number: 1 });
    const module = addModule(student.program, 1, { name: "Algebra", credits: 5 }, newId);
    addExam(student.program, module.id, { date: "2024-02-01", grade: 1.7 }, newId);

    const stored = toSnapshot(student).program.semesters[0].modules[0].exams[0];

    expect(Object.keys(stored)).toEqual([
      "id", "kind", "description", "date", "grade", "weight", "status", "attempts",
    ]);
    expect(stored).toEqual({
      id: "id-2",
      kind: "exam",
      description: "",
      date: "2024-02-01",
      grade: 1.7,
      weight: 1,
      status: "completed",
      attempts: 1,
    });
  });

  it("produces identical output for the same graph", () => {
    const student = buildStudent();
    addSemester(student.program, { number: 2, startDate: "2024-10-01" });
    addSemester(student.program, { number: 1 });

    expect(serializeRecord(student)).toBe(serializeRecord(student));
    expect(toSnapshot(student).program.semesters.map(s => s.number)).toEqual([1, 2]);
  });

  it("does not share structure with the live graph", () => {
    const student = buildStudent();
    const snapshot = toSnapshot(student);
    snapshot.program.gradeScale.best = 0;

    expect(student.program.gradeScale.best).toBe(1);
  });
});
