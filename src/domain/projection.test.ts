import { NotFoundError, ValidationError } from "./errors";
import { addExam, addModule, addSemester } from "./programEditor";
import { projectedAverage, requiredGrade } from "./projection";
import { buildStudent, sequentialIds } from "../testing/fixtures";

describe("projection", () => {
  // Target 2.0 on the 1-5 scale; one graded exam and one pending exam
  const setup = (graded: { grade: number; weight: number }) => {
    const program = buildStudent().program;
    const newId = sequentialIds();
    addSemester(program, { number: 1 });
    const module = addModule(program, 1, { name: "A", credits: 5 }, newId);
    const done = addExam(program, module.id, { date: "2024-02-01", ...graded }, newId);
    const pending = addExam(program, module.id, { date: "2024-07-01" }, newId);
    return { program, newId, module, done, pending };
  };

  describe("requiredGrade", () => {
    it("solves for the grade that meets the target", () => {
      const { program } = setup({ grade: 3.0, weight: 1 });
      expect(requiredGrade(program)).toEqual({ status: "achievable", grade: 1.0 });
    });

    it("reports a target that even the worst grade keeps", () => {
      const { program } = setup({ grade: 1.0, weight: 3 });
      expect(requiredGrade(program)).toEqual({ status: "secured" });
    });

    it("reports a target that even the best grade misses", () => {
      const { program } = setup({ grade: 4.0, weight: 3 });
      expect(requiredGrade(program)).toEqual({ status: "unreachable", bestPossibleAverage: 3.25 });
    });

    it("needs the target itself when nothing is graded yet", () => {
      const program = buildStudent().program;
      const newId = sequentialIds();
      addSemester(program, { number: 1 });
      const module = addModule(program, 1, { name: "A", credits: 5 }, newId);
      addExam(program, module.id, { date: "2024-07-01" }, newId);

      expect(requiredGrade(program)).toEqual({ status: "achievable", grade: 2.0 });
    });

    it("reports the target grade without rounding noise", () => {
      const program = buildStudent({ targetAverage: 2.7 }).program;
      const newId = sequentialIds();
      addSemester(program, { number: 1 });
      const module = addModule(program, 1, { name: "A", credits: 5 }, newId);
      addExam(program, module.id, { date: "2024-02-01", grade: 2.7 }, newId);
      addExam(program, module.id, { date: "2024-02-02", grade: 2.7 }, newId);
      addExam(program, module.id, { date: "2024-02-03", grade: 2.7 }, newId);
      addExam(program, module.id, { date: "2024-07-01" }, newId);

      expect(requiredGrade(program)).toEqual({ status: "achievable", grade: 2.7 });
    });

    it("has nothing to solve without pending exams", () => {
      const { program, module, newId } = setup({ grade: 2.0, weight: 1 });
      module.exams = module.exams.filter(exam => exam.grade !== null);
      expect(requiredGrade(program)).toEqual({ status: "no_pending_exams" });

      addExam(program, module.id, { date: "2024-07-01", weight: 0 }, newId);
      expect(requiredGrade(program)).toEqual({ status: "no_pending_exams" });
    });

    it("rejects a graded exam in the selection", () => {
      const { program, done } = setup({ grade: 2.0, weight: 1 });
      expect(() => requiredGrade(program, [done.id])).toThrow(`Exam ${done.id} is already graded`);
    });
  });

  describe("projectedAverage", () => {
    it("combines hypothetical and real grades without touching the record", () => {
      const { program, pending } = setup({ grade: 3.0, weight: 1 });

      expect(projectedAverage(program, new Map([[pending.id, 1.0]]))).toBe(2.0);
      expect(pending.grade).toBeNull();
      expect(pending.status).toBe("scheduled");
    });

    it("returns the current average for an empty scenario", () => {
      const { program } = setup({ grade: 3.0, weight: 1 });
      expect(projectedAverage(program, new Map())).toBe(3.0);
    });

    it("rejects an unknown exam", () => {
      const { program } = setup({ grade: 3.0, weight: 1 });
      expect(() => projectedAverage(program, new Map([["missing", 1.0]]))).toThrow(NotFoundError);
    });

    it("rejects a grade outside the scale", () => {
      const { program, pending } = setup({ grade: 3.0, weight: 1 });
      expect(() => projectedAverage(program, new Map([[pending.id, 8]]))).toThrow(ValidationError);
    });
  });
});
