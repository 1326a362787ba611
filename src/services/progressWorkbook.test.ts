import fs from "fs";
import os from "os";
import path from "path";
import ExcelJS from "exceljs";
import { addExam, addModule, addSemester } from "../domain/programEditor";
import { buildStudent, sequentialIds } from "../testing/fixtures";
import { buildProgressWorkbook, writeProgressWorkbook } from "./progressWorkbook";

describe("progressWorkbook", () => {
  const setup = () => {
    const student = buildStudent({ totalCreditsRequired: 20 });
    const newId = sequentialIds();
    addSemester(student.program, { number: 1 });
    const algebra = addModule(student.program, 1, { name: "Algebra", credits: 5 }, newId);
    addExam(student.program, algebra.id, { date: "2024-02-01", grade: 1.5, kind: "written" }, newId);
    addExam(student.program, algebra.id, { date: "2024-07-01", kind: "oral" }, newId);
    return student;
  };

  it("has a summary, semester and exam sheet", () => {
    const workbook = buildProgressWorkbook(setup(), "2024-05-01");
    expect(workbook.worksheets.map(sheet => sheet.name)).toEqual(["Summary", "Semesters", "Exams"]);
  });

  it("lists one metric per summary row", () => {
    const summary = buildProgressWorkbook(setup(), "2024-05-01").getWorksheet("Summary");

    expect(summary?.getCell("A1").value).toBe("Metric");
    expect(summary?.getCell("B2").value).toBe("Test Student");
    expect(summary?.getCell("B5").value).toBe("2024-05-01");
    expect(summary?.getCell("A6").value).toBe("Overall average");
    expect(summary?.getCell("B6").value).toBe(1.5);
    expect(summary?.getCell("B8").value).toBe("yes");
    // Module still has a pending exam
    expect(summary?.getCell("B9").value).toBe(0);
    expect(summary?.getCell("B11").value).toBe(20);
    expect(summary?.getCell("A12").value).toBe("Progress");
    expect(summary?.getCell("B12").numFmt).toBe("0%");
  });

  it("writes a semester row per semester", () => {
    const semesters = buildProgressWorkbook(setup(), "2024-05-01").getWorksheet("Semesters");

    expect(semesters?.rowCount).toBe(2);
    expect(semesters?.getRow(2).values).toEqual([undefined, 1, "Semester 1", "planned", 1, 1.5, 0, 30]);
  });

  it("writes an exam row per exam", () => {
    const exams = buildProgressWorkbook(setup(), "2024-05-01").getWorksheet("Exams");

    expect(exams?.rowCount).toBe(3);
    expect(exams?.getCell("C2").value).toBe("written");
    expect(exams?.getCell("E2").value).toBe(1.5);
    expect(exams?.getCell("C3").value).toBe("oral");
    expect(exams?.getCell("G3").value).toBe("scheduled");
  });

  it("writes an .xlsx file that reads back", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "study-record-"));
    try {
      const filePath = path.join(dir, "exports", "progress.xlsx");
      await writeProgressWorkbook(setup(), filePath, "2024-05-01");

      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(filePath);
      expect(workbook.getWorksheet("Summary")?.getCell("B4").value).toBe("Test Program");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
