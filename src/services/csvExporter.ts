import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { allExams } from "../domain/program";
import { Student } from "../domain/student";
import { CSV_COLUMNS } from "../loaders/csvImporter";

/**
 * Export every exam record of the program as CSV, one row per exam, in
 * program order (semester, module, exam). Ungraded exams get an empty grade.
 */
export function exportExamsCsv(student: Student): string {
  const data = allExams(student.program).map(({ semester, module, exam }) => [
    module.name,
    semester.number,
    exam.grade,
    exam.weight,
    exam.date,
    exam.status,
  ]);

  return Papa.unparse({ fields: [...CSV_COLUMNS], data }, { newline: "\n" }) + "\n";
}

export function writeExamsCsv(student: Student, filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, exportExamsCsv(student), "utf-8");
}
