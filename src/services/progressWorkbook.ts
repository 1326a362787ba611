import fs from "fs";
import path from "path";
import ExcelJS from "exceljs";
import { allExams } from "../domain/program";
import { Student } from "../domain/student";
import { ProgressReport, buildProgressReport } from "./progressReport";

/**
 * Progress Workbook - the progress report as an .xlsx file.
 *
 * Sheets:
 * - Summary: one metric per row
 * - Semesters: average and credits per semester
 * - Exams: every exam of the record, semester by semester
 */

function yesNo(value: boolean | null): string {
  if (value === null) return "n/a";
  return value ? "yes" : "no";
}

function addSummarySheet(workbook: ExcelJS.Workbook, report: ProgressReport): void {
  const sheet = workbook.addWorksheet("Summary");
  sheet.columns = [
    { header: "Metric", key: "metric", width: 24 },
    { header: "Value", key: "value", width: 30 },
  ];

  const rows: [string, string | number | null][] = [
    ["Student", report.studentName],
    ["Student number", report.studentNumber],
    ["Program", report.programName],
    ["Generated on", report.generatedOn],
    ["Overall average", report.overallAverage],
    ["Target average", report.targetAverage],
    ["On target", yesNo(report.onTarget)],
    ["Credits completed", report.credits],
    ["Credits required", report.totalCreditsRequired],
    ["Remaining credits", report.remainingCredits],
    ["Progress", report.progressRatio],
  ];
  for (const [metric, value] of rows) {
    sheet.addRow({ metric, value });
  }

  sheet.getRow(1).font = { bold: true };
  sheet.getCell("B6").numFmt = "0.00";
  sheet.getCell(`B${rows.length + 1}`).numFmt = "0%";
}

function addSemestersSheet(workbook: ExcelJS.Workbook, report: ProgressReport): void {
  const sheet = workbook.addWorksheet("Semesters");
  sheet.columns = [
    { header: "Semester", key: "number", width: 10 },
    { header: "Label", key: "label", width: 20 },
    { header: "Status", key: "status", width: 12 },
    { header: "Modules", key: "modules", width: 10 },
    { header: "Average", key: "average", width: 10, style: { numFmt: "0.00" } },
    { header: "Credits", key: "credits", width: 10 },
    { header: "Recommended", key: "recommended", width: 14 },
  ];

  for (const semester of report.semesters) {
    sheet.addRow({
      number: semester.number,
      label: semester.label,
      status: semester.status,
      modules: semester.moduleCount,
      average: semester.average,
      credits: semester.creditsCompleted,
      recommended: semester.recommendedCredits,
    });
  }
  sheet.getRow(1).font = { bold: true };
}

function addExamsSheet(workbook: ExcelJS.Workbook, student: Student): void {
  const sheet = workbook.addWorksheet("Exams");
  sheet.columns = [
    { header: "Semester", key: "semester", width: 10 },
    { header: "Module", key: "module", width: 30 },
    { header: "Kind", key: "kind", width: 14 },
    { header: "Date", key: "date", width: 12 },
    { header: "Grade", key: "grade", width: 8 },
    { header: "Weight", key: "weight", width: 8 },
    { header: "Status", key: "status", width: 12 },
  ];

  for (const { semester, module, exam } of allExams(student.program)) {
    sheet.addRow({
      semester: semester.number,
      module: module.name,
      kind: exam.kind,
      date: exam.date,
      grade: exam.grade,
      weight: exam.weight,
      status: exam.status,
    });
  }
  sheet.getRow(1).font = { bold: true };
}

export function buildProgressWorkbook(student: Student, today: string): ExcelJS.Workbook {
  const report = buildProgressReport(student, today);
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date(`${today}T00:00:00`);

  addSummarySheet(workbook, report);
  addSemestersSheet(workbook, report);
  addExamsSheet(workbook, student);
  return workbook;
}

/**
 * Write the progress workbook, creating the target directory if needed
 */
export async function writeProgressWorkbook(
  student: Student,
  filePath: string,
  today: string
): Promise<void> {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  await buildProgressWorkbook(student, today).xlsx.writeFile(filePath);
}
