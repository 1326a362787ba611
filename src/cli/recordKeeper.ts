#!/usr/bin/env node
import "dotenv/config";
import { randomUUID } from "crypto";
import fs from "fs";
import path from "path";
import readline from "readline";
import { loadConfig } from "../config/config";
import { todayIso } from "../domain/dates";
import { MalformedStoreError, NotFoundError, ValidationError } from "../domain/errors";
import { describeScale } from "../domain/gradeScale";
import { allExams, allModules } from "../domain/program";
import { createStudent } from "../domain/student";
import { buildSampleRecord } from "../scripts/sampleRecord";
import { RecordContext } from "../services/recordContext";
import { StudyRecordService } from "../services/studyRecordService";
import { RecordStore } from "../stores/recordStore";
import { describeRequiredGrade, showDashboard } from "./dashboard";
import { ask, askMenu, askNumber, askOptionalNumber, askYesNo } from "./helpers";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

const config = loadConfig(process.env);
const context = new RecordContext(new RecordStore(config.recordFile));
const service = new StudyRecordService(context, config);

function isUserError(err: unknown): err is Error {
  return err instanceof ValidationError || err instanceof NotFoundError || err instanceof MalformedStoreError;
}

/**
 * Run one menu action, reporting domain errors without leaving the loop
 */
async function guarded(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (isUserError(err)) {
      console.error(`\n✗ ${err.message}\n`);
      return;
    }
    throw err;
  }
}

// ============================================
// Pickers
// ============================================

async function pickSemester(): Promise<number | null> {
  const semesters = service.student.program.semesters;
  if (semesters.length === 0) {
    console.log("\nNo semesters yet. Add one first.\n");
    return null;
  }
  const choice = await askMenu(rl, [...semesters.map(s => s.label), "Cancel"], "Which semester?");
  return choice <= semesters.length ? semesters[choice - 1].number : null;
}

async function pickModule(): Promise<string | null> {
  const modules = allModules(service.student.program);
  if (modules.length === 0) {
    console.log("\nNo modules yet. Add one first.\n");
    return null;
  }
  const labels = modules.map(({ semester, module }) => `${module.name} (${semester.label})`);
  const choice = await askMenu(rl, [...labels, "Cancel"], "Which module?");
  return choice <= modules.length ? modules[choice - 1].module.id : null;
}

async function pickExam(filter: "pending" | "all"): Promise<string | null> {
  const exams = allExams(service.student.program).filter(
    ({ exam }) => filter === "all" || exam.grade === null
  );
  if (exams.length === 0) {
    console.log(filter === "pending" ? "\nNo exams waiting for a grade.\n" : "\nNo exams yet.\n");
    return null;
  }
  const labels = exams.map(({ module, exam }) => `${module.name}: ${exam.kind} on ${exam.date} (${exam.status})`);
  const choice = await askMenu(rl, [...labels, "Cancel"], "Which exam?");
  return choice <= exams.length ? exams[choice - 1].exam.id : null;
}

// ============================================
// Actions
// ============================================

async function addSemesterAction(): Promise<void> {
  const number = await askNumber(rl, "Semester number");
  const label = await ask(rl, "Label (leave empty for default)");
  const startDate = await ask(rl, "Start date YYYY-MM-DD (optional)");
  const endDate = await ask(rl, "End date YYYY-MM-DD (optional)");
  const recommendedCredits = await askOptionalNumber(rl, "Recommended credits (optional)");

  const semester = service.addSemester({
    number,
    label,
    startDate: startDate || null,
    endDate: endDate || null,
    recommendedCredits: recommendedCredits ?? undefined,
  });
  console.log(`\n✓ Added ${semester.label}\n`);
}

async function addModuleAction(): Promise<void> {
  const semesterNumber = await pickSemester();
  if (semesterNumber === null) return;

  const name = await ask(rl, "Module name");
  const code = await ask(rl, "Module code (optional)");
  const credits = await askNumber(rl, "Credits");
  const description = await ask(rl, "Description (optional)");

  const module = service.addModule(semesterNumber, { name, code, credits, description });
  console.log(`\n✓ Added module ${module.name}\n`);
}

async function addExamAction(): Promise<void> {
  const moduleId = await pickModule();
  if (moduleId === null) return;

  const kind = await ask(rl, "Kind (e.g. written exam, term paper)");
  const date = await ask(rl, "Date YYYY-MM-DD");
  const weight = await askOptionalNumber(rl, "Weight (default 1)");
  const grade = await askOptionalNumber(rl, `Grade ${describeScale(service.student.program.gradeScale)} (leave empty if not graded yet)`);

  const exam = service.addExam(moduleId, { kind, date, weight: weight ?? undefined, grade });
  console.log(`\n✓ Added ${exam.kind} on ${exam.date} (${exam.status})\n`);
}

async function recordGradeAction(): Promise<void> {
  const examId = await pickExam("pending");
  if (examId === null) return;

  const grade = await askNumber(rl, `Grade ${describeScale(service.student.program.gradeScale)}`);
  const date = await ask(rl, "Date taken YYYY-MM-DD (leave empty to keep)");
  service.recordGrade(examId, grade, date || undefined);
  console.log("\n✓ Grade recorded\n");
}

async function setTargetAction(): Promise<void> {
  const target = await askNumber(rl, "New target average");
  service.setTargetAverage(target);
  console.log("\n✓ Target updated\n");
}

async function setTotalCreditsAction(): Promise<void> {
  const total = await askNumber(rl, "Total credits required");
  service.setTotalCreditsRequired(total);
  console.log("\n✓ Credit requirement updated\n");
}

async function requiredGradeAction(): Promise<void> {
  console.log(`\n${describeRequiredGrade(service.requiredGrade())}\n`);
}

async function importCsvAction(): Promise<void> {
  const filePath = await ask(rl, "CSV file to import");
  if (!fs.existsSync(filePath)) {
    console.error(`\n✗ File not found: ${filePath}\n`);
    return;
  }

  const result = service.importCsv(filePath);
  console.log(`\n✓ Imported ${result.imported} of ${result.total} rows`);
  if (result.createdSemesters.length > 0) {
    console.log(`  New semesters: ${result.createdSemesters.join(", ")}`);
  }
  if (result.createdModules.length > 0) {
    console.log(`  New modules: ${result.createdModules.join(", ")}`);
  }
  for (const error of result.errors) {
    console.error(`  ✗ ${error.message}`);
  }
  console.log("");
}

async function exportCsvAction(): Promise<void> {
  const filePath = path.join(config.exportDir, `exams-${todayIso()}.csv`);
  service.exportCsv(filePath);
  console.log(`\n✓ Exams exported to ${filePath}\n`);
}

async function exportWorkbookAction(): Promise<void> {
  const filePath = path.join(config.exportDir, `progress-${todayIso()}.xlsx`);
  await service.exportWorkbook(filePath);
  console.log(`\n✓ Progress workbook written to ${filePath}\n`);
}

async function deleteModuleAction(): Promise<void> {
  const moduleId = await pickModule();
  if (moduleId === null) return;
  if (await askYesNo(rl, "Delete this module and all of its exams?")) {
    const module = service.removeModule(moduleId);
    console.log(`\n✓ Deleted ${module.name}\n`);
  }
}

async function deleteExamAction(): Promise<void> {
  const examId = await pickExam("all");
  if (examId === null) return;
  if (await askYesNo(rl, "Delete this exam?")) {
    service.removeExam(examId);
    console.log("\n✓ Exam deleted\n");
  }
}

async function deleteSemesterAction(): Promise<void> {
  const number = await pickSemester();
  if (number === null) return;
  if (await askYesNo(rl, "Delete this semester with all of its modules and exams?")) {
    const semester = service.removeSemester(number);
    console.log(`\n✓ Deleted ${semester.label}\n`);
  }
}

// ============================================
// Startup
// ============================================

async function createFreshRecord(): Promise<void> {
  const firstName = await ask(rl, "First name");
  const lastName = await ask(rl, "Last name");
  const studentNumber = await ask(rl, "Student number (optional)");
  const programName = await ask(rl, "Study program");
  const total = await askOptionalNumber(rl, `Total credits required (default ${config.defaultTotalCredits})`);
  const target = await askOptionalNumber(rl, `Target average (default ${config.defaultTargetAverage})`);

  context.start(
    createStudent(randomUUID(), {
      firstName,
      lastName,
      studentNumber,
      program: {
        name: programName,
        totalCreditsRequired: total ?? config.defaultTotalCredits,
        targetAverage: target ?? config.defaultTargetAverage,
        gradeScale: config.gradeScale,
      },
    })
  );
}

async function openOrCreateRecord(): Promise<void> {
  if (context.open()) {
    console.log(`Loaded record of ${service.student.firstName} ${service.student.lastName}\n`);
    return;
  }

  console.log("No saved record found.\n");
  if (await askYesNo(rl, "Start with sample data?")) {
    context.start(
      buildSampleRecord({
        gradeScale: config.gradeScale,
        targetAverage: config.defaultTargetAverage,
        totalCreditsRequired: config.defaultTotalCredits,
        today: todayIso(),
      })
    );
  } else {
    for (;;) {
      try {
        await createFreshRecord();
        break;
      } catch (err) {
        if (!isUserError(err)) throw err;
        console.error(`\n✗ ${err.message}\n`);
      }
    }
  }
  context.checkpoint();
  console.log(`\n✓ Record saved to ${context.store.filePath}\n`);
}

const MENU: [string, () => Promise<void>][] = [
  ["Show dashboard", async () => showDashboard(service.report(), config.upcomingExamDays)],
  ["Add semester", addSemesterAction],
  ["Add module", addModuleAction],
  ["Add exam", addExamAction],
  ["Record grade", recordGradeAction],
  ["Set target average", setTargetAction],
  ["Set total credits required", setTotalCreditsAction],
  ["What grade do I need?", requiredGradeAction],
  ["Import exams from CSV", importCsvAction],
  ["Export exams to CSV", exportCsvAction],
  ["Export progress workbook", exportWorkbookAction],
  ["Delete module", deleteModuleAction],
  ["Delete exam", deleteExamAction],
  ["Delete semester", deleteSemesterAction],
];

/**
 * Main application entry point
 */
async function main() {
  console.log("Study Record Keeper\n");

  try {
    await openOrCreateRecord();
  } catch (err) {
    if (err instanceof MalformedStoreError) {
      console.error(`✗ Cannot open ${context.store.filePath}`);
      console.error(`  ${err.message}`);
      rl.close();
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  let running = true;
  while (running) {
    const choice = await askMenu(rl, [...MENU.map(([label]) => label), "Save and quit"]);
    if (choice > MENU.length) {
      running = false;
    } else {
      await guarded(MENU[choice - 1][1]);
    }
  }

  context.checkpoint();
  console.log(`\nSaved to ${context.store.filePath}. Goodbye!\n`);
  rl.close();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
  rl.close();
});
