/**
 * Study Record Service
 *
 * The single entry point the CLI uses to change or query the record:
 * - lifecycle operations on semesters, modules and exams
 * - program settings (target average, credit requirement)
 * - projections ("what grade do I need")
 * - CSV import/export and the progress workbook
 *
 * Every successful mutation is followed by a checkpoint, so the store always
 * holds the last consistent state. A failed mutation throws before the graph is
 * touched and nothing is saved.
 */

import fs from "fs";
import { AppConfig } from "../config/config";
import { todayIso } from "../domain/dates";
import { CreateExamInput, ExamRecord, UpdateExamInput } from "../domain/exam";
import { Program } from "../domain/program";
import {
  IdGenerator,
  addExam,
  addModule,
  addSemester,
  recordGrade,
  removeExam,
  removeModule,
  removeSemester,
  setTargetAverage,
  setTotalCreditsRequired,
  updateExam,
  updateModule,
  updateSemester,
} from "../domain/programEditor";
import { RequiredGrade, projectedAverage, requiredGrade } from "../domain/projection";
import { CreateSemesterInput, Semester, UpdateSemesterInput } from "../domain/semester";
import { Student } from "../domain/student";
import { CreateModuleInput, StudyModule, UpdateModuleInput } from "../domain/studyModule";
import { CsvImportResult, importExamsCsv } from "../loaders/csvImporter";
import { writeExamsCsv } from "./csvExporter";
import { ProgressReport, buildProgressReport } from "./progressReport";
import { RecordContext } from "./recordContext";
import { writeProgressWorkbook } from "./progressWorkbook";

export type ServiceSettings = Pick<AppConfig, "csvDefaultModuleCredits" | "upcomingExamDays">;

export class StudyRecordService {
  private context: RecordContext;
  private settings: ServiceSettings;
  private newId?: IdGenerator;

  constructor(context: RecordContext, settings: ServiceSettings, newId?: IdGenerator) {
    this.context = context;
    this.settings = settings;
    this.newId = newId;
  }

  get student(): Student {
    return this.context.student;
  }

  private get program(): Program {
    return this.context.student.program;
  }

  /**
   * Apply a mutation, then persist it
   */
  private mutate<T>(operation: (program: Program) => T): T {
    const result = operation(this.program);
    this.context.markDirty();
    this.context.checkpoint();
    return result;
  }

  // ============================================
  // Program settings
  // ============================================

  setTargetAverage(targetAverage: number): void {
    this.mutate(program => setTargetAverage(program, targetAverage));
  }

  setTotalCreditsRequired(totalCreditsRequired: number): void {
    this.mutate(program => setTotalCreditsRequired(program, totalCreditsRequired));
  }

  // ============================================
  // Semesters, modules, exams
  // ============================================

  addSemester(input: CreateSemesterInput): Semester {
    return this.mutate(program => addSemester(program, input));
  }

  updateSemester(number: number, changes: UpdateSemesterInput): Semester {
    return this.mutate(program => updateSemester(program, number, changes));
  }

  removeSemester(number: number): Semester {
    return this.mutate(program => removeSemester(program, number));
  }

  addModule(semesterNumber: number, input: CreateModuleInput): StudyModule {
    return this.mutate(program => addModule(program, semesterNumber, input, this.newId));
  }

  updateModule(moduleId: string, changes: UpdateModuleInput): StudyModule {
    return this.mutate(program => updateModule(program, moduleId, changes));
  }

  removeModule(moduleId: string): StudyModule {
    return this.mutate(program => removeModule(program, moduleId));
  }

  addExam(moduleId: string, input: CreateExamInput): ExamRecord {
    return this.mutate(program => addExam(program, moduleId, input, this.newId));
  }

  updateExam(examId: string, changes: UpdateExamInput): ExamRecord {
    return this.mutate(program => updateExam(program, examId, changes));
  }

  recordGrade(examId: string, grade: number, date?: string): ExamRecord {
    return this.mutate(program => recordGrade(program, examId, grade, date));
  }

  removeExam(examId: string): ExamRecord {
    return this.mutate(program => removeExam(program, examId));
  }

  // ============================================
  // Queries
  // ============================================

  report(today: string = todayIso()): ProgressReport {
    return buildProgressReport(this.student, today, this.settings.upcomingExamDays);
  }

  requiredGrade(examIds?: string[]): RequiredGrade {
    return requiredGrade(this.program, examIds);
  }

  projectedAverage(hypotheticalGrades: ReadonlyMap<string, number>): number | null {
    return projectedAverage(this.program, hypotheticalGrades);
  }

  // ============================================
  // Import / export
  // ============================================

  /**
   * Import exams from a CSV file. Valid rows are kept even when others fail.
   */
  importCsv(filePath: string): CsvImportResult {
    const csvText = fs.readFileSync(filePath, "utf-8");
    const result = importExamsCsv(this.student, csvText, {
      defaultModuleCredits: this.settings.csvDefaultModuleCredits,
      newId: this.newId,
    });
    if (result.imported > 0) {
      this.context.markDirty();
      this.context.checkpoint();
    }
    return result;
  }

  exportCsv(filePath: string): void {
    writeExamsCsv(this.student, filePath);
  }

  async exportWorkbook(filePath: string, today: string = todayIso()): Promise<void> {
    await writeProgressWorkbook(this.student, filePath, today);
  }
}
