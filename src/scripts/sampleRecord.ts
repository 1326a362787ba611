/**
 * Sample record for a quick start: a six-semester bachelor program with three
 * modules per semester. Semesters 1-2 are completed, semester 3 is active with
 * one graded module and two upcoming exams, the rest are planned.
 */

import { addDaysIso } from "../domain/dates";
import { GradeScale } from "../domain/gradeScale";
import { IdGenerator, addExam, addModule, addSemester } from "../domain/programEditor";
import { SemesterStatus } from "../domain/semester";
import { Student, createStudent } from "../domain/student";

const SEMESTER_COUNT = 6;
const MODULES_PER_SEMESTER = 3;
const MODULE_CREDITS = [10, 5, 15];

// Grades for the graded modules, keyed "semester.module"
const SAMPLE_GRADES: Record<string, number> = {
  "1.1": 1.3,
  "1.2": 2.0,
  "1.3": 1.7,
  "2.1": 2.3,
  "2.2": 3.0,
  "2.3": 1.0,
  "3.1": 2.7,
};

const ACTIVE_SEMESTER = 3;

function semesterStatus(number: number): SemesterStatus {
  if (number < ACTIVE_SEMESTER) return "completed";
  return number === ACTIVE_SEMESTER ? "active" : "planned";
}

export interface SampleRecordOptions {
  gradeScale: GradeScale;
  targetAverage: number;
  totalCreditsRequired: number;
  // Upcoming exams are dated two weeks after this day
  today: string;
  newId?: IdGenerator;
}

export function buildSampleRecord(options: SampleRecordOptions): Student {
  const student = createStudent(options.newId ? options.newId() : "sample-student", {
    firstName: "Sam",
    lastName: "Sample",
    studentNumber: "100001",
    email: "sam.sample@example.com",
    enrolledOn: "2022-04-01",
    focus: "Computer Science",
    program: {
      name: "Computer Science (B.Sc.)",
      totalCreditsRequired: options.totalCreditsRequired,
      targetAverage: options.targetAverage,
      gradeScale: options.gradeScale,
    },
  });
  const program = student.program;

  for (let s = 1; s <= SEMESTER_COUNT; s++) {
    // Odd semesters run April-September, even ones October-March
    const year = 2022 + Math.floor((s - 1) / 2);
    const odd = s % 2 === 1;
    addSemester(program, {
      number: s,
      startDate: odd ? `${year}-04-01` : `${year}-10-01`,
      endDate: odd ? `${year}-09-30` : `${year + 1}-03-31`,
      status: semesterStatus(s),
    });

    for (let m = 1; m <= MODULES_PER_SEMESTER; m++) {
      const module = addModule(
        program,
        s,
        {
          code: `M${s}${m}`,
          name: `Module ${s}.${m}`,
          description: `Sample module ${m} of semester ${s}`,
          credits: MODULE_CREDITS[m - 1],
        },
        options.newId
      );

      const grade = SAMPLE_GRADES[`${s}.${m}`];
      if (grade !== undefined) {
        addExam(
          program,
          module.id,
          {
            kind: m % 2 === 1 ? "written exam" : "term paper",
            date: odd ? `${year}-07-15` : `${year + 1}-02-15`,
            grade,
          },
          options.newId
        );
      } else if (s === ACTIVE_SEMESTER) {
        addExam(
          program,
          module.id,
          {
            kind: m % 2 === 0 ? "written exam" : "term paper",
            date: addDaysIso(options.today, 14),
          },
          options.newId
        );
      }
    }
  }

  return student;
}
