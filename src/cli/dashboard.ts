import { formatAverage, formatPercent } from "../domain/format";
import { RequiredGrade } from "../domain/projection";
import { ProgressReport } from "../services/progressReport";

/**
 * Render a progress bar using block characters
 */
export function renderProgressBar(value: number, max: number, width: number): string {
  const percentage = max > 0 ? Math.min(value / max, 1) : 0;
  const filled = Math.round(percentage * width);
  const empty = width - filled;

  const filledChar = "█";
  const emptyChar = "░";

  return `[${filledChar.repeat(filled)}${emptyChar.repeat(empty)}]`;
}

export function describeTargetStatus(report: ProgressReport): string {
  if (report.onTarget === null) {
    return "no grades yet";
  }
  return report.onTarget ? "on target" : "off target";
}

export function describeRequiredGrade(result: RequiredGrade): string {
  switch (result.status) {
    case "achievable":
      return `You need an average of ${formatAverage(result.grade)} on your pending exams`;
    case "secured":
      return "Target secured, whatever the pending exams bring";
    case "unreachable":
      return `Target out of reach (best possible average ${formatAverage(result.bestPossibleAverage)})`;
    case "no_pending_exams":
      return "No pending exams";
  }
}

/**
 * Build the dashboard as lines of text
 */
export function renderDashboard(report: ProgressReport, upcomingDays: number): string[] {
  const lines: string[] = [];
  const rule = "═".repeat(50);

  lines.push(rule);
  lines.push(`  ${report.studentName}${report.studentNumber ? ` (${report.studentNumber})` : ""}`);
  lines.push(`  ${report.programName}`);
  lines.push(rule);

  lines.push("");
  lines.push(
    `  Average: ${formatAverage(report.overallAverage)} (target ${formatAverage(report.targetAverage)}, ${describeTargetStatus(report)})`
  );
  lines.push(
    `  Credits: ${renderProgressBar(report.credits, report.totalCreditsRequired, 20)} ` +
      `${report.credits}/${report.totalCreditsRequired} (${formatPercent(report.progressRatio)})`
  );
  lines.push(`  Remaining: ${report.remainingCredits} credits`);
  lines.push(`  ${describeRequiredGrade(report.requiredGrade)}`);

  lines.push("");
  lines.push("  Semesters:");
  if (report.semesters.length === 0) {
    lines.push("    none yet");
  }
  for (const semester of report.semesters) {
    lines.push(
      `    ${semester.label.padEnd(14)} avg ${formatAverage(semester.average).padStart(4)}` +
        `  credits ${semester.creditsCompleted}/${semester.recommendedCredits}  (${semester.status})`
    );
  }

  const counts = report.standingCounts;
  lines.push("");
  lines.push(
    `  Modules: ${counts.passed} passed · ${counts.failed} failed · ` +
      `${counts.in_progress} in progress · ${counts.open} open`
  );

  if (report.gradeDistribution.length > 0) {
    const most = Math.max(...report.gradeDistribution.map(entry => entry.count));
    lines.push("");
    lines.push("  Grades:");
    for (const { grade, count } of report.gradeDistribution) {
      lines.push(`    ${grade.padStart(4)} ${renderProgressBar(count, most, 10)} ${count}`);
    }
  }

  lines.push("");
  lines.push(`  Upcoming exams (next ${upcomingDays} days):`);
  if (report.upcomingExams.length === 0) {
    lines.push("    none");
  }
  for (const exam of report.upcomingExams) {
    lines.push(`    ${exam.date}  ${exam.moduleName} (${exam.kind})`);
  }

  return lines;
}

export function showDashboard(report: ProgressReport, upcomingDays: number): void {
  console.log("\n" + renderDashboard(report, upcomingDays).join("\n") + "\n");
}
