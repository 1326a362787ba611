/**
 * Display formatting shared by the dashboard and the progress workbook
 */

/**
 * "1.7", "2.0", "2.25"
 */
export function formatGrade(grade: number): string {
  const tenths = grade * 10;
  return Math.abs(tenths - Math.round(tenths)) < 1e-9 ? grade.toFixed(1) : grade.toFixed(2);
}

/**
 * Averages are shown with two decimals; a missing average reads "n/a"
 */
export function formatAverage(average: number | null): string {
  return average === null ? "n/a" : average.toFixed(2);
}

export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}
