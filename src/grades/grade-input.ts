const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Parses a grade typed into a form; null when it is not a plain decimal number. */
export function parseGradeInput(raw: string): number | null {
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function formatAverage(average: number | null): string {
  return average === null ? 'N/A' : average.toFixed(2);
}
