/**
 * Token confidence statistics. Values are clamped to [0, 100]; an empty list
 * yields zeros.
 */
export interface ConfidenceSummary {
  confidences: number[];
  average: number;
  median: number;
}

export function summarizeConfidences(values: readonly number[]): ConfidenceSummary {
  const confidences = values.filter(Number.isFinite).map((value) => Math.min(100, Math.max(0, value)));
  if (confidences.length === 0) {
    return { confidences, average: 0, median: 0 };
  }

  const sorted = [...confidences].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  const average = confidences.reduce((sum, value) => sum + value, 0) / confidences.length;

  return { confidences, average, median };
}
