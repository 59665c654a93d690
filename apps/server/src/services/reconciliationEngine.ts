import type { ReconciliationSummary } from "../types/reconciliation.js";

export function reconcileIds(expectedIds: Iterable<number>, processedIds: Iterable<number>): ReconciliationSummary {
  const expected = new Set(expectedIds);
  const processed = new Set(processedIds);

  const missing = difference(expected, processed);
  const unexpected = difference(processed, expected);
  const successfulCount = expected.size - missing.length;

  return {
    totalExpected: expected.size,
    totalProcessed: processed.size,
    successfulCount,
    missingCount: missing.length,
    missingRecords: missing,
    unexpectedCount: unexpected.length,
    unexpectedRecords: unexpected,
    processingRate: processingRate(successfulCount, expected.size)
  };
}

/**
 * Percentage of expected ids that were processed, rounded to two decimals.
 * An empty expected set yields 0 rather than NaN.
 */
export function processingRate(successfulCount: number, totalExpected: number): number {
  if (totalExpected === 0) return 0;
  return roundTo2((successfulCount / totalExpected) * 100);
}

function difference(left: Set<number>, right: Set<number>): number[] {
  const out: number[] = [];
  for (const id of left) {
    if (!right.has(id)) out.push(id);
  }
  return out.sort(compareIds);
}

function compareIds(a: number, b: number): number {
  return a - b;
}

/**
 * Rounds to two decimals from the exact binary value, with ties to even, so
 * 3.125 becomes 3.12 and 1.005 (stored as 1.00499...) becomes 1.
 */
function roundTo2(value: number): number {
  if (!Number.isFinite(value)) return value;
  const sign = value < 0 ? -1 : 1;
  // toFixed(100) spells out the full decimal expansion of any rate-sized double.
  const [intPart, fracPart] = Math.abs(value).toFixed(100).split(".");
  const kept = Number(intPart + fracPart.slice(0, 2));
  const rest = fracPart.slice(2);
  const roundUp = rest[0] > "5" || (rest[0] === "5" && (/[1-9]/.test(rest.slice(1)) || kept % 2 === 1));
  return (sign * (roundUp ? kept + 1 : kept)) / 100;
}

export const reconciliationEngineTestables = {
  difference,
  roundTo2
};
