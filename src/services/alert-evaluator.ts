import type { AlertCandidate, WindowAverages } from "../types.js";

/**
 * Returns a candidate for every window whose average is above `currentPrice`,
 * largest percentage gap first. Windows without a usable (positive, finite)
 * average never trigger.
 */
export function evaluateAverages(currentPrice: number, averages: WindowAverages): AlertCandidate[] {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) return [];

  const candidates: AlertCandidate[] = [];
  for (const [window, average] of averages) {
    if (average == null || !Number.isFinite(average) || average <= 0) continue;
    if (currentPrice >= average) continue;

    const absDiff = average - currentPrice;
    candidates.push({
      window,
      average,
      absDiff,
      pctDiff: (absDiff / average) * 100,
    });
  }

  return candidates.sort((a, b) => b.pctDiff - a.pctDiff);
}
