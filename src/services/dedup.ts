import type { AlertLedger } from "../store/alert-ledger.js";
import type { AlertCandidate, WindowDays } from "../types.js";

export async function isAlreadyNotified(
  ledger: AlertLedger,
  symbol: string,
  window: WindowDays,
  sessionStart: Date,
): Promise<boolean> {
  return ledger.hasAlertSince(symbol, window, sessionStart);
}

/** Candidates whose window has not been notified since `sessionStart`. */
export async function filterUnnotified(
  ledger: AlertLedger,
  symbol: string,
  candidates: AlertCandidate[],
  sessionStart: Date,
): Promise<AlertCandidate[]> {
  const eligible: AlertCandidate[] = [];
  for (const candidate of candidates) {
    if (!(await isAlreadyNotified(ledger, symbol, candidate.window, sessionStart))) {
      eligible.push(candidate);
    }
  }
  return eligible;
}
