import type { CalculationIssue, ChemistryParameter, IssueReason } from "./types";

export function issue(parameter: ChemistryParameter, reason: IssueReason): CalculationIssue {
  return { parameter, reason };
}

/**
 * Concatenates issue lists keeping the first occurrence of each
 * parameter/reason pair.
 */
export function mergeIssues(...lists: CalculationIssue[][]): CalculationIssue[] {
  const seen = new Set<string>();
  const merged: CalculationIssue[] = [];
  for (const list of lists) {
    for (const entry of list) {
      const key = `${entry.parameter}:${entry.reason}`;
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(entry);
      }
    }
  }
  return merged;
}
