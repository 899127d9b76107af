import type { BatchSummary, FileOutcome } from '../types/index.js';

export function summarize(outcomes: FileOutcome[]): BatchSummary {
  const summary: BatchSummary = { outcomes, done: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}

export function pluralize(word: string, count: number, plural = `${word}s`): string {
  return count === 1 ? word : plural;
}
