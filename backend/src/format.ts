import { displayName, type SessionSnapshot } from '../../shared/src/index.js';
import type { CycleOutcome } from './controller.js';

export const formatPercent = (value: number, digits = 2) =>
  Number.isFinite(value) ? `${value.toFixed(digits)}%` : '0%';

export function formatOutcome(outcome: CycleOutcome): string {
  if (!outcome.success) {
    const { kind, message } = outcome.error;
    return `[${outcome.peripheralId}] FAILED ${kind} (${outcome.failedIn}): ${message}`;
  }

  const { classification, counts } = outcome;
  return (
    `[${outcome.peripheralId}] ${displayName(classification.label)} ${formatPercent(classification.confidence)}` +
    ` | can=${counts.can} plastic=${counts.plastic}`
  );
}

export function formatScores(snapshot: SessionSnapshot): string {
  const { can, plastic } = snapshot.counts;
  return `Final scores: can=${can} plastic=${plastic} (${can + plastic} sorted)`;
}
