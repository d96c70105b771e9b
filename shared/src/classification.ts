import { CycleError } from './errors.js';
import { LABELS, type ClassificationResult, type Label } from './types.js';

const DISPLAY_NAMES = {
  can: 'Can',
  plastic: 'Plastic',
} as const satisfies Record<Label, string>;

export type DisplayName = (typeof DISPLAY_NAMES)[Label];

/**
 * Turn the model's scalar output into a label and confidence.
 * p is P(plastic); a tie at 0.5 goes to plastic.
 */
export function deriveClassification(p: number): ClassificationResult {
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new CycleError('ClassificationError', `Model output out of range: ${p}`);
  }

  const label: Label = p >= 0.5 ? 'plastic' : 'can';
  return {
    label,
    probability: p,
    confidence: Math.max(p, 1 - p) * 100,
  };
}

export function displayName(label: Label): DisplayName {
  return DISPLAY_NAMES[label];
}

/** Accepts wire and display spellings ("can", "Can", " PLASTIC "). */
export function parseLabel(value: string): Label | null {
  const normalized = value.trim().toLowerCase();
  return LABELS.find((label) => label === normalized) ?? null;
}

/** Confidence as reported on the wire: percent, two decimals. */
export function roundConfidence(confidence: number): number {
  return Math.round(confidence * 100) / 100;
}
