import { describe, expect, it } from 'vitest';
import {
  CycleError,
  commandFor,
  deriveClassification,
  displayName,
  parseLabel,
  roundConfidence,
} from '../../shared/src/index.js';

describe('deriveClassification', () => {
  it('keeps confidence within [50, 100] across the probability range', () => {
    for (let i = 0; i <= 100; i++) {
      const { confidence } = deriveClassification(i / 100);
      expect(confidence).toBeGreaterThanOrEqual(50);
      expect(confidence).toBeLessThanOrEqual(100);
    }
  });

  it('maps the extremes to full confidence', () => {
    expect(deriveClassification(0)).toEqual({ label: 'can', probability: 0, confidence: 100 });
    expect(deriveClassification(1)).toEqual({ label: 'plastic', probability: 1, confidence: 100 });
  });

  it('resolves a tie at 0.5 toward plastic', () => {
    expect(deriveClassification(0.5)).toEqual({ label: 'plastic', probability: 0.5, confidence: 50 });
  });

  it('reports 95.2 for p = 0.952', () => {
    const result = deriveClassification(0.952);
    expect(result.label).toBe('plastic');
    expect(result.confidence).toBeCloseTo(95.2, 10);
    expect(roundConfidence(result.confidence)).toBe(95.2);
  });

  it('uses 1 - p as confidence below the threshold', () => {
    const result = deriveClassification(0.25);
    expect(result.label).toBe('can');
    expect(result.confidence).toBe(75);
  });

  it.each([-0.01, 1.01, Number.NaN, Number.POSITIVE_INFINITY])('rejects model output %s', (p) => {
    expect(() => deriveClassification(p)).toThrow(CycleError);
    try {
      deriveClassification(p);
    } catch (err) {
      expect(err instanceof CycleError && err.kind).toBe('ClassificationError');
    }
  });
});

describe('labels', () => {
  it('parses wire and display spellings', () => {
    expect(parseLabel('can')).toBe('can');
    expect(parseLabel(' Plastic ')).toBe('plastic');
    expect(parseLabel('glass')).toBeNull();
  });

  it('has display names for both bins', () => {
    expect(displayName('can')).toBe('Can');
    expect(displayName('plastic')).toBe('Plastic');
  });
});

describe('commandFor', () => {
  const actuation = { canPin: 17, plasticPin: 27, canSeconds: 1, plasticSeconds: 2 };

  it('derives channel and duration from the label alone', () => {
    expect(commandFor('can', actuation)).toEqual({ label: 'can', channel: 17, durationMs: 1000 });
    expect(commandFor('plastic', actuation)).toEqual({ label: 'plastic', channel: 27, durationMs: 2000 });
  });
});
