/** The two bins an item can be sorted into. Order matches the model output: p = P(plastic). */
export const LABELS = ['can', 'plastic'] as const;

export type Label = (typeof LABELS)[number];

export type Counts = Record<Label, number>;

export type SessionStatus = 'idle' | 'running' | 'stopped';

/** Read-only view of a session, safe to hand to observers. */
export interface SessionSnapshot {
  id: string;
  status: SessionStatus;
  counts: Counts;
  startedAt: string | null;
}

/** A single frame grabbed from a camera, local or remote. */
export interface CaptureResult {
  /** JPEG bytes */
  image: Buffer;
  width: number;
  height: number;
  /** Peripheral (or upload) the frame came from */
  source: string;
  capturedAt: string;
}

export interface ClassificationResult {
  label: Label;
  /** Raw model output, P(plastic) */
  probability: number;
  /** max(p, 1 - p) * 100, always within [50, 100] */
  confidence: number;
}

/** What to energize for a classified item. Built from configuration only. */
export interface ActuationCommand {
  label: Label;
  channel: number;
  durationMs: number;
}

export interface PeripheralStatus {
  cameraAvailable: boolean;
  actuatorReady: boolean;
  lastSeen: string;
}

export type CycleState = 'IDLE' | 'CAPTURING' | 'CLASSIFYING' | 'ACTUATING' | 'DONE' | 'FAILED';
