import { z } from 'zod';
import { ERROR_KINDS } from './errors.js';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const errorBodySchema = z.object({
  status: z.literal('error'),
  message: z.string(),
  kind: z.enum(ERROR_KINDS).optional(),
});

const countsSchema = z.object({
  can_count: z.number().int().nonnegative(),
  plastic_count: z.number().int().nonnegative(),
});

// ---------------------------------------------------------------------------
// Peripheral capability service
// ---------------------------------------------------------------------------

export const peripheralStatusSchema = z.object({
  status: z.string(),
  message: z.string(),
  camera_available: z.boolean(),
  gpio_initialized: z.boolean(),
});

export const captureResponseSchema = z.object({
  status: z.literal('success'),
  image: z.string().min(1),
});

export const motorRequestSchema = z.object({
  prediction: z.string().min(1),
});

export const motorResponseSchema = z.object({
  status: z.literal('success'),
  message: z.string(),
  prediction: z.string(),
});

export const peripheralTestSchema = z.object({
  status: z.literal('success'),
  message: z.string(),
  camera_shape: z.array(z.number().int().nonnegative()),
  gpio_initialized: z.boolean(),
});

// ---------------------------------------------------------------------------
// Inference/session service
// ---------------------------------------------------------------------------

export const classifyRequestSchema = z.object({
  image: z.string().min(1),
});

export const cycleRequestSchema = z.object({
  peripheral: z.string().min(1).optional(),
});

export const classifyResponseSchema = countsSchema.extend({
  status: z.literal('success'),
  prediction: z.enum(['Can', 'Plastic']),
  confidence: z.number().min(50).max(100),
});

export const scoresSchema = countsSchema.extend({
  is_active: z.boolean(),
});

// ---------------------------------------------------------------------------
// Model server (TensorFlow Serving REST predict)
// ---------------------------------------------------------------------------

export const modelPredictResponseSchema = z.object({
  predictions: z.array(z.array(z.number()).min(1)).min(1),
});

export type ErrorBody = z.infer<typeof errorBodySchema>;
export type PeripheralStatusBody = z.infer<typeof peripheralStatusSchema>;
export type CaptureResponse = z.infer<typeof captureResponseSchema>;
export type MotorRequest = z.infer<typeof motorRequestSchema>;
export type MotorResponse = z.infer<typeof motorResponseSchema>;
export type PeripheralTestBody = z.infer<typeof peripheralTestSchema>;
export type ClassifyResponse = z.infer<typeof classifyResponseSchema>;
export type Scores = z.infer<typeof scoresSchema>;
